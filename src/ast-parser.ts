// src/ast-parser.ts — Structure outline per source file
// TS/JS go through the TypeScript compiler API; other languages use
// column-0 declaration patterns, which is all a prompt outline needs.

import { extname } from "node:path";
import ts from "typescript";

export interface FileOutline {
  relativePath: string;
  lineCount: number;
  declarations: string[];
}

const TS_EXTENSIONS = new Set([".ts", ".tsx", ".js", ".jsx", ".mjs", ".cjs"]);

/**
 * Outline the top-level declarations of one file's content.
 */
export function outlineSource(relativePath: string, content: string): FileOutline {
  const lineCount = content.split("\n").length;
  const ext = extname(relativePath).toLowerCase();

  let declarations: string[];
  if (TS_EXTENSIONS.has(ext)) {
    declarations = outlineTypeScript(relativePath, content, ext);
  } else if (ext === ".py") {
    declarations = outlinePython(content);
  } else {
    const patterns = LINE_PATTERNS[ext];
    declarations = patterns ? outlineByPatterns(content, patterns) : [];
  }

  return { relativePath, lineCount, declarations };
}

// ─── TypeScript / JavaScript ────────────────────────────────────────────────

function outlineTypeScript(fileName: string, content: string, ext: string): string[] {
  const scriptKind =
    ext === ".tsx"
      ? ts.ScriptKind.TSX
      : ext === ".jsx"
        ? ts.ScriptKind.JSX
        : ext === ".ts"
          ? ts.ScriptKind.TS
          : ts.ScriptKind.JS;

  const sourceFile = ts.createSourceFile(
    fileName,
    content,
    ts.ScriptTarget.Latest,
    true,
    scriptKind,
  );

  const out: string[] = [];

  for (const stmt of sourceFile.statements) {
    const modifiers = ts.canHaveModifiers(stmt) ? ts.getModifiers(stmt) : undefined;
    const exported = modifiers?.some((m) => m.kind === ts.SyntaxKind.ExportKeyword) ?? false;
    const prefix = exported ? "export " : "";

    if (ts.isFunctionDeclaration(stmt)) {
      const name = stmt.name?.text ?? "default";
      out.push(`${prefix}function ${name}(${paramNames(stmt.parameters, sourceFile)})`);
    } else if (ts.isClassDeclaration(stmt)) {
      const name = stmt.name?.text ?? "default";
      const methods = stmt.members
        .filter(ts.isMethodDeclaration)
        .map((m) => m.name.getText(sourceFile));
      out.push(
        methods.length > 0
          ? `${prefix}class ${name}: ${methods.join(", ")}`
          : `${prefix}class ${name}`,
      );
    } else if (ts.isInterfaceDeclaration(stmt)) {
      out.push(`${prefix}interface ${stmt.name.text}`);
    } else if (ts.isTypeAliasDeclaration(stmt)) {
      out.push(`${prefix}type ${stmt.name.text}`);
    } else if (ts.isEnumDeclaration(stmt)) {
      out.push(`${prefix}enum ${stmt.name.text}`);
    } else if (ts.isVariableStatement(stmt) && exported) {
      for (const decl of stmt.declarationList.declarations) {
        if (!ts.isIdentifier(decl.name)) continue;
        const init = decl.initializer;
        if (init && (ts.isArrowFunction(init) || ts.isFunctionExpression(init))) {
          out.push(`export function ${decl.name.text}(${paramNames(init.parameters, sourceFile)})`);
        } else {
          out.push(`export const ${decl.name.text}`);
        }
      }
    } else if (ts.isExportAssignment(stmt)) {
      out.push("export default");
    }
  }

  return out;
}

function paramNames(
  params: ts.NodeArray<ts.ParameterDeclaration>,
  sourceFile: ts.SourceFile,
): string {
  return params.map((p) => p.name.getText(sourceFile)).join(", ");
}

// ─── Python ─────────────────────────────────────────────────────────────────

const PY_DEF = /^(async\s+)?def\s+(\w+)\s*\(([^)]*)\)?/;
const PY_CLASS = /^class\s+(\w+)/;
const PY_METHOD = /^\s+(?:async\s+)?def\s+(\w+)/;

function outlinePython(content: string): string[] {
  const out: string[] = [];
  let currentClass: { name: string; methods: string[] } | null = null;

  const flush = () => {
    if (!currentClass) return;
    out.push(
      currentClass.methods.length > 0
        ? `class ${currentClass.name}: ${currentClass.methods.join(", ")}`
        : `class ${currentClass.name}`,
    );
    currentClass = null;
  };

  for (const line of content.split("\n")) {
    if (!line.trim() || line.trimStart().startsWith("#")) continue;

    if (currentClass && /^\s/.test(line)) {
      const m = PY_METHOD.exec(line);
      if (m) currentClass.methods.push(m[1]);
      continue;
    }

    const cls = PY_CLASS.exec(line);
    if (cls) {
      flush();
      currentClass = { name: cls[1], methods: [] };
      continue;
    }

    const def = PY_DEF.exec(line);
    if (def) {
      flush();
      out.push(`${def[1] ? "async " : ""}def ${def[2]}(${pythonArgNames(def[3])})`);
      continue;
    }

    // Any other column-0 statement closes the class body
    if (!/^\s/.test(line)) flush();
  }
  flush();

  return out;
}

function pythonArgNames(raw: string): string {
  return raw
    .split(",")
    .map((a) => a.split(/[:=]/)[0].trim())
    .filter(Boolean)
    .join(", ");
}

// ─── Other languages ────────────────────────────────────────────────────────

interface LinePattern {
  regex: RegExp;
  render: (m: RegExpExecArray) => string;
}

const C_KEYWORDS = new Set(["if", "for", "while", "switch", "return", "else", "sizeof"]);

const GO_PATTERNS: LinePattern[] = [
  { regex: /^func\s+(\([^)]*\)\s*)?(\w+)/, render: (m) => `func ${m[1] ?? ""}${m[2]}` },
  { regex: /^type\s+(\w+)\s+(struct|interface)\b/, render: (m) => `type ${m[1]} ${m[2]}` },
];

const RUST_PATTERNS: LinePattern[] = [
  { regex: /^(?:pub(?:\([^)]*\))?\s+)?(?:async\s+)?fn\s+(\w+)/, render: (m) => `fn ${m[1]}` },
  { regex: /^(?:pub(?:\([^)]*\))?\s+)?(struct|enum|trait)\s+(\w+)/, render: (m) => `${m[1]} ${m[2]}` },
];

// Java and C# nest types inside namespaces, so allow shallow indentation
const JVM_PATTERNS: LinePattern[] = [
  {
    regex: /^\s{0,4}(?:(?:public|protected|private|internal|abstract|final|static|sealed|partial)\s+)*(class|interface|enum|record|struct)\s+(\w+)/,
    render: (m) => `${m[1]} ${m[2]}`,
  },
];

const C_PATTERNS: LinePattern[] = [
  { regex: /^(class|struct)\s+(\w+)\s*[:{]?\s*$/, render: (m) => `${m[1]} ${m[2]}` },
  {
    regex: /^[A-Za-z_][\w\s*&:<>,]*?[\s*&](\w+)\s*\([^;]*\)\s*(?:const\s*)?\{?\s*$/,
    render: (m) => `function ${m[1]}`,
  },
];

const LINE_PATTERNS: Record<string, LinePattern[]> = {
  ".go": GO_PATTERNS,
  ".rs": RUST_PATTERNS,
  ".java": JVM_PATTERNS,
  ".cs": JVM_PATTERNS,
  ".c": C_PATTERNS,
  ".h": C_PATTERNS,
  ".cpp": C_PATTERNS,
};

function outlineByPatterns(content: string, patterns: LinePattern[]): string[] {
  const out: string[] = [];
  for (const line of content.split("\n")) {
    for (const { regex, render } of patterns) {
      const m = regex.exec(line);
      if (!m) continue;
      if (patterns === C_PATTERNS && m[1] && C_KEYWORDS.has(m[1])) break;
      out.push(render(m));
      break;
    }
  }
  return out;
}
