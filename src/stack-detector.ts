// src/stack-detector.ts — Technology and language detection for a code inventory
// Marker files are looked for at the top of the code directory only.

import { readdirSync } from "node:fs";
import { extname } from "node:path";
import { DOCUMENT_TYPES, type DetectedStack, type DocumentType, type Warning } from "./types.js";

interface MarkerRule {
  technology: string;
  matches: (name: string) => boolean;
}

const named =
  (...names: string[]) =>
  (name: string) =>
    names.includes(name);

const MARKERS: readonly MarkerRule[] = [
  { technology: "Node.js", matches: named("package.json") },
  { technology: "Next.js", matches: (n) => /^next\.config\.(js|mjs|cjs|ts)$/.test(n) },
  { technology: "Vite", matches: (n) => n.startsWith("vite.config.") },
  { technology: "Python", matches: named("requirements.txt", "pyproject.toml", "setup.py") },
  { technology: "Java", matches: named("pom.xml", "build.gradle", "build.gradle.kts") },
  { technology: ".NET", matches: (n) => n.endsWith(".csproj") || n.endsWith(".sln") },
  { technology: "Go", matches: named("go.mod") },
  { technology: "Rust", matches: named("Cargo.toml") },
  {
    technology: "Docker",
    matches: named("Dockerfile", "docker-compose.yml", "docker-compose.yaml", "compose.yaml"),
  },
  { technology: "Kubernetes", matches: (n) => /k8s|kubernetes|helm/i.test(n) },
  { technology: "Terraform", matches: (n) => n.endsWith(".tf") },
  { technology: "SQL database", matches: (n) => n.endsWith(".sql") },
];

const LANGUAGES: Record<string, string> = {
  ".ts": "TypeScript",
  ".tsx": "TypeScript",
  ".js": "JavaScript",
  ".jsx": "JavaScript",
  ".mjs": "JavaScript",
  ".cjs": "JavaScript",
  ".py": "Python",
  ".java": "Java",
  ".cs": "C#",
  ".go": "Go",
  ".rs": "Rust",
  ".c": "C",
  ".h": "C",
  ".cpp": "C++",
  ".rb": "Ruby",
  ".php": "PHP",
};

// Technologies that usually serve an interface worth an API document
const SERVICE_TECHNOLOGIES = new Set(["Node.js", "Python", "Java", ".NET", "Go"]);
const DEPLOYMENT_TECHNOLOGIES = new Set(["Docker", "Kubernetes", "Terraform"]);

/**
 * Detect technologies from the directory's top-level entries and languages
 * from the inventory. `directory` is omitted for explicit file lists.
 */
export function detectStack(
  directory: string | undefined,
  inventory: readonly string[],
  warnings: Warning[] = [],
): DetectedStack {
  const names = directory ? listTopLevel(directory, warnings) : [];
  const technologies = MARKERS.filter((m) => names.some(m.matches)).map((m) => m.technology);
  const languages = [
    ...new Set(inventory.map((f) => LANGUAGES[extname(f).toLowerCase()]).filter((l) => l !== undefined)),
  ].sort();

  return Object.freeze({
    technologies: Object.freeze(technologies),
    languages: Object.freeze(languages),
    suggestedDocumentTypes: Object.freeze(suggestDocumentTypes(technologies)),
  });
}

export function suggestDocumentTypes(technologies: readonly string[]): DocumentType[] {
  const suggested = new Set<DocumentType>();
  if (technologies.length > 0) suggested.add("FRD");
  if (technologies.some((t) => DEPLOYMENT_TECHNOLOGIES.has(t))) suggested.add("CLOUD");
  if (technologies.some((t) => SERVICE_TECHNOLOGIES.has(t))) suggested.add("API");
  return DOCUMENT_TYPES.filter((t) => suggested.has(t));
}

function listTopLevel(directory: string, warnings: Warning[]): string[] {
  try {
    return readdirSync(directory);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    warnings.push({ level: "warn", module: "stack-detector", message: `Could not list ${directory}: ${msg}` });
    return [];
  }
}
