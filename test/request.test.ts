import { describe, it, expect, beforeAll } from "vitest";
import { join, resolve } from "node:path";
import { acceptRequest, commonDirectory } from "../src/request.js";
import { ValidationError, type DocumentRequest } from "../src/types.js";
import { makeTempDir, writeFiles } from "./helpers.js";

describe("acceptRequest", () => {
  let root: string;
  let empty: string;

  beforeAll(() => {
    root = makeTempDir("docsmith-request-");
    empty = makeTempDir("docsmith-empty-");
    writeFiles(root, {
      "api/routes.ts": "export function list() {}\n",
      "api/models.py": "class Order:\n    pass\n",
      "web/app.js": "export const app = 1;\n",
    });
    writeFiles(empty, { "notes.md": "# notes\n" });
  });

  it("trims the text and freezes the accepted request", () => {
    const accepted = acceptRequest({ text: "  Create a BRD  ", interactive: false });
    expect(accepted.request.text).toBe("Create a BRD");
    expect(accepted.codeInventory).toEqual([]);
    expect(Object.isFrozen(accepted)).toBe(true);
    expect(Object.isFrozen(accepted.request)).toBe(true);
  });

  it("builds a sorted inventory for a code directory", () => {
    const accepted = acceptRequest({ text: "Docs", codeDirectory: root, interactive: false });
    expect(accepted.codeRoot).toBe(resolve(root));
    expect(accepted.codeInventory).toEqual([
      join(root, "api/models.py"),
      join(root, "api/routes.ts"),
      join(root, "web/app.js"),
    ]);
  });

  it("accepts an explicit file list, deduplicated, rooted at the common directory", () => {
    const routes = join(root, "api/routes.ts");
    const models = join(root, "api/models.py");
    const accepted = acceptRequest({ text: "Docs", codeFiles: [routes, models, routes], interactive: false });
    expect(accepted.codeInventory).toEqual([models, routes]);
    expect(accepted.codeRoot).toBe(join(root, "api"));
  });

  it("uses the clock for the acceptance time", () => {
    const at = new Date(2024, 5, 1);
    expect(acceptRequest({ text: "Docs", interactive: false }, { now: () => at }).acceptedAt).toBe(at);
  });

  it.each<[string, DocumentRequest, string]>([
    ["empty text", { text: "   ", interactive: false }, "Request text is empty"],
    [
      "both a directory and files",
      { text: "Docs", codeDirectory: ".", codeFiles: ["a.ts"], interactive: false },
      "Use either a code directory or an explicit file list, not both",
    ],
    ["an empty file list", { text: "Docs", codeFiles: [], interactive: false }, "--files specified but no files provided"],
  ])("rejects %s", (_name, request, message) => {
    expect(() => acceptRequest(request)).toThrow(ValidationError);
    expect(() => acceptRequest(request)).toThrow(message);
  });

  it("rejects missing files by the names given", () => {
    const request = { text: "Docs", codeFiles: [join(root, "api/routes.ts"), "nope.ts"], interactive: false };
    expect(() => acceptRequest(request)).toThrow("Files not found: nope.ts");
  });

  it("rejects a directory in the file list", () => {
    expect(() => acceptRequest({ text: "Docs", codeFiles: [root], interactive: false })).toThrow(
      `Not regular files: ${root}`,
    );
  });

  it("rejects a missing code directory", () => {
    const dir = join(root, "missing");
    expect(() => acceptRequest({ text: "Docs", codeDirectory: dir, interactive: false })).toThrow(
      `Code directory not found: ${dir}`,
    );
  });

  it("rejects a file given as the code directory", () => {
    const file = join(root, "web/app.js");
    expect(() => acceptRequest({ text: "Docs", codeDirectory: file, interactive: false })).toThrow(
      `Code path is not a directory: ${file}`,
    );
  });

  it("rejects a directory without source files", () => {
    expect(() => acceptRequest({ text: "Docs", codeDirectory: empty, interactive: false })).toThrow(
      `No source files found in ${resolve(empty)}`,
    );
  });

  it("rejects an unknown forced document type", () => {
    const request: DocumentRequest = JSON.parse('{"text":"Docs","interactive":false,"forcedDocumentType":"ROADMAP"}');
    expect(() => acceptRequest(request)).toThrow('Unknown document type "ROADMAP"');
  });
});

describe("commonDirectory", () => {
  it("returns the deepest shared directory", () => {
    expect(commonDirectory(["/a/b/c/x.ts", "/a/b/d/y.ts"])).toBe("/a/b");
    expect(commonDirectory(["/a/b/x.ts"])).toBe("/a/b");
    expect(commonDirectory(["/a/x.ts", "/b/y.ts"])).toBe("/");
  });
});
