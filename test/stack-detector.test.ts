import { describe, it, expect } from "vitest";
import { join } from "node:path";
import { detectStack, suggestDocumentTypes } from "../src/stack-detector.js";
import { acceptRequest } from "../src/request.js";
import type { Warning } from "../src/types.js";
import { makeTempDir, writeFiles } from "./helpers.js";

describe("detectStack", () => {
  it("reads marker files at the top of the directory and languages from the inventory", () => {
    const root = makeTempDir("docsmith-stack-");
    writeFiles(root, {
      "package.json": "{}",
      Dockerfile: "FROM node:20\n",
      "schema.sql": "create table t (id int);\n",
      "nested/pom.xml": "<project/>\n",
    });

    const stack = detectStack(root, [join(root, "src/app.ts"), join(root, "tools/gen.py"), join(root, "src/ui.tsx")]);

    expect(stack).toEqual({
      technologies: ["Node.js", "Docker", "SQL database"],
      languages: ["Python", "TypeScript"],
      suggestedDocumentTypes: ["FRD", "CLOUD", "API"],
    });
  });

  it("skips marker detection for explicit file lists", () => {
    expect(detectStack(undefined, ["/repo/main.go"])).toEqual({
      technologies: [],
      languages: ["Go"],
      suggestedDocumentTypes: [],
    });
  });

  it("warns when the directory cannot be listed", () => {
    const warnings: Warning[] = [];
    const stack = detectStack(join(makeTempDir("docsmith-stack-"), "missing"), [], warnings);

    expect(stack.technologies).toEqual([]);
    expect(warnings.map((w) => w.module)).toEqual(["stack-detector"]);
  });
});

describe("suggestDocumentTypes", () => {
  it("suggests documents in document-type order", () => {
    expect(suggestDocumentTypes(["Kubernetes"])).toEqual(["FRD", "CLOUD"]);
    expect(suggestDocumentTypes(["Go", "Terraform"])).toEqual(["FRD", "CLOUD", "API"]);
    expect(suggestDocumentTypes([])).toEqual([]);
  });
});

describe("acceptRequest stack detection", () => {
  it("attaches the detected stack when a code directory is given", () => {
    const root = makeTempDir("docsmith-stack-");
    writeFiles(root, { "go.mod": "module shop\n", "cmd/main.go": "package main\n" });

    const accepted = acceptRequest({ text: "Docs", codeDirectory: root, interactive: false });

    expect(accepted.detectedStack?.technologies).toEqual(["Go"]);
    expect(accepted.detectedStack?.languages).toEqual(["Go"]);
  });

  it("has no detected stack without code", () => {
    expect(acceptRequest({ text: "Docs", interactive: false }).detectedStack).toBeUndefined();
  });
});
