import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { pathToFileURL } from "node:url";
import { afterAll, beforeAll, describe, test, expect } from "vitest";
import { MapFileResolver, NodeFileResolver } from "@resource-ls/language-server/api";

describe("NodeFileResolver", () => {
  let dir = "";

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "resource-ls-files-"));
    fs.writeFileSync(path.join(dir, "main.rdl"), "resource a 'T@v' = {}");
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test("reads file URIs", () => {
    const uri = pathToFileURL(path.join(dir, "main.rdl")).toString();
    expect(new NodeFileResolver().tryRead(uri)).toBe("resource a 'T@v' = {}");
  });

  test("returns null for missing files and directories", () => {
    const resolver = new NodeFileResolver();
    expect(resolver.tryRead(pathToFileURL(path.join(dir, "missing.rdl")).toString())).toBeNull();
    expect(resolver.tryRead(pathToFileURL(dir).toString())).toBeNull();
  });

  test("ignores other schemes", () => {
    expect(new NodeFileResolver().tryRead("untitled:Untitled-1")).toBeNull();
  });
});

describe("MapFileResolver", () => {
  test("serves the given texts", () => {
    const resolver = new MapFileResolver([["file:///work/a.rdl", "x"]]);
    expect(resolver.tryRead("file:///work/a.rdl")).toBe("x");
    expect(resolver.tryRead("file:///work/b.rdl")).toBeNull();
  });
});
