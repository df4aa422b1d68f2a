import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { basename, join } from "node:path";
import { describe, expect, it } from "vitest";
import { buildContext, extractRepoName, getContext, hashIdentity } from "../services/context.js";

describe("extractRepoName", () => {
  it.each([
    ["git@github.com:acme/api.git", "api"],
    ["https://github.com/acme/api.git", "api"],
    ["https://github.com/acme/api", "api"],
    ["https://github.com/acme/api/", "api"],
  ])("extracts the name from %s", (url, name) => {
    expect(extractRepoName(url)).toBe(name);
  });
});

describe("buildContext", () => {
  it("hashes the remote and branch of a git checkout", () => {
    const context = buildContext("/work/api", "git@github.com:acme/api.git", "main");

    expect(context).toEqual({
      hash: "06ac7c1489fd",
      path: "/work/api",
      label: "api/main",
      remote: "git@github.com:acme/api.git",
      branch: "main",
    });
  });

  it("gives each branch its own context", () => {
    const main = buildContext("/work/api", "git@github.com:acme/api.git", "main");
    const feature = buildContext("/work/api", "git@github.com:acme/api.git", "feature/login");

    expect(feature.hash).not.toBe(main.hash);
    expect(feature.label).toBe("api/feature/login");
  });

  it("falls back to the path without a remote", () => {
    const context = buildContext("/work/shop", undefined, "main");

    expect(context.hash).toBe("34d6b8b36a06");
    expect(context.label).toBe("shop");
  });

  it("produces 12 hex characters", () => {
    expect(hashIdentity("anything")).toMatch(/^[0-9a-f]{12}$/);
  });
});

describe("getContext", () => {
  it("uses the absolute path outside a git repository", async () => {
    const dir = mkdtempSync(join(tmpdir(), "devports-context-"));
    try {
      const context = await getContext(dir);

      expect(context.path).toBe(dir);
      expect(context.label).toBe(basename(dir));
      expect(context.hash).toBe(hashIdentity(dir));
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
