import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ToolInputError } from "../../../../src/index.js";
import { silentLogger } from "../../../../src/testing/tool-harness.js";
import { PasswordManager, globToRegex, readPasswordValue } from "./manager.js";

describe("globToRegex", () => {
  it("keeps * within one path segment", () => {
    const regex = globToRegex("*.pdf");
    expect(regex.test("report.pdf")).toBe(true);
    expect(regex.test("dir/report.pdf")).toBe(false);
  });

  it("lets ** cross directories and match none", () => {
    const regex = globToRegex("/data/**/*.pdf");
    expect(regex.test("/data/a/b/x.pdf")).toBe(true);
    expect(regex.test("/data/x.pdf")).toBe(true);
    expect(regex.test("/other/x.pdf")).toBe(false);
  });

  it("ignores case and escapes regex characters", () => {
    expect(globToRegex("*.PDF").test("a.pdf")).toBe(true);
    expect(globToRegex("file?.txt").test("file1.txt")).toBe(true);
    expect(globToRegex("a+b.txt").test("aab.txt")).toBe(false);
    expect(globToRegex("a+b.txt").test("a+b.txt")).toBe(true);
  });
});

describe("readPasswordValue", () => {
  it("accepts a trimmed single line of 3 to 256 characters", () => {
    expect(readPasswordValue("  alpha-pass \n")).toBe("alpha-pass");
    expect(readPasswordValue("ab")).toBeUndefined();
    expect(readPasswordValue("x".repeat(257))).toBeUndefined();
    expect(readPasswordValue("line1\nline2")).toBeUndefined();
  });
});

describe("PasswordManager", () => {
  let dir: string;
  let manager: PasswordManager;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "doc-passwords-"));
    manager = new PasswordManager(silentLogger);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("finds specific passwords regardless of case", () => {
    manager.registerPassword(join(dir, "Secret.PDF"), "test-secret");
    expect(manager.getPassword(join(dir, "secret.pdf"))).toBe("test-secret");
    expect(manager.hasPassword(join(dir, "other.pdf"))).toBe(false);
  });

  it("prefers a specific password over a pattern", () => {
    manager.registerPattern(`${dir}/**/*.pdf`, "pattern-secret");
    manager.registerPassword(join(dir, "a.pdf"), "file-secret");
    expect(manager.getPassword(join(dir, "a.pdf"))).toBe("file-secret");
    expect(manager.getPassword(join(dir, "sub", "b.pdf"))).toBe("pattern-secret");
  });

  it("masks pattern passwords and counts registrations", () => {
    manager.registerPattern("/reports/*.xlsx", "test-secret");
    manager.registerPassword("/reports/a.xlsx", "test-secret");
    expect(manager.listPatterns()).toEqual({ "/reports/*.xlsx": "***" });
    expect(manager.stats()).toEqual({ specificPasswords: 1, patterns: 1 });
    expect(manager.clear()).toEqual({ specificPasswords: 1, patterns: 1 });
    expect(manager.stats()).toEqual({ specificPasswords: 0, patterns: 0 });
  });

  it("rejects empty passwords", () => {
    expect(() => manager.registerPassword("/a.pdf", "")).toThrow(ToolInputError);
  });

  it("registers valid bulk entries and reports the rest", () => {
    const result = manager.registerBulk({ "/a.pdf": "test-secret", "/b.pdf": "" });
    expect(result).toEqual({ registered: 1, failed: ["/b.pdf"] });
  });

  it("applies detected password files to their folder", async () => {
    await mkdir(join(dir, "a", "sub"), { recursive: true });
    await mkdir(join(dir, "b"));
    await writeFile(join(dir, "a", "password.txt"), "  alpha-pass \n");
    await writeFile(join(dir, "b", "notes.pwd"), "line1\nline2");
    await writeFile(join(dir, "readme.txt"), "not a password file");

    const result = await manager.autoDetect(dir);

    expect(result.filesFound).toBe(2);
    expect(result.registered).toBe(1);
    expect(result.patterns).toEqual([`${dir}/a/**/*`]);
    expect(result.skipped).toEqual([
      { file: join(dir, "b", "notes.pwd"), reason: "content is not a single line of 3 to 256 characters" },
    ]);
    expect(manager.getPassword(join(dir, "a", "report.pdf"))).toBe("alpha-pass");
    expect(manager.getPassword(join(dir, "a", "sub", "report.pdf"))).toBe("alpha-pass");
    expect(manager.getPassword(join(dir, "b", "report.pdf"))).toBeUndefined();
  });
});
