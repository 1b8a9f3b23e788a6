import test from "node:test";
import assert from "node:assert/strict";
import { mkdirSync, mkdtempSync, realpathSync, symlinkSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { AnalysisError } from "../../runtime/AnalysisErrors.js";
import { DirectoryScanner, buildExcludeMatcher, formatListing } from "../DirectoryScanner.js";

const makeProject = (files: Record<string, string>): string => {
  const root = mkdtempSync(path.join(os.tmpdir(), "repoprobe-scan-"));
  for (const [relative, content] of Object.entries(files)) {
    const target = path.join(root, relative);
    mkdirSync(path.dirname(target), { recursive: true });
    writeFileSync(target, content);
  }
  return root;
};

test("DirectoryScanner skips denylisted directories", { concurrency: false }, async () => {
  const root = makeProject({
    "src/main.py": "print('hi')\n",
    ".git/config": "[core]\n",
    "node_modules/pkg/index.js": "module.exports = 1;\n",
    "README.md": "# demo\n",
  });
  const result = await new DirectoryScanner().scan(root);
  assert.deepEqual(result.files, ["README.md", "src/main.py"]);
  assert.equal(result.root, realpathSync(root));
  assert.equal(result.truncated, false);
  assert.deepEqual(result.skippedDirectories, []);
});

test("DirectoryScanner orders entries per level and is stable", { concurrency: false }, async () => {
  const root = makeProject({
    "b.txt": "b",
    "a/z.txt": "z",
    "a/b/c.txt": "c",
    "B.txt": "B",
    "a.txt": "a",
  });
  const scanner = new DirectoryScanner();
  const first = await scanner.scan(root);
  const second = await scanner.scan(root);
  assert.deepEqual(first.files, ["B.txt", "a/b/c.txt", "a/z.txt", "a.txt", "b.txt"]);
  assert.deepEqual(second.files, first.files);
});

test("DirectoryScanner applies extra and replacement exclude lists", { concurrency: false }, async () => {
  const root = makeProject({
    "tmp/cache.bin": "x",
    "Build/out.js": "x",
    "vendor/lib.php": "x",
    "app.js": "x",
  });
  const extra = await new DirectoryScanner({ extraExcludeDirs: ["tmp"] }).scan(root);
  assert.deepEqual(extra.files, ["app.js"]);

  const replaced = await new DirectoryScanner({ excludeDirs: ["tmp"] }).scan(root);
  assert.deepEqual(replaced.files, ["Build/out.js", "app.js", "vendor/lib.php"]);
});

test("DirectoryScanner guards against symlink cycles", { concurrency: false }, async () => {
  const root = makeProject({ "pkg/index.ts": "export {};\n" });
  symlinkSync(root, path.join(root, "pkg", "loop"), "dir");
  symlinkSync(path.join(root, "missing-target"), path.join(root, "broken"));

  const followed = await new DirectoryScanner().scan(root);
  assert.deepEqual(followed.files, ["pkg/index.ts"]);

  const unfollowed = await new DirectoryScanner({ followSymlinks: false }).scan(root);
  assert.deepEqual(unfollowed.files, ["pkg/index.ts"]);
});

test("DirectoryScanner follows links to files and sibling directories", { concurrency: false }, async () => {
  const root = makeProject({ "shared/util.ts": "export {};\n", "real.md": "x" });
  symlinkSync(path.join(root, "shared"), path.join(root, "linked"), "dir");
  symlinkSync(path.join(root, "real.md"), path.join(root, "alias.md"));

  const result = await new DirectoryScanner().scan(root);
  assert.deepEqual(result.files, ["alias.md", "linked/util.ts", "real.md", "shared/util.ts"]);
});

test("DirectoryScanner stops at maxFiles", { concurrency: false }, async () => {
  const root = makeProject({ "a.txt": "a", "b.txt": "b", "c.txt": "c" });
  const result = await new DirectoryScanner({ maxFiles: 2 }).scan(root);
  assert.deepEqual(result.files, ["a.txt", "b.txt"]);
  assert.equal(result.truncated, true);
});

test("DirectoryScanner rejects missing roots and plain files", { concurrency: false }, async () => {
  const root = makeProject({ "file.txt": "x" });
  const scanner = new DirectoryScanner();
  await assert.rejects(
    () => scanner.scan(path.join(root, "nope")),
    (error: unknown) => {
      assert.ok(error instanceof AnalysisError);
      assert.equal(error.code, "invalid_project_path");
      assert.equal(error.phase, "scanning");
      assert.equal(error.message, `Invalid project path: ${path.join(root, "nope")} does not exist.`);
      return true;
    },
  );
  await assert.rejects(() => scanner.scan(path.join(root, "file.txt")), {
    code: "invalid_project_path",
    message: `Invalid project path: ${path.join(root, "file.txt")} is not a directory.`,
  });
});

test("DirectoryScanner reports a self-referencing link as an invalid root", { concurrency: false }, async () => {
  const root = makeProject({});
  const loop = path.join(root, "loop");
  symlinkSync(loop, loop);
  await assert.rejects(
    () => new DirectoryScanner().scan(loop),
    (error: unknown) => {
      assert.ok(error instanceof AnalysisError);
      assert.equal(error.code, "invalid_project_path");
      assert.equal(error.exitCode, 2);
      assert.equal(error.message, `Invalid project path: ${loop} cannot be read.`);
      assert.deepEqual(error.details, { projectPath: loop, reason: "unreadable", errorCode: "ELOOP" });
      return true;
    },
  );
});

test("buildExcludeMatcher matches exact and lower-cased names", () => {
  const matcher = buildExcludeMatcher(["node_modules", "Build"]);
  assert.equal(matcher("node_modules"), true);
  assert.equal(matcher("NODE_MODULES"), true);
  assert.equal(matcher("build"), true);
  assert.equal(matcher("src"), false);
});

test("formatListing joins paths one per line", () => {
  assert.equal(formatListing(["README.md", "src/main.py"]), "README.md\nsrc/main.py");
});
