import test from "node:test";
import assert from "node:assert/strict";
import { mkdirSync, mkdtempSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { ContentReader, TRUNCATION_MARKER, readWindow, trimPartialCodePoint } from "../ContentReader.js";

const makeProject = (files: Record<string, string | Buffer>): string => {
  const root = mkdtempSync(path.join(os.tmpdir(), "repoprobe-read-"));
  for (const [relative, content] of Object.entries(files)) {
    const target = path.join(root, relative);
    mkdirSync(path.dirname(target), { recursive: true });
    writeFileSync(target, content);
  }
  return root;
};

test("ContentReader reads text files and skips unreadable ones", { concurrency: false }, async () => {
  const root = makeProject({
    "src/app.ts": "export const answer = 42;\n",
    "logo.png": Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x00, 0x01]),
    "latin1.txt": Buffer.from([0x63, 0x61, 0x66, 0xe9]),
  });
  mkdirSync(path.join(root, "docs"));

  const result = await new ContentReader().readAll(root, [
    "missing.ts",
    "src/app.ts",
    "logo.png",
    "latin1.txt",
    "docs",
    "../outside.txt",
  ]);
  assert.deepEqual(result.files, [
    { path: "src/app.ts", content: "export const answer = 42;\n", bytes: 26, truncated: false },
  ]);
  assert.deepEqual(result.skipped, [
    { path: "missing.ts", reason: "missing" },
    { path: "logo.png", reason: "binary" },
    { path: "latin1.txt", reason: "invalid_utf8" },
    { path: "docs", reason: "not_file" },
    { path: "../outside.txt", reason: "outside_root" },
  ]);
  assert.equal(result.totalBytes, 26);
});

test("ContentReader truncates at the per-file limit with a marker", { concurrency: false }, async () => {
  const root = makeProject({ "big.txt": "abcdefghij" });
  const result = await new ContentReader({ maxFileBytes: 4 }).readAll(root, ["big.txt"]);
  assert.deepEqual(result.files, [
    { path: "big.txt", content: `abcd${TRUNCATION_MARKER}`, bytes: 4, truncated: true },
  ]);
  assert.ok(result.files[0]?.content.endsWith("/* ...truncated... */"));
});

test("ContentReader does not split multi-byte characters at the limit", { concurrency: false }, async () => {
  const root = makeProject({ "accent.txt": "aé!" });
  const result = await new ContentReader({ maxFileBytes: 2 }).readAll(root, ["accent.txt"]);
  assert.deepEqual(result.files, [
    { path: "accent.txt", content: `a${TRUNCATION_MARKER}`, bytes: 1, truncated: true },
  ]);
});

test("ContentReader stops adding content once the total budget is spent", { concurrency: false }, async () => {
  const root = makeProject({ "a.txt": "0123456789", "b.txt": "0123456789", "c.txt": "0123456789" });
  const result = await new ContentReader({ maxFileBytes: 100, maxTotalBytes: 15 }).readAll(root, [
    "a.txt",
    "b.txt",
    "c.txt",
  ]);
  assert.deepEqual(
    result.files.map((file) => [file.path, file.bytes, file.truncated]),
    [
      ["a.txt", 10, false],
      ["b.txt", 5, true],
    ],
  );
  assert.deepEqual(result.skipped, [{ path: "c.txt", reason: "budget_exhausted" }]);
  assert.equal(result.totalBytes, 15);
});

test("ContentReader reads whole bytes under a fractional limit", { concurrency: false }, async () => {
  const root = makeProject({ "a.txt": "hello world!", "small.txt": "ok\n", "empty.txt": "" });
  const result = await new ContentReader({ maxFileBytes: 5.5, maxTotalBytes: 100 }).readAll(root, [
    "a.txt",
    "small.txt",
    "empty.txt",
  ]);
  assert.deepEqual(result.files, [
    { path: "a.txt", content: `hello${TRUNCATION_MARKER}`, bytes: 5, truncated: true },
    { path: "small.txt", content: "ok\n", bytes: 3, truncated: false },
    { path: "empty.txt", content: "", bytes: 0, truncated: false },
  ]);
  assert.deepEqual(result.skipped, []);
  assert.equal(result.totalBytes, 8);
});

test("readWindow returns at most the requested bytes", { concurrency: false }, async () => {
  const root = makeProject({ "ten.txt": "0123456789" });
  const file = path.join(root, "ten.txt");
  assert.equal((await readWindow(file, 4)).toString("utf8"), "0123");
  assert.equal((await readWindow(file, 100)).toString("utf8"), "0123456789");
});

test("trimPartialCodePoint keeps complete sequences", () => {
  const complete = Buffer.from("aé", "utf8");
  assert.equal(trimPartialCodePoint(complete).length, 3);
  const cut = Buffer.from([0x61, 0xe2, 0x82]);
  assert.deepEqual([...trimPartialCodePoint(cut)], [0x61]);
});
