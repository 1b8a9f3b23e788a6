import test from "node:test";
import assert from "node:assert/strict";
import { spawnSync } from "node:child_process";
import { mkdtempSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { runCli } from "../cli.js";
import type { CommandIO } from "../cli/CommandIO.js";

const testDir = path.dirname(fileURLToPath(import.meta.url));
const cliPath = path.resolve(testDir, "..", "cli.ts");

const spawnCli = (args: string[]) =>
  spawnSync(process.execPath, ["--import", "tsx", cliPath, ...args], {
    encoding: "utf8",
  });

const captureIO = (cwd: string): CommandIO & { out: string[]; err: string[] } => {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: (text) => out.push(text),
    stderr: (text) => err.push(text),
    env: {},
    cwd,
  };
};

const withFetch = async (impl: typeof fetch, fn: () => Promise<void>): Promise<void> => {
  const original = globalThis.fetch;
  globalThis.fetch = impl;
  try {
    await fn();
  } finally {
    globalThis.fetch = original;
  }
};

const makeProject = (): string => {
  const root = mkdtempSync(path.join(os.tmpdir(), "repoprobe-cli-"));
  writeFileSync(path.join(root, "README.md"), "# Demo\n");
  return root;
};

test("repoprobe --help prints usage", { concurrency: false }, () => {
  const result = spawnCli(["--help"]);
  assert.equal(result.status, 0);
  assert.match(result.stdout, /Usage: repoprobe analyze <project_path> --prompt/);
  assert.match(result.stdout, /--keep-unknown-paths/);
});

test("repoprobe --version prints the package version", { concurrency: false }, () => {
  const result = spawnCli(["--version"]);
  assert.equal(result.status, 0);
  assert.equal(result.stdout, "0.1.0\n");
});

test("runCli exits 1 on usage errors", { concurrency: false }, async () => {
  const io = captureIO(makeProject());
  assert.equal(await runCli(["analyze", "."], io), 1);
  assert.match(io.err.join(""), /^Missing required --prompt\./);
  assert.equal(await runCli(["frobnicate"], io), 1);
  assert.deepEqual(io.out, []);
});

test("runCli exits 2 for an invalid project path", { concurrency: false }, async () => {
  const root = makeProject();
  const io = captureIO(root);
  const code = await runCli(["analyze", "missing-dir", "--prompt", "x", "--no-log"], io);
  assert.equal(code, 2);
  assert.deepEqual(io.out, []);
  assert.deepEqual(io.err, [
    `Scan failed: Invalid project path: ${path.join(root, "missing-dir")} does not exist.\nhint: Pass an existing project directory, for example \`.\`.\n`,
  ]);
});

test("runCli exits 3 without stdout when the service refuses connections", { concurrency: false }, async () => {
  const io = captureIO(makeProject());
  await withFetch(
    async () => {
      throw new TypeError("fetch failed", { cause: new Error("connect ECONNREFUSED 127.0.0.1:11434") });
    },
    async () => {
      const code = await runCli(["analyze", ".", "--prompt", "Summarize", "--no-log", "--quiet"], io);
      assert.equal(code, 3);
    },
  );
  assert.deepEqual(io.out, []);
  assert.equal(
    io.err[0],
    "Selection failed: Inference service unavailable at http://127.0.0.1:11434/api/generate: fetch failed (connect ECONNREFUSED 127.0.0.1:11434)\n" +
      "hint: Check that the inference service is running (ollama serve) and the base URL is correct.\n",
  );
});

test("runCli exits 4 on a malformed selection", { concurrency: false }, async () => {
  const io = captureIO(makeProject());
  await withFetch(
    (async () =>
      ({
        ok: true,
        status: 200,
        statusText: "",
        text: async () => JSON.stringify({ response: "README.md is the one" }),
        headers: {
          get: () => "application/json",
        },
      }) as unknown as Response) as typeof fetch,
    async () => {
      const code = await runCli(["analyze", ".", "--prompt", "Summarize", "--no-log", "--quiet"], io);
      assert.equal(code, 4);
    },
  );
  assert.deepEqual(io.out, []);
  assert.match(io.err[0] ?? "", /^Selection failed: Malformed model response: expected a JSON array of file path strings/);
});

test("runCli exits 3 without stdout when the service drops before analysis", { concurrency: false }, async () => {
  const io = captureIO(makeProject());
  let calls = 0;
  await withFetch(
    (async () => {
      calls += 1;
      if (calls > 1) throw new TypeError("fetch failed");
      return {
        ok: true,
        status: 200,
        statusText: "",
        text: async () => JSON.stringify({ model: "codegemma", response: '["README.md"]', done: true }),
        headers: {
          get: () => "application/json",
        },
      } as unknown as Response;
    }) as typeof fetch,
    async () => {
      const code = await runCli(["analyze", ".", "--prompt", "Summarize", "--no-log", "--quiet"], io);
      assert.equal(code, 3);
    },
  );
  assert.equal(calls, 2);
  assert.deepEqual(io.out, []);
  assert.equal(
    io.err[0],
    "Analysis failed: Inference service unavailable at http://127.0.0.1:11434/api/generate: fetch failed\n" +
      "hint: Check that the inference service is running (ollama serve) and the base URL is correct.\n",
  );
});

test("runCli checks the project path before loading a framework catalog override", { concurrency: false }, async () => {
  const root = makeProject();
  const io = captureIO(root);
  io.env = { REPOPROBE_FRAMEWORK_CATALOG: path.join(root, "no-such-catalog.yaml") };
  const code = await runCli(["analyze", "missing-dir", "--prompt", "x", "--no-log"], io);
  assert.equal(code, 2);
  assert.deepEqual(io.out, []);
  assert.match(io.err[0] ?? "", /^Scan failed: Invalid project path: /);
});
