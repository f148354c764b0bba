import assert from "node:assert/strict";
import test from "node:test";
import { SessionAbortedError } from "../../../lib/errors.js";
import { ToolExecutor } from "../../executor.js";
import { FileStore } from "../../fs/file-store.js";
import { ToolContext, createDefaultToolRegistry } from "../index.js";

function setup(files: Record<string, string> = {}) {
  const store = new FileStore({ files: [], fileRevision: 0 });
  const entries = Object.entries(files);
  if (entries.length) {
    store.apply(entries.map(([path, content]) => ({ type: "write" as const, path, content })));
  }
  const executor = new ToolExecutor(createDefaultToolRegistry());
  const context: ToolContext = { store };
  return { store, executor, context };
}

test("write-file creates a file and reports the new revision", async () => {
  const { store, executor, context } = setup();

  const { call, control } = await executor.execute(
    { id: "call-1", name: "write-file", arguments: { path: "src/App.tsx", content: "export {};\n" } },
    context
  );

  assert.equal(control, null);
  assert.deepEqual(call.result, {
    ok: true,
    message: "Created src/App.tsx.",
    data: { path: "src/App.tsx", bytes: 11, revision: 1 }
  });
  assert.equal(store.read("src/App.tsx")?.content, "export {};\n");
  assert.equal(Object.isFrozen(call), true);
});

test("write-file over an existing path reports an update", async () => {
  const { executor, context } = setup({ "index.html": "<p>old</p>" });

  const { call } = await executor.execute(
    { id: "call-1", name: "write-file", arguments: { path: "index.html", content: "<p>new</p>" } },
    context
  );

  assert.equal(call.result.message, "Updated index.html.");
});

test("patch-file on an unknown path fails with not_found and leaves the store alone", async () => {
  const { store, executor, context } = setup();

  const { call } = await executor.execute(
    { id: "call-1", name: "patch-file", arguments: { path: "src/missing.ts", search: "a", replace: "b" } },
    context
  );

  assert.deepEqual(call.result, { ok: false, errorCode: "not_found", message: "File not found: src/missing.ts" });
  assert.equal(store.revision, 0);
});

test("patch-file refuses an ambiguous search", async () => {
  const { store, executor, context } = setup({ "a.ts": "let x = 1;\nlet x = 1;\n" });

  const { call } = await executor.execute(
    { id: "call-1", name: "patch-file", arguments: { path: "a.ts", search: "let x = 1;", replace: "let y = 2;" } },
    context
  );

  assert.equal(call.result.ok, false);
  assert.equal(call.result.errorCode, "patch_conflict");
  assert.equal(
    call.result.message,
    "Patch conflict on 'a.ts': search text matches 2 times; narrow it with firstLine/lastLine."
  );
  assert.equal(store.revision, 1);
});

test("patch-file replaces a unique match", async () => {
  const { store, executor, context } = setup({ "a.ts": "const title = 'Hi';\n" });

  const { call } = await executor.execute(
    { id: "call-1", name: "patch-file", arguments: { path: "a.ts", search: "'Hi'", replace: "'Hello'" } },
    context
  );

  assert.equal(call.result.message, "Patched a.ts.");
  assert.equal(store.read("a.ts")?.content, "const title = 'Hello';\n");
});

test("patch-file with a line range replaces exactly those lines", async () => {
  const { store, executor, context } = setup({ "a.txt": "a\nb\nc\n" });

  const { call } = await executor.execute(
    {
      id: "call-1",
      name: "patch-file",
      arguments: { path: "a.txt", search: "b", replace: "B", firstLine: 2, lastLine: 2 }
    },
    context
  );

  assert.equal(call.result.ok, true);
  assert.equal(store.read("a.txt")?.content, "a\nB\nc\n");
});

test("patch-file with a line range that does not match is a conflict", async () => {
  const { executor, context } = setup({ "a.txt": "a\nb\nc\n" });

  const { call } = await executor.execute(
    {
      id: "call-1",
      name: "patch-file",
      arguments: { path: "a.txt", search: "a", replace: "A", firstLine: 2, lastLine: 2 }
    },
    context
  );

  assert.equal(call.result.message, "Patch conflict on 'a.txt': lines 2-2 do not match the search text.");
});

test("delete-file and rename-file mutate the store", async () => {
  const { store, executor, context } = setup({ "a.ts": "a", "b.ts": "b" });

  const deleted = await executor.execute({ id: "c1", name: "delete-file", arguments: { path: "a.ts" } }, context);
  const renamed = await executor.execute(
    { id: "c2", name: "rename-file", arguments: { from: "b.ts", to: "src/b.ts" } },
    context
  );

  assert.equal(deleted.call.result.message, "Deleted a.ts.");
  assert.equal(renamed.call.result.message, "Renamed b.ts to src/b.ts.");
  assert.deepEqual(
    store.list().map((file) => file.path),
    ["src/b.ts"]
  );
});

test("unknown operations and invalid arguments become validation failures", async () => {
  const { executor, context } = setup();

  const unknown = await executor.execute({ id: "c1", name: "exec", arguments: { command: "ls" } }, context);
  assert.deepEqual(unknown.call.result, {
    ok: false,
    errorCode: "tool_validation",
    message: "Unknown operation 'exec'."
  });
  assert.equal(unknown.call.name, "exec");

  const invalid = await executor.execute({ id: "c2", name: "write-file", arguments: { path: "a.ts" } }, context);
  assert.deepEqual(invalid.call.result, {
    ok: false,
    errorCode: "tool_validation",
    message: "Invalid arguments. content: Required"
  });

  const escaping = await executor.execute(
    { id: "c3", name: "write-file", arguments: { path: "../outside.ts", content: "" } },
    context
  );
  assert.equal(escaping.call.result.errorCode, "tool_validation");
  assert.equal(escaping.call.result.message, "Path '../outside.ts' escapes the project root.");
});

test("a constraint limits operations and paths", async () => {
  const { store, executor, context } = setup({ "src/App.tsx": "old" });
  const constraint = { allowedTools: ["write-file", "finish"] as const, allowedPathPrefixes: ["src/App.tsx"] };

  const patch = await executor.execute(
    { id: "c1", name: "patch-file", arguments: { path: "src/App.tsx", search: "old", replace: "new" } },
    context,
    constraint
  );
  assert.equal(patch.call.result.message, "Operation 'patch-file' is not allowed here.");

  const outside = await executor.execute(
    { id: "c2", name: "write-file", arguments: { path: "src/other.ts", content: "x" } },
    context,
    constraint
  );
  assert.equal(outside.call.result.message, "Path 'src/other.ts' is outside the files this repair may change.");

  const nested = await executor.execute(
    { id: "c2b", name: "write-file", arguments: { path: "src/App.tsx/extra.ts", content: "x" } },
    context,
    constraint
  );
  assert.equal(nested.call.result.message, "Path 'src/App.tsx/extra.ts' is outside the files this repair may change.");

  const inside = await executor.execute(
    { id: "c3", name: "write-file", arguments: { path: "src/App.tsx", content: "new" } },
    context,
    constraint
  );
  assert.equal(inside.call.result.ok, true);
  assert.equal(store.read("src/App.tsx")?.content, "new");
});

test("run-build reports the build outcome and a control signal", async () => {
  const { store, executor } = setup();

  const unavailable = await executor.execute({ id: "c1", name: "run-build", arguments: {} }, { store });
  assert.equal(unavailable.call.result.message, "run-build is not available in this turn.");

  const modes: string[] = [];
  const built = await executor.execute(
    { id: "c2", name: "run-build", arguments: { mode: "production" } },
    {
      store,
      runBuild: async (mode) => {
        modes.push(mode);
        return { ok: false, message: "Build #1 failed with 2 diagnostic(s)." };
      }
    }
  );

  assert.deepEqual(modes, ["production"]);
  assert.deepEqual(built.call.result, { ok: false, message: "Build #1 failed with 2 diagnostic(s)." });
  assert.deepEqual(built.control, { type: "run-build", mode: "production" });
});

test("finish carries its summary as a control signal", async () => {
  const { executor, context } = setup();

  const { call, control } = await executor.execute(
    { id: "c1", name: "finish", arguments: { summary: "Added a landing page." } },
    context
  );

  assert.equal(call.result.message, "Finished.");
  assert.deepEqual(control, { type: "finish", summary: "Added a landing page." });
});

test("fatal errors propagate while unexpected ones are recorded as internal", async () => {
  const { store, executor } = setup();

  await assert.rejects(
    executor.execute(
      { id: "c1", name: "run-build", arguments: {} },
      {
        store,
        runBuild: async () => {
          throw new SessionAbortedError();
        }
      }
    ),
    SessionAbortedError
  );

  const internal = await executor.execute(
    { id: "c2", name: "run-build", arguments: {} },
    {
      store,
      runBuild: async () => {
        throw new Error("bundler crashed");
      }
    }
  );
  assert.deepEqual(internal.call.result, { ok: false, errorCode: "internal", message: "bundler crashed" });
});

test("skip records a call that never ran", () => {
  const { executor } = setup();

  const call = executor.skip({ id: "c1", name: "write-file", arguments: { path: "a.ts" } }, "Skipped: issued after finish.");

  assert.deepEqual(call.result, { ok: false, errorCode: "skipped", message: "Skipped: issued after finish." });
});
