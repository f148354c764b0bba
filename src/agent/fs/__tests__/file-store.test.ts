import assert from "node:assert/strict";
import test from "node:test";
import { NotFoundError, PatchConflictError, ToolValidationError } from "../../../lib/errors.js";
import { FileStore } from "../file-store.js";
import { normalizeProjectPath, isPathWithinPrefixes } from "../path-policy.js";
import { FileStoreState, contentHash } from "../types.js";

function emptyState(): FileStoreState {
  return { files: [], fileRevision: 0 };
}

test("apply writes files sorted by path and bumps the revision once", () => {
  const state = emptyState();
  const store = new FileStore(state);

  const applied = store.apply([
    { type: "write", path: "src/main.ts", content: "console.log(1);\n" },
    { type: "write", path: "./index.html", content: "<html></html>" }
  ]);

  assert.equal(applied.revision, 1);
  assert.deepEqual(applied.changedPaths, ["src/main.ts", "index.html"]);
  assert.deepEqual(applied.removedPaths, []);
  assert.deepEqual(
    state.files.map((file) => file.path),
    ["index.html", "src/main.ts"]
  );
  assert.equal(state.fileRevision, 1);
  assert.equal(store.read("index.html")?.contentHash, contentHash("<html></html>"));
  assert.equal(store.read("src/main.ts")?.lastModifiedRevision, 1);
});

test("apply is all-or-nothing when a later mutation fails", () => {
  const state = emptyState();
  const store = new FileStore(state);
  store.apply([{ type: "write", path: "a.txt", content: "a" }]);

  assert.throws(
    () =>
      store.apply([
        { type: "write", path: "b.txt", content: "b" },
        { type: "delete", path: "missing.txt" }
      ]),
    (error: unknown) => error instanceof NotFoundError && error.path === "missing.txt"
  );

  assert.equal(store.revision, 1);
  assert.deepEqual(
    state.files.map((file) => file.path),
    ["a.txt"]
  );
});

test("apply rejects a write whose expected hash is stale", () => {
  const store = new FileStore(emptyState());
  store.apply([{ type: "write", path: "a.txt", content: "one" }]);

  assert.throws(
    () => store.apply([{ type: "write", path: "a.txt", content: "two", expectedHash: contentHash("zero") }]),
    PatchConflictError
  );
  assert.equal(store.read("a.txt")?.content, "one");
});

test("rename keeps content and records both paths", () => {
  const store = new FileStore(emptyState());
  store.apply([{ type: "write", path: "old.ts", content: "export {};\n" }]);

  const applied = store.apply([{ type: "rename", from: "old.ts", to: "src/new.ts" }]);

  assert.equal(applied.revision, 2);
  assert.deepEqual(applied.changedPaths, ["src/new.ts"]);
  assert.deepEqual(applied.removedPaths, ["old.ts"]);
  assert.equal(store.has("old.ts"), false);
  assert.equal(store.read("src/new.ts")?.content, "export {};\n");
  assert.equal(store.read("src/new.ts")?.lastModifiedRevision, 2);
});

test("rename onto an existing path is rejected", () => {
  const store = new FileStore(emptyState());
  store.apply([
    { type: "write", path: "a.ts", content: "a" },
    { type: "write", path: "b.ts", content: "b" }
  ]);

  assert.throws(() => store.apply([{ type: "rename", from: "a.ts", to: "b.ts" }]), ToolValidationError);
  assert.throws(() => store.apply([{ type: "rename", from: "a.ts", to: "a.ts" }]), ToolValidationError);
});

test("an empty mutation list is rejected", () => {
  const store = new FileStore(emptyState());
  assert.throws(() => store.apply([]), ToolValidationError);
  assert.equal(store.revision, 0);
});

test("snapshot is frozen and unaffected by later writes", () => {
  const store = new FileStore(emptyState());
  store.apply([{ type: "write", path: "a.txt", content: "v1" }]);

  const snapshot = store.snapshot();
  store.apply([{ type: "write", path: "a.txt", content: "v2" }]);

  assert.equal(snapshot.revision, 1);
  assert.equal(snapshot.files[0]?.content, "v1");
  assert.equal(Object.isFrozen(snapshot.files), true);
});

test("digest reports size and a bounded head", () => {
  const store = new FileStore(emptyState());
  store.apply([{ type: "write", path: "a.txt", content: "héllo world" }]);

  assert.deepEqual(store.digest(5), [
    { path: "a.txt", bytes: 12, contentHash: contentHash("héllo world"), head: "héllo" }
  ]);
});

test("normalizeProjectPath rejects paths outside the project root", () => {
  assert.equal(normalizeProjectPath("src//components/../App.tsx"), "src/App.tsx");
  assert.equal(normalizeProjectPath("src\\main.ts"), "src/main.ts");
  assert.throws(() => normalizeProjectPath("../etc/passwd"), ToolValidationError);
  assert.throws(() => normalizeProjectPath("/etc/passwd"), ToolValidationError);
  assert.throws(() => normalizeProjectPath("   "), ToolValidationError);
  assert.throws(() => normalizeProjectPath("."), ToolValidationError);
});

test("a file path cannot also be used as a directory", () => {
  const state = emptyState();
  const store = new FileStore(state);
  store.apply([
    { type: "write", path: "src", content: "not a directory" },
    { type: "write", path: "lib/util.ts", content: "export {};" }
  ]);

  assert.throws(() => store.apply([{ type: "write", path: "src/main.js", content: "x" }]), {
    name: "ToolValidationError",
    message: "Cannot create 'src/main.js': 'src' is a file."
  });
  assert.throws(() => store.apply([{ type: "write", path: "lib", content: "x" }]), {
    name: "ToolValidationError",
    message: "Cannot create 'lib': it is a directory containing 'lib/util.ts'."
  });
  assert.throws(() => store.apply([{ type: "rename", from: "src", to: "lib/util.ts/inner.ts" }]), {
    name: "ToolValidationError",
    message: "Cannot create 'lib/util.ts/inner.ts': 'lib/util.ts' is a file."
  });
  assert.equal(state.fileRevision, 1);

  store.apply([{ type: "rename", from: "src", to: "src/index.ts" }]);
  assert.deepEqual(
    state.files.map((file) => file.path),
    ["lib/util.ts", "src/index.ts"]
  );
});

test("isPathWithinPrefixes matches directories and exact files", () => {
  assert.equal(isPathWithinPrefixes("src/App.tsx", ["src/"]), true);
  assert.equal(isPathWithinPrefixes("src/App.tsx", ["src/App.tsx"]), true);
  assert.equal(isPathWithinPrefixes("src/App.tsx.bak", ["src/App.tsx"]), false);
  assert.equal(isPathWithinPrefixes("src/App.tsx/index.ts", ["src/App.tsx"]), false);
  assert.equal(isPathWithinPrefixes("src/lib/a.ts", ["src"]), false);
  assert.equal(isPathWithinPrefixes("index.html", ["src/"]), false);
  assert.equal(isPathWithinPrefixes("index.html", []), true);
});
