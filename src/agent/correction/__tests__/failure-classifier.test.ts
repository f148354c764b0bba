import assert from "node:assert/strict";
import test from "node:test";
import type { BuildDiagnostic } from "../../../types.js";
import { classifyBuildFailure, packageNameFromSpecifier } from "../failure-classifier.js";

const relaxed = { allowRelaxedTypeCheck: true };
const strict = { allowRelaxedTypeCheck: false };

function tsError(file: string, code: string, message: string, line = 1): BuildDiagnostic {
  return { file, line, column: 1, severity: "error", code, message };
}

test("type errors relax the check when allowed and fall back to a model repair otherwise", () => {
  const diagnostics = [tsError("src/App.tsx", "TS2322", "Type 'string' is not assignable to type 'number'.")];

  const allowed = classifyBuildFailure(diagnostics, relaxed);
  assert.equal(allowed.category, "type-check");
  assert.equal(allowed.strategy, "relax-check");
  assert.deepEqual(allowed.files, ["src/App.tsx"]);

  const disallowed = classifyBuildFailure(diagnostics, strict);
  assert.equal(disallowed.category, "type-check");
  assert.equal(disallowed.strategy, "model-repair");
});

test("missing Window properties and path aliases are synthesized", () => {
  const classified = classifyBuildFailure(
    [
      tsError("src/main.ts", "TS2339", "Property 'analytics' does not exist on type 'Window & typeof globalThis'."),
      tsError(
        "src/App.tsx",
        "TS2307",
        "Cannot find module '@/components/Button' or its corresponding type declarations."
      )
    ],
    relaxed
  );

  assert.equal(classified.category, "type-check");
  assert.equal(classified.strategy, "synthesize-types");
  assert.deepEqual(classified.windowProperties, ["analytics"]);
  assert.deepEqual(classified.aliasImports, ["@/components/Button"]);
});

test("one ordinary type error among synthesizable ones rules out synthesis", () => {
  const classified = classifyBuildFailure(
    [
      tsError("src/main.ts", "TS2339", "Property 'analytics' does not exist on type 'Window & typeof globalThis'."),
      tsError("src/App.tsx", "TS2322", "Type 'string' is not assignable to type 'number'.")
    ],
    relaxed
  );

  assert.equal(classified.strategy, "relax-check");
  assert.deepEqual(classified.files, ["src/main.ts", "src/App.tsx"]);
});

test("unresolved bare packages become dependency additions", () => {
  const classified = classifyBuildFailure(
    [
      tsError("src/lib/utils.ts", "TS2307", "Cannot find module 'clsx' or its corresponding type declarations."),
      { severity: "error", file: "src/App.tsx", message: 'Could not resolve "lucide-react/icons"' }
    ],
    relaxed
  );

  assert.equal(classified.category, "missing-dependency");
  assert.equal(classified.strategy, "add-dependency");
  assert.deepEqual(classified.packages, ["clsx", "lucide-react"]);
});

test("type-check outranks a missing dependency", () => {
  const classified = classifyBuildFailure(
    [
      tsError("src/lib/utils.ts", "TS2307", "Cannot find module 'clsx' or its corresponding type declarations."),
      tsError("src/App.tsx", "TS2322", "Type 'string' is not assignable to type 'number'.")
    ],
    relaxed
  );

  assert.equal(classified.category, "type-check");
  assert.deepEqual(classified.packages, []);
});

test("syntax errors in a single file regenerate that file", () => {
  const classified = classifyBuildFailure(
    [
      tsError("src/App.tsx", "TS1005", "';' expected.", 3),
      { severity: "error", file: "src/App.tsx", line: 9, message: 'Expected ";" but found "}"' },
      { severity: "warning", file: "src/other.ts", code: "TS2322", message: "Type 'string' is not assignable to type 'number'." }
    ],
    relaxed
  );

  assert.equal(classified.category, "syntax");
  assert.equal(classified.strategy, "regenerate-file");
  assert.deepEqual(classified.files, ["src/App.tsx"]);
});

test("syntax errors across files, without a location, or from unknown output are unclassified", () => {
  const twoFiles = classifyBuildFailure(
    [tsError("src/a.ts", "TS1005", "';' expected."), tsError("src/b.ts", "TS1005", "';' expected.")],
    relaxed
  );
  assert.equal(twoFiles.category, "unclassified");
  assert.equal(twoFiles.strategy, "model-repair");
  assert.equal(twoFiles.rationale, "Syntax errors span several files or mix with other errors.");

  const noFile = classifyBuildFailure([{ severity: "error", message: "Unexpected token '<'" }], relaxed);
  assert.equal(noFile.category, "unclassified");

  const unknown = classifyBuildFailure([{ severity: "error", code: "unknown", message: "Segmentation fault" }], relaxed);
  assert.equal(unknown.category, "unclassified");
  assert.equal(unknown.rationale, "No specific repair applies.");

  const relative = classifyBuildFailure(
    [tsError("src/App.tsx", "TS2307", "Cannot find module './missing' or its corresponding type declarations.")],
    relaxed
  );
  assert.equal(relative.category, "unclassified");
});

test("packageNameFromSpecifier reduces specifiers to package names", () => {
  assert.equal(packageNameFromSpecifier("lodash/fp"), "lodash");
  assert.equal(packageNameFromSpecifier("@radix-ui/react-dialog/dist/index.js"), "@radix-ui/react-dialog");
  assert.equal(packageNameFromSpecifier("fs"), null);
  assert.equal(packageNameFromSpecifier("node:path"), null);
  assert.equal(packageNameFromSpecifier("./local"), null);
  assert.equal(packageNameFromSpecifier("@/components/Button"), null);
});
