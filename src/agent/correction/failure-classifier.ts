import { builtinModules } from "node:module";
import type { BuildDiagnostic, FailureCategory, RepairStrategy } from "../../types.js";

export interface FailureClassificationOptions {
  allowRelaxedTypeCheck: boolean;
}

export interface FailureClassification {
  category: FailureCategory;
  strategy: RepairStrategy;
  /** Distinct files named by the error diagnostics of the chosen category. */
  files: string[];
  /** Bare package names that failed to resolve. */
  packages: string[];
  /** Properties reported missing on `Window`. */
  windowProperties: string[];
  /** `@/…` imports that did not resolve. */
  aliasImports: string[];
  rationale: string;
}

type DiagnosticKind = FailureCategory;

const builtins = new Set(builtinModules);

const moduleNotFoundPatterns = [
  /Cannot find module '([^']+)'/,
  /Cannot find module "([^"]+)"/,
  /Could not resolve "([^"]+)"/,
  /Can't resolve '([^']+)'/,
  /failed to resolve import "([^"]+)"/
];

const typeCheckMessagePattern =
  /does not exist on type|is not assignable to|Cannot find name|has no exported member|implicitly has an? '?any'? type|is possibly '?(?:null|undefined)'?|Argument of type|Type '[^']*' is missing|No overload matches|Expected \d+ arguments?/i;

const syntaxMessagePattern =
  /Unexpected token|Unexpected end of (?:file|input)|Unterminated|SyntaxError|Expression expected|Declaration or statement expected|Expected "[^"]*" but found|Unexpected "[^"]*"|Invalid character|JSX element '[^']*' has no corresponding closing tag/i;

const windowPropertyPattern = /Property '([A-Za-z_$][\w$]*)' does not exist on type 'Window(?: & typeof globalThis)?'/;

function unique(values: string[]): string[] {
  return Array.from(new Set(values.filter(Boolean)));
}

export function missingModuleSpecifier(message: string): string | null {
  for (const pattern of moduleNotFoundPatterns) {
    const match = message.match(pattern);
    if (match) {
      return match[1];
    }
  }
  return null;
}

export function isAliasSpecifier(specifier: string): boolean {
  return specifier.startsWith("@/") || specifier.startsWith("~/");
}

/** `lodash/fp` → `lodash`, `@scope/pkg/sub` → `@scope/pkg`; null for relative, alias or builtin specifiers. */
export function packageNameFromSpecifier(specifier: string): string | null {
  if (!specifier || specifier.startsWith(".") || specifier.startsWith("/") || isAliasSpecifier(specifier)) {
    return null;
  }
  if (specifier.startsWith("node:")) {
    return null;
  }

  const segments = specifier.split("/");
  const name = specifier.startsWith("@") ? segments.slice(0, 2).join("/") : segments[0];

  if (specifier.startsWith("@") && segments.length < 2) {
    return null;
  }
  if (builtins.has(name)) {
    return null;
  }
  if (!/^(?:@[a-z0-9][\w.-]*\/)?[a-z0-9][\w.-]*$/i.test(name)) {
    return null;
  }

  return name;
}

function kindOf(diagnostic: BuildDiagnostic): DiagnosticKind {
  const specifier = missingModuleSpecifier(diagnostic.message);
  if (specifier) {
    if (packageNameFromSpecifier(specifier)) {
      return "missing-dependency";
    }
    return isAliasSpecifier(specifier) ? "type-check" : "unclassified";
  }

  const code = diagnostic.code ?? "";
  const tsCode = code.match(/^TS(\d+)$/);
  if (tsCode) {
    return Number(tsCode[1]) < 2000 ? "syntax" : "type-check";
  }

  if (syntaxMessagePattern.test(diagnostic.message)) {
    return "syntax";
  }
  if (typeCheckMessagePattern.test(diagnostic.message)) {
    return "type-check";
  }

  return "unclassified";
}

function typeCheckStrategy(
  diagnostics: BuildDiagnostic[],
  options: FailureClassificationOptions
): { strategy: RepairStrategy; windowProperties: string[]; aliasImports: string[]; rationale: string } {
  const windowProperties: string[] = [];
  const aliasImports: string[] = [];
  let synthesizable = true;

  for (const diagnostic of diagnostics) {
    const windowMatch = diagnostic.message.match(windowPropertyPattern);
    if (windowMatch) {
      windowProperties.push(windowMatch[1]);
      continue;
    }

    const specifier = missingModuleSpecifier(diagnostic.message);
    if (specifier && isAliasSpecifier(specifier)) {
      aliasImports.push(specifier);
      continue;
    }

    synthesizable = false;
  }

  if (synthesizable) {
    return {
      strategy: "synthesize-types",
      windowProperties: unique(windowProperties),
      aliasImports: unique(aliasImports),
      rationale: "Every type error names a missing Window property or an unresolved path alias."
    };
  }

  if (options.allowRelaxedTypeCheck) {
    return {
      strategy: "relax-check",
      windowProperties: unique(windowProperties),
      aliasImports: unique(aliasImports),
      rationale: "Type errors cannot be synthesized away; relaxing the check for the offending scope."
    };
  }

  return {
    strategy: "model-repair",
    windowProperties: unique(windowProperties),
    aliasImports: unique(aliasImports),
    rationale: "Type errors need a model repair because check relaxation is disabled."
  };
}

/**
 * Picks one failure category for a failed build, in priority order
 * type-check, missing-dependency, syntax (single file), unclassified.
 */
export function classifyBuildFailure(
  diagnostics: BuildDiagnostic[],
  options: FailureClassificationOptions
): FailureClassification {
  const errors = diagnostics.filter((diagnostic) => diagnostic.severity === "error");
  const relevant = errors.length ? errors : diagnostics;
  const byKind = new Map<DiagnosticKind, BuildDiagnostic[]>();

  for (const diagnostic of relevant) {
    const kind = kindOf(diagnostic);
    byKind.set(kind, [...(byKind.get(kind) ?? []), diagnostic]);
  }

  const filesOf = (entries: BuildDiagnostic[]): string[] => unique(entries.map((entry) => entry.file ?? ""));

  const typeErrors = byKind.get("type-check") ?? [];
  if (typeErrors.length) {
    const decision = typeCheckStrategy(typeErrors, options);
    return {
      category: "type-check",
      strategy: decision.strategy,
      files: filesOf(typeErrors),
      packages: [],
      windowProperties: decision.windowProperties,
      aliasImports: decision.aliasImports,
      rationale: decision.rationale
    };
  }

  const missing = byKind.get("missing-dependency") ?? [];
  if (missing.length) {
    const packages = unique(
      missing.map((diagnostic) => packageNameFromSpecifier(missingModuleSpecifier(diagnostic.message) ?? "") ?? "")
    );
    return {
      category: "missing-dependency",
      strategy: "add-dependency",
      files: filesOf(missing),
      packages,
      windowProperties: [],
      aliasImports: [],
      rationale: `Unresolved packages: ${packages.join(", ")}.`
    };
  }

  const syntax = byKind.get("syntax") ?? [];
  const syntaxFiles = filesOf(syntax);
  if (syntax.length && syntax.length === relevant.length && syntaxFiles.length === 1 && syntax.every((entry) => entry.file)) {
    return {
      category: "syntax",
      strategy: "regenerate-file",
      files: syntaxFiles,
      packages: [],
      windowProperties: [],
      aliasImports: [],
      rationale: `Syntax errors are confined to ${syntaxFiles[0]}.`
    };
  }

  return {
    category: "unclassified",
    strategy: "model-repair",
    files: filesOf(relevant),
    packages: [],
    windowProperties: [],
    aliasImports: [],
    rationale: syntax.length ? "Syntax errors span several files or mix with other errors." : "No specific repair applies."
  };
}
