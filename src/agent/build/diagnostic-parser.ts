import type { BuildDiagnostic } from "../../types.js";

const MAX_DIAGNOSTICS = 40;

export function tailOutput(value: string, maxLength = 6_000): string {
  const normalized = value.trim();
  if (normalized.length <= maxLength) {
    return normalized;
  }
  return normalized.slice(normalized.length - maxLength);
}

function stripAnsi(value: string): string {
  return value.replace(/\u001b\[[0-9;]*m/g, "");
}

function normalizeFile(value: string): string {
  return value.trim().replaceAll("\\", "/").replace(/^\.\//, "");
}

function dedupeDiagnostics(diagnostics: BuildDiagnostic[]): BuildDiagnostic[] {
  const seen = new Set<string>();
  const next: BuildDiagnostic[] = [];

  for (const diagnostic of diagnostics) {
    const key = [
      diagnostic.code || "",
      diagnostic.file || "",
      String(diagnostic.line || ""),
      String(diagnostic.column || ""),
      diagnostic.message
    ].join("|");

    if (seen.has(key)) {
      continue;
    }

    seen.add(key);
    next.push(diagnostic);
  }

  return next;
}

function collectMatches(pattern: RegExp, value: string, map: (match: RegExpExecArray) => BuildDiagnostic): BuildDiagnostic[] {
  const diagnostics: BuildDiagnostic[] = [];
  let match: RegExpExecArray | null = null;

  while (true) {
    match = pattern.exec(value);
    if (!match) {
      break;
    }
    diagnostics.push(map(match));
  }

  return diagnostics;
}

function parseTypeScriptDiagnostics(value: string): BuildDiagnostic[] {
  const parenStyle = collectMatches(
    /^([^()\n]+?\.(?:ts|tsx|js|jsx|mts|cts|vue|svelte))\((\d+),\s*(\d+)\):\s*(error|warning)\s+(TS\d+):\s*([^\n]+)/gm,
    value,
    (match) => ({
      file: normalizeFile(match[1]),
      line: Number(match[2]),
      column: Number(match[3]),
      severity: match[4] === "warning" ? "warning" : "error",
      code: match[5],
      message: match[6].trim()
    })
  );

  const prettyStyle = collectMatches(
    /^([^\s:][^:\n]*?\.(?:ts|tsx|js|jsx|mts|cts|vue|svelte)):(\d+):(\d+)\s+-\s+(error|warning)\s+(TS\d+):\s*([^\n]+)/gm,
    value,
    (match) => ({
      file: normalizeFile(match[1]),
      line: Number(match[2]),
      column: Number(match[3]),
      severity: match[4] === "warning" ? "warning" : "error",
      code: match[5],
      message: match[6].trim()
    })
  );

  const located = [...parenStyle, ...prettyStyle];
  if (located.length) {
    return located;
  }

  return collectMatches(/\berror\s+(TS\d+):\s*([^\n]+)/g, value, (match) => ({
    severity: "error",
    code: match[1],
    message: match[2].trim()
  }));
}

/**
 * esbuild and Vite print `✘ [ERROR] message` followed by an indented
 * `file:line:col:` location line.
 */
function parseEsbuildDiagnostics(value: string): BuildDiagnostic[] {
  const lines = value.split("\n");
  const diagnostics: BuildDiagnostic[] = [];

  for (let index = 0; index < lines.length; index += 1) {
    const header = lines[index].match(/^\s*(?:✘|X)\s+\[(ERROR|WARNING)\]\s+(.+)$/);
    if (!header) {
      continue;
    }

    const diagnostic: BuildDiagnostic = {
      severity: header[1] === "WARNING" ? "warning" : "error",
      message: header[2].trim()
    };

    for (let lookahead = index + 1; lookahead < Math.min(lines.length, index + 4); lookahead += 1) {
      const location = lines[lookahead].match(/^\s+([^\s:][^:\n]*):(\d+):(\d+):\s*$/);
      if (location) {
        diagnostic.file = normalizeFile(location[1]);
        diagnostic.line = Number(location[2]);
        diagnostic.column = Number(location[3]);
        break;
      }
    }

    diagnostics.push(diagnostic);
  }

  return diagnostics;
}

function parseResolutionDiagnostics(value: string): BuildDiagnostic[] {
  const rollup = collectMatches(
    /Rollup failed to resolve import "([^"]+)" from "([^"]+)"/g,
    value,
    (match) => ({
      severity: "error",
      file: normalizeFile(match[2]),
      message: `Could not resolve "${match[1]}"`
    })
  );

  const webpack = collectMatches(
    /Module not found: (?:Error: )?Can't resolve '([^']+)'(?: in '([^']+)')?/g,
    value,
    (match) => ({
      severity: "error",
      message: `Could not resolve "${match[1]}"`
    })
  );

  return [...rollup, ...webpack];
}

function parsePlainErrors(value: string): BuildDiagnostic[] {
  return collectMatches(/^Error:\s+([^\s:][^:\n]*):(\d+):(\d+):\s*([^\n]+)$/gm, value, (match) => ({
    severity: "error",
    file: normalizeFile(match[1]),
    line: Number(match[2]),
    column: Number(match[3]),
    message: match[4].trim()
  }));
}

/**
 * Turns bundler output into structured diagnostics. Unrecognised non-empty
 * output becomes one diagnostic carrying the output tail.
 */
export function parseBuildDiagnostics(output: string): BuildDiagnostic[] {
  const text = stripAnsi(output);
  const parsed = dedupeDiagnostics([
    ...parseTypeScriptDiagnostics(text),
    ...parseEsbuildDiagnostics(text),
    ...parseResolutionDiagnostics(text),
    ...parsePlainErrors(text)
  ]);

  if (parsed.length > 0) {
    return parsed.slice(0, MAX_DIAGNOSTICS);
  }

  if (!text.trim()) {
    return [];
  }

  return [
    {
      severity: "error",
      code: "unknown",
      message: tailOutput(text, 2_000)
    }
  ];
}
