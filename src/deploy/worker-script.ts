import type { ArtifactFile } from "../types.js";

export interface EmbeddedFile {
  type: string;
  /** base64 of the file bytes */
  body: string;
}

export interface WorkerManifest {
  entry: string;
  files: Record<string, EmbeddedFile>;
  /** artifact path → public URL of the offloaded copy */
  assetUrls: Record<string, string>;
}

export function buildWorkerManifest(input: {
  entry: string;
  embedded: ArtifactFile[];
  assetUrls: Record<string, string>;
}): WorkerManifest {
  const files: Record<string, EmbeddedFile> = {};
  for (const file of input.embedded) {
    files[file.path] = { type: file.contentType, body: file.bytes.toString("base64") };
  }

  return { entry: input.entry, files, assetUrls: { ...input.assetUrls } };
}

/**
 * ES module for the edge runtime. Serves embedded files, proxies offloaded
 * assets from object storage and falls back to the entry page for
 * extension-less paths.
 */
export function renderWorkerModule(manifest: WorkerManifest): string {
  return [
    `const ENTRY = ${JSON.stringify(manifest.entry)};`,
    `const FILES = ${JSON.stringify(manifest.files)};`,
    `const ASSET_URLS = ${JSON.stringify(manifest.assetUrls)};`,
    "",
    "function decode(body) {",
    "  const binary = atob(body);",
    "  const bytes = new Uint8Array(binary.length);",
    "  for (let index = 0; index < binary.length; index += 1) {",
    "    bytes[index] = binary.charCodeAt(index);",
    "  }",
    "  return bytes;",
    "}",
    "",
    "function resolvePath(pathname) {",
    "  let path = decodeURIComponent(pathname).replace(/^\\/+/, \"\");",
    "  if (path === \"\" || path.endsWith(\"/\")) {",
    "    path += \"index.html\";",
    "  }",
    "  return path;",
    "}",
    "",
    "export default {",
    "  async fetch(request) {",
    "    const path = resolvePath(new URL(request.url).pathname);",
    "    if (ASSET_URLS[path]) {",
    "      return fetch(ASSET_URLS[path]);",
    "    }",
    "    let file = FILES[path];",
    "    if (!file && !path.split(\"/\").pop().includes(\".\")) {",
    "      if (!FILES[ENTRY] && ASSET_URLS[ENTRY]) {",
    "        return fetch(ASSET_URLS[ENTRY]);",
    "      }",
    "      file = FILES[ENTRY];",
    "    }",
    "    if (!file) {",
    "      return new Response(\"Not found\", { status: 404 });",
    "    }",
    "    return new Response(decode(file.body), {",
    "      headers: { \"content-type\": file.type, \"cache-control\": \"public, max-age=60\" }",
    "    });",
    "  }",
    "};",
    ""
  ].join("\n");
}
