import { createHash } from "node:crypto";
import path from "node:path";
import { requestOrFail } from "./http-failure.js";
import type { AssetStorage, FetchLike, StoredObject } from "./types.js";

export interface ObjectStorageClientOptions {
  baseUrl: string;
  publicUrl: string;
  bucket: string;
  apiToken: string | null;
  requestTimeoutMs: number;
  fetchImpl?: FetchLike;
}

/** `assets/<sha256>.<ext>`, or `assets/<sha256>` for files without an extension. */
export function contentAddressedKey(filePath: string, bytes: Buffer): string {
  const digest = createHash("sha256").update(bytes).digest("hex");
  const ext = path.posix.extname(filePath).slice(1).toLowerCase();
  return ext ? `assets/${digest}.${ext}` : `assets/${digest}`;
}

export class ObjectStorageClient implements AssetStorage {
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: ObjectStorageClientOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async put(input: { key: string; bytes: Buffer; contentType: string; signal?: AbortSignal }): Promise<StoredObject> {
    const base = this.options.baseUrl.replace(/\/$/, "");

    await requestOrFail({
      fetchImpl: this.fetchImpl,
      url: `${base}/${encodeURIComponent(this.options.bucket)}/${input.key}`,
      init: {
        method: "PUT",
        headers: {
          "Content-Type": input.contentType,
          ...(this.options.apiToken ? { Authorization: `Bearer ${this.options.apiToken}` } : {})
        },
        body: input.bytes
      },
      operation: `store ${input.key}`,
      timeoutMs: this.options.requestTimeoutMs,
      signal: input.signal
    });

    return {
      key: input.key,
      url: `${this.options.publicUrl.replace(/\/$/, "")}/${input.key}`
    };
  }
}
