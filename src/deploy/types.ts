export interface PlainTextBinding {
  name: string;
  text: string;
}

export interface ScriptUpload {
  scriptName: string;
  module: string;
  bindings: PlainTextBinding[];
  signal?: AbortSignal;
}

export interface RouteBinding {
  scriptName: string;
  hostname: string;
  signal?: AbortSignal;
}

/** Edge hosting platform: every call is an idempotent upsert keyed by script name. */
export interface EdgePlatform {
  uploadScript(upload: ScriptUpload): Promise<void>;
  bindRoute(route: RouteBinding): Promise<void>;
}

export interface StoredObject {
  key: string;
  url: string;
}

export interface AssetStorage {
  put(input: { key: string; bytes: Buffer; contentType: string; signal?: AbortSignal }): Promise<StoredObject>;
}

export type FetchLike = typeof fetch;
