import path from "node:path";
import { z } from "zod";
import { resolveWorkspaceRoot } from "./workspace.js";

const intFromEnv = (fallback: number, min: number, max: number) =>
  z
    .union([z.string(), z.number()])
    .optional()
    .transform((value) => {
      const parsed = Number(value);
      if (value === undefined || value === "" || !Number.isFinite(parsed)) {
        return fallback;
      }
      return Math.min(max, Math.max(min, Math.floor(parsed)));
    });

const boolFromEnv = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value) => {
      const normalized = String(value ?? "").trim().toLowerCase();
      if (!normalized) {
        return fallback;
      }
      return normalized === "true" || normalized === "1" || normalized === "yes";
    });

const optionalText = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const envSchema = z.object({
  PORT: intFromEnv(3000, 1, 65_535),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  DATABASE_URL: optionalText,
  SHIPWRIGHT_WORKSPACE_ROOT: optionalText,

  SHIPWRIGHT_MAX_TURNS: intFromEnv(40, 1, 200),
  SHIPWRIGHT_MAX_PROTOCOL_RETRIES: intFromEnv(2, 0, 10),
  SHIPWRIGHT_MAX_BUILD_ATTEMPTS: intFromEnv(3, 1, 10),
  SHIPWRIGHT_HEALING_BACKOFF_MS: intFromEnv(1_000, 0, 60_000),
  SHIPWRIGHT_ALLOW_RELAXED_TYPECHECK: boolFromEnv(true),
  SHIPWRIGHT_MODEL_TIMEOUT_MS: intFromEnv(90_000, 1_000, 600_000),

  SHIPWRIGHT_PROVIDER: optionalText,
  OPENAI_API_KEY: optionalText,
  OPENAI_BASE_URL: z.string().url().default("https://api.openai.com/v1"),
  OPENAI_MODEL: z.string().min(1).default("gpt-4.1-mini"),
  OPENROUTER_API_KEY: optionalText,
  OPENROUTER_BASE_URL: z.string().url().default("https://openrouter.ai/api/v1"),
  OPENROUTER_MODEL: z.string().min(1).default("openai/gpt-4.1-mini"),

  SHIPWRIGHT_BUNDLER_COMMAND: z.string().min(1).default("npm run build"),
  SHIPWRIGHT_BUNDLER_INSTALL_COMMAND: z.string().default("npm install --no-audit --no-fund"),
  SHIPWRIGHT_BUNDLER_OUT_DIR: z.string().min(1).default("dist"),
  SHIPWRIGHT_BUILD_TIMEOUT_MS: intFromEnv(300_000, 1_000, 1_800_000),

  EDGE_API_BASE_URL: z.string().url().default("https://api.cloudflare.com/client/v4"),
  EDGE_ACCOUNT_ID: optionalText,
  EDGE_API_TOKEN: optionalText,
  EDGE_ZONE_ID: optionalText,
  EDGE_BASE_DOMAIN: z.string().min(1).default("apps.example.dev"),
  EDGE_COMPATIBILITY_DATE: z.string().default("2024-01-01"),
  STORAGE_BASE_URL: optionalText,
  STORAGE_PUBLIC_URL: optionalText,
  STORAGE_BUCKET: z.string().min(1).default("shipwright-assets"),
  STORAGE_API_TOKEN: optionalText,
  SHIPWRIGHT_ASSET_OFFLOAD_BYTES: intFromEnv(50_000, 1, 100_000_000),
  SHIPWRIGHT_MAX_SCRIPT_BYTES: intFromEnv(10 * 1024 * 1024, 1_024, 100 * 1024 * 1024),
  SHIPWRIGHT_DEPLOY_TIMEOUT_MS: intFromEnv(30_000, 1_000, 300_000),
  SHIPWRIGHT_LIVENESS_ATTEMPTS: intFromEnv(5, 1, 20),
  SHIPWRIGHT_LIVENESS_INITIAL_DELAY_MS: intFromEnv(500, 0, 60_000),
  SHIPWRIGHT_LIVENESS_TIMEOUT_MS: intFromEnv(5_000, 100, 60_000)
});

export type ProviderId = "mock" | "openai" | "openrouter";

export interface ProviderConfig {
  id: ProviderId;
  apiKey: string | null;
  baseUrl: string;
  model: string;
}

export interface ShipwrightConfig {
  port: number;
  logLevel: "debug" | "info" | "warn" | "error";
  databaseUrl: string | null;
  workspaceRoot: string;
  orchestrator: {
    maxTurns: number;
    maxProtocolRetries: number;
    modelTimeoutMs: number;
  };
  healing: {
    maxAttempts: number;
    backoffMs: number;
    allowRelaxedTypeCheck: boolean;
  };
  provider: ProviderConfig;
  providers: ProviderConfig[];
  bundler: {
    command: string;
    installCommand: string | null;
    outDir: string;
    timeoutMs: number;
    workDir: string;
  };
  deploy: {
    edgeApiBaseUrl: string;
    accountId: string | null;
    apiToken: string | null;
    zoneId: string | null;
    baseDomain: string;
    compatibilityDate: string;
    storageBaseUrl: string | null;
    storagePublicUrl: string | null;
    storageBucket: string;
    storageApiToken: string | null;
    assetOffloadThresholdBytes: number;
    maxScriptBytes: number;
    requestTimeoutMs: number;
    liveness: {
      attempts: number;
      initialDelayMs: number;
      timeoutMs: number;
    };
  };
}

function resolveProviders(env: z.infer<typeof envSchema>): ProviderConfig[] {
  const providers: ProviderConfig[] = [{ id: "mock", apiKey: null, baseUrl: "", model: "mock-v1" }];

  if (env.OPENAI_API_KEY) {
    providers.push({ id: "openai", apiKey: env.OPENAI_API_KEY, baseUrl: env.OPENAI_BASE_URL, model: env.OPENAI_MODEL });
  }

  if (env.OPENROUTER_API_KEY) {
    providers.push({
      id: "openrouter",
      apiKey: env.OPENROUTER_API_KEY,
      baseUrl: env.OPENROUTER_BASE_URL,
      model: env.OPENROUTER_MODEL
    });
  }

  return providers;
}

function resolveDefaultProvider(requested: string | undefined, providers: ProviderConfig[]): ProviderConfig {
  if (requested) {
    const match = providers.find((provider) => provider.id === requested);
    if (!match) {
      throw new Error(`SHIPWRIGHT_PROVIDER is set to '${requested}', but that provider is not configured.`);
    }
    return match;
  }

  return providers.find((provider) => provider.id !== "mock") ?? providers[0];
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): ShipwrightConfig {
  const env = envSchema.parse(source);
  const providers = resolveProviders(env);
  const workspaceRoot = resolveWorkspaceRoot(env.SHIPWRIGHT_WORKSPACE_ROOT);

  return Object.freeze({
    port: env.PORT,
    logLevel: env.LOG_LEVEL,
    databaseUrl: env.DATABASE_URL ?? null,
    workspaceRoot,
    orchestrator: {
      maxTurns: env.SHIPWRIGHT_MAX_TURNS,
      maxProtocolRetries: env.SHIPWRIGHT_MAX_PROTOCOL_RETRIES,
      modelTimeoutMs: env.SHIPWRIGHT_MODEL_TIMEOUT_MS
    },
    healing: {
      maxAttempts: env.SHIPWRIGHT_MAX_BUILD_ATTEMPTS,
      backoffMs: env.SHIPWRIGHT_HEALING_BACKOFF_MS,
      allowRelaxedTypeCheck: env.SHIPWRIGHT_ALLOW_RELAXED_TYPECHECK
    },
    provider: resolveDefaultProvider(env.SHIPWRIGHT_PROVIDER, providers),
    providers,
    bundler: {
      command: env.SHIPWRIGHT_BUNDLER_COMMAND,
      installCommand: env.SHIPWRIGHT_BUNDLER_INSTALL_COMMAND.trim() || null,
      outDir: env.SHIPWRIGHT_BUNDLER_OUT_DIR,
      timeoutMs: env.SHIPWRIGHT_BUILD_TIMEOUT_MS,
      workDir: path.join(workspaceRoot, ".builds")
    },
    deploy: {
      edgeApiBaseUrl: env.EDGE_API_BASE_URL.replace(/\/$/, ""),
      accountId: env.EDGE_ACCOUNT_ID ?? null,
      apiToken: env.EDGE_API_TOKEN ?? null,
      zoneId: env.EDGE_ZONE_ID ?? null,
      baseDomain: env.EDGE_BASE_DOMAIN,
      compatibilityDate: env.EDGE_COMPATIBILITY_DATE,
      storageBaseUrl: env.STORAGE_BASE_URL ?? null,
      storagePublicUrl: env.STORAGE_PUBLIC_URL ?? env.STORAGE_BASE_URL ?? null,
      storageBucket: env.STORAGE_BUCKET,
      storageApiToken: env.STORAGE_API_TOKEN ?? null,
      assetOffloadThresholdBytes: env.SHIPWRIGHT_ASSET_OFFLOAD_BYTES,
      maxScriptBytes: env.SHIPWRIGHT_MAX_SCRIPT_BYTES,
      requestTimeoutMs: env.SHIPWRIGHT_DEPLOY_TIMEOUT_MS,
      liveness: {
        attempts: env.SHIPWRIGHT_LIVENESS_ATTEMPTS,
        initialDelayMs: env.SHIPWRIGHT_LIVENESS_INITIAL_DELAY_MS,
        timeoutMs: env.SHIPWRIGHT_LIVENESS_TIMEOUT_MS
      }
    }
  });
}
