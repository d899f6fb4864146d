/**
 * Configuration validation and backend factory.
 */
import { z } from "zod";
import { DEFAULT_RETRY_POLICY } from "./core/retry.js";
import { DEFAULT_HTTP_OPTIONS } from "./http/session.js";
import { DEFAULT_MANIFEST_URL_TEMPLATE } from "./iiif/manifest.js";
import { DEFAULT_IDENTIFIER_FIELD } from "./metadata/reader.js";
import type { StorageBackend } from "./storage/backend.js";
import { DiskStorage } from "./storage/disk.js";
import { DEFAULT_MODEL_OPTIONS } from "./transcription/engine.js";

// ---------------------------------------------------------------------------
// Config schema
// ---------------------------------------------------------------------------

const RepositoryConfigSchema = z.object({
  manifestUrlTemplate: z
    .string()
    .includes("{identifier}")
    .default(DEFAULT_MANIFEST_URL_TEMPLATE),
});

const HttpConfigSchema = z.object({
  connections: z.number().int().positive().default(DEFAULT_HTTP_OPTIONS.connections),
  connectTimeoutMs: z.number().int().positive().default(DEFAULT_HTTP_OPTIONS.connectTimeoutMs),
  readTimeoutMs: z.number().int().positive().default(DEFAULT_HTTP_OPTIONS.readTimeoutMs),
  maxRedirections: z.number().int().nonnegative().default(DEFAULT_HTTP_OPTIONS.maxRedirections),
});

const RetryConfigSchema = z
  .object({
    attempts: z.number().int().positive().default(DEFAULT_RETRY_POLICY.attempts),
    factor: z.number().positive().default(DEFAULT_RETRY_POLICY.factor),
    minDelayMs: z.number().nonnegative().default(DEFAULT_RETRY_POLICY.minDelayMs),
    maxDelayMs: z.number().nonnegative().default(DEFAULT_RETRY_POLICY.maxDelayMs),
  })
  .refine((r) => r.minDelayMs <= r.maxDelayMs, {
    message: "minDelayMs must not exceed maxDelayMs",
  });

const ModelConfigSchema = z.object({
  host: z.string().url().default(DEFAULT_MODEL_OPTIONS.host),
  name: z.string().min(1).default(DEFAULT_MODEL_OPTIONS.name),
  seed: z.number().int().default(DEFAULT_MODEL_OPTIONS.seed),
  temperature: z.number().min(0).default(DEFAULT_MODEL_OPTIONS.temperature),
  topP: z.number().min(0).max(1).default(DEFAULT_MODEL_OPTIONS.topP),
  repeatPenalty: z.number().positive().default(DEFAULT_MODEL_OPTIONS.repeatPenalty),
  numPredict: z.number().int().positive().default(DEFAULT_MODEL_OPTIONS.numPredict),
  stop: z.array(z.string()).default(DEFAULT_MODEL_OPTIONS.stop),
});

const MetadataConfigSchema = z.object({
  path: z.string().default("metadata"),
  identifierField: z.string().min(1).default(DEFAULT_IDENTIFIER_FIELD),
});

const StorageConfigSchema = z.object({
  provider: z.enum(["disk"]).default("disk"),
  config: z
    .object({ basePath: z.string().default("output") })
    .default({}),
});

const BatchConfigSchema = z.object({
  maxIdentifiers: z.number().int().positive().optional(),
});

export const ConfigSchema = z.object({
  repository: RepositoryConfigSchema.default({}),
  http: HttpConfigSchema.default({}),
  retry: RetryConfigSchema.default({}),
  model: ModelConfigSchema.default({}),
  metadata: MetadataConfigSchema.default({}),
  storage: StorageConfigSchema.default({}),
  batch: BatchConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

// ---------------------------------------------------------------------------
// Storage factory
// ---------------------------------------------------------------------------

export function buildStorage(
  provider: string,
  config: { basePath: string },
): StorageBackend {
  switch (provider) {
    case "disk":
      return new DiskStorage(config.basePath);
    default:
      throw new Error(`Unknown storage provider: ${provider}`);
  }
}

// ---------------------------------------------------------------------------
// Top-level config → backends
// ---------------------------------------------------------------------------

export function parseConfig(
  raw: unknown,
): { config: Config; storage: StorageBackend; metadata: StorageBackend } {
  const config = ConfigSchema.parse(raw ?? {});
  const storage = buildStorage(config.storage.provider, config.storage.config);
  const metadata = new DiskStorage(config.metadata.path);
  return { config, storage, metadata };
}
