// =============================================================================
// Configuration: Typed settings with PAGEWISE_* environment overrides
// =============================================================================

import { tmpdir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";

export const DEFAULT_SUPPORTED_MIME_TYPES = [
  "application/pdf",
  "image/png",
  "image/jpeg",
  "image/bmp",
  "image/webp",
  "image/gif",
] as const;

export const PagewiseConfigSchema = z.object({
  // ── Models ("provider:model") ──────────────────────────────────────────
  defaultModel: z.string().min(1).default("openai:gpt-4o"),
  classificationModel: z.string().default(""),
  extractionModel: z.string().default(""),
  splittingModel: z.string().default(""),
  validationModel: z.string().default(""),
  defaultTemperature: z.number().min(0).max(2).default(0.1),

  // ── Ingestion ──────────────────────────────────────────────────────────
  maxFileSizeMb: z.number().positive().default(100),
  supportedMimeTypes: z.array(z.string()).default([...DEFAULT_SUPPORTED_MIME_TYPES]),
  tempDir: z.string().default(join(tmpdir(), "pagewise")),
  ingestionTimeoutMs: z.number().int().positive().default(60_000),

  // ── Pre-processing ─────────────────────────────────────────────────────
  maxPagesPerFile: z.number().int().positive().default(500),
  defaultDpi: z.number().int().positive().default(300),
  autoRotate: z.boolean().default(true),
  autoEnhance: z.boolean().default(true),
  autoDenoise: z.boolean().default(true),
  qualityThreshold: z.number().min(0).max(1).default(0.3),

  // ── Splitting ──────────────────────────────────────────────────────────
  defaultSplittingStrategy: z.string().default("whole_document"),
  splittingTimeoutMs: z.number().int().positive().default(60_000),

  // ── Classification ─────────────────────────────────────────────────────
  defaultConfidenceThreshold: z.number().min(0).max(1).default(0.7),
  maxClassificationCandidates: z.number().int().positive().default(5),
  classificationTimeoutMs: z.number().int().positive().default(30_000),
  classificationRetries: z.number().int().min(0).default(2),

  // ── Extraction ─────────────────────────────────────────────────────────
  extractionSinglePassThreshold: z.number().int().positive().default(10),
  extractionBatchSize: z.number().int().positive().default(5),
  extractionTimeoutMs: z.number().int().positive().default(60_000),
  extractionRetries: z.number().int().min(0).default(2),

  // ── Validation ─────────────────────────────────────────────────────────
  validationTimeoutMs: z.number().int().positive().default(30_000),
});

export type PagewiseConfig = z.infer<typeof PagewiseConfigSchema>;
export type PagewiseConfigInput = z.input<typeof PagewiseConfigSchema>;

export type ModelStage = "classification" | "extraction" | "splitting" | "validation";

const ENV_PREFIX = "PAGEWISE_";

const STAGE_MODEL_KEYS = {
  classification: "classificationModel",
  extraction: "extractionModel",
  splitting: "splittingModel",
  validation: "validationModel",
} as const satisfies Record<ModelStage, keyof PagewiseConfig>;

/** Model for a stage, falling back to `defaultModel`. */
export function getModel(config: PagewiseConfig, stage: ModelStage): string {
  const stageModel = config[STAGE_MODEL_KEYS[stage]];
  return stageModel ? stageModel : config.defaultModel;
}

/** `maxFileSizeMb` → `PAGEWISE_MAX_FILE_SIZE_MB` */
export function envVarName(key: string): string {
  return ENV_PREFIX + key.replace(/([A-Z])/g, "_$1").toUpperCase();
}

function coerceEnvValue(raw: string, template: unknown): unknown {
  if (typeof template === "number") return Number(raw);
  if (typeof template === "boolean") return raw === "true" || raw === "1";
  if (Array.isArray(template)) {
    return raw.split(",").map((s) => s.trim()).filter((s) => s.length > 0);
  }
  return raw;
}

function readEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const defaults: Record<string, unknown> = PagewiseConfigSchema.parse({});
  const values: Record<string, unknown> = {};
  for (const key of Object.keys(PagewiseConfigSchema.shape)) {
    const raw = env[envVarName(key)];
    if (raw === undefined || raw === "") continue;
    values[key] = coerceEnvValue(raw, defaults[key]);
  }
  return values;
}

/**
 * Build the configuration: schema defaults, then `PAGEWISE_*` environment
 * variables, then explicit overrides.
 */
export function loadConfig(
  overrides: PagewiseConfigInput = {},
  env: NodeJS.ProcessEnv = process.env,
): PagewiseConfig {
  const result = PagewiseConfigSchema.safeParse({ ...readEnv(env), ...overrides });
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join("; ")}`, { issues });
  }
  return result.data;
}
