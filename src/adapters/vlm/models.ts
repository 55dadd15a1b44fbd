// =============================================================================
// VLM model resolution: "provider:model" strings to AI SDK models
// =============================================================================

import { createAnthropic } from "@ai-sdk/anthropic";
import { createOpenAI } from "@ai-sdk/openai";
import type { LanguageModel } from "ai";
import { ConfigurationError } from "../../errors.js";

export type ModelResolver = (spec: string) => LanguageModel;

export interface ProviderSpec {
  /** Prefix before the colon, e.g. "openai" */
  readonly name: string;
  /** Environment variable the provider reads its key from */
  readonly envKey: string;
  readonly create: (modelId: string) => LanguageModel;
}

export const PROVIDERS: readonly ProviderSpec[] = [
  {
    name: "openai",
    envKey: "OPENAI_API_KEY",
    create: (modelId) => createOpenAI()(modelId),
  },
  {
    name: "anthropic",
    envKey: "ANTHROPIC_API_KEY",
    create: (modelId) => createAnthropic()(modelId),
  },
];

export interface ParsedModelSpec {
  provider: string;
  modelId: string;
}

/** `"openai:gpt-4o"` → `{ provider: "openai", modelId: "gpt-4o" }`; a bare id defaults to openai. */
export function parseModelSpec(spec: string): ParsedModelSpec {
  const colon = spec.indexOf(":");
  if (colon === -1) return { provider: "openai", modelId: spec };
  return { provider: spec.slice(0, colon), modelId: spec.slice(colon + 1) };
}

export const resolveModel: ModelResolver = (spec) => {
  const { provider, modelId } = parseModelSpec(spec);
  const found = PROVIDERS.find((p) => p.name === provider);
  if (!found) {
    const available = PROVIDERS.map((p) => p.name).join(", ");
    throw new ConfigurationError(
      `Unknown model provider '${provider}'. Available: ${available}`,
      { spec },
    );
  }
  if (!modelId) {
    throw new ConfigurationError(`Model spec '${spec}' has no model id`, { spec });
  }
  return found.create(modelId);
};

export interface VlmAdapterOptions {
  model: LanguageModel;
  /** Name recorded on results and used for cost lookups */
  modelName: string;
  temperature?: number;
  /** Retries the AI SDK makes on transient provider errors (default: 2) */
  maxRetries?: number;
  /** Per-call timeout (default: 60s) */
  timeoutMs?: number;
}

/** Call settings shared by every VLM adapter. */
export function callSettings(options: VlmAdapterOptions): {
  model: LanguageModel;
  temperature: number | undefined;
  maxRetries: number;
  abortSignal: AbortSignal;
} {
  return {
    model: options.model,
    temperature: options.temperature,
    maxRetries: options.maxRetries ?? 2,
    abortSignal: AbortSignal.timeout(options.timeoutMs ?? 60_000),
  };
}
