import { openai } from "@ai-sdk/openai";
import { google } from "@ai-sdk/google";
import { anthropic } from "@ai-sdk/anthropic";
import type { LanguageModel } from "ai";
import { AgentConfigurationError } from "../errors/index.js";
import { LlmProvider } from "../schemas/config.js";

/** What a caller asked for; any field may be left to the environment. */
export interface ModelSelection {
    provider?: string;
    model?: string;
}

export interface ResolvedModel {
    provider: LlmProvider;
    model: string;
}

export const DEFAULT_MODELS: Record<LlmProvider, string> = {
    openai: "gpt-4o-mini",
    google: "gemini-2.0-flash",
    anthropic: "claude-3-5-haiku-latest",
};

/** Environment variable each provider reads its API key from. */
export const API_KEY_VARIABLES: Record<LlmProvider, string> = {
    openai: "OPENAI_API_KEY",
    google: "GOOGLE_GENERATIVE_AI_API_KEY",
    anthropic: "ANTHROPIC_API_KEY",
};

const PROVIDERS: Record<LlmProvider, (modelId: string) => LanguageModel> = {
    openai: (modelId) => openai(modelId),
    google: (modelId) => google(modelId),
    anthropic: (modelId) => anthropic(modelId),
};

/**
 * Settle provider and model: the explicit selection first, then
 * STRUCTFLOW_PROVIDER / STRUCTFLOW_MODEL, then OpenAI with its default model.
 */
export function resolveModelSelection(
    selection: ModelSelection = {},
    env: NodeJS.ProcessEnv = process.env,
): ResolvedModel {
    const requested = (selection.provider || env.STRUCTFLOW_PROVIDER || "openai").toLowerCase();
    const parsed = LlmProvider.safeParse(requested);
    if (!parsed.success) {
        throw new AgentConfigurationError(
            `unsupported LLM provider "${requested}" (expected one of: ${LlmProvider.options.join(", ")})`,
        );
    }
    const provider = parsed.data;
    return { provider, model: selection.model || env.STRUCTFLOW_MODEL || DEFAULT_MODELS[provider] };
}

/** True when the provider's API key is set in `env`. */
export function hasApiKey(provider: LlmProvider, env: NodeJS.ProcessEnv = process.env): boolean {
    return Boolean(env[API_KEY_VARIABLES[provider]]);
}

/** Resolve a selection to an AI SDK LanguageModel. */
export function resolveLanguageModel(selection: ModelSelection = {}): LanguageModel {
    const { provider, model } = resolveModelSelection(selection);
    return PROVIDERS[provider](model);
}
