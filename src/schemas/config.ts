/**
 * Engine Configuration — All tunable parameters in one place.
 */
import fs from "fs/promises";
import { z } from "zod/v4";

/** Language model providers the engine can reach through the AI SDK. */
export const LlmProvider = z.enum(["openai", "google", "anthropic"]);
export type LlmProvider = z.infer<typeof LlmProvider>;

/**
 * The single configuration object controlling the engine's tunable parameters.
 * Developers pass this to `ReActAgent.fromConfig` and the CLI.
 */
export const EngineConfig = z.object({
    // --- Language Model ---
    /** Provider for every model call; falls back to STRUCTFLOW_PROVIDER. */
    provider: LlmProvider.optional(),
    /** Model id for that provider; falls back to STRUCTFLOW_MODEL. */
    model: z.string().min(1).optional(),

    // --- Agent Loop ---
    /** Maximum decide/act rounds before the agent answers with what it has. */
    max_iterations: z.number().int().min(1).default(5),

    // --- Execution ---
    /** Max nodes (or tool actions) running at once. */
    max_concurrency: z.number().int().min(1).default(8),

    // --- Value Algebra ---
    /** `_N` suffixes tried before a merge conflict is reported. */
    max_rename_attempts: z.number().int().min(1).default(100),

    // --- Sampling ---
    /** Temperature for tool-selection decisions. */
    decision_temperature: z.number().min(0).max(2).default(0.2),
    /** Temperature for free-form generation and tool arguments. */
    generation_temperature: z.number().min(0).max(2).default(0.7),
});
export type EngineConfig = z.infer<typeof EngineConfig>;

/** Read a JSON config file; absent fields take their defaults. */
export async function loadConfig(filePath?: string): Promise<EngineConfig> {
    if (!filePath) return EngineConfig.parse({});
    const raw = await fs.readFile(filePath, "utf-8");
    return EngineConfig.parse(JSON.parse(raw));
}
