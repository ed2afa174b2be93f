export { LLMClient } from "./client.js";
export type { GenerateOptions, ObjectResult, StructuredOutputModel } from "./client.js";
export {
    API_KEY_VARIABLES,
    DEFAULT_MODELS,
    hasApiKey,
    resolveLanguageModel,
    resolveModelSelection,
} from "./resolve.js";
export type { ModelSelection, ResolvedModel } from "./resolve.js";
