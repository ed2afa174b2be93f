/**
 * structflow — Public API
 *
 * Trace schema-typed operations into a graph, compile it into a Program and
 * run it; compose values with a JSON algebra; drive tools with a ReAct agent.
 */

// Core
export * from "./core/index.js";

// Modules
export * from "./modules/index.js";

// Agents
export * from "./agents/index.js";

// Schemas
export {
    Question,
    DecisionAnswer,
    MultiDecisionAnswer,
    PurposeInput,
    ToolChoice,
    ToolDecision,
    TOOL_NAME_PATH,
    buildToolDecisionSchema,
    EngineConfig,
    LlmProvider,
    loadConfig,
} from "./schemas/index.js";

// Persistence
export { createModuleRegistry, defaultModuleRegistry } from "./registry.js";
export type { ModuleContext } from "./registry.js";

// LLM
export {
    LLMClient,
    API_KEY_VARIABLES,
    DEFAULT_MODELS,
    hasApiKey,
    resolveLanguageModel,
    resolveModelSelection,
} from "./llm/index.js";
export type {
    GenerateOptions,
    ModelSelection,
    ObjectResult,
    ResolvedModel,
    StructuredOutputModel,
} from "./llm/index.js";

// Errors
export {
    InvalidCombinationError,
    SchemaMergeConflictError,
    SchemaValidationError,
    GraphError,
    NodeExecutionError,
    UnknownToolError,
    UnknownLabelError,
    ToolExecutionError,
    AgentConfigurationError,
} from "./errors/index.js";
