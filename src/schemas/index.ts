/**
 * Schema barrel export — all Zod schemas and inferred types.
 */

// Decisions & tool routing
export {
    Question,
    DecisionAnswer,
    MultiDecisionAnswer,
    PurposeInput,
    ToolChoice,
    ToolDecision,
    TOOL_NAME_PATH,
    buildToolDecisionSchema,
} from "./decision.js";

// Configuration
export { EngineConfig, LlmProvider, loadConfig } from "./config.js";
