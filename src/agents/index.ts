export { defineTool, hasNoParameters, toolkitToStaticPrompt } from "./tools.js";
export type { Tool, ToolDefinition } from "./tools.js";
export {
    ReActAgent,
    DEFAULT_TOOL_QUESTION,
    DEFAULT_DECISION_INSTRUCTIONS,
    FINAL_ANSWER_INSTRUCTIONS,
} from "./react.js";
export type { AgentEvents, FinishReason, ReActAgentOptions } from "./react.js";
