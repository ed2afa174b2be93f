export { schemaCommand } from "./schema.js";
export { agentCommand } from "./agent.js";
