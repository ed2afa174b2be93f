/**
 * Tools — external functions an agent can call.
 *
 * A tool declares its arguments as a JSON Schema (used to constrain the
 * language model that fills them in) and returns a JSON object.
 */
import { z } from "zod/v4";
import { JsonObjectSchema } from "../core/json.js";
import type { JsonObject } from "../core/json.js";
import { jsonSchemaFromZod, schemaProperties } from "../core/values.js";

export interface Tool {
    readonly name: string;
    readonly description: string;
    /** JSON Schema of the argument object. */
    readonly parameters: JsonObject;
    execute(args: JsonObject): Promise<JsonObject>;
}

export interface ToolDefinition<T extends z.ZodObject> {
    name: string;
    description: string;
    parameters: T;
    execute: (args: z.output<T>) => Promise<JsonObject> | JsonObject;
}

const TOOL_NAME = /^[a-zA-Z_][a-zA-Z0-9_-]*$/;

/** Build a Tool whose arguments are parsed by a zod object before execution. */
export function defineTool<T extends z.ZodObject>(definition: ToolDefinition<T>): Tool {
    if (!TOOL_NAME.test(definition.name)) {
        throw new Error(`Invalid tool name "${definition.name}": use letters, digits, "_" or "-".`);
    }
    return {
        name: definition.name,
        description: definition.description,
        parameters: jsonSchemaFromZod(definition.parameters),
        async execute(args: JsonObject): Promise<JsonObject> {
            const parsed = definition.parameters.parse(args);
            return JsonObjectSchema.parse(await definition.execute(parsed));
        },
    };
}

/** True when the tool can be called without inferring any argument. */
export function hasNoParameters(tool: Tool): boolean {
    return schemaProperties(tool.parameters).length === 0;
}

/**
 * Render the toolkit as plain text for a system prompt:
 *
 * ```
 * The toolkit contains 2 tools:
 *
 * - (calculate) Perform mathematical calculations.
 * - (send_mail) Send a mail to a recipient.
 * ```
 */
export function toolkitToStaticPrompt(tools: readonly Tool[]): string {
    if (tools.length === 0) return "The toolkit is empty. No tools available.";
    const noun = tools.length === 1 ? "tool" : "tools";
    const lines = tools.map((tool) => `- (${tool.name}) ${tool.description}\n`);
    return `The toolkit contains ${tools.length} ${noun}:\n\n${lines.join("")}`;
}
