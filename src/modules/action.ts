/**
 * Action — run one tool for a stated purpose.
 *
 * The tool's arguments are inferred by the language model from the purpose,
 * constrained by the tool's parameter schema; tools without parameters skip
 * the model call. The output is namespaced by tool name so that several
 * actions of one round concatenate without colliding:
 *
 * `{ "<tool>": { "purpose": ..., "arguments": {...}, "result": {...} } }`
 */
import type { JsonObject } from "../core/json.js";
import { resolveName } from "../core/names.js";
import type { NameScope } from "../core/names.js";
import type { Mode, Module, Variable } from "../core/operation.js";
import { DataValue, SchemaValue } from "../core/values.js";
import { GraphError, SchemaValidationError, ToolExecutionError } from "../errors/index.js";
import type { StructuredOutputModel } from "../llm/client.js";
import { hasNoParameters } from "../agents/tools.js";
import type { Tool } from "../agents/tools.js";
import { buildSystemPrompt } from "./generator.js";

export interface ActionOptions {
    tool: Tool;
    model: StructuredOutputModel;
    name?: string;
    names?: NameScope;
    temperature?: number;
    trainable?: boolean;
}

/** The output schema of an Action running `tool`. */
export function actionSchema(tool: Tool): JsonObject {
    return {
        title: tool.name,
        type: "object",
        properties: {
            [tool.name]: {
                type: "object",
                properties: {
                    purpose: { type: "string" },
                    arguments: tool.parameters,
                    result: { type: "object" },
                },
                required: ["purpose", "arguments", "result"],
            },
        },
        required: [tool.name],
    };
}

export class Action implements Module {
    public readonly kind = "action";
    public readonly name: string;
    public readonly description: string;
    public readonly trainable: boolean;
    public readonly tool: Tool;
    public readonly schema: JsonObject;
    public readonly temperature: number | undefined;

    private model: StructuredOutputModel;

    constructor(opts: ActionOptions) {
        this.tool = opts.tool;
        this.name = resolveName(`${opts.tool.name}_action`, opts.name, opts.names);
        this.description = opts.tool.description;
        this.trainable = opts.trainable ?? true;
        this.model = opts.model;
        this.temperature = opts.temperature;
        this.schema = actionSchema(opts.tool);
    }

    shapeOf(inputs: readonly SchemaValue[]): SchemaValue[] {
        if (inputs.length !== 1) {
            throw new GraphError(`Action "${this.name}" takes exactly one input, received ${inputs.length}.`);
        }
        if (!inputs[0].properties().includes("purpose")) {
            throw new GraphError(`Action "${this.name}" needs an input with a "purpose" property.`);
        }
        return [SchemaValue.from(this.name, this.schema)];
    }

    async transform(inputs: readonly (DataValue | null)[], _mode: Mode): Promise<(DataValue | null)[]> {
        const [input] = inputs;
        if (!input) return [null];
        const purpose = input.get("purpose");
        if (typeof purpose !== "string") {
            throw new SchemaValidationError(input.name, ["/purpose must be a string"]);
        }
        return [await this.run(purpose)];
    }

    /** Infer the arguments, execute the tool and record the outcome. */
    async run(purpose: string): Promise<DataValue> {
        const args = await this.inferArguments(purpose);
        let result: JsonObject;
        try {
            result = await this.tool.execute(args);
        } catch (error) {
            throw error instanceof ToolExecutionError ? error : new ToolExecutionError(this.tool.name, error);
        }
        return DataValue.from(this.name, this.schema, {
            [this.tool.name]: { purpose, arguments: args, result },
        });
    }

    private async inferArguments(purpose: string): Promise<JsonObject> {
        if (hasNoParameters(this.tool)) return {};
        const system = buildSystemPrompt(`You call the tool "${this.tool.name}": ${this.tool.description}`, [
            "Infer the tool arguments that best achieve the given purpose.",
        ]);
        const prompt = JSON.stringify({ inputs: { purpose } }, null, 2);
        const result = await this.model.generateObject(this.tool.parameters, system, prompt, {
            temperature: this.temperature,
        });
        return result.object;
    }

    submodules(): Module[] {
        return [];
    }

    ownVariables(): readonly Variable[] {
        return [];
    }

    getConfig(): JsonObject {
        const config: JsonObject = {
            name: this.name,
            trainable: this.trainable,
            tool: this.tool.name,
        };
        if (this.temperature !== undefined) config.temperature = this.temperature;
        return config;
    }
}
