/**
 * Generator — one structured-output LLM call per invocation.
 *
 * The prompt carries the module's instructions (system) and a JSON document
 * (user) with few-shot examples, optional schemas and the input payload. Both
 * instructions and examples live in a trainable Variable, so an optimizer can
 * rewrite them between calls.
 */
import { z } from "zod/v4";
import { concat } from "../core/algebra.js";
import { JsonObjectSchema } from "../core/json.js";
import type { JsonObject } from "../core/json.js";
import { resolveName } from "../core/names.js";
import type { NameScope } from "../core/names.js";
import { Variable } from "../core/operation.js";
import type { Mode, Module } from "../core/operation.js";
import { DataValue, SchemaValue, jsonSchemaFromZod } from "../core/values.js";
import { GraphError } from "../errors/index.js";
import type { StructuredOutputModel } from "../llm/client.js";

/** One few-shot demonstration. */
export const GeneratorExample = z.object({
    inputs: JsonObjectSchema,
    outputs: JsonObjectSchema,
});
export type GeneratorExample = z.infer<typeof GeneratorExample>;

const GeneratorState = z.object({
    instructions: z.array(z.string()),
    examples: z.array(GeneratorExample),
});

export interface GeneratorOptions {
    /** Output schema; a zod object is converted to JSON Schema. */
    schema: JsonObject | z.ZodObject;
    model: StructuredOutputModel;
    name?: string;
    description?: string;
    names?: NameScope;
    instructions?: string[];
    examples?: GeneratorExample[];
    /** Include the input schema in the prompt. */
    useInputsSchema?: boolean;
    /** Include the output schema in the prompt. */
    useOutputsSchema?: boolean;
    /** Concatenate the input onto the generated output. */
    returnInputs?: boolean;
    temperature?: number;
    /** Check the model's output against the schema. Default: true. */
    validateOutput?: boolean;
    trainable?: boolean;
}

/** Render instructions as the system prompt. */
export function buildSystemPrompt(description: string, instructions: readonly string[]): string {
    const lines: string[] = [];
    if (description) lines.push(description);
    if (instructions.length > 0) {
        if (lines.length > 0) lines.push("");
        lines.push("Instructions:");
        for (const instruction of instructions) lines.push(`- ${instruction}`);
    }
    return lines.join("\n");
}

export class Generator implements Module {
    public readonly kind = "generator";
    public readonly name: string;
    public readonly description: string;
    public readonly trainable: boolean;
    public readonly schema: JsonObject;
    public readonly state: Variable;
    public readonly useInputsSchema: boolean;
    public readonly useOutputsSchema: boolean;
    public readonly returnInputs: boolean;
    public readonly temperature: number | undefined;
    public readonly validateOutput: boolean;

    private model: StructuredOutputModel;

    constructor(opts: GeneratorOptions) {
        this.name = resolveName("generator", opts.name, opts.names);
        this.description = opts.description ?? "";
        this.trainable = opts.trainable ?? true;
        this.schema = opts.schema instanceof z.ZodObject ? jsonSchemaFromZod(opts.schema) : opts.schema;
        this.model = opts.model;
        this.useInputsSchema = opts.useInputsSchema ?? false;
        this.useOutputsSchema = opts.useOutputsSchema ?? false;
        this.returnInputs = opts.returnInputs ?? false;
        this.temperature = opts.temperature;
        this.validateOutput = opts.validateOutput ?? true;
        this.state = new Variable(`${this.name}_state`, {
            instructions: opts.instructions ?? [],
            examples: opts.examples ?? [],
        });
    }

    get instructions(): string[] {
        return GeneratorState.parse(this.state.value).instructions;
    }

    get examples(): GeneratorExample[] {
        return GeneratorState.parse(this.state.value).examples;
    }

    shapeOf(inputs: readonly SchemaValue[]): SchemaValue[] {
        if (inputs.length !== 1) {
            throw new GraphError(`Generator "${this.name}" takes exactly one input, received ${inputs.length}.`);
        }
        const output = SchemaValue.from(this.name, this.schema);
        return [this.returnInputs ? concat(inputs[0], output) : output];
    }

    async transform(inputs: readonly (DataValue | null)[], _mode: Mode): Promise<(DataValue | null)[]> {
        const [input] = inputs;
        if (!input) return [null];
        return [await this.generate(input)];
    }

    /** Generate a value for `input` directly. */
    async generate(input: DataValue): Promise<DataValue> {
        const { instructions, examples } = GeneratorState.parse(this.state.value);
        const result = await this.model.generateObject(
            this.schema,
            buildSystemPrompt(this.description, instructions),
            this.buildPrompt(input, examples),
            { temperature: this.temperature },
        );
        const output = this.validateOutput
            ? DataValue.validated(this.name, this.schema, result.object)
            : DataValue.from(this.name, this.schema, result.object);
        return this.returnInputs ? concat(input, output) : output;
    }

    /** The user prompt: a JSON document with examples, schemas and inputs. */
    buildPrompt(input: DataValue, examples: readonly GeneratorExample[] = this.examples): string {
        const document: JsonObject = {};
        if (examples.length > 0) document.examples = examples.map((example) => ({ ...example }));
        if (this.useInputsSchema) document.inputs_schema = input.schema;
        if (this.useOutputsSchema) document.outputs_schema = this.schema;
        document.inputs = input.payload;
        return JSON.stringify(document, null, 2);
    }

    submodules(): Module[] {
        return [];
    }

    ownVariables(): readonly Variable[] {
        return [this.state];
    }

    getConfig(): JsonObject {
        const config: JsonObject = {
            name: this.name,
            description: this.description,
            trainable: this.trainable,
            schema: this.schema,
            instructions: this.instructions,
            examples: this.examples.map((example) => ({ ...example })),
            use_inputs_schema: this.useInputsSchema,
            use_outputs_schema: this.useOutputsSchema,
            return_inputs: this.returnInputs,
            validate_output: this.validateOutput,
        };
        if (this.temperature !== undefined) config.temperature = this.temperature;
        return config;
    }
}
