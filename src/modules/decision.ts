/**
 * Decision — pick one label (or several) for an input.
 *
 * The answer schema is rewritten with the label set as a string enum, so the
 * model can only answer with a label it was offered.
 */
import { concat } from "../core/algebra.js";
import type { JsonObject } from "../core/json.js";
import { constrainEnum, constrainEnumList } from "../core/mutator.js";
import { resolveName } from "../core/names.js";
import type { NameScope } from "../core/names.js";
import type { Mode, Module, Variable } from "../core/operation.js";
import { DataValue, SchemaValue, jsonSchemaFromZod } from "../core/values.js";
import { AgentConfigurationError, GraphError } from "../errors/index.js";
import type { StructuredOutputModel } from "../llm/client.js";
import { DecisionAnswer, MultiDecisionAnswer, Question } from "../schemas/decision.js";
import { Generator } from "./generator.js";
import type { GeneratorExample } from "./generator.js";

export interface DecisionOptions {
    question: string;
    labels: string[];
    model: StructuredOutputModel;
    /** Answer with any subset of the labels instead of exactly one. */
    multiLabel?: boolean;
    name?: string;
    description?: string;
    names?: NameScope;
    instructions?: string[];
    examples?: GeneratorExample[];
    temperature?: number;
    trainable?: boolean;
}

const DEFAULT_INSTRUCTIONS = [
    "Think step by step about the inputs before answering the question.",
    "Answer only with the labels you were offered.",
];

/** The answer schema for `labels`: `{thinking, choice}` or `{thinking, choices}`. */
export function buildDecisionSchema(labels: readonly string[], multiLabel: boolean = false): JsonObject {
    if (multiLabel) {
        return constrainEnumList(jsonSchemaFromZod(MultiDecisionAnswer, "DecisionAnswer"), "choices", labels);
    }
    return constrainEnum(jsonSchemaFromZod(DecisionAnswer, "DecisionAnswer"), "properties/choice", labels);
}

export class Decision implements Module {
    public readonly kind = "decision";
    public readonly name: string;
    public readonly description: string;
    public readonly trainable: boolean;
    public readonly question: string;
    public readonly labels: readonly string[];
    public readonly multiLabel: boolean;
    public readonly schema: JsonObject;
    public readonly generator: Generator;

    constructor(opts: DecisionOptions) {
        if (opts.labels.length === 0) throw new AgentConfigurationError("a decision needs at least one label");
        if (new Set(opts.labels).size !== opts.labels.length) {
            throw new AgentConfigurationError("decision labels must be unique");
        }
        this.name = resolveName("decision", opts.name, opts.names);
        this.description = opts.description ?? "";
        this.trainable = opts.trainable ?? true;
        this.question = opts.question;
        this.labels = [...opts.labels];
        this.multiLabel = opts.multiLabel ?? false;
        this.schema = buildDecisionSchema(this.labels, this.multiLabel);
        this.generator = new Generator({
            schema: this.schema,
            model: opts.model,
            name: `${this.name}_generator`,
            description: this.description,
            instructions: opts.instructions ?? DEFAULT_INSTRUCTIONS,
            examples: opts.examples,
            temperature: opts.temperature,
            trainable: this.trainable,
        });
    }

    shapeOf(inputs: readonly SchemaValue[]): SchemaValue[] {
        if (inputs.length !== 1) {
            throw new GraphError(`Decision "${this.name}" takes exactly one input, received ${inputs.length}.`);
        }
        return [SchemaValue.from(this.name, this.schema)];
    }

    async transform(inputs: readonly (DataValue | null)[], _mode: Mode): Promise<(DataValue | null)[]> {
        const [input] = inputs;
        if (!input) return [null];
        return [await this.decide(input)];
    }

    /** Ask the question about `input` and return the answer. */
    async decide(input: DataValue): Promise<DataValue> {
        const question = DataValue.fromZod("question", Question, { question: this.question });
        const answer = await this.generator.generate(concat(input, question));
        return answer.withName(this.name);
    }

    submodules(): Module[] {
        return [this.generator];
    }

    ownVariables(): readonly Variable[] {
        return [];
    }

    getConfig(): JsonObject {
        const config: JsonObject = {
            name: this.name,
            description: this.description,
            trainable: this.trainable,
            question: this.question,
            labels: [...this.labels],
            multi_label: this.multiLabel,
            instructions: this.generator.instructions,
            examples: this.generator.examples.map((example) => ({ ...example })),
        };
        if (this.generator.temperature !== undefined) config.temperature = this.generator.temperature;
        return config;
    }
}
