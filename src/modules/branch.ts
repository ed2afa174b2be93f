/**
 * Branch — route an input to exactly one of several operations.
 *
 * A Decision picks a label; only the operation registered under that label
 * runs. Every other output is null, so downstream `logicalOr` merges the
 * branches back into one value.
 */
import { concat } from "../core/algebra.js";
import type { JsonObject } from "../core/json.js";
import { resolveName } from "../core/names.js";
import type { NameScope } from "../core/names.js";
import { isModule } from "../core/operation.js";
import { serializeModule } from "../core/registry.js";
import type { Mode, Module, Operation, Variable } from "../core/operation.js";
import type { DataValue, SchemaValue } from "../core/values.js";
import { GraphError, UnknownLabelError } from "../errors/index.js";
import type { StructuredOutputModel } from "../llm/client.js";
import { Decision } from "./decision.js";
import type { GeneratorExample } from "./generator.js";

export interface BranchOptions {
    question: string;
    labels: string[];
    /** One operation per label, in label order. */
    branches: Operation[];
    model: StructuredOutputModel;
    /** Concatenate the decision onto the selected branch's output. */
    returnDecision?: boolean;
    name?: string;
    description?: string;
    names?: NameScope;
    instructions?: string[];
    examples?: GeneratorExample[];
    temperature?: number;
    trainable?: boolean;
}

export class Branch implements Module {
    public readonly kind = "branch";
    public readonly name: string;
    public readonly description: string;
    public readonly trainable: boolean;
    public readonly labels: readonly string[];
    public readonly branches: readonly Operation[];
    public readonly returnDecision: boolean;
    public readonly decision: Decision;

    constructor(opts: BranchOptions) {
        if (opts.labels.length !== opts.branches.length) {
            throw new GraphError(
                `Branch needs one operation per label: ${opts.labels.length} label(s), ${opts.branches.length} branch(es).`,
            );
        }
        this.name = resolveName("branch", opts.name, opts.names);
        this.description = opts.description ?? "";
        this.trainable = opts.trainable ?? true;
        this.labels = [...opts.labels];
        this.branches = [...opts.branches];
        this.returnDecision = opts.returnDecision ?? false;
        this.decision = new Decision({
            question: opts.question,
            labels: opts.labels,
            model: opts.model,
            name: `${this.name}_decision`,
            instructions: opts.instructions,
            examples: opts.examples,
            temperature: opts.temperature,
            trainable: this.trainable,
        });
    }

    shapeOf(inputs: readonly SchemaValue[]): SchemaValue[] {
        const [decision] = this.decision.shapeOf(inputs);
        return this.branches.map((branch) => {
            const shapes = branch.shapeOf(inputs);
            if (shapes.length !== 1) {
                throw new GraphError(`Branch operation "${branch.name}" must produce exactly one output.`);
            }
            return this.returnDecision ? concat(shapes[0], decision) : shapes[0];
        });
    }

    async transform(inputs: readonly (DataValue | null)[], mode: Mode): Promise<(DataValue | null)[]> {
        const [input] = inputs;
        const outputs: (DataValue | null)[] = this.branches.map(() => null);
        if (!input) return outputs;

        const decision = await this.decision.decide(input);
        const choice = decision.get("choice");
        const selected = typeof choice === "string" ? this.labels.indexOf(choice) : -1;
        if (selected < 0) throw new UnknownLabelError(String(choice), this.labels);

        const [output] = await this.branches[selected].transform(inputs, mode);
        outputs[selected] = output && this.returnDecision ? concat(output, decision) : output ?? null;
        return outputs;
    }

    submodules(): Module[] {
        return [this.decision, ...this.branches.filter(isModule)];
    }

    ownVariables(): readonly Variable[] {
        return [];
    }

    getConfig(): JsonObject {
        const config: JsonObject = {
            name: this.name,
            description: this.description,
            trainable: this.trainable,
            question: this.decision.question,
            labels: [...this.labels],
            branches: this.branches.map((branch) =>
                isModule(branch) ? serializeModule(branch) : { kind: "operation", config: { name: branch.name } },
            ),
            return_decision: this.returnDecision,
            instructions: this.decision.generator.instructions,
            examples: this.decision.generator.examples.map((example) => ({ ...example })),
        };
        if (this.decision.generator.temperature !== undefined) config.temperature = this.decision.generator.temperature;
        return config;
    }
}
