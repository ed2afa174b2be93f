/**
 * Program — a traced DAG compiled between declared inputs and outputs.
 *
 * Building a Program keeps only the nodes on some path from the inputs to the
 * outputs and layers them topologically. Invoking it binds concrete values to
 * the inputs and runs the layers in order; the nodes of one layer run
 * concurrently, so parallel branches fall out of the graph shape.
 *
 * A failing node aborts the call with a NodeExecutionError once every node of
 * its layer has settled. Results of the surviving siblings are discarded and
 * later layers never start.
 */
import { EventEmitter } from "events";
import pLimit from "p-limit";
import { v4 as uuidv4 } from "uuid";
import { GraphError, NodeExecutionError } from "../errors/index.js";
import type { JsonObject } from "./json.js";
import { isModule } from "./operation.js";
import type { Mode, Module, Variable } from "./operation.js";
import type { Trace, TraceNode } from "./trace.js";
import { DataValue, SchemaValue } from "./values.js";
import type { Maybe } from "./values.js";

/** Supported events emitted by a Program while it runs. */
export interface ProgramEvents {
    "program:start": [{ runId: string; program: string }];
    "node:start": [{ runId: string; node: string; layer: number }];
    "node:complete": [{ runId: string; node: string; layer: number; durationMs: number }];
    "node:error": [{ runId: string; node: string; layer: number; error: unknown }];
    "program:complete": [{ runId: string; program: string; durationMs: number }];
}

export interface ProgramOptions {
    trace: Trace;
    inputs: SchemaValue | readonly SchemaValue[];
    outputs: SchemaValue | readonly SchemaValue[];
    name?: string;
    description?: string;
    /** Upper bound on nodes running at once within a layer. Default: unbounded. */
    maxConcurrency?: number;
    trainable?: boolean;
}

function asList(value: SchemaValue | readonly SchemaValue[]): readonly SchemaValue[] {
    return value instanceof SchemaValue ? [value] : value;
}

export class Program extends EventEmitter<ProgramEvents> implements Module {
    public readonly kind = "program";
    public readonly name: string;
    public readonly description: string;
    public readonly trainable: boolean;
    public readonly inputs: readonly SchemaValue[];
    public readonly outputs: readonly SchemaValue[];
    public readonly layers: readonly (readonly TraceNode[])[];
    public readonly maxConcurrency: number;

    private constructor(
        options: ProgramOptions,
        inputs: readonly SchemaValue[],
        outputs: readonly SchemaValue[],
        layers: TraceNode[][],
    ) {
        super();
        this.name = options.name ?? "program";
        this.description = options.description ?? "";
        this.trainable = options.trainable ?? true;
        this.inputs = inputs;
        this.outputs = outputs;
        this.layers = layers;
        this.maxConcurrency = options.maxConcurrency ?? Number.POSITIVE_INFINITY;
    }

    /**
     * Compile the minimal sub-DAG connecting `inputs` to `outputs`.
     * Throws a GraphError when an output depends on a value that is neither a
     * declared input nor produced by a traced node.
     */
    static build(options: ProgramOptions): Program {
        const { trace } = options;
        const inputs = asList(options.inputs);
        const outputs = asList(options.outputs);
        if (inputs.length === 0) throw new GraphError("A program needs at least one input.");
        if (outputs.length === 0) throw new GraphError("A program needs at least one output.");

        const inputSet = new Set(inputs);
        if (inputSet.size !== inputs.length) throw new GraphError("Program inputs must be distinct.");
        for (const value of [...inputs, ...outputs]) {
            if (!trace.owns(value)) throw new GraphError(`Value "${value.name}" does not belong to the trace.`);
        }

        const nodes = new Set<TraceNode>();
        for (const output of outputs) {
            const pending: SchemaValue[] = [output];
            const visited = new Set<SchemaValue>();
            while (pending.length > 0) {
                const value = pending.pop();
                if (!value || visited.has(value)) continue;
                visited.add(value);
                if (inputSet.has(value)) continue;
                const producer = trace.producerOf(value);
                if (!producer) {
                    throw new GraphError(
                        `Output "${output.name}" is not reachable from the program inputs: ` +
                            `"${value.name}" is a source that was not declared as an input.`,
                    );
                }
                nodes.add(producer);
                for (const input of producer.inputs) {
                    if (input instanceof SchemaValue) pending.push(input);
                }
            }
        }

        return new Program(options, inputs, outputs, trace.topologicalLayers([...nodes]));
    }

    /** Run the program and return every output in declared order. */
    async invokeMany(
        inputs: Maybe<DataValue> | readonly Maybe<DataValue>[],
        mode: Mode = "inference",
    ): Promise<(DataValue | null)[]> {
        const values = inputs instanceof DataValue || inputs == null ? [inputs] : inputs;
        if (values.length !== this.inputs.length) {
            throw new GraphError(
                `Program "${this.name}" expects ${this.inputs.length} input(s), received ${values.length}.`,
            );
        }

        const runId = uuidv4();
        const startedAt = performance.now();
        const bindings = new Map<SchemaValue, DataValue | null>();
        this.inputs.forEach((input, i) => bindings.set(input, values[i] ?? null));
        this.emit("program:start", { runId, program: this.name });

        const limit = pLimit(this.maxConcurrency);
        for (const [layerIndex, layer] of this.layers.entries()) {
            const settled = await Promise.allSettled(
                layer.map((node) => limit(() => this.runNode(node, layerIndex, bindings, mode, runId))),
            );
            for (const [i, result] of settled.entries()) {
                if (result.status === "rejected") throw new NodeExecutionError(layer[i].name, result.reason);
            }
            for (const [i, result] of settled.entries()) {
                if (result.status !== "fulfilled") continue;
                layer[i].outputs.forEach((output, j) => bindings.set(output, result.value[j] ?? null));
            }
        }

        this.emit("program:complete", {
            runId,
            program: this.name,
            durationMs: performance.now() - startedAt,
        });
        return this.outputs.map((output) => bindings.get(output) ?? null);
    }

    /** Run a program and return its first output. */
    async invoke(inputs: Maybe<DataValue> | readonly Maybe<DataValue>[], mode: Mode = "inference"): Promise<DataValue | null> {
        const [output] = await this.invokeMany(inputs, mode);
        return output ?? null;
    }

    shapeOf(inputs: readonly SchemaValue[]): SchemaValue[] {
        if (inputs.length !== this.inputs.length) {
            throw new GraphError(`Program "${this.name}" expects ${this.inputs.length} input(s), received ${inputs.length}.`);
        }
        return [...this.outputs];
    }

    async transform(inputs: readonly (DataValue | null)[], mode: Mode): Promise<(DataValue | null)[]> {
        return this.invokeMany(inputs, mode);
    }

    nodes(): TraceNode[] {
        return this.layers.flat();
    }

    submodules(): Module[] {
        const modules: Module[] = [];
        for (const node of this.nodes()) {
            if (isModule(node.operation) && !modules.includes(node.operation)) modules.push(node.operation);
        }
        return modules;
    }

    ownVariables(): readonly Variable[] {
        return [];
    }

    getConfig(): JsonObject {
        return {
            name: this.name,
            description: this.description,
            trainable: this.trainable,
            inputs: this.inputs.map((input) => input.name),
            outputs: this.outputs.map((output) => output.name),
            nodes: this.nodes().map((node) => ({
                name: node.name,
                operation: node.operation.name,
                inputs: node.inputs.map((input) => input.name),
                outputs: node.outputs.map((output) => output.name),
            })),
        };
    }

    /** Human-readable listing of layers, nodes and their schemas' properties. */
    summary(): string {
        const lines = [`Program: ${this.name}`];
        if (this.description) lines.push(this.description);
        lines.push(`Inputs: ${this.inputs.map((input) => `${input.name}(${input.properties().join(", ")})`).join("; ")}`);
        for (const [index, layer] of this.layers.entries()) {
            lines.push(`Layer ${index}:`);
            for (const node of layer) {
                const from = node.inputs.map((input) => input.name).join(", ");
                const to = node.outputs.map((output) => `${output.name}(${output.properties().join(", ")})`).join("; ");
                lines.push(`  ${node.name} [${from}] -> ${to}`);
            }
        }
        lines.push(`Outputs: ${this.outputs.map((output) => output.name).join(", ")}`);
        return lines.join("\n");
    }

    private async runNode(
        node: TraceNode,
        layer: number,
        bindings: Map<SchemaValue, DataValue | null>,
        mode: Mode,
        runId: string,
    ): Promise<(DataValue | null)[]> {
        const args = node.inputs.map((input) => (input instanceof DataValue ? input : bindings.get(input) ?? null));
        const startedAt = performance.now();
        this.emit("node:start", { runId, node: node.name, layer });
        try {
            const outputs = await node.operation.transform(args, mode);
            if (outputs.length !== node.outputs.length) {
                throw new GraphError(
                    `Operation "${node.operation.name}" returned ${outputs.length} output(s), expected ${node.outputs.length}.`,
                );
            }
            this.emit("node:complete", {
                runId,
                node: node.name,
                layer,
                durationMs: performance.now() - startedAt,
            });
            return outputs;
        } catch (error) {
            this.emit("node:error", { runId, node: node.name, layer, error });
            throw error;
        }
    }
}
