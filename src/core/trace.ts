/**
 * Graph Tracer — records Operation calls into a DAG instead of running them.
 *
 * Tracing is explicit: values created through `trace.input()` and returned by
 * `trace.call()` belong to that trace, and only they may be fed back into it.
 * Because a node can only consume values that already exist, the recorded
 * graph is acyclic by construction.
 */
import type { z } from "zod/v4";
import { GraphError } from "../errors/index.js";
import { NameScope } from "./names.js";
import type { Operation } from "./operation.js";
import { DataValue, SchemaValue } from "./values.js";

/** A node input is either a traced SchemaValue or a constant DataValue. */
export type TraceInput = SchemaValue | DataValue;

export interface TraceNode {
    readonly id: number;
    readonly name: string;
    readonly operation: Operation;
    readonly inputs: readonly TraceInput[];
    /** Value ids of the traced (non-constant) inputs. */
    readonly inputIds: readonly number[];
    readonly outputs: readonly SchemaValue[];
    readonly outputIds: readonly number[];
}

export interface TraceOptions {
    names?: NameScope;
}

export class Trace {
    public readonly names: NameScope;
    private readonly nodes: TraceNode[] = [];
    private readonly valueIds = new Map<SchemaValue, number>();
    private readonly producers = new Map<SchemaValue, TraceNode>();
    private nextValueId = 0;

    constructor(options: TraceOptions = {}) {
        this.names = options.names ?? new NameScope();
    }

    /** Declare a graph source. */
    input(schema: SchemaValue | z.ZodObject, name?: string): SchemaValue {
        const declared = schema instanceof SchemaValue ? schema : SchemaValue.fromZod(name ?? "input", schema);
        const value = SchemaValue.from(this.names.unique(name ?? declared.name), declared.schema);
        this.register(value);
        return value;
    }

    /** Record a single-output operation call. */
    call(operation: Operation, ...inputs: TraceInput[]): SchemaValue {
        const outputs = this.callMany(operation, ...inputs);
        if (outputs.length !== 1) {
            throw new GraphError(
                `Operation "${operation.name}" produces ${outputs.length} outputs; use callMany().`,
            );
        }
        return outputs[0];
    }

    /** Record an operation call and return one SchemaValue per output. */
    callMany(operation: Operation, ...inputs: TraceInput[]): SchemaValue[] {
        const traced = inputs.filter((input): input is SchemaValue => input instanceof SchemaValue);
        if (traced.length === 0) {
            throw new GraphError(
                `Operation "${operation.name}" was traced without any SchemaValue input; invoke it directly instead.`,
            );
        }
        for (const value of traced) {
            if (!this.valueIds.has(value)) {
                throw new GraphError(`Value "${value.name}" does not belong to this trace.`);
            }
        }

        const shapes = operation.shapeOf(inputs.map((input) => (input instanceof DataValue ? input.schemaValue() : input)));
        const name = this.names.unique(operation.name);
        const outputs = shapes.map((shape, i) =>
            SchemaValue.from(shapes.length === 1 ? `${name}_output` : `${name}_output_${i}`, shape.schema),
        );
        for (const output of outputs) this.register(output);

        const node: TraceNode = {
            id: this.nodes.length,
            name,
            operation,
            inputs: [...inputs],
            inputIds: traced.map((value) => this.idOf(value)),
            outputs,
            outputIds: outputs.map((value) => this.idOf(value)),
        };
        this.nodes.push(node);
        for (const output of outputs) this.producers.set(output, node);
        return outputs;
    }

    /** The node that produced `value`, or undefined for sources. */
    producerOf(value: SchemaValue): TraceNode | undefined {
        return this.producers.get(value);
    }

    owns(value: SchemaValue): boolean {
        return this.valueIds.has(value);
    }

    idOf(value: SchemaValue): number {
        const id = this.valueIds.get(value);
        if (id === undefined) throw new GraphError(`Value "${value.name}" does not belong to this trace.`);
        return id;
    }

    /** Recorded nodes in trace order. */
    allNodes(): readonly TraceNode[] {
        return this.nodes;
    }

    /**
     * Group nodes into layers: a node sits one layer above the deepest node it
     * depends on. Nodes within a layer have no dependency path between them.
     */
    topologicalLayers(nodes: readonly TraceNode[] = this.nodes): TraceNode[][] {
        const included = new Set(nodes);
        const depth = new Map<TraceNode, number>();
        const layers: TraceNode[][] = [];
        for (const node of [...nodes].sort((a, b) => a.id - b.id)) {
            let level = 0;
            for (const input of node.inputs) {
                if (!(input instanceof SchemaValue)) continue;
                const producer = this.producers.get(input);
                if (producer && included.has(producer)) {
                    level = Math.max(level, (depth.get(producer) ?? 0) + 1);
                }
            }
            depth.set(node, level);
            (layers[level] ??= []).push(node);
        }
        return layers;
    }

    private register(value: SchemaValue): void {
        this.valueIds.set(value, this.nextValueId++);
    }
}
