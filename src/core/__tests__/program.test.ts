/**
 * Trace & Program Tests — graph recording, sub-DAG selection, layered
 * concurrent execution and failure propagation.
 *
 * Operations are in-process fakes; no LLM is involved.
 */
import { describe, it, expect, vi } from "vitest";
import type { JsonObject } from "../../core/json.js";
import { NameScope } from "../../core/names.js";
import type { Mode, Operation } from "../../core/operation.js";
import { invoke } from "../../core/operation.js";
import { Program } from "../../core/program.js";
import { Trace } from "../../core/trace.js";
import { DataValue, SchemaValue } from "../../core/values.js";
import { GraphError, NodeExecutionError } from "../../errors/index.js";
import { Concat } from "../../modules/ops.js";

// --- Helpers ---

const TextSchema: JsonObject = {
    type: "object",
    properties: { text: { type: "string" } },
    required: ["text"],
};

function text(value: string): DataValue {
    return DataValue.from("text", TextSchema, { text: value });
}

/** Tracks how many fake operations are running at once. */
class Gauge {
    running = 0;
    peak = 0;

    enter(): void {
        this.running++;
        this.peak = Math.max(this.peak, this.running);
    }

    leave(): void {
        this.running--;
    }
}

/** Upper-cases `text` after a short delay; optionally fails. */
class Upper implements Operation {
    public readonly description = "Upper-case the text.";

    constructor(
        public readonly name: string = "upper",
        private readonly gauge: Gauge = new Gauge(),
        private readonly failWith?: Error,
    ) {}

    shapeOf(): SchemaValue[] {
        return [SchemaValue.from(this.name, TextSchema)];
    }

    async transform(inputs: readonly (DataValue | null)[], _mode: Mode): Promise<(DataValue | null)[]> {
        this.gauge.enter();
        try {
            await new Promise((resolve) => setTimeout(resolve, 20));
            if (this.failWith) throw this.failWith;
            const [input] = inputs;
            if (!input) return [null];
            return [DataValue.from(this.name, TextSchema, { text: String(input.get("text")).toUpperCase() })];
        } finally {
            this.gauge.leave();
        }
    }
}

// --- Tests ---

describe("Trace", () => {
    it("records nodes without running them", async () => {
        const upper = new Upper();
        const spy = vi.spyOn(upper, "transform");
        const trace = new Trace();
        const x = trace.input(SchemaValue.from("text", TextSchema));
        const y = trace.call(upper, x);

        expect(spy).not.toHaveBeenCalled();
        expect(y.name).toBe("upper_output");
        expect(trace.allNodes()).toHaveLength(1);
        expect(trace.producerOf(y)?.operation).toBe(upper);
        expect(trace.producerOf(x)).toBeUndefined();
        expect(trace.idOf(x)).toBe(0);
        expect(trace.idOf(y)).toBe(1);
    });

    it("gives repeated operation names numbered node names", () => {
        const trace = new Trace({ names: new NameScope() });
        const x = trace.input(SchemaValue.from("text", TextSchema));
        const upper = new Upper();
        trace.call(upper, x);
        const second = trace.call(upper, x);
        expect(second.name).toBe("upper_1_output");
        expect(trace.allNodes().map((node) => node.name)).toEqual(["upper", "upper_1"]);
    });

    it("rejects values from another trace", () => {
        const first = new Trace();
        const second = new Trace();
        const x = first.input(SchemaValue.from("text", TextSchema));
        expect(() => second.call(new Upper(), x)).toThrow(GraphError);
    });

    it("requires at least one traced input", () => {
        const trace = new Trace();
        expect(() => trace.call(new Upper(), text("hi"))).toThrow(GraphError);
    });

    it("refuses call() for multi-output operations", () => {
        const trace = new Trace();
        const x = trace.input(SchemaValue.from("text", TextSchema));
        const split: Operation = {
            name: "split",
            description: "",
            shapeOf: () => [SchemaValue.from("a", TextSchema), SchemaValue.from("b", TextSchema)],
            transform: async () => [null, null],
        };
        expect(() => trace.call(split, x)).toThrow(GraphError);
        expect(trace.callMany(split, x).map((value) => value.name)).toEqual(["split_output_0", "split_output_1"]);
    });
});

describe("Program", () => {
    it("runs a traced chain on concrete inputs", async () => {
        const trace = new Trace();
        const x = trace.input(SchemaValue.from("text", TextSchema));
        const y = trace.call(new Upper(), x);
        const program = Program.build({ trace, inputs: x, outputs: y });

        const output = await program.invoke(text("hi"));
        expect(output?.payload).toEqual({ text: "HI" });
    });

    it("runs independent branches of a layer concurrently", async () => {
        const gauge = new Gauge();
        const trace = new Trace();
        const x = trace.input(SchemaValue.from("text", TextSchema));
        const a = trace.call(new Upper("left", gauge), x);
        const b = trace.call(new Upper("right", gauge), x);
        const merged = trace.call(new Concat({ name: "merge" }), a, b);
        const program = Program.build({ trace, inputs: x, outputs: merged });

        expect(program.layers.map((layer) => layer.map((node) => node.name))).toEqual([["left", "right"], ["merge"]]);
        const output = await program.invoke(text("hi"));
        expect(gauge.peak).toBe(2);
        expect(output?.payload).toEqual({ text: "HI", text_1: "HI" });
    });

    it("bounds concurrency within a layer", async () => {
        const gauge = new Gauge();
        const trace = new Trace();
        const x = trace.input(SchemaValue.from("text", TextSchema));
        const a = trace.call(new Upper("left", gauge), x);
        const b = trace.call(new Upper("right", gauge), x);
        const program = Program.build({ trace, inputs: x, outputs: [a, b], maxConcurrency: 1 });

        const outputs = await program.invokeMany(text("hi"));
        expect(gauge.peak).toBe(1);
        expect(outputs.map((output) => output?.get("text"))).toEqual(["HI", "HI"]);
    });

    it("keeps only the nodes the outputs depend on", () => {
        const trace = new Trace();
        const x = trace.input(SchemaValue.from("text", TextSchema));
        const y = trace.call(new Upper("used"), x);
        trace.call(new Upper("unused"), x);
        const program = Program.build({ trace, inputs: x, outputs: y });
        expect(program.nodes().map((node) => node.name)).toEqual(["used"]);
    });

    it("merges constant inputs recorded in the trace", async () => {
        const trace = new Trace();
        const x = trace.input(SchemaValue.from("text", TextSchema));
        const y = trace.call(new Concat({ name: "suffix" }), x, text("constant"));
        const program = Program.build({ trace, inputs: x, outputs: y });
        expect((await program.invoke(text("hi")))?.payload).toEqual({ text: "hi", text_1: "constant" });
    });

    it("fails to build when an output is unreachable from the inputs", () => {
        const trace = new Trace();
        const x = trace.input(SchemaValue.from("text", TextSchema));
        const z = trace.input(SchemaValue.from("other", TextSchema));
        const y = trace.call(new Concat({ name: "join" }), x, z);
        expect(() => Program.build({ trace, inputs: x, outputs: y })).toThrow(/not reachable from the program inputs/);
    });

    it("checks the number of bound inputs", async () => {
        const trace = new Trace();
        const x = trace.input(SchemaValue.from("text", TextSchema));
        const program = Program.build({ trace, inputs: x, outputs: trace.call(new Upper(), x) });
        await expect(program.invokeMany([text("a"), text("b")])).rejects.toThrow(GraphError);
    });

    it("wraps a node failure after its layer settles and skips later layers", async () => {
        const gauge = new Gauge();
        const trace = new Trace();
        const x = trace.input(SchemaValue.from("text", TextSchema));
        const ok = new Upper("ok", gauge);
        const okSpy = vi.spyOn(ok, "transform");
        const a = trace.call(new Upper("broken", gauge, new Error("boom")), x);
        const b = trace.call(ok, x);
        const after = new Upper("after");
        const afterSpy = vi.spyOn(after, "transform");
        const c = trace.call(after, a);
        const program = Program.build({ trace, inputs: x, outputs: [c, b] });

        const failure = program.invokeMany(text("hi"));
        await expect(failure).rejects.toBeInstanceOf(NodeExecutionError);
        await expect(failure).rejects.toMatchObject({ nodeName: "broken", message: 'Node "broken" failed: boom' });
        expect(okSpy).toHaveBeenCalledTimes(1);
        expect(gauge.running).toBe(0);
        expect(afterSpy).not.toHaveBeenCalled();
    });

    it("propagates absent inputs", async () => {
        const trace = new Trace();
        const x = trace.input(SchemaValue.from("text", TextSchema));
        const program = Program.build({ trace, inputs: x, outputs: trace.call(new Upper(), x) });
        expect(await program.invoke(null)).toBeNull();
    });

    it("emits lifecycle events with one run id", async () => {
        const trace = new Trace();
        const x = trace.input(SchemaValue.from("text", TextSchema));
        const program = Program.build({ trace, inputs: x, outputs: trace.call(new Upper(), x), name: "shout" });
        const events: string[] = [];
        const runIds = new Set<string>();
        program.on("program:start", ({ runId, program: name }) => {
            events.push(`start:${name}`);
            runIds.add(runId);
        });
        program.on("node:start", ({ runId, node }) => {
            events.push(`node:${node}`);
            runIds.add(runId);
        });
        program.on("node:complete", ({ runId, node }) => {
            events.push(`done:${node}`);
            runIds.add(runId);
        });
        program.on("program:complete", ({ runId }) => {
            events.push("complete");
            runIds.add(runId);
        });

        await program.invoke(text("hi"));
        expect(events).toEqual(["start:shout", "node:upper", "done:upper", "complete"]);
        expect(runIds.size).toBe(1);
    });

    it("nests inside another trace", async () => {
        const innerTrace = new Trace();
        const ix = innerTrace.input(SchemaValue.from("text", TextSchema));
        const inner = Program.build({
            trace: innerTrace,
            inputs: ix,
            outputs: innerTrace.call(new Upper(), ix),
            name: "inner",
        });

        const outerTrace = new Trace();
        const ox = outerTrace.input(SchemaValue.from("text", TextSchema));
        const oy = outerTrace.call(inner, ox);
        const outer = Program.build({ trace: outerTrace, inputs: ox, outputs: oy, name: "outer" });

        expect(oy.name).toBe("inner_output");
        expect((await outer.invoke(text("nested")))?.payload).toEqual({ text: "NESTED" });
        expect((await invoke(inner, text("direct")))?.payload).toEqual({ text: "DIRECT" });
    });

    it("summarizes its layers", () => {
        const trace = new Trace();
        const x = trace.input(SchemaValue.from("text", TextSchema));
        const program = Program.build({ trace, inputs: x, outputs: trace.call(new Upper(), x) });
        expect(program.summary()).toBe(
            [
                "Program: program",
                "Inputs: text(text)",
                "Layer 0:",
                "  upper [text] -> upper_output(text)",
                "Outputs: upper_output",
            ].join("\n"),
        );
    });
});
