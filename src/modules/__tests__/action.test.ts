/**
 * Action Tests — argument inference, tool execution and failure wrapping.
 */
import { describe, it, expect, vi } from "vitest";
import { z } from "zod/v4";
import type { JsonObject } from "../../core/json.js";
import { invoke } from "../../core/operation.js";
import { DataValue, SchemaValue } from "../../core/values.js";
import { GraphError, ToolExecutionError } from "../../errors/index.js";
import type { StructuredOutputModel } from "../../llm/client.js";
import { defineTool } from "../../agents/tools.js";
import { Action, actionSchema } from "../../modules/action.js";
import { PurposeInput } from "../../schemas/decision.js";

// --- Helpers ---

function mockModel(...objects: JsonObject[]) {
    const generateObject = vi.fn<StructuredOutputModel["generateObject"]>();
    for (const object of objects) generateObject.mockResolvedValueOnce({ object, tokenUsage: 10 });
    return { generateObject };
}

const add = defineTool({
    name: "add",
    description: "Add two numbers.",
    parameters: z.object({ a: z.number(), b: z.number() }),
    execute: ({ a, b }) => ({ sum: a + b }),
});

const clock = defineTool({
    name: "clock",
    description: "Tell the time.",
    parameters: z.object({}),
    execute: () => ({ time: "12:00" }),
});

// --- Tests ---

describe("Action", () => {
    it("infers arguments, runs the tool and namespaces the record", async () => {
        const model = mockModel({ a: 2, b: 3 });
        const action = new Action({ tool: add, model, name: "adder" });

        const output = await action.run("Add 2 and 3");

        expect(output.name).toBe("adder");
        expect(output.payload).toEqual({
            add: { purpose: "Add 2 and 3", arguments: { a: 2, b: 3 }, result: { sum: 5 } },
        });
        expect(model.generateObject).toHaveBeenCalledTimes(1);
        expect(model.generateObject.mock.calls[0][0]).toEqual(add.parameters);
        expect(JSON.parse(model.generateObject.mock.calls[0][2])).toEqual({ inputs: { purpose: "Add 2 and 3" } });
    });

    it("skips the model for tools without parameters", async () => {
        const model = mockModel();
        const action = new Action({ tool: clock, model });
        const output = await action.run("What time is it?");
        expect(output.payload).toEqual({
            clock: { purpose: "What time is it?", arguments: {}, result: { time: "12:00" } },
        });
        expect(model.generateObject).not.toHaveBeenCalled();
    });

    it("reads the purpose from its input", async () => {
        const action = new Action({ tool: clock, model: mockModel() });
        const output = await invoke(action, DataValue.fromZod("purpose", PurposeInput, { purpose: "time" }));
        expect(output?.get("clock")).toEqual({ purpose: "time", arguments: {}, result: { time: "12:00" } });
    });

    it("wraps tool failures", async () => {
        const cause = new Error("offline");
        const broken = defineTool({
            name: "broken",
            description: "Always fails.",
            parameters: z.object({}),
            execute: async () => {
                throw cause;
            },
        });
        const action = new Action({ tool: broken, model: mockModel() });

        const failure = action.run("try");
        await expect(failure).rejects.toBeInstanceOf(ToolExecutionError);
        await expect(failure).rejects.toMatchObject({ toolName: "broken", cause });
    });

    it("wraps argument parsing failures", async () => {
        const model = mockModel({ a: "two", b: 3 });
        const action = new Action({ tool: add, model });
        await expect(action.run("Add")).rejects.toMatchObject({ name: "ToolExecutionError", toolName: "add" });
    });

    it("needs a purpose property when traced", () => {
        const action = new Action({ tool: clock, model: mockModel() });
        const withoutPurpose = SchemaValue.from("x", { type: "object", properties: { query: { type: "string" } } });
        expect(() => action.shapeOf([withoutPurpose])).toThrow(GraphError);
        const [shape] = action.shapeOf([SchemaValue.fromZod("purpose", PurposeInput)]);
        expect(shape.schema).toEqual(actionSchema(clock));
    });
});
