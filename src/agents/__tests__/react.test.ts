/**
 * ReActAgent Tests — the decide/act loop, its termination and its failures.
 *
 * Decisions and final answers come from vi.fn() models; tools are in-process.
 */
import { describe, it, expect, vi } from "vitest";
import { z } from "zod/v4";
import type { JsonObject } from "../../core/json.js";
import { invoke } from "../../core/operation.js";
import { DataValue } from "../../core/values.js";
import { AgentConfigurationError, ToolExecutionError, UnknownToolError } from "../../errors/index.js";
import type { StructuredOutputModel } from "../../llm/client.js";
import { ReActAgent } from "../../agents/react.js";
import type { FinishReason } from "../../agents/react.js";
import { defineTool } from "../../agents/tools.js";
import type { Tool } from "../../agents/tools.js";
import { EngineConfig } from "../../schemas/config.js";

// --- Helpers ---

const Query = z.object({ query: z.string() });
const FinalAnswer = z.object({ answer: z.string() });

function mockModel(...objects: JsonObject[]) {
    const generateObject = vi.fn<StructuredOutputModel["generateObject"]>();
    for (const object of objects) generateObject.mockResolvedValueOnce({ object, tokenUsage: 10 });
    return { generateObject };
}

function decision(...tools: string[]): JsonObject {
    return {
        reasoning: `run ${tools.join(", ") || "nothing"}`,
        choices: tools.map((tool) => ({ tool_name: tool, purpose: `use ${tool}` })),
    };
}

function makeTool(name: string, result: JsonObject) {
    const execute = vi.fn(async () => result);
    const tool: Tool = defineTool({ name, description: `The ${name} tool.`, parameters: z.object({}), execute });
    return { tool, execute };
}

/** Tracks how many tool calls are in flight at once. */
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

/** A tool that takes a few milliseconds and logs when it starts and ends. */
function slowTool(name: string, gauge: Gauge, log: string[]) {
    const execute = vi.fn(async () => {
        gauge.enter();
        log.push(`${name}:start`);
        await new Promise((resolve) => setTimeout(resolve, 10));
        log.push(`${name}:end`);
        gauge.leave();
        return { done: true };
    });
    const tool: Tool = defineTool({ name, description: `The ${name} tool.`, parameters: z.object({}), execute });
    return { tool, execute };
}

/** Replays `answers` in order and logs every decision request. */
function loggingModel(log: string[], ...answers: JsonObject[]) {
    const generateObject = vi.fn<StructuredOutputModel["generateObject"]>(async () => {
        log.push("decide");
        return { object: answers.shift() ?? decision(), tokenUsage: 1 };
    });
    return { generateObject };
}

function query(): DataValue {
    return DataValue.fromZod("query", Query, { query: "q" });
}

function promptInputs(model: ReturnType<typeof mockModel>, call: number): unknown {
    return JSON.parse(model.generateObject.mock.calls[call][2]).inputs;
}

// --- Tests ---

describe("ReActAgent loop", () => {
    it("stops when no tool is selected and answers from the accumulated state", async () => {
        const alpha = makeTool("alpha", { value: 1 });
        const beta = makeTool("beta", { value: 2 });
        const decisionModel = mockModel(decision("alpha", "beta"), decision());
        const actionModel = mockModel({ answer: "done" });
        const agent = new ReActAgent({
            schema: FinalAnswer,
            tools: [alpha.tool, beta.tool],
            decisionModel,
            actionModel,
            name: "agent",
        });
        const rounds: number[] = [];
        const finishes: { iterations: number; reason: FinishReason }[] = [];
        agent.on("agent:round", ({ iteration }) => rounds.push(iteration));
        agent.on("agent:finish", ({ iterations, reason }) => finishes.push({ iterations, reason }));

        const output = await agent.run(query());

        expect(output.payload).toEqual({ answer: "done" });
        expect(alpha.execute).toHaveBeenCalledTimes(1);
        expect(beta.execute).toHaveBeenCalledTimes(1);
        expect(decisionModel.generateObject).toHaveBeenCalledTimes(2);
        expect(promptInputs(decisionModel, 0)).toEqual({ query: "q", question: agent.question });
        expect(promptInputs(actionModel, 0)).toEqual({
            query: "q",
            alpha: { purpose: "use alpha", arguments: {}, result: { value: 1 } },
            beta: { purpose: "use beta", arguments: {}, result: { value: 2 } },
        });
        expect(promptInputs(decisionModel, 1)).toEqual({
            query: "q",
            alpha: { purpose: "use alpha", arguments: {}, result: { value: 1 } },
            beta: { purpose: "use beta", arguments: {}, result: { value: 2 } },
            question: agent.question,
        });
        expect(rounds).toEqual([1]);
        expect(finishes).toEqual([{ iterations: 2, reason: "no_tool_selected" }]);
    });

    it("runs a round's actions concurrently and waits for all of them", async () => {
        const gauge = new Gauge();
        const log: string[] = [];
        const alpha = slowTool("alpha", gauge, log);
        const beta = slowTool("beta", gauge, log);
        const agent = new ReActAgent({
            schema: FinalAnswer,
            tools: [alpha.tool, beta.tool],
            decisionModel: loggingModel(log, decision("alpha", "beta"), decision()),
            actionModel: mockModel({ answer: "done" }),
        });

        await agent.run(query());

        expect(gauge.peak).toBe(2);
        expect(log).toEqual(["decide", "alpha:start", "beta:start", "alpha:end", "beta:end", "decide"]);
    });

    it("bounds a round by maxConcurrency", async () => {
        const gauge = new Gauge();
        const log: string[] = [];
        const alpha = slowTool("alpha", gauge, log);
        const beta = slowTool("beta", gauge, log);
        const agent = new ReActAgent({
            schema: FinalAnswer,
            tools: [alpha.tool, beta.tool],
            decisionModel: loggingModel(log, decision("alpha", "beta"), decision()),
            actionModel: mockModel({ answer: "done" }),
            maxConcurrency: 1,
        });

        await agent.run(query());

        expect(gauge.peak).toBe(1);
        expect(log).toEqual(["decide", "alpha:start", "alpha:end", "beta:start", "beta:end", "decide"]);
    });

    it("answers after the iteration budget without asking again", async () => {
        const alpha = makeTool("alpha", { value: 1 });
        const decisionModel = mockModel(decision("alpha"));
        const actionModel = mockModel({ answer: "partial" });
        const agent = new ReActAgent({
            schema: FinalAnswer,
            tools: [alpha.tool],
            decisionModel,
            actionModel,
            maxIterations: 1,
        });
        const finishes: FinishReason[] = [];
        agent.on("agent:finish", ({ reason }) => finishes.push(reason));

        expect((await agent.run(query())).payload).toEqual({ answer: "partial" });
        expect(decisionModel.generateObject).toHaveBeenCalledTimes(1);
        expect(alpha.execute).toHaveBeenCalledTimes(1);
        expect(promptInputs(actionModel, 0)).toEqual({
            query: "q",
            alpha: { purpose: "use alpha", arguments: {}, result: { value: 1 } },
        });
        expect(finishes).toEqual(["max_iterations"]);
    });

    it("renames repeated calls of one tool within a round", async () => {
        const alpha = makeTool("alpha", { value: 1 });
        const decisionModel = mockModel(decision("alpha", "alpha"), decision());
        const actionModel = mockModel({ answer: "done" });
        const agent = new ReActAgent({
            schema: FinalAnswer,
            tools: [alpha.tool],
            decisionModel,
            actionModel,
            returnInputsWithTrajectory: true,
        });

        const output = await agent.run(query());

        expect(alpha.execute).toHaveBeenCalledTimes(2);
        expect(output.properties()).toEqual(["query", "alpha", "alpha_1", "answer"]);
    });

    it("returns only the inputs with the answer when asked", async () => {
        const alpha = makeTool("alpha", { value: 1 });
        const agent = new ReActAgent({
            schema: FinalAnswer,
            tools: [alpha.tool],
            model: mockModel(decision("alpha"), decision(), { answer: "done" }),
            returnInputsOnly: true,
        });
        expect((await invoke(agent, query()))?.payload).toEqual({ query: "q", answer: "done" });
    });

    it("rejects a decision naming a tool outside the toolkit before running anything", async () => {
        const alpha = makeTool("alpha", { value: 1 });
        const actionModel = mockModel();
        const agent = new ReActAgent({
            schema: FinalAnswer,
            tools: [alpha.tool],
            decisionModel: mockModel(decision("alpha", "gamma")),
            actionModel,
        });

        const failure = agent.run(query());
        await expect(failure).rejects.toBeInstanceOf(UnknownToolError);
        await expect(failure).rejects.toMatchObject({ toolName: "gamma", available: ["alpha"] });
        expect(alpha.execute).not.toHaveBeenCalled();
        expect(actionModel.generateObject).not.toHaveBeenCalled();
    });

    it("aborts the call when a tool fails, after its siblings settle", async () => {
        const alpha = makeTool("alpha", { value: 1 });
        const beta = makeTool("beta", { value: 2 });
        beta.execute.mockRejectedValueOnce(new Error("offline"));
        const actionModel = mockModel();
        const agent = new ReActAgent({
            schema: FinalAnswer,
            tools: [alpha.tool, beta.tool],
            decisionModel: mockModel(decision("alpha", "beta")),
            actionModel,
        });

        const failure = agent.run(query());
        await expect(failure).rejects.toBeInstanceOf(ToolExecutionError);
        await expect(failure).rejects.toMatchObject({ toolName: "beta", message: 'Tool "beta" failed: offline' });
        expect(alpha.execute).toHaveBeenCalledTimes(1);
        expect(actionModel.generateObject).not.toHaveBeenCalled();
    });

    it("returns null for an absent input", async () => {
        const alpha = makeTool("alpha", { value: 1 });
        const model = mockModel();
        const agent = new ReActAgent({ schema: FinalAnswer, tools: [alpha.tool], model });
        expect(await invoke(agent, null)).toBeNull();
        expect(model.generateObject).not.toHaveBeenCalled();
    });
});

describe("ReActAgent configuration", () => {
    const alpha = makeTool("alpha", { value: 1 }).tool;

    it("constrains the decision schema to the toolkit", () => {
        const agent = new ReActAgent({ schema: FinalAnswer, tools: [alpha], model: mockModel() });
        expect(agent.decisionSchema).toMatchObject({
            $defs: { ToolName: { enum: ["alpha"], type: "string" } },
            properties: { choices: { items: { properties: { tool_name: { $ref: "#/$defs/ToolName" } } } } },
        });
    });

    it("rejects an empty toolkit", () => {
        expect(() => new ReActAgent({ schema: FinalAnswer, tools: [], model: mockModel() })).toThrow(
            AgentConfigurationError,
        );
    });

    it("rejects duplicate tool names", () => {
        expect(() => new ReActAgent({ schema: FinalAnswer, tools: [alpha, alpha], model: mockModel() })).toThrow(
            'Invalid configuration: duplicate tool name "alpha"',
        );
    });

    it("rejects a non-positive iteration budget", () => {
        expect(
            () => new ReActAgent({ schema: FinalAnswer, tools: [alpha], model: mockModel(), maxIterations: 0 }),
        ).toThrow(AgentConfigurationError);
    });

    it("rejects both return flags at once", () => {
        expect(
            () =>
                new ReActAgent({
                    schema: FinalAnswer,
                    tools: [alpha],
                    model: mockModel(),
                    returnInputsOnly: true,
                    returnInputsWithTrajectory: true,
                }),
        ).toThrow(AgentConfigurationError);
    });

    it("needs a model for decisions and one for actions", () => {
        expect(() => new ReActAgent({ schema: FinalAnswer, tools: [alpha], decisionModel: mockModel() })).toThrow(
            AgentConfigurationError,
        );
    });

    it("takes its numeric settings from an engine config", () => {
        const agent = ReActAgent.fromConfig(EngineConfig.parse({ max_iterations: 2 }), {
            schema: FinalAnswer,
            tools: [alpha],
            model: mockModel(),
        });
        expect(agent.maxIterations).toBe(2);
        expect(agent.maxConcurrency).toBe(8);
        expect(agent.decision.temperature).toBe(0.2);
        expect(agent.finalGenerator.temperature).toBe(0.7);
    });

    it("owns its generators and actions as submodules", () => {
        const agent = new ReActAgent({ schema: FinalAnswer, tools: [alpha], model: mockModel(), name: "helper" });
        expect(agent.submodules().map((module) => module.name)).toEqual([
            "helper_decision",
            "helper_alpha",
            "helper_final_answer",
        ]);
    });
});
