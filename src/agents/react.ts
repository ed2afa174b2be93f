/**
 * ReActAgent — decide, act in parallel, observe; repeat until done.
 *
 * Each round a decision generator picks any number of tools (each with a
 * purpose) from the toolkit. The chosen actions run concurrently and the round
 * waits for all of them before the next decision. Their namespaced results are
 * concatenated onto the agent state, which the next decision sees in full.
 * The loop ends when the decision selects no tool or the iteration budget is
 * spent; a final generator then answers from the accumulated state.
 *
 * A failing tool aborts the whole call. Its siblings are allowed to settle and
 * their results are discarded; no partial round is merged.
 */
import { EventEmitter } from "events";
import pLimit from "p-limit";
import { z } from "zod/v4";
import { concat, concatAll } from "../core/algebra.js";
import type { JsonObject } from "../core/json.js";
import { resolveName } from "../core/names.js";
import type { NameScope } from "../core/names.js";
import type { Mode, Module, Variable } from "../core/operation.js";
import { DataValue, SchemaValue, jsonSchemaFromZod } from "../core/values.js";
import { AgentConfigurationError, GraphError, ToolExecutionError, UnknownToolError } from "../errors/index.js";
import type { StructuredOutputModel } from "../llm/client.js";
import { Action } from "../modules/action.js";
import { Generator } from "../modules/generator.js";
import type { GeneratorExample } from "../modules/generator.js";
import type { EngineConfig } from "../schemas/config.js";
import { Question, ToolDecision, buildToolDecisionSchema } from "../schemas/decision.js";
import type { ToolChoice } from "../schemas/decision.js";
import { toolkitToStaticPrompt } from "./tools.js";
import type { Tool } from "./tools.js";

export const DEFAULT_TOOL_QUESTION = "Which tools should be run next, and for what purpose?";

export const DEFAULT_DECISION_INSTRUCTIONS = [
    "Always reflect on your previous actions and their results to avoid redundancy.",
    "You can call the same tool multiple times if needed with different purposes.",
    "For each tool you select, provide a clear and specific purpose explaining what you want to achieve.",
    "Only select tools that can run at the same time without depending on each other.",
    "If no more tools are needed to complete the task, return an empty choices array.",
];

export const FINAL_ANSWER_INSTRUCTIONS = ["Provide the final answer based on all the information gathered."];

/** Why the loop stopped. */
export type FinishReason = "no_tool_selected" | "max_iterations";

/** Supported events emitted by a ReActAgent while it runs. */
export interface AgentEvents {
    "agent:decision": [{ agent: string; iteration: number; reasoning: string; choices: ToolChoice[] }];
    "agent:round": [{ agent: string; iteration: number; tools: string[]; durationMs: number }];
    "agent:finish": [{ agent: string; iterations: number; reason: FinishReason }];
}

export interface ReActAgentOptions {
    /** Schema of the final answer. */
    schema: JsonObject | z.ZodObject;
    tools: Tool[];
    /** Used for both decisions and actions unless overridden below. */
    model?: StructuredOutputModel;
    decisionModel?: StructuredOutputModel;
    actionModel?: StructuredOutputModel;
    question?: string;
    instructions?: string[];
    examples?: GeneratorExample[];
    maxIterations?: number;
    /** Upper bound on actions running at once within a round. Default: unbounded. */
    maxConcurrency?: number;
    maxRenameAttempts?: number;
    decisionTemperature?: number;
    generationTemperature?: number;
    /** Return `state ⧺ answer`, where state holds the inputs and every round's results. */
    returnInputsWithTrajectory?: boolean;
    /** Return `inputs ⧺ answer`. */
    returnInputsOnly?: boolean;
    name?: string;
    description?: string;
    names?: NameScope;
    trainable?: boolean;
}

export class ReActAgent extends EventEmitter<AgentEvents> implements Module {
    public readonly kind = "react_agent";
    public readonly name: string;
    public readonly description: string;
    public readonly trainable: boolean;
    public readonly schema: JsonObject;
    public readonly tools: readonly Tool[];
    public readonly labels: readonly string[];
    public readonly question: string;
    public readonly maxIterations: number;
    public readonly maxConcurrency: number;
    public readonly maxRenameAttempts: number | undefined;
    public readonly returnInputsWithTrajectory: boolean;
    public readonly returnInputsOnly: boolean;
    public readonly decisionSchema: JsonObject;
    public readonly decision: Generator;
    public readonly finalGenerator: Generator;
    public readonly actions: ReadonlyMap<string, Action>;

    constructor(opts: ReActAgentOptions) {
        super();
        const decisionModel = opts.decisionModel ?? opts.model;
        const actionModel = opts.actionModel ?? opts.model;
        if (!decisionModel || !actionModel) {
            throw new AgentConfigurationError("set either `model` or both `decisionModel` and `actionModel`");
        }
        if (opts.tools.length === 0) throw new AgentConfigurationError("an agent needs at least one tool");
        const labels = opts.tools.map((tool) => tool.name);
        const duplicate = labels.find((label, i) => labels.indexOf(label) !== i);
        if (duplicate !== undefined) throw new AgentConfigurationError(`duplicate tool name "${duplicate}"`);
        const maxIterations = opts.maxIterations ?? 5;
        if (!Number.isInteger(maxIterations) || maxIterations < 1) {
            throw new AgentConfigurationError("`maxIterations` must be a positive integer");
        }
        if (opts.returnInputsWithTrajectory && opts.returnInputsOnly) {
            throw new AgentConfigurationError(
                "`returnInputsWithTrajectory` and `returnInputsOnly` cannot both be set; choose one",
            );
        }

        this.name = resolveName("react_agent", opts.name, opts.names);
        this.description = opts.description ?? "";
        this.trainable = opts.trainable ?? true;
        this.schema = opts.schema instanceof z.ZodObject ? jsonSchemaFromZod(opts.schema) : opts.schema;
        this.tools = [...opts.tools];
        this.labels = labels;
        this.question = opts.question ?? DEFAULT_TOOL_QUESTION;
        this.maxIterations = maxIterations;
        this.maxConcurrency = opts.maxConcurrency ?? Number.POSITIVE_INFINITY;
        this.maxRenameAttempts = opts.maxRenameAttempts;
        this.returnInputsWithTrajectory = opts.returnInputsWithTrajectory ?? false;
        this.returnInputsOnly = opts.returnInputsOnly ?? false;
        this.decisionSchema = buildToolDecisionSchema(labels);

        this.decision = new Generator({
            schema: this.decisionSchema,
            model: decisionModel,
            name: `${this.name}_decision`,
            description: toolkitToStaticPrompt(this.tools),
            instructions: opts.instructions ?? DEFAULT_DECISION_INSTRUCTIONS,
            examples: opts.examples,
            temperature: opts.decisionTemperature,
            // Unknown tool names surface as UnknownToolError, not as a schema violation.
            validateOutput: false,
            trainable: this.trainable,
        });
        this.actions = new Map(
            this.tools.map((tool): [string, Action] => [
                tool.name,
                new Action({
                    tool,
                    model: actionModel,
                    name: `${this.name}_${tool.name}`,
                    temperature: opts.generationTemperature,
                    trainable: this.trainable,
                }),
            ]),
        );
        this.finalGenerator = new Generator({
            schema: this.schema,
            model: actionModel,
            name: `${this.name}_final_answer`,
            instructions: FINAL_ANSWER_INSTRUCTIONS,
            temperature: opts.generationTemperature,
            trainable: this.trainable,
        });
    }

    /** Build an agent whose numeric settings come from an EngineConfig. */
    static fromConfig(
        config: EngineConfig,
        opts: Omit<
            ReActAgentOptions,
            "maxIterations" | "maxConcurrency" | "maxRenameAttempts" | "decisionTemperature" | "generationTemperature"
        >,
    ): ReActAgent {
        return new ReActAgent({
            ...opts,
            maxIterations: config.max_iterations,
            maxConcurrency: config.max_concurrency,
            maxRenameAttempts: config.max_rename_attempts,
            decisionTemperature: config.decision_temperature,
            generationTemperature: config.generation_temperature,
        });
    }

    shapeOf(inputs: readonly SchemaValue[]): SchemaValue[] {
        if (inputs.length !== 1) {
            throw new GraphError(`Agent "${this.name}" takes exactly one input, received ${inputs.length}.`);
        }
        const answer = SchemaValue.from(this.name, this.schema);
        if (this.returnInputsOnly || this.returnInputsWithTrajectory) {
            return [concat(inputs[0], answer, { maxRenameAttempts: this.maxRenameAttempts })];
        }
        return [answer];
    }

    async transform(inputs: readonly (DataValue | null)[], _mode: Mode): Promise<(DataValue | null)[]> {
        const [input] = inputs;
        if (!input) return [null];
        return [await this.run(input)];
    }

    /** Run the loop on `input` and return the final answer. */
    async run(input: DataValue): Promise<DataValue> {
        const algebra = { maxRenameAttempts: this.maxRenameAttempts };
        const question = DataValue.fromZod("question", Question, { question: this.question });
        let state = input;
        let iterations = 0;
        let reason: FinishReason = "max_iterations";

        for (let iteration = 1; iteration <= this.maxIterations; iteration++) {
            iterations = iteration;
            const answer = await this.decision.generate(concat(state, question, algebra));
            const { reasoning, choices } = ToolDecision.parse(answer.payload);
            this.emit("agent:decision", { agent: this.name, iteration, reasoning, choices });
            if (choices.length === 0) {
                reason = "no_tool_selected";
                break;
            }
            for (const choice of choices) {
                if (!this.actions.has(choice.tool_name)) throw new UnknownToolError(choice.tool_name, this.labels);
            }

            const startedAt = performance.now();
            const results = await this.dispatch(choices);
            state = concat(state, concatAll(results, algebra), algebra);
            this.emit("agent:round", {
                agent: this.name,
                iteration,
                tools: choices.map((choice) => choice.tool_name),
                durationMs: performance.now() - startedAt,
            });
        }

        this.emit("agent:finish", { agent: this.name, iterations, reason });
        const response = await this.finalGenerator.generate(state);
        if (this.returnInputsWithTrajectory) return concat(state, response, algebra);
        if (this.returnInputsOnly) return concat(input, response, algebra);
        return response;
    }

    /** Run one round of actions; every action settles before any failure is raised. */
    private async dispatch(choices: readonly ToolChoice[]): Promise<DataValue[]> {
        const limit = pLimit(this.maxConcurrency);
        const settled = await Promise.allSettled(
            choices.map((choice) =>
                limit(() => {
                    const action = this.actions.get(choice.tool_name);
                    if (!action) throw new UnknownToolError(choice.tool_name, this.labels);
                    return action.run(choice.purpose);
                }),
            ),
        );

        const results: DataValue[] = [];
        for (const [i, result] of settled.entries()) {
            if (result.status === "rejected") {
                const error: unknown = result.reason;
                throw error instanceof ToolExecutionError ? error : new ToolExecutionError(choices[i].tool_name, error);
            }
            results.push(result.value);
        }
        return results;
    }

    submodules(): Module[] {
        return [this.decision, ...this.actions.values(), this.finalGenerator];
    }

    ownVariables(): readonly Variable[] {
        return [];
    }

    getConfig(): JsonObject {
        const config: JsonObject = {
            name: this.name,
            description: this.description,
            trainable: this.trainable,
            schema: this.schema,
            tools: [...this.labels],
            question: this.question,
            instructions: this.decision.instructions,
            examples: this.decision.examples.map((example) => ({ ...example })),
            max_iterations: this.maxIterations,
            return_inputs_with_trajectory: this.returnInputsWithTrajectory,
            return_inputs_only: this.returnInputsOnly,
        };
        if (Number.isFinite(this.maxConcurrency)) config.max_concurrency = this.maxConcurrency;
        if (this.maxRenameAttempts !== undefined) config.max_rename_attempts = this.maxRenameAttempts;
        if (this.decision.temperature !== undefined) config.decision_temperature = this.decision.temperature;
        if (this.finalGenerator.temperature !== undefined) {
            config.generation_temperature = this.finalGenerator.temperature;
        }
        return config;
    }
}
