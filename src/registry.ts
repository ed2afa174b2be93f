/**
 * Default module registry — deserializers for every module kind the engine
 * ships. Programs are not registered: they are rebuilt by tracing again.
 */
import { z } from "zod/v4";
import { JsonObjectSchema } from "./core/json.js";
import type { NameScope } from "./core/names.js";
import type { Operation } from "./core/operation.js";
import { ModuleRegistry } from "./core/registry.js";
import type { StructuredOutputModel } from "./llm/client.js";
import { ReActAgent } from "./agents/react.js";
import type { Tool } from "./agents/tools.js";
import { Action } from "./modules/action.js";
import { Branch } from "./modules/branch.js";
import { Decision } from "./modules/decision.js";
import { Generator, GeneratorExample } from "./modules/generator.js";
import { Concat, LogicalAnd, LogicalOr } from "./modules/ops.js";

/** External collaborators handed back to deserialized modules. */
export interface ModuleContext {
    model: StructuredOutputModel;
    decisionModel?: StructuredOutputModel;
    actionModel?: StructuredOutputModel;
    tools?: Tool[];
    /** Plain operations referenced by name from a Branch config. */
    operations?: Operation[];
    names?: NameScope;
}

const BaseConfig = z.object({
    name: z.string(),
    description: z.string().default(""),
    trainable: z.boolean().default(true),
});

const PromptConfig = z.object({
    instructions: z.array(z.string()).optional(),
    examples: z.array(GeneratorExample).default([]),
    temperature: z.number().optional(),
});

const GeneratorConfig = BaseConfig.extend(PromptConfig.shape).extend({
    schema: JsonObjectSchema,
    use_inputs_schema: z.boolean().default(false),
    use_outputs_schema: z.boolean().default(false),
    return_inputs: z.boolean().default(false),
    validate_output: z.boolean().default(true),
});

const DecisionConfig = BaseConfig.extend(PromptConfig.shape).extend({
    question: z.string(),
    labels: z.array(z.string()),
    multi_label: z.boolean().default(false),
});

const BranchConfig = BaseConfig.extend(PromptConfig.shape).extend({
    question: z.string(),
    labels: z.array(z.string()),
    branches: z.array(z.unknown()),
    return_decision: z.boolean().default(false),
});

const ActionConfig = z.object({
    name: z.string(),
    trainable: z.boolean().default(true),
    tool: z.string(),
    temperature: z.number().optional(),
});

const AlgebraConfig = z.object({
    name: z.string(),
    max_rename_attempts: z.number().int().min(1).optional(),
});

const ReActAgentConfig = BaseConfig.extend({
    schema: JsonObjectSchema,
    tools: z.array(z.string()),
    question: z.string().optional(),
    instructions: z.array(z.string()).optional(),
    examples: z.array(GeneratorExample).default([]),
    max_iterations: z.number().int(),
    max_concurrency: z.number().int().min(1).optional(),
    max_rename_attempts: z.number().int().min(1).optional(),
    decision_temperature: z.number().optional(),
    generation_temperature: z.number().optional(),
    return_inputs_with_trajectory: z.boolean().default(false),
    return_inputs_only: z.boolean().default(false),
});

const PlainOperationConfig = z.object({
    kind: z.literal("operation"),
    config: z.object({ name: z.string() }),
});

function findTool(context: ModuleContext, name: string): Tool {
    const tool = context.tools?.find((candidate) => candidate.name === name);
    if (!tool) throw new Error(`Tool "${name}" is not available in the deserialization context.`);
    return tool;
}

function findOperation(context: ModuleContext, name: string): Operation {
    const operation = context.operations?.find((candidate) => candidate.name === name);
    if (!operation) throw new Error(`Operation "${name}" is not available in the deserialization context.`);
    return operation;
}

/** A registry that knows every built-in module kind. */
export function createModuleRegistry(): ModuleRegistry<ModuleContext> {
    return new ModuleRegistry<ModuleContext>()
        .register("generator", (raw, context) => {
            const config = GeneratorConfig.parse(raw);
            return new Generator({
                schema: config.schema,
                model: context.model,
                name: config.name,
                description: config.description,
                instructions: config.instructions,
                examples: config.examples,
                useInputsSchema: config.use_inputs_schema,
                useOutputsSchema: config.use_outputs_schema,
                returnInputs: config.return_inputs,
                validateOutput: config.validate_output,
                temperature: config.temperature,
                trainable: config.trainable,
            });
        })
        .register("decision", (raw, context) => {
            const config = DecisionConfig.parse(raw);
            return new Decision({
                question: config.question,
                labels: config.labels,
                model: context.decisionModel ?? context.model,
                multiLabel: config.multi_label,
                name: config.name,
                description: config.description,
                instructions: config.instructions,
                examples: config.examples,
                temperature: config.temperature,
                trainable: config.trainable,
            });
        })
        .register("branch", (raw, context, registry) => {
            const config = BranchConfig.parse(raw);
            const branches = config.branches.map((branch) => {
                const plain = PlainOperationConfig.safeParse(branch);
                return plain.success ? findOperation(context, plain.data.config.name) : registry.deserialize(branch, context);
            });
            return new Branch({
                question: config.question,
                labels: config.labels,
                branches,
                model: context.decisionModel ?? context.model,
                returnDecision: config.return_decision,
                name: config.name,
                description: config.description,
                instructions: config.instructions,
                examples: config.examples,
                temperature: config.temperature,
                trainable: config.trainable,
            });
        })
        .register("action", (raw, context) => {
            const config = ActionConfig.parse(raw);
            return new Action({
                tool: findTool(context, config.tool),
                model: context.actionModel ?? context.model,
                name: config.name,
                temperature: config.temperature,
                trainable: config.trainable,
            });
        })
        .register("concat", (raw) => {
            const config = AlgebraConfig.parse(raw);
            return new Concat({ name: config.name, maxRenameAttempts: config.max_rename_attempts });
        })
        .register("logical_and", (raw) => {
            const config = AlgebraConfig.parse(raw);
            return new LogicalAnd({ name: config.name, maxRenameAttempts: config.max_rename_attempts });
        })
        .register("logical_or", (raw) => {
            const config = AlgebraConfig.parse(raw);
            return new LogicalOr({ name: config.name, maxRenameAttempts: config.max_rename_attempts });
        })
        .register("react_agent", (raw, context) => {
            const config = ReActAgentConfig.parse(raw);
            return new ReActAgent({
                schema: config.schema,
                tools: config.tools.map((name) => findTool(context, name)),
                decisionModel: context.decisionModel ?? context.model,
                actionModel: context.actionModel ?? context.model,
                question: config.question,
                instructions: config.instructions,
                examples: config.examples,
                maxIterations: config.max_iterations,
                maxConcurrency: config.max_concurrency,
                maxRenameAttempts: config.max_rename_attempts,
                decisionTemperature: config.decision_temperature,
                generationTemperature: config.generation_temperature,
                returnInputsWithTrajectory: config.return_inputs_with_trajectory,
                returnInputsOnly: config.return_inputs_only,
                name: config.name,
                description: config.description,
                trainable: config.trainable,
            });
        });
}

export const defaultModuleRegistry = createModuleRegistry();
