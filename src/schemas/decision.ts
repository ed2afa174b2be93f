/**
 * Decision Schemas — structured outputs for label selection and tool routing.
 */
import { z } from "zod/v4";
import type { JsonObject } from "../core/json.js";
import { constrainEnum } from "../core/mutator.js";
import { jsonSchemaFromZod } from "../core/values.js";

/** The question a decision answers, concatenated onto its input. */
export const Question = z.object({
    question: z.string().describe("The question to answer"),
});
export type Question = z.infer<typeof Question>;

/** Single-label answer; `choice` is constrained to the labels at build time. */
export const DecisionAnswer = z.object({
    thinking: z.string().describe("Your step by step thinking"),
    choice: z.string().describe("The choice label"),
});
export type DecisionAnswer = z.infer<typeof DecisionAnswer>;

/** Multi-label answer; each entry of `choices` is one of the labels. */
export const MultiDecisionAnswer = z.object({
    thinking: z.string().describe("Your step by step thinking"),
    choices: z.array(z.string()).describe("The choice labels"),
});
export type MultiDecisionAnswer = z.infer<typeof MultiDecisionAnswer>;

/** The only input an Action sees from the agent loop. */
export const PurposeInput = z.object({
    purpose: z.string().describe("A clear, specific explanation of what the tool should accomplish"),
});
export type PurposeInput = z.infer<typeof PurposeInput>;

export const ToolChoice = z.object({
    tool_name: z.string().describe("The name of the tool to run"),
    purpose: z.string().describe("A clear, specific explanation of what the tool should accomplish"),
});
export type ToolChoice = z.infer<typeof ToolChoice>;

export const ToolDecision = z.object({
    reasoning: z
        .string()
        .describe("A step-by-step analysis of the current state, what has been done, and what should be done next"),
    choices: z.array(ToolChoice).describe("The tool calls to run in parallel, each with its specific purpose"),
});
export type ToolDecision = z.infer<typeof ToolDecision>;

export const TOOL_NAME_PATH = "properties/choices/items/properties/tool_name";

/**
 * The ToolDecision schema with every `tool_name` restricted to `labels`, so a
 * strict structured-output provider cannot name a tool outside the toolkit.
 */
export function buildToolDecisionSchema(labels: readonly string[]): JsonObject {
    return constrainEnum(
        jsonSchemaFromZod(ToolDecision, "ToolDecision"),
        TOOL_NAME_PATH,
        labels,
        "The name of the tool to run from the available toolkit.",
    );
}
