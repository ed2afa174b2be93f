import * as p from "@clack/prompts";
import chalk from "chalk";
import ora from "ora";
import { z } from "zod/v4";
import {
    API_KEY_VARIABLES,
    DataValue,
    LLMClient,
    ReActAgent,
    hasApiKey,
    loadConfig,
    resolveLanguageModel,
    resolveModelSelection,
} from "../../index.js";
import type { LlmProvider } from "../../index.js";
import { demoToolkit } from "../toolkit.js";

interface AgentOptions {
    query: string;
    provider?: string;
    model?: string;
    maxIterations?: string;
    config?: string;
}

const Query = z.object({
    query: z.string().describe("The user query"),
});

const FinalAnswer = z.object({
    answer: z.string().describe("The final answer to the user query"),
});

function ensureApiKeyPresent(provider: LlmProvider): void {
    if (!hasApiKey(provider)) {
        throw new Error(`No API key for ${provider}. Set ${API_KEY_VARIABLES[provider]}.`);
    }
}

export async function agentCommand(options: AgentOptions) {
    p.intro(chalk.bgMagenta.black(" structflow - ReAct Agent "));

    try {
        const config = await loadConfig(options.config);
        const selection = resolveModelSelection({
            provider: options.provider ?? config.provider,
            model: options.model ?? config.model,
        });
        ensureApiKeyPresent(selection.provider);

        const maxIterations = options.maxIterations ? Number(options.maxIterations) : config.max_iterations;
        if (!Number.isInteger(maxIterations) || maxIterations < 1) {
            throw new Error(`Invalid --max-iterations value: ${options.maxIterations}`);
        }

        const llmClient = new LLMClient(resolveLanguageModel(selection));
        const agent = ReActAgent.fromConfig(
            { ...config, max_iterations: maxIterations },
            {
                schema: FinalAnswer,
                tools: demoToolkit,
                model: llmClient,
                name: "demo_agent",
                description: "An agent that can calculate and count words.",
            },
        );

        const spinner = ora("Thinking...").start();
        agent.on("agent:decision", ({ iteration, choices }) => {
            const tools = choices.map((choice) => choice.tool_name).join(", ");
            spinner.text = choices.length > 0 ? `Round ${iteration}: running ${tools}` : `Round ${iteration}: answering`;
        });
        agent.on("agent:round", ({ iteration, tools, durationMs }) => {
            spinner.info(chalk.blue(`Round ${iteration}: ${tools.join(", ")} (${Math.round(durationMs)}ms)`));
            spinner.start("Thinking...");
        });
        agent.on("agent:finish", ({ iterations, reason }) => {
            spinner.text = `Writing the answer after ${iterations} round(s) (${reason})...`;
        });

        try {
            const input = DataValue.fromZod("query", Query, { query: options.query });
            const answer = await agent.run(input);
            spinner.succeed(chalk.green("Agent finished."));
            p.log.message(answer.prettify());
            p.outro("Done.");
        } catch (err) {
            spinner.fail(chalk.red("Agent failed."));
            throw err;
        }
    } catch (err) {
        p.log.error(chalk.red("Agent error:"));
        p.log.error(err instanceof Error ? err.message : String(err));
        process.exit(1);
    }
}
