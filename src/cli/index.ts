#!/usr/bin/env node

import dotenv from "dotenv";

// Silence dotenv 17+ console output
process.env.DOTENV_CONFIG_SILENT = "true";
dotenv.config();

import { Command } from "commander";
import { agentCommand, schemaCommand } from "./commands/index.js";

const program = new Command();

program
    .name("structflow")
    .description("Schema-typed graph execution and ReAct agents - CLI")
    .version("0.1.0");

program
    .command("schema")
    .description("Print a tool decision schema constrained to the given labels")
    .requiredOption("-l, --labels <labels>", "Comma-separated labels")
    .option("-p, --path <path>", "Slash-separated property path to constrain")
    .option("-d, --description <description>", "Description of the enum definition")
    .action(schemaCommand);

program
    .command("agent")
    .description("Run the demo calculator/word-count agent on a query")
    .requiredOption("-q, --query <query>", "The query to answer")
    .option("--provider <provider>", "LLM provider override (openai|google|anthropic)")
    .option("--model <model>", "LLM model override")
    .option("--max-iterations <number>", "Override the maximum number of rounds")
    .option("-c, --config <path>", "Path to an engine config JSON file")
    .action(agentCommand);

program.parse(process.argv);
