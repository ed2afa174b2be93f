import * as p from "@clack/prompts";
import chalk from "chalk";
import { constrainEnum, jsonSchemaFromZod, ToolDecision, TOOL_NAME_PATH } from "../../index.js";

interface SchemaOptions {
    labels: string;
    path?: string;
    description?: string;
}

/** Split a comma-separated label list, dropping blanks and duplicates. */
export function parseLabels(raw: string): string[] {
    const labels = raw
        .split(",")
        .map((label) => label.trim())
        .filter((label) => label.length > 0);
    return [...new Set(labels)];
}

export async function schemaCommand(options: SchemaOptions) {
    p.intro(chalk.bgCyan.black(" structflow - Constrained Schema "));

    const labels = parseLabels(options.labels);
    if (labels.length === 0) {
        p.log.error(chalk.red("Provide at least one label with --labels a,b,c"));
        process.exit(1);
    }

    const propertyPath = options.path ?? TOOL_NAME_PATH;
    const schema = constrainEnum(jsonSchemaFromZod(ToolDecision, "ToolDecision"), propertyPath, labels, options.description);

    p.log.step(`Constrained ${chalk.cyan(propertyPath)} to ${labels.map((label) => chalk.green(label)).join(", ")}`);
    console.log(JSON.stringify(schema, null, 2));
    p.outro("Done.");
}
