/**
 * Demo toolkit used by `structflow agent`.
 */
import { z } from "zod/v4";
import { defineTool } from "../agents/tools.js";
import type { Tool } from "../agents/tools.js";

/**
 * Evaluate an arithmetic expression with `+ - * /`, unary minus and
 * parentheses. Grammar:
 *
 *   expr   := term (("+" | "-") term)*
 *   term   := factor (("*" | "/") factor)*
 *   factor := "-" factor | number | "(" expr ")"
 */
export function evaluateExpression(expression: string): number {
    const tokens = expression.match(/\d+(?:\.\d+)?|\.\d+|[()+\-*/]|\S/g) ?? [];
    let position = 0;

    const peek = (): string | undefined => tokens[position];
    const next = (): string | undefined => tokens[position++];

    const factor = (): number => {
        const token = next();
        if (token === "-") return -factor();
        if (token === "(") {
            const value = expr();
            if (next() !== ")") throw new Error("Missing closing parenthesis.");
            return value;
        }
        if (token !== undefined && /^(\d+(\.\d+)?|\.\d+)$/.test(token)) return Number(token);
        throw new Error(token === undefined ? "Unexpected end of expression." : `Unexpected token "${token}".`);
    };

    const term = (): number => {
        let value = factor();
        for (let op = peek(); op === "*" || op === "/"; op = peek()) {
            next();
            const right = factor();
            if (op === "/" && right === 0) throw new Error("Division by zero.");
            value = op === "*" ? value * right : value / right;
        }
        return value;
    };

    const expr = (): number => {
        let value = term();
        for (let op = peek(); op === "+" || op === "-"; op = peek()) {
            next();
            value = op === "+" ? value + term() : value - term();
        }
        return value;
    };

    const value = expr();
    if (position < tokens.length) throw new Error(`Unexpected token "${tokens[position]}".`);
    return value;
}

export const calculator: Tool = defineTool({
    name: "calculate",
    description: "Perform mathematical calculations.",
    parameters: z.object({
        expression: z
            .string()
            .describe("The expression to calculate, such as '2 + 2'. Numbers, + - * /, parentheses and spaces only."),
    }),
    execute: ({ expression }) => {
        try {
            return { result: Math.round(evaluateExpression(expression) * 100) / 100, log: "Successfully executed" };
        } catch (error) {
            return { result: null, log: `Error: ${error instanceof Error ? error.message : String(error)}` };
        }
    },
});

export const wordCounter: Tool = defineTool({
    name: "word_count",
    description: "Count the words of a text.",
    parameters: z.object({
        text: z.string().describe("The text whose words are counted."),
    }),
    execute: ({ text }) => {
        const words = text.split(/\s+/).filter((word) => word.length > 0);
        return { words: words.length };
    },
});

export const demoToolkit: Tool[] = [calculator, wordCounter];
