/**
 * LLM Client — Thin wrapper around the Vercel AI SDK.
 *
 * The Vercel AI SDK (`ai` package) provides:
 *  - Provider-agnostic model interface (OpenAI, Anthropic, Google, local)
 *  - `generateObject()` with strict structured output against a JSON Schema
 *  - Token usage tracking
 *
 * Modules depend on the `StructuredOutputModel` interface only, so tests (and
 * other transports) can stand in for the SDK.
 */
import type { LanguageModel } from "ai";
import { generateObject, jsonSchema } from "ai";
import type { JSONSchema7 } from "json-schema";
import { SchemaValidationError } from "../errors/index.js";
import { JsonObjectSchema } from "../core/json.js";
import type { JsonObject } from "../core/json.js";
import { validatePayload } from "../core/validation.js";

/** Options for an LLM generation request. */
export interface GenerateOptions {
    temperature?: number;
    frequencyPenalty?: number;
}

/** Result of a structured object generation. */
export interface ObjectResult<T> {
    object: T;
    tokenUsage: number;
}

/**
 * The structured-output contract the engine relies on: the returned object
 * validates against `schema` (provider strict mode).
 */
export interface StructuredOutputModel {
    generateObject(
        schema: JsonObject,
        system: string,
        prompt: string,
        options?: GenerateOptions,
    ): Promise<ObjectResult<JsonObject>>;
}

function isObjectSchema(schema: JsonObject): schema is JsonObject & JSONSchema7 {
    return schema.type === "object" && (schema.properties === undefined || typeof schema.properties === "object");
}

/**
 * Framework LLM client — wraps Vercel AI SDK's generateObject.
 * Modules hold a reference to a StructuredOutputModel and call it per step.
 */
export class LLMClient implements StructuredOutputModel {
    public readonly model: LanguageModel;

    constructor(model: LanguageModel) {
        this.model = model;
    }

    /**
     * Generate a structured object validated against a JSON Schema.
     * The SDK validates the response through the same validator the engine
     * uses for DataValues, so `$defs` references resolve identically.
     */
    async generateObject(
        schema: JsonObject,
        system: string,
        prompt: string,
        options?: GenerateOptions,
    ): Promise<ObjectResult<JsonObject>> {
        if (!isObjectSchema(schema)) {
            throw new SchemaValidationError(String(schema.title ?? "output"), ["structured output requires an object schema"]);
        }

        const result = await generateObject({
            model: this.model,
            schema: jsonSchema<JsonObject>(schema, {
                validate: (value) => {
                    const parsed = JsonObjectSchema.safeParse(value);
                    if (!parsed.success) {
                        const issues = parsed.error.issues.map((issue) => issue.message);
                        return { success: false, error: new SchemaValidationError("output", issues) };
                    }
                    const errors = validatePayload(schema, parsed.data);
                    return errors.length === 0
                        ? { success: true, value: parsed.data }
                        : { success: false, error: new SchemaValidationError("output", errors) };
                },
            }),
            system,
            prompt,
            temperature: options?.temperature ?? 0.7,
            frequencyPenalty: options?.frequencyPenalty ?? 0.0,
        });

        return {
            object: result.object,
            tokenUsage: result.usage.totalTokens ?? 0,
        };
    }
}
