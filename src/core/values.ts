/**
 * Schema Values and Data Values — the units that flow along graph edges.
 *
 * A SchemaValue is a named JSON Schema with no data: it is what flows through
 * operations while a graph is traced. A DataValue pairs a schema with a concrete
 * JSON payload: it is what flows through a compiled Program at call time.
 * Both are frozen on construction; every algebra operation returns a new value.
 */
import { z } from "zod/v4";
import { SchemaValidationError } from "../errors/index.js";
import { JsonObjectSchema, cloneJson, freezeJson, isJsonObject } from "./json.js";
import type { JsonObject, JsonValue } from "./json.js";
import { validatePayload } from "./validation.js";

/**
 * Convert a zod schema to a draft-07 JSON Schema object.
 * The `$schema` marker is dropped so schemas stay comparable after merging.
 */
export function jsonSchemaFromZod(model: z.ZodType, title?: string): JsonObject {
    const schema = normalizeDefinitions(JsonObjectSchema.parse(z.toJSONSchema(model, { target: "draft-7" })));
    delete schema.$schema;
    if (!title) return schema;
    const { $defs, ...rest } = schema;
    return $defs === undefined ? { title, ...rest } : { $defs, title, ...rest };
}

const LEGACY_REF = "#/definitions/";

function rewriteLegacyRefs(value: JsonValue): JsonValue {
    if (Array.isArray(value)) return value.map(rewriteLegacyRefs);
    if (!isJsonObject(value)) return value;
    const out: JsonObject = {};
    for (const [key, child] of Object.entries(value)) {
        out[key] =
            key === "$ref" && typeof child === "string" && child.startsWith(LEGACY_REF)
                ? `#/$defs/${child.slice(LEGACY_REF.length)}`
                : rewriteLegacyRefs(child);
    }
    return out;
}

/**
 * Move a draft-07 `definitions` table into `$defs` (placed first) and point
 * every `#/definitions/` reference at it. Entries already in `$defs` win.
 */
export function normalizeDefinitions(schema: JsonObject): JsonObject {
    const legacy = schema.definitions;
    if (!isJsonObject(legacy)) return cloneJson(schema);

    const rewritten = rewriteLegacyRefs(schema);
    if (!isJsonObject(rewritten)) return cloneJson(schema);
    const { definitions, $defs, ...rest } = rewritten;
    const defs: JsonObject = isJsonObject(definitions) ? { ...definitions } : {};
    if (isJsonObject($defs)) Object.assign(defs, $defs);
    return { $defs: defs, ...rest };
}

/** Property names declared by an object schema, in declaration order. */
export function schemaProperties(schema: JsonObject): string[] {
    return isJsonObject(schema.properties) ? Object.keys(schema.properties) : [];
}

export class SchemaValue {
    public readonly kind = "schema" as const;
    public readonly name: string;
    public readonly schema: JsonObject;

    private constructor(name: string, schema: JsonObject) {
        this.name = name;
        this.schema = freezeJson(cloneJson(schema));
        Object.freeze(this);
    }

    static from(name: string, schema: JsonObject): SchemaValue {
        return new SchemaValue(name, schema);
    }

    static fromZod(name: string, model: z.ZodObject): SchemaValue {
        return new SchemaValue(name, jsonSchemaFromZod(model, name));
    }

    withName(name: string): SchemaValue {
        return new SchemaValue(name, this.schema);
    }

    properties(): string[] {
        return schemaProperties(this.schema);
    }

    prettify(): string {
        return JSON.stringify(this.schema, null, 2);
    }
}

export class DataValue {
    public readonly kind = "data" as const;
    public readonly name: string;
    public readonly schema: JsonObject;
    public readonly payload: JsonObject;

    private constructor(name: string, schema: JsonObject, payload: JsonObject) {
        this.name = name;
        this.schema = freezeJson(cloneJson(schema));
        this.payload = freezeJson(cloneJson(payload));
        Object.freeze(this);
    }

    /** Pair a schema with a payload the caller vouches for. */
    static from(name: string, schema: JsonObject, payload: JsonObject): DataValue {
        return new DataValue(name, schema, payload);
    }

    /** Pair a schema with a payload, rejecting payloads that do not conform. */
    static validated(name: string, schema: JsonObject, payload: JsonObject): DataValue {
        const errors = validatePayload(schema, payload);
        if (errors.length > 0) throw new SchemaValidationError(name, errors);
        return new DataValue(name, schema, payload);
    }

    /** Parse `payload` with a zod object and derive the schema from it. */
    static fromZod(name: string, model: z.ZodObject, payload: unknown): DataValue {
        const parsed = JsonObjectSchema.parse(model.parse(payload));
        return new DataValue(name, jsonSchemaFromZod(model, name), parsed);
    }

    get(key: string): JsonValue | undefined {
        return this.payload[key];
    }

    schemaValue(): SchemaValue {
        return SchemaValue.from(this.name, this.schema);
    }

    withName(name: string): DataValue {
        return new DataValue(name, this.schema, this.payload);
    }

    properties(): string[] {
        return schemaProperties(this.schema);
    }

    toJSON(): JsonObject {
        return cloneJson(this.payload);
    }

    prettify(): string {
        return JSON.stringify(this.payload, null, 2);
    }
}

export type Value = SchemaValue | DataValue;

/** An absent operand: the engine's "none". */
export type Maybe<T> = T | null | undefined;
