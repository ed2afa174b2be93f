/**
 * Value Algebra — concatenation, logical AND and logical OR over values.
 *
 * Truth table (`none` is null or undefined):
 *
 * | x1   | x2   | concat          | logicalAnd | logicalOr  |
 * | ---- | ---- | --------------- | ---------- | ---------- |
 * | v1   | v2   | merge(v1, v2)   | merge      | merge      |
 * | v1   | none | throws          | none       | v1         |
 * | none | v2   | throws          | none       | v2         |
 * | none | none | throws          | none       | none       |
 *
 * When either operand is a SchemaValue the result is a SchemaValue; two
 * DataValues produce a DataValue whose payload is renamed in lock-step with
 * its schema.
 */
import { InvalidCombinationError, SchemaMergeConflictError } from "../errors/index.js";
import { cloneJson, isJsonObject, jsonEquals } from "./json.js";
import type { JsonObject, JsonValue } from "./json.js";
import { DataValue, SchemaValue, normalizeDefinitions } from "./values.js";
import type { Maybe, Value } from "./values.js";

export const DEFAULT_MAX_RENAME_ATTEMPTS = 100;

export interface AlgebraOptions {
    /** Name of the resulting value. Defaults to the first operand's name. */
    name?: string;
    /** Upper bound on `_N` suffixes tried before a merge conflict is reported. */
    maxRenameAttempts?: number;
}

export interface SchemaMerge {
    schema: JsonObject;
    /** Second-operand property renames (original → merged name). */
    renames: Map<string, string>;
}

function objectField(schema: JsonObject, key: string): JsonObject {
    const field = schema[key];
    return isJsonObject(field) ? field : {};
}

function stringList(value: JsonValue | undefined): string[] {
    if (!Array.isArray(value)) return [];
    return value.filter((item): item is string => typeof item === "string");
}

function freeName(base: string, taken: Set<string>, maxAttempts: number): string {
    for (let i = 1; i <= maxAttempts; i++) {
        const candidate = `${base}_${i}`;
        if (!taken.has(candidate)) return candidate;
    }
    throw new SchemaMergeConflictError(base, maxAttempts);
}

function rewriteRefs(value: JsonValue, defRenames: Map<string, string>): JsonValue {
    if (defRenames.size === 0) return cloneJson(value);
    if (Array.isArray(value)) return value.map((item) => rewriteRefs(item, defRenames));
    if (!isJsonObject(value)) return value;

    const out: JsonObject = {};
    for (const [key, child] of Object.entries(value)) {
        if (key === "$ref" && typeof child === "string" && child.startsWith("#/$defs/")) {
            const target = child.slice("#/$defs/".length);
            const renamed = defRenames.get(target);
            out[key] = renamed ? `#/$defs/${renamed}` : child;
        } else {
            out[key] = rewriteRefs(child, defRenames);
        }
    }
    return out;
}

/**
 * Union two object schemas. Colliding properties and differing `$defs`
 * entries of `b` receive the first free `_1`, `_2`, … suffix. Draft-07
 * `definitions` tables are folded into `$defs` first.
 */
export function mergeSchemas(
    a: JsonObject,
    b: JsonObject,
    maxAttempts: number = DEFAULT_MAX_RENAME_ATTEMPTS,
): SchemaMerge {
    a = normalizeDefinitions(a);
    b = normalizeDefinitions(b);

    // Definitions first, so property schemas can have their $refs rewritten.
    const aDefs = objectField(a, "$defs");
    const bDefs = objectField(b, "$defs");
    const defs: JsonObject = cloneJson(aDefs);
    const defRenames = new Map<string, string>();
    const takenDefs = new Set([...Object.keys(aDefs), ...Object.keys(bDefs)]);
    for (const [key, definition] of Object.entries(bDefs)) {
        if (key in aDefs && !jsonEquals(aDefs[key], definition)) {
            const renamed = freeName(key, takenDefs, maxAttempts);
            takenDefs.add(renamed);
            defRenames.set(key, renamed);
        }
    }
    for (const [key, definition] of Object.entries(bDefs)) {
        const target = defRenames.get(key) ?? key;
        if (!(target in defs)) defs[target] = rewriteRefs(definition, defRenames);
    }

    const aProps = objectField(a, "properties");
    const bProps = objectField(b, "properties");
    const properties: JsonObject = cloneJson(aProps);
    const renames = new Map<string, string>();
    const taken = new Set([...Object.keys(aProps), ...Object.keys(bProps)]);
    for (const [key, property] of Object.entries(bProps)) {
        let target = key;
        if (key in aProps) {
            target = freeName(key, taken, maxAttempts);
            taken.add(target);
        }
        renames.set(key, target);
        properties[target] = rewriteRefs(property, defRenames);
    }

    const required: string[] = [];
    for (const name of [...stringList(a.required), ...stringList(b.required).map((key) => renames.get(key) ?? key)]) {
        if (!required.includes(name)) required.push(name);
    }

    const rest: JsonObject = {};
    for (const [key, value] of Object.entries(a)) {
        if (key !== "$defs" && key !== "properties" && key !== "required") rest[key] = cloneJson(value);
    }
    const schema: JsonObject = Object.keys(defs).length > 0 ? { $defs: defs, ...rest } : rest;
    schema.type = "object";
    schema.properties = properties;
    schema.required = required;
    return { schema, renames };
}

/**
 * Apply a schema merge's renames to the second payload and union both.
 * A value is never overwritten: undeclared keys that collide move to the
 * next free `_N` name, as does an undeclared key of `a` that a declared
 * property of `b` now occupies.
 */
export function mergePayloads(
    a: JsonObject,
    b: JsonObject,
    renames: Map<string, string>,
    maxAttempts: number = DEFAULT_MAX_RENAME_ATTEMPTS,
): JsonObject {
    const merged: JsonObject = cloneJson(a);
    const taken = new Set([...Object.keys(a), ...Object.keys(b), ...renames.values()]);
    const undeclared: [string, JsonValue][] = [];
    for (const [key, value] of Object.entries(b)) {
        const target = renames.get(key);
        if (target === undefined) {
            undeclared.push([key, value]);
            continue;
        }
        if (target in merged) {
            const moved = freeName(target, taken, maxAttempts);
            taken.add(moved);
            merged[moved] = merged[target];
        }
        merged[target] = cloneJson(value);
    }
    for (const [key, value] of undeclared) {
        const target = key in merged ? freeName(key, taken, maxAttempts) : key;
        taken.add(target);
        merged[target] = cloneJson(value);
    }
    return merged;
}

function merge(x1: Value, x2: Value, options: AlgebraOptions): Value {
    const maxAttempts = options.maxRenameAttempts ?? DEFAULT_MAX_RENAME_ATTEMPTS;
    const name = options.name ?? x1.name;
    const { schema, renames } = mergeSchemas(x1.schema, x2.schema, maxAttempts);
    if (x1 instanceof DataValue && x2 instanceof DataValue) {
        return DataValue.from(name, schema, mergePayloads(x1.payload, x2.payload, renames, maxAttempts));
    }
    return SchemaValue.from(name, schema);
}

/**
 * Concatenate two values. Both operands must be present.
 */
export function concat(x1: Maybe<DataValue>, x2: Maybe<DataValue>, options?: AlgebraOptions): DataValue;
export function concat(x1: SchemaValue, x2: Maybe<Value>, options?: AlgebraOptions): SchemaValue;
export function concat(x1: Maybe<Value>, x2: SchemaValue, options?: AlgebraOptions): SchemaValue;
export function concat(x1: Maybe<Value>, x2: Maybe<Value>, options?: AlgebraOptions): Value;
export function concat(x1: Maybe<Value>, x2: Maybe<Value>, options: AlgebraOptions = {}): Value {
    if (!x1 || !x2) throw new InvalidCombinationError("concat");
    return merge(x1, x2, options);
}

/**
 * Logical AND: the concatenation when both are present, otherwise none.
 */
export function logicalAnd(x1: Maybe<DataValue>, x2: Maybe<DataValue>, options?: AlgebraOptions): DataValue | null;
export function logicalAnd(x1: Maybe<Value>, x2: Maybe<Value>, options?: AlgebraOptions): Value | null;
export function logicalAnd(x1: Maybe<Value>, x2: Maybe<Value>, options: AlgebraOptions = {}): Value | null {
    if (!x1 || !x2) return null;
    return merge(x1, x2, options);
}

/**
 * Logical OR: the concatenation when both are present, otherwise whichever
 * operand is present (or none).
 */
export function logicalOr(x1: Maybe<DataValue>, x2: Maybe<DataValue>, options?: AlgebraOptions): DataValue | null;
export function logicalOr(x1: Maybe<Value>, x2: Maybe<Value>, options?: AlgebraOptions): Value | null;
export function logicalOr(x1: Maybe<Value>, x2: Maybe<Value>, options: AlgebraOptions = {}): Value | null {
    if (x1 && x2) return merge(x1, x2, options);
    return x1 ?? x2 ?? null;
}

/** Left fold of `concat` over one or more values. */
export function concatAll(values: readonly Maybe<DataValue>[], options?: AlgebraOptions): DataValue;
export function concatAll(values: readonly SchemaValue[], options?: AlgebraOptions): SchemaValue;
export function concatAll(values: readonly Maybe<Value>[], options?: AlgebraOptions): Value;
export function concatAll(values: readonly Maybe<Value>[], options: AlgebraOptions = {}): Value {
    const [first, ...rest] = values;
    if (!first) throw new InvalidCombinationError("concat");
    return rest.reduce<Value>((acc, value) => concat(acc, value, options), first);
}
