/**
 * Dynamic Schema Mutator — constrain schema properties to a label set.
 *
 * The rewritten schema is meant for strict structured output: once a property
 * is a `$ref` to a string enum, a compliant provider cannot emit any other
 * label. The input schema is never touched; every call works on a deep copy.
 */
import { cloneJson, isJsonObject } from "./json.js";
import type { JsonObject } from "./json.js";

/** Naive English singular: `choices` → `choice`, `categories` → `category`. */
export function toSingular(word: string): string {
    if (/ies$/i.test(word) && word.length > 3) return `${word.slice(0, -3)}y`;
    if (/(ss|us|is)$/i.test(word)) return word;
    if (/(ch|sh|x|z)es$/i.test(word)) return word.slice(0, -2);
    if (/s$/i.test(word)) return word.slice(0, -1);
    return word;
}

/**
 * Definition key and title derived from a property name:
 * `tool_names` → key `ToolName`, title `Tool Name`.
 */
export function enumDefinitionName(property: string): { key: string; title: string } {
    const words = toSingular(property)
        .split(/[_\s-]+/)
        .filter((word) => word.length > 0)
        .map((word) => word.charAt(0).toUpperCase() + word.slice(1));
    return { key: words.join(""), title: words.join(" ") };
}

/** Deep copy with the `$defs` table moved (or created) at the front. */
function withDefinitions(schema: JsonObject): { root: JsonObject; defs: JsonObject } {
    const copy = cloneJson(schema);
    const defs = isJsonObject(copy.$defs) ? copy.$defs : {};
    delete copy.$defs;
    return { root: { $defs: defs, ...copy }, defs };
}

function enumDefinition(labels: readonly string[], title: string, description?: string): JsonObject {
    const definition: JsonObject = { enum: [...labels], title, type: "string" };
    if (description) definition.description = description;
    return definition;
}

function splitPath(propertyPath: string): string[] {
    const segments = propertyPath.split("/").filter((segment) => segment.length > 0);
    if (segments.length === 0) throw new Error("Property path must contain at least one segment.");
    return segments;
}

/**
 * Constrain the value at `propertyPath` to one of `labels`.
 *
 * The path is slash-separated and walked from the schema root, segment by
 * segment (`properties/choices/items/properties/tool_name`); missing
 * intermediate containers are created. The final segment is replaced by a
 * `$ref` to a new string-enum definition in the top-level `$defs`.
 */
export function constrainEnum(
    schema: JsonObject,
    propertyPath: string,
    labels: readonly string[],
    description?: string,
): JsonObject {
    const segments = splitPath(propertyPath);
    const last = segments[segments.length - 1];
    const { root, defs } = withDefinitions(schema);
    const { key, title } = enumDefinitionName(last);
    defs[key] = enumDefinition(labels, title, description);

    let current = root;
    for (const segment of segments.slice(0, -1)) {
        const next = current[segment];
        if (isJsonObject(next)) {
            current = next;
        } else {
            const created: JsonObject = {};
            current[segment] = created;
            current = created;
        }
    }
    current[last] = { $ref: `#/$defs/${key}` };
    return root;
}

/**
 * Constrain the items of the top-level array property `property` to
 * `labels`, without repetition. Existing title/description are kept.
 */
export function constrainEnumList(
    schema: JsonObject,
    property: string,
    labels: readonly string[],
    description?: string,
): JsonObject {
    const { root, defs } = withDefinitions(schema);
    const { key, title } = enumDefinitionName(property);
    defs[key] = enumDefinition(labels, title, description);

    const properties = isJsonObject(root.properties) ? root.properties : {};
    root.properties = properties;
    const existing = properties[property];
    const target: JsonObject = isJsonObject(existing) ? existing : {};
    target.type = "array";
    target.items = { $ref: `#/$defs/${key}` };
    target.uniqueItems = true;
    target.title ??= title;
    properties[property] = target;
    return root;
}
