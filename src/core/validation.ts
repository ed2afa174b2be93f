/**
 * JSON Schema validation for payloads.
 *
 * Ajv runs in non-strict mode so that descriptive keywords emitted by zod or
 * written by hand (title, description, custom annotations) are tolerated.
 * Draft-07 with `$defs` references is the dialect used throughout the engine.
 */
import { Ajv } from "ajv";
import type { ValidateFunction } from "ajv";
import type { JsonObject, JsonValue } from "./json.js";

const ajv = new Ajv({ allErrors: true, strict: false });
const compiled = new WeakMap<JsonObject, ValidateFunction>();

function compile(schema: JsonObject): ValidateFunction {
    let validate = compiled.get(schema);
    if (!validate) {
        validate = ajv.compile(schema);
        compiled.set(schema, validate);
    }
    return validate;
}

/**
 * Validate `payload` against `schema`.
 * Returns one message per violation; an empty list means the payload conforms.
 */
export function validatePayload(schema: JsonObject, payload: JsonValue): string[] {
    const validate = compile(schema);
    if (validate(payload)) return [];
    return (validate.errors ?? []).map((error) => {
        const location = error.instancePath === "" ? "/" : error.instancePath;
        return `${location} ${error.message ?? "is invalid"}`;
    });
}
