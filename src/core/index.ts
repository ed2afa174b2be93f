export type { JsonPrimitive, JsonValue, JsonArray, JsonObject } from "./json.js";
export { JsonValueSchema, JsonObjectSchema, isJsonObject, cloneJson, jsonEquals } from "./json.js";
export { validatePayload } from "./validation.js";
export { SchemaValue, DataValue, jsonSchemaFromZod, schemaProperties } from "./values.js";
export type { Value, Maybe } from "./values.js";
export {
    concat,
    logicalAnd,
    logicalOr,
    concatAll,
    mergeSchemas,
    mergePayloads,
    DEFAULT_MAX_RENAME_ATTEMPTS,
} from "./algebra.js";
export type { AlgebraOptions, SchemaMerge } from "./algebra.js";
export { NameScope, defaultNameScope, resolveName, toSnakeCase } from "./names.js";
export { Variable, isModule, invoke, invokeMany, collectVariables, trainableVariables } from "./operation.js";
export type { Mode, Operation, Module } from "./operation.js";
export { Trace } from "./trace.js";
export type { TraceInput, TraceNode, TraceOptions } from "./trace.js";
export { Program } from "./program.js";
export type { ProgramEvents, ProgramOptions } from "./program.js";
export { constrainEnum, constrainEnumList, enumDefinitionName, toSingular } from "./mutator.js";
export { ModuleRegistry, SerializedModule, serializeModule } from "./registry.js";
export type { ModuleFactory } from "./registry.js";
