/**
 * Operation & Module contracts.
 *
 * An Operation turns input values into output values. Inside a Trace it is only
 * asked for the shape of its outputs (`shapeOf`); invoked directly with
 * DataValues it runs (`transform`). A Module is an Operation that owns state:
 * nested modules and Variables, plus a JSON config for persistence.
 */
import type { JsonObject } from "./json.js";
import { cloneJson } from "./json.js";
import type { DataValue, Maybe, SchemaValue } from "./values.js";

/** Threaded through every transform; only the external optimizer cares. */
export type Mode = "training" | "inference";

export interface Operation {
    readonly name: string;
    readonly description: string;
    /** Side-effect free: the output schemas for the given input schemas. */
    shapeOf(inputs: readonly SchemaValue[]): SchemaValue[];
    /** One entry per output; `null` marks an absent output. */
    transform(inputs: readonly (DataValue | null)[], mode: Mode): Promise<(DataValue | null)[]>;
}

export interface Module extends Operation {
    /** Registry key used to rebuild the module from its config. */
    readonly kind: string;
    readonly trainable: boolean;
    submodules(): readonly Module[];
    ownVariables(): readonly Variable[];
    getConfig(): JsonObject;
}

export function isModule(operation: Operation): operation is Module {
    return "kind" in operation && "submodules" in operation && "getConfig" in operation;
}

/**
 * Named JSON state owned by a module. The optimizer assigns few-shot examples
 * and instructions through it; modules read the value on every call.
 */
export class Variable {
    public readonly name: string;
    public readonly trainable: boolean;
    private current: JsonObject;

    constructor(name: string, initial: JsonObject, trainable: boolean = true) {
        this.name = name;
        this.trainable = trainable;
        this.current = cloneJson(initial);
    }

    get value(): JsonObject {
        return cloneJson(this.current);
    }

    assign(value: JsonObject): void {
        this.current = cloneJson(value);
    }
}

/** Every variable owned by `module` and its submodules, depth first. */
export function collectVariables(module: Module): Variable[] {
    const seen = new Set<Module>();
    const out: Variable[] = [];
    const visit = (current: Module): void => {
        if (seen.has(current)) return;
        seen.add(current);
        out.push(...current.ownVariables());
        for (const child of current.submodules()) visit(child);
    };
    visit(module);
    return out;
}

/** Variables an optimizer may update: trainable variables of trainable modules. */
export function trainableVariables(module: Module): Variable[] {
    const seen = new Set<Module>();
    const out: Variable[] = [];
    const visit = (current: Module): void => {
        if (seen.has(current) || !current.trainable) return;
        seen.add(current);
        out.push(...current.ownVariables().filter((variable) => variable.trainable));
        for (const child of current.submodules()) visit(child);
    };
    visit(module);
    return out;
}

/** Run an operation directly on concrete values and return all outputs. */
export async function invokeMany(
    operation: Operation,
    inputs: readonly Maybe<DataValue>[],
    mode: Mode = "inference",
): Promise<(DataValue | null)[]> {
    return operation.transform(inputs.map((input) => input ?? null), mode);
}

function isValueList(inputs: Maybe<DataValue> | readonly Maybe<DataValue>[]): inputs is readonly Maybe<DataValue>[] {
    return Array.isArray(inputs);
}

/** Run a single-output operation directly on concrete values. */
export async function invoke(
    operation: Operation,
    inputs: Maybe<DataValue> | readonly Maybe<DataValue>[],
    mode: Mode = "inference",
): Promise<DataValue | null> {
    const list = isValueList(inputs) ? inputs : [inputs];
    const [output] = await invokeMany(operation, list, mode);
    return output ?? null;
}
