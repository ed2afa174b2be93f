/**
 * Traceable wrappers around the value algebra, so `concat`, `logicalAnd` and
 * `logicalOr` can be recorded as graph nodes.
 */
import { concat, logicalAnd, logicalOr } from "../core/algebra.js";
import type { AlgebraOptions } from "../core/algebra.js";
import type { JsonObject } from "../core/json.js";
import { resolveName } from "../core/names.js";
import type { NameScope } from "../core/names.js";
import type { Mode, Module, Variable } from "../core/operation.js";
import type { DataValue, SchemaValue } from "../core/values.js";
import { GraphError } from "../errors/index.js";

export interface AlgebraOpOptions {
    name?: string;
    names?: NameScope;
    maxRenameAttempts?: number;
}

type BinaryKind = "concat" | "logical_and" | "logical_or";

abstract class BinaryOp implements Module {
    public abstract readonly kind: BinaryKind;
    public readonly name: string;
    public readonly description: string;
    public readonly trainable = false;
    public readonly maxRenameAttempts: number | undefined;

    constructor(kind: BinaryKind, description: string, opts: AlgebraOpOptions) {
        this.name = resolveName(kind, opts.name, opts.names);
        this.description = description;
        this.maxRenameAttempts = opts.maxRenameAttempts;
    }

    protected options(): AlgebraOptions {
        return { name: this.name, maxRenameAttempts: this.maxRenameAttempts };
    }

    shapeOf(inputs: readonly SchemaValue[]): SchemaValue[] {
        if (inputs.length !== 2) {
            throw new GraphError(`"${this.name}" takes exactly two inputs, received ${inputs.length}.`);
        }
        return [concat(inputs[0], inputs[1], this.options())];
    }

    abstract apply(x1: DataValue | null, x2: DataValue | null): DataValue | null;

    async transform(inputs: readonly (DataValue | null)[], _mode: Mode): Promise<(DataValue | null)[]> {
        if (inputs.length !== 2) {
            throw new GraphError(`"${this.name}" takes exactly two inputs, received ${inputs.length}.`);
        }
        return [this.apply(inputs[0], inputs[1])];
    }

    submodules(): Module[] {
        return [];
    }

    ownVariables(): readonly Variable[] {
        return [];
    }

    getConfig(): JsonObject {
        const config: JsonObject = { name: this.name };
        if (this.maxRenameAttempts !== undefined) config.max_rename_attempts = this.maxRenameAttempts;
        return config;
    }
}

/** Merge both inputs; fails when either is absent. */
export class Concat extends BinaryOp {
    public readonly kind = "concat";

    constructor(opts: AlgebraOpOptions = {}) {
        super("concat", "Concatenate two values.", opts);
    }

    apply(x1: DataValue | null, x2: DataValue | null): DataValue {
        return concat(x1, x2, this.options());
    }
}

/** Merge both inputs, or null when either is absent. */
export class LogicalAnd extends BinaryOp {
    public readonly kind = "logical_and";

    constructor(opts: AlgebraOpOptions = {}) {
        super("logical_and", "Concatenate two values when both are present.", opts);
    }

    apply(x1: DataValue | null, x2: DataValue | null): DataValue | null {
        return logicalAnd(x1, x2, this.options());
    }
}

/** Merge both inputs, or pass through whichever is present. */
export class LogicalOr extends BinaryOp {
    public readonly kind = "logical_or";

    constructor(opts: AlgebraOpOptions = {}) {
        super("logical_or", "Concatenate two values, or keep the one that is present.", opts);
    }

    apply(x1: DataValue | null, x2: DataValue | null): DataValue | null {
        return logicalOr(x1, x2, this.options());
    }
}
