/**
 * Naming registry — deterministic unique names for modules, nodes and values.
 *
 * Scopes are plain objects handed to whoever needs names, so two traces (or two
 * tests) never share counters unless they share a scope.
 */

/** Convert `LogicalAnd` / `logical-and` / `Logical And` to `logical_and`. */
export function toSnakeCase(value: string): string {
    return value
        .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
        .replace(/([A-Z]+)([A-Z][a-z])/g, "$1_$2")
        .replace(/[^a-zA-Z0-9]+/g, "_")
        .replace(/^_+|_+$/g, "")
        .toLowerCase();
}

export class NameScope {
    public readonly prefix: string;
    private counters = new Map<string, number>();
    private issued = new Set<string>();

    constructor(prefix: string = "") {
        this.prefix = prefix;
    }

    /**
     * Reserve a unique name: the first request for `base` returns it unchanged,
     * later requests return `base_1`, `base_2`, … skipping any name this scope
     * has already issued.
     */
    unique(base: string): string {
        const qualified = this.prefix ? `${this.prefix}/${base}` : base;
        let count = this.counters.get(qualified) ?? 0;
        let candidate = count === 0 ? qualified : `${qualified}_${count}`;
        while (this.issued.has(candidate)) {
            count += 1;
            candidate = `${qualified}_${count}`;
        }
        this.counters.set(qualified, count + 1);
        this.issued.add(candidate);
        return candidate;
    }

    /** A fresh scope whose names are prefixed with `prefix/`. */
    child(prefix: string): NameScope {
        return new NameScope(this.prefix ? `${this.prefix}/${prefix}` : prefix);
    }

    /** Run `fn` with a child scope. */
    scoped<T>(prefix: string, fn: (scope: NameScope) => T): T {
        return fn(this.child(prefix));
    }

    reset(): void {
        this.counters.clear();
        this.issued.clear();
    }
}

/**
 * Default scope used when a module is built without an explicit name or scope.
 * Tests reset it between cases.
 */
export const defaultNameScope = new NameScope();

/** Resolve a module name from an explicit name or the given scope. */
export function resolveName(kind: string, name?: string, names: NameScope = defaultNameScope): string {
    return name ?? names.unique(toSnakeCase(kind));
}
