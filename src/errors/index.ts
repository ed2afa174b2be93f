/**
 * Custom Error Classes — Framework-specific errors for deterministic error handling.
 *
 * Algebra errors surface immediately to the caller of the operator. Program
 * invocation wraps any node failure in a NodeExecutionError. The agent loop
 * treats a ToolExecutionError as fatal to the whole loop; nothing is retried here.
 */

/**
 * Thrown when `concat` receives an absent operand.
 * `logicalAnd` and `logicalOr` never throw this: they propagate absence instead.
 */
export class InvalidCombinationError extends Error {
    constructor(operation: string) {
        super(`Invalid combination: "${operation}" requires both operands to be present.`);
        this.name = "InvalidCombinationError";
    }
}

/**
 * Thrown when a colliding property or definition cannot be renamed within the
 * configured number of suffix attempts.
 */
export class SchemaMergeConflictError extends Error {
    public readonly property: string;
    public readonly attempts: number;

    constructor(property: string, attempts: number) {
        super(`Schema merge conflict: no free name for "${property}" after ${attempts} attempts.`);
        this.name = "SchemaMergeConflictError";
        this.property = property;
        this.attempts = attempts;
    }
}

/** Thrown when a payload does not conform to the schema it is paired with. */
export class SchemaValidationError extends Error {
    public readonly errors: string[];

    constructor(subject: string, errors: string[]) {
        super(`Schema validation failed for "${subject}": ${errors.join("; ")}`);
        this.name = "SchemaValidationError";
        this.errors = errors;
    }
}

/**
 * Thrown when a graph is traced, built or bound incorrectly
 * (foreign values, unreachable outputs, wrong input count).
 */
export class GraphError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "GraphError";
    }
}

/** Wraps any Operation failure raised while a Program is being invoked. */
export class NodeExecutionError extends Error {
    public readonly nodeName: string;

    constructor(nodeName: string, cause: unknown) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        super(`Node "${nodeName}" failed: ${reason}`, { cause });
        this.name = "NodeExecutionError";
        this.nodeName = nodeName;
    }
}

/**
 * Thrown when a decision references a tool outside the toolkit.
 * The constrained decision schema makes this unreachable with a compliant provider.
 */
export class UnknownToolError extends Error {
    public readonly toolName: string;
    public readonly available: readonly string[];

    constructor(toolName: string, available: readonly string[]) {
        super(`Unknown tool "${toolName}". Available tools: ${available.join(", ")}.`);
        this.name = "UnknownToolError";
        this.toolName = toolName;
        this.available = available;
    }
}

/** Thrown when a decision picks a label that is not one of the configured labels. */
export class UnknownLabelError extends Error {
    public readonly label: string;
    public readonly labels: readonly string[];

    constructor(label: string, labels: readonly string[]) {
        super(`Unknown label "${label}". Expected one of: ${labels.join(", ")}.`);
        this.name = "UnknownLabelError";
        this.label = label;
        this.labels = labels;
    }
}

/** Wraps a failing external tool call. */
export class ToolExecutionError extends Error {
    public readonly toolName: string;

    constructor(toolName: string, cause: unknown) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        super(`Tool "${toolName}" failed: ${reason}`, { cause });
        this.name = "ToolExecutionError";
        this.toolName = toolName;
    }
}

/** Thrown at construction time when an agent or module is misconfigured. */
export class AgentConfigurationError extends Error {
    constructor(reason: string) {
        super(`Invalid configuration: ${reason}`);
        this.name = "AgentConfigurationError";
    }
}
