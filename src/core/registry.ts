/**
 * Module persistence — serialize a module to `{kind, config}` and rebuild it.
 *
 * Language models and tools are external collaborators: they never appear in
 * a config and are handed back through the deserialization context.
 */
import { z } from "zod/v4";
import { JsonObjectSchema } from "./json.js";
import type { JsonObject } from "./json.js";
import type { Module } from "./operation.js";

export const SerializedModule = z.object({
    kind: z.string().min(1),
    config: JsonObjectSchema,
});
export type SerializedModule = z.infer<typeof SerializedModule>;

export type ModuleFactory<C> = (config: JsonObject, context: C, registry: ModuleRegistry<C>) => Module;

export function serializeModule(module: Module): SerializedModule {
    return { kind: module.kind, config: module.getConfig() };
}

export class ModuleRegistry<C> {
    private factories = new Map<string, ModuleFactory<C>>();

    register(kind: string, factory: ModuleFactory<C>): this {
        if (this.factories.has(kind)) throw new Error(`Module kind "${kind}" is already registered.`);
        this.factories.set(kind, factory);
        return this;
    }

    has(kind: string): boolean {
        return this.factories.has(kind);
    }

    kinds(): string[] {
        return [...this.factories.keys()];
    }

    /** Rebuild a module from the output of `serializeModule`. */
    deserialize(serialized: unknown, context: C): Module {
        const { kind, config } = SerializedModule.parse(serialized);
        const factory = this.factories.get(kind);
        if (!factory) throw new Error(`No deserializer registered for module kind "${kind}".`);
        return factory(config, context, this);
    }
}
