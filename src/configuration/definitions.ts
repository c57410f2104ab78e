/**
 * Config registry and typing contract for per-guild configuration.
 *
 * Role in system:
 * - Central runtime registry used by ConfigStore.
 * - Each config key is paired with a Zod schema that applies defaults.
 *
 * Key invariants:
 * - A ConfigKey should be registered once; if registered twice, last write wins.
 *
 * Gotchas:
 * - Registration is side-effectful; modules must be imported to participate
 *   (see ./register).
 */
import { z, type ZodType } from "zod";
import type { ConfigurableModule } from "./constants";

export { z };

// biome-ignore lint/suspicious/noEmptyInterface: Interface enables module augmentation per feature configs.
export interface ConfigDefinitions {
    // To be extended by module augmentations
}

export type ConfigKey = ConfigurableModule;
export type ConfigOf<K extends ConfigKey> = K extends keyof ConfigDefinitions ? ConfigDefinitions[K] : never;

export type ConfigDefinition<K extends ConfigKey = ConfigKey> = {
    key: K;
    schema: ZodType<ConfigOf<K>, z.ZodTypeDef, unknown>;
};

// WHY: keep schemas close to their domain modules without a centralized map.
const registry = new Map<ConfigKey, ZodType<unknown, z.ZodTypeDef, unknown>>();

/**
 * Register a config key with its schema.
 *
 * @returns The same schema for type inference at the call site.
 * @sideEffects Mutates the global registry.
 */
export function defineConfig<K extends ConfigKey, S extends ZodType<unknown, z.ZodTypeDef, unknown>>(
    key: K,
    schema: S,
): S {
    registry.set(key, schema);
    return schema;
}

/**
 * Parse a raw slice with the registered schema.
 *
 * @returns The parsed value, or undefined when the key was never registered.
 * @throws ZodError when the raw slice does not satisfy the schema.
 */
export function parseConfig<K extends ConfigKey>(key: K, raw: unknown): ConfigOf<K> | undefined {
    const schema = registry.get(key);
    if (!schema) return undefined;
    return schema.parse(raw) as ConfigOf<K>;
}

export function isConfigDefined(key: ConfigKey): boolean {
    return registry.has(key);
}
