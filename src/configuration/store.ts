/**
 * Per-guild configuration store.
 *
 * Role in system:
 * - Reads slices through a ConfigProvider and applies the registered Zod schema
 *   (defaults + validation).
 *
 * Gotchas:
 * - `set` saves only the changed sub-keys, after validating the merged slice.
 */
import { type ConfigKey, type ConfigOf, isConfigDefined, parseConfig } from "./definitions";
import { type ConfigProvider, MemoryGuildConfigProvider } from "./provider";

export class ConfigStore {
    constructor(private readonly provider: ConfigProvider) { }

    async get<K extends ConfigKey>(guildId: string, key: K): Promise<ConfigOf<K>> {
        const raw = await this.provider.getConfig(guildId, key);
        // Zod fills defaults when the stored slice is empty.
        const result = parseConfig(key, raw);
        if (result === undefined) {
            throw new Error(`Config key '${key}' is not defined. Use defineConfig first.`);
        }
        return result;
    }

    async set<K extends ConfigKey>(
        guildId: string,
        key: K,
        partial: Partial<ConfigOf<K>> & Record<string, unknown>,
    ): Promise<ConfigOf<K>> {
        if (!isConfigDefined(key)) {
            throw new Error(`Config key '${key}' is not defined.`);
        }

        const current = await this.get(guildId, key);
        const merged: Record<string, unknown> = { ...current };
        for (const [subKey, value] of Object.entries(partial)) {
            if (value === undefined) continue;
            merged[subKey] = value;
        }

        // Validate the merged state before saving only the changes.
        const validated = parseConfig(key, merged);
        if (validated === undefined) {
            throw new Error(`Config key '${key}' is not defined.`);
        }

        await this.provider.setConfig(guildId, key, partial);
        return validated;
    }
}

// Global instance
export const configStore = new ConfigStore(new MemoryGuildConfigProvider());
