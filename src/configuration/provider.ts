/**
 * Guild configuration providers.
 * Purpose: read/write per-guild configuration slices (features, temp channels)
 * without exposing where they live.
 *
 * Nothing survives a restart: the bot keeps no state between processes, so the
 * only provider is the in-memory one.
 */

export interface ConfigProvider {
    getConfig(guildId: string, key: string): Promise<Record<string, unknown>>;
    setConfig(guildId: string, key: string, partial: Record<string, unknown>): Promise<void>;
}

/**
 * In-memory implementation of the ConfigProvider.
 */
export class MemoryGuildConfigProvider implements ConfigProvider {
    private readonly slices = new Map<string, Record<string, unknown>>();

    private slot(guildId: string, key: string): string {
        return `${guildId}:${key}`;
    }

    async getConfig(guildId: string, key: string): Promise<Record<string, unknown>> {
        const stored = this.slices.get(this.slot(guildId, key));
        return stored ? { ...stored } : {};
    }

    async setConfig(guildId: string, key: string, partial: Record<string, unknown>): Promise<void> {
        const current = this.slices.get(this.slot(guildId, key)) ?? {};
        const next = { ...current };
        for (const [subKey, value] of Object.entries(partial)) {
            if (value === undefined) continue;
            next[subKey] = value;
        }
        this.slices.set(this.slot(guildId, key), next);
    }
}
