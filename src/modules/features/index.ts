/**
 * Feature flags service.
 *
 * Role in system:
 * - Central API to read/write feature toggles for a guild.
 * - Used by the temp channel facade (creation gate) and the admin commands.
 *
 * Invariants:
 * - Stored config is partial; missing keys fall back to defaults (enabled).
 */
import { configStore, ConfigurableModule } from "@/configuration";

export enum Features {
  TempChannels = "tempChannels",
}

export type GuildFeaturesRecord = Record<Features, boolean>;

export const GUILD_FEATURES: readonly Features[] = Object.values(Features);

export const DEFAULT_GUILD_FEATURES: Readonly<GuildFeaturesRecord> = Object.freeze({
  [Features.TempChannels]: true,
});

/**
 * Read the full feature set for a guild.
 *
 * @returns Features with defaults applied.
 */
export async function getFeatureFlags(
  guildId: string,
): Promise<GuildFeaturesRecord> {
  const stored = await configStore.get(guildId, ConfigurableModule.Features);
  const flags: GuildFeaturesRecord = { ...DEFAULT_GUILD_FEATURES };
  for (const feature of GUILD_FEATURES) {
    const value = stored[feature];
    if (typeof value === "boolean") flags[feature] = value;
  }
  return flags;
}

/**
 * Check if a specific feature is enabled for the guild.
 *
 * @returns `true` if enabled or missing (defaults to enabled).
 */
export async function isFeatureEnabled(
  guildId: string,
  feature: Features,
): Promise<boolean> {
  const features = await getFeatureFlags(guildId);
  return features[feature];
}

/**
 * Enable/disable a single feature flag.
 *
 * @returns Updated feature set with defaults applied.
 */
export async function setFeatureFlag(
  guildId: string,
  feature: Features,
  enabled: boolean,
): Promise<GuildFeaturesRecord> {
  await configStore.set(guildId, ConfigurableModule.Features, {
    [feature]: enabled,
  });
  return getFeatureFlags(guildId);
}
