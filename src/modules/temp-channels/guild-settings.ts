/**
 * Per-guild switches the facade reads and the admin commands write: the
 * feature flag and the parent category name.
 */
import { configStore, ConfigurableModule } from "@/configuration";
import { Features, isFeatureEnabled, setFeatureFlag } from "@/modules/features";

export interface TempChannelGuildSettings {
  isEnabled(guildId: string): Promise<boolean>;
  setEnabled(guildId: string, enabled: boolean): Promise<void>;
  getCategoryName(guildId: string): Promise<string>;
  setCategoryName(guildId: string, name: string): Promise<string>;
}

export const guildSettings: TempChannelGuildSettings = {
  isEnabled: (guildId) => isFeatureEnabled(guildId, Features.TempChannels),

  async setEnabled(guildId, enabled) {
    await setFeatureFlag(guildId, Features.TempChannels, enabled);
  },

  async getCategoryName(guildId) {
    const config = await configStore.get(guildId, ConfigurableModule.TempChannels);
    return config.categoryName;
  },

  async setCategoryName(guildId, name) {
    const config = await configStore.set(guildId, ConfigurableModule.TempChannels, {
      categoryName: name,
    });
    return config.categoryName;
  },
};
