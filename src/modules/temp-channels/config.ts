/**
 * Per-guild temp channel config registration.
 *
 * Invariants:
 * - `categoryName` is the parent category new temporary channels are created
 *   under; the Seyfert adapter creates it on first use.
 */
import { defineConfig, z } from "@/configuration/definitions";
import { ConfigurableModule } from "@/configuration/constants";

export const DEFAULT_CATEGORY_NAME = "Temp Channels";

export const tempChannelsConfig = defineConfig(
  ConfigurableModule.TempChannels,
  z.object({
    categoryName: z.string().trim().min(1).max(100).default(DEFAULT_CATEGORY_NAME),
  }),
);

declare module "@/configuration/definitions" {
  export interface ConfigDefinitions {
    [ConfigurableModule.TempChannels]: z.infer<typeof tempChannelsConfig>;
  }
}
