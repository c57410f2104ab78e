/**
 * Features config registration.
 *
 * Role in system:
 * - Registers the `features` config key.
 *
 * Invariants:
 * - Stored values are a sparse map of feature => boolean.
 * - Defaults are applied in the feature service (not here).
 */
import { defineConfig, z } from "@/configuration/definitions";
import { ConfigurableModule } from "@/configuration/constants";

const featuresSchema = z.record(z.string(), z.boolean()).default(() => ({}));

export const featuresConfig = defineConfig(ConfigurableModule.Features, featuresSchema);

declare module "@/configuration/definitions" {
  export interface ConfigDefinitions {
    [ConfigurableModule.Features]: z.infer<typeof featuresConfig>;
  }
}
