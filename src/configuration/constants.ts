/**
 * Canonical keys for per-guild configuration.
 *
 * Role in system:
 * - Shared enum used by config registration, the store, and callers.
 *
 * Invariants:
 * - Keys are stable public identifiers; each one is registered with defineConfig.
 *
 * Gotchas:
 * - An unregistered key makes ConfigStore.get throw; import "@/configuration"
 *   (not its submodules) so registration runs first.
 */
export enum ConfigurableModule {
    Features = "features",
    TempChannels = "tempChannels",
}
