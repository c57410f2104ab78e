/**
 * Temporary channels module entrypoint.
 *
 * Role in system:
 * - `createTempChannelSystem` wires store, rate limiter, engine, facade and
 *   scheduler around a platform implementation. The bootstrap passes the
 *   Seyfert adapter; tests pass an in-process fake.
 * - The result hangs off the client as `client.tempChannels`.
 */
import { LifecycleEngine } from "./engine";
import { CommandFacade } from "./facade";
import { guildSettings as defaultGuildSettings, type TempChannelGuildSettings } from "./guild-settings";
import type { TempChannelPlatform } from "./platform";
import { RateLimiter } from "./rate-limiter";
import { TempChannelScheduler } from "./scheduler";
import { DEFAULT_TEMP_CHANNEL_SETTINGS } from "./settings";
import { DescriptorStore } from "./store";
import type { TempChannelLogger, TempChannelSettings } from "./types";

export interface TempChannelSystem {
  readonly settings: TempChannelSettings;
  readonly store: DescriptorStore;
  readonly rateLimiter: RateLimiter;
  readonly engine: LifecycleEngine;
  readonly facade: CommandFacade;
  readonly scheduler: TempChannelScheduler;
  /** Stop the timer, wait for in-flight deletions and drain all state. */
  shutdown(): Promise<void>;
}

export interface TempChannelSystemOptions {
  platform: TempChannelPlatform;
  settings?: TempChannelSettings;
  guildSettings?: TempChannelGuildSettings;
  logger?: TempChannelLogger;
  clock?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export function createTempChannelSystem(options: TempChannelSystemOptions): TempChannelSystem {
  const settings = options.settings ?? DEFAULT_TEMP_CHANNEL_SETTINGS;
  const logger = options.logger ?? console;
  const store = new DescriptorStore();
  const rateLimiter = new RateLimiter({
    maxChannelsPerUser: settings.maxChannelsPerUser,
    creationCooldownMs: settings.creationCooldownMs,
  });

  const engine = new LifecycleEngine({
    store,
    rateLimiter,
    platform: options.platform,
    settings,
    logger,
    clock: options.clock,
    sleep: options.sleep,
  });
  const facade = new CommandFacade({
    engine,
    guildSettings: options.guildSettings ?? defaultGuildSettings,
    clock: options.clock,
  });
  const scheduler = new TempChannelScheduler(engine, settings.checkIntervalMs, logger);

  return {
    settings,
    store,
    rateLimiter,
    engine,
    facade,
    scheduler,
    async shutdown() {
      scheduler.stop();
      await engine.shutdown();
    },
  };
}

export * from "./durations";
export * from "./engine";
export * from "./errors";
export * from "./facade";
export * from "./format";
export * from "./guild-settings";
export * from "./platform";
export * from "./rate-limiter";
export * from "./scheduler";
export * from "./seyfert-platform";
export * from "./settings";
export * from "./store";
export * from "./types";
export { planCreate, planInvite, planKick, isEmptyDelta } from "./permissions";
