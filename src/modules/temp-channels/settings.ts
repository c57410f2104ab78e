/**
 * Process-wide settings for the temporary channel system.
 *
 * Role in system:
 * - Parsed once at bootstrap from the environment (loaded by dotenv).
 * - Env values use human units (minutes, hours, seconds); the parsed result is
 *   in milliseconds.
 *
 * Gotchas:
 * - Invalid values throw a ZodError at startup instead of silently falling
 *   back to defaults.
 * - The maximum lifetime may not be shorter than the longest allowed
 *   duration.
 */
import { z } from "zod";
import { ALLOWED_DURATIONS } from "./durations";
import type { TempChannelSettings } from "./types";

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;

const LONGEST_DURATION_MS = Math.max(...ALLOWED_DURATIONS.map((option) => option.ms));

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  TEMP_CHANNELS_MAX_PER_USER: positiveInt(2),
  TEMP_CHANNELS_COOLDOWN_MINUTES: z.coerce.number().min(0).default(5),
  TEMP_CHANNELS_INACTIVITY_MINUTES: z.coerce.number().positive().default(10),
  TEMP_CHANNELS_WARNING_MINUTES: z.coerce.number().min(0).default(5),
  TEMP_CHANNELS_MAX_LIFETIME_HOURS: z.coerce.number().positive().default(48),
  TEMP_CHANNELS_CHECK_SECONDS: positiveInt(60),
  TEMP_CHANNELS_DISPLAY_REFRESH_MINUTES: z.coerce.number().positive().default(5),
  TEMP_CHANNELS_DELETE_ATTEMPTS: positiveInt(3),
  TEMP_CHANNELS_DELETE_BACKOFF_MS: z.coerce.number().int().min(0).default(1_000),
  TEMP_CHANNELS_FAREWELL_DELAY_MS: z.coerce.number().int().min(0).default(2_000),
}).refine((env) => env.TEMP_CHANNELS_MAX_LIFETIME_HOURS * HOUR_MS >= LONGEST_DURATION_MS, {
  message: `TEMP_CHANNELS_MAX_LIFETIME_HOURS must cover the longest duration (${LONGEST_DURATION_MS / HOUR_MS}h)`,
  path: ["TEMP_CHANNELS_MAX_LIFETIME_HOURS"],
});

export const DEFAULT_TEMP_CHANNEL_SETTINGS: TempChannelSettings = loadTempChannelSettings({});

export function loadTempChannelSettings(
  env: Record<string, string | undefined> = process.env,
): TempChannelSettings {
  const parsed = envSchema.parse(env);
  return {
    maxChannelsPerUser: parsed.TEMP_CHANNELS_MAX_PER_USER,
    creationCooldownMs: parsed.TEMP_CHANNELS_COOLDOWN_MINUTES * MINUTE_MS,
    inactivityGraceMs: parsed.TEMP_CHANNELS_INACTIVITY_MINUTES * MINUTE_MS,
    warningWindowMs: parsed.TEMP_CHANNELS_WARNING_MINUTES * MINUTE_MS,
    maxLifetimeMs: parsed.TEMP_CHANNELS_MAX_LIFETIME_HOURS * HOUR_MS,
    checkIntervalMs: parsed.TEMP_CHANNELS_CHECK_SECONDS * 1_000,
    displayRefreshMs: parsed.TEMP_CHANNELS_DISPLAY_REFRESH_MINUTES * MINUTE_MS,
    deleteAttempts: parsed.TEMP_CHANNELS_DELETE_ATTEMPTS,
    deleteBackoffMs: parsed.TEMP_CHANNELS_DELETE_BACKOFF_MS,
    farewellDelayMs: parsed.TEMP_CHANNELS_FAREWELL_DELAY_MS,
  };
}
