/**
 * Allowed lifetimes and extension shortcuts.
 *
 * Invariants:
 * - Creation only accepts the enumerated keys below (plus the `Nm` spelling of
 *   the minute-based ones).
 * - Extension amounts are the three reaction shortcuts; the slash command
 *   offers the same set.
 */
const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;

export interface DurationOption {
  readonly key: string;
  readonly ms: number;
}

export const ALLOWED_DURATIONS: readonly DurationOption[] = [
  { key: "5min", ms: 5 * MINUTE_MS },
  { key: "10min", ms: 10 * MINUTE_MS },
  { key: "15min", ms: 15 * MINUTE_MS },
  { key: "30min", ms: 30 * MINUTE_MS },
  { key: "45min", ms: 45 * MINUTE_MS },
  { key: "1h", ms: HOUR_MS },
  { key: "1h30m", ms: HOUR_MS + 30 * MINUTE_MS },
  { key: "2h", ms: 2 * HOUR_MS },
  { key: "3h", ms: 3 * HOUR_MS },
  { key: "4h", ms: 4 * HOUR_MS },
  { key: "6h", ms: 6 * HOUR_MS },
  { key: "8h", ms: 8 * HOUR_MS },
  { key: "12h", ms: 12 * HOUR_MS },
  { key: "24h", ms: 24 * HOUR_MS },
];

/**
 * Resolve a user supplied duration (`30min`, `30m`, ` 1H30M `) to its option.
 *
 * @returns The canonical option or `null` when it is not in the allowed set.
 */
export function parseDuration(input: string): DurationOption | null {
  const normalized = input.trim().toLowerCase();
  const direct = ALLOWED_DURATIONS.find((option) => option.key === normalized);
  if (direct) return direct;

  const minutes = /^(\d+)m$/.exec(normalized);
  if (!minutes) return null;
  return ALLOWED_DURATIONS.find((option) => option.key === `${minutes[1]}min`) ?? null;
}

const MIN_INACTIVITY_GRACE_MS = 2 * MINUTE_MS;

/**
 * Grace period without messages for a channel of the given lifetime: half the
 * lifetime at most, never under two minutes unless the channel is shorter.
 */
export function inactivityGraceFor(lifetimeMs: number, configuredGraceMs: number): number {
  const grace = Math.min(configuredGraceMs, Math.floor(lifetimeMs / 2));
  if (grace >= MIN_INACTIVITY_GRACE_MS) return grace;
  return Math.min(MIN_INACTIVITY_GRACE_MS, lifetimeMs);
}

export interface ExtensionShortcut {
  readonly amount: string;
  readonly emoji: string;
  readonly ms: number;
}

export const EXTENSION_SHORTCUTS: readonly ExtensionShortcut[] = [
  { amount: "5m", emoji: "\u{1F550}", ms: 5 * MINUTE_MS },
  { amount: "10m", emoji: "\u{1F559}", ms: 10 * MINUTE_MS },
  { amount: "30m", emoji: "\u{1F55E}", ms: 30 * MINUTE_MS },
];

export function findShortcutByAmount(amount: string): ExtensionShortcut | null {
  const normalized = amount.trim().toLowerCase().replace(/min$/, "m");
  return EXTENSION_SHORTCUTS.find((shortcut) => shortcut.amount === normalized) ?? null;
}

export function findShortcutByEmoji(emoji: string | null | undefined): ExtensionShortcut | null {
  if (!emoji) return null;
  return EXTENSION_SHORTCUTS.find((shortcut) => shortcut.emoji === emoji) ?? null;
}
