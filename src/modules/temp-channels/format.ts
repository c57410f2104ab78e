/**
 * Display helpers for temporary channels: sanitized topic slugs, the countdown
 * rendered in the channel name, and human readable remaining time.
 *
 * Gotchas:
 * - Remaining time is rounded up to the minute, so a freshly created 30min
 *   channel reads `30m` and the last partial minute reads `1m`, never `0m`
 *   while the channel is alive.
 */
const MINUTE_MS = 60_000;

/** Discord rejects channel names above 100 characters. */
const MAX_SLUG_LENGTH = 80;

export const CHANNEL_NAME_PREFIX = "⏰・";

function remainingMinutes(ms: number): number {
  return Math.max(0, Math.ceil(ms / MINUTE_MS));
}

/** Compact countdown for channel names: `45m`, `1h`, `1h30m`, `23h59m`. */
export function formatCountdown(ms: number): string {
  const minutes = remainingMinutes(ms);
  if (minutes < 60) return `${minutes}m`;

  const hours = Math.floor(minutes / 60);
  const rest = minutes % 60;
  return rest > 0 ? `${hours}h${rest}m` : `${hours}h`;
}

/** Spaced variant for messages and lists: `45m`, `2h 5m`. */
export function formatRemaining(ms: number): string {
  const minutes = remainingMinutes(ms);
  const hours = Math.floor(minutes / 60);
  const rest = minutes % 60;
  return hours > 0 ? `${hours}h ${rest}m` : `${rest}m`;
}

/**
 * Channel-name-safe form of a topic.
 *
 * Lowercases, turns whitespace runs into `-` and drops anything that is not a
 * letter, digit, `_` or `-`. May return an empty string.
 */
export function sanitizeTopic(topic: string): string {
  return topic
    .normalize("NFKC")
    .toLowerCase()
    .trim()
    .replace(/\s+/g, "-")
    .replace(/[^\p{L}\p{N}_-]/gu, "")
    .replace(/-{2,}/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, MAX_SLUG_LENGTH)
    .replace(/-+$/, "");
}

export function buildChannelName(slug: string, remainingMs: number): string {
  return `${CHANNEL_NAME_PREFIX}${slug}-${formatCountdown(remainingMs)}`;
}

export function buildChannelTopic(durationLabel: string, ownerName: string): string {
  return `⏰ Expires in ${durationLabel} | Created by ${ownerName}`;
}

export function buildExtendedTopic(ownerName: string): string {
  return `⏰ Extended! | Created by ${ownerName}`;
}
