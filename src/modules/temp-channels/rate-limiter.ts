/**
 * Per-user creation gate: active channel cap plus a cooldown between
 * creations.
 *
 * Invariants:
 * - `activeCount + pending` never exceeds `maxChannelsPerUser`.
 * - `tryReserve` is synchronous, so two concurrent requests from one user can
 *   never both take the last slot.
 * - A denied request mutates nothing.
 * - With a cooldown configured, a pending reservation blocks further
 *   requests from the same user until it settles.
 * - `commit`/`release` settle a reservation exactly once; later calls are
 *   no-ops.
 * Gotchas: `activeCount` is decremented by `releaseActive`, which the engine
 * calls from its single PendingDeletion transition.
 */

export type RateLimitDenyReason = "CooldownActive" | "MaxChannelsReached";

export interface RateLimitRecord {
  activeCount: number;
  pending: number;
  lastCreationAt: number | null;
}

export interface Reservation {
  readonly userId: string;
  settled: boolean;
}

export type ReserveDecision =
  | { readonly allowed: true; readonly reservation: Reservation }
  | {
      readonly allowed: false;
      readonly reason: RateLimitDenyReason;
      /** Only for `CooldownActive`. */
      readonly retryAfterMs: number;
      readonly limit: number;
    };

export interface RateLimiterOptions {
  maxChannelsPerUser: number;
  creationCooldownMs: number;
}

export class RateLimiter {
  private readonly records = new Map<string, RateLimitRecord>();

  constructor(private readonly options: RateLimiterOptions) { }

  private record(userId: string): RateLimitRecord {
    let record = this.records.get(userId);
    if (!record) {
      record = { activeCount: 0, pending: 0, lastCreationAt: null };
      this.records.set(userId, record);
    }
    return record;
  }

  tryReserve(userId: string, now: number): ReserveDecision {
    const limit = this.options.maxChannelsPerUser;
    const current = this.records.get(userId);

    if (current && current.activeCount + current.pending >= limit) {
      return { allowed: false, reason: "MaxChannelsReached", retryAfterMs: 0, limit };
    }

    const cooldownMs = this.options.creationCooldownMs;
    // An unsettled reservation will stamp the cooldown when it commits.
    if (cooldownMs > 0 && current && current.pending > 0) {
      return { allowed: false, reason: "CooldownActive", retryAfterMs: cooldownMs, limit };
    }

    if (current?.lastCreationAt != null) {
      const elapsed = now - current.lastCreationAt;
      if (elapsed < cooldownMs) {
        return {
          allowed: false,
          reason: "CooldownActive",
          retryAfterMs: cooldownMs - elapsed,
          limit,
        };
      }
    }

    this.record(userId).pending += 1;
    return { allowed: true, reservation: { userId, settled: false } };
  }

  /** Turn a reservation into an active slot and start the cooldown. */
  commit(reservation: Reservation, now: number): void {
    if (reservation.settled) return;
    reservation.settled = true;

    const record = this.record(reservation.userId);
    record.pending = Math.max(0, record.pending - 1);
    record.activeCount += 1;
    record.lastCreationAt = now;
  }

  /** Give a reservation back after a downstream failure. */
  release(reservation: Reservation): void {
    if (reservation.settled) return;
    reservation.settled = true;

    const record = this.record(reservation.userId);
    record.pending = Math.max(0, record.pending - 1);
  }

  /** One of the user's channels left the active set. */
  releaseActive(userId: string): void {
    const record = this.records.get(userId);
    if (!record) return;
    record.activeCount = Math.max(0, record.activeCount - 1);
  }

  snapshot(userId: string): Readonly<RateLimitRecord> {
    const record = this.records.get(userId);
    return record
      ? { ...record }
      : { activeCount: 0, pending: 0, lastCreationAt: null };
  }

  clear(): void {
    this.records.clear();
  }
}
