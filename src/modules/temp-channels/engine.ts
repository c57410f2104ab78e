/**
 * Temporary Channel Lifecycle Engine.
 *
 * Purpose: own every descriptor's timing state and decide when a channel is
 * renamed, warned or deleted. Provisioning, extension, closure and membership
 * changes all go through here.
 *
 * Role in system:
 * - `CommandFacade` calls the public operations; `TempChannelScheduler` calls
 *   `tick`; event listeners call `recordActivity` and `handleChannelRemoved`.
 * - Talks to the chat platform only through `TempChannelPlatform`.
 *
 * Invariants:
 * - Every descriptor mutation runs under `mutex.runExclusive(descriptor.id)`.
 * - No platform call is awaited while a descriptor lock is held.
 * - `beginDeletion` is the only way into `pending_deletion`; it runs at most
 *   once per descriptor and is where the owner's active slot is released.
 * - A descriptor leaves the store only after the delete call settles (or the
 *   channel was already gone).
 *
 * Gotchas:
 * - Deletions, warnings and renames run as tracked background tasks; tests
 *   and shutdown wait for them with `whenIdle()`.
 */
import { ErrResult, OkResult, type Result } from "@/utils/result";
import { KeyedMutex } from "@/utils/keyedMutex";
import type { DurationOption } from "./durations";
import { EXTENSION_SHORTCUTS, inactivityGraceFor } from "./durations";
import { TempChannelError, platformError } from "./errors";
import { buildChannelName, buildChannelTopic, buildExtendedTopic, sanitizeTopic } from "./format";
import { isEmptyDelta, planCreate, planInvite, planKick } from "./permissions";
import type { TempChannelPlatform } from "./platform";
import type { RateLimiter } from "./rate-limiter";
import { snapshotDescriptor, type DescriptorStore } from "./store";
import type {
  Actor,
  ChannelDescriptor,
  DeletionReason,
  DescriptorSnapshot,
  GrantDelta,
  TempChannelLogger,
  TempChannelSettings,
  Visibility,
  WarningKind,
} from "./types";
import {
  deletionAuditReason,
  farewellMessage,
  warningMessage,
  welcomeMessage,
} from "./views";

export type EngineResult<T> = Result<T, TempChannelError>;

export interface ProvisionRequest {
  readonly guildId: string;
  readonly ownerId: string;
  readonly ownerName: string;
  readonly topic: string;
  readonly visibility: Visibility;
  readonly duration: DurationOption;
}

export interface ExtendOutcome {
  readonly channelId: string;
  readonly previousExpiresAt: number;
  readonly expiresAt: number;
  readonly requestedMs: number;
  readonly appliedMs: number;
  /** The lifetime cap cut the extension short. */
  readonly capped: boolean;
}

export interface CloseOutcome {
  readonly channelId: string;
  readonly reason: DeletionReason;
}

export interface MembershipOutcome {
  readonly channelId: string;
  readonly targetId: string;
  /** `false` when the request was already satisfied. */
  readonly changed: boolean;
}

export interface TickReport {
  checked: number;
  deleted: { channelId: string; reason: DeletionReason }[];
  warned: { channelId: string; kind: WarningKind }[];
  renamed: string[];
}

export interface LifecycleEngineOptions {
  store: DescriptorStore;
  rateLimiter: RateLimiter;
  platform: TempChannelPlatform;
  settings: TempChannelSettings;
  logger?: TempChannelLogger;
  clock?: () => number;
  sleep?: (ms: number) => Promise<void>;
  mutex?: KeyedMutex;
}

const defaultSleep = (ms: number) =>
  new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });

type MembershipAction = "invite" | "kick";

export class LifecycleEngine {
  private readonly store: DescriptorStore;
  private readonly rateLimiter: RateLimiter;
  private readonly platform: TempChannelPlatform;
  private readonly settings: TempChannelSettings;
  private readonly logger: TempChannelLogger;
  private readonly clock: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly mutex: KeyedMutex;
  private readonly inFlight = new Set<Promise<void>>();
  private stopped = false;

  constructor(options: LifecycleEngineOptions) {
    this.store = options.store;
    this.rateLimiter = options.rateLimiter;
    this.platform = options.platform;
    this.settings = options.settings;
    this.logger = options.logger ?? console;
    this.clock = options.clock ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
    this.mutex = options.mutex ?? new KeyedMutex();
  }

  // ---------------------------------------------------------------------------
  // Provisioning
  // ---------------------------------------------------------------------------

  async provision(request: ProvisionRequest): Promise<EngineResult<DescriptorSnapshot>> {
    if (this.stopped) {
      return ErrResult(
        new TempChannelError("PLATFORM_FAILURE", "Temporary channels are shutting down."),
      );
    }

    const slug = sanitizeTopic(request.topic);
    if (!slug) {
      return ErrResult(
        new TempChannelError("INVALID_TOPIC", "The topic must contain letters or numbers."),
      );
    }

    const decision = this.rateLimiter.tryReserve(request.ownerId, this.clock());
    if (!decision.allowed) {
      return ErrResult(
        decision.reason === "MaxChannelsReached"
          ? new TempChannelError(
              "MAX_CHANNELS_REACHED",
              `You already have ${decision.limit} active temporary channels.`,
              { limit: decision.limit },
            )
          : new TempChannelError(
              "COOLDOWN_ACTIVE",
              "You created a temporary channel too recently.",
              { retryAfterMs: decision.retryAfterMs },
            ),
      );
    }

    const { reservation } = decision;
    try {
      const category = await this.platform.resolveCategory(request.guildId);
      if (category.isErr()) {
        this.rateLimiter.release(reservation);
        return ErrResult(category.error);
      }

      const lifetimeMs = Math.min(request.duration.ms, this.settings.maxLifetimeMs);
      const name = buildChannelName(slug, lifetimeMs);
      const created = await this.platform.createChannel({
        guildId: request.guildId,
        parentId: category.value.categoryId,
        name,
        topic: buildChannelTopic(request.duration.key, request.ownerName),
        grants: planCreate(request.visibility, request.ownerId, category.value),
      });
      if (created.isErr()) {
        this.rateLimiter.release(reservation);
        return ErrResult(created.error);
      }

      const createdAt = this.clock();
      const expiresAt = createdAt + lifetimeMs;
      const descriptor: ChannelDescriptor = {
        id: created.value,
        guildId: request.guildId,
        ownerId: request.ownerId,
        ownerName: request.ownerName,
        topic: request.topic.trim(),
        slug,
        visibility: request.visibility,
        durationLabel: request.duration.key,
        createdAt,
        expiresAt,
        lastActivityAt: null,
        inactivityDeadline: expiresAt,
        invitedUsers: new Set(),
        state: "active",
        deletionReason: null,
        warnedFor: null,
        warningMessageId: null,
        renderedName: name,
        renamedAt: createdAt,
        extensions: 0,
      };

      if (!this.store.insert(descriptor)) {
        this.rateLimiter.release(reservation);
        this.logger.error(
          `[temp-channels] platform returned an id that is already tracked: ${descriptor.id}`,
        );
        return ErrResult(
          new TempChannelError("PLATFORM_FAILURE", "The channel could not be registered."),
        );
      }

      this.rateLimiter.commit(reservation, createdAt);
      this.logger.info(
        `[temp-channels] created ${descriptor.id} for ${descriptor.ownerId} (${descriptor.visibility}, ${descriptor.durationLabel})`,
      );
      this.track(this.sendWelcome(descriptor));
      return OkResult(snapshotDescriptor(descriptor));
    } catch (error) {
      this.rateLimiter.release(reservation);
      this.logger.error("[temp-channels] provisioning failed", error);
      return ErrResult(platformError(error, false));
    }
  }

  // ---------------------------------------------------------------------------
  // Tick
  // ---------------------------------------------------------------------------

  /** One scheduling pass over every active descriptor. */
  async tick(now: number = this.clock()): Promise<TickReport> {
    const report: TickReport = { checked: 0, deleted: [], warned: [], renamed: [] };
    if (this.stopped) return report;

    for (const descriptor of this.store.values()) {
      if (descriptor.state !== "active") continue;
      await this.mutex.runExclusive(descriptor.id, () =>
        this.evaluate(descriptor, now, report),
      );
    }

    return report;
  }

  private evaluate(descriptor: ChannelDescriptor, now: number, report: TickReport): void {
    if (!this.isLive(descriptor)) return;
    report.checked += 1;

    const expired = now >= descriptor.expiresAt;
    if (expired || now >= descriptor.inactivityDeadline) {
      const reason: DeletionReason = expired ? "expired" : "inactive";
      if (this.beginDeletion(descriptor, reason)) {
        report.deleted.push({ channelId: descriptor.id, reason });
        this.track(this.runDeletion(descriptor, reason));
      }
      return;
    }

    const deadline = Math.min(descriptor.expiresAt, descriptor.inactivityDeadline);
    const remaining = deadline - now;
    if (descriptor.warnedFor !== deadline && remaining <= this.settings.warningWindowMs) {
      const kind: WarningKind =
        descriptor.expiresAt <= descriptor.inactivityDeadline ? "expiry" : "inactivity";
      descriptor.warnedFor = deadline;
      report.warned.push({ channelId: descriptor.id, kind });
      this.track(this.sendWarning(descriptor, kind, remaining));
      return;
    }

    if (now - descriptor.renamedAt >= this.settings.displayRefreshMs) {
      if (this.queueRename(descriptor, now)) report.renamed.push(descriptor.id);
    }
  }

  // ---------------------------------------------------------------------------
  // Activity
  // ---------------------------------------------------------------------------

  /** @returns `true` when the descriptor's inactivity deadline moved. */
  async recordActivity(channelId: string, now: number = this.clock()): Promise<boolean> {
    if (!this.store.has(channelId)) return false;

    return this.mutex.runExclusive(channelId, () => {
      const descriptor = this.store.get(channelId);
      if (!descriptor || descriptor.state !== "active") return false;

      this.touch(descriptor, now);
      return true;
    });
  }

  // ---------------------------------------------------------------------------
  // Owner / admin actions
  // ---------------------------------------------------------------------------

  async extend(
    channelId: string,
    actor: Actor,
    requestedMs: number,
  ): Promise<EngineResult<ExtendOutcome>> {
    if (!Number.isFinite(requestedMs) || requestedMs <= 0) {
      return ErrResult(
        new TempChannelError("INVALID_AMOUNT", "The extension must be a positive amount."),
      );
    }

    return this.mutex.runExclusive(channelId, (): EngineResult<ExtendOutcome> => {
      const access = this.access(channelId, actor, "extend");
      if (access.isErr()) return ErrResult(access.error);
      const descriptor = access.value;

      const previousExpiresAt = descriptor.expiresAt;
      const cap = descriptor.createdAt + this.settings.maxLifetimeMs;
      const expiresAt = Math.max(
        previousExpiresAt,
        Math.min(previousExpiresAt + requestedMs, cap),
      );

      descriptor.expiresAt = expiresAt;
      descriptor.inactivityDeadline = this.inactivityDeadlineOf(descriptor);
      if (expiresAt > previousExpiresAt) {
        descriptor.extensions += 1;
        this.queueRename(descriptor, this.clock());
        this.track(this.pushTopic(descriptor.id, buildExtendedTopic(descriptor.ownerName)));
      }

      this.logger.debug(
        `[temp-channels] ${channelId} extended by ${expiresAt - previousExpiresAt}ms (requested ${requestedMs}ms)`,
      );

      return OkResult({
        channelId,
        previousExpiresAt,
        expiresAt,
        requestedMs,
        appliedMs: expiresAt - previousExpiresAt,
        capped: previousExpiresAt + requestedMs > cap,
      });
    });
  }

  /** Owner close, or admin override on someone else's channel. */
  close(channelId: string, actor: Actor): Promise<EngineResult<CloseOutcome>> {
    return this.closeWith(channelId, actor, false);
  }

  /** Admin-only close that ignores ownership. */
  forceClose(channelId: string, actor: Actor): Promise<EngineResult<CloseOutcome>> {
    return this.closeWith(channelId, actor, true);
  }

  private closeWith(
    channelId: string,
    actor: Actor,
    force: boolean,
  ): Promise<EngineResult<CloseOutcome>> {
    return this.mutex.runExclusive(channelId, (): EngineResult<CloseOutcome> => {
      if (force && !actor.isAdmin) {
        return ErrResult(
          new TempChannelError("NOT_AUTHORIZED", "Only administrators can force-close channels."),
        );
      }

      const access = this.access(channelId, actor, "close");
      if (access.isErr()) return ErrResult(access.error);
      const descriptor = access.value;

      const reason: DeletionReason =
        !force && actor.userId === descriptor.ownerId ? "closed" : "force_closed";
      this.beginDeletion(descriptor, reason);
      this.track(this.runDeletion(descriptor, reason));
      return OkResult({ channelId, reason });
    });
  }

  invite(channelId: string, actor: Actor, targetId: string): Promise<EngineResult<MembershipOutcome>> {
    return this.changeMembership("invite", channelId, actor, targetId);
  }

  kick(channelId: string, actor: Actor, targetId: string): Promise<EngineResult<MembershipOutcome>> {
    return this.changeMembership("kick", channelId, actor, targetId);
  }

  private async changeMembership(
    action: MembershipAction,
    channelId: string,
    actor: Actor,
    targetId: string,
  ): Promise<EngineResult<MembershipOutcome>> {
    const planned = await this.mutex.runExclusive(
      channelId,
      (): EngineResult<{ descriptor: ChannelDescriptor; delta: GrantDelta }> => {
        const access = this.access(channelId, actor, action);
        if (access.isErr()) return ErrResult(access.error);
        const descriptor = access.value;

        if (descriptor.visibility !== "private") {
          return ErrResult(
            new TempChannelError("NOT_PRIVATE", "Only private channels have a member list."),
          );
        }
        if (action === "kick" && targetId === descriptor.ownerId) {
          return ErrResult(
            new TempChannelError("INVALID_TARGET", "The channel creator cannot be kicked."),
          );
        }

        const delta =
          action === "invite" ? planInvite(descriptor, targetId) : planKick(descriptor, targetId);
        return OkResult({ descriptor, delta });
      },
    );
    if (planned.isErr()) return ErrResult(planned.error);

    const { descriptor, delta } = planned.value;
    if (isEmptyDelta(delta)) {
      return OkResult({ channelId, targetId, changed: false });
    }

    const applied = await this.platform.applyGrants(channelId, delta);
    if (applied.isErr()) {
      this.logger.warn(`[temp-channels] ${action} on ${channelId} failed`, applied.error);
      return ErrResult(applied.error);
    }

    await this.mutex.runExclusive(channelId, () => {
      // The grant is already on the platform; a channel that closed meanwhile
      // keeps its membership untouched.
      if (!this.isLive(descriptor)) return;
      if (action === "invite") descriptor.invitedUsers.add(targetId);
      else descriptor.invitedUsers.delete(targetId);
      this.touch(descriptor, this.clock());
    });

    return OkResult({ channelId, targetId, changed: true });
  }

  // ---------------------------------------------------------------------------
  // External deletion
  // ---------------------------------------------------------------------------

  /**
   * The channel disappeared outside the engine (deleted by a moderator).
   * @returns `true` when a tracked active descriptor was dropped.
   */
  async handleChannelRemoved(channelId: string): Promise<boolean> {
    if (!this.store.has(channelId)) return false;

    return this.mutex.runExclusive(channelId, () => {
      const descriptor = this.store.get(channelId);
      if (!descriptor || !this.beginDeletion(descriptor, "channel_missing")) return false;
      this.store.remove(channelId);
      return true;
    });
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  get(channelId: string): DescriptorSnapshot | null {
    const descriptor = this.store.get(channelId);
    return descriptor ? snapshotDescriptor(descriptor) : null;
  }

  /** Active channels of a user, soonest deadline first. */
  listOwned(ownerId: string, guildId?: string): DescriptorSnapshot[] {
    return this.store
      .byOwner(ownerId, guildId)
      .filter((descriptor) => descriptor.state === "active")
      .sort((a, b) => a.expiresAt - b.expiresAt)
      .map(snapshotDescriptor);
  }

  /** Resolve once every background platform task has settled. */
  async whenIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  async shutdown(): Promise<void> {
    this.stopped = true;
    await this.whenIdle();
    this.store.clear();
    this.rateLimiter.clear();
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private isLive(descriptor: ChannelDescriptor): boolean {
    return this.store.get(descriptor.id) === descriptor && descriptor.state === "active";
  }

  private graceFor(descriptor: Pick<ChannelDescriptor, "createdAt" | "expiresAt">): number {
    return inactivityGraceFor(
      descriptor.expiresAt - descriptor.createdAt,
      this.settings.inactivityGraceMs,
    );
  }

  private inactivityDeadlineOf(descriptor: ChannelDescriptor): number {
    if (descriptor.lastActivityAt === null) return descriptor.expiresAt;
    return Math.min(descriptor.lastActivityAt + this.graceFor(descriptor), descriptor.expiresAt);
  }

  /** Stamp activity at `now`; callers hold the descriptor lock. */
  private touch(descriptor: ChannelDescriptor, now: number): void {
    descriptor.lastActivityAt = Math.max(descriptor.lastActivityAt ?? now, now);
    descriptor.inactivityDeadline = this.inactivityDeadlineOf(descriptor);
  }

  /** State then authorization checks shared by every owner/admin action. */
  private access(channelId: string, actor: Actor, action: string): EngineResult<ChannelDescriptor> {
    const descriptor = this.store.get(channelId);
    if (!descriptor) {
      return ErrResult(
        new TempChannelError("NOT_FOUND", "This is not an active temporary channel."),
      );
    }
    if (descriptor.state !== "active") {
      return ErrResult(
        new TempChannelError("CHANNEL_CLOSING", "This channel is already being deleted."),
      );
    }
    if (actor.userId !== descriptor.ownerId && !actor.isAdmin) {
      return ErrResult(
        new TempChannelError(
          "NOT_AUTHORIZED",
          `Only the channel creator or an administrator can ${action} here.`,
        ),
      );
    }
    return OkResult(descriptor);
  }

  /**
   * The single transition into `pending_deletion`.
   * @returns `false` when the descriptor was already leaving.
   */
  private beginDeletion(descriptor: ChannelDescriptor, reason: DeletionReason): boolean {
    if (descriptor.state !== "active") return false;

    descriptor.state = "pending_deletion";
    descriptor.deletionReason = reason;
    this.rateLimiter.releaseActive(descriptor.ownerId);
    this.logger.info(`[temp-channels] ${descriptor.id} pending deletion (${reason})`);
    return true;
  }

  private async runDeletion(descriptor: ChannelDescriptor, reason: DeletionReason): Promise<void> {
    try {
      const farewell = farewellMessage(reason);
      if (farewell) {
        const sent = await this.platform.sendMessage(descriptor.id, farewell);
        if (sent.isErr()) {
          this.logger.debug(`[temp-channels] farewell for ${descriptor.id} not sent`, sent.error);
        } else if (this.settings.farewellDelayMs > 0) {
          await this.sleep(this.settings.farewellDelayMs);
        }
      }

      await this.deleteWithRetry(descriptor.id, reason);
    } catch (error) {
      this.logger.error(`[temp-channels] deletion of ${descriptor.id} crashed`, error);
    } finally {
      await this.mutex.runExclusive(descriptor.id, () => {
        if (this.store.get(descriptor.id) === descriptor) this.store.remove(descriptor.id);
      });
    }
  }

  private async deleteWithRetry(channelId: string, reason: DeletionReason): Promise<void> {
    const attempts = Math.max(1, this.settings.deleteAttempts);

    for (let attempt = 1; attempt <= attempts; attempt++) {
      const result = await this.platform.deleteChannel(channelId, deletionAuditReason(reason));
      if (result.isOk()) {
        this.logger.debug(`[temp-channels] ${channelId} delete acknowledged (${result.value})`);
        return;
      }

      if (!result.error.transient || attempt === attempts) {
        this.logger.error(
          `[temp-channels] could not delete ${channelId} after ${attempt} attempt(s); dropping local state`,
          result.error,
        );
        return;
      }

      const delay = this.settings.deleteBackoffMs * 2 ** (attempt - 1);
      this.logger.warn(
        `[temp-channels] delete of ${channelId} failed (attempt ${attempt}/${attempts}), retrying in ${delay}ms`,
      );
      await this.sleep(delay);
    }
  }

  /**
   * Refresh the countdown in the channel name. Runs under the descriptor lock;
   * the platform call itself is a background task.
   */
  private queueRename(descriptor: ChannelDescriptor, now: number): boolean {
    descriptor.renamedAt = now;
    const name = buildChannelName(descriptor.slug, descriptor.expiresAt - now);
    if (name === descriptor.renderedName) return false;

    descriptor.renderedName = name;
    this.track(this.pushRename(descriptor, name));
    return true;
  }

  private async pushRename(descriptor: ChannelDescriptor, name: string): Promise<void> {
    const renamed = await this.platform.renameChannel(descriptor.id, name);
    if (renamed.isOk()) return;

    this.logger.warn(`[temp-channels] rename of ${descriptor.id} failed`, renamed.error);
    await this.mutex.runExclusive(descriptor.id, () => {
      // Forget the name so the next refresh pushes it again.
      if (descriptor.renderedName === name) descriptor.renderedName = null;
    });
  }

  private async pushTopic(channelId: string, topic: string): Promise<void> {
    const updated = await this.platform.setChannelTopic(channelId, topic);
    if (updated.isErr()) {
      this.logger.warn(`[temp-channels] topic update of ${channelId} failed`, updated.error);
    }
  }

  private async sendWarning(
    descriptor: ChannelDescriptor,
    kind: WarningKind,
    remainingMs: number,
  ): Promise<void> {
    const sent = await this.platform.sendMessage(descriptor.id, warningMessage(kind, remainingMs));
    if (sent.isErr()) {
      this.logger.warn(`[temp-channels] ${kind} warning for ${descriptor.id} failed`, sent.error);
      return;
    }
    if (kind !== "expiry") return;

    const stillLive = await this.mutex.runExclusive(descriptor.id, () => {
      if (!this.isLive(descriptor)) return false;
      descriptor.warningMessageId = sent.value;
      return true;
    });
    if (!stillLive) return;

    const reacted = await this.platform.addReactions(
      descriptor.id,
      sent.value,
      EXTENSION_SHORTCUTS.map((shortcut) => shortcut.emoji),
    );
    if (reacted.isErr()) {
      this.logger.debug(`[temp-channels] shortcut reactions on ${descriptor.id} failed`, reacted.error);
    }
  }

  private async sendWelcome(descriptor: ChannelDescriptor): Promise<void> {
    const sent = await this.platform.sendMessage(
      descriptor.id,
      welcomeMessage(descriptor, this.graceFor(descriptor)),
    );
    if (sent.isErr()) {
      this.logger.warn(`[temp-channels] welcome for ${descriptor.id} failed`, sent.error);
    }
  }

  private track(task: Promise<void>): void {
    const tracked: Promise<void> = task.then(
      () => {
        this.inFlight.delete(tracked);
      },
      (error: unknown) => {
        this.inFlight.delete(tracked);
        this.logger.error("[temp-channels] background task failed", error);
      },
    );
    this.inFlight.add(tracked);
  }
}
