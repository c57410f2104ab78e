/**
 * Command Facade for temporary channels.
 *
 * Purpose: the only consumer-facing surface. Validates what a slash command or
 * reaction carries, calls the lifecycle engine and renders the outcome as the
 * text the bot replies with.
 *
 * Invariants:
 * - No lifecycle logic here: timing, authorization against ownership and state
 *   checks belong to the engine.
 * - Validation errors are returned before the engine is touched.
 * - Every method resolves to a `FacadeReply`; nothing throws on user input.
 */
import type { LifecycleEngine } from "./engine";
import {
  ALLOWED_DURATIONS,
  EXTENSION_SHORTCUTS,
  findShortcutByAmount,
  findShortcutByEmoji,
  parseDuration,
} from "./durations";
import { TempChannelError } from "./errors";
import { formatRemaining, sanitizeTopic } from "./format";
import type { TempChannelGuildSettings } from "./guild-settings";
import type { Actor, DescriptorSnapshot, Visibility } from "./types";
import { VISIBILITIES } from "./types";

const MAX_TOPIC_LENGTH = 100;

export interface FacadeReply {
  readonly ok: boolean;
  readonly content: string;
  readonly error?: TempChannelError;
}

export interface CreateInput {
  readonly guildId: string;
  readonly userId: string;
  readonly userName: string;
  readonly topic: string;
  readonly visibility: string;
  readonly duration: string;
}

export interface ExtendInput {
  readonly channelId: string;
  readonly actor: Actor;
  readonly amount: string;
}

export interface ReactionInput {
  readonly channelId: string;
  readonly messageId: string;
  readonly userId: string;
  readonly emoji: string | null | undefined;
}

export interface MembershipInput {
  readonly channelId: string;
  readonly actor: Actor;
  readonly targetId: string;
  readonly targetIsBot?: boolean;
}

export interface CommandFacadeOptions {
  engine: LifecycleEngine;
  guildSettings: TempChannelGuildSettings;
  clock?: () => number;
}

const ok = (content: string): FacadeReply => ({ ok: true, content });

const isVisibility = (value: string): value is Visibility =>
  VISIBILITIES.some((visibility) => visibility === value);

export class CommandFacade {
  private readonly engine: LifecycleEngine;
  private readonly guildSettings: TempChannelGuildSettings;
  private readonly clock: () => number;

  constructor(options: CommandFacadeOptions) {
    this.engine = options.engine;
    this.guildSettings = options.guildSettings;
    this.clock = options.clock ?? Date.now;
  }

  async create(input: CreateInput): Promise<FacadeReply> {
    const topic = input.topic.trim();
    if (!topic || !sanitizeTopic(topic)) {
      return this.fail(
        new TempChannelError("INVALID_TOPIC", "The topic must contain letters or numbers."),
      );
    }
    if (topic.length > MAX_TOPIC_LENGTH) {
      return this.fail(
        new TempChannelError(
          "INVALID_TOPIC",
          `The topic can be at most ${MAX_TOPIC_LENGTH} characters long.`,
        ),
      );
    }

    const visibility = input.visibility.trim().toLowerCase();
    if (!isVisibility(visibility)) {
      return this.fail(
        new TempChannelError("INVALID_VISIBILITY", "Visibility must be `public` or `private`."),
      );
    }

    const duration = parseDuration(input.duration);
    if (!duration) {
      return this.fail(
        new TempChannelError(
          "INVALID_DURATION",
          `Invalid duration. Choose one of: ${ALLOWED_DURATIONS.map((option) => `\`${option.key}\``).join(", ")}.`,
        ),
      );
    }

    if (!(await this.guildSettings.isEnabled(input.guildId))) {
      return this.fail(
        new TempChannelError(
          "FEATURE_DISABLED",
          "Temporary channels are disabled on this server.",
        ),
      );
    }

    const created = await this.engine.provision({
      guildId: input.guildId,
      ownerId: input.userId,
      ownerName: input.userName,
      topic,
      visibility,
      duration,
    });
    if (created.isErr()) return this.fail(created.error);

    const access = created.value.visibility === "private" ? "🔒 private" : "🌍 public";
    return ok(`✅ Created <#${created.value.id}> (${access}). It expires in **${duration.key}**.`);
  }

  async extend(input: ExtendInput): Promise<FacadeReply> {
    const shortcut = findShortcutByAmount(input.amount);
    if (!shortcut) {
      return this.fail(
        new TempChannelError(
          "INVALID_AMOUNT",
          `Invalid amount. Choose one of: ${EXTENSION_SHORTCUTS.map((option) => `\`${option.amount}\``).join(", ")}.`,
        ),
      );
    }

    const extended = await this.engine.extend(input.channelId, input.actor, shortcut.ms);
    if (extended.isErr()) return this.fail(extended.error);

    const outcome = extended.value;
    const left = formatRemaining(outcome.expiresAt - this.clock());
    if (outcome.appliedMs === 0) {
      return ok(`⏰ This channel already reached its maximum lifetime. Time left: **${left}**.`);
    }
    const suffix = outcome.capped ? " (capped at the maximum lifetime)" : "";
    return ok(`⏰ Extended by **+${shortcut.amount}**${suffix}. Time left: **${left}**.`);
  }

  /**
   * Extension through a shortcut reaction on the channel's expiry warning.
   *
   * @returns `null` when the reaction is not an extension request.
   */
  async extendByReaction(input: ReactionInput): Promise<FacadeReply | null> {
    const shortcut = findShortcutByEmoji(input.emoji);
    if (!shortcut) return null;

    const descriptor = this.engine.get(input.channelId);
    if (!descriptor || descriptor.warningMessageId !== input.messageId) return null;

    return this.extend({
      channelId: input.channelId,
      actor: { userId: input.userId, isAdmin: false },
      amount: shortcut.amount,
    });
  }

  async invite(input: MembershipInput): Promise<FacadeReply> {
    if (input.targetId === input.actor.userId) {
      return this.fail(new TempChannelError("INVALID_TARGET", "You already have access to this channel."));
    }
    if (input.targetIsBot) {
      return this.fail(new TempChannelError("INVALID_TARGET", "Bots cannot be invited."));
    }

    const invited = await this.engine.invite(input.channelId, input.actor, input.targetId);
    if (invited.isErr()) return this.fail(invited.error);

    return ok(
      invited.value.changed
        ? `✅ <@${input.targetId}> can now access this channel.`
        : `<@${input.targetId}> already has access to this channel.`,
    );
  }

  async kick(input: MembershipInput): Promise<FacadeReply> {
    if (input.targetId === input.actor.userId) {
      return this.fail(
        new TempChannelError("INVALID_TARGET", "You cannot kick yourself. Use `/temp close` instead."),
      );
    }

    const kicked = await this.engine.kick(input.channelId, input.actor, input.targetId);
    if (kicked.isErr()) return this.fail(kicked.error);

    return ok(
      kicked.value.changed
        ? `👋 <@${input.targetId}> was removed from this channel.`
        : `<@${input.targetId}> is not a member of this channel.`,
    );
  }

  async close(channelId: string, actor: Actor): Promise<FacadeReply> {
    const closed = await this.engine.close(channelId, actor);
    if (closed.isErr()) return this.fail(closed.error);
    return ok("🔒 Closing this channel...");
  }

  async forceClose(channelId: string, actor: Actor): Promise<FacadeReply> {
    const closed = await this.engine.forceClose(channelId, actor);
    if (closed.isErr()) return this.fail(closed.error);
    return ok(`🔒 Force-closing <#${channelId}>.`);
  }

  list(guildId: string, userId: string): FacadeReply {
    const owned = this.engine.listOwned(userId, guildId);
    if (owned.length === 0) return ok("You have no active temporary channels.");

    const now = this.clock();
    return ok(
      [
        `**Your temporary channels (${owned.length})**`,
        ...owned.map((descriptor) => this.listLine(descriptor, now)),
      ].join("\n"),
    );
  }

  async setEnabled(guildId: string, actor: Actor, enabled: boolean): Promise<FacadeReply> {
    if (!actor.isAdmin) return this.fail(adminOnly());

    await this.guildSettings.setEnabled(guildId, enabled);
    return ok(
      enabled
        ? "✅ Temporary channels are now enabled on this server."
        : "⛔ Temporary channels are now disabled. Existing channels keep running until they expire.",
    );
  }

  async setCategory(guildId: string, actor: Actor, name: string): Promise<FacadeReply> {
    if (!actor.isAdmin) return this.fail(adminOnly());

    const trimmed = name.trim();
    if (!trimmed || trimmed.length > MAX_TOPIC_LENGTH) {
      return this.fail(
        new TempChannelError(
          "INVALID_TOPIC",
          `The category name must be 1 to ${MAX_TOPIC_LENGTH} characters long.`,
        ),
      );
    }

    const saved = await this.guildSettings.setCategoryName(guildId, trimmed);
    return ok(`📁 New temporary channels will be created under **${saved}**.`);
  }

  /** User-facing text for an error. */
  renderError(error: TempChannelError): string {
    switch (error.code) {
      case "COOLDOWN_ACTIVE":
        return `⏳ Please wait **${formatRemaining(error.details.retryAfterMs ?? 0)}** before creating another temporary channel.`;
      case "MAX_CHANNELS_REACHED":
        return `❌ You already have **${error.details.limit ?? 0}** active temporary channels. Close one first.`;
      case "PLATFORM_FAILURE":
        return error.transient
          ? "❌ Discord is busy right now. Try again in a moment."
          : "❌ Something went wrong while talking to Discord.";
      default:
        return `❌ ${error.message}`;
    }
  }

  private fail(error: TempChannelError): FacadeReply {
    return { ok: false, content: this.renderError(error), error };
  }

  private listLine(descriptor: DescriptorSnapshot, now: number): string {
    const icon = descriptor.visibility === "private" ? "🔒" : "🌍";
    return `${icon} <#${descriptor.id}> - **${descriptor.topic}** - ${formatRemaining(descriptor.expiresAt - now)} left`;
  }
}

function adminOnly(): TempChannelError {
  return new TempChannelError("NOT_AUTHORIZED", "Only administrators can do this.");
}
