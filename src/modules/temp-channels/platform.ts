/**
 * Capability interface the lifecycle engine needs from the chat platform.
 *
 * Role in system:
 * - The engine and facade only see this interface; `seyfert-platform.ts`
 *   implements it on a Seyfert client and tests use an in-process fake.
 *
 * Contract:
 * - Every method resolves to a `Result`; none is expected to throw.
 * - `deleteChannel` distinguishes "already gone" (`not_found`) from failure so
 *   the engine can finalize without retrying.
 * - Platform failures are `PLATFORM_FAILURE` errors with `transient` set when
 *   a retry may help (rate limits, 5xx, network).
 */
import type { Result } from "@/utils/result";
import type { TempChannelError } from "./errors";
import type { CategoryDefaults, GrantDelta, GrantSet } from "./types";

export type PlatformResult<T> = Result<T, TempChannelError>;

export type MessageTone = "info" | "warning" | "danger" | "success";

export interface OutgoingField {
  readonly name: string;
  readonly value: string;
  readonly inline?: boolean;
}

/** Platform-neutral message; the adapter decides how to render it. */
export interface OutgoingMessage {
  readonly content?: string;
  readonly embed?: {
    readonly title: string;
    readonly description: string;
    readonly tone: MessageTone;
    readonly fields?: readonly OutgoingField[];
  };
}

export interface CreateChannelParams {
  readonly guildId: string;
  readonly parentId: string;
  readonly name: string;
  readonly topic: string;
  readonly grants: GrantSet;
}

export type DeleteOutcome = "deleted" | "not_found";

export interface TempChannelPlatform {
  /** Find (or create) the parent category and read what it passes down. */
  resolveCategory(guildId: string): Promise<PlatformResult<CategoryDefaults>>;
  /** @returns The new channel id. */
  createChannel(params: CreateChannelParams): Promise<PlatformResult<string>>;
  deleteChannel(channelId: string, reason: string): Promise<PlatformResult<DeleteOutcome>>;
  renameChannel(channelId: string, name: string): Promise<PlatformResult<void>>;
  setChannelTopic(channelId: string, topic: string): Promise<PlatformResult<void>>;
  applyGrants(channelId: string, delta: GrantDelta): Promise<PlatformResult<void>>;
  /** @returns The sent message id. */
  sendMessage(channelId: string, message: OutgoingMessage): Promise<PlatformResult<string>>;
  addReactions(
    channelId: string,
    messageId: string,
    emojis: readonly string[],
  ): Promise<PlatformResult<void>>;
}
