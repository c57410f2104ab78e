/**
 * Temporary Channel Domain Types.
 *
 * Purpose: shapes shared by the store, rate limiter, permission planner,
 * lifecycle engine and facade.
 * Role in system: pure types; nothing here talks to the platform.
 *
 * Times are epoch milliseconds throughout the module.
 */
import type { Logger } from "seyfert";
import type { PermissionFlagsBits } from "seyfert/lib/types";

export type Visibility = "public" | "private";

export const VISIBILITIES: readonly Visibility[] = ["public", "private"];

export type DescriptorState = "active" | "pending_deletion";

/** Why a descriptor entered PendingDeletion. */
export type DeletionReason =
  | "expired"
  | "inactive"
  | "closed"
  | "force_closed"
  | "channel_missing";

/** Which deadline a one-time warning announced. */
export type WarningKind = "expiry" | "inactivity";

export interface ChannelDescriptor {
  readonly id: string;
  readonly guildId: string;
  readonly ownerId: string;
  readonly ownerName: string;
  readonly topic: string;
  /** Sanitized topic used in the display name. */
  readonly slug: string;
  readonly visibility: Visibility;
  readonly durationLabel: string;
  readonly createdAt: number;
  expiresAt: number;
  lastActivityAt: number | null;
  inactivityDeadline: number;
  readonly invitedUsers: Set<string>;
  state: DescriptorState;
  deletionReason: DeletionReason | null;
  /** Deadline the last one-time warning announced; a moved deadline re-arms it. */
  warnedFor: number | null;
  warningMessageId: string | null;
  renderedName: string | null;
  renamedAt: number;
  extensions: number;
}

/** Read-only copy handed out of the engine. */
export type DescriptorSnapshot = Readonly<
  Omit<ChannelDescriptor, "invitedUsers"> & { invitedUsers: readonly string[] }
>;

/** Who is asking for a mutation. */
export interface Actor {
  readonly userId: string;
  /** Guild administrators may act on channels they do not own. */
  readonly isAdmin: boolean;
}

// =============================================================================
// Permissions
// =============================================================================

export type PermissionName = keyof typeof PermissionFlagsBits;

export type GrantTargetType = "role" | "member";

/** One permission overwrite on a channel. */
export interface PermissionGrant {
  readonly targetId: string;
  readonly targetType: GrantTargetType;
  readonly allow: readonly PermissionName[];
  readonly deny: readonly PermissionName[];
}

export type GrantSet = readonly PermissionGrant[];

/** Mutation applied to an existing channel's overwrites. */
export interface GrantDelta {
  readonly upsert: readonly PermissionGrant[];
  /** Member ids whose overwrite is removed. */
  readonly remove: readonly string[];
}

/** What the parent category contributes to a new channel. */
export interface CategoryDefaults {
  readonly categoryId: string;
  /** The guild's everyone role (same id as the guild on Discord). */
  readonly everyoneRoleId: string;
  readonly botId: string;
  readonly inherited: GrantSet;
}

// =============================================================================
// Settings
// =============================================================================

export interface TempChannelSettings {
  readonly maxChannelsPerUser: number;
  readonly creationCooldownMs: number;
  readonly inactivityGraceMs: number;
  readonly warningWindowMs: number;
  readonly maxLifetimeMs: number;
  readonly checkIntervalMs: number;
  readonly displayRefreshMs: number;
  readonly deleteAttempts: number;
  readonly deleteBackoffMs: number;
  readonly farewellDelayMs: number;
}

export type TempChannelLogger = Pick<Logger, "debug" | "info" | "warn" | "error">;
