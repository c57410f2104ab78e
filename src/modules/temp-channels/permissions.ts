/**
 * Permission planning for temporary channels.
 *
 * Purpose: compute the overwrites a new channel needs and the deltas for
 * invite/kick, as plain data. Nothing here calls the platform; the engine
 * applies the result through `TempChannelPlatform`.
 *
 * Invariants:
 * - Later grants for a target replace earlier ones (category first, then the
 *   channel's own rules).
 * - Invite/kick are idempotent: re-inviting a member or kicking a non-member
 *   yields an empty delta.
 * - The owner is always a member and never appears in a kick delta.
 */
import type {
  CategoryDefaults,
  ChannelDescriptor,
  GrantDelta,
  GrantSet,
  PermissionGrant,
  PermissionName,
  Visibility,
} from "./types";

const MEMBER_ACCESS: readonly PermissionName[] = [
  "ViewChannel",
  "SendMessages",
  "ReadMessageHistory",
];

const OWNER_ACCESS: readonly PermissionName[] = [...MEMBER_ACCESS, "ManageMessages"];

const BOT_ACCESS: readonly PermissionName[] = [
  ...OWNER_ACCESS,
  "ManageChannels",
  "AddReactions",
];

export const EMPTY_DELTA: GrantDelta = Object.freeze({ upsert: [], remove: [] });

function memberGrant(userId: string, allow: readonly PermissionName[]): PermissionGrant {
  return { targetId: userId, targetType: "member", allow, deny: [] };
}

/** Private channels must not leak through view rights inherited from the category. */
function withoutView(grant: PermissionGrant): PermissionGrant {
  return {
    ...grant,
    allow: grant.allow.filter((permission) => permission !== "ViewChannel"),
  };
}

export function planCreate(
  visibility: Visibility,
  ownerId: string,
  category: CategoryDefaults,
  invited: Iterable<string> = [],
): GrantSet {
  const grants = new Map<string, PermissionGrant>();

  for (const inherited of category.inherited) {
    grants.set(
      inherited.targetId,
      visibility === "private" ? withoutView(inherited) : inherited,
    );
  }

  grants.set(category.everyoneRoleId, {
    targetId: category.everyoneRoleId,
    targetType: "role",
    allow: visibility === "public" ? ["ViewChannel"] : [],
    deny: visibility === "private" ? ["ViewChannel"] : [],
  });

  if (visibility === "private") {
    for (const userId of invited) {
      grants.set(userId, memberGrant(userId, MEMBER_ACCESS));
    }
  }

  grants.set(ownerId, memberGrant(ownerId, OWNER_ACCESS));
  grants.set(category.botId, memberGrant(category.botId, BOT_ACCESS));

  return [...grants.values()];
}

export function planInvite(descriptor: ChannelDescriptor, userId: string): GrantDelta {
  if (userId === descriptor.ownerId || descriptor.invitedUsers.has(userId)) {
    return EMPTY_DELTA;
  }
  return { upsert: [memberGrant(userId, MEMBER_ACCESS)], remove: [] };
}

export function planKick(descriptor: ChannelDescriptor, userId: string): GrantDelta {
  if (userId === descriptor.ownerId || !descriptor.invitedUsers.has(userId)) {
    return EMPTY_DELTA;
  }
  return { upsert: [], remove: [userId] };
}

export function isEmptyDelta(delta: GrantDelta): boolean {
  return delta.upsert.length === 0 && delta.remove.length === 0;
}
