/**
 * Seyfert API Adapter Layer.
 *
 * Purpose: keep the slash commands thin. Helpers for:
 * - Turning a command context into the `Actor` the temp channel engine expects
 * - Writing a `FacadeReply` back (ephemeral on failure)
 */

import type { GuildCommandContext } from "seyfert";
import { MessageFlags } from "seyfert/lib/types";
import type { Actor, FacadeReply } from "@/modules/temp-channels";

type ContextAuthor = Pick<GuildCommandContext, "author" | "member">;
type ReplyContext = Pick<GuildCommandContext, "editOrReply">;

// =============================================================================
// Context Helpers
// =============================================================================

/**
 * Extract common fields from GuildCommandContext.
 */
export function getContextInfo(ctx: Pick<GuildCommandContext, "author" | "guildId" | "channelId">) {
  return {
    guildId: ctx.guildId,
    channelId: ctx.channelId,
    userId: ctx.author.id,
    username: ctx.author.username,
  };
}

/** Members with Manage Channels (or Administrator) act as temp channel admins. */
export function isChannelAdmin(ctx: ContextAuthor): boolean {
  const permissions = ctx.member?.permissions;
  return (
    permissions?.has?.(["Administrator"]) === true ||
    permissions?.has?.(["ManageChannels"]) === true
  );
}

export function actorFromContext(ctx: ContextAuthor): Actor {
  return { userId: ctx.author.id, isAdmin: isChannelAdmin(ctx) };
}

// =============================================================================
// Reply Helpers
// =============================================================================

/**
 * Send an ephemeral reply to the context.
 */
export async function replyEphemeral(ctx: ReplyContext, content: string) {
  return ctx.editOrReply({
    content,
    flags: MessageFlags.Ephemeral,
  });
}

/**
 * Write a facade reply: failures stay private, successes are visible unless
 * `ephemeral` is requested.
 */
export async function sendFacadeReply(
  ctx: ReplyContext,
  reply: FacadeReply,
  options: { ephemeral?: boolean } = {},
) {
  const flags = !reply.ok || options.ephemeral ? MessageFlags.Ephemeral : undefined;
  return ctx.editOrReply({ content: reply.content, flags });
}
