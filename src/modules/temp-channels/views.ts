/**
 * Messages the engine posts inside temporary channels.
 *
 * Pure builders; the platform adapter turns them into embeds.
 */
import { EXTENSION_SHORTCUTS } from "./durations";
import { formatRemaining } from "./format";
import type { OutgoingMessage } from "./platform";
import type { ChannelDescriptor, DeletionReason, WarningKind } from "./types";

const MINUTE_MS = 60_000;

function minutesLabel(ms: number): string {
  const minutes = Math.max(1, Math.ceil(ms / MINUTE_MS));
  return `${minutes} minute${minutes === 1 ? "" : "s"}`;
}

export const shortcutLegend = (): string =>
  EXTENSION_SHORTCUTS.map((shortcut) => `${shortcut.emoji} +${shortcut.amount}`).join(" | ");

export function welcomeMessage(
  descriptor: Pick<ChannelDescriptor, "topic" | "ownerId" | "visibility" | "durationLabel">,
  inactivityGraceMs: number,
): OutgoingMessage {
  const access =
    descriptor.visibility === "private"
      ? "🔒 This is a private channel. Use `/temp invite` to add people."
      : "🌍 This is a public channel - anyone can join!";

  return {
    content: [
      `**${descriptor.topic}** - Created by <@${descriptor.ownerId}>`,
      `⏰ This channel will be deleted in **${descriptor.durationLabel}** or after **${formatRemaining(inactivityGraceMs)}** without messages.`,
      access,
    ].join("\n"),
  };
}

export function warningMessage(kind: WarningKind, remainingMs: number): OutgoingMessage {
  if (kind === "inactivity") {
    return {
      embed: {
        title: "💤 Channel Inactive",
        description: `This channel will be deleted in **${minutesLabel(remainingMs)}** due to inactivity.`,
        tone: "danger",
        fields: [{ name: "Keep it alive", value: "Send a message to reset the timer" }],
      },
    };
  }

  return {
    embed: {
      title: "⚠️ Channel Expiring Soon",
      description: `This channel will be deleted in **${minutesLabel(remainingMs)}**!`,
      tone: "warning",
      fields: [{ name: "Want to extend?", value: shortcutLegend() }],
    },
  };
}

const FAREWELL_BY_REASON: Record<DeletionReason, string> = {
  expired: "⏰ Time's up!",
  inactive: "💤 Channel deleted due to inactivity",
  closed: "🔒 Channel closed by its creator",
  force_closed: "🔒 Channel closed by an administrator",
  channel_missing: "",
};

export function farewellMessage(reason: DeletionReason): OutgoingMessage | null {
  const content = FAREWELL_BY_REASON[reason];
  return content ? { content } : null;
}

export function deletionAuditReason(reason: DeletionReason): string {
  return `temp-channel:${reason}`;
}
