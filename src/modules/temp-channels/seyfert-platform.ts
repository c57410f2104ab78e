/**
 * Seyfert implementation of `TempChannelPlatform`.
 *
 * Role in system:
 * - The only place the temp channel module touches Discord: channels and
 *   categories through `client.guilds.channels` / `client.channels`,
 *   overwrites through the raw REST proxy, messages and reactions through
 *   their shorters.
 *
 * Invariants:
 * - Never throws; every call resolves to a `Result`.
 * - Unknown channel (10003) on delete is `not_found`, not an error.
 *
 * Gotchas:
 * - Permission sets travel as names inside the module and as bitfield strings
 *   on the wire; `toBitfield`/`fromBitfield` convert between both.
 */
import { Embed, type UsingClient } from "seyfert";
import { EmbedColors } from "seyfert/lib/common";
import {
  type APIChannel,
  type APIOverwrite,
  ChannelType,
  OverwriteType,
  PermissionFlagsBits,
} from "seyfert/lib/types";
import { isTransientDiscordError, isUnknownChannelError } from "@/utils/channelGuard";
import { ErrResult, OkResult } from "@/utils/result";
import { platformError } from "./errors";
import type { TempChannelGuildSettings } from "./guild-settings";
import type {
  CreateChannelParams,
  DeleteOutcome,
  MessageTone,
  OutgoingMessage,
  PlatformResult,
  TempChannelPlatform,
} from "./platform";
import type { CategoryDefaults, GrantDelta, PermissionGrant, PermissionName } from "./types";

const TONE_COLORS: Record<MessageTone, EmbedColors> = {
  info: EmbedColors.Blurple,
  warning: EmbedColors.Orange,
  danger: EmbedColors.Red,
  success: EmbedColors.Green,
};

const isPermissionName = (key: string): key is PermissionName => key in PermissionFlagsBits;

const PERMISSION_NAMES: readonly PermissionName[] = Object.keys(PermissionFlagsBits).filter(isPermissionName);

export function toBitfield(permissions: readonly PermissionName[]): string {
  return permissions
    .reduce((bits, permission) => bits | PermissionFlagsBits[permission], 0n)
    .toString();
}

export function fromBitfield(bitfield: string | undefined): PermissionName[] {
  if (!bitfield) return [];
  const bits = BigInt(bitfield);
  return PERMISSION_NAMES.filter((permission) => (bits & PermissionFlagsBits[permission]) !== 0n);
}

function toOverwrite(grant: PermissionGrant) {
  return {
    id: grant.targetId,
    type: grant.targetType === "role" ? OverwriteType.Role : OverwriteType.Member,
    allow: toBitfield(grant.allow),
    deny: toBitfield(grant.deny),
  };
}

function fromOverwrite(overwrite: APIOverwrite): PermissionGrant {
  return {
    targetId: overwrite.id,
    targetType: overwrite.type === OverwriteType.Role ? "role" : "member",
    allow: fromBitfield(overwrite.allow),
    deny: fromBitfield(overwrite.deny),
  };
}

function fail<T>(error: unknown): PlatformResult<T> {
  return ErrResult(platformError(error, isTransientDiscordError(error)));
}

export class SeyfertTempChannelPlatform implements TempChannelPlatform {
  constructor(
    private readonly client: UsingClient,
    private readonly guildSettings: TempChannelGuildSettings,
  ) { }

  async resolveCategory(guildId: string): Promise<PlatformResult<CategoryDefaults>> {
    try {
      const categoryName = await this.guildSettings.getCategoryName(guildId);
      const channels: APIChannel[] = await this.client.proxy.guilds(guildId).channels.get();
      const wanted = categoryName.toLowerCase();

      for (const channel of channels) {
        if (channel.type !== ChannelType.GuildCategory) continue;
        if (channel.name.toLowerCase() !== wanted) continue;
        return OkResult(
          this.categoryDefaults(guildId, channel.id, channel.permission_overwrites ?? []),
        );
      }

      const created = await this.client.guilds.channels.create(guildId, {
        name: categoryName,
        type: ChannelType.GuildCategory,
      });
      this.client.logger?.info?.(`[temp-channels] created category "${categoryName}" in ${guildId}`);
      return OkResult(this.categoryDefaults(guildId, created.id, []));
    } catch (error) {
      return fail(error);
    }
  }

  async createChannel(params: CreateChannelParams): Promise<PlatformResult<string>> {
    try {
      const channel = await this.client.guilds.channels.create(params.guildId, {
        name: params.name,
        type: ChannelType.GuildText,
        parent_id: params.parentId,
        topic: params.topic,
        permission_overwrites: params.grants.map(toOverwrite),
      });
      return OkResult(channel.id);
    } catch (error) {
      return fail(error);
    }
  }

  async deleteChannel(channelId: string, reason: string): Promise<PlatformResult<DeleteOutcome>> {
    try {
      await this.client.channels.delete(channelId, { reason });
      return OkResult("deleted");
    } catch (error) {
      if (isUnknownChannelError(error)) return OkResult("not_found");
      return fail(error);
    }
  }

  async renameChannel(channelId: string, name: string): Promise<PlatformResult<void>> {
    try {
      await this.client.channels.edit(channelId, { name });
      return OkResult(undefined);
    } catch (error) {
      return fail(error);
    }
  }

  async setChannelTopic(channelId: string, topic: string): Promise<PlatformResult<void>> {
    try {
      await this.client.channels.edit(channelId, { topic });
      return OkResult(undefined);
    } catch (error) {
      return fail(error);
    }
  }

  async applyGrants(channelId: string, delta: GrantDelta): Promise<PlatformResult<void>> {
    try {
      for (const grant of delta.upsert) {
        const { id, ...body } = toOverwrite(grant);
        await this.client.proxy.channels(channelId).permissions(id).put({ body });
      }
      for (const targetId of delta.remove) {
        await this.client.proxy.channels(channelId).permissions(targetId).delete();
      }
      return OkResult(undefined);
    } catch (error) {
      return fail(error);
    }
  }

  async sendMessage(channelId: string, message: OutgoingMessage): Promise<PlatformResult<string>> {
    try {
      const embeds = message.embed ? [this.toEmbed(message.embed)] : undefined;
      const sent = await this.client.messages.write(channelId, {
        content: message.content,
        embeds,
      });
      return OkResult(sent.id);
    } catch (error) {
      return fail(error);
    }
  }

  async addReactions(
    channelId: string,
    messageId: string,
    emojis: readonly string[],
  ): Promise<PlatformResult<void>> {
    try {
      for (const emoji of emojis) {
        await this.client.reactions.add(messageId, channelId, emoji);
      }
      return OkResult(undefined);
    } catch (error) {
      return fail(error);
    }
  }

  private categoryDefaults(
    guildId: string,
    categoryId: string,
    overwrites: readonly APIOverwrite[],
  ): CategoryDefaults {
    return {
      categoryId,
      everyoneRoleId: guildId,
      botId: this.client.botId,
      inherited: overwrites.map(fromOverwrite),
    };
  }

  private toEmbed(embed: NonNullable<OutgoingMessage["embed"]>): Embed {
    const built = new Embed()
      .setTitle(embed.title)
      .setDescription(embed.description)
      .setColor(TONE_COLORS[embed.tone]);
    if (embed.fields?.length) {
      built.addFields(
        embed.fields.map((field) => ({ name: field.name, value: field.value, inline: field.inline })),
      );
    }
    return built;
  }
}
