/**
 * Motivación: registrar el comando "tempadmin / force-close" para cerrar cualquier canal temporal sin importar su dueño.
 */
import type { GuildCommandContext } from "seyfert";
import { createChannelOption, Declare, Options, SubCommand } from "seyfert";
import { ChannelType } from "seyfert/lib/types";
import { actorFromContext, sendFacadeReply } from "@/adapters/seyfert";

const options = {
  channel: createChannelOption({
    description: "Temporary channel to close (default: this one)",
    required: false,
    channel_types: [ChannelType.GuildText],
  }),
};

@Declare({
  name: "force-close",
  description: "Close a temporary channel regardless of its owner",
  defaultMemberPermissions: ["ManageChannels"],
})
@Options(options)
export default class TempAdminForceCloseCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const channelId = ctx.options.channel?.id ?? ctx.channelId;
    const reply = await ctx.client.tempChannels.facade.forceClose(
      channelId,
      actorFromContext(ctx),
    );
    await sendFacadeReply(ctx, reply, { ephemeral: true });
  }
}
