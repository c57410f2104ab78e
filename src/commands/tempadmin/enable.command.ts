/**
 * Motivación: registrar el comando "tempadmin / enable" para volver a permitir la creación de canales temporales.
 */
import type { GuildCommandContext } from "seyfert";
import { Declare, SubCommand } from "seyfert";
import { actorFromContext, sendFacadeReply } from "@/adapters/seyfert";

@Declare({
  name: "enable",
  description: "Allow members to create temporary channels",
  defaultMemberPermissions: ["ManageChannels"],
})
export default class TempAdminEnableCommand extends SubCommand {
  async run(ctx: GuildCommandContext) {
    const reply = await ctx.client.tempChannels.facade.setEnabled(
      ctx.guildId,
      actorFromContext(ctx),
      true,
    );
    await sendFacadeReply(ctx, reply, { ephemeral: true });
  }
}
