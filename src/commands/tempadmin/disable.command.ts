/**
 * Motivación: registrar el comando "tempadmin / disable" para cortar la creación de canales temporales.
 *
 * Alcance: los canales ya abiertos siguen su ciclo normal hasta expirar.
 */
import type { GuildCommandContext } from "seyfert";
import { Declare, SubCommand } from "seyfert";
import { actorFromContext, sendFacadeReply } from "@/adapters/seyfert";

@Declare({
  name: "disable",
  description: "Stop members from creating temporary channels",
  defaultMemberPermissions: ["ManageChannels"],
})
export default class TempAdminDisableCommand extends SubCommand {
  async run(ctx: GuildCommandContext) {
    const reply = await ctx.client.tempChannels.facade.setEnabled(
      ctx.guildId,
      actorFromContext(ctx),
      false,
    );
    await sendFacadeReply(ctx, reply, { ephemeral: true });
  }
}
