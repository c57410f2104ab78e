/**
 * Motivación: registrar el comando "temp / list" para ver los canales temporales propios y el tiempo restante.
 */
import type { GuildCommandContext } from "seyfert";
import { Declare, SubCommand } from "seyfert";
import { getContextInfo, sendFacadeReply } from "@/adapters/seyfert";

@Declare({
  name: "list",
  description: "List your active temporary channels",
})
export default class TempListCommand extends SubCommand {
  async run(ctx: GuildCommandContext) {
    const { guildId, userId } = getContextInfo(ctx);
    const reply = ctx.client.tempChannels.facade.list(guildId, userId);
    await sendFacadeReply(ctx, reply, { ephemeral: true });
  }
}
