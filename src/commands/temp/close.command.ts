/**
 * Motivación: registrar el comando "temp / close" para cerrar el canal antes de tiempo.
 */
import type { GuildCommandContext } from "seyfert";
import { Declare, SubCommand } from "seyfert";
import { actorFromContext, sendFacadeReply } from "@/adapters/seyfert";

@Declare({
  name: "close",
  description: "Close this temporary channel now",
})
export default class TempCloseCommand extends SubCommand {
  async run(ctx: GuildCommandContext) {
    const reply = await ctx.client.tempChannels.facade.close(ctx.channelId, actorFromContext(ctx));
    await sendFacadeReply(ctx, reply);
  }
}
