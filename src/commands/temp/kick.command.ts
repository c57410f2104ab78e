/**
 * Motivación: registrar el comando "temp / kick" para quitar el acceso de un invitado.
 *
 * Alcance: actúa sobre el canal actual; el creador del canal no puede ser expulsado.
 */
import type { GuildCommandContext } from "seyfert";
import { createUserOption, Declare, Options, SubCommand } from "seyfert";
import { actorFromContext, sendFacadeReply } from "@/adapters/seyfert";

const options = {
  user: createUserOption({
    description: "Member to remove",
    required: true,
  }),
};

@Declare({
  name: "kick",
  description: "Remove someone from this private temporary channel",
})
@Options(options)
export default class TempKickCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const reply = await ctx.client.tempChannels.facade.kick({
      channelId: ctx.channelId,
      actor: actorFromContext(ctx),
      targetId: ctx.options.user.id,
    });
    await sendFacadeReply(ctx, reply);
  }
}
