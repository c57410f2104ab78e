/**
 * Motivación: registrar el comando "temp / invite" para dar acceso a un canal temporal privado.
 *
 * Alcance: actúa sobre el canal actual; los permisos los calcula el planificador del módulo.
 */
import type { GuildCommandContext } from "seyfert";
import {
  createUserOption,
  Declare,
  InteractionGuildMember,
  Options,
  SubCommand,
} from "seyfert";
import { actorFromContext, sendFacadeReply } from "@/adapters/seyfert";

const options = {
  user: createUserOption({
    description: "Member to invite",
    required: true,
  }),
};

@Declare({
  name: "invite",
  description: "Give someone access to this private temporary channel",
})
@Options(options)
export default class TempInviteCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const { user } = ctx.options;
    const target = user instanceof InteractionGuildMember ? user.user : user;
    const reply = await ctx.client.tempChannels.facade.invite({
      channelId: ctx.channelId,
      actor: actorFromContext(ctx),
      targetId: user.id,
      targetIsBot: target.bot === true,
    });
    await sendFacadeReply(ctx, reply);
  }
}
