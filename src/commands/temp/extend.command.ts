/**
 * Motivación: registrar el comando "temp / extend" como alternativa a las reacciones de atajo.
 *
 * Alcance: extiende el canal donde se ejecuta; la regla del tope de vida la aplica el motor.
 */
import type { GuildCommandContext } from "seyfert";
import { createStringOption, Declare, Options, SubCommand } from "seyfert";
import { actorFromContext, sendFacadeReply } from "@/adapters/seyfert";
import { EXTENSION_SHORTCUTS } from "@/modules/temp-channels";

const options = {
  amount: createStringOption({
    description: "How much time to add",
    required: true,
    choices: EXTENSION_SHORTCUTS.map((shortcut) => ({
      name: `+${shortcut.amount}`,
      value: shortcut.amount,
    })),
  }),
};

@Declare({
  name: "extend",
  description: "Add time to this temporary channel",
})
@Options(options)
export default class TempExtendCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const reply = await ctx.client.tempChannels.facade.extend({
      channelId: ctx.channelId,
      actor: actorFromContext(ctx),
      amount: ctx.options.amount,
    });
    await sendFacadeReply(ctx, reply);
  }
}
