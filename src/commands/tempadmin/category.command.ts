/**
 * Motivación: registrar el comando "tempadmin / category" para elegir bajo qué categoría se crean los canales temporales.
 *
 * Alcance: guarda el nombre en la config del servidor; la categoría se crea en el próximo `/temp create` si no existe.
 */
import type { GuildCommandContext } from "seyfert";
import { createStringOption, Declare, Options, SubCommand } from "seyfert";
import { actorFromContext, sendFacadeReply } from "@/adapters/seyfert";

const options = {
  name: createStringOption({
    description: "Category name",
    required: true,
    max_length: 100,
  }),
};

@Declare({
  name: "category",
  description: "Set the category temporary channels are created in",
  defaultMemberPermissions: ["ManageChannels"],
})
@Options(options)
export default class TempAdminCategoryCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const reply = await ctx.client.tempChannels.facade.setCategory(
      ctx.guildId,
      actorFromContext(ctx),
      ctx.options.name,
    );
    await sendFacadeReply(ctx, reply, { ephemeral: true });
  }
}
