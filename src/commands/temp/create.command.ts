/**
 * Motivación: registrar el comando "temp / create" para abrir un canal temporal con tema, visibilidad y duración.
 *
 * Idea/concepto: opciones tipadas de Seyfert; la validación y el aprovisionamiento los hace la fachada.
 *
 * Alcance: maneja la invocación y respuesta del comando; no decide límites ni permisos del canal.
 */
import type { GuildCommandContext } from "seyfert";
import { createStringOption, Declare, Options, SubCommand } from "seyfert";
import { getContextInfo, sendFacadeReply } from "@/adapters/seyfert";
import { ALLOWED_DURATIONS } from "@/modules/temp-channels";

const options = {
  topic: createStringOption({
    description: "What the channel is about",
    required: true,
    max_length: 100,
  }),
  duration: createStringOption({
    description: "How long the channel lives",
    required: true,
    choices: ALLOWED_DURATIONS.map((option) => ({ name: option.key, value: option.key })),
  }),
  visibility: createStringOption({
    description: "Who can see the channel (default: public)",
    required: false,
    choices: [
      { name: "Public - anyone can join", value: "public" },
      { name: "Private - invite only", value: "private" },
    ],
  }),
};

@Declare({
  name: "create",
  description: "Create a temporary channel",
})
@Options(options)
export default class TempCreateCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const { guildId, userId, username } = getContextInfo(ctx);
    await ctx.deferReply(true);

    const reply = await ctx.client.tempChannels.facade.create({
      guildId,
      userId,
      userName: ctx.member?.nick ?? ctx.author.globalName ?? username,
      topic: ctx.options.topic,
      duration: ctx.options.duration,
      visibility: ctx.options.visibility ?? "public",
    });

    await sendFacadeReply(ctx, reply, { ephemeral: true });
  }
}
