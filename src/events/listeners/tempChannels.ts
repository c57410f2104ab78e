/**
 * Motivación: conectar los eventos de Discord con el motor de canales temporales.
 *
 * Idea/concepto: cada mensaje humano cuenta como actividad, las reacciones de
 * atajo extienden el canal, un canal borrado a mano se olvida y el scheduler
 * arranca cuando el bot está listo.
 *
 * Alcance: solo traduce payloads; las reglas viven en `@/modules/temp-channels`.
 */
import { onBotReady } from "@/events/hooks/botReady";
import { onChannelDelete } from "@/events/hooks/channelEvents";
import { onMessageCreate } from "@/events/hooks/messageCreate";
import { onMessageReactionAdd } from "@/events/hooks/messageReaction";

onBotReady((_user, client) => {
  client.tempChannels.scheduler.start();
});

onMessageCreate(async (message, client) => {
  if (!message.guildId || message.author.bot || message.webhookId) return;
  await client.tempChannels.engine.recordActivity(message.channelId);
});

onMessageReactionAdd(async (reaction, client) => {
  if (!reaction.guildId || reaction.userId === client.botId) return;

  const reply = await client.tempChannels.facade.extendByReaction({
    channelId: reaction.channelId,
    messageId: reaction.messageId,
    userId: reaction.userId,
    emoji: reaction.emoji.name,
  });
  if (!reply?.ok) return;

  await client.messages
    .write(reaction.channelId, { content: reply.content })
    .catch((error: unknown) => {
      client.logger?.warn?.("[temp-channels] extension reply failed", { error });
    });
});

onChannelDelete(async (channel, client) => {
  const dropped = await client.tempChannels.engine.handleChannelRemoved(channel.id);
  if (dropped) {
    client.logger?.info?.(`[temp-channels] ${channel.id} was deleted outside the bot`);
  }
});
