/**
 * Reenvía el evento `botReady` de Seyfert hacia los hooks internos.
 */
import { createEvent } from "seyfert";
import { emitBotReady } from "@/events/hooks/botReady";

export default createEvent({
  data: { name: "botReady", once: true },
  async run(user, client, shardId) {
    client.logger.info(`${user.username} is online`);
    await emitBotReady(user, client, shardId);
  },
});
