/**
 * Reenvía el evento `messageCreate` de Seyfert hacia los hooks internos
 * (actividad de canales temporales).
 */
import { createEvent } from "seyfert";
import { emitMessageCreate } from "@/events/hooks/messageCreate";

export default createEvent({
  data: { name: "messageCreate" },
  async run(message, client, shardId) {
    await emitMessageCreate(message, client, shardId);
  },
});
