/**
 * Reenvía el evento `messageReactionAdd` de Seyfert hacia los hooks internos
 * (atajos de extensión de canales temporales).
 */
import { createEvent } from "seyfert";
import { emitMessageReactionAdd } from "@/events/hooks/messageReaction";

export default createEvent({
  data: { name: "messageReactionAdd" },
  async run(reaction, client, shardId) {
    await emitMessageReactionAdd(reaction, client, shardId);
  },
});
