/**
 * Reenvía el evento `channelDelete` de Seyfert hacia los hooks internos
 * (canales temporales borrados a mano).
 */
import { createEvent } from "seyfert";
import { emitChannelDelete } from "@/events/hooks/channelEvents";

export default createEvent({
  data: { name: "channelDelete" },
  async run(...args) {
    await emitChannelDelete(...args);
  },
});
