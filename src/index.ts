/**
 * Motivación: punto de arranque del bot para inicializar el cliente de Seyfert, el sistema de canales temporales y registrar comandos/eventos.
 *
 * Idea/concepto: prepara el cliente con su extensión (`client.tempChannels`) y carga los listeners antes de iniciar.
 *
 * Alcance: orquesta el bootstrap, la subida de comandos y el apagado ordenado; no contiene reglas de negocio.
 */
import "module-alias/register";
import "dotenv/config";

import type { ParseClient } from "seyfert";
import { Client } from "seyfert";
import {
  createTempChannelSystem,
  guildSettings,
  loadTempChannelSettings,
  SeyfertTempChannelPlatform,
  type TempChannelSystem,
} from "@/modules/temp-channels";

import "./events/listeners"; // ! Registra los listeners en sus hooks antes de que lleguen eventos

const client = new Client<true>();

client.tempChannels = createTempChannelSystem({
  platform: new SeyfertTempChannelPlatform(client, guildSettings),
  settings: loadTempChannelSettings(),
  logger: client.logger,
});

async function bootstrap(): Promise<void> {
  console.log("[bootstrap] Starting bot...");
  await client.start();
  await client.uploadCommands({ cachePath: "./commands.json" });
}

async function shutdown(signal: string): Promise<void> {
  console.log(`[bootstrap] ${signal} received, draining temporary channels...`);
  try {
    await client.tempChannels.shutdown();
  } catch (error) {
    console.error("[bootstrap] shutdown failed:", error);
  } finally {
    process.exit(0);
  }
}

process.once("SIGINT", () => void shutdown("SIGINT"));
process.once("SIGTERM", () => void shutdown("SIGTERM"));

bootstrap().catch((error) => {
  console.error("[bootstrap] Failed to start bot:", error);
});

declare module "seyfert" {
  interface UsingClient extends ParseClient<Client<true>> {
    tempChannels: TempChannelSystem;
  }
  interface Client<Ready extends boolean = boolean> {
    tempChannels: TempChannelSystem;
  }
}
