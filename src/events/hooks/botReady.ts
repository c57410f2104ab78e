/**
 * Motivación: centralizar el hook del evento "bot Ready" para arrancar servicios
 * de fondo (p. ej. el scheduler de canales temporales) una vez conectado el bot.
 *
 * Idea/concepto: envuelve la utilería createEventHook y expone la tupla on/once/off/emit/clear.
 *
 * Alcance: administra listeners del evento; no aplica reglas de negocio asociadas al mismo.
 */
import type { ResolveEventParams } from "seyfert";
import { createEventHook } from "@/events/hooks/createEventHook";

/** Parametros tipados que Seyfert provee al evento `botReady`. */
export type BotReadyArgs = ResolveEventParams<"botReady">;
export type BotReadyListener = (...args: BotReadyArgs) => Promise<void> | void;

export const [
  onBotReady,
  onceBotReady,
  offBotReady,
  emitBotReady,
  clearBotReadyListeners,
] = createEventHook<BotReadyArgs>({ name: "botReady" }).make();
