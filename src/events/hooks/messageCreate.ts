/**
 * Motivación: centralizar el hook del evento "message Create" para tener un punto único de suscripción y emisión.
 *
 * Idea/concepto: envuelve la utilería createEventHook para exponer on/once/off/emit/clear tipados.
 *
 * Alcance: administra listeners del evento; no aplica reglas de negocio asociadas al mismo.
 */
import type { ResolveEventParams } from "seyfert";

import { createEventHook } from "@/events/hooks/createEventHook";

export type MessageCreateArgs = ResolveEventParams<"messageCreate">;
export type MessageCreateListener = (
  ...args: MessageCreateArgs
) => Promise<void> | void;

const createHook = createEventHook<MessageCreateArgs>({
  name: "messageCreate",
});

export const onMessageCreate = createHook.on;
export const onceMessageCreate = createHook.once;
export const offMessageCreate = createHook.off;
export const emitMessageCreate = createHook.emit;
export const clearMessageCreateListeners = createHook.clear;
