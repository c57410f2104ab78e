/**
 * Motivación: centralizar el hook del evento "message Reaction Add" para tener un punto único de suscripción y emisión.
 *
 * Idea/concepto: envuelve la utilería createEventHook para exponer on/once/off/emit/clear tipados.
 *
 * Alcance: administra listeners del evento; no aplica reglas de negocio asociadas al mismo.
 */
import type { ResolveEventParams } from "seyfert";

import { createEventHook } from "@/events/hooks/createEventHook";

export type MessageReactionAddArgs = ResolveEventParams<"messageReactionAdd">;
export type MessageReactionAddListener = (
  ...args: MessageReactionAddArgs
) => Promise<void> | void;

const addHook = createEventHook<MessageReactionAddArgs>({
  name: "messageReactionAdd",
});

export const onMessageReactionAdd = addHook.on;
export const onceMessageReactionAdd = addHook.once;
export const offMessageReactionAdd = addHook.off;
export const emitMessageReactionAdd = addHook.emit;
export const clearMessageReactionAddListeners = addHook.clear;
