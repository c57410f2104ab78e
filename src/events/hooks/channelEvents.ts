/**
 * Motivación: centralizar el hook del evento "channel Delete" para tener un punto único de suscripción y emisión.
 *
 * Idea/concepto: envuelve la utilería createEventHook para exponer on/once/off/emit/clear tipados.
 *
 * Alcance: administra listeners del evento; no aplica reglas de negocio asociadas al mismo.
 */
import type { ResolveEventParams } from "seyfert";

import { createEventHook } from "@/events/hooks/createEventHook";

export type ChannelDeleteArgs = ResolveEventParams<"channelDelete">;
export type ChannelDeleteListener = (
  ...args: ChannelDeleteArgs
) => Promise<void> | void;

const deleteHook = createEventHook<ChannelDeleteArgs>({
  name: "channelDelete",
});
export const onChannelDelete = deleteHook.on;
export const offChannelDelete = deleteHook.off;
export const emitChannelDelete = deleteHook.emit;
export const clearChannelDeleteListeners = deleteHook.clear;
