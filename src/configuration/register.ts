/**
 * Explicit config schema loader.
 *
 * WHY: config registration is side-effectful; this file centralizes imports so
 * the runtime never depends on implicit load order from commands/listeners.
 */
import "@/modules/features/config";
import "@/modules/temp-channels/config";
