/**
 * Motivación: dar a cada evento de Seyfert un punto único de suscripción para
 * que varios listeners reaccionen sin registrar eventos duplicados.
 *
 * Idea/concepto: lista de listeners tipada por los argumentos del evento; `emit`
 * los ejecuta todos y un listener que falla no corta a los demás.
 *
 * Alcance: solo despacho; los eventos base (`createEvent`) llaman a `emit`.
 */

export type HookListener<Args extends unknown[]> = (
  ...args: Args
) => Promise<void> | void;

export interface EventHookOptions {
  /** Nombre usado en los logs de error. */
  name?: string;
}

export interface EventHook<Args extends unknown[]> {
  on(listener: HookListener<Args>): () => void;
  once(listener: HookListener<Args>): () => void;
  off(listener: HookListener<Args>): void;
  emit(...args: Args): Promise<void>;
  clear(): void;
  make(): [
    EventHook<Args>["on"],
    EventHook<Args>["once"],
    EventHook<Args>["off"],
    EventHook<Args>["emit"],
    EventHook<Args>["clear"],
  ];
}

export function createEventHook<Args extends unknown[]>(
  options: EventHookOptions = {},
): EventHook<Args> {
  const label = options.name ?? "event";
  const listeners = new Set<HookListener<Args>>();

  const off = (listener: HookListener<Args>): void => {
    listeners.delete(listener);
  };

  const on = (listener: HookListener<Args>): (() => void) => {
    listeners.add(listener);
    return () => off(listener);
  };

  const once = (listener: HookListener<Args>): (() => void) => {
    const wrapped: HookListener<Args> = (...args) => {
      off(wrapped);
      return listener(...args);
    };
    return on(wrapped);
  };

  const emit = async (...args: Args): Promise<void> => {
    const results = await Promise.allSettled(
      [...listeners].map(async (listener) => listener(...args)),
    );
    for (const result of results) {
      if (result.status === "rejected") {
        console.error(`[hooks:${label}] listener failed`, { error: result.reason });
      }
    }
  };

  const clear = (): void => {
    listeners.clear();
  };

  return {
    on,
    once,
    off,
    emit,
    clear,
    make: () => [on, once, off, emit, clear],
  };
}
