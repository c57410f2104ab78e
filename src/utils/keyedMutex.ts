/**
 * Exclusión mutua por clave.
 *
 * Propósito: linealizar operaciones sobre un mismo recurso (p. ej. un canal
 * temporal) sin bloquear recursos distintos.
 * Invariantes: las tareas de una clave corren en orden FIFO y de a una; una
 * tarea que falla no rompe la cola (el error se propaga solo a su caller).
 * Gotchas: no es reentrante; llamar `runExclusive` con la misma clave desde
 * dentro de la sección crítica produce un deadlock.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, task: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      // Nadie más se encoló detrás: liberar la entrada.
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
