/**
 * Motivación: disparar el barrido periódico del motor de canales temporales
 * (countdown, avisos, expiración e inactividad) desde un único timer.
 *
 * Idea/concepto: `setInterval` con `unref` y un flag `ticking` que descarta el
 * disparo si el barrido anterior sigue corriendo.
 *
 * Alcance: solo agenda; qué hacer con cada canal lo decide `LifecycleEngine.tick`.
 */
import type { LifecycleEngine, TickReport } from "./engine";
import type { TempChannelLogger } from "./types";

export class TempChannelScheduler {
  private timer: NodeJS.Timeout | null = null;
  private ticking = false;

  constructor(
    private readonly engine: Pick<LifecycleEngine, "tick">,
    private readonly intervalMs: number,
    private readonly logger: TempChannelLogger = console,
  ) { }

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => void this.runOnce(), this.intervalMs);
    this.timer.unref?.();
    this.logger.info(`[temp-channels] scheduler started (every ${this.intervalMs}ms)`);
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  /** @returns `null` cuando el barrido se saltó o falló. */
  async runOnce(): Promise<TickReport | null> {
    if (this.ticking) return null;
    this.ticking = true;

    try {
      const report = await this.engine.tick();
      if (report.deleted.length || report.warned.length) {
        this.logger.debug(
          `[temp-channels] tick: ${report.checked} checked, ${report.deleted.length} deleted, ${report.warned.length} warned, ${report.renamed.length} renamed`,
        );
      }
      return report;
    } catch (error) {
      this.logger.error("[temp-channels] tick failed", { error });
      return null;
    } finally {
      this.ticking = false;
    }
  }
}
