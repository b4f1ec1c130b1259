import { EngineLogger, SimulationSnapshot } from '../types';
import { SimulationEngine } from './SimulationEngine';

export type TickListener = (snapshot: SimulationSnapshot) => void;
export type LoopErrorListener = (error: unknown) => void;

export type SimulationLoopOptions = {
  intervalMs?: number; // wall-clock cadence, defaults to the engine tick duration
  logger?: EngineLogger;
};

/**
 * Steps an engine at a fixed cadence. Every tick advances the engine by its
 * own tick duration regardless of timer jitter; `stop()` takes effect before
 * the next tick.
 */
export class SimulationLoop {
  private timer: NodeJS.Timeout | null = null;
  private readonly intervalMs: number;
  private readonly logger: EngineLogger;
  private tickListeners = new Set<TickListener>();
  private errorListeners = new Set<LoopErrorListener>();

  constructor(private readonly engine: SimulationEngine, opts: SimulationLoopOptions = {}) {
    this.intervalMs = opts.intervalMs ?? engine.getTickDuration() * 1000;
    this.logger = opts.logger ?? console;
  }

  start() {
    if (this.timer) return;
    this.timer = setInterval(() => this.tick(), this.intervalMs);
  }

  stop() {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  isRunning() {
    return this.timer !== null;
  }

  onTick(listener: TickListener) {
    this.tickListeners.add(listener);
    return () => {
      this.tickListeners.delete(listener);
    };
  }

  onError(listener: LoopErrorListener) {
    this.errorListeners.add(listener);
    return () => {
      this.errorListeners.delete(listener);
    };
  }

  // A throwing step or tick listener stops the loop and is reported instead of escaping the timer.
  private tick() {
    try {
      this.engine.step();
      const snapshot = this.engine.snapshot();
      for (const listener of this.tickListeners) listener(snapshot);
    } catch (err) {
      this.fail(err);
    }
  }

  private fail(err: unknown) {
    this.stop();
    if (this.errorListeners.size === 0) {
      this.logger.warn(`Simulation loop stopped: ${err instanceof Error ? err.message : String(err)}`);
    }
    for (const listener of this.errorListeners) listener(err);
  }
}
