import { EventEmitter } from "events";
import type { AlertEvent } from "../alerts/types.js";
import type { MetricSample } from "../collector/types.js";
import { debug, describeError } from "../logging/logger.js";

export interface TickPipeline {
  collect: () => Promise<MetricSample[]>;
  evaluate: (samples: readonly MetricSample[]) => AlertEvent[];
  publish: (samples: readonly MetricSample[]) => void;
  /** Called last, with the batch and the alerts it raised. */
  onSnapshot?: (samples: readonly MetricSample[], events: AlertEvent[]) => void;
}

export interface TickResult {
  samples: MetricSample[];
  events: AlertEvent[];
  durationMs: number;
}

/**
 * One collect, evaluate, publish, snapshot pass. Alerts are decided before
 * the new states go out.
 */
export async function runTick(pipeline: TickPipeline): Promise<TickResult> {
  const started = Date.now();
  const samples = await pipeline.collect();
  const events = pipeline.evaluate(samples);
  pipeline.publish(samples);
  pipeline.onSnapshot?.(samples, events);
  return { samples, events, durationMs: Date.now() - started };
}

export interface MonitorLoopOptions {
  /** Seconds between the end of one tick and the start of the next. */
  interval: number;
}

/**
 * Runs ticks back to back with a fixed pause between them; ticks never
 * overlap. Emits "tick" with a TickResult and "tick-error" with the error.
 */
export class MonitorLoop extends EventEmitter {
  private controller: AbortController | null = null;
  private running = false;
  private intervalMs: number;

  constructor(private pipeline: TickPipeline, options: MonitorLoopOptions) {
    super();
    this.intervalMs = options.interval * 1000;
  }

  isRunning(): boolean {
    return this.running;
  }

  /** Resolves once stop() has been called and the current tick has finished. */
  async run(): Promise<void> {
    if (this.running) return;
    this.running = true;
    const controller = new AbortController();
    this.controller = controller;
    console.log(`[Monitor] Starting loop (interval: ${this.intervalMs / 1000}s)`);

    while (!controller.signal.aborted) {
      try {
        const result = await runTick(this.pipeline);
        debug(`[Monitor] Tick: ${result.samples.length} samples, ${result.events.length} alerts in ${result.durationMs}ms`);
        this.emit("tick", result);
      } catch (error) {
        console.error(`[Monitor] Tick failed: ${describeError(error)}`);
        this.emit("tick-error", error);
      }

      if (controller.signal.aborted) break;
      await this.wait(controller.signal);
    }

    this.running = false;
    this.controller = null;
    console.log("[Monitor] Loop stopped");
  }

  stop(): void {
    this.controller?.abort();
  }

  /** Resolves after the interval, or as soon as the signal aborts. */
  private wait(signal: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      if (signal.aborted) {
        resolve();
        return;
      }
      const done = () => {
        clearTimeout(timer);
        signal.removeEventListener("abort", done);
        resolve();
      };
      const timer = setTimeout(done, this.intervalMs);
      signal.addEventListener("abort", done, { once: true });
    });
  }
}
