import { WaypointNotReadyError } from '../core';

export type ReadinessState = 'pending' | 'ready' | 'failed-timeout';

export interface ReadinessOptions {
  /** Name reported in the timeout error */
  name: string;
  timeoutSeconds: number;
  /** Seconds between probes (defaults to 5) */
  intervalSeconds?: number;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Polls a readiness probe until it succeeds or the deadline passes.
 *
 * pending -> ready on the first successful probe, pending -> failed-timeout
 * once the deadline is reached. Both end states are final.
 */
export class ReadinessWaiter {
  private current: ReadinessState = 'pending';

  constructor(
    private readonly probe: () => Promise<boolean>,
    private readonly options: ReadinessOptions,
  ) {}

  get state(): ReadinessState {
    return this.current;
  }

  async wait(): Promise<void> {
    if (this.current === 'ready') return;
    if (this.current === 'failed-timeout') {
      throw new WaypointNotReadyError(this.options.name, this.options.timeoutSeconds);
    }

    const interval = (this.options.intervalSeconds ?? 5) * 1000;
    const deadline = Date.now() + this.options.timeoutSeconds * 1000;

    for (;;) {
      if (await this.probe()) {
        this.current = 'ready';
        return;
      }
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        this.current = 'failed-timeout';
        throw new WaypointNotReadyError(this.options.name, this.options.timeoutSeconds);
      }
      await sleep(Math.min(interval, remaining));
    }
  }
}
