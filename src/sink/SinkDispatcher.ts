import logger from '../logging/Logger';

export const DEFAULT_SINK_TIMEOUT_MS = 2000;

type SinkCallOutcome = 'settled' | 'timed-out';

/**
 * Calls into the sink on behalf of the inspector. The call itself happens
 * synchronously, but its promise is only observed, never awaited by the
 * request: a slow sink is bounded by a timeout and a failing one is logged.
 */
export class SinkDispatcher {
  private readonly pending = new Set<Promise<SinkCallOutcome>>();

  constructor(private readonly timeoutMs: number = DEFAULT_SINK_TIMEOUT_MS) {}

  public dispatch(label: string, call: () => void | Promise<void>): void {
    let result: void | Promise<void>;
    try {
      result = call();
    } catch (error) {
      logger.error({ error, sinkCall: label }, 'Security event sink call failed');
      return;
    }

    if (result instanceof Promise) {
      this.track(label, result);
    }
  }

  /**
   * Number of sink calls that have neither settled nor timed out
   */
  public get inFlight(): number {
    return this.pending.size;
  }

  /**
   * Wait for every outstanding sink call to settle or time out
   */
  public async drain(): Promise<void> {
    await Promise.all([...this.pending]);
  }

  private track(label: string, call: Promise<void>): void {
    let timer: NodeJS.Timeout | undefined;

    const settled = call.then(
      (): SinkCallOutcome => 'settled',
      (error: unknown): SinkCallOutcome => {
        logger.error({ error, sinkCall: label }, 'Security event sink call failed');
        return 'settled';
      }
    );

    const timedOut = new Promise<SinkCallOutcome>((resolve) => {
      timer = setTimeout(() => resolve('timed-out'), this.timeoutMs);
      timer.unref();
    });

    const outcome = Promise.race([settled, timedOut]).then((result) => {
      clearTimeout(timer);
      this.pending.delete(outcome);
      if (result === 'timed-out') {
        logger.warn(
          { sinkCall: label, timeoutMs: this.timeoutMs },
          'Security event sink call exceeded timeout, continuing without it'
        );
      }
      return result;
    });

    this.pending.add(outcome);
  }
}
