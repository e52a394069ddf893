/**
 * Rate governor: database-lag back-off before requests, and the
 * minimum spacing between consecutive mutations.
 */

import type { Clock } from '../utils/clock.js';
import type { Logger } from '../utils/logger.js';
import type { Session } from './session.js';

export interface GovernorOptions {
  /** Minimum time between lag probes */
  lagCheckIntervalMs: number;
  /** Wait between probes while the lag is too high */
  lagWaitMs: number;
}

/** Returns the current replication lag in seconds without going through the governor */
export type LagProbe = () => Promise<number>;

export class RateGovernor {
  constructor(
    private readonly session: Session,
    private readonly clock: Clock,
    private readonly logger: Logger,
    private readonly probe: LagProbe,
    private readonly options: GovernorOptions
  ) {}

  /**
   * Block until replication lag is acceptable. Probes at most once per
   * `lagCheckIntervalMs`; concurrent callers share one probe.
   */
  async awaitLag(): Promise<void> {
    const { session, clock, options } = this;
    if (session.maxLag < 1) return;
    if (clock.now() - session.lastLagCheck < options.lagCheckIntervalMs) return;

    await session.lagLock.runExclusive(async () => {
      if (clock.now() - session.lastLagCheck < options.lagCheckIntervalMs) return;
      session.lastLagCheck = clock.now();

      let lag = await this.probe();
      while (lag > session.maxLag) {
        this.logger.warn(
          `Current database lag ${lag} s exceeds ${session.maxLag} s, waiting ${options.lagWaitMs / 1000} s`
        );
        await clock.sleep(options.lagWaitMs);
        lag = await this.probe();
      }
    });
  }

  /**
   * Sleep out the rest of the throttle for a mutation that began at `startedAt`
   */
  async throttle(startedAt: number): Promise<void> {
    const remaining = this.session.throttleMs - (this.clock.now() - startedAt);
    if (remaining > 0) {
      await this.clock.sleep(remaining);
    }
  }
}
