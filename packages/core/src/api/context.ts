import type { Session } from '../session/session.js';
import type { Clock } from '../utils/clock.js';
import type { Logger } from '../utils/logger.js';
import type { ApiCaller } from './caller.js';

/** Everything an operation module needs to talk to one site */
export interface ApiContext {
  readonly session: Session;
  readonly api: ApiCaller;
  readonly clock: Clock;
  readonly logger: Logger;
}
