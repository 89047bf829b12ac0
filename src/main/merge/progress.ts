import { createLogger } from '../logger';
import { errorMessage } from '../errors';
import type { ProgressSink } from '../../shared/merge-types';

const log = createLogger('progress');

/**
 * Wraps a caller's sink so that reported values are integers in 0..100 and
 * never go backwards within a run. A throwing sink is logged and otherwise
 * ignored: progress delivery never aborts a merge.
 */
export class ProgressReporter {
  private last = 0;
  private lastMessage = '';

  constructor(private readonly sink?: ProgressSink) {}

  report(progress: number, message?: string): void {
    const clamped = Math.min(100, Math.max(0, Math.round(progress)));
    const value = Math.max(this.last, clamped);
    if (value !== clamped) {
      log.debug(`Progress ${clamped} below ${this.last}; holding at ${value}`);
    }
    this.last = value;
    if (message !== undefined) this.lastMessage = message;

    if (!this.sink) return;
    try {
      this.sink(value, this.lastMessage);
    } catch (err) {
      log.warn(`Progress sink threw: ${errorMessage(err)}`);
    }
  }
}
