import type { ExecutionFailure, Result } from '@stress-bridge/utils';
import type { StressEvent } from './stress-event.js';
import { createSoftTimeoutEvent, type SoftTimeoutDetails } from './stress-event.js';
import type { EventSink, SoftTimeoutEventRecord, StressEventRecord } from './types.js';

/**
 * Turns invocation outcomes into events. Each StressEvent is reported once;
 * reporting it again throws.
 */
export class StressReporter {
  constructor(private readonly sink: EventSink) {}

  async report(event: StressEvent, outcome: Result<unknown, ExecutionFailure>): Promise<StressEventRecord> {
    if (!outcome.ok && event.failure === undefined) {
      event.recordFailure(outcome.error);
    }
    return event.publish(this.sink);
  }

  async reportSoftTimeout(details: SoftTimeoutDetails): Promise<SoftTimeoutEventRecord> {
    const record = createSoftTimeoutEvent(details);
    await this.sink.publish(record);
    return record;
  }
}
