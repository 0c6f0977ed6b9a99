import { createLogger, type Logger } from '@stress-bridge/utils';
import type { EventRecord, EventSink } from './types.js';

/** Writes every event as one log entry, at a level matching its severity. */
export class LoggerEventSink implements EventSink {
  constructor(private readonly log: Logger = createLogger('events')) {}

  publish(event: EventRecord): void {
    const { kind, severity, ...fields } = event;
    const msg = kind === 'stress' ? 'Stress event' : 'Soft timeout event';
    switch (severity) {
      case 'NORMAL':
        this.log.info(msg, { severity, ...fields });
        break;
      case 'WARNING':
        this.log.warn(msg, { severity, ...fields });
        break;
      case 'ERROR':
      case 'CRITICAL':
        this.log.error(msg, { severity, ...fields });
        break;
    }
  }
}

export class MemoryEventSink implements EventSink {
  readonly events: EventRecord[] = [];

  publish(event: EventRecord): void {
    this.events.push(event);
  }

  ofKind<K extends EventRecord['kind']>(kind: K): Extract<EventRecord, { kind: K }>[] {
    return this.events.filter((event): event is Extract<EventRecord, { kind: K }> => event.kind === kind);
  }
}

/** Forwards to every sink in order. */
export class FanOutEventSink implements EventSink {
  constructor(private readonly sinks: readonly EventSink[]) {}

  async publish(event: EventRecord): Promise<void> {
    for (const sink of this.sinks) {
      await sink.publish(event);
    }
  }
}
