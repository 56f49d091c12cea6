import { ErrorHandler } from '../errors/ErrorHandler';
import { LedgerEvent, LedgerEventType, RecordedEvent } from '../types/Events';
import { Logger } from '../utils/logger';

export type EventCallback = (recorded: RecordedEvent) => void;

export type EventSubscription = LedgerEventType | '*';

/**
 * Append-only ledger event log with a callback bus. The pool publishes a batch's events only
 * after the batch commits; wallets read the log from a cursor.
 */
export class EventMonitor {
  private readonly log: RecordedEvent[] = [];
  private readonly callbacks: Map<EventSubscription, EventCallback[]> = new Map();
  private readonly logger = Logger.getInstance();

  /**
   * Registers a callback for a specific event type, or '*' for every event
   */
  on(eventType: EventSubscription, callback: EventCallback): void {
    const callbacks = this.callbacks.get(eventType) || [];
    callbacks.push(callback);
    this.callbacks.set(eventType, callbacks);
  }

  off(eventType: EventSubscription, callback: EventCallback): void {
    const callbacks = this.callbacks.get(eventType) || [];
    const index = callbacks.indexOf(callback);
    if (index !== -1) {
      callbacks.splice(index, 1);
      this.callbacks.set(eventType, callbacks);
    }
  }

  /**
   * Appends events to the log and notifies subscribers in order
   */
  publish(events: LedgerEvent[]): RecordedEvent[] {
    const recorded = events.map(event => {
      const entry: RecordedEvent = { sequence: this.log.length, event };
      this.log.push(entry);
      return entry;
    });
    recorded.forEach(entry => this.notifyCallbacks(entry));
    return recorded;
  }

  /**
   * Events with sequence >= fromSequence
   */
  getEvents(fromSequence: number = 0): RecordedEvent[] {
    return this.log.slice(Math.max(0, fromSequence));
  }

  getNextSequence(): number {
    return this.log.length;
  }

  /**
   * Re-delivers recorded events to a single callback, e.g. to bring a new subscriber up to date
   */
  replay(callback: EventCallback, fromSequence: number = 0): number {
    const events = this.getEvents(fromSequence);
    events.forEach(callback);
    return this.log.length;
  }

  private notifyCallbacks(entry: RecordedEvent): void {
    const callbacks = [...(this.callbacks.get(entry.event.type) || []), ...(this.callbacks.get('*') || [])];
    for (const callback of callbacks) {
      try {
        callback(entry);
      } catch (error) {
        // Subscribers run after commit; a failing subscriber cannot undo the batch
        ErrorHandler.getInstance().handleError(error, { operation: 'eventCallback', eventType: entry.event.type });
        this.logger.error('Event callback failed', { sequence: entry.sequence });
      }
    }
  }
}
