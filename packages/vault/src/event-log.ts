/**
 * VaultEventLog — in-memory, ordered log of observable records.
 *
 * Properties:
 * - Append-only; sequence numbers start at 1 and have no gaps
 * - Synchronous subscription dispatch, in append order
 * - A throwing subscriber is logged and skipped; it never fails the
 *   operation that produced the records
 * - No durability (state is lost on process exit)
 */

import type { RecordedEvent, VaultEvent, VaultEventType } from "@wtoken/types";
import type { VaultLogger } from "./types.js";
import { silentLogger } from "./types.js";

export type EventHandler = (record: RecordedEvent) => void;

export interface Subscription {
  unsubscribe(): void;
}

export interface ReadEventsOptions {
  /** First sequence number to return (inclusive). Default: 1 */
  readonly fromSequence?: number;

  /** Maximum number of records to return. Default: all */
  readonly maxCount?: number;

  /** Only records of this type. Default: every type */
  readonly type?: VaultEventType;
}

export class VaultEventLog {
  private readonly _log: RecordedEvent[] = [];
  private readonly _subscribers = new Set<EventHandler>();

  constructor(
    private readonly logger: VaultLogger = silentLogger,
    private readonly now: () => Date = () => new Date(),
  ) {}

  // ─── Append ─────────────────────────────────────────────────────────

  /**
   * Append a batch of records committed by one operation.
   * All records of a batch share the same timestamp.
   */
  append(events: readonly VaultEvent[]): readonly RecordedEvent[] {
    if (events.length === 0) {
      return [];
    }

    const recordedAt = this.now().toISOString();
    const recorded: RecordedEvent[] = [];
    for (const event of events) {
      const entry: RecordedEvent = {
        sequence: this._log.length + 1,
        recordedAt,
        event,
      };
      this._log.push(entry);
      recorded.push(entry);
    }

    this._dispatch(recorded);
    return recorded;
  }

  // ─── Read ───────────────────────────────────────────────────────────

  readAll(options?: ReadEventsOptions): readonly RecordedEvent[] {
    const fromSequence = options?.fromSequence ?? 1;
    const maxCount = options?.maxCount;
    const type = options?.type;

    let result = this._log.filter(
      (e) => e.sequence >= fromSequence && (type === undefined || e.event.type === type),
    );
    if (maxCount !== undefined && maxCount >= 0) {
      result = result.slice(0, maxCount);
    }
    return result;
  }

  /** Sequence number of the last record, 0 when empty. */
  lastSequence(): number {
    return this._log.length;
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribe(handler: EventHandler): Subscription {
    this._subscribers.add(handler);
    return {
      unsubscribe: () => {
        this._subscribers.delete(handler);
      },
    };
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _dispatch(records: readonly RecordedEvent[]): void {
    for (const handler of this._subscribers) {
      for (const record of records) {
        try {
          handler(record);
        } catch (err) {
          this.logger.error(
            { err, sequence: record.sequence, type: record.event.type },
            "Event subscriber failed",
          );
        }
      }
    }
  }
}
