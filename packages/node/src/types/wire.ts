/**
 * JSON encoding of domain values.
 *
 * Amounts are bigint in the domain and base-10 strings on the wire.
 */

import type { RecordedEvent } from "@wtoken/types";

export type WireValue = string | number | boolean;

/**
 * Flatten a record of primitives, turning every bigint into its
 * decimal string.
 */
export function toWire(value: object): Record<string, WireValue> {
  const out: Record<string, WireValue> = {};
  for (const [key, field] of Object.entries(value)) {
    if (typeof field === "bigint") {
      out[key] = field.toString();
    } else if (
      typeof field === "string" ||
      typeof field === "number" ||
      typeof field === "boolean"
    ) {
      out[key] = field;
    }
  }
  return out;
}

export interface RecordedEventDto {
  readonly sequence: number;
  readonly recordedAt: string;
  readonly event: Record<string, WireValue>;
}

export function toEventDto(record: RecordedEvent): RecordedEventDto {
  return {
    sequence: record.sequence,
    recordedAt: record.recordedAt,
    event: toWire(record.event),
  };
}
