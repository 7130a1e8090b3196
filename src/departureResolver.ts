import { DateTime } from "luxon";
import { InvalidReferenceInstantError, TimetableError } from "./errors";
import { logger as rootLogger } from "./logger";

const logger = rootLogger.child("clock");

const CLOCK_TIME = /^([01]\d|2[0-3]):([0-5]\d)$/;
// Offset written after the time part: "...T12:00:00Z", "...T12:00+03:00"
const TRAILING_OFFSET = /T[\d:.,]+(?:Z|[+-]\d{2}(?::?\d{2})?)$/i;

export interface ReferenceInstant {
  source: string;
  dateTime: DateTime;
  hasOffset: boolean;
}

export function parseReferenceInstant(value: string): ReferenceInstant {
  const source = value.trim();
  const hasOffset = TRAILING_OFFSET.test(source);
  // Without an offset the wall clock is taken as-is; UTC keeps luxon from applying DST rules
  const dateTime = hasOffset
    ? DateTime.fromISO(source, { setZone: true })
    : DateTime.fromISO(source, { zone: "utc" });

  if (!dateTime.isValid) {
    throw new InvalidReferenceInstantError(value, dateTime.invalidExplanation);
  }

  return { source, dateTime, hasOffset };
}

/**
 * Places a bare "HH:MM" departure on the reference date, or on the day after
 * when it is earlier than the reference time-of-day. A departure at exactly
 * the reference time stays on the same day.
 */
export function resolveDeparture(
  time: string,
  reference: ReferenceInstant | string
): string {
  const instant =
    typeof reference === "string" ? parseReferenceInstant(reference) : reference;
  const match = CLOCK_TIME.exec(time);
  if (!match) {
    throw new TimetableError(`Departure time "${time}" is not in HH:MM format`);
  }

  let candidate = instant.dateTime.set({
    hour: Number(match[1]),
    minute: Number(match[2]),
    second: 0,
    millisecond: 0,
  });
  if (candidate.toMillis() < instant.dateTime.toMillis()) {
    candidate = candidate.plus({ days: 1 });
  }

  const iso = candidate.toISO({
    suppressMilliseconds: true,
    includeOffset: instant.hasOffset,
  });
  if (!iso) {
    throw new InvalidReferenceInstantError(instant.source, candidate.invalidExplanation);
  }
  return iso;
}

/** Wall-clock "now" in the given zone, without offset. */
export function referenceNow(timezone: string): string {
  const zoned = DateTime.now().setZone(timezone);
  if (!zoned.isValid) {
    logger.warn(`Unknown timezone "${timezone}", using the local zone`);
  }
  const now = zoned.isValid ? zoned : DateTime.local();
  return now.toISO({ includeOffset: false }) ?? new Date().toISOString();
}
