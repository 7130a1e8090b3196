import { classifyDays } from "./dayClassifier";
import { ReferenceInstant, parseReferenceInstant, resolveDeparture } from "./departureResolver";
import { extractRows } from "./rowExtractor";
import { collect, parseDayFilter } from "./tripCollector";
import { TripParser } from "./tripParser";
import { ParsedTrip, ResultEnvelope, Trip } from "./types";
import { logger } from "./logger";

const parser = new TripParser();

export function toTrip(parsed: ParsedTrip, reference: ReferenceInstant): Trip {
  const days = classifyDays(parsed.daysLabel);
  const trip: Trip = {
    time: parsed.time,
    from: parsed.from,
    to: parsed.to,
    days: days.category,
    days_label: days.label,
    departure_iso: resolveDeparture(parsed.time, reference),
  };

  if (parsed.trainNumber) {
    trip.train_number = parsed.trainNumber;
  }
  return trip;
}

/**
 * Turns one station page into a result envelope. Pure: the reference instant
 * is an input, and the same arguments always produce the same envelope.
 *
 * @throws InvalidFilterError before any parsing when the filter is not recognized
 * @throws InvalidReferenceInstantError when requestedAt is not an ISO datetime
 */
export function extract(
  html: string,
  filter: string,
  requestedAt: string
): ResultEnvelope {
  const dayFilter = parseDayFilter(filter);
  const reference = parseReferenceInstant(requestedAt);

  const { trips } = parser.parseAll(extractRows(html));
  const envelope = collect(
    trips.map((parsed) => toTrip(parsed, reference)),
    dayFilter,
    reference.source
  );

  logger.debug(
    `Extracted ${trips.length} trip(s), ${envelope.trips.length} kept by filter "${dayFilter}"`
  );
  return envelope;
}
