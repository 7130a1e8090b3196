import { InvalidFilterError } from "./errors";
import { DAY_CATEGORIES, DayCategory, DayFilter, ResultEnvelope, Trip } from "./types";

export const DAY_FILTERS: readonly DayFilter[] = ["all", ...DAY_CATEGORIES];

// Russian names, as written on the timetable page
const FILTER_ALIASES: Record<string, DayFilter> = {
  все: "all",
  всё: "all",
  ежедневно: "daily",
  будни: "weekdays",
  выходные: "weekends",
};

function isDayFilter(value: string): value is DayFilter {
  return DAY_FILTERS.some((filter) => filter === value);
}

export function parseDayFilter(value: string): DayFilter {
  const normalized = value.trim().toLowerCase();
  if (isDayFilter(normalized)) {
    return normalized;
  }

  const alias = FILTER_ALIASES[normalized];
  if (alias) {
    return alias;
  }

  throw new InvalidFilterError(value, [...DAY_FILTERS, ...Object.keys(FILTER_ALIASES)]);
}

export function filterTrips(trips: readonly Trip[], filter: DayFilter): Trip[] {
  if (filter === "all") {
    return [...trips];
  }
  const category: DayCategory = filter;
  return trips.filter((trip) => trip.days === category);
}

export function collect(
  trips: readonly Trip[],
  filter: DayFilter,
  requestedAt: string
): ResultEnvelope {
  return Object.freeze({
    requested_at: requestedAt,
    filter,
    trips: Object.freeze(filterTrips(trips, filter).map((trip) => Object.freeze({ ...trip }))),
  });
}
