import { DAY_FILTERS } from "./tripCollector";
import { DAY_CATEGORIES, ResultEnvelope, SentSnapshot, Trip } from "./types";

type SnapshotTrip = SentSnapshot["trips"][number];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isSnapshotTrip(value: unknown): value is SnapshotTrip {
  if (!isRecord(value)) {
    return false;
  }
  const { time, from, to, days, days_label, train_number } = value;
  return (
    typeof time === "string" &&
    typeof from === "string" &&
    typeof to === "string" &&
    typeof days_label === "string" &&
    (train_number === undefined || typeof train_number === "string") &&
    DAY_CATEGORIES.some((category) => category === days)
  );
}

function isTrip(value: unknown): value is Trip {
  return isRecord(value) && typeof value.departure_iso === "string" && isSnapshotTrip(value);
}

function hasFilter(value: Record<string, unknown>): boolean {
  return DAY_FILTERS.some((filter) => filter === value.filter);
}

export function isResultEnvelope(value: unknown): value is ResultEnvelope {
  return (
    isRecord(value) &&
    typeof value.requested_at === "string" &&
    hasFilter(value) &&
    Array.isArray(value.trips) &&
    value.trips.every(isTrip)
  );
}

export function isSentSnapshot(value: unknown): value is SentSnapshot {
  return (
    isRecord(value) &&
    hasFilter(value) &&
    Array.isArray(value.trips) &&
    value.trips.every(isSnapshotTrip)
  );
}

/** Drops the fields that change on every run (request time and resolved dates). */
export function toSentSnapshot(envelope: ResultEnvelope): SentSnapshot {
  return {
    filter: envelope.filter,
    trips: envelope.trips.map(({ departure_iso: _resolved, ...trip }) => trip),
  };
}

export function areSnapshotsEqual(a: SentSnapshot, b: SentSnapshot): boolean {
  if (a.filter !== b.filter || a.trips.length !== b.trips.length) {
    return false;
  }

  return a.trips.every((tripA, index) => {
    const tripB = b.trips[index];
    return (
      tripB !== undefined &&
      tripA.time === tripB.time &&
      tripA.from === tripB.from &&
      tripA.to === tripB.to &&
      tripA.train_number === tripB.train_number &&
      tripA.days === tripB.days &&
      tripA.days_label === tripB.days_label
    );
  });
}
