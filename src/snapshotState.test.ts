import { describe, expect, it } from "vitest";
import {
  areSnapshotsEqual,
  isResultEnvelope,
  isSentSnapshot,
  toSentSnapshot,
} from "./snapshotState";
import { ResultEnvelope } from "./types";

const ENVELOPE: ResultEnvelope = {
  requested_at: "2025-11-21T12:00:00",
  filter: "all",
  trips: [
    {
      time: "04:10",
      from: "Москва Ярославская",
      to: "Болшево",
      train_number: "6001",
      days: "weekdays",
      days_label: "будни",
      departure_iso: "2025-11-22T04:10:00",
    },
  ],
};

describe("toSentSnapshot", () => {
  it("drops the resolved departure and request time", () => {
    expect(toSentSnapshot(ENVELOPE)).toEqual({
      filter: "all",
      trips: [
        {
          time: "04:10",
          from: "Москва Ярославская",
          to: "Болшево",
          train_number: "6001",
          days: "weekdays",
          days_label: "будни",
        },
      ],
    });
  });
});

describe("areSnapshotsEqual", () => {
  it("ignores a later run of the same timetable", () => {
    const later: ResultEnvelope = {
      ...ENVELOPE,
      requested_at: "2025-11-22T09:00:00",
      trips: ENVELOPE.trips.map((trip) => ({ ...trip, departure_iso: "2025-11-23T04:10:00" })),
    };
    expect(areSnapshotsEqual(toSentSnapshot(ENVELOPE), toSentSnapshot(later))).toBe(true);
  });

  it("detects changed trips and filters", () => {
    const base = toSentSnapshot(ENVELOPE);
    const relabeled = {
      ...base,
      trips: base.trips.map((trip) => ({ ...trip, days_label: "ежедневно" })),
    };
    expect(areSnapshotsEqual(base, relabeled)).toBe(false);
    expect(areSnapshotsEqual(base, { ...base, filter: "weekdays" })).toBe(false);
    expect(areSnapshotsEqual(base, { ...base, trips: [] })).toBe(false);
  });
});

describe("guards", () => {
  it("recognizes envelopes and snapshots", () => {
    expect(isResultEnvelope(JSON.parse(JSON.stringify(ENVELOPE)))).toBe(true);
    expect(isSentSnapshot(toSentSnapshot(ENVELOPE))).toBe(true);
  });

  it("rejects foreign content", () => {
    expect(isResultEnvelope({ requested_at: "x", filter: "sometimes", trips: [] })).toBe(false);
    expect(isResultEnvelope({ ...ENVELOPE, trips: [{ time: "04:10" }] })).toBe(false);
    expect(isSentSnapshot([])).toBe(false);
    expect(isSentSnapshot(null)).toBe(false);
  });
});
