import { describe, expect, it } from "vitest";
import { InvalidFilterError, InvalidReferenceInstantError } from "./errors";
import { extract } from "./scheduleExtractor";
import { Trip } from "./types";

const REQUESTED_AT = "2025-11-21T12:00:00";

const PAGE = `
<html><body>
  <header><a href="/">На главную</a></header>
  <ul class="timetable">
    <li>04:10 Москва Ярославская -&gt; Болшево (будни)</li>
    <li>4:10 Москва Ярославская -&gt; Болшево (будни)</li>
    <li>04:37 Москва Ярославская -&gt; Мытищи (ежедневно)</li>
    <li>05:15 6003 Москва Ярославская → Пушкино (ежедневно)</li>
    <li>24:10 Москва Ярославская -&gt; Болшево (будни)</li>
    <li>12:00 -&gt; Болшево (будни)</li>
    <li>13:05 Москва Ярославская -&gt; Фрязево (по выходным)</li>
    <li>14:00 Москва Ярославская -&gt; Монино (кроме пятниц)</li>
    <li>15:00 Москва Ярославская Болшево (будни)</li>
  </ul>
</body></html>`;

const BOLSHEVO: Trip = {
  time: "04:10",
  from: "Москва Ярославская",
  to: "Болшево",
  days: "weekdays",
  days_label: "будни",
  departure_iso: "2025-11-22T04:10:00",
};
const MYTISHCHI: Trip = {
  time: "04:37",
  from: "Москва Ярославская",
  to: "Мытищи",
  days: "daily",
  days_label: "ежедневно",
  departure_iso: "2025-11-22T04:37:00",
};
const PUSHKINO: Trip = {
  time: "05:15",
  from: "Москва Ярославская",
  to: "Пушкино",
  train_number: "6003",
  days: "daily",
  days_label: "ежедневно",
  departure_iso: "2025-11-22T05:15:00",
};
const FRYAZEVO: Trip = {
  time: "13:05",
  from: "Москва Ярославская",
  to: "Фрязево",
  days: "weekends",
  days_label: "по выходным",
  departure_iso: "2025-11-21T13:05:00",
};
const MONINO: Trip = {
  time: "14:00",
  from: "Москва Ярославская",
  to: "Монино",
  days: "unknown",
  days_label: "кроме пятниц",
  departure_iso: "2025-11-21T14:00:00",
};

describe("extract", () => {
  it("returns every well-formed trip in document order for the all filter", () => {
    expect(extract(PAGE, "all", REQUESTED_AT)).toEqual({
      requested_at: REQUESTED_AT,
      filter: "all",
      trips: [BOLSHEVO, MYTISHCHI, PUSHKINO, FRYAZEVO, MONINO],
    });
  });

  it("resolves the weekday and daily rows against the reference instant", () => {
    const { trips } = extract(PAGE, "all", REQUESTED_AT);
    expect(trips[0]?.departure_iso).toBe("2025-11-22T04:10:00");
    expect(trips[0]?.days).toBe("weekdays");
    expect(trips[1]?.days).toBe("daily");
    expect(trips[1]?.departure_iso).toBe("2025-11-22T04:37:00");
  });

  it.each([
    ["weekdays", [BOLSHEVO]],
    ["daily", [MYTISHCHI, PUSHKINO]],
    ["weekends", [FRYAZEVO]],
    ["unknown", [MONINO]],
  ] as const)("keeps only %s trips", (filter, expected) => {
    const envelope = extract(PAGE, filter, REQUESTED_AT);
    expect(envelope.filter).toBe(filter);
    expect(envelope.trips).toEqual(expected);
  });

  it("accepts the Russian filter names and yields an ordered subset", () => {
    const all = extract(PAGE, "все", REQUESTED_AT).trips;
    const daily = extract(PAGE, "ежедневно", REQUESTED_AT);

    expect(daily.filter).toBe("daily");
    const positions = daily.trips.map((trip) => all.findIndex((candidate) => candidate.to === trip.to));
    expect(positions).toEqual([1, 2]);
  });

  it("throws InvalidFilterError for an unknown filter", () => {
    expect(() => extract(PAGE, "sometimes", REQUESTED_AT)).toThrow(InvalidFilterError);
  });

  it("checks the filter before the reference instant", () => {
    expect(() => extract(PAGE, "sometimes", "not-a-date")).toThrow(InvalidFilterError);
    expect(() => extract(PAGE, "all", "not-a-date")).toThrow(InvalidReferenceInstantError);
  });

  it("returns an empty envelope for a page without rows", () => {
    expect(extract("", "all", REQUESTED_AT)).toEqual({
      requested_at: REQUESTED_AT,
      filter: "all",
      trips: [],
    });
  });

  it("is idempotent for identical inputs", () => {
    const first = JSON.stringify(extract(PAGE, "all", REQUESTED_AT));
    const second = JSON.stringify(extract(PAGE, "all", REQUESTED_AT));
    expect(second).toBe(first);
  });

  it("survives a JSON round trip unchanged", () => {
    const envelope = extract(PAGE, "all", REQUESTED_AT);
    const restored: unknown = JSON.parse(JSON.stringify(envelope));
    expect(restored).toStrictEqual(JSON.parse(JSON.stringify(envelope)));
    expect(restored).toEqual(envelope);
  });

  it("omits train_number when the row has none", () => {
    const [first] = extract(PAGE, "all", REQUESTED_AT).trips;
    expect(first).toBeDefined();
    expect(Object.keys(first ?? {})).not.toContain("train_number");
  });

  it("returns a frozen envelope", () => {
    const envelope = extract(PAGE, "all", REQUESTED_AT);
    expect(Object.isFrozen(envelope)).toBe(true);
    expect(Object.isFrozen(envelope.trips)).toBe(true);
  });

  it("stores the reference instant without surrounding whitespace", () => {
    const envelope = extract(PAGE, "all", `  ${REQUESTED_AT}\n`);
    expect(envelope.requested_at).toBe(REQUESTED_AT);
    expect(envelope.trips[0]?.departure_iso).toBe("2025-11-22T04:10:00");
  });

  it("reads days and train numbers from their own table cells", () => {
    const html = `<table>
      <tr><td>04:10</td><td>Москва Ярославская -&gt; Болшево</td><td>будни</td></tr>
      <tr><td>05:15</td><td>Москва Ярославская → Пушкино</td><td>6003</td><td>выходные</td></tr>
    </table>
    <ul><li><span>06:00</span><span>Мытищи → Болшево</span><span>(ежедневно)</span></li></ul>`;

    expect(extract(html, "all", REQUESTED_AT).trips).toEqual([
      BOLSHEVO,
      { ...PUSHKINO, days: "weekends", days_label: "выходные" },
      {
        time: "06:00",
        from: "Мытищи",
        to: "Болшево",
        days: "daily",
        days_label: "ежедневно",
        departure_iso: "2025-11-22T06:00:00",
      },
    ]);
  });
});
