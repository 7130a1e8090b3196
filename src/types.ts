export const DAY_CATEGORIES = ["daily", "weekdays", "weekends", "unknown"] as const;

export type DayCategory = (typeof DAY_CATEGORIES)[number];

export type DayFilter = "all" | DayCategory;

export interface MarkupRow {
  kind: "markup";
  text: string; // Whitespace-collapsed text of one row, e.g. "04:10 A -> B (будни)"
  cells?: string[]; // Table rows only, one entry per td/th
}

export interface PayloadRow {
  kind: "payload";
  departure: string; // departureDateTime as found in __NEXT_DATA__
  from: string;
  to: string;
  trainNumber?: string;
  scheduleDays: number[]; // ISO weekdays, 1 = Monday
}

export type RawRow = MarkupRow | PayloadRow;

export type MalformedRowReason = "time" | "separator" | "route" | "payload";

export interface ParsedTrip {
  time: string; // Format: "HH:MM"
  from: string;
  to: string;
  trainNumber?: string;
  daysLabel: string;
}

export type ParseOutcome =
  | { ok: true; trip: ParsedTrip }
  | { ok: false; reason: MalformedRowReason };

export interface DayClassification {
  category: DayCategory;
  label: string;
}

export interface Trip {
  time: string;
  from: string;
  to: string;
  train_number?: string;
  days: DayCategory;
  days_label: string;
  departure_iso: string;
}

export interface ResultEnvelope {
  readonly requested_at: string;
  readonly filter: DayFilter;
  readonly trips: readonly Trip[];
}

export interface DocumentRequest {
  url?: string;
  htmlPath: string;
  saveHtmlPath?: string;
}

export interface SentSnapshot {
  filter: DayFilter;
  trips: Array<Omit<Trip, "departure_iso">>;
}
