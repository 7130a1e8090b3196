import * as cheerio from "cheerio";
import { PayloadRow, RawRow } from "./types";
import { logger as rootLogger } from "./logger";

const logger = rootLogger.child("rows");

/** A markup row has to start with a time-like token followed by more text. */
export const ROW_SHAPE = /^\d{1,2}:\d{2}\s+\S/;

const ROW_ELEMENTS = "tr, li, p, div";

function collapse(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

export function matchesRowShape(text: string): boolean {
  return ROW_SHAPE.test(text);
}

/**
 * Yields schedule rows in document order. The timetable embedded in the
 * Next.js payload wins over markup when it has any usable entry.
 */
export function* extractRows(html: string): Generator<RawRow> {
  const $ = cheerio.load(html);

  const payloadRows = readPayloadRows($);
  if (payloadRows.length > 0) {
    logger.debug(`Using ${payloadRows.length} row(s) from __NEXT_DATA__`);
    yield* payloadRows;
    return;
  }

  for (const element of $(ROW_ELEMENTS).toArray()) {
    const $element = $(element);
    const isTableRow = element.tagName === "tr";
    // A table row is one unit; elsewhere only innermost candidates count
    const nested = isTableRow
      ? $element.find("tr").length > 0
      : $element.parents("tr").length > 0 || $element.find(ROW_ELEMENTS).length > 0;
    if (nested) {
      continue;
    }

    if (isTableRow) {
      const cells = $element
        .children("td, th")
        .map((_, cell) =>
          spaced(
            $(cell)
              .contents()
              .map((__, child) => $(child).text())
              .get()
          )
        )
        .get()
        .filter(Boolean);
      const text = cells.join(" ");
      if (matchesRowShape(text)) {
        yield { kind: "markup", text, cells };
      }
      continue;
    }

    const text = spaced(
      $element
        .contents()
        .map((_, child) => $(child).text())
        .get()
    );
    if (matchesRowShape(text)) {
      yield { kind: "markup", text };
    }
  }
}

// Child node texts get a space between them; text() alone turns <span>04:10</span><span>A</span> into "04:10A"
function spaced(parts: string[]): string {
  return collapse(parts.join(" "));
}

function readPayloadRows($: cheerio.CheerioAPI): PayloadRow[] {
  const script = $("script#__NEXT_DATA__").first();
  const body = script.length > 0 ? script.text().trim() : "";
  if (!body) {
    return [];
  }

  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch (error) {
    logger.warn(`Ignoring unreadable __NEXT_DATA__: ${(error as Error).message}`);
    return [];
  }

  const timetable = findTimetable(dig(data, ["props", "pageProps", "values"]));
  const rows: PayloadRow[] = [];
  let skipped = 0;

  for (const item of timetable) {
    const row = toPayloadRow(item);
    if (row) {
      rows.push(row);
    } else {
      skipped += 1;
    }
  }

  if (skipped > 0) {
    logger.info(`Skipped ${skipped} incomplete timetable entr${skipped === 1 ? "y" : "ies"}`);
  }
  return rows;
}

// The key holding the timetable is generated per page, so take the first one that has it
function findTimetable(values: unknown): unknown[] {
  if (!isRecord(values)) {
    return [];
  }

  for (const value of Object.values(values)) {
    if (isRecord(value) && Array.isArray(value.timetable)) {
      return value.timetable;
    }
  }

  logger.debug("No timetable block in __NEXT_DATA__");
  return [];
}

function toPayloadRow(item: unknown): PayloadRow | null {
  const departure = dig(item, ["departureDateTime"]);
  const from = dig(item, ["train", "route", "departure", "name"]);
  const to = dig(item, ["train", "route", "arrival", "name"]);

  if (typeof departure !== "string" || typeof from !== "string" || typeof to !== "string") {
    return null;
  }

  const number = dig(item, ["train", "number"]);
  const schedule = dig(item, ["schedule"]);
  const row: PayloadRow = {
    kind: "payload",
    departure,
    from,
    to,
    scheduleDays: Array.isArray(schedule)
      ? schedule.filter((day): day is number => typeof day === "number")
      : [],
  };

  if ((typeof number === "string" || typeof number === "number") && String(number).trim()) {
    row.trainNumber = String(number).trim();
  }

  return row;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function dig(value: unknown, keys: string[]): unknown {
  let current = value;
  for (const key of keys) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[key];
  }
  return current;
}
