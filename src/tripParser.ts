import { describeScheduleDays } from "./dayClassifier";
import {
  MalformedRowReason,
  MarkupRow,
  ParseOutcome,
  ParsedTrip,
  PayloadRow,
  RawRow,
} from "./types";
import { logger as rootLogger } from "./logger";

const logger = rootLogger.child("parser");

const TIME_TOKEN = /^([01]\d|2[0-3]):[0-5]\d$/;

// "->", "→", em/en dash, or a hyphen with spaces around it ("Москва-3" stays whole)
const ROUTE_SEPARATOR = /\s*(?:->|→|—|–)\s*|\s+-\s+/;
const DAYS_GROUP = /\(([^()]*)\)\s*$/;
const MARKED_NUMBER = /(?:^|\s)(?:№|No\.|#)\s*([0-9A-Za-zА-Яа-яЁё/-]+)/;
const LEADING_NUMBER = /^(\d{3,6}[A-Za-zА-Яа-я]?)\s+/;
const PAYLOAD_CLOCK = /T(\d{2}):(\d{2})/;
const NUMBER_CELL = /^(?:(?:№|No\.|#)\s*)?(\d{3,6}[A-Za-zА-Яа-яЁё]?)$/;

interface RouteParts {
  from: string;
  to: string;
  trainNumber?: string;
  daysLabel: string;
}

type RouteOutcome =
  | { ok: true; parts: RouteParts }
  | { ok: false; reason: MalformedRowReason };

export interface ParseSummary {
  trips: ParsedTrip[];
  skipped: number;
  reasons: Partial<Record<MalformedRowReason, number>>;
}

export class TripParser {
  parse(row: RawRow): ParseOutcome {
    return row.kind === "payload" ? this.fromPayload(row) : this.fromMarkup(row);
  }

  /** Parses every row, dropping the malformed ones. Never throws on a bad row. */
  parseAll(rows: Iterable<RawRow>): ParseSummary {
    const summary: ParseSummary = { trips: [], skipped: 0, reasons: {} };

    for (const row of rows) {
      const outcome = this.parse(row);
      if (outcome.ok) {
        summary.trips.push(outcome.trip);
        continue;
      }

      summary.skipped += 1;
      summary.reasons[outcome.reason] = (summary.reasons[outcome.reason] ?? 0) + 1;
      logger.debug(`Skipped row (${outcome.reason}): ${describe(row)}`);
    }

    if (summary.skipped > 0) {
      logger.info(
        `Parsed ${summary.trips.length} trip(s), skipped ${summary.skipped} malformed row(s)`
      );
    }
    return summary;
  }

  private fromMarkup(row: MarkupRow): ParseOutcome {
    const cells = (row.cells ?? []).map(collapse).filter(Boolean);
    const [firstCell = ""] = cells;
    if (cells.length > 1 && TIME_TOKEN.test(firstCell)) {
      return this.fromCells(firstCell, cells.slice(1));
    }

    const text = collapse(row.text);
    const space = text.indexOf(" ");
    const head = space === -1 ? text : text.slice(0, space);

    if (!TIME_TOKEN.test(head)) {
      return reject("time");
    }

    const route = splitRoute(space === -1 ? "" : text.slice(space + 1));
    if (!route.ok) {
      return reject(route.reason);
    }
    return accept(head, route.parts);
  }

  /**
   * Table rows keep their cells apart: the route comes from the first cell
   * with a separator, a cell holding only a number is the train number, and
   * the last other cell after the route is the days label.
   */
  private fromCells(time: string, cells: string[]): ParseOutcome {
    const routeIndex = cells.findIndex((cell) => ROUTE_SEPARATOR.test(cell));
    if (routeIndex === -1) {
      return reject("separator");
    }

    const route = splitRoute(cells[routeIndex] ?? "");
    if (!route.ok) {
      return reject(route.reason);
    }

    const parts = { ...route.parts };
    let trailingLabel = "";
    cells.forEach((cell, index) => {
      if (index === routeIndex) {
        return;
      }
      const number = NUMBER_CELL.exec(cell);
      if (number) {
        if (!parts.trainNumber) {
          parts.trainNumber = number[1];
        }
      } else if (index > routeIndex) {
        trailingLabel = unwrap(cell);
      }
    });

    if (!parts.daysLabel) {
      parts.daysLabel = trailingLabel;
    }
    return accept(time, parts);
  }

  private fromPayload(row: PayloadRow): ParseOutcome {
    const clock = PAYLOAD_CLOCK.exec(row.departure);
    const time = clock ? `${clock[1]}:${clock[2]}` : "";
    const from = row.from.trim();
    const to = row.to.trim();

    if (!TIME_TOKEN.test(time)) {
      return reject("time");
    }
    if (!from || !to) {
      return reject("payload");
    }

    const trip: ParsedTrip = {
      time,
      from,
      to,
      daysLabel: describeScheduleDays(row.scheduleDays),
    };
    if (row.trainNumber) {
      trip.trainNumber = row.trainNumber;
    }
    return { ok: true, trip };
  }
}

// Everything after the time: route, optional train number, optional "(days)"
function splitRoute(text: string): RouteOutcome {
  let rest = text;

  let daysLabel = "";
  const daysMatch = DAYS_GROUP.exec(rest);
  if (daysMatch) {
    daysLabel = (daysMatch[1] ?? "").trim();
    rest = rest.slice(0, daysMatch.index);
  }

  let trainNumber: string | undefined;
  const marked = MARKED_NUMBER.exec(rest);
  if (marked) {
    trainNumber = marked[1];
    rest = `${rest.slice(0, marked.index)} ${rest.slice(marked.index + marked[0].length)}`;
  } else {
    const leading = LEADING_NUMBER.exec(rest);
    if (leading) {
      trainNumber = leading[1];
      rest = rest.slice(leading[0].length);
    }
  }

  const pieces = rest.trim().split(ROUTE_SEPARATOR);
  if (pieces.length < 2) {
    return { ok: false, reason: "separator" };
  }

  const [from = "", to = ""] = pieces.map((piece) => piece.trim());
  if (pieces.length > 2 || !from || !to) {
    return { ok: false, reason: "route" };
  }

  const parts: RouteParts = { from, to, daysLabel };
  if (trainNumber) {
    parts.trainNumber = trainNumber;
  }
  return { ok: true, parts };
}

function accept(time: string, parts: RouteParts): ParseOutcome {
  const trip: ParsedTrip = { time, from: parts.from, to: parts.to, daysLabel: parts.daysLabel };
  if (parts.trainNumber) {
    trip.trainNumber = parts.trainNumber;
  }
  return { ok: true, trip };
}

function collapse(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

function unwrap(cell: string): string {
  const wrapped = /^\((.*)\)$/.exec(cell);
  return (wrapped ? wrapped[1] ?? "" : cell).trim();
}

function reject(reason: MalformedRowReason): ParseOutcome {
  return { ok: false, reason };
}

function describe(row: RawRow): string {
  return row.kind === "markup"
    ? `"${row.text}"`
    : `${row.departure} ${row.from} -> ${row.to}`;
}
