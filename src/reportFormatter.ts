import { parseReferenceInstant } from "./departureResolver";
import { Logger, logger as rootLogger } from "./logger";
import { ResultEnvelope, Trip } from "./types";

const FILTER_TITLES: Record<ResultEnvelope["filter"], string> = {
  all: "все рейсы",
  daily: "ежедневно",
  weekdays: "будни",
  weekends: "выходные",
  unknown: "прочие",
};

function requestDate(envelope: ResultEnvelope): string {
  return parseReferenceInstant(envelope.requested_at).dateTime.toFormat(
    "yyyy-MM-dd HH:mm:ss"
  );
}

export function formatTripLine(trip: Trip): string {
  const days = trip.days_label ? ` (${trip.days_label})` : "";
  return `${trip.time} ${trip.from} -> ${trip.to}${days}`;
}

/** Console summary: request date followed by one line per trip. */
export function formatReport(envelope: ResultEnvelope): string[] {
  return [
    `Request date: ${requestDate(envelope)}`,
    ...envelope.trips.map(formatTripLine),
  ];
}

export function logReport(
  envelope: ResultEnvelope,
  log: Pick<Logger, "info"> = rootLogger.child("report")
): void {
  formatReport(envelope).forEach((line) => log.info(line));
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}

export function formatTelegramMessage(envelope: ResultEnvelope): string {
  const lines: string[] = [];

  lines.push("🚆 <b>Расписание электричек</b>");
  lines.push(`📅 <b>Запрос:</b> ${requestDate(envelope)}`);
  lines.push(`🔎 <b>Фильтр:</b> ${FILTER_TITLES[envelope.filter]}`);

  if (envelope.trips.length === 0) {
    lines.push("\nРейсов не найдено");
    return lines.join("\n");
  }

  lines.push("");
  envelope.trips.forEach((trip) => {
    const number = trip.train_number ? ` №${escapeHtml(trip.train_number)}` : "";
    const days = trip.days_label ? ` <i>(${escapeHtml(trip.days_label)})</i>` : "";
    lines.push(
      `<b>${trip.time}</b> ${escapeHtml(trip.from)} → ${escapeHtml(trip.to)}${number}${days}`
    );
  });

  return lines.join("\n");
}
