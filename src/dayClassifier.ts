import { DayCategory, DayClassification } from "./types";

/**
 * Known day-of-operation phrases, checked top to bottom against the folded
 * label. More specific phrases come first: "кроме выходных" has to win over
 * "выходные", and "нерабочие" over "рабочие дни".
 */
export const DAY_PHRASES: ReadonlyArray<readonly [string, DayCategory]> = [
  ["ежедневно", "daily"],
  ["каждый день", "daily"],
  ["every day", "daily"],
  ["daily", "daily"],
  ["нерабочие", "weekends"],
  ["нерабочим", "weekends"],
  ["кроме выходных", "weekdays"],
  ["по рабочим", "weekdays"],
  ["рабочие дни", "weekdays"],
  ["будни", "weekdays"],
  ["будням", "weekdays"],
  ["weekdays", "weekdays"],
  ["кроме будней", "weekends"],
  ["выходные", "weekends"],
  ["выходным", "weekends"],
  ["weekends", "weekends"],
];

const EXCEPTION = "кроме";

const SHORT_DAY_NAMES = ["пн", "вт", "ср", "чт", "пт", "сб", "вс"] as const;

function fold(label: string): string {
  return label.toLowerCase().replace(/ё/g, "е").replace(/\s+/g, " ").trim();
}

export function classifyDays(label: string): DayClassification {
  const folded = fold(label);
  // An exception clause decides on its own: "ежедневно, кроме субботы" is not daily
  const exception = folded.indexOf(EXCEPTION);
  const match =
    exception !== -1
      ? DAY_PHRASES.find(([phrase]) => folded.startsWith(phrase, exception))
      : folded
        ? DAY_PHRASES.find(([phrase]) => folded.includes(phrase))
        : undefined;

  return { category: match ? match[1] : "unknown", label };
}

/**
 * Builds a human-readable label from ISO weekday numbers (1 = Monday), as
 * listed in the embedded timetable payload.
 */
export function describeScheduleDays(days: readonly number[]): string {
  const unique = Array.from(
    new Set(days.filter((day) => Number.isInteger(day) && day >= 1 && day <= 7))
  ).sort((a, b) => a - b);
  const key = unique.join(",");

  if (key === "1,2,3,4,5,6,7") {
    return "ежедневно";
  }
  if (key === "1,2,3,4,5") {
    return "будни";
  }
  if (key === "6,7") {
    return "выходные";
  }

  return unique.map((day) => SHORT_DAY_NAMES[day - 1]).join(", ");
}
