import path from "path";
import dotenv from "dotenv";

dotenv.config();

const defaultHtmlPath = path.resolve(process.cwd(), "data", "station_45807.html");
const defaultJsonPath = path.resolve(process.cwd(), "data", "trips.json");
const defaultSentPath = path.resolve(process.cwd(), "data", "sent.json");

function readNumber(raw: string | undefined, fallback: number): number {
  const value = Number(raw);
  return raw?.trim() && Number.isFinite(value) ? value : fallback;
}

export interface TelegramConfig {
  botToken: string;
  chatId: string;
}

export interface AppConfig {
  scheduleUrl: string;
  htmlPath: string;
  jsonOutPath: string;
  sentStatePath: string;
  dayFilter: string;
  timezone: string;
  requestTimeoutMs: number;
  userAgent: string;
  telegram?: TelegramConfig;
}

const botToken = process.env.TELEGRAM_BOT_TOKEN?.trim();
const chatId = process.env.TELEGRAM_CHAT_ID?.trim();

export const config: AppConfig = {
  scheduleUrl:
    process.env.SCHEDULE_URL?.trim() ??
    "https://www.tutu.ru/station.php?nnst=45807",
  htmlPath: path.resolve(process.env.HTML_PATH?.trim() || defaultHtmlPath),
  jsonOutPath: path.resolve(process.env.JSON_OUT_PATH?.trim() || defaultJsonPath),
  sentStatePath: path.resolve(
    process.env.SENT_STATE_PATH?.trim() || defaultSentPath
  ),
  dayFilter: process.env.DAY_FILTER?.trim() || "all",
  timezone: process.env.TZ?.trim() || "Europe/Moscow",
  requestTimeoutMs: readNumber(process.env.REQUEST_TIMEOUT_MS, 20000),
  userAgent:
    process.env.USER_AGENT?.trim() ||
    "Mozilla/5.0 (compatible; StationTimetable/1.0)",
};

if (botToken && chatId) {
  config.telegram = { botToken, chatId };
}
