#!/usr/bin/env node
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { config } from "./config";
import { referenceNow } from "./departureResolver";
import { logReport } from "./reportFormatter";
import { extract } from "./scheduleExtractor";
import { isResultEnvelope } from "./snapshotState";
import { StationClient } from "./stationClient";
import { StorageService } from "./storageService";
import { TelegramService } from "./telegramService";
import { parseDayFilter } from "./tripCollector";
import { logger } from "./logger";

function parseArgs() {
  return yargs(hideBin(process.argv))
    .scriptName("station-timetable")
    .usage("Parses the commuter-train timetable of one station into JSON")
    .option("html", {
      type: "string",
      default: config.htmlPath,
      describe: "Path to a saved copy of the station page",
    })
    .option("url", {
      type: "string",
      default: config.scheduleUrl,
      describe: 'Download the page from this URL; pass --url "" to read --html instead',
    })
    .option("save-html", {
      type: "string",
      describe: "Where to save the downloaded page (defaults to --html)",
    })
    .option("filter", {
      type: "string",
      default: config.dayFilter,
      describe: "Day filter: all, daily, weekdays, weekends, unknown (or будни, ежедневно, выходные, все)",
    })
    .option("json-out", {
      type: "string",
      default: config.jsonOutPath,
      describe: "Where to write the JSON result",
    })
    .option("requested-at", {
      type: "string",
      describe: "Reference instant (ISO datetime) used instead of the current time",
    })
    .option("telegram", {
      type: "boolean",
      default: true,
      describe: "Send the result to Telegram when it is configured",
    })
    .strict()
    .help()
    .parseSync();
}

async function run(): Promise<void> {
  const argv = parseArgs();
  // Fail on a bad filter before touching the network
  const filter = parseDayFilter(argv.filter);
  const requestedAt = argv["requested-at"] ?? referenceNow(config.timezone);

  const client = new StationClient();
  const html = await client.load({
    url: argv.url || undefined,
    htmlPath: argv.html,
    saveHtmlPath: argv["save-html"] ?? argv.html,
  });

  const envelope = extract(html, filter, requestedAt);

  const storage = new StorageService(argv["json-out"], isResultEnvelope);
  await storage.save(envelope);
  logger.info(`Saved ${envelope.trips.length} trip(s) to ${storage.location}`);

  logReport(envelope);

  if (!argv.telegram) {
    return;
  }
  if (!config.telegram) {
    logger.debug("Telegram service not configured, skipping notification");
    return;
  }

  const telegram = TelegramService.fromToken(
    config.telegram.botToken,
    config.telegram.chatId,
    config.sentStatePath
  );
  await telegram.publish(envelope);
}

run().catch((error) => {
  logger.error(`Run failed: ${(error as Error).message}`);
  process.exit(1);
});
