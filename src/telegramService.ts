import TelegramBot from "node-telegram-bot-api";
import { formatTelegramMessage } from "./reportFormatter";
import { areSnapshotsEqual, isSentSnapshot, toSentSnapshot } from "./snapshotState";
import { StorageService } from "./storageService";
import { ResultEnvelope, SentSnapshot } from "./types";
import { logger } from "./logger";

export interface MessageSender {
  sendMessage(
    chatId: string,
    text: string,
    options: TelegramBot.SendMessageOptions
  ): Promise<unknown>;
}

export type PublishResult = "sent" | "unchanged" | "failed";

export class TelegramService {
  private readonly sentState: StorageService<SentSnapshot>;

  constructor(
    private readonly bot: MessageSender,
    private readonly chatId: string,
    sentStatePath: string
  ) {
    if (!chatId) {
      throw new Error("TELEGRAM_CHAT_ID is required");
    }
    this.sentState = new StorageService(sentStatePath, isSentSnapshot);
  }

  static fromToken(botToken: string, chatId: string, sentStatePath: string): TelegramService {
    if (!botToken) {
      throw new Error("TELEGRAM_BOT_TOKEN is required");
    }
    const bot = new TelegramBot(botToken, { polling: false });
    logger.info("TelegramService initialized");
    return new TelegramService(bot, chatId, sentStatePath);
  }

  /**
   * Sends the snapshot unless it matches the last one sent. The sent state is
   * only updated after a successful delivery.
   */
  async publish(envelope: ResultEnvelope): Promise<PublishResult> {
    const snapshot = toSentSnapshot(envelope);
    const lastSent = await this.sentState.load();

    if (lastSent && areSnapshotsEqual(snapshot, lastSent)) {
      logger.info("Timetable unchanged since last delivery, skipping Telegram notification");
      return "unchanged";
    }

    try {
      await this.bot.sendMessage(this.chatId, formatTelegramMessage(envelope), {
        parse_mode: "HTML",
        disable_web_page_preview: true,
      });
    } catch (error) {
      logger.error(
        `Failed to send message to Telegram: ${(error as Error).message}`,
        error
      );
      return "failed";
    }

    await this.sentState.save(snapshot);
    logger.info(`Successfully sent timetable to Telegram chat ${this.chatId}`);
    return "sent";
  }
}
