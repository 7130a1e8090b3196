import fs from "fs-extra";
import path from "path";
import { config } from "./config";
import { DocumentSourceError } from "./errors";
import { DocumentRequest } from "./types";
import { logger } from "./logger";

export interface StationClientOptions {
  userAgent: string;
  requestTimeoutMs: number;
}

export class StationClient {
  constructor(
    private readonly options: StationClientOptions = {
      userAgent: config.userAgent,
      requestTimeoutMs: config.requestTimeoutMs,
    }
  ) {}

  /**
   * Downloads the station page when a URL is given (saving a copy if asked),
   * otherwise reads the local copy.
   */
  async load(request: DocumentRequest): Promise<string> {
    if (request.url) {
      const html = await this.download(request.url);
      if (request.saveHtmlPath) {
        await fs.outputFile(request.saveHtmlPath, html, "utf-8");
        logger.info(`Saved page copy to ${request.saveHtmlPath}`);
      }
      return html;
    }

    return this.readLocal(request.htmlPath);
  }

  private async download(url: string): Promise<string> {
    logger.info(`Fetching station page ${url}`);

    let response: Response;
    try {
      response = await fetch(url, {
        headers: { "User-Agent": this.options.userAgent },
        signal: AbortSignal.timeout(this.options.requestTimeoutMs),
      });
    } catch (error) {
      throw new DocumentSourceError(
        url,
        `Failed to fetch ${url}: ${(error as Error).message}`
      );
    }

    if (!response.ok) {
      throw new DocumentSourceError(url, `HTTP error! status: ${response.status}`);
    }

    const html = await response.text();
    logger.info(`Fetched HTML (${html.length} chars)`);
    return html;
  }

  private async readLocal(htmlPath: string): Promise<string> {
    const resolved = path.resolve(htmlPath);
    if (!(await fs.pathExists(resolved))) {
      throw new DocumentSourceError(
        resolved,
        `File ${resolved} not found. Pass --url to download the page or point --html at a saved copy.`
      );
    }

    logger.debug(`Reading station page from ${resolved}`);
    return fs.readFile(resolved, "utf-8");
  }
}
