import fs from "fs-extra";
import path from "path";
import { logger } from "./logger";

export class StorageService<T> {
  constructor(
    private readonly storagePath: string,
    private readonly isValid: (value: unknown) => value is T
  ) {}

  get location(): string {
    return this.storagePath;
  }

  async save(data: T): Promise<void> {
    await fs.ensureDir(path.dirname(this.storagePath));
    // Non-ASCII station names are written as-is
    await fs.writeJSON(this.storagePath, data, { spaces: 2 });
    logger.debug(`Wrote ${this.storagePath}`);
  }

  async load(): Promise<T | null> {
    try {
      if (!(await fs.pathExists(this.storagePath))) {
        return null;
      }

      const data: unknown = await fs.readJSON(this.storagePath);
      if (!this.isValid(data)) {
        logger.warn(`Ignoring ${this.storagePath}: unexpected content`);
        return null;
      }
      return data;
    } catch (error) {
      logger.warn(
        `Failed to read existing file ${this.storagePath}: ${
          (error as Error).message
        }`
      );
      return null;
    }
  }
}
