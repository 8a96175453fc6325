/**
 * Token store
 *
 * Holds zero or one token blob. The store does not interpret the blob; the
 * parser supplied by the API client decides whether stored content is usable.
 */

import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { setupLogger } from "../lib/logger.js";

const logger = setupLogger("token-store");

export interface TokenStore<T> {
  read(): Promise<T | null>;
  write(value: T): Promise<void>;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Single JSON file at a fixed path.
 *
 * - Missing file: null
 * - Unparseable or unrecognised content: null (warning logged)
 * - Write: creates the parent directory, replaces the file via rename, mode 0600
 */
export class FileTokenStore<T> implements TokenStore<T> {
  constructor(
    readonly path: string,
    private readonly parse: (raw: unknown) => T | null
  ) {}

  async read(): Promise<T | null> {
    let text: string;
    try {
      text = await readFile(this.path, "utf8");
    } catch (error) {
      if (isNotFound(error)) {
        logger.debug(`No token file at ${this.path}`);
        return null;
      }
      throw error;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch {
      logger.warn(`Ignoring unreadable token file ${this.path}`);
      return null;
    }

    const value = this.parse(raw);
    if (value === null) {
      logger.warn(`Ignoring token file with unexpected content ${this.path}`);
    }
    return value;
  }

  async write(value: T): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    const tmpPath = `${this.path}.${process.pid}.tmp`;
    await writeFile(tmpPath, JSON.stringify(value, null, 2), { mode: 0o600 });
    await rename(tmpPath, this.path);
    logger.info(`Tokens saved to ${this.path}`);
  }
}

/**
 * In-memory store (tests, or running without a writable filesystem).
 */
export class MemoryTokenStore<T> implements TokenStore<T> {
  writes = 0;

  constructor(private value: T | null = null) {}

  async read(): Promise<T | null> {
    return this.value;
  }

  async write(value: T): Promise<void> {
    this.value = value;
    this.writes += 1;
  }
}
