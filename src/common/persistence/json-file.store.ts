import { promises as fs } from "fs";
import { dirname } from "path";
import { BaseService } from "../base/base.service";
import { toError } from "../types/error-handling";

/**
 * Turns parsed JSON into the store's shape, or undefined when it does not fit.
 */
export type JsonDecoder<T> = (raw: unknown) => T | undefined;

/**
 * Durable home of a single document.
 */
export interface DocumentStore<T> {
  load(): Promise<T | undefined>;
  save(data: T): Promise<void>;
}

/**
 * One JSON document on disk.
 * A missing, unreadable or malformed file loads as `undefined` so callers can start empty.
 */
export class JsonFileStore<T> extends BaseService implements DocumentStore<T> {
  private pendingWrite: Promise<void> = Promise.resolve();

  constructor(
    readonly filePath: string,
    private readonly decode: JsonDecoder<T>
  ) {
    super();
  }

  async load(): Promise<T | undefined> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, "utf8");
    } catch (error) {
      if (isMissingFile(error)) {
        this.logDebug(`No stored data at ${this.filePath}`);
      } else {
        this.logWarning(`Could not read ${this.filePath}: ${toError(error).message}`);
      }
      return undefined;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      this.logWarning(`Ignoring corrupt JSON in ${this.filePath}: ${toError(error).message}`);
      return undefined;
    }

    const decoded = this.decode(raw);
    if (decoded === undefined) {
      this.logWarning(`Ignoring ${this.filePath}: unexpected document shape`);
    }
    return decoded;
  }

  /**
   * Writes to a sibling temp file and renames it over the target.
   * Saves on one store run one after another, in call order.
   */
  save(data: T): Promise<void> {
    const write = this.pendingWrite.then(() => this.write(data));
    this.pendingWrite = write.catch((error: unknown) => {
      this.logDebug(`Write to ${this.filePath} failed: ${toError(error).message}`);
    });
    return write;
  }

  private async write(data: T): Promise<void> {
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    await fs.mkdir(dirname(this.filePath), { recursive: true });
    await fs.writeFile(tempPath, JSON.stringify(data, null, 2), "utf8");
    await fs.rename(tempPath, this.filePath);
  }
}

function isMissingFile(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}
