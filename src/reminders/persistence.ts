import fs from "fs";
import path from "path";
import { PersistenceError, describeError } from "./errors";
import {
  type Reminder,
  type RemindersFile,
  CURRENT_REMINDERS_VERSION,
  RemindersFileSchema,
} from "./schema";
import { DEFAULT_TIMEZONE } from "./time";

export interface PersistenceCollaborator {
  loadAll(): Promise<Reminder[]>;
  saveAll(reminders: Reminder[]): Promise<void>;
}

/**
 * Stores reminders as a single JSON document.
 */
export class JsonFilePersistence implements PersistenceCollaborator {
  constructor(
    private readonly filePath: string,
    private readonly timezone: string = DEFAULT_TIMEZONE,
  ) {}

  /**
   * Missing file means no reminders yet. Anything unreadable is a PersistenceError.
   */
  async loadAll(): Promise<Reminder[]> {
    let content: string;
    try {
      content = await fs.promises.readFile(this.filePath, "utf8");
    } catch (e) {
      if (isMissingFile(e)) {
        console.log(`[Persistence] No reminders file at ${this.filePath}, starting fresh`);
        return [];
      }
      throw new PersistenceError(`Failed to read ${this.filePath}: ${describeError(e)}`, e);
    }

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (e) {
      throw new PersistenceError(`${this.filePath} is not valid JSON: ${describeError(e)}`, e);
    }

    const parsed = RemindersFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new PersistenceError(
        `${this.filePath} has an unexpected shape: ${parsed.error.issues[0]?.message ?? "unknown issue"}`,
        parsed.error,
      );
    }
    return parsed.data.reminders;
  }

  /**
   * Writes to a temporary file first, then renames it over the target.
   */
  async saveAll(reminders: Reminder[]): Promise<void> {
    const data: RemindersFile = {
      version: CURRENT_REMINDERS_VERSION,
      timezone: this.timezone,
      reminders,
    };
    const tmpPath = `${this.filePath}.tmp`;

    try {
      await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.promises.writeFile(tmpPath, JSON.stringify(data, null, 2), "utf8");
      await fs.promises.rename(tmpPath, this.filePath);
    } catch (e) {
      throw new PersistenceError(`Failed to write ${this.filePath}: ${describeError(e)}`, e);
    }
  }
}

function isMissingFile(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}

/**
 * Serializes saves so at most one write is in flight. Requests that arrive
 * during a write collapse into one follow-up write of the latest snapshot.
 * Failures are reported, never thrown back at the caller.
 */
export class PersistenceWriter {
  private savePromise: Promise<void> = Promise.resolve();
  private pending: Reminder[] | null = null;
  private writing = false;

  constructor(
    private readonly persistence: PersistenceCollaborator,
    private readonly onFailure: (error: PersistenceError) => void = () => {},
  ) {}

  request(snapshot: Reminder[]): void {
    this.pending = snapshot;
    if (this.writing) {
      return;
    }
    this.writing = true;
    this.savePromise = this.drain().catch((e) => {
      console.error("[Persistence] Save queue failed:", e);
    });
  }

  /**
   * Resolves once every requested snapshot has been written (or has failed).
   */
  flush(): Promise<void> {
    return this.savePromise;
  }

  private async drain(): Promise<void> {
    try {
      while (this.pending) {
        const snapshot = this.pending;
        this.pending = null;
        await this.write(snapshot);
      }
    } finally {
      this.writing = false;
    }
  }

  private async write(snapshot: Reminder[]): Promise<void> {
    try {
      await this.persistence.saveAll(snapshot);
      console.log(`[Persistence] Saved ${snapshot.length} reminders`);
    } catch (e) {
      const error =
        e instanceof PersistenceError
          ? e
          : new PersistenceError(`Failed to save reminders: ${describeError(e)}`, e);
      console.error(`[Persistence] ${error.message}`);
      this.onFailure(error);
    }
  }
}
