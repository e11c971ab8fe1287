/**
 * @ignition/event-store — File-based JSONL EventStore implementation.
 *
 * Stores events as one JSON object per line in a `.jsonl` file.
 *
 * Crash safety:
 * - Each append flushes to disk via fsync before returning
 * - Partial writes (torn pages) are detected and skipped on load
 * - The file is the source of truth; in-memory state is derived
 *
 * File format:
 * Each line is a JSON object with the StoredEvent shape:
 * {"event":{...},"streamId":"ledger","version":1,"globalPosition":1,"appendedAt":"...","hash":"...","previousHash":"genesis"}
 */

import {
  openSync,
  closeSync,
  appendFileSync,
  readFileSync,
  existsSync,
  fsyncSync,
  mkdirSync,
} from "node:fs";
import { dirname } from "node:path";
import { isDomainEvent } from "@ignition/types";
import type { StoredEvent } from "./types.js";
import { BaseEventStore } from "./base-store.js";

/**
 * Options for creating a JsonlEventStore.
 */
export interface JsonlEventStoreOptions {
  /** Path to the JSONL file */
  readonly filePath: string;
}

/**
 * File-based JSONL event store.
 *
 * The in-memory index is rebuilt from the file on construction.
 * If the file does not exist, it is created on first append.
 * The parent directory is created if it doesn't exist.
 */
export class JsonlEventStore extends BaseEventStore {
  private readonly _filePath: string;
  private _skippedLines = 0;

  /** Set when the file ends in a torn line without its newline. */
  private _needsNewline = false;

  constructor(options: JsonlEventStoreOptions) {
    super();
    this._filePath = options.filePath;

    mkdirSync(dirname(this._filePath), { recursive: true });
    this._loadFromFile();
  }

  get filePath(): string {
    return this._filePath;
  }

  /** Lines dropped on load because they were torn or malformed. */
  get skippedLines(): number {
    return this._skippedLines;
  }

  /**
   * Write all lines of the batch in one write, then fsync.
   */
  protected persist(events: readonly StoredEvent[]): void {
    const lines = events.map((e) => JSON.stringify(e) + "\n").join("");
    const data = this._needsNewline ? "\n" + lines : lines;
    const fd = openSync(this._filePath, "a");
    try {
      appendFileSync(fd, data, "utf-8");
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
    this._needsNewline = false;
  }

  private _loadFromFile(): void {
    if (!existsSync(this._filePath)) {
      return;
    }

    const content = readFileSync(this._filePath, "utf-8");
    this._needsNewline = content.length > 0 && !content.endsWith("\n");

    for (const line of content.split("\n")) {
      const trimmed = line.trim();
      if (trimmed.length === 0) {
        continue;
      }

      const record = parseRecord(trimmed);
      if (record === undefined) {
        this._skippedLines++;
        continue;
      }
      this.index(record);
    }
  }
}

function parseRecord(line: string): StoredEvent | undefined {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch {
    // Torn write from an unclean shutdown
    return undefined;
  }
  return isStoredEvent(value) ? value : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isStoredEvent(value: unknown): value is StoredEvent {
  if (!isRecord(value)) return false;
  return (
    isDomainEvent(value.event) &&
    typeof value.streamId === "string" &&
    value.streamId.length > 0 &&
    Number.isSafeInteger(value.version) &&
    Number.isSafeInteger(value.globalPosition) &&
    typeof value.appendedAt === "string" &&
    typeof value.hash === "string" &&
    typeof value.previousHash === "string"
  );
}
