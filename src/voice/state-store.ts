/**
 * Key-value persistence for the per-session voice output record.
 * FileStateStore keeps one JSON file per session key; MemoryStateStore is for tests and ephemeral sessions.
 */

import * as fs from "fs";
import * as path from "path";

export interface VoiceOutputRecord {
  enabled: boolean;
  /** ISO-8601 time of the last change; null until the flag is first changed. */
  lastUpdated: string | null;
}

export interface StateStore {
  /** Resolves undefined when no record exists yet. Rejects with StateStoreError when unreadable or corrupt. */
  read(key: string): Promise<VoiceOutputRecord | undefined>;
  write(key: string, record: VoiceOutputRecord): Promise<void>;
}

export class StateStoreError extends Error {
  constructor(
    message: string,
    readonly key: string,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = "StateStoreError";
  }
}

export function parseVoiceOutputRecord(raw: unknown): VoiceOutputRecord | undefined {
  if (typeof raw !== "object" || raw === null) return undefined;
  if (!("enabled" in raw) || typeof raw.enabled !== "boolean") return undefined;
  const lastUpdated = "lastUpdated" in raw ? raw.lastUpdated : null;
  if (lastUpdated !== null && lastUpdated !== undefined && typeof lastUpdated !== "string") return undefined;
  return { enabled: raw.enabled, lastUpdated: lastUpdated ?? null };
}

/**
 * Session keys become file names. Anything outside [A-Za-z0-9_.-], and any leading dot, is written as
 * `%` plus four hex digits of the UTF-16 code unit; the fixed width keeps distinct keys on distinct files.
 */
export function keyToFileName(key: string): string {
  const escape = (c: string): string => `%${c.charCodeAt(0).toString(16).padStart(4, "0")}`;
  const safe = key.replace(/[^A-Za-z0-9_.-]/g, escape);
  return `${safe.replace(/^\.+/, (dots) => escape(".").repeat(dots.length))}.json`;
}

function errorCode(err: unknown): string | undefined {
  return typeof err === "object" && err !== null && "code" in err && typeof err.code === "string" ? err.code : undefined;
}

export class FileStateStore implements StateStore {
  constructor(private readonly dir: string) {}

  pathFor(key: string): string {
    return path.join(this.dir, keyToFileName(key));
  }

  async read(key: string): Promise<VoiceOutputRecord | undefined> {
    const file = this.pathFor(key);
    let content: string;
    try {
      content = await fs.promises.readFile(file, "utf8");
    } catch (err) {
      if (errorCode(err) === "ENOENT") return undefined;
      throw new StateStoreError(`Cannot read voice state at ${file}`, key, err);
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (err) {
      throw new StateStoreError(`Corrupt voice state at ${file}`, key, err);
    }
    const record = parseVoiceOutputRecord(parsed);
    if (!record) throw new StateStoreError(`Unexpected voice state shape at ${file}`, key);
    return record;
  }

  /** Write to a temp file then rename, so readers see the old or the new record, never a partial one. */
  async write(key: string, record: VoiceOutputRecord): Promise<void> {
    const file = this.pathFor(key);
    const tmp = `${file}.${process.pid}.${Date.now()}.tmp`;
    try {
      await fs.promises.mkdir(this.dir, { recursive: true });
      await fs.promises.writeFile(tmp, JSON.stringify(record, null, 2), "utf8");
      await fs.promises.rename(tmp, file);
    } catch (err) {
      await fs.promises.rm(tmp, { force: true });
      throw new StateStoreError(`Cannot write voice state at ${file}`, key, err);
    }
  }
}

export class MemoryStateStore implements StateStore {
  private readonly records = new Map<string, VoiceOutputRecord>();

  async read(key: string): Promise<VoiceOutputRecord | undefined> {
    const r = this.records.get(key);
    return r ? { ...r } : undefined;
  }

  async write(key: string, record: VoiceOutputRecord): Promise<void> {
    this.records.set(key, { ...record });
  }
}
