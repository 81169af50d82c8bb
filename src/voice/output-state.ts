/**
 * VoiceOutputState: the persisted per-session voice output flag.
 *
 * - Loaded lazily from the StateStore on first access; an unreadable or corrupt record
 *   reads as disabled (logged, never thrown).
 * - Writes are serialized per instance and get() waits for queued writes, so a toggle
 *   is visible to every read issued after it.
 * - A failed persist keeps the new value for the rest of the session.
 */

import type { StateStore, VoiceOutputRecord } from "./state-store";
import { errMessage, logger, logVoiceToggle } from "../logging";
import { DEFAULT_DISABLED_STATUS, DEFAULT_ENABLED_STATUS } from "../config";

export interface VoiceOutputStateOptions {
  /** Session key in the store. */
  key: string;
  store: StateStore;
  /** Clock for lastUpdated; injectable for tests. */
  now?: () => Date;
  /** Lines returned by statusInfo(). */
  statusText?: { enabled: string; disabled: string };
}

const INITIAL_RECORD: VoiceOutputRecord = { enabled: false, lastUpdated: null };

export class VoiceOutputState {
  readonly key: string;
  private readonly store: StateStore;
  private readonly now: () => Date;
  private readonly statusText: { enabled: string; disabled: string };
  private record: VoiceOutputRecord = { ...INITIAL_RECORD };
  private loading: Promise<void> | null = null;
  private tail: Promise<void> = Promise.resolve();

  constructor(options: VoiceOutputStateOptions) {
    this.key = options.key;
    this.store = options.store;
    this.now = options.now ?? (() => new Date());
    this.statusText = options.statusText ?? { enabled: DEFAULT_ENABLED_STATUS, disabled: DEFAULT_DISABLED_STATUS };
  }

  async get(): Promise<boolean> {
    await this.settled();
    return this.record.enabled;
  }

  /** No write happens when the value is already current. */
  set(enabled: boolean): Promise<void> {
    return this.enqueue(async () => {
      if (this.record.enabled === enabled) return;
      await this.commit(enabled);
    });
  }

  /** Flip and persist; resolves with the new value. */
  toggle(): Promise<boolean> {
    return this.enqueue(async () => {
      const next = !this.record.enabled;
      await this.commit(next);
      return next;
    });
  }

  async snapshot(): Promise<VoiceOutputRecord> {
    await this.settled();
    return { ...this.record };
  }

  async statusInfo(): Promise<string> {
    return (await this.get()) ? this.statusText.enabled : this.statusText.disabled;
  }

  private async settled(): Promise<void> {
    await this.ensureLoaded();
    await this.tail;
  }

  private enqueue<T>(op: () => Promise<T>): Promise<T> {
    const run = this.tail.then(() => this.ensureLoaded()).then(op);
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private ensureLoaded(): Promise<void> {
    if (!this.loading) this.loading = this.load();
    return this.loading;
  }

  private async load(): Promise<void> {
    try {
      const stored = await this.store.read(this.key);
      if (stored) this.record = { ...stored };
    } catch (err) {
      this.record = { ...INITIAL_RECORD };
      logger.warn(
        { event: "VOICE_STATE_LOAD_FAILED", sessionKey: this.key, err: errMessage(err) },
        "Voice state unreadable; treating voice output as disabled"
      );
    }
  }

  private async commit(enabled: boolean): Promise<void> {
    const next: VoiceOutputRecord = { enabled, lastUpdated: this.now().toISOString() };
    this.record = next;
    logVoiceToggle(logger, enabled, this.key);
    try {
      await this.store.write(this.key, next);
    } catch (err) {
      logger.warn(
        { event: "VOICE_STATE_SAVE_FAILED", sessionKey: this.key, err: errMessage(err) },
        "Voice state not persisted; keeping it for this session"
      );
    }
  }
}
