/**
 * Delivery channels and the optional fallback notice.
 */

import type { Writable } from "stream";
import type { Logger } from "pino";
import type { ResponseResult } from "../pipeline/types";
import type { DeliveryPayload, IDeliveryChannel } from "./types";
import { logger } from "../logging";

export interface NoticeTexts {
  timedOut: string;
  failed: string;
  truncated: string;
}

export const DEFAULT_NOTICES: NoticeTexts = {
  timedOut: "Audio took too long and was skipped; the full reply is above.",
  failed: "Audio is unavailable for this reply.",
  truncated: "Audio covers the beginning of this reply only.",
};

/**
 * A user-facing line for audio problems, or undefined when there is nothing to say.
 * Callers decide whether to surface it.
 */
export function fallbackNotice(result: ResponseResult, texts: NoticeTexts = DEFAULT_NOTICES): string | undefined {
  if (!result.success || result.audioText === undefined) return undefined;
  if (result.timedOut) return texts.timedOut;
  if (!result.audio) return texts.failed;
  if (result.truncated) return texts.truncated;
  return undefined;
}

export function toPayload(result: ResponseResult, withNotice = false): DeliveryPayload {
  const payload: DeliveryPayload = { displayText: result.displayText };
  if (result.audio) payload.audio = result.audio;
  const notice = withNotice ? fallbackNotice(result) : undefined;
  if (notice) payload.notice = notice;
  return payload;
}

/** Writes the reply to a stream (stdout by default) and logs the delivery. */
export class StreamDeliveryChannel implements IDeliveryChannel {
  constructor(
    private readonly out: Writable = process.stdout,
    private readonly log: Logger = logger
  ) {}

  async deliver(payload: DeliveryPayload): Promise<void> {
    const lines = [payload.displayText];
    if (payload.audio) {
      lines.push(`[audio] ${payload.audio.uri} (${payload.audio.durationSec.toFixed(2)}s, ${payload.audio.byteLength} bytes)`);
    }
    if (payload.notice) lines.push(`[notice] ${payload.notice}`);
    this.out.write(lines.join("\n") + "\n");
    this.log.info(
      {
        event: "DELIVERED",
        textLength: payload.displayText.length,
        audioUri: payload.audio?.uri,
        audioBytes: payload.audio?.byteLength,
        notice: payload.notice !== undefined,
      },
      "Reply delivered"
    );
  }
}
