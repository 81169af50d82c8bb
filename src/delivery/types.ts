/**
 * Delivery-side types: the opaque audio reference handed to a chat transport, and the transport contract.
 */

import type { AudioFormat } from "../adapters/tts";

/** Where the synthesized audio lives; transports convert/upload it as they see fit. */
export interface AudioArtifact {
  uri: string;
  byteLength: number;
  durationSec: number;
  format: AudioFormat;
}

export interface DeliveryPayload {
  /** Always the full reply text. */
  displayText: string;
  audio?: AudioArtifact;
  /** Optional supplementary line (e.g. audio timed out). */
  notice?: string;
}

/** Chat transport: responsible for format conversion and transmission. */
export interface IDeliveryChannel {
  deliver(payload: DeliveryPayload): Promise<void>;
}
