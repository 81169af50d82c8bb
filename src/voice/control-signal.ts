/**
 * ControlSignalParser: recognizes the two reserved tokens that switch voice output on and off.
 * Everything else is ordinary conversational text.
 */

import type { ControlTokenConfig } from "../config";
import { DEFAULT_DISABLE_TOKEN, DEFAULT_ENABLE_TOKEN } from "../config";

export type ControlSignal = "enable" | "disable" | "none";

const DEFAULT_CONTROL: ControlTokenConfig = {
  enableToken: DEFAULT_ENABLE_TOKEN,
  disableToken: DEFAULT_DISABLE_TOKEN,
  match: "exact",
};

function isRepeatOf(input: string, token: string): boolean {
  if (input.length === 0 || input.length % token.length !== 0) return false;
  for (let i = 0; i < input.length; i += token.length) {
    if (input.slice(i, i + token.length) !== token) return false;
  }
  return true;
}

export class ControlSignalParser {
  private readonly control: ControlTokenConfig;

  constructor(control: Partial<ControlTokenConfig> = {}) {
    this.control = { ...DEFAULT_CONTROL, ...control };
  }

  /** Total and side-effect free. A token inside a sentence is not a signal. */
  parse(input: string): ControlSignal {
    const trimmed = input.trim();
    if (!trimmed) return "none";
    if (this.matches(trimmed, this.control.enableToken)) return "enable";
    if (this.matches(trimmed, this.control.disableToken)) return "disable";
    return "none";
  }

  private matches(trimmed: string, token: string): boolean {
    if (this.control.match === "repeated") return isRepeatOf(trimmed, token);
    return trimmed === token;
  }
}
