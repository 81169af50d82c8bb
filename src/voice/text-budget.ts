/**
 * TextBudgetPolicy: shortens the text handed to the synthesizer so synthesis time stays bounded.
 * Only the spoken copy is shortened; callers keep the original for display.
 */

import { DEFAULT_TRUNCATION_MARKER } from "../config";

export interface BudgetedText {
  spokenText: string;
  truncated: boolean;
}

const segmenter = new Intl.Segmenter(undefined, { granularity: "grapheme" });

/** Split into user-perceived characters (emoji sequences and combining marks stay whole). */
export function graphemes(text: string): string[] {
  return Array.from(segmenter.segment(text), (s) => s.segment);
}

export function graphemeLength(text: string): number {
  let n = 0;
  for (const _ of segmenter.segment(text)) n++;
  return n;
}

export class TextBudgetPolicy {
  private readonly markerLength: number;

  constructor(private readonly marker: string = DEFAULT_TRUNCATION_MARKER) {
    this.markerLength = graphemeLength(marker);
  }

  /**
   * Fit text into `limit` graphemes, marker included.
   * When the limit leaves no room for the marker, the bare prefix is returned.
   */
  apply(text: string, limit: number): BudgetedText {
    const chars = graphemes(text);
    if (chars.length <= limit) return { spokenText: text, truncated: false };
    const max = Math.max(0, Math.floor(limit));
    if (max <= this.markerLength) {
      return { spokenText: chars.slice(0, max).join(""), truncated: true };
    }
    const prefix = chars.slice(0, max - this.markerLength).join("").trimEnd();
    return { spokenText: prefix + this.marker, truncated: true };
  }
}
