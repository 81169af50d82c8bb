/**
 * Artifact sinks turn synthesized speech into an AudioArtifact reference.
 */

import * as crypto from "crypto";
import * as fs from "fs";
import * as path from "path";
import type { SynthesizedSpeech } from "../adapters/tts";
import type { AudioArtifact } from "./types";

export interface SaveOptions {
  /** Explicit destination (file sink only); otherwise a name is generated. */
  path?: string;
}

export interface ArtifactSink {
  save(speech: SynthesizedSpeech, options?: SaveOptions): Promise<AudioArtifact>;
}

function toArtifact(uri: string, speech: SynthesizedSpeech): AudioArtifact {
  return { uri, byteLength: speech.audio.length, durationSec: speech.durationSec, format: speech.format };
}

/** Writes each utterance to `<dir>/voice_response_<ms>-<id>.<ext>`. */
export class FileArtifactSink implements ArtifactSink {
  constructor(private readonly dir: string) {}

  async save(speech: SynthesizedSpeech, options: SaveOptions = {}): Promise<AudioArtifact> {
    const file =
      options.path ?? path.join(this.dir, `voice_response_${Date.now()}-${crypto.randomUUID().slice(0, 8)}.${speech.format}`);
    await fs.promises.mkdir(path.dirname(file), { recursive: true });
    await fs.promises.writeFile(file, speech.audio);
    return toArtifact(path.resolve(file), speech);
  }
}

/** Keeps audio in process; uris look like memory://voice/1. */
export class MemoryArtifactSink implements ArtifactSink {
  private readonly items = new Map<string, Buffer>();
  private seq = 0;

  async save(speech: SynthesizedSpeech): Promise<AudioArtifact> {
    const uri = `memory://voice/${++this.seq}`;
    this.items.set(uri, speech.audio);
    return toArtifact(uri, speech);
  }

  get(uri: string): Buffer | undefined {
    return this.items.get(uri);
  }

  get size(): number {
    return this.items.size;
  }
}
