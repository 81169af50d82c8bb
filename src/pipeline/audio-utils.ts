/**
 * Audio format helpers: PCM to WAV and WAV duration for synthesizer output.
 */

const WAV_HEADER_BYTES = 44;

/**
 * Prepend a 44-byte WAV header to 16-bit mono PCM.
 */
export function pcmToWav(pcm: Buffer, sampleRateHz: number): Buffer {
  const numChannels = 1;
  const bitsPerSample = 16;
  const byteRate = sampleRateHz * numChannels * (bitsPerSample / 8);
  const dataSize = pcm.length;
  const fileSize = WAV_HEADER_BYTES + dataSize;
  const header = Buffer.alloc(WAV_HEADER_BYTES);
  header.write("RIFF", 0);
  header.writeUInt32LE(fileSize - 8, 4);
  header.write("WAVE", 8);
  header.write("fmt ", 12);
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20);
  header.writeUInt16LE(numChannels, 22);
  header.writeUInt32LE(sampleRateHz, 24);
  header.writeUInt32LE(byteRate, 28);
  header.writeUInt16LE((numChannels * bitsPerSample) / 8, 32);
  header.writeUInt16LE(bitsPerSample, 34);
  header.write("data", 36);
  header.writeUInt32LE(dataSize, 40);
  return Buffer.concat([header, pcm]);
}

/** Duration of 16-bit mono PCM in seconds. */
export function pcmDurationSec(byteLength: number, sampleRateHz: number): number {
  if (sampleRateHz <= 0) return 0;
  return byteLength / 2 / sampleRateHz;
}

/**
 * Duration of a RIFF/WAVE buffer, read from its fmt and data chunks.
 * Returns 0 for anything that is not a well-formed WAV.
 */
export function wavDurationSec(wav: Buffer): number {
  if (wav.length < 12 || wav.toString("ascii", 0, 4) !== "RIFF" || wav.toString("ascii", 8, 12) !== "WAVE") {
    return 0;
  }
  let byteRate = 0;
  let offset = 12;
  while (offset + 8 <= wav.length) {
    const id = wav.toString("ascii", offset, offset + 4);
    const size = wav.readUInt32LE(offset + 4);
    const body = offset + 8;
    if (id === "fmt " && body + 12 <= wav.length) {
      byteRate = wav.readUInt32LE(body + 8);
    } else if (id === "data") {
      if (byteRate === 0) return 0;
      // Streamed WAVs may carry a placeholder size; fall back to what is actually there.
      const available = Math.min(size, wav.length - body);
      return available / byteRate;
    }
    offset = body + size + (size % 2);
  }
  return 0;
}
