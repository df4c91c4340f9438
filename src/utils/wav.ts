const WAV_HEADER_BYTES = 44;
const BITS_PER_SAMPLE = 16;

export interface PcmAudio {
  pcm: Buffer;
  sampleRate: number;
  channels: number;
}

/** Wraps PCM16 little-endian samples in a canonical RIFF/WAVE container. */
export function encodeWav(pcm: Buffer, sampleRate: number, channels: number): Buffer {
  const blockAlign = (channels * BITS_PER_SAMPLE) / 8;
  const header = Buffer.alloc(WAV_HEADER_BYTES);

  header.write("RIFF", 0, "ascii");
  header.writeUInt32LE(36 + pcm.length, 4);
  header.write("WAVE", 8, "ascii");
  header.write("fmt ", 12, "ascii");
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20); // PCM
  header.writeUInt16LE(channels, 22);
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(sampleRate * blockAlign, 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(BITS_PER_SAMPLE, 34);
  header.write("data", 36, "ascii");
  header.writeUInt32LE(pcm.length, 40);

  return Buffer.concat([header, pcm]);
}

/**
 * Extracts the PCM payload and format from a WAV file. Walks the chunk
 * list, so extra chunks (LIST, fact) before `data` are skipped.
 */
export function decodeWav(wav: Buffer): PcmAudio {
  if (
    wav.length < 12 ||
    wav.toString("ascii", 0, 4) !== "RIFF" ||
    wav.toString("ascii", 8, 12) !== "WAVE"
  ) {
    throw new Error("Not a RIFF/WAVE buffer");
  }

  let sampleRate: number | undefined;
  let channels: number | undefined;
  let offset = 12;

  while (offset + 8 <= wav.length) {
    const id = wav.toString("ascii", offset, offset + 4);
    const declared = wav.readUInt32LE(offset + 4);
    const body = offset + 8;

    if (id === "fmt ") {
      channels = wav.readUInt16LE(body + 2);
      sampleRate = wav.readUInt32LE(body + 4);
    } else if (id === "data") {
      if (sampleRate === undefined || channels === undefined) {
        throw new Error("WAV data chunk precedes fmt chunk");
      }
      // Streamed WAVs may declare an unknown (0xFFFFFFFF) data length
      const end = Math.min(body + declared, wav.length);
      return { pcm: wav.subarray(body, end), sampleRate, channels };
    }

    offset = body + declared + (declared % 2);
  }

  throw new Error("WAV buffer has no data chunk");
}
