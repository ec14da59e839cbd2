export interface WavFormat {
  sampleRate: number;
  channels: number;
  bitsPerSample: number;
}

const CD_MONO: WavFormat = { sampleRate: 44100, channels: 1, bitsPerSample: 16 };

/** 44-byte RIFF/WAVE header for `dataLength` bytes of PCM samples. */
export function wavHeader(dataLength: number, format: WavFormat = CD_MONO): Buffer {
  const blockAlign = (format.channels * format.bitsPerSample) / 8;
  const header = Buffer.alloc(44);

  header.write('RIFF', 0, 'ascii');
  header.writeUInt32LE(36 + dataLength, 4);
  header.write('WAVE', 8, 'ascii');
  header.write('fmt ', 12, 'ascii');
  header.writeUInt32LE(16, 16); // fmt chunk size
  header.writeUInt16LE(1, 20); // PCM
  header.writeUInt16LE(format.channels, 22);
  header.writeUInt32LE(format.sampleRate, 24);
  header.writeUInt32LE(format.sampleRate * blockAlign, 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(format.bitsPerSample, 34);
  header.write('data', 36, 'ascii');
  header.writeUInt32LE(dataLength, 40);

  return header;
}

/** Played when text-to-speech is unavailable: a valid WAV with no samples. */
export const SILENT_WAV: Buffer = wavHeader(0);
