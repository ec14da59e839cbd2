import { describe, it, expect } from 'vitest';
import { SILENT_WAV, wavHeader } from '../wav.js';

describe('SILENT_WAV', () => {
  it('is the 44-byte header of an empty 44.1 kHz mono 16-bit PCM file', () => {
    const expected = Buffer.concat([
      Buffer.from('RIFF', 'ascii'),
      Buffer.from([0x24, 0x00, 0x00, 0x00]),
      Buffer.from('WAVEfmt ', 'ascii'),
      Buffer.from([0x10, 0x00, 0x00, 0x00, 0x01, 0x00, 0x01, 0x00]),
      Buffer.from([0x44, 0xac, 0x00, 0x00, 0x88, 0x58, 0x01, 0x00]),
      Buffer.from([0x02, 0x00, 0x10, 0x00]),
      Buffer.from('data', 'ascii'),
      Buffer.from([0x00, 0x00, 0x00, 0x00]),
    ]);

    expect(SILENT_WAV.length).toBe(44);
    expect(SILENT_WAV.equals(expected)).toBe(true);
  });
});

describe('wavHeader', () => {
  it('writes sizes and rates for the given format', () => {
    const header = wavHeader(1000, { sampleRate: 16000, channels: 2, bitsPerSample: 16 });

    expect(header.readUInt32LE(4)).toBe(1036);
    expect(header.readUInt16LE(22)).toBe(2);
    expect(header.readUInt32LE(24)).toBe(16000);
    expect(header.readUInt32LE(28)).toBe(64000);
    expect(header.readUInt16LE(32)).toBe(4);
    expect(header.readUInt32LE(40)).toBe(1000);
  });
});
