import { AnalysisConfig, resolveConfig } from '../config';
import { CryptoUtils } from '../crypto/utils';
import type { MediaReader } from '../media/source';
import { MediaKind, MediaMetadata, MediaReference, StreamProperties } from '../types';

/** Clean media only: no keyword match and no random draws flagged. */
export const cleanConfig: AnalysisConfig = resolveConfig({ seed: 'test-seed', baseFakeRate: 0 });

/** Minimal ISO BMFF header followed by filler bytes. */
export function mp4Bytes(size = 256, brand = 'isom'): Buffer {
  const buffer = Buffer.alloc(size);
  buffer.writeUInt32BE(24, 0);
  buffer.write('ftyp', 4, 'ascii');
  buffer.write(brand, 8, 'ascii');
  for (let i = 12; i < size; i++) {
    buffer[i] = (i * 31) & 0xff;
  }
  return buffer;
}

/** PCM WAV with silent samples. */
export function wavBytes(options: { sampleRate?: number; channels?: number; bits?: number; durationMs?: number } = {}): Buffer {
  const { sampleRate = 8000, channels = 1, bits = 16, durationMs = 500 } = options;
  const bytesPerSecond = sampleRate * channels * (bits / 8);
  const dataSize = Math.round((bytesPerSecond * durationMs) / 1000);
  const buffer = Buffer.alloc(44 + dataSize);
  buffer.write('RIFF', 0, 'ascii');
  buffer.writeUInt32LE(36 + dataSize, 4);
  buffer.write('WAVE', 8, 'ascii');
  buffer.write('fmt ', 12, 'ascii');
  buffer.writeUInt32LE(16, 16);
  buffer.writeUInt16LE(1, 20);
  buffer.writeUInt16LE(channels, 22);
  buffer.writeUInt32LE(sampleRate, 24);
  buffer.writeUInt32LE(bytesPerSecond, 28);
  buffer.writeUInt16LE(channels * (bits / 8), 32);
  buffer.writeUInt16LE(bits, 34);
  buffer.write('data', 36, 'ascii');
  buffer.writeUInt32LE(dataSize, 40);
  return buffer;
}

export function mediaFor(filename: string, mimeType: string, content: Buffer, id = `media-${filename}`): MediaReference {
  return {
    id,
    filename,
    storagePath: `/uploads/${filename}`,
    sizeBytes: content.length,
    mimeType,
    contentHash: CryptoUtils.hashContent(content)
  };
}

export function readerFor(content: Buffer): MediaReader {
  return async () => content;
}

export function videoStream(durationMs = 20_000): StreamProperties {
  return {
    container: 'mp4',
    codec: 'H.264',
    resolution: '1280x720',
    width: 1280,
    height: 720,
    fps: 30,
    durationMs,
    bitrateKbps: 4000,
    audioChannels: 2,
    sampleRate: 48000
  };
}

export function videoMetadata(filename = 'holiday.mp4', durationMs = 20_000): MediaMetadata {
  return {
    fileHash: `sha256:${CryptoUtils.hashString(filename)}`,
    filename,
    mimeType: 'video/mp4',
    sizeBytes: 1024,
    kind: MediaKind.VIDEO,
    stream: videoStream(durationMs),
    transcript: { language: 'en', wordCount: 30, speechRatio: 0.7 }
  };
}
