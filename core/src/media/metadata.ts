import { CryptoUtils, SeededRandom } from '../crypto/utils';
import { InputError } from '../errors';
import { roundTo } from '../math/stats';
import {
  MediaKind,
  MediaMetadata,
  MediaReference,
  StreamProperties,
  TranscriptSummary
} from '../types';
import { decodeImageDimensions, detectContainer, mediaKindFor, readWavHeader } from './decode';

const VIDEO_RESOLUTIONS: readonly [number, number][] = [
  [1920, 1080],
  [1280, 720],
  [3840, 2160],
  [854, 480]
];
const VIDEO_FPS = [24, 25, 30, 60];
const AUDIO_SAMPLE_RATES = [44100, 48000];

// Speaking rate used for the transcript word estimate
const WORDS_PER_SECOND = 2.4;

/**
 * Checks the bytes against what ingestion declared and returns the file facts.
 */
export function validateMedia(media: MediaReference, content: Buffer): MediaMetadata {
  const kind = mediaKindFor(media.mimeType);
  if (!kind) {
    throw new InputError(`Unsupported media type: ${media.mimeType}`);
  }
  if (content.length === 0) {
    throw new InputError('Media file is empty');
  }
  if (content.length !== media.sizeBytes) {
    throw new InputError(
      `File size mismatch: expected ${media.sizeBytes} bytes, read ${content.length}`
    );
  }
  const digest = CryptoUtils.hashContent(content);
  if (media.contentHash && digest !== media.contentHash.replace(/^sha256:/, '')) {
    throw new InputError('File hash mismatch - file may be corrupted');
  }

  return {
    fileHash: `sha256:${digest}`,
    filename: media.filename,
    mimeType: media.mimeType.toLowerCase(),
    sizeBytes: content.length,
    kind
  };
}

function bitrateKbps(sizeBytes: number, durationMs: number): number {
  if (durationMs <= 0) return 0;
  // bytes * 8 / ms = kilobits per second
  return Math.max(1, Math.round((sizeBytes * 8) / durationMs));
}

/**
 * Stream properties. Header fields are decoded where the container allows it;
 * the rest is derived from the file hash so the same bytes always give the
 * same answer.
 */
export function probeStreams(content: Buffer, metadata: MediaMetadata): StreamProperties {
  const container = detectContainer(content);
  if (!container) {
    throw new InputError('Unreadable media: unrecognized container format');
  }
  if (container.kind !== metadata.kind || !container.mimeTypes.includes(metadata.mimeType)) {
    throw new InputError(
      `Container ${container.name} does not match declared type ${metadata.mimeType}`
    );
  }

  const rng = new SeededRandom(`streams:${metadata.fileHash}`);

  switch (container.kind) {
    case MediaKind.IMAGE: {
      const { width, height } = decodeImageDimensions(content, container);
      return {
        container: container.name,
        codec: container.codec,
        resolution: `${width}x${height}`,
        width,
        height,
        fps: null,
        durationMs: 0,
        bitrateKbps: 0,
        audioChannels: 0,
        sampleRate: null
      };
    }
    case MediaKind.AUDIO: {
      if (container.name === 'wav') {
        const wav = readWavHeader(content);
        return {
          container: container.name,
          codec: `${container.codec} ${wav.bitsPerSample}-bit`,
          resolution: null,
          width: null,
          height: null,
          fps: null,
          durationMs: wav.durationMs,
          bitrateKbps: bitrateKbps(content.length, wav.durationMs),
          audioChannels: wav.channels,
          sampleRate: wav.sampleRate
        };
      }
      const durationMs = rng.int(5_000, 300_000);
      return {
        container: container.name,
        codec: container.codec,
        resolution: null,
        width: null,
        height: null,
        fps: null,
        durationMs,
        bitrateKbps: bitrateKbps(content.length, durationMs),
        audioChannels: rng.int(1, 2),
        sampleRate: rng.pick(AUDIO_SAMPLE_RATES)
      };
    }
    case MediaKind.VIDEO: {
      const [width, height] = rng.pick(VIDEO_RESOLUTIONS);
      const fps = rng.pick(VIDEO_FPS);
      const durationMs = rng.int(8_000, 60_000);
      return {
        container: container.name,
        codec: container.codec,
        resolution: `${width}x${height}`,
        width,
        height,
        fps,
        durationMs,
        bitrateKbps: bitrateKbps(content.length, durationMs),
        audioChannels: 2,
        sampleRate: 48000
      };
    }
  }
}

export function summarizeTranscript(metadata: MediaMetadata): TranscriptSummary {
  const stream = metadata.stream;
  if (!stream) {
    throw new InputError('Cannot transcribe before stream extraction');
  }
  if (metadata.kind === MediaKind.IMAGE || stream.durationMs === 0) {
    return { language: null, wordCount: 0, speechRatio: 0 };
  }

  const rng = new SeededRandom(`transcript:${metadata.fileHash}`);
  const speechRatio = roundTo(rng.uniform(0.55, 0.9), 2);
  const spokenSeconds = (stream.durationMs / 1000) * speechRatio;

  return {
    language: 'en',
    wordCount: Math.round(spokenSeconds * WORDS_PER_SECOND),
    speechRatio
  };
}
