/**
 * Container sniffing and header decoding.
 * JPEG dimensions come from jpeg-js, PNG from pngjs; GIF and WAV headers
 * are read directly.
 */
import jpeg from 'jpeg-js';
import { PNG } from 'pngjs';
import { InputError } from '../errors';
import { MediaKind } from '../types';

export interface ContainerFormat {
  name: string;
  kind: MediaKind;
  codec: string;
  mimeTypes: readonly string[];
  matches(buffer: Buffer): boolean;
}

function ascii(buffer: Buffer, start: number, end: number): string {
  return buffer.length >= end ? buffer.toString('ascii', start, end) : '';
}

function isRiff(buffer: Buffer, form: string): boolean {
  return ascii(buffer, 0, 4) === 'RIFF' && ascii(buffer, 8, 12) === form;
}

// Order matters: more specific signatures first.
export const CONTAINER_FORMATS: readonly ContainerFormat[] = [
  {
    name: 'jpeg',
    kind: MediaKind.IMAGE,
    codec: 'JPEG',
    mimeTypes: ['image/jpeg'],
    matches: (b) => b.length > 2 && b[0] === 0xff && b[1] === 0xd8
  },
  {
    name: 'png',
    kind: MediaKind.IMAGE,
    codec: 'PNG',
    mimeTypes: ['image/png'],
    matches: (b) => b.length > 8 && b[0] === 0x89 && ascii(b, 1, 4) === 'PNG'
  },
  {
    name: 'gif',
    kind: MediaKind.IMAGE,
    codec: 'GIF',
    mimeTypes: ['image/gif'],
    matches: (b) => ascii(b, 0, 4) === 'GIF8'
  },
  {
    name: 'mov',
    kind: MediaKind.VIDEO,
    codec: 'H.264',
    mimeTypes: ['video/quicktime', 'video/mp4'],
    matches: (b) => ascii(b, 4, 8) === 'ftyp' && ascii(b, 8, 12) === 'qt  '
  },
  {
    name: 'mp4',
    kind: MediaKind.VIDEO,
    codec: 'H.264',
    mimeTypes: ['video/mp4', 'video/quicktime'],
    matches: (b) => ascii(b, 4, 8) === 'ftyp'
  },
  {
    name: 'webm',
    kind: MediaKind.VIDEO,
    codec: 'VP9',
    mimeTypes: ['video/webm'],
    matches: (b) => b.length > 4 && b.readUInt32BE(0) === 0x1a45dfa3
  },
  {
    name: 'avi',
    kind: MediaKind.VIDEO,
    codec: 'MPEG-4',
    mimeTypes: ['video/x-msvideo'],
    matches: (b) => isRiff(b, 'AVI ')
  },
  {
    name: 'wav',
    kind: MediaKind.AUDIO,
    codec: 'PCM',
    mimeTypes: ['audio/wav', 'audio/x-wav'],
    matches: (b) => isRiff(b, 'WAVE')
  },
  {
    name: 'mp3',
    kind: MediaKind.AUDIO,
    codec: 'MP3',
    mimeTypes: ['audio/mpeg'],
    matches: (b) => ascii(b, 0, 3) === 'ID3' || (b.length > 2 && b[0] === 0xff && (b[1] & 0xe0) === 0xe0)
  },
  {
    name: 'ogg',
    kind: MediaKind.AUDIO,
    codec: 'Vorbis',
    mimeTypes: ['audio/ogg'],
    matches: (b) => ascii(b, 0, 4) === 'OggS'
  },
  {
    name: 'flac',
    kind: MediaKind.AUDIO,
    codec: 'FLAC',
    mimeTypes: ['audio/flac'],
    matches: (b) => ascii(b, 0, 4) === 'fLaC'
  }
];

export const ALLOWED_MIME_TYPES: ReadonlyMap<string, MediaKind> = new Map(
  CONTAINER_FORMATS.flatMap((format) => format.mimeTypes.map((mime) => [mime, format.kind] as const))
);

export function mediaKindFor(mimeType: string): MediaKind | undefined {
  return ALLOWED_MIME_TYPES.get(mimeType.toLowerCase());
}

/**
 * Detect the container from magic bytes, or undefined when nothing matches.
 */
export function detectContainer(buffer: Buffer): ContainerFormat | undefined {
  return CONTAINER_FORMATS.find((format) => format.matches(buffer));
}

export interface ImageDimensions {
  width: number;
  height: number;
}

/**
 * Decode image dimensions. Throws InputError for bytes the decoder rejects.
 */
export function decodeImageDimensions(buffer: Buffer, container: ContainerFormat): ImageDimensions {
  try {
    switch (container.name) {
      case 'jpeg': {
        const decoded = jpeg.decode(buffer, { useTArray: true });
        return { width: decoded.width, height: decoded.height };
      }
      case 'png': {
        const png = PNG.sync.read(buffer);
        return { width: png.width, height: png.height };
      }
      case 'gif':
        if (buffer.length < 10) throw new Error('GIF header truncated');
        return { width: buffer.readUInt16LE(6), height: buffer.readUInt16LE(8) };
      default:
        throw new Error(`${container.name} is not an image container`);
    }
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InputError(`Unreadable ${container.name.toUpperCase()} image: ${reason}`);
  }
}

export interface WavHeader {
  channels: number;
  sampleRate: number;
  bitsPerSample: number;
  durationMs: number;
}

/**
 * Parse the fmt and data chunks of a RIFF/WAVE file.
 */
export function readWavHeader(buffer: Buffer): WavHeader {
  let offset = 12;
  let fmt: Omit<WavHeader, 'durationMs'> | null = null;
  let dataSize: number | null = null;

  while (offset + 8 <= buffer.length) {
    const chunkId = buffer.toString('ascii', offset, offset + 4);
    const chunkSize = buffer.readUInt32LE(offset + 4);
    offset += 8;

    if (chunkId === 'fmt ' && offset + 16 <= buffer.length) {
      fmt = {
        channels: buffer.readUInt16LE(offset + 2),
        sampleRate: buffer.readUInt32LE(offset + 4),
        bitsPerSample: buffer.readUInt16LE(offset + 14)
      };
    } else if (chunkId === 'data') {
      dataSize = Math.min(chunkSize, buffer.length - offset);
    }
    offset += chunkSize;
    // Align to 2-byte boundary
    if (chunkSize % 2 !== 0) offset++;
  }

  if (!fmt || dataSize === null) {
    throw new InputError('Unreadable WAV audio: missing fmt or data chunk');
  }
  const bytesPerSecond = fmt.sampleRate * fmt.channels * (fmt.bitsPerSample / 8);
  if (bytesPerSecond <= 0) {
    throw new InputError('Unreadable WAV audio: invalid format header');
  }

  return { ...fmt, durationMs: Math.round((dataSize / bytesPerSecond) * 1000) };
}
