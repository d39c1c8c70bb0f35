import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { CryptoUtils, InputError } from '@veriframe/core';
import { overridesFrom } from '../context';
import { describeMediaFile, mimeFromPath } from '../media';

describe('CLI media helpers', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'veriframe-cli-'));
  });

  afterAll(async () => {
    await fs.remove(dir);
  });

  describe('mimeFromPath', () => {
    it('should map known extensions', () => {
      expect(mimeFromPath('clip.MOV')).toBe('video/quicktime');
      expect(mimeFromPath('/tmp/voice.wav')).toBe('audio/wav');
      expect(mimeFromPath('notes.txt')).toBeUndefined();
    });
  });

  describe('describeMediaFile', () => {
    it('should describe a local file', async () => {
      const file = path.join(dir, 'holiday.mp4');
      const content = Buffer.from('sample bytes');
      await fs.writeFile(file, content);
      const hash = CryptoUtils.hashContent(content);

      expect(await describeMediaFile(file)).toEqual({
        id: `media-${hash.slice(0, 16)}`,
        filename: 'holiday.mp4',
        storagePath: file,
        sizeBytes: content.length,
        mimeType: 'video/mp4',
        contentHash: hash
      });
    });

    it('should prefer an explicit MIME type', async () => {
      const file = path.join(dir, 'capture.bin');
      await fs.writeFile(file, Buffer.from('sample'));

      expect((await describeMediaFile(file, 'audio/ogg')).mimeType).toBe('audio/ogg');
    });

    it('should ask for --mime when the extension is unknown', async () => {
      const file = path.join(dir, 'capture.bin');
      await fs.writeFile(file, Buffer.from('sample'));

      await expect(describeMediaFile(file)).rejects.toThrow('Cannot tell the media type of capture.bin; pass --mime');
    });

    it('should reject missing files', async () => {
      await expect(describeMediaFile(path.join(dir, 'missing.mp4'))).rejects.toThrow(InputError);
    });
  });

  describe('overridesFrom', () => {
    it('should convert only the flags that were given', () => {
      expect(overridesFrom({ delay: '25', weights: '0.6,0.2,0.2' })).toEqual({
        stageDelayMs: 25,
        weights: { video: 0.6, audio: 0.2, lipsync: 0.2 }
      });
      expect(overridesFrom({})).toEqual({});
    });

    it('should reject non-integer durations', () => {
      expect(() => overridesFrom({ timeout: '1.5' })).toThrow('--timeout must be a whole number of milliseconds, got "1.5"');
    });
  });
});
