import fs from 'fs-extra';
import { InputError } from '../errors';
import type { MediaReference } from '../types';

/** Loads the stored bytes behind a media reference. */
export type MediaReader = (media: MediaReference) => Promise<Buffer>;

export const readMediaFile: MediaReader = async (media) => {
  if (!(await fs.pathExists(media.storagePath))) {
    throw new InputError(`Media file not found: ${media.storagePath}`);
  }
  return fs.readFile(media.storagePath);
};
