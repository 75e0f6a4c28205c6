import fs from 'node:fs/promises';
import path from 'node:path';

// Stored names are plain file names; anything else never leaves the audio directory.
export const getAudioPath = (audioDir: string, filename: string): string =>
  path.join(audioDir, path.basename(filename));

/** Deletes an audio file. Returns false when it was already gone. */
export const removeAudioFile = async (audioDir: string, filename: string): Promise<boolean> => {
  try {
    await fs.unlink(getAudioPath(audioDir, filename));
    return true;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
};
