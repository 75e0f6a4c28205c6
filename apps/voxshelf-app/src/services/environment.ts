import path from 'node:path';

const DEFAULT_TTS_API_URL = 'http://localhost:8000';
const DEFAULT_TTS_MODEL = 'tts-1';

const stripTrailingSlashes = (url: string) => url.replace(/\/+$/, '');

// Relative paths resolve against the directory the server was started from.
export const getLibraryDataFile = (): string =>
  path.resolve(process.env['LIBRARY_DATA_FILE'] || 'library_data.json');

export const getAudioOutputDir = (): string =>
  path.resolve(process.env['AUDIO_OUTPUT_DIR'] || 'outputs');

export interface TTSConfig {
  baseUrl: string;
  apiKey: string | null;
  model: string;
}

export const getTTSConfig = (): TTSConfig => ({
  baseUrl: stripTrailingSlashes(process.env['TTS_API_URL'] || DEFAULT_TTS_API_URL),
  apiKey: process.env['TTS_API_KEY'] || null,
  model: process.env['TTS_MODEL'] || DEFAULT_TTS_MODEL,
});
