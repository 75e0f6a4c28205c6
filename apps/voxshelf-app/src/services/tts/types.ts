export const VOICES = ['alloy', 'echo', 'fable', 'onyx', 'nova', 'shimmer'] as const;

export type Voice = (typeof VOICES)[number];

export type AudioFormat = 'mp3' | 'opus' | 'aac' | 'flac' | 'wav';

export interface SpeechRequest {
  text: string;
  voice: Voice;
  format: AudioFormat;
  speed: number;
}

export interface SpeechResult {
  audio: Uint8Array;
  format: AudioFormat;
  /** Writes the audio to `pathBase` plus the format extension and returns the file name. */
  saveToFile(pathBase: string): Promise<string>;
}

export interface TTSClient {
  synthesize(request: SpeechRequest): Promise<SpeechResult>;
}
