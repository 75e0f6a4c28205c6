import { VOICES, type Voice } from './types';

export const DEFAULT_VOICE: Voice = 'alloy';
export const MIN_SPEED = 0.25;
export const MAX_SPEED = 4;

export const resolveVoice = (name: string | undefined | null): Voice =>
  VOICES.find((voice) => voice === name) ?? DEFAULT_VOICE;

export const clampSpeed = (speed: number | undefined | null): number => {
  if (speed === undefined || speed === null || !Number.isFinite(speed)) return 1;
  return Math.min(MAX_SPEED, Math.max(MIN_SPEED, speed));
};
