import { ChatRelay } from '@/services/ai/chatRelay';
import { getAudioOutputDir, getLibraryDataFile, getTTSConfig } from '@/services/environment';
import { LibraryStore } from '@/services/library/store';
import { OpenAICompatibleTTSClient } from '@/services/tts/openaiTTSClient';
import type { TTSClient } from '@/services/tts/types';

/** Everything a request handler needs, passed in explicitly. */
export interface ServerContext {
  library: LibraryStore;
  chat: ChatRelay;
  tts: TTSClient;
  audioDir: string;
  now: () => Date;
}

export interface ServerContextOptions {
  library: LibraryStore;
  tts: TTSClient;
  audioDir: string;
  now?: () => Date;
}

export const createServerContext = ({
  library,
  tts,
  audioDir,
  now = () => new Date(),
}: ServerContextOptions): ServerContext => ({
  library,
  chat: new ChatRelay(library),
  tts,
  audioDir,
  now,
});

let cachedContext: Promise<ServerContext> | null = null;

export const getServerContext = (): Promise<ServerContext> => {
  if (cachedContext) return cachedContext;

  cachedContext = LibraryStore.open(getLibraryDataFile()).then((library) =>
    createServerContext({
      library,
      tts: new OpenAICompatibleTTSClient(getTTSConfig()),
      audioDir: getAudioOutputDir(),
    }),
  );
  return cachedContext;
};
