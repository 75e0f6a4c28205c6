import fs from 'node:fs/promises';
import path from 'node:path';
import { PersistenceError, getErrorMessage } from '@/services/errors';
import type {
  AISettings,
  Chapter,
  ChapterProgress,
  ChatMessage,
  ChatRole,
  LibraryData,
} from '@/types/records';
import { createEmptyLibraryData, libraryDataSchema } from './schema';

export interface LibraryStoreOptions {
  now?: () => Date;
}

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && 'code' in error;

export const isCompleteAISettings = (settings: object): settings is AISettings =>
  'api_url' in settings && 'api_key' in settings && 'model' in settings;

// Documents written by older versions carry timestamps without a zone suffix.
const createdTime = (chapter: Chapter) => {
  const time = Date.parse(chapter.created_at);
  return Number.isNaN(time) ? 0 : time;
};

const byNewestFirst = (a: Chapter, b: Chapter) => createdTime(b) - createdTime(a);

/**
 * Chapters, progress, AI settings and chat history kept in one JSON document.
 *
 * The whole document lives in memory and is rewritten on every mutation.
 * Mutations are serialized so that concurrent requests cannot lose updates.
 */
export class LibraryStore {
  readonly dataFile: string;
  private data: LibraryData = createEmptyLibraryData();
  private readonly now: () => Date;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(dataFile: string, options: LibraryStoreOptions = {}) {
    this.dataFile = dataFile;
    this.now = options.now ?? (() => new Date());
  }

  static async open(dataFile: string, options: LibraryStoreOptions = {}): Promise<LibraryStore> {
    const store = new LibraryStore(dataFile, options);
    await store.load();
    return store;
  }

  async load(): Promise<void> {
    let raw: string;
    try {
      raw = await fs.readFile(this.dataFile, 'utf8');
    } catch (error) {
      if (!isErrnoException(error) || error.code !== 'ENOENT') {
        console.error(`[library] Error reading ${this.dataFile}:`, error);
      }
      this.data = createEmptyLibraryData();
      return;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      console.error(`[library] Library data is not valid JSON, starting empty:`, getErrorMessage(error));
      this.data = createEmptyLibraryData();
      return;
    }

    const parsed = libraryDataSchema.safeParse(json);
    if (!parsed.success) {
      console.error(`[library] Library data has an unexpected shape, starting empty:`, parsed.error.message);
      this.data = createEmptyLibraryData();
      return;
    }

    const { chapters, progress, ai_settings, chat_history } = parsed.data;
    this.data = {
      chapters,
      progress,
      ai_settings: isCompleteAISettings(ai_settings) ? ai_settings : {},
      chat_history,
    };
  }

  async save(): Promise<void> {
    const tmpFile = `${this.dataFile}.${process.pid}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.dataFile), { recursive: true });
      await fs.writeFile(tmpFile, JSON.stringify(this.data, null, 2), 'utf8');
      await fs.rename(tmpFile, this.dataFile);
    } catch (error) {
      await fs.rm(tmpFile, { force: true }).catch((rmError: unknown) => {
        console.warn(`[library] Could not remove ${tmpFile}:`, getErrorMessage(rmError));
      });
      throw new PersistenceError(`Failed to save library data: ${getErrorMessage(error)}`, {
        cause: error,
      });
    }
  }

  /**
   * Runs `mutate` under the store lock and persists the result. A failed save
   * restores the previous in-memory document.
   */
  private mutate<T>(mutate: (data: LibraryData) => T): Promise<T> {
    const run = async () => {
      const snapshot = structuredClone(this.data);
      const result = mutate(this.data);
      try {
        await this.save();
      } catch (error) {
        this.data = snapshot;
        console.error('[library] Error saving library data:', getErrorMessage(error));
        throw error;
      }
      return result;
    };

    const next = this.queue.then(run, run);
    this.queue = next.catch(() => undefined);
    return next;
  }

  private timestamp(): string {
    return this.now().toISOString();
  }

  addChapter(id: string, title: string, content: string, audioFilename: string): Promise<Chapter> {
    return this.mutate((data) => {
      const createdAt = this.timestamp();
      const chapter: Chapter = {
        id,
        title,
        content,
        audio_filename: audioFilename,
        created_at: createdAt,
        char_count: [...content].length,
      };
      data.chapters[id] = chapter;
      data.progress[id] = { current_time: 0, last_read: createdAt };
      return { ...chapter };
    });
  }

  getChapter(id: string): Chapter | null {
    const chapter = this.data.chapters[id];
    return chapter ? { ...chapter } : null;
  }

  listChapters(): Chapter[] {
    return Object.values(this.data.chapters)
      .map((chapter) => ({ ...chapter }))
      .sort(byNewestFirst);
  }

  getChapterCount(): number {
    return Object.keys(this.data.chapters).length;
  }

  /** Returns the removed chapter's audio filename, or null if the id is unknown. */
  async deleteChapter(id: string): Promise<string | null> {
    if (!this.data.chapters[id]) return null;

    return this.mutate((data) => {
      const chapter = data.chapters[id];
      if (!chapter) return null;
      delete data.chapters[id];
      delete data.progress[id];
      delete data.chat_history[id];
      return chapter.audio_filename;
    });
  }

  async updateProgress(id: string, currentTime: number): Promise<void> {
    if (!this.data.chapters[id]) return;

    await this.mutate((data) => {
      if (!data.chapters[id]) return;
      data.progress[id] = { current_time: currentTime, last_read: this.timestamp() };
    });
  }

  getProgress(id: string): ChapterProgress | null {
    const progress = this.data.progress[id];
    return progress ? { ...progress } : null;
  }

  async saveAISettings(apiUrl: string, apiKey: string, model: string): Promise<void> {
    await this.mutate((data) => {
      data.ai_settings = {
        api_url: apiUrl,
        api_key: apiKey,
        model,
        updated_at: this.timestamp(),
      };
    });
  }

  getAISettings(): AISettings | null {
    const settings = this.data.ai_settings;
    return isCompleteAISettings(settings) ? { ...settings } : null;
  }

  /** Returns false without writing when the chapter does not exist. */
  appendChatMessage(chapterId: string, role: ChatRole, content: string): Promise<boolean> {
    return this.mutate((data) => {
      if (!data.chapters[chapterId]) return false;
      const history = data.chat_history[chapterId] ?? [];
      history.push({ role, content, timestamp: this.timestamp() });
      data.chat_history[chapterId] = history;
      return true;
    });
  }

  /**
   * Appends a user message and its reply as a single write. The chapter is
   * checked under the lock, so a turn that finishes after its chapter was
   * deleted is dropped and false is returned.
   */
  appendChatTurn(chapterId: string, userMessage: string, assistantMessage: string): Promise<boolean> {
    return this.mutate((data) => {
      if (!data.chapters[chapterId]) return false;
      const history = data.chat_history[chapterId] ?? [];
      const timestamp = this.timestamp();
      history.push({ role: 'user', content: userMessage, timestamp });
      history.push({ role: 'assistant', content: assistantMessage, timestamp });
      data.chat_history[chapterId] = history;
      return true;
    });
  }

  getChatHistory(chapterId: string): ChatMessage[] {
    return (this.data.chat_history[chapterId] ?? []).map((message) => ({ ...message }));
  }

  async clearChatHistory(chapterId: string): Promise<void> {
    if (!this.data.chat_history[chapterId]?.length) return;

    await this.mutate((data) => {
      data.chat_history[chapterId] = [];
    });
  }
}
