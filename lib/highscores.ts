import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { type HighscoreTable, DEFAULT_CONFIG } from '@/types/game';

const DEFAULT_SLOTS = DEFAULT_CONFIG.highscoreSlots;

export interface HighscoreStore {
  load(): Promise<HighscoreTable>;
  save(top: number[]): Promise<void>;
}

/** UTC timestamp without milliseconds, e.g. 2024-05-01T12:00:00Z */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export function emptyTable(): HighscoreTable {
  return { top: [], lastUpdated: formatTimestamp(new Date()) };
}

export function sortAndTrim(scores: number[], limit = DEFAULT_SLOTS): number[] {
  return [...scores].sort((a, b) => b - a).slice(0, limit);
}

/** Add a finished run's score to the table, keeping it sorted and bounded. */
export function insertScore(top: number[], score: number, limit = DEFAULT_SLOTS): number[] {
  return sortAndTrim([...top, score], limit);
}

/**
 * Validate a parsed highscore document. Anything that is not an object with a
 * `top` array is treated as missing; non-integer entries are dropped.
 */
export function normalizeTable(raw: unknown, limit = DEFAULT_SLOTS): HighscoreTable {
  if (typeof raw !== 'object' || raw === null || !('top' in raw)) return emptyTable();
  const { top } = raw;
  if (!Array.isArray(top)) return emptyTable();

  const scores = top.filter((s): s is number => typeof s === 'number' && Number.isInteger(s) && s >= 0);
  const lastUpdated =
    'last_updated' in raw && typeof raw.last_updated === 'string'
      ? raw.last_updated
      : formatTimestamp(new Date());

  return { top: sortAndTrim(scores, limit), lastUpdated };
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export function defaultHighscorePath(env: Record<string, string | undefined>): string {
  return resolve(env.HIGHSCORE_PATH || 'highscore.json');
}

/** JSON file on disk: { "top": [...], "last_updated": "..." } */
export function createFileHighscoreStore(path: string, limit = DEFAULT_SLOTS): HighscoreStore {
  return {
    async load() {
      let raw: string;
      try {
        raw = await readFile(path, 'utf-8');
      } catch (error) {
        // Missing file is the normal first-run case
        if (!isMissingFile(error)) {
          console.warn(`Could not read highscores from ${path}:`, error);
        }
        return emptyTable();
      }
      try {
        return normalizeTable(JSON.parse(raw), limit);
      } catch (error) {
        console.warn(`Ignoring malformed highscore file ${path}:`, error);
        return emptyTable();
      }
    },

    async save(top) {
      const data = {
        top: sortAndTrim(top, limit),
        last_updated: formatTimestamp(new Date()),
      };
      try {
        await mkdir(dirname(path), { recursive: true });
        await writeFile(path, JSON.stringify(data, null, 2), 'utf-8');
      } catch (error) {
        console.warn(`Failed to save highscores to ${path}:`, error);
      }
    },
  };
}

export function createMemoryHighscoreStore(
  initial: number[] = [],
  limit = DEFAULT_SLOTS
): HighscoreStore & { saved: number[][] } {
  let table: HighscoreTable = { top: sortAndTrim(initial, limit), lastUpdated: formatTimestamp(new Date()) };
  const saved: number[][] = [];
  return {
    saved,
    async load() {
      return { top: [...table.top], lastUpdated: table.lastUpdated };
    },
    async save(top) {
      table = { top: sortAndTrim(top, limit), lastUpdated: formatTimestamp(new Date()) };
      saved.push(table.top);
    },
  };
}
