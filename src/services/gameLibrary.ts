// Game library: SGF records read through a source, parsed and described

import { readdir, readFile } from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import { basename, extname, join } from 'node:path';
import { createHash, randomUUID } from 'node:crypto';
import type { GameModel } from '../types/game';
import { loadConfig } from '../config';
import { GameLoadError } from './errors';
import { loadGameModel } from './gameModel';
import { createLogger } from './logger';

const log = createLogger('library');

/**
 * Where raw SGF text comes from. Paths returned by list() are passed back
 * to read() unchanged.
 */
export interface SgfSource {
  list(): Promise<string[]>;
  read(file: string): Promise<string>;
}

export class FileSystemSgfSource implements SgfSource {
  private readonly folder: string;

  constructor(folder: string) {
    this.folder = folder;
  }

  async list(): Promise<string[]> {
    const found: string[] = [];
    const pending = [this.folder];

    for (let dir = pending.pop(); dir !== undefined; dir = pending.pop()) {
      let entries: Dirent[];
      try {
        entries = await readdir(dir, { withFileTypes: true });
      } catch (err) {
        // Only the library folder itself is required
        if (dir === this.folder) throw err;
        log.warn(`skipping unreadable folder ${dir}`, err);
        continue;
      }
      for (const entry of entries) {
        if (entry.name.startsWith('.')) continue;
        const full = join(dir, entry.name);
        if (entry.isDirectory()) {
          pending.push(full);
        } else if (entry.isFile() && extname(entry.name).toLowerCase() === '.sgf') {
          found.push(full);
        }
      }
    }

    return found;
  }

  read(file: string): Promise<string> {
    return readFile(file, 'utf8');
  }
}

export interface GameRecord {
  id: string;
  source: string;
  model: GameModel;
  title: string; // event name, or the file name without extension
  handicap: number | null; // black setup stones, null when none
  fingerprint: string; // stable across runs for the same path
}

export interface LibraryOptions {
  shuffle?: boolean;
  random?: () => number;
}

export function createGameRecord(source: string, model: GameModel): GameRecord {
  const fileName = basename(source);
  const event = model.info.event;
  const blackSetup = model.setup.filter((stone) => stone.color === 'black').length;
  const pathHash = createHash('sha1').update(source).digest('hex').slice(0, 8);

  return {
    id: randomUUID(),
    source,
    model,
    title: event ? event : basename(fileName, extname(fileName)),
    handicap: blackSetup > 0 ? blackSetup : null,
    fingerprint: `${fileName}_${pathHash}`,
  };
}

export async function loadGameFile(sgfSource: SgfSource, file: string): Promise<GameRecord> {
  let text: string;
  try {
    text = await sgfSource.read(file);
  } catch (err) {
    throw new GameLoadError(file, `Failed to read ${file}`, err);
  }

  try {
    return createGameRecord(file, loadGameModel(text));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new GameLoadError(file, `Failed to parse ${file}: ${reason}`, err);
  }
}

function shuffleInPlace<T>(items: T[], random: () => number): void {
  for (let i = items.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [items[i], items[j]] = [items[j], items[i]];
  }
}

/**
 * Load every record the source lists, in natural path order (or shuffled).
 * Files that fail to load are logged and left out.
 */
export async function loadGameLibrary(
  sgfSource: SgfSource,
  options: LibraryOptions = {}
): Promise<GameRecord[]> {
  const shuffle = options.shuffle ?? loadConfig().shuffleGameOrder;
  const files = await sgfSource.list();
  files.sort((a, b) => a.localeCompare(b, undefined, { numeric: true }));

  if (shuffle) {
    shuffleInPlace(files, options.random ?? Math.random);
    log.debug('shuffled game order');
  }

  const records: GameRecord[] = [];
  for (const file of files) {
    try {
      records.push(await loadGameFile(sgfSource, file));
    } catch (err) {
      log.warn(`skipping ${file}`, err);
    }
  }

  log.debug(`loaded ${records.length} of ${files.length} games`);
  return records;
}
