import { appendFile, mkdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import type { BetRecord, RunLogEntry } from '../types/index.js';
import { LogWriteError } from '../errors.js';
import { moduleLogger } from '../logger.js';

const log = moduleLogger('bet-log');

export interface Ack {
  runId: string;
  path: string;
  line: number;
}

export interface AppendLog<T> {
  append(entry: T): Promise<Ack>;
}

export type BetLog = AppendLog<BetRecord>;
export type RunLog = AppendLog<RunLogEntry>;

/**
 * Append-only JSONL store: one self-contained record per line. Existing
 * lines are never rewritten. Appends from this process are queued so
 * concurrent callers cannot interleave partial lines.
 */
export class JsonlLog<T extends { runId: string }> implements AppendLog<T> {
  private queue: Promise<unknown> = Promise.resolve();
  private lineCount: number | null = null;

  constructor(readonly filePath: string) {}

  append(entry: T): Promise<Ack> {
    const next = this.queue.then(() => this.write(entry));
    this.queue = next.catch(() => undefined);
    return next;
  }

  async readAll(): Promise<T[]> {
    await this.queue;
    let text: string;
    try {
      text = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }

    const entries: T[] = [];
    for (const line of text.split('\n')) {
      if (!line.trim()) continue;
      entries.push(JSON.parse(line));
    }
    return entries;
  }

  private async write(entry: T): Promise<Ack> {
    const serialized = JSON.stringify(entry);
    let line: number;
    try {
      const existing = this.lineCount ?? (await this.countExisting());
      await mkdir(path.dirname(this.filePath), { recursive: true });
      await appendFile(this.filePath, serialized + '\n', 'utf8');
      line = existing + 1;
    } catch (error) {
      throw new LogWriteError(this.filePath, error);
    }

    this.lineCount = line;
    log.info({ runId: entry.runId, path: this.filePath, line }, 'entry appended');
    return { runId: entry.runId, path: this.filePath, line };
  }

  private async countExisting(): Promise<number> {
    try {
      const text = await readFile(this.filePath, 'utf8');
      return text.split('\n').filter((l) => l.trim()).length;
    } catch (error) {
      if (isNotFound(error)) return 0;
      throw error;
    }
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
