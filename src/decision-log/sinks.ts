/**
 * Decision sinks: daily JSONL files, or an in-memory list
 */

import { appendFile, mkdir, readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { createComponentLogger, type RoutewiseLogger } from '../logging/index.js';
import { DecisionLogEntrySchema } from './schema.js';
import type { DecisionLogEntry, DecisionSink } from './types.js';

function entryDate(entry: DecisionLogEntry): string {
  const timestamp = entry.type === 'decision' ? entry.record.decidedAt : entry.outcome.recordedAt;
  return timestamp.split('T')[0] ?? timestamp;
}

function parseEntry(line: string): DecisionLogEntry | null {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return null;
  }
  const result = DecisionLogEntrySchema.safeParse(raw);
  return result.success ? result.data : null;
}

/**
 * Appends entries to `{dataDir}/YYYY-MM-DD.jsonl`, one JSON object per line.
 *
 * A batch that fails part way is retried whole by the decision log; days
 * already appended for it are skipped on the retry.
 */
export class JsonlDecisionSink implements DecisionSink {
  readonly name = 'jsonl';
  private readonly appended = new WeakSet<DecisionLogEntry>();
  private readonly logger: RoutewiseLogger;

  constructor(
    private readonly dataDir: string,
    logger?: RoutewiseLogger
  ) {
    this.logger = logger ?? createComponentLogger('JsonlDecisionSink');
  }

  async write(entries: readonly DecisionLogEntry[]): Promise<void> {
    const pending = entries.filter(entry => !this.appended.has(entry));
    if (pending.length === 0) return;

    await mkdir(this.dataDir, { recursive: true });

    const grouped = new Map<string, DecisionLogEntry[]>();
    for (const entry of pending) {
      const date = entryDate(entry);
      const group = grouped.get(date);
      if (group) {
        group.push(entry);
      } else {
        grouped.set(date, [entry]);
      }
    }

    for (const [date, dayEntries] of grouped) {
      const content = dayEntries.map(entry => JSON.stringify(entry)).join('\n') + '\n';
      await appendFile(join(this.dataDir, `${date}.jsonl`), content, 'utf8');
      for (const entry of dayEntries) {
        this.appended.add(entry);
      }
    }
  }

  /**
   * Entries written for one day (YYYY-MM-DD); empty when the file is absent.
   * Lines that are not valid entries are skipped with a warning.
   */
  async readDate(date: string): Promise<DecisionLogEntry[]> {
    let content: string;
    try {
      content = await readFile(join(this.dataDir, `${date}.jsonl`), 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const entries: DecisionLogEntry[] = [];
    const lines = content.split('\n');
    lines.forEach((line, index) => {
      if (line.trim().length === 0) return;
      const entry = parseEntry(line);
      if (entry) {
        entries.push(entry);
      } else {
        this.logger.warn('Skipping malformed decision log line', { date, line: index + 1 });
      }
    });
    return entries;
  }

  /**
   * Dates with a log file, most recent first
   */
  async availableDates(): Promise<string[]> {
    let files: string[];
    try {
      files = await readdir(this.dataDir);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }
    return files
      .filter(file => file.endsWith('.jsonl'))
      .map(file => file.slice(0, -'.jsonl'.length))
      .sort()
      .reverse();
  }
}

export class MemoryDecisionSink implements DecisionSink {
  readonly name = 'memory';
  readonly entries: DecisionLogEntry[] = [];

  async write(entries: readonly DecisionLogEntry[]): Promise<void> {
    this.entries.push(...entries);
  }

  decisions(): DecisionLogEntry[] {
    return this.entries.filter(entry => entry.type === 'decision');
  }

  outcomes(): DecisionLogEntry[] {
    return this.entries.filter(entry => entry.type === 'outcome');
  }
}
