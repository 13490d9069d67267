import { existsSync, readFileSync, statSync, writeFileSync } from 'fs';
import { join } from 'path';
import stripAnsi from 'strip-ansi';
import {
  ChunkDecoder,
  colorizeLine,
  colorizeTimestamp,
  formatTimestamp,
  normalize,
  splitLines,
} from './ansi.js';
import { HistoryCache } from './history-cache.js';
import { AsyncFileWriter } from './log-writer.js';
import { attempt } from './result.js';
import { RingBuffer } from './ring-buffer.js';

const DEFAULT_MAX_LINES = 5000;
const DEFAULT_HISTORY_CHUNK = 500;

export interface LogBufferOptions {
  logsDir: string;
  writer: AsyncFileWriter;
  maxLines?: number;
  historyChunk?: number;
  clock?: () => Date;
}

export interface AppendResult {
  display: string;
  file: string;
}

export interface HistoryChunk {
  text: string;
  start: number;
}

export interface SearchResult {
  text: string;
  count: number;
}

const EMPTY_APPEND: AppendResult = { display: '', file: '' };

export function logFilePath(logsDir: string, name: string): string {
  return join(logsDir, `${name}.log`);
}

/**
 * Output of one monitored stream: the last `maxLines` rendered lines in
 * memory, with the complete plain-text history appended to
 * `<logsDir>/<name>.log` through the shared writer.
 *
 * Calls on one buffer must not interleave; the buffer has a single producer.
 */
export class LogBuffer {
  readonly name: string;
  readonly file: string;
  readonly historyChunk: number;
  private lines: RingBuffer;
  private partial: string;
  private pendingCr: boolean;
  private decoder: ChunkDecoder;
  private cache: HistoryCache;
  private writer: AsyncFileWriter;
  private clock: () => Date;

  constructor(name: string, options: LogBufferOptions) {
    this.name = name;
    this.file = logFilePath(options.logsDir, name);
    this.historyChunk = options.historyChunk ?? DEFAULT_HISTORY_CHUNK;
    this.lines = new RingBuffer(options.maxLines ?? DEFAULT_MAX_LINES);
    this.partial = '';
    this.pendingCr = false;
    this.decoder = new ChunkDecoder();
    this.cache = new HistoryCache();
    this.writer = options.writer;
    this.clock = options.clock ?? (() => new Date());
  }

  append(chunk: string | Uint8Array): AppendResult {
    if (chunk.length === 0) {
      return EMPTY_APPEND;
    }

    let text = this.decoder.decode(chunk);
    // A `\r` ending the previous chunk already closed the line.
    if (this.pendingCr && text.startsWith('\n')) {
      text = text.slice(1);
    }
    this.pendingCr = text.endsWith('\r');

    const data = this.partial + normalize(text);
    this.partial = '';

    if (!data.includes('\n')) {
      this.partial = data;
      return EMPTY_APPEND;
    }

    const parts = data.split('\n');
    this.partial = parts.pop() ?? '';

    const timestamp = formatTimestamp(this.clock());
    const display: string[] = [];
    const fileOut: string[] = [];

    for (const content of parts) {
      const rendered = `[${colorizeTimestamp(timestamp)}] ${content}\n`;
      this.lines.push(rendered);
      display.push(rendered);
      fileOut.push(`[${timestamp}] ${stripAnsi(content)}\n`);
    }

    this.cache.invalidate();

    const fileText = fileOut.join('');
    attempt(() => this.writer.write(this.file, fileText));

    return { display: display.join(''), file: fileText };
  }

  getRecent(): string {
    return this.lines.join();
  }

  get partialLine(): string {
    return this.partial;
  }

  get size(): number {
    return this.lines.size;
  }

  lineCount(): number {
    return this.readHistory().length;
  }

  loadChunk(end: number, size: number = this.historyChunk): HistoryChunk {
    const lines = this.readHistory();
    if (lines.length === 0 || end <= 0) {
      return { text: '', start: 0 };
    }

    const start = Math.max(0, end - size);
    const chunk = lines.slice(start, end);
    if (chunk.length === 0) {
      return { text: '', start: 0 };
    }
    return { text: renderHistory(chunk), start };
  }

  search(pattern: string): SearchResult {
    const needle = pattern.toLowerCase();
    const matches = this.readHistory().filter(line => line.toLowerCase().includes(needle));
    if (matches.length === 0) {
      return { text: '', count: 0 };
    }
    return { text: renderHistory(matches), count: matches.length };
  }

  clear(): void {
    this.lines.clear();
    this.partial = '';
    this.pendingCr = false;
    this.decoder.reset();
    this.cache.invalidate();
    // In-memory state is already gone; a file we cannot truncate keeps its content.
    attempt(() => writeFileSync(this.file, '', 'utf8'));
  }

  private memoryLines(): string[] {
    return this.lines.toArray().map(line => line.replace(/\n+$/, ''));
  }

  private readHistory(): string[] {
    if (!existsSync(this.file)) {
      return this.memoryLines();
    }

    const read = attempt(() => {
      const { mtimeMs } = statSync(this.file);
      const cached = this.cache.get(mtimeMs);
      if (cached) {
        return cached;
      }
      const lines = splitLines(normalize(readFileSync(this.file).toString('utf8')));
      this.cache.set(mtimeMs, lines);
      return lines;
    });

    return read.ok ? read.value : this.memoryLines();
  }
}

function renderHistory(lines: string[]): string {
  return lines.map(line => `${colorizeLine(line)}\n`).join('');
}
