import { StringDecoder } from 'string_decoder';

export const TIMESTAMP_COLOR = '\x1b[94m';
export const RESET = '\x1b[0m';

export function normalize(text: string): string {
  return text.replace(/\r\n/g, '\n').replace(/\r/g, '\n');
}

export function colorizeTimestamp(timestamp: string): string {
  return `${TIMESTAMP_COLOR}${timestamp}${RESET}`;
}

/**
 * Recolors the leading `[...]` prefix of a plain history line. Anything after
 * the first `]` is returned untouched, so a line that merely starts with `[`
 * gets its first bracketed span colored as well.
 */
export function colorizeLine(line: string): string {
  if (line.startsWith('[')) {
    const close = line.indexOf(']');
    if (close > 0) {
      return `[${colorizeTimestamp(line.slice(1, close))}]${line.slice(close + 1)}`;
    }
  }
  return line;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local time as `YYYY-MM-DD HH:MM:SS`. */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

export function splitLines(text: string): string[] {
  if (text.length === 0) {
    return [];
  }
  const lines = text.split('\n');
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Turns process output into text. Byte chunks are decoded as UTF-8 with
 * invalid sequences replaced by U+FFFD; a multi-byte character cut across two
 * chunks is held back until the rest of it arrives.
 */
export class ChunkDecoder {
  private decoder: StringDecoder;

  constructor() {
    this.decoder = new StringDecoder('utf8');
  }

  decode(chunk: string | Uint8Array): string {
    if (typeof chunk === 'string') {
      return chunk;
    }
    return this.decoder.write(chunk);
  }

  reset(): void {
    this.decoder = new StringDecoder('utf8');
  }
}
