/**
 * Parsed lines of a log file, valid for as long as the file's mtime is the
 * one they were read at. mtime resolution is whatever the filesystem records
 * (milliseconds on most, a full second on some), so two writes inside one tick
 * can leave a stale entry until the next write.
 */
export class HistoryCache {
  private lines: string[] | null = null;
  private mtimeMs = 0;

  get(mtimeMs: number): string[] | null {
    if (this.lines !== null && this.mtimeMs === mtimeMs) {
      return this.lines;
    }
    return null;
  }

  set(mtimeMs: number, lines: string[]): void {
    this.lines = lines;
    this.mtimeMs = mtimeMs;
  }

  invalidate(): void {
    this.lines = null;
  }
}
