import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync, existsSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { AsyncFileWriter, dropNotice } from '../src/log-writer.js';

describe('AsyncFileWriter', () => {
  let dir: string;
  let writer: AsyncFileWriter;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'proclog-writer-'));
  });

  afterEach(async () => {
    await writer.close(1000);
    rmSync(dir, { recursive: true, force: true });
  });

  it('appends jobs in enqueue order', async () => {
    writer = new AsyncFileWriter();
    const file = join(dir, 'order.log');
    writer.write(file, 'one\n');
    writer.write(file, 'two\n');
    writer.write(file, 'three\n');
    await writer.drain();
    expect(readFileSync(file, 'utf8')).toBe('one\ntwo\nthree\n');
  });

  it('does not touch the disk from write itself', () => {
    writer = new AsyncFileWriter();
    const file = join(dir, 'nested', 'deeper', 'late.log');
    expect(writer.write(file, 'x\n')).toBe(true);
    expect(existsSync(join(dir, 'nested'))).toBe(false);
    expect(writer.pending).toBe(1);
  });

  it('creates missing directories before the first append', async () => {
    writer = new AsyncFileWriter();
    const file = join(dir, 'nested', 'deeper', 'app.log');
    writer.write(file, 'hello\n');
    await writer.drain();
    expect(readFileSync(file, 'utf8')).toBe('hello\n');
  });

  it('ignores empty text', () => {
    writer = new AsyncFileWriter();
    expect(writer.write(join(dir, 'empty.log'), '')).toBe(false);
    expect(writer.pending).toBe(0);
  });

  it('drops and counts chunks once the queue is full', async () => {
    writer = new AsyncFileWriter({ maxQueue: 5 });
    const file = join(dir, 'burst.log');

    const accepted: boolean[] = [];
    for (let i = 0; i < 8; i++) {
      accepted.push(writer.write(file, `${i}\n`));
    }

    expect(accepted).toEqual([true, true, true, true, true, false, false, false]);
    expect(writer.droppedTotal).toBe(3);
    expect(writer.pending).toBe(5);

    await writer.drain();
    expect(readFileSync(file, 'utf8')).toBe(
      '0\n[log-writer] dropped 3 chunks due to backpressure\n1\n2\n3\n4\n',
    );
  });

  it('reports drops in the file that lost them', async () => {
    writer = new AsyncFileWriter({ maxQueue: 1 });
    const first = join(dir, 'first.log');
    const second = join(dir, 'second.log');

    writer.write(first, 'a1\n');
    writer.write(second, 'b1\n');
    await writer.drain();

    expect(readFileSync(first, 'utf8')).toBe('a1\n');
    expect(existsSync(second)).toBe(false);

    writer.write(second, 'b2\n');
    await writer.drain();
    expect(readFileSync(second, 'utf8')).toBe(`b2\n${dropNotice(1)}`);
  });

  it('keeps draining after a failed append', async () => {
    writer = new AsyncFileWriter();
    const blocker = join(dir, 'blocker');
    writeFileSync(blocker, 'not a directory');
    const good = join(dir, 'good.log');

    writer.write(join(blocker, 'bad.log'), 'lost\n');
    writer.write(good, 'kept\n');
    await writer.drain();

    expect(readFileSync(good, 'utf8')).toBe('kept\n');
  });

  it('drains queued jobs on close and refuses new ones afterwards', async () => {
    writer = new AsyncFileWriter();
    const file = join(dir, 'close.log');
    for (let i = 0; i < 20; i++) {
      writer.write(file, `${i}\n`);
    }

    await writer.close(1000);

    const expected = Array.from({ length: 20 }, (_, i) => `${i}\n`).join('');
    expect(readFileSync(file, 'utf8')).toBe(expected);
    expect(writer.closed).toBe(true);
    expect(writer.write(file, 'late\n')).toBe(false);
  });

  it('resolves drain immediately when idle', async () => {
    writer = new AsyncFileWriter();
    await expect(writer.drain()).resolves.toBeUndefined();
  });
});
