import { describe, it, expect } from 'vitest';
import { extractCommandName, parseArgs, parseCommand } from '../src/cli.js';

describe('parseCommand', () => {
  it('splits name=command pairs', () => {
    expect(parseCommand('web=npm run dev', 0)).toEqual({ id: 0, name: 'web', command: 'npm run dev' });
  });

  it('strips quotes around both halves', () => {
    expect(parseCommand(`"api"='node server.js'`, 3)).toEqual({ id: 3, name: 'api', command: 'node server.js' });
  });

  it('derives the name from the executable', () => {
    expect(parseCommand('./bin/worker --fast', 1)).toEqual({ id: 1, name: 'worker', command: './bin/worker --fast' });
  });

  it('treats a leading = as part of the command', () => {
    expect(parseCommand('=oops', 2)).toEqual({ id: 2, name: '=oops', command: '=oops' });
  });
});

describe('extractCommandName', () => {
  it('falls back to the command index', () => {
    expect(extractCommandName('   ', 4)).toBe('cmd4');
  });
});

describe('parseArgs', () => {
  it('shows help without arguments', () => {
    expect(parseArgs([])).toEqual({ kind: 'help' });
    expect(parseArgs(['--help'])).toEqual({ kind: 'help' });
  });

  it('parses run commands', () => {
    expect(parseArgs(['run', 'web=npm start', 'tsc --watch'])).toEqual({
      kind: 'run',
      commands: [
        { id: 0, name: 'web', command: 'npm start' },
        { id: 1, name: 'tsc', command: 'tsc --watch' },
      ],
    });
  });

  it('treats every run argument as a separate command', () => {
    expect(parseArgs(['run', 'web', 'npm start'])).toEqual({
      kind: 'run',
      commands: [
        { id: 0, name: 'web', command: 'web' },
        { id: 1, name: 'npm', command: 'npm start' },
      ],
    });
    expect(parseArgs(['run'])).toEqual({ kind: 'run', commands: [] });
  });

  it('parses page with optional bounds', () => {
    expect(parseArgs(['page', 'web'])).toEqual({ kind: 'page', name: 'web', end: undefined, size: undefined });
    expect(parseArgs(['page', 'web', '40', '10'])).toEqual({ kind: 'page', name: 'web', end: 40, size: 10 });
    expect(parseArgs(['page', 'web', '-1'])).toEqual({
      kind: 'invalid',
      message: 'page: end and size must be non-negative integers',
    });
  });

  it('parses search, count and clear', () => {
    expect(parseArgs(['search', 'web', 'error'])).toEqual({ kind: 'search', name: 'web', pattern: 'error' });
    expect(parseArgs(['search', 'web', ''])).toEqual({ kind: 'search', name: 'web', pattern: '' });
    expect(parseArgs(['count', 'web'])).toEqual({ kind: 'count', name: 'web' });
    expect(parseArgs(['clear', 'web'])).toEqual({ kind: 'clear', name: 'web' });
  });

  it('reports missing arguments and unknown commands', () => {
    expect(parseArgs(['search', 'web'])).toEqual({ kind: 'invalid', message: 'search: expected <name> <pattern>' });
    expect(parseArgs(['count'])).toEqual({ kind: 'invalid', message: 'count: missing stream name' });
    expect(parseArgs(['tail', 'web'])).toEqual({ kind: 'invalid', message: 'unknown command: tail' });
  });
});
