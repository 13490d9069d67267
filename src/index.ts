#!/usr/bin/env node

import { parseArgs, USAGE, type CliAction, type CommandInfo } from './cli.js';
import { loadConfig, type ProclogConfig } from './config.js';
import { LogBuffer } from './log-buffer.js';
import { AsyncFileWriter } from './log-writer.js';
import { ProcessManager, type LogEvent } from './process-manager.js';

function openBuffer(name: string, config: ProclogConfig, writer: AsyncFileWriter): LogBuffer {
  return new LogBuffer(name, {
    logsDir: config.logsDir,
    writer,
    maxLines: config.maxLogLines,
    historyChunk: config.historyChunk,
  });
}

function prefixLines(name: string, text: string): string {
  return text.replace(/^(?=.)/gm, `${name} | `);
}

async function runCommands(commands: CommandInfo[], config: ProclogConfig, writer: AsyncFileWriter): Promise<number> {
  const processManager = new ProcessManager(command => openBuffer(command.name, config, writer));
  const labelled = commands.length > 1;

  processManager.on('log', ({ name, display }: LogEvent) => {
    process.stdout.write(labelled ? prefixLines(name, display) : display);
  });

  const shutdown = async () => {
    await processManager.killAll();
  };
  process.once('SIGINT', () => void shutdown());
  process.once('SIGTERM', () => void shutdown());

  processManager.startAll(commands);
  return processManager.waitForAll();
}

function printHistory(action: Exclude<CliAction, { kind: 'run' | 'help' | 'invalid' }>, buffer: LogBuffer): void {
  switch (action.kind) {
    case 'page': {
      const end = action.end ?? buffer.lineCount();
      const { text, start } = buffer.loadChunk(end, action.size);
      process.stdout.write(text);
      console.error(`lines ${start}-${Math.min(end, buffer.lineCount())} of ${buffer.lineCount()}`);
      break;
    }
    case 'search': {
      const { text, count } = buffer.search(action.pattern);
      process.stdout.write(text);
      console.error(`${count} matching line${count === 1 ? '' : 's'}`);
      break;
    }
    case 'count':
      console.log(buffer.lineCount());
      break;
    case 'clear':
      buffer.clear();
      break;
  }
}

async function main(): Promise<number> {
  const action = parseArgs();

  if (action.kind === 'help') {
    console.log(USAGE);
    return 0;
  }
  if (action.kind === 'invalid') {
    console.error(action.message);
    console.error(USAGE);
    return 1;
  }

  const config = loadConfig();
  const writer = new AsyncFileWriter({ maxQueue: config.writerQueue });

  try {
    if (action.kind === 'run') {
      const commands = action.commands.length > 0 ? action.commands : config.commands;
      if (commands.length === 0) {
        console.error('No commands provided. Use CLI arguments or create a proclog.json config file.');
        return 1;
      }
      return await runCommands(commands, config, writer);
    }

    printHistory(action, openBuffer(action.name, config, writer));
    return 0;
  } finally {
    await writer.close(config.closeTimeoutMs);
  }
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    console.error(err);
    process.exit(1);
  },
);
