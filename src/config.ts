import { readFileSync, existsSync } from 'fs';
import { join, resolve } from 'path';
import { type CommandInfo, extractCommandName } from './cli.js';

const CONFIG_FILES = ['.proclog.json', 'proclog.json'];

export interface ConfigFile {
  commands?: Array<string | { name: string; command: string }> | Record<string, string>;
  logsDir?: string;
  maxLogLines?: number;
  historyChunk?: number;
  writerQueue?: number;
  closeTimeoutMs?: number;
}

export interface ProclogConfig {
  logsDir: string;
  maxLogLines: number;
  historyChunk: number;
  writerQueue: number;
  closeTimeoutMs: number;
  commands: CommandInfo[];
}

type NumericKey = 'maxLogLines' | 'historyChunk' | 'writerQueue' | 'closeTimeoutMs';

export const DEFAULTS: Omit<ProclogConfig, 'commands'> = {
  logsDir: 'logs',
  maxLogLines: 5000,
  historyChunk: 500,
  writerQueue: 10000,
  closeTimeoutMs: 2000,
};

const ENV_KEYS: Record<NumericKey | 'logsDir', string> = {
  logsDir: 'PROCLOG_LOGS_DIR',
  maxLogLines: 'PROCLOG_MAX_LOG_LINES',
  historyChunk: 'PROCLOG_HISTORY_CHUNK',
  writerQueue: 'PROCLOG_WRITER_QUEUE',
  closeTimeoutMs: 'PROCLOG_CLOSE_TIMEOUT_MS',
};

/**
 * Settings come from the first config file found in `cwd`, then environment
 * variables, then defaults. Bad values are reported and fall back to the default.
 */
export function loadConfig(cwd: string = process.cwd(), env: NodeJS.ProcessEnv = process.env): ProclogConfig {
  const file = readConfigFile(cwd) ?? {};

  const fileLogsDir = typeof file.logsDir === 'string' ? file.logsDir : undefined;
  const logsDir = env[ENV_KEYS.logsDir] || fileLogsDir || DEFAULTS.logsDir;

  return {
    logsDir: resolve(cwd, logsDir),
    maxLogLines: numericSetting('maxLogLines', file, env),
    historyChunk: numericSetting('historyChunk', file, env),
    writerQueue: numericSetting('writerQueue', file, env),
    closeTimeoutMs: numericSetting('closeTimeoutMs', file, env),
    commands: parseConfigCommands(file),
  };
}

function readConfigFile(cwd: string): ConfigFile | null {
  for (const configFile of CONFIG_FILES) {
    const configPath = join(cwd, configFile);
    if (existsSync(configPath)) {
      try {
        const content = readFileSync(configPath, 'utf-8');
        const parsed: unknown = JSON.parse(content);
        if (!isConfigFile(parsed)) {
          console.error(`Error reading config file ${configFile}: expected a JSON object`);
          return null;
        }
        return parsed;
      } catch (err) {
        console.error(`Error reading config file ${configFile}:`, err);
        return null;
      }
    }
  }

  return null;
}

function isConfigFile(value: unknown): value is ConfigFile {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function numericSetting(key: NumericKey, file: ConfigFile, env: NodeJS.ProcessEnv): number {
  const fromEnv = env[ENV_KEYS[key]];
  const raw: unknown = fromEnv !== undefined && fromEnv !== '' ? fromEnv : file[key];
  if (raw === undefined) {
    return DEFAULTS[key];
  }

  const value = typeof raw === 'string' ? Number(raw.trim()) : raw;
  if (typeof value === 'number' && Number.isInteger(value) && value > 0) {
    return value;
  }

  console.error(`Invalid ${key} ${JSON.stringify(raw)}, using ${DEFAULTS[key]}`);
  return DEFAULTS[key];
}

function parseConfigCommands(config: ConfigFile): CommandInfo[] {
  if (!config.commands) {
    return [];
  }

  const commands: CommandInfo[] = [];

  if (Array.isArray(config.commands)) {
    config.commands.forEach((cmd, index) => {
      if (typeof cmd === 'string') {
        commands.push({
          id: index,
          name: extractCommandName(cmd, index),
          command: cmd
        });
      } else if (cmd && typeof cmd === 'object' && cmd.name && cmd.command) {
        commands.push({
          id: index,
          name: cmd.name,
          command: cmd.command
        });
      }
    });
  } else if (typeof config.commands === 'object') {
    let index = 0;
    for (const [name, command] of Object.entries(config.commands)) {
      commands.push({
        id: index++,
        name,
        command: typeof command === 'string' ? command : String(command)
      });
    }
  }

  return commands;
}
