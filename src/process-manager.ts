import { spawn, type ChildProcess, type SpawnOptions } from 'child_process';
import { EventEmitter } from 'events';
import { ChunkDecoder, normalize } from './ansi.js';
import type { CommandInfo } from './cli.js';
import type { LogBuffer } from './log-buffer.js';

export type ProcessStatus = 'running' | 'stopped' | 'error' | 'unknown';

export interface ProcessSpawner {
  spawn(command: string, options: SpawnOptions): ChildProcess;
}

export const shellSpawner: ProcessSpawner = {
  spawn(command, options) {
    return spawn(command, options);
  },
};

interface ProcessInfo extends CommandInfo {
  status: ProcessStatus;
  process: ChildProcess;
  buffer: LogBuffer;
  exitCode: number | null;
  pid?: number;
}

export interface LogEvent {
  processId: number;
  name: string;
  display: string;
}

export interface StatusChangeEvent {
  processId: number;
  status: ProcessStatus;
}

export interface ExitEvent {
  processId: number;
  code: number | null;
}

/**
 * Decodes one pipe and hands on whole lines only, so output from the other
 * pipe of the same process never lands inside a half-read line or character.
 * A trailing `\r` is held back until the next chunk shows whether it starts
 * a `\r\n`.
 */
class PipeReader {
  private decoder: ChunkDecoder;
  private pending: string;

  constructor() {
    this.decoder = new ChunkDecoder();
    this.pending = '';
  }

  read(data: Buffer | string): string {
    const text = this.pending + this.decoder.decode(data);
    const scan = text.endsWith('\r') ? text.slice(0, -1) : text;
    const cut = Math.max(scan.lastIndexOf('\n'), scan.lastIndexOf('\r')) + 1;
    this.pending = text.slice(cut);
    return normalize(text.slice(0, cut));
  }

  /** Whatever is left once the process is gone, closed as a final line. */
  flush(): string {
    const rest = normalize(this.pending);
    this.pending = '';
    if (!rest || rest.endsWith('\n')) {
      return rest;
    }
    return `${rest}\n`;
  }
}

/**
 * Runs shell commands and feeds their stdout and stderr into one LogBuffer
 * per command. Each pipe is split into lines on its own before the lines are
 * interleaved in the buffer.
 */
export class ProcessManager extends EventEmitter {
  private processes: Map<number, ProcessInfo>;
  private createBuffer: (command: CommandInfo) => LogBuffer;
  private spawner: ProcessSpawner;

  constructor(createBuffer: (command: CommandInfo) => LogBuffer, spawner: ProcessSpawner = shellSpawner) {
    super();
    this.processes = new Map();
    this.createBuffer = createBuffer;
    this.spawner = spawner;
  }

  startCommand(commandInfo: CommandInfo): ChildProcess {
    const { id } = commandInfo;
    const buffer = this.processes.get(id)?.buffer ?? this.createBuffer(commandInfo);

    const proc = this.spawner.spawn(commandInfo.command, {
      shell: true,
      stdio: ['ignore', 'pipe', 'pipe']
    });

    const deliver = (text: string) => {
      if (!text) {
        return;
      }
      const { display } = buffer.append(text);
      if (display) {
        this.emit('log', { processId: id, name: commandInfo.name, display } satisfies LogEvent);
      }
    };

    const stdout = new PipeReader();
    const stderr = new PipeReader();
    proc.stdout?.on('data', (data: Buffer | string) => deliver(stdout.read(data)));
    proc.stderr?.on('data', (data: Buffer | string) => deliver(stderr.read(data)));

    proc.on('error', (err: Error) => {
      deliver(`Process error: ${err.message}\n`);
      this.setStatus(id, 'error');
    });

    proc.on('exit', (code: number | null) => {
      deliver(stdout.flush());
      deliver(stderr.flush());
      const procInfo = this.processes.get(id);
      if (procInfo) {
        procInfo.exitCode = code;
      }
      this.setStatus(id, code === 0 ? 'stopped' : 'error');
      this.emit('exit', { processId: id, code } satisfies ExitEvent);
    });

    this.processes.set(id, { ...commandInfo, status: 'running', process: proc, buffer, exitCode: null, pid: proc.pid });
    this.emit('status-change', { processId: id, status: 'running' } satisfies StatusChangeEvent);

    return proc;
  }

  startAll(commands: CommandInfo[]): void {
    commands.forEach(cmd => this.startCommand(cmd));
  }

  getStatus(processId: number): ProcessStatus {
    const procInfo = this.processes.get(processId);
    return procInfo ? procInfo.status : 'unknown';
  }

  getAllStatuses(): Map<number, ProcessStatus> {
    const statuses = new Map<number, ProcessStatus>();
    this.processes.forEach((procInfo, id) => {
      statuses.set(id, procInfo.status);
    });
    return statuses;
  }

  getBuffer(processId: number): LogBuffer | undefined {
    return this.processes.get(processId)?.buffer;
  }

  getExitCode(processId: number): number | null {
    return this.processes.get(processId)?.exitCode ?? null;
  }

  isRunning(): boolean {
    for (const procInfo of this.processes.values()) {
      if (procInfo.status === 'running') {
        return true;
      }
    }
    return false;
  }

  /**
   * Exit status for the whole run: the first non-zero code in command order,
   * 1 for a command that ended without a code (signal or spawn error), else 0.
   */
  exitStatus(): number {
    for (const procInfo of this.processes.values()) {
      if (procInfo.status === 'running') {
        continue;
      }
      const code = procInfo.exitCode ?? 1;
      if (code !== 0) {
        return code;
      }
    }
    return 0;
  }

  /** Resolves with `exitStatus()` once no command is running, by exit or by spawn error. */
  waitForAll(): Promise<number> {
    return new Promise((resolve) => {
      const check = () => {
        if (this.isRunning()) {
          return;
        }
        this.off('status-change', check);
        resolve(this.exitStatus());
      };
      this.on('status-change', check);
      check();
    });
  }

  private setStatus(processId: number, status: ProcessStatus): void {
    const procInfo = this.processes.get(processId);
    if (!procInfo || procInfo.status === status) {
      return;
    }
    procInfo.status = status;
    this.emit('status-change', { processId, status } satisfies StatusChangeEvent);
  }

  private isAlive(procInfo: ProcessInfo): boolean {
    return procInfo.process.exitCode === null && procInfo.process.signalCode === null;
  }

  private killProcess(procInfo: ProcessInfo, signal: NodeJS.Signals): void {
    if (!this.isAlive(procInfo)) {
      return;
    }

    try {
      procInfo.process.kill(signal);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`Failed to send ${signal} to ${procInfo.name}: ${message}`);
    }
  }

  private waitForExit(procInfo: ProcessInfo, timeoutMs: number): Promise<void> {
    return new Promise<void>((resolve) => {
      let resolved = false;
      const onExit = () => {
        if (!resolved) {
          resolved = true;
          clearTimeout(timeout);
          resolve();
        }
      };
      const timeout = setTimeout(() => {
        if (!resolved) {
          resolved = true;
          procInfo.process.removeListener('exit', onExit);
          resolve();
        }
      }, timeoutMs);

      procInfo.process.once('exit', onExit);
    });
  }

  /** SIGTERM every live child, then SIGKILL whatever survived the grace period. */
  async killAll(): Promise<void> {
    const running = [...this.processes.values()].filter(procInfo => this.isAlive(procInfo));

    await Promise.all(running.map((procInfo) => {
      const exited = this.waitForExit(procInfo, 1000);
      this.killProcess(procInfo, 'SIGTERM');
      return exited;
    }));

    const survivors = running.filter(procInfo => this.isAlive(procInfo));
    await Promise.all(survivors.map((procInfo) => {
      const exited = this.waitForExit(procInfo, 500);
      this.killProcess(procInfo, 'SIGKILL');
      return exited;
    }));
  }
}
