/**
 * Process Supervisor
 * Starts the KMS service as a child process and tracks its lifecycle.
 *
 * - stdout and stderr go straight into the log sink's file descriptor
 * - start() resolves as soon as the OS has created the process (no readiness probe)
 * - an exit nobody asked for is recorded as a crash; there is no auto-restart
 */

import { spawn, ChildProcess } from 'child_process';
import type { FileHandle } from 'fs/promises';
import { logger } from '../utils/logger.js';
import { SpawnError, errorMessage, systemErrorCode } from './errors.js';
import type { LogSink } from './log-sink.js';
import type {
  ProcessHandle,
  ServiceLaunchOptions,
  SupervisorState,
  SupervisorStatus
} from '../types/index.js';

type StateListener = (state: SupervisorState, status: SupervisorStatus) => void;

interface RunningService {
  handle: ProcessHandle;
  process: ChildProcess;
  stopRequested: boolean;
  exited: Promise<void>;
}

export class ProcessSupervisor {
  private state: SupervisorState = 'not_started';
  private current: RunningService | null = null;
  private starting = false;
  private last: ProcessHandle | null = null;
  private exitedAt: Date | null = null;
  private exitCode: number | null = null;
  private exitSignal: string | null = null;
  private listeners: StateListener[] = [];

  constructor(
    private readonly sink: LogSink,
    private readonly stopTimeoutMs = 5000
  ) {}

  /**
   * Spawn the service with its output redirected into the sink.
   * The sink is truncated first. Rejects with SpawnError if the OS refuses.
   */
  async start(options: ServiceLaunchOptions): Promise<ProcessHandle> {
    if (this.current) {
      throw new SpawnError(options.command, `already running (PID ${this.current.handle.pid})`);
    }
    // Set before the first await so an overlapping call is refused
    if (this.starting) {
      throw new SpawnError(options.command, 'a start is already in progress');
    }
    this.starting = true;
    try {
      return await this.openAndLaunch(options);
    } finally {
      this.starting = false;
    }
  }

  private async openAndLaunch(options: ServiceLaunchOptions): Promise<ProcessHandle> {
    let output: FileHandle;
    try {
      output = await this.sink.openForWriter();
    } catch (error) {
      throw new SpawnError(options.command, errorMessage(error), { cause: error });
    }

    logger.info('Starting service', {
      command: options.command,
      args: options.args,
      cwd: options.cwd,
      log: this.sink.path
    });

    try {
      return await this.launch(options, output);
    } finally {
      // The child holds its own copy of the descriptor
      await output.close();
    }
  }

  private launch(options: ServiceLaunchOptions, output: FileHandle): Promise<ProcessHandle> {
    return new Promise((resolve, reject) => {
      let proc: ChildProcess;
      try {
        proc = spawn(options.command, options.args, {
          cwd: options.cwd,
          env: options.env ?? process.env,
          stdio: ['ignore', output.fd, output.fd]
        });
      } catch (error) {
        reject(new SpawnError(options.command, errorMessage(error), {
          osCode: systemErrorCode(error),
          cause: error
        }));
        return;
      }

      let spawned = false;
      let markExited: () => void = () => {};
      const exited = new Promise<void>((done) => { markExited = done; });

      proc.once('spawn', () => {
        spawned = true;
        const handle: ProcessHandle = {
          pid: proc.pid ?? 0,
          command: options.command,
          args: [...options.args],
          started_at: new Date()
        };
        this.current = { handle, process: proc, stopRequested: false, exited };
        this.last = handle;
        this.exitedAt = null;
        this.exitCode = null;
        this.exitSignal = null;

        logger.info('Service started', { pid: handle.pid });
        this.transition('running');
        resolve(handle);
      });

      proc.on('error', (error) => {
        if (!spawned) {
          reject(new SpawnError(options.command, error.message, {
            osCode: systemErrorCode(error),
            cause: error
          }));
          return;
        }
        logger.error('Service process error', { error: error.message });
      });

      proc.once('exit', (code, signal) => {
        markExited();
        if (!spawned || this.current?.process !== proc) return;

        const { stopRequested } = this.current;
        this.current = null;
        this.exitedAt = new Date();
        this.exitCode = code;
        this.exitSignal = signal;

        if (stopRequested) {
          logger.info('Service stopped', { code, signal });
          this.transition('stopped');
        } else {
          logger.warn('Service exited unexpectedly', { code, signal });
          this.transition('crashed');
        }
      });
    });
  }

  /**
   * Send SIGTERM and wait for the exit; SIGKILL after the stop timeout.
   * No-op when nothing is running.
   */
  async stop(): Promise<void> {
    const running = this.current;
    if (!running) return;

    running.stopRequested = true;
    logger.info('Stopping service', { pid: running.handle.pid });
    running.process.kill('SIGTERM');

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(true), this.stopTimeoutMs);
    });

    const forced = await Promise.race([running.exited.then(() => false), timedOut]);
    clearTimeout(timer);

    if (forced) {
      logger.warn('Service did not exit in time, killing', { pid: running.handle.pid });
      running.process.kill('SIGKILL');
      await running.exited;
    }
  }

  getState(): SupervisorState {
    return this.state;
  }

  status(): SupervisorStatus {
    const handle = this.current?.handle ?? this.last;
    return {
      state: this.state,
      pid: this.current?.handle.pid ?? null,
      command: handle?.command ?? null,
      args: handle ? [...handle.args] : [],
      started_at: handle ? handle.started_at.toISOString() : null,
      exited_at: this.exitedAt ? this.exitedAt.toISOString() : null,
      exit_code: this.exitCode,
      signal: this.exitSignal
    };
  }

  onStateChange(listener: StateListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter(l => l !== listener);
    };
  }

  private transition(next: SupervisorState): void {
    this.state = next;
    const snapshot = this.status();
    for (const listener of this.listeners) {
      try {
        listener(next, snapshot);
      } catch (error) {
        logger.error('Supervisor state listener failed', { error: errorMessage(error) });
      }
    }
  }
}
