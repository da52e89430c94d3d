import { spawn, type ChildProcess } from 'child_process';
import { ExecutionError } from '../utils/errors.js';
import { logger, type Logger } from '../utils/logger.js';

export interface ExecutionResult {
  /** stdout and stderr, interleaved in arrival order */
  output: string;
  exitCode: number | null;
  elapsedMs: number;
  timedOut: boolean;
}

export interface RunOptions {
  cwd: string;
  /** Wall-clock limit in milliseconds; 0 or undefined disables it */
  timeoutMs?: number;
  env?: NodeJS.ProcessEnv;
}

export interface ProcessRunnerOptions {
  /** Stream output while the command runs instead of attaching it to errors */
  verbose?: boolean;
  /** Time between SIGTERM and SIGKILL after a timeout */
  killGraceMs?: number;
  /** Sink for streamed output; defaults to stdout */
  write?: (chunk: string) => void;
  logger?: Logger;
}

const DEFAULT_KILL_GRACE_MS = 5000;

/** Longest delay a single Node timer accepts */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

interface RunningProcess {
  child: ChildProcess;
  detached: boolean;
}

/**
 * Runs one command at a time with a wall-clock limit.
 *
 * The child gets its own process group so a timeout can take down the
 * processes it started too (the benchmark tool forks a test binary).
 */
export class ProcessRunner {
  private readonly verbose: boolean;
  private readonly killGraceMs: number;
  private readonly write: (chunk: string) => void;
  private readonly log: Logger;
  private active: RunningProcess | undefined;

  constructor(options: ProcessRunnerOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
    this.write = options.write ?? ((chunk) => process.stdout.write(chunk));
    this.log = options.logger ?? logger.child('Runner');
  }

  run(command: string, args: string[], options: RunOptions): Promise<ExecutionResult> {
    const commandLine = [command, ...args].join(' ');
    const timeoutMs = options.timeoutMs ?? 0;
    const detached = process.platform !== 'win32';
    const start = Date.now();

    this.log.debug(`Running ${commandLine}`, { cwd: options.cwd, timeoutMs });

    return new Promise((resolve, reject) => {
      let output = '';
      let timedOut = false;
      let settled = false;
      let timeoutTimer: NodeJS.Timeout | undefined;
      let killTimer: NodeJS.Timeout | undefined;

      const child = spawn(command, args, {
        cwd: options.cwd,
        env: options.env ?? process.env,
        stdio: ['ignore', 'pipe', 'pipe'],
        detached,
      });
      this.active = { child, detached };

      // Decoding per stream keeps multi-byte characters split across chunks intact
      const onData = (text: string) => {
        output += text;
        if (this.verbose) {
          this.write(text);
        }
      };
      child.stdout?.setEncoding('utf8').on('data', onData);
      child.stderr?.setEncoding('utf8').on('data', onData);

      const onTimeout = () => {
        timedOut = true;
        this.log.warn(`${command} exceeded ${timeoutMs}ms, terminating`);
        this.signal(child, detached, 'SIGTERM');
        killTimer = setTimeout(() => this.signal(child, detached, 'SIGKILL'), this.killGraceMs);
      };

      // Delays beyond a single timer's range are waited out in steps
      const armTimeout = (remainingMs: number) => {
        timeoutTimer =
          remainingMs > MAX_TIMER_DELAY_MS
            ? setTimeout(() => armTimeout(remainingMs - MAX_TIMER_DELAY_MS), MAX_TIMER_DELAY_MS)
            : setTimeout(onTimeout, remainingMs);
      };
      if (timeoutMs > 0) {
        armTimeout(timeoutMs);
      }

      const finish = () => {
        settled = true;
        this.active = undefined;
        clearTimeout(timeoutTimer);
        clearTimeout(killTimer);
        return Date.now() - start;
      };

      child.on('error', (error) => {
        if (settled) return;
        const elapsedMs = finish();
        reject(
          new ExecutionError(`Failed to start ${command}: ${error.message}`, {
            elapsedMs,
            timedOut: false,
            exitCode: null,
            context: { command: commandLine, cwd: options.cwd },
            cause: error,
          })
        );
      });

      child.on('close', (code, signal) => {
        if (settled) return;
        const elapsedMs = finish();
        const captured = this.verbose ? undefined : output;

        if (timedOut) {
          reject(
            new ExecutionError(`${commandLine} timed out after ${elapsedMs}ms`, {
              elapsedMs,
              timedOut: true,
              exitCode: code,
              output: captured,
              context: { command: commandLine, cwd: options.cwd, timeoutMs },
            })
          );
          return;
        }

        if (code !== 0) {
          const status = code === null ? `was killed by ${signal ?? 'a signal'}` : `exited with code ${code}`;
          reject(
            new ExecutionError(`${commandLine} ${status}`, {
              elapsedMs,
              timedOut: false,
              exitCode: code,
              output: captured,
              context: { command: commandLine, cwd: options.cwd },
            })
          );
          return;
        }

        this.log.debug(`${command} finished`, { elapsedMs });
        resolve({ output, exitCode: code, elapsedMs, timedOut: false });
      });
    });
  }

  /**
   * Kill the running command and everything it started. Returns false when
   * nothing is running.
   */
  terminate(signal: NodeJS.Signals = 'SIGKILL'): boolean {
    const running = this.active;
    if (!running) return false;
    this.log.warn(`Sending ${signal} to ${running.child.pid ?? 'the running command'}`);
    this.signal(running.child, running.detached, signal);
    return true;
  }

  private signal(child: ChildProcess, detached: boolean, signal: NodeJS.Signals): void {
    if (child.pid === undefined) return;
    try {
      if (detached) {
        process.kill(-child.pid, signal);
      } else {
        child.kill(signal);
      }
    } catch (error) {
      // ESRCH: the group already exited
      this.log.debug(`Could not send ${signal} to ${child.pid}`, {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
