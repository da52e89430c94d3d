/**
 * Cooperative cancellation for the comparison pipeline.
 *
 * A single AbortController is shared by the interrupt listener and the
 * pipeline. The pipeline checks it between phases only; a benchmark process
 * that is already running is left to finish or hit its own timeout, unless a
 * second interrupt forces the exit.
 */

import { CancelledError } from './errors.js';
import { logger as rootLogger, type Logger } from './logger.js';

export type InterruptSignal = 'SIGINT' | 'SIGTERM';

/**
 * Throw a CancelledError if the signal was aborted before `phase` starts.
 */
export function throwIfCancelled(signal: AbortSignal | undefined, phase: string): void {
  if (signal?.aborted) {
    throw new CancelledError(phase);
  }
}

/**
 * Minimal view of the process object used for signal registration.
 */
export interface SignalSource {
  on(event: InterruptSignal, listener: () => void): unknown;
  off(event: InterruptSignal, listener: () => void): unknown;
}

export interface InterruptListenerOptions {
  signals?: InterruptSignal[];
  source?: SignalSource;
  /** Called on the second interrupt; defaults to exiting the process with code 130 */
  onForceExit?: () => void;
  logger?: Logger;
}

/**
 * Abort `controller` on the first SIGINT/SIGTERM. A second signal forces exit.
 * Returns a function that removes the handlers once the pipeline settles.
 */
export function listenForInterrupts(
  controller: AbortController,
  options: InterruptListenerOptions = {}
): () => void {
  const {
    signals = ['SIGINT', 'SIGTERM'],
    source = process,
    onForceExit = () => process.exit(130),
    logger = rootLogger,
  } = options;

  const handler = (signal: InterruptSignal) => () => {
    if (controller.signal.aborted) {
      logger.warn(`Received ${signal} again, forcing exit...`);
      onForceExit();
      return;
    }
    logger.info(`Received ${signal}, stopping after the current phase...`);
    controller.abort(new CancelledError(`next phase (${signal})`));
  };

  const registered = signals.map((signal) => {
    const listener = handler(signal);
    source.on(signal, listener);
    return { signal, listener };
  });

  return () => {
    for (const { signal, listener } of registered) {
      source.off(signal, listener);
    }
  };
}

/**
 * Anything that can stop the command it is running
 */
export interface Terminable {
  /** Returns false when nothing was running */
  terminate(): boolean;
}

export interface ForceExitOptions {
  exit?: () => void;
  /** Time the pipeline gets to unwind and remove its worktree after the kill */
  graceMs?: number;
  logger?: Logger;
}

/**
 * Second-interrupt handler: kill the running benchmark process group so the
 * pipeline can unwind through its cleanup, and exit once the grace period
 * runs out. Exits at once when nothing is running.
 */
export function terminateThenExit(target: Terminable, options: ForceExitOptions = {}): () => void {
  const { exit = () => process.exit(130), graceMs = 10_000, logger = rootLogger } = options;

  return () => {
    if (!target.terminate()) {
      exit();
      return;
    }
    logger.warn(`Killed the running benchmark; exiting in at most ${graceMs}ms`);
    setTimeout(exit, graceMs).unref();
  };
}
