import { spawn } from 'node:child_process';
import { constants } from 'node:os';

import { SpawnError, errnoCode, errorMessage } from '../dx/errors.js';
import { logDebug } from '../dx/logger.js';

export type RunOptions =
  | { mode: 'inherit' }
  | {
      mode: 'capture';
      /** Receives stdout as UTF-8 text, chunk by chunk, as the child writes it. */
      onStdout: (chunk: string) => void;
    };

export type RunResult = {
  exitCode: number;
  signal: NodeJS.Signals | null;
};

/**
 * Capability to start the wrapped CLI. Rejects with `SpawnError` only when
 * the process cannot be started; a non-zero exit is a normal result.
 */
export interface ProcessRunner {
  run(command: string, args: string[], options: RunOptions): Promise<RunResult>;
}

const FORWARDED_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGHUP'];

/** Shell convention: a child killed by signal N reports 128 + N. */
export function exitCodeFor(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) return code;
  if (signal) return 128 + constants.signals[signal];
  return 1;
}

/** Where the child's output streams go when not captured: our own, or an open file descriptor. */
export type OutputTargets = {
  stdout?: 'inherit' | number;
  stderr?: 'inherit' | number;
};

export class NodeProcessRunner implements ProcessRunner {
  private readonly stdoutTarget: 'inherit' | number;
  private readonly stderrTarget: 'inherit' | number;

  constructor(targets: OutputTargets = {}) {
    this.stdoutTarget = targets.stdout ?? 'inherit';
    this.stderrTarget = targets.stderr ?? 'inherit';
  }

  run(command: string, args: string[], options: RunOptions): Promise<RunResult> {
    return new Promise<RunResult>((resolve, reject) => {
      const child = spawn(command, args, {
        stdio: ['inherit', options.mode === 'inherit' ? this.stdoutTarget : 'pipe', this.stderrTarget],
      });

      // While the child runs, signals aimed at us go to the child; it decides how to exit
      // and we report its exit status.
      const forward = (signal: NodeJS.Signals) => {
        logDebug('forwarding signal', { signal, pid: child.pid });
        child.kill(signal);
      };
      for (const s of FORWARDED_SIGNALS) process.on(s, forward);
      const detach = () => {
        for (const s of FORWARDED_SIGNALS) process.off(s, forward);
      };

      if (options.mode === 'capture' && child.stdout) {
        child.stdout.setEncoding('utf8');
        child.stdout.on('data', (chunk: string) => options.onStdout(chunk));
      }

      child.once('error', (err) => {
        detach();
        reject(new SpawnError(command, errnoCode(err), `failed to start ${command}: ${errorMessage(err)}`, { cause: err }));
      });

      child.once('close', (code, signal) => {
        detach();
        resolve({ exitCode: exitCodeFor(code, signal), signal });
      });
    });
  }
}
