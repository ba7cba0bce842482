import { logDebug } from '../dx/logger.js';
import type { WrappedCli } from '../runtime/runtimeTypes.js';
import type { ProcessRunner } from './processRunner.js';

export type DelegationResult = {
  exitCode: number;
  /** Transformed stdout, present only for capturing runs. */
  capturedOutput?: string;
};

export type OutputSink = {
  write(text: string): unknown;
};

/** Incremental stdout transform applied while capturing. */
export type StreamTransform = {
  push(chunk: string): string;
  flush(): string;
};

export type DelegatorOptions = {
  runner: ProcessRunner;
  stdout: OutputSink;
  /** A fresh transform per capturing run; identity when omitted. */
  createTransform?: () => StreamTransform;
};

const identity = (): StreamTransform => ({ push: (chunk) => chunk, flush: () => '' });

export class Delegator {
  private readonly cli: WrappedCli;
  private readonly options: DelegatorOptions;

  constructor(cli: WrappedCli, options: DelegatorOptions) {
    this.cli = cli;
    this.options = options;
  }

  /**
   * Runs the wrapped CLI with `args`.
   *
   * Without `capture`, stdio is inherited and nothing is touched. With
   * `capture`, stdout is transformed chunk by chunk, written to the sink as it
   * arrives and returned as `capturedOutput`. The exit code is always the child's.
   */
  async run(args: string[], capture: boolean): Promise<DelegationResult> {
    const argv = [...this.cli.prefixArgs, ...args];
    logDebug('delegate', { command: this.cli.command, argv, capture });

    if (!capture) {
      const res = await this.options.runner.run(this.cli.command, argv, { mode: 'inherit' });
      return { exitCode: res.exitCode };
    }

    const transform = (this.options.createTransform ?? identity)();
    let captured = '';
    const emit = (text: string) => {
      if (!text) return;
      captured += text;
      this.options.stdout.write(text);
    };

    const res = await this.options.runner.run(this.cli.command, argv, {
      mode: 'capture',
      onStdout: (chunk) => emit(transform.push(chunk)),
    });
    emit(transform.flush());

    return { exitCode: res.exitCode, capturedOutput: captured };
  }
}
