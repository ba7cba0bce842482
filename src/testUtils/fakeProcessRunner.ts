import type { ProcessRunner, RunOptions, RunResult } from '../delegate/processRunner.js';
import type { SpawnError } from '../dx/errors.js';

export type FakeIo = {
  stdout(text: string): void;
};

/** Stand-in for the wrapped CLI: receives its argv, writes through `io`, returns an exit code. */
export type FakeProgram = (args: string[], io: FakeIo) => number | Promise<number>;

export type FakeCall = {
  command: string;
  args: string[];
  mode: RunOptions['mode'];
};

/** In-process ProcessRunner that records every spawn. */
export class FakeProcessRunner implements ProcessRunner {
  readonly calls: FakeCall[] = [];
  /** What the program wrote while its stdout was inherited. */
  readonly inheritedStdout: string[] = [];
  private readonly program: FakeProgram;
  private failures: SpawnError[] = [];

  constructor(program: FakeProgram) {
    this.program = program;
  }

  /** The next `run` rejects with `err` instead of starting the program. */
  failNextWith(err: SpawnError) {
    this.failures.push(err);
  }

  async run(command: string, args: string[], options: RunOptions): Promise<RunResult> {
    this.calls.push({ command, args, mode: options.mode });
    const failure = this.failures.shift();
    if (failure) throw failure;

    const exitCode = await this.program(args, {
      stdout: (text) => {
        if (options.mode === 'capture') options.onStdout(text);
        else this.inheritedStdout.push(text);
      },
    });
    return { exitCode, signal: null };
  }
}

export function memorySink() {
  const chunks: string[] = [];
  return {
    chunks,
    text: () => chunks.join(''),
    write(text: string) {
      chunks.push(text);
      return true;
    },
  };
}
