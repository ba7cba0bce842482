#!/usr/bin/env node

import { NodeProcessRunner } from './delegate/processRunner.js';
import { Dispatcher } from './dispatch/dispatcher.js';
import { loadConfig } from './dx/config.js';
import { errnoCode, errorMessage } from './dx/errors.js';
import { isDebugEnabled, setDebugEnabled } from './dx/logger.js';

async function main(): Promise<number> {
  const config = loadConfig();
  if (config.debug) setDebugEnabled(true);

  const dispatcher = new Dispatcher({
    config,
    runner: new NodeProcessRunner(),
    stdout: process.stdout,
    stderr: process.stderr,
  });
  return dispatcher.handle(process.argv.slice(2));
}

// `husk --help | head -1`: the reader went away, nothing left to report.
process.stdout.on('error', (err) => {
  if (errnoCode(err) === 'EPIPE') process.exit(process.exitCode ?? 0);
  throw err;
});

main().then(
  (code) => {
    // exitCode rather than exit(): lets pending stdout writes drain first.
    process.exitCode = code;
  },
  (err: unknown) => {
    // eslint-disable-next-line no-console
    console.error(`husk: ${errorMessage(err)}`);
    if (isDebugEnabled()) {
      // eslint-disable-next-line no-console
      console.error(err);
    }
    process.exitCode = 1;
  },
);
