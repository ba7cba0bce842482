import type { HuskConfig } from '../dx/config.js';
import { which } from '../utils/which.js';
import type { RuntimeInfo } from './runtimeTypes.js';

export function detectRuntime(env: Record<string, string | undefined> = process.env): RuntimeInfo {
  return {
    node: which('node', env),
    npm: which('npm', env),
    pnpm: which('pnpm', env),
  };
}

/** Manual installation steps for when the wrapped CLI is missing, tailored to what is already installed. */
export function installGuidance(config: Pick<HuskConfig, 'wrappedPackage' | 'wrappedCommand'>, runtime: RuntimeInfo): string[] {
  const pkg = `${config.wrappedPackage}@latest`;

  if (runtime.node && runtime.pnpm) return [`Install it with:`, `  pnpm add -g ${pkg}`];
  if (runtime.node && runtime.npm) return [`Install it with:`, `  npm install -g ${pkg}`];

  const lines = [`${config.wrappedCommand} needs Node.js >= 22 and a package manager.`];
  if (!runtime.node) {
    lines.push(
      'Option 1 (recommended): install pnpm, then Node.js through it',
      '  curl -fsSL https://get.pnpm.io/install.sh | sh -',
      '  pnpm env use --global 22',
      `  pnpm add -g ${pkg}`,
      'Option 2: install Node.js from your system package manager or https://nodejs.org/, then',
      `  npm install -g ${pkg}`,
    );
  } else {
    lines.push('Node.js was found but neither pnpm nor npm is on PATH.', `Install a package manager, then run: npm install -g ${pkg}`);
  }
  return lines;
}
