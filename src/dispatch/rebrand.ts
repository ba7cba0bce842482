import type { StreamTransform } from '../delegate/delegator.js';

export type RebrandOptions = {
  /** Command name of the wrapped CLI as it appears in usage lines, e.g. `openclaw`. */
  wrappedCommand: string;
  /** Product name the wrapped CLI prints in its banner, e.g. `OpenClaw`. */
  wrappedDisplayName: string;
  brand: string;
  brandVersion: string;
  wrappedVersion?: string;
};

// Non-indented "Name:" starts a section; "Usage: prog ..." carries content on the same line.
const SECTION_HEADER = /^([A-Za-z][A-Za-z -]*):(?:\s|$)/;

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Creates a line-based rebranding transform.
 *
 * - A banner line (`OpenClaw 2026.2.1 ...`, optionally behind an emoji) before the
 *   first section becomes `<brand> <brandVersion> (<wrapped> <wrappedVersion>)`.
 * - In the `Usage:` line and indented lines of the Usage and Examples sections,
 *   the wrapped command as a standalone word becomes the brand. Paths, URLs,
 *   package specifiers and longer identifiers containing it are left alone.
 * - Everything else passes through byte for byte.
 *
 * Applying the transform to its own output changes nothing.
 */
export function createRebrander(options: RebrandOptions): StreamTransform {
  const banner = new RegExp(
    `^(?:\\p{Extended_Pictographic}\\uFE0F?\\s+)?${escapeRegExp(options.wrappedDisplayName)}\\s+v?\\d`,
    'u',
  );
  const command = new RegExp(`(?<![\\w./@~-])${escapeRegExp(options.wrappedCommand)}(?![\\w/@-]|\\.\\w)`, 'g');
  const bannerLine = options.wrappedVersion
    ? `${options.brand} ${options.brandVersion} (${options.wrappedCommand} ${options.wrappedVersion})`
    : `${options.brand} ${options.brandVersion}`;

  let section: string | null = null;

  const rebrandLine = (line: string): string => {
    const cr = line.endsWith('\r') ? '\r' : '';
    const body = cr ? line.slice(0, -1) : line;

    if (section === null && banner.test(body)) return bannerLine + cr;

    const header = body.match(SECTION_HEADER);
    if (header) {
      section = header[1].toLowerCase();
      return section === 'usage' ? body.replace(command, options.brand) + cr : line;
    }

    const indented = /^\s/.test(body);
    if (indented && (section === 'usage' || section === 'examples')) {
      return body.replace(command, options.brand) + cr;
    }
    return line;
  };

  return lineStream(rebrandLine, () => '');
}

// Splits a chunked stream into lines for `mapLine`; `trailer` is appended once the stream ends.
function lineStream(mapLine: (line: string) => string, trailer: () => string): StreamTransform {
  let pending = '';
  return {
    push(chunk: string): string {
      pending += chunk;
      const end = pending.lastIndexOf('\n');
      if (end === -1) return '';
      const complete = pending.slice(0, end);
      pending = pending.slice(end + 1);
      return complete.split('\n').map(mapLine).join('\n') + '\n';
    },
    flush(): string {
      const rest = pending ? mapLine(pending) : '';
      pending = '';
      const tail = trailer();
      if (!tail) return rest;
      return rest ? `${rest}\n${tail}` : tail;
    },
  };
}

const BARE_VERSION = /^v?\d+(?:\.\d+)+(?:-[0-9A-Za-z.]+)?$/;

/**
 * Version output transform: a line holding nothing but a version gets the
 * wrapped command's name in front, and `<brand> <brandVersion>` is added as
 * the last line. Empty output stays empty.
 *
 * Applying the transform to its own output changes nothing.
 */
export function createVersionStamper(options: RebrandOptions): StreamTransform {
  const stamp = `${options.brand} ${options.brandVersion}`;
  let sawOutput = false;
  let stamped = false;
  let eol = '\n';

  const stampLine = (line: string): string => {
    const cr = line.endsWith('\r') ? '\r' : '';
    if (cr) eol = '\r\n';
    const body = (cr ? line.slice(0, -1) : line).trim();
    if (body) sawOutput = true;
    if (body === stamp) stamped = true;
    return BARE_VERSION.test(body) ? `${options.wrappedCommand} ${body}${cr}` : line;
  };

  return lineStream(stampLine, () => (sawOutput && !stamped ? stamp + eol : ''));
}

function runOnce(transform: StreamTransform, text: string): string {
  return transform.push(text) + transform.flush();
}

/** One-shot form of `createRebrander`. */
export function rebrand(text: string, options: RebrandOptions): string {
  return runOnce(createRebrander(options), text);
}

/** One-shot form of `createVersionStamper`. */
export function stampVersion(text: string, options: RebrandOptions): string {
  return runOnce(createVersionStamper(options), text);
}
