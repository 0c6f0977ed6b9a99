/**
 * POSIX shell quoting for argv vectors that cross an ssh hop.
 */

const SAFE_ARG = /^[A-Za-z0-9_\-./=:,@%+]+$/;

export function quoteShellArg(arg: string): string {
  if (arg.length > 0 && SAFE_ARG.test(arg)) {
    return arg;
  }
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

export function quoteShellCommand(argv: readonly string[]): string {
  return argv.map(quoteShellArg).join(' ');
}

/**
 * Keep at most the last `maxBytes` UTF-8 bytes of accumulated output, cut on
 * a character boundary.
 */
export function keepTail(current: string, chunk: string, maxBytes: number): string {
  const combined = current + chunk;
  if (Buffer.byteLength(combined, 'utf8') <= maxBytes) {
    return combined;
  }
  const bytes = Buffer.from(combined, 'utf8');
  let start = bytes.length - maxBytes;
  // Skip UTF-8 continuation bytes (0b10xxxxxx)
  while (start < bytes.length && (bytes[start] & 0xc0) === 0x80) {
    start++;
  }
  return bytes.subarray(start).toString('utf8');
}

export function lastLines(text: string, count: number): string {
  return text.trimEnd().split('\n').slice(-count).join('\n');
}
