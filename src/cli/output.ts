/**
 * @file src/cli/output.ts
 *
 * Typed output helpers for the shell and CLI commands.
 * Keeps presentation logic out of the flow and command files.
 *
 * Rules:
 *  - Never import Credential — only accepts plain strings
 *  - Menu and query results go to stdout; diagnostics go to stderr
 *  - Exit codes: 0 success, 1 user error, 2 internal/unexpected error
 */

// ── Colours (ANSI, disabled when not a TTY or CI=true) ───────────────────────

const NO_COLOR = !process.stdout.isTTY || process.env['CI'] === 'true' || process.env['NO_COLOR'];

const c = {
  bold:   (s: string): string => NO_COLOR ? s : `\x1b[1m${s}\x1b[0m`,
  green:  (s: string): string => NO_COLOR ? s : `\x1b[32m${s}\x1b[0m`,
  red:    (s: string): string => NO_COLOR ? s : `\x1b[31m${s}\x1b[0m`,
  dim:    (s: string): string => NO_COLOR ? s : `\x1b[2m${s}\x1b[0m`,
};

// ── Section headers ───────────────────────────────────────────────────────────

export function header(title: string): void {
  const line = '─'.repeat(Math.min(title.length + 4, 60));
  process.stdout.write(`\n${c.bold(line)}\n  ${c.bold(title)}\n${c.bold(line)}\n\n`);
}

export function subheader(text: string): void {
  process.stdout.write(`\n${c.dim('▸')} ${c.bold(text)}\n`);
}

// ── Status lines ──────────────────────────────────────────────────────────────

export function success(msg: string): void {
  process.stdout.write(`${c.green('✓')} ${msg}\n`);
}

export function info(msg: string): void {
  process.stdout.write(`  ${c.dim('·')} ${msg}\n`);
}

export function printLine(msg: string): void {
  process.stdout.write(`${msg}\n`);
}

// ── Error output ─────────────────────────────────────────────────────────────

/** A failure the user should see but that does not end the process. */
export function failure(msg: string): void {
  process.stdout.write(`${c.red('✗')} ${msg}\n`);
}

/** Diagnostic on stderr, e.g. when the input stream goes away. */
export function diagnostic(msg: string): void {
  process.stderr.write(`\n${c.red('✗')} ${msg}\n`);
}

export function errorAndExit(msg: string, code = 1): never {
  process.stderr.write(`\n${c.red('✗ Error:')} ${msg}\n\n`);
  process.exit(code);
}

export function fatalError(err: unknown, context?: string): never {
  const ctx = context ? `${context}: ` : '';
  process.stderr.write(`\n${c.red('✗')} ${ctx}${describeError(err)}\n\n`);
  process.exit(1);
}

/** One-line message for an error value, with its `code` when it carries one. */
export function describeError(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  const code = 'code' in err && typeof err.code === 'string' ? ` [${err.code}]` : '';
  return `${err.message}${code}`;
}

// ── Key-value pairs ───────────────────────────────────────────────────────────

export function kv(pairs: Array<[string, string]>): void {
  const maxKey = Math.max(...pairs.map(([k]) => k.length));
  for (const [key, val] of pairs) {
    process.stdout.write(`  ${c.dim(key.padEnd(maxKey, ' '))}  ${val}\n`);
  }
}
