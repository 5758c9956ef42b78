/**
 * @file src/shell/line-reader.ts
 * Pull-style line reader over a readable stream.
 *
 * End of input and a stream error are reported as distinct results rather
 * than thrown, so the shell can tell a closed stdin from a broken one.
 */

import * as readline from 'node:readline';

export type ReadResult =
  | { kind: 'line'; line: string }
  | { kind: 'eof' }
  | { kind: 'error'; error: unknown };

export class LineReader {
  private readonly rl: readline.Interface;
  private readonly buffered: string[] = [];
  private readonly waiting: Array<(result: ReadResult) => void> = [];
  private terminal: ReadResult | null = null;

  constructor(private readonly input: NodeJS.ReadableStream) {
    this.rl = readline.createInterface({ input, terminal: false, crlfDelay: Infinity });
    this.rl.on('line', (line) => this.push(line));
    this.rl.on('close', () => this.finish({ kind: 'eof' }));
    // readline re-emits input errors on the interface; unheard, they would throw
    this.rl.on('error', this.onError);
    input.on('error', this.onError);
  }

  /** Resolves with the next line, or the terminal state once input is done. */
  next(): Promise<ReadResult> {
    const line = this.buffered.shift();
    if (line !== undefined) return Promise.resolve({ kind: 'line', line });
    if (this.terminal) return Promise.resolve(this.terminal);
    return new Promise((resolve) => this.waiting.push(resolve));
  }

  close(): void {
    this.input.removeListener('error', this.onError);
    this.rl.close();
  }

  // ── Internals ─────────────────────────────────────────────────────────────

  private readonly onError = (error: unknown): void => {
    this.finish({ kind: 'error', error });
  };

  private push(line: string): void {
    const resolve = this.waiting.shift();
    if (resolve) resolve({ kind: 'line', line });
    else this.buffered.push(line);
  }

  private finish(result: ReadResult): void {
    if (this.terminal) return;
    this.terminal = result;
    for (const resolve of this.waiting.splice(0)) resolve(result);
  }
}
