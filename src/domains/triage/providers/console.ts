/**
 * @fileoverview Terminal operator console on readline.
 *
 * Lines are queued as they arrive, so answers typed ahead (or piped in)
 * are consumed by later prompts in order. Once input ends, a prompt with
 * nothing queued rejects with InputClosedError.
 */

import { createInterface, type Interface } from 'readline';
import { InputClosedError } from '../../../utils/errors.js';
import type { OperatorConsole } from '../types.js';

type PendingAnswer = {
  resolve: (line: string) => void;
  reject: (error: InputClosedError) => void;
};

export class ReadlineConsole implements OperatorConsole {
  private readonly rl: Interface;
  private readonly interrupted = new AbortController();
  private inputEnded = false;
  private readonly lines: string[] = [];
  private readonly waiting: PendingAnswer[] = [];

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {
    this.rl = createInterface({ input, output });
    this.rl.on('line', (line) => this.accept(line));
    this.rl.on('close', () => this.endInput());
    this.rl.on('SIGINT', () => this.interrupt());
  }

  /** Aborted when the operator presses Ctrl-C. End of input alone does not abort it. */
  get signal(): AbortSignal {
    return this.interrupted.signal;
  }

  /** Stop the run: pending and later prompts reject with InputClosedError. */
  interrupt(): void {
    this.interrupted.abort();
    this.lines.length = 0;
    this.rl.close();
  }

  print(line: string): void {
    this.output.write(`${line}\n`);
  }

  async ask(question: string): Promise<string> {
    this.output.write(question);

    const queued = this.lines.shift();
    if (queued !== undefined) {
      return queued;
    }
    if (this.inputEnded) {
      throw new InputClosedError();
    }
    return new Promise<string>((resolve, reject) => {
      this.waiting.push({ resolve, reject });
    });
  }

  close(): void {
    this.rl.close();
  }

  private accept(line: string): void {
    const next = this.waiting.shift();
    if (next) {
      next.resolve(line);
    } else {
      this.lines.push(line);
    }
  }

  private endInput(): void {
    this.inputEnded = true;
    for (const pending of this.waiting.splice(0)) {
      pending.reject(new InputClosedError());
    }
  }
}
