import { createInterface, type Interface } from 'node:readline/promises';
import { Inject, Injectable, type OnModuleDestroy } from '@nestjs/common';

export const TERMINAL_STREAMS = Symbol('TERMINAL_STREAMS');

export interface TerminalStreams {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

export class TerminalClosedError extends Error {
  public constructor() {
    super('Terminal input was closed');
    this.name = 'TerminalClosedError';
  }
}

/**
 * Line oriented access to the operator's terminal. Logs go to stderr, so everything written here
 * stays readable.
 */
@Injectable()
export class TerminalIo implements OnModuleDestroy {
  private readline?: Interface;
  private closed = false;

  public constructor(@Inject(TERMINAL_STREAMS) private readonly streams: TerminalStreams) {}

  public write(text: string): void {
    this.streams.output.write(`${text}\n`);
  }

  /** Rejects with `TerminalClosedError` once the input has ended. */
  public async ask(prompt: string): Promise<string> {
    if (this.closed) throw new TerminalClosedError();
    const readline = this.open();

    return new Promise<string>((resolve, reject) => {
      const onClose = () => reject(new TerminalClosedError());
      readline.once('close', onClose);
      readline.question(prompt).then(
        (answer) => {
          readline.off('close', onClose);
          resolve(answer);
        },
        (error: unknown) => {
          readline.off('close', onClose);
          reject(error);
        },
      );
    });
  }

  public onModuleDestroy(): void {
    this.readline?.close();
  }

  private open(): Interface {
    if (!this.readline) {
      const readline = createInterface({ input: this.streams.input, output: this.streams.output });
      readline.once('close', () => {
        this.closed = true;
      });
      this.readline = readline;
    }
    return this.readline;
  }
}
