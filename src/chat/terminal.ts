import { createInterface, type Interface } from 'node:readline/promises';
import type { LinePrompter, Printer } from './chat-loop';

/** Line input from the terminal. Ctrl-C and end of input both end the chat. */
export class ReadlinePrompter implements LinePrompter {
  private readonly rl: Interface;
  private closed = false;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stdout
  ) {
    this.rl = createInterface({ input, output });
    this.rl.on('close', () => {
      this.closed = true;
    });
    this.rl.on('SIGINT', () => this.rl.close());
  }

  question(prompt: string): Promise<string | null> {
    if (this.closed) return Promise.resolve(null);

    return new Promise((resolve, reject) => {
      const onClose = () => resolve(null);
      this.rl.once('close', onClose);
      this.rl.question(prompt).then(
        (answer) => {
          this.rl.off('close', onClose);
          resolve(answer);
        },
        (error: unknown) => {
          this.rl.off('close', onClose);
          if (this.closed) resolve(null);
          else reject(error);
        }
      );
    });
  }

  close(): void {
    if (!this.closed) this.rl.close();
  }
}

export const consolePrinter: Printer = {
  print(text) {
    console.log(text);
  },
  error(text) {
    console.error(text);
  },
};
