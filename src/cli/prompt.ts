import readline from 'readline';

/** Line-oriented input. `ask` resolves to null once input has ended. */
export interface Prompt {
  ask(question: string): Promise<string | null>;
  readonly interrupted: boolean;
  close(): void;
}

export class ReadlinePrompt implements Prompt {
  private rl: readline.Interface;
  private queued: string[] = [];
  private waiting: ((line: string | null) => void) | null = null;
  private closed = false;
  private wasInterrupted = false;

  constructor(input: NodeJS.ReadableStream, output: NodeJS.WritableStream) {
    this.rl = readline.createInterface({ input, output });

    this.rl.on('line', (line) => {
      const resolve = this.waiting;
      if (resolve) {
        this.waiting = null;
        resolve(line);
      } else {
        this.queued.push(line);
      }
    });

    this.rl.on('close', () => {
      this.closed = true;
      const resolve = this.waiting;
      this.waiting = null;
      resolve?.(null);
    });

    // Ctrl-C on a terminal arrives here rather than as a process signal.
    this.rl.on('SIGINT', () => this.interrupt());
  }

  get interrupted(): boolean {
    return this.wasInterrupted;
  }

  ask(question: string): Promise<string | null> {
    const next = this.queued.shift();
    if (next !== undefined) return Promise.resolve(next);
    if (this.closed) return Promise.resolve(null);

    this.rl.setPrompt(question);
    this.rl.prompt();
    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }

  interrupt(): void {
    this.wasInterrupted = true;
    this.close();
  }

  close(): void {
    if (!this.closed) this.rl.close();
  }
}
