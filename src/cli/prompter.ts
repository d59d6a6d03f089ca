import readline from 'readline';

export interface Prompter {
  /** Resolves with the entered line, or null once input is exhausted. */
  ask(question: string): Promise<string | null>;
  close(): void;
}

export interface Output {
  write(line: string): void;
}

export const stdoutOutput: Output = {
  write: (line) => {
    process.stdout.write(`${line}\n`);
  },
};

// Lines are queued as they arrive so piped input is not lost between questions.
export class ReadlinePrompter implements Prompter {
  private readonly rl: readline.Interface;
  private readonly buffered: string[] = [];
  private waiting: ((line: string | null) => void) | null = null;
  private closed = false;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {
    this.rl = readline.createInterface({ input, crlfDelay: Infinity });
    this.rl.on('line', (line) => this.deliver(line));
    this.rl.once('close', () => {
      this.closed = true;
      this.deliver(null);
    });
  }

  ask(question: string): Promise<string | null> {
    this.output.write(question);
    const next = this.buffered.shift();
    if (next !== undefined) {
      return Promise.resolve(next);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }
    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }

  close(): void {
    if (!this.closed) {
      this.rl.close();
    }
  }

  private deliver(line: string | null): void {
    const waiting = this.waiting;
    if (waiting) {
      this.waiting = null;
      waiting(line);
      return;
    }
    if (line !== null) {
      this.buffered.push(line);
    }
  }
}
