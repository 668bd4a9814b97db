import { createInterface, type Interface } from 'node:readline';
import { Writable } from 'node:stream';
import { InterruptError } from '@pamkey/core';

/**
 * Interactive credential input
 */
export interface Prompter {
  askUsername(defaultUsername: string): Promise<string>;
  askPassword(username: string): Promise<string>;
}

export interface TerminalPrompterOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  /** Treat input as a TTY (default: process.stdin.isTTY) */
  terminal?: boolean;
}

interface PendingLine {
  resolve: (line: string) => void;
  reject: (error: Error) => void;
}

/**
 * Prompts on stdin/stdout. Password echo is suppressed. Ctrl-C or end of
 * input rejects with InterruptError.
 *
 * One readline interface serves every question; lines that arrive before
 * they are asked for (piped input) are queued. Call close() when done.
 */
export class TerminalPrompter implements Prompter {
  private input: NodeJS.ReadableStream;
  private output: NodeJS.WritableStream;
  private terminal: boolean;
  private rl?: Interface;
  private muted = false;
  private closed = false;
  private lines: string[] = [];
  private pending?: PendingLine;

  constructor(options?: TerminalPrompterOptions) {
    this.input = options?.input ?? process.stdin;
    this.output = options?.output ?? process.stdout;
    this.terminal = options?.terminal ?? Boolean(process.stdin.isTTY);
  }

  async askUsername(defaultUsername: string): Promise<string> {
    const answer = await this.question(`Enter your PAM username [${defaultUsername}]: `, false);
    return answer.trim() || defaultUsername;
  }

  askPassword(username: string): Promise<string> {
    return this.question(`Enter PAM password for ${username}: `, true);
  }

  close(): void {
    this.rl?.close();
  }

  private async question(query: string, hidden: boolean): Promise<string> {
    this.open();
    this.output.write(query);
    this.muted = hidden;
    try {
      const answer = await this.readLine();
      if (hidden) {
        this.output.write('\n');
      }
      return answer;
    } finally {
      this.muted = false;
    }
  }

  private open(): void {
    if (this.rl || this.closed) {
      return;
    }

    const target = this.output;
    const isMuted = () => this.muted;
    const output = new Writable({
      write(chunk, encoding, callback) {
        if (!isMuted()) {
          target.write(chunk, encoding);
        }
        callback();
      },
    });

    const rl = createInterface({ input: this.input, output, terminal: this.terminal });
    rl.on('line', (line: string) => {
      const pending = this.pending;
      if (pending) {
        this.pending = undefined;
        pending.resolve(line);
      } else {
        this.lines.push(line);
      }
    });
    rl.on('SIGINT', () => this.interrupt());
    rl.on('close', () => {
      this.closed = true;
      this.interrupt();
    });
    this.rl = rl;
  }

  private readLine(): Promise<string> {
    const buffered = this.lines.shift();
    if (buffered !== undefined) {
      return Promise.resolve(buffered);
    }
    if (this.closed) {
      return Promise.reject(new InterruptError());
    }
    return new Promise((resolve, reject) => {
      this.pending = { resolve, reject };
    });
  }

  private interrupt(): void {
    const pending = this.pending;
    this.pending = undefined;
    pending?.reject(new InterruptError());
  }
}
