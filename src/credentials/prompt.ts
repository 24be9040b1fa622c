/**
 * Interactive terminal prompts
 * Secret answers are read with echo suppressed: readline runs in terminal mode
 * and everything it writes while a secret is being typed is dropped
 */

import * as readline from 'readline';
import { Writable } from 'stream';

export interface Prompter {
  ask(question: string): Promise<string>;
  askSecret(question: string): Promise<string>;
  close(): void;
}

export interface TerminalPrompterOptions {
  input?: NodeJS.ReadableStream & { isTTY?: boolean };
  output?: NodeJS.WritableStream;
}

/**
 * Forwards writes to the real output unless muted
 */
class MutableOutput extends Writable {
  muted = false;

  constructor(private readonly target: NodeJS.WritableStream) {
    super();
  }

  _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    if (!this.muted) {
      this.target.write(chunk);
    }
    callback();
  }
}

class TerminalPrompter implements Prompter {
  private readonly rl: readline.Interface;
  private readonly mutable: MutableOutput;
  /** Lines that arrived before anyone asked for them (piped input) */
  private readonly lines: string[] = [];
  private waiting: ((line: string) => void) | null = null;
  private closed = false;

  constructor(
    input: NodeJS.ReadableStream & { isTTY?: boolean },
    private readonly output: NodeJS.WritableStream
  ) {
    this.mutable = new MutableOutput(output);
    this.rl = readline.createInterface({
      input,
      output: this.mutable,
      terminal: input.isTTY === true,
      // A secret must never be reachable with the up arrow
      historySize: 0,
    });
    this.rl.on('line', (line) => {
      const waiting = this.waiting;
      if (waiting) {
        this.waiting = null;
        waiting(line);
      } else {
        this.lines.push(line);
      }
    });
    this.rl.on('close', () => {
      this.closed = true;
      this.mutable.muted = false;
      const waiting = this.waiting;
      if (waiting) {
        this.waiting = null;
        waiting('');
      }
    });
    // Ctrl+C while prompting ends the prompt with an empty answer
    this.rl.on('SIGINT', () => {
      this.rl.close();
    });
  }

  ask(question: string): Promise<string> {
    return this.question(question, false);
  }

  askSecret(question: string): Promise<string> {
    return this.question(question, true);
  }

  close(): void {
    if (!this.closed) {
      this.rl.close();
    }
  }

  private question(query: string, secret: boolean): Promise<string> {
    if (this.closed && this.lines.length === 0) {
      return Promise.resolve('');
    }

    if (this.closed) {
      this.output.write(query);
    } else {
      this.rl.setPrompt(query);
      this.rl.prompt();
    }
    // The query has been written by now; mute what follows
    this.mutable.muted = secret;

    const finish = (answer: string): string => {
      if (secret) {
        this.mutable.muted = false;
        this.output.write('\n');
      }
      return answer;
    };

    const queued = this.lines.shift();
    if (queued !== undefined) {
      return Promise.resolve(finish(queued));
    }
    return new Promise((resolve) => {
      this.waiting = (line) => resolve(finish(line));
    });
  }
}

export function createTerminalPrompter(options: TerminalPrompterOptions = {}): Prompter {
  return new TerminalPrompter(options.input ?? process.stdin, options.output ?? process.stdout);
}
