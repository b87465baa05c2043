import { spawn } from 'child_process';
import { createInterface, type Interface } from 'readline';
import type { Readable, Writable } from 'stream';
import { createChildLogger } from '../utils/logger.js';
import { OperationCancelledError } from '../utils/errors.js';
import type { SurveyBrowser } from '../types/interface.js';

const logger = createChildLogger('survey-browser');

export const BROWSE_INTRODUCTION = [
  'Generate a randomized mac-address from a selected vendor',
  '',
  "After you press <return>, a selection will be displayed in a pager,",
  "prefixed by a line number. When you have chosen your desired entry,",
  'quit the pager, and at the next prompt enter the line number,',
  'or Ctrl-C to abort.',
].join('\n');

export interface TerminalSurveyBrowserOptions {
  pager: string;
  pagerArgs: readonly string[];
  input?: Readable;
  output?: Writable;
}

/**
 * Pages the survey through an external pager (`less -SFX` by default) and
 * reads the chosen line from the terminal. Ctrl-C or end of input cancels.
 */
export class TerminalSurveyBrowser implements SurveyBrowser {
  private readonly pager: string;
  private readonly pagerArgs: readonly string[];
  private readonly input: Readable;
  private readonly output: Writable;
  private session: Interface | undefined;
  private readonly pending: string[] = [];
  private readonly waiters: Array<{ resolve: (line: string) => void; reject: (err: Error) => void }> = [];
  private ended = false;

  constructor(options: TerminalSurveyBrowserOptions) {
    this.pager = options.pager;
    this.pagerArgs = options.pagerArgs;
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
  }

  async render(lines: readonly string[]): Promise<void> {
    this.output.write(`${BROWSE_INTRODUCTION}\n`);
    await this.ask('');

    // a pager needs the terminal out of raw mode
    if (this.isTerminal()) {
      this.detach();
    }

    try {
      await this.page(lines);
    } catch (err) {
      logger.warn({ err, pager: this.pager }, 'Pager unavailable, printing survey');
      this.output.write(`${lines.join('\n')}\n`);
    }
  }

  promptLine(message: string): Promise<string> {
    return this.ask(message);
  }

  reportInvalid(message: string): void {
    this.output.write(`${message}\n`);
  }

  private page(lines: readonly string[]): Promise<void> {
    return new Promise((resolve, reject) => {
      const child = spawn(this.pager, [...this.pagerArgs], {
        stdio: ['pipe', 'inherit', 'inherit'],
      });

      child.on('error', (err: Error) => reject(err));
      child.on('close', () => resolve());

      // the pager may quit before reading everything
      child.stdin.on('error', (err: Error) => {
        logger.debug({ err }, 'Pager closed its input early');
      });
      child.stdin.end(`${lines.join('\n')}\n`);
    });
  }

  /** Releases the terminal. Lines already read but not asked for are dropped. */
  close(): void {
    this.detach();
    this.pending.length = 0;
  }

  private ask(message: string): Promise<string> {
    const buffered = this.pending.shift();
    if (this.ended) {
      this.output.write(message);
      return buffered === undefined
        ? Promise.reject(new OperationCancelledError('line selection'))
        : Promise.resolve(buffered);
    }

    const session = this.open();
    session.setPrompt(message);
    session.prompt();

    if (buffered !== undefined) {
      return Promise.resolve(buffered);
    }
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  /**
   * One readline interface serves every prompt, so lines that arrive in a
   * single chunk are queued instead of lost with a discarded interface.
   */
  private open(): Interface {
    if (this.session) return this.session;

    const session = createInterface({ input: this.input, output: this.output, terminal: this.isTerminal() });
    session.on('line', (line: string) => {
      const waiter = this.waiters.shift();
      if (waiter) {
        waiter.resolve(line);
      } else {
        this.pending.push(line);
      }
    });
    session.on('SIGINT', () => session.close());
    session.on('close', () => {
      this.session = undefined;
      this.ended = true;
      for (const waiter of this.waiters.splice(0)) {
        waiter.reject(new OperationCancelledError('line selection'));
      }
    });
    this.session = session;
    return session;
  }

  /** Closes the interface without treating it as end of input. */
  private detach(): void {
    const session = this.session;
    if (!session) return;
    this.session = undefined;
    session.removeAllListeners('close');
    session.close();
  }

  private isTerminal(): boolean {
    return 'isTTY' in this.input && this.input.isTTY === true;
  }
}
