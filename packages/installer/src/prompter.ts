import { createInterface, type Interface } from 'node:readline/promises';
import { OperationInterruptedError } from '@agentos/core';
import type { IPrompter } from './types/index.js';

/**
 * True when the answer starts with `y`, ignoring case and leading spaces.
 */
export function isAffirmative(answer: string): boolean {
  return answer.trim().toLowerCase().startsWith('y');
}

/**
 * Asks yes/no questions on a terminal. Ctrl+C while a question is open
 * rejects with OperationInterruptedError.
 */
export class ReadlinePrompter implements IPrompter {
  private rl?: Interface;

  public constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout,
  ) {}

  public async confirm(question: string): Promise<boolean> {
    const rl = this.getInterface();
    const controller = new AbortController();
    const onSigint = (): void => controller.abort();
    rl.once('SIGINT', onSigint);
    try {
      const answer = await rl.question(`${question} [y/N]: `, { signal: controller.signal });
      return isAffirmative(answer);
    } catch (error) {
      if (controller.signal.aborted) {
        throw new OperationInterruptedError();
      }
      throw error;
    } finally {
      rl.off('SIGINT', onSigint);
    }
  }

  public close(): void {
    this.rl?.close();
    this.rl = undefined;
  }

  private getInterface(): Interface {
    if (!this.rl) {
      this.rl = createInterface({ input: this.input, output: this.output });
    }
    return this.rl;
  }
}

/**
 * Answers every question with a fixed value; `--yes` uses `true`.
 */
export class AutoConfirmPrompter implements IPrompter {
  public readonly questions: string[] = [];

  public constructor(private readonly answer = true) {}

  public async confirm(question: string): Promise<boolean> {
    this.questions.push(question);
    return this.answer;
  }

  public close(): void {}
}
