/**
 * @file Prompter.ts
 * @description Where player answers come from.
 *
 * The game only ever needs two kinds of answer: a free line of text (menu
 * choices) and a weapon selection for a tier offer. Interactive play reads
 * both from the terminal; automatic play (AutoPrompter) only answers the
 * weapon question.
 */

import { createInterface, type Interface } from 'node:readline';
import { InputClosedError } from '@shared/errors/GameErrors';
import type { TierOffer } from '@shared/types/GameTypes';

// ============================================================================
// --- Interfaces ---
// ============================================================================

/** Answers the "which weapon?" question of a round */
export interface WeaponPrompter {
  /**
   * @param offer - The tier currently on offer
   * @param attempt - 1 for the first ask of the round, incremented on every re-prompt
   * @returns The raw answer (parsed by the caller)
   */
  selectWeapon(offer: TierOffer, attempt: number): Promise<string>;
}

/** Answers free-form questions such as the menu choice */
export interface LinePrompter {
  ask(question: string): Promise<string>;
}

export const WEAPON_QUESTION = 'Please Select your weapon: ';

// ============================================================================
// --- ReadlinePrompter Class ---
// ============================================================================

interface PendingAnswer {
  resolve: (line: string) => void;
  reject: (error: Error) => void;
}

/**
 * Terminal prompter over node:readline.
 *
 * Every line that arrives is queued, so answers typed ahead or piped in
 * are handed out in order as questions are asked. Once the input ends
 * (Ctrl+D, or a piped file running out) and the queue is empty, any
 * pending or later question rejects with InputClosedError.
 */
export class ReadlinePrompter implements WeaponPrompter, LinePrompter {
  private readonly rl: Interface;
  private readonly output: NodeJS.WritableStream;

  /** Lines received while no question was waiting */
  private readonly queued: string[] = [];
  private pending: PendingAnswer | null = null;
  private closed = false;

  constructor(input: NodeJS.ReadableStream = process.stdin, output: NodeJS.WritableStream = process.stdout) {
    this.output = output;
    this.rl = createInterface({ input, output, prompt: '' });
    this.rl.on('line', (line: string) => this.receive(line));
    this.rl.on('close', () => this.end());
  }

  ask(question: string): Promise<string> {
    this.output.write(question);

    const line = this.queued.shift();
    if (line !== undefined) {
      return Promise.resolve(line);
    }
    if (this.closed) {
      return Promise.reject(new InputClosedError());
    }
    return new Promise<string>((resolve, reject) => {
      this.pending = { resolve, reject };
    });
  }

  selectWeapon(): Promise<string> {
    return this.ask(WEAPON_QUESTION);
  }

  close(): void {
    this.rl.close();
  }

  private receive(line: string): void {
    const pending = this.pending;
    if (pending) {
      this.pending = null;
      pending.resolve(line);
    } else {
      this.queued.push(line);
    }
  }

  private end(): void {
    this.closed = true;
    const pending = this.pending;
    if (pending) {
      this.pending = null;
      pending.reject(new InputClosedError());
    }
  }
}
