/**
 * @file MenuController.ts
 * @description The interactive main menu loop.
 *
 * Runs until the player picks Exit. Play starts a fresh RoundEngine over the
 * shared catalogue and random source, so consecutive games keep drawing from
 * the same seeded sequence.
 */

import { LoadError, ValidationError } from '@shared/errors/GameErrors';
import type { Catalogue } from '@shared/types/WeaponTypes';
import type { RandomSource } from '@shared/util/RandomUtils';
import type { LinePrompter, WeaponPrompter } from '../input/Prompter';
import { renderCatalogueTable } from '../ui/CatalogueTable';
import { MenuOption, NOT_IMPLEMENTED_MESSAGE, parseMenuChoice, renderMainMenu } from '../ui/MainMenu';
import type { Writer } from '../ui/Output';
import { WELCOME_MESSAGE } from '../ui/RoundSummary';
import { GameSession } from './GameSession';
import { RoundEngine } from './RoundEngine';

export const MENU_QUESTION = '\nYour Choice : ';

export interface MenuControllerOptions {
  catalogue: Catalogue;
  prompter: LinePrompter & WeaponPrompter;
  rng: RandomSource;
  write: Writer;
  revealDelayMs?: number;
}

export class MenuController {
  private readonly options: MenuControllerOptions;

  constructor(options: MenuControllerOptions) {
    this.options = options;
  }

  /** Show the menu and handle choices until Exit */
  async run(): Promise<void> {
    const { prompter, write } = this.options;

    for (;;) {
      write(renderMainMenu());
      const answer = await prompter.ask(MENU_QUESTION);

      let choice: MenuOption;
      try {
        choice = parseMenuChoice(answer);
      } catch (error) {
        if (error instanceof ValidationError) {
          write(error.message);
          continue;
        }
        throw error;
      }

      if (choice === MenuOption.EXIT) {
        write('Goodbye!');
        return;
      }
      await this.handle(choice);
    }
  }

  private async handle(choice: MenuOption): Promise<void> {
    const { catalogue, write } = this.options;

    switch (choice) {
      case MenuOption.PLAY:
        await this.playGame();
        break;
      case MenuOption.OPTIONS:
      case MenuOption.HELP:
        write(NOT_IMPLEMENTED_MESSAGE);
        break;
      case MenuOption.ABOUT:
        write(renderCatalogueTable(catalogue));
        break;
      case MenuOption.EXIT:
        break;
    }
  }

  private async playGame(): Promise<void> {
    const { catalogue, prompter, rng, write, revealDelayMs } = this.options;

    let engine: RoundEngine;
    try {
      engine = new RoundEngine(catalogue, rng);
    } catch (error) {
      if (error instanceof LoadError) {
        console.error(`[Game] ${error.message}`);
        return;
      }
      throw error;
    }

    write(WELCOME_MESSAGE);
    await new GameSession({ engine, prompter, write, revealDelayMs }).play();
  }
}
