/**
 * @file cli.ts
 * @description Top-level run of the game for one set of command-line flags.
 *
 *   runCli
 *     ├── parseCliOptions   (config/CliOptions.ts)
 *     ├── loadCatalogue     (catalogue/CatalogueLoader.ts)
 *     └── one of:
 *           ├── simulateMatchups   --sim
 *           ├── GameSession        --auto, with AutoPrompter
 *           └── MenuController     interactive, with ReadlinePrompter
 *
 * Exit codes: 0 normal, 1 load failure, 2 bad usage.
 */

import { TIMING } from '@shared/constants/GameConstants';
import { InputClosedError, LoadError, ValidationError } from '@shared/errors/GameErrors';
import { SeededRandom } from '@shared/util/RandomUtils';
import { loadCatalogue } from './catalogue/CatalogueLoader';
import { DEFAULT_DATA_FILE, parseCliOptions, usage, type CliOptions } from './config/CliOptions';
import { GameSession } from './game/GameSession';
import { MenuController } from './game/MenuController';
import { RoundEngine } from './game/RoundEngine';
import { AutoPrompter } from './input/AutoPrompter';
import { ReadlinePrompter } from './input/Prompter';
import { simulateMatchups } from './simulation/MatchupSimulator';
import { consoleWriter, type Writer } from './ui/Output';
import { WELCOME_MESSAGE } from './ui/RoundSummary';
import { renderSimulationReport } from './ui/SimulationReport';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

/** Seed used when --seed is absent: the clock, folded into 31 bits */
function clockSeed(): number {
  return Date.now() % 2147483647;
}

/**
 * Run the game.
 *
 * @param argv - Command-line arguments after the script name
 * @param write - Sink for player-facing text
 * @returns The process exit code
 */
export async function runCli(argv: readonly string[], write: Writer = consoleWriter): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliOptions(argv, { seed: clockSeed(), dataFile: DEFAULT_DATA_FILE });
  } catch (error) {
    if (error instanceof ValidationError) {
      console.error(error.message);
      console.error(usage());
      return EXIT_USAGE;
    }
    throw error;
  }

  if (options.help) {
    write(usage());
    return EXIT_OK;
  }

  try {
    const catalogue = await loadCatalogue(options.dataFile);
    const rng = new SeededRandom(options.seed);
    console.error(`[Game] Random seed ${rng.seed}`);

    if (options.simulate !== undefined) {
      write(renderSimulationReport(simulateMatchups(catalogue, options.simulate, rng), options.simulate));
      return EXIT_OK;
    }

    if (options.auto) {
      const engine = new RoundEngine(catalogue, rng);
      write(WELCOME_MESSAGE);
      await new GameSession({ engine, prompter: new AutoPrompter(rng), write, revealDelayMs: 0 }).play();
      return EXIT_OK;
    }

    const prompter = new ReadlinePrompter();
    try {
      await new MenuController({
        catalogue,
        prompter,
        rng,
        write,
        revealDelayMs: options.fast ? 0 : TIMING.revealDelayMs,
      }).run();
    } finally {
      prompter.close();
    }
    return EXIT_OK;
  } catch (error) {
    if (error instanceof LoadError) {
      console.error(`[Catalogue] ${error.message}`);
      return EXIT_FAILURE;
    }
    if (error instanceof InputClosedError) {
      return EXIT_OK;
    }
    throw error;
  }
}
