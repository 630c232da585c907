import { parseArgs, HELP_TEXT, ConfigError, type GameConfig } from './config';
import { GameRegistry } from './session/registry';
import { GameLogger } from './logger';
import { Renderer } from './display/renderer';
import { runAutoplay, PLAYER_NAMES } from './autoplay';

function readConfig(): GameConfig {
  try {
    return parseArgs(process.argv);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
      console.log(HELP_TEXT);
      process.exit(1);
    }
    throw error;
  }
}

function main(): void {
  const config = readConfig();
  if (config.help) {
    console.log(HELP_TEXT);
    return;
  }

  const logger = new GameLogger(config.logFile);
  const registry = new GameRegistry(logger);

  const created = registry.createSession(PLAYER_NAMES.slice(0, config.players), { seed: config.seed });
  if (!created.success) {
    console.error(created.error);
    process.exit(1);
  }

  try {
    const result = runAutoplay(created.data, {
      maxTurns: config.maxTurns,
      renderer: new Renderer(config.verbose),
    });
    console.log(`${result.actions} actions played`);

    const written = logger.flush([result.snapshot]);
    if (written) console.log(`Game log written to ${written}`);
  } catch (error) {
    console.error('Fatal error:', error);
    logger.flush([created.data.getState()]);
    process.exit(1);
  }
}

main();
