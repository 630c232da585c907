import { MIN_PLAYERS, MAX_PLAYERS } from './session/registry';

export interface GameConfig {
  players: number;
  maxTurns: number;
  logFile: string | null;
  seed: number | undefined;
  verbose: boolean;
  help: boolean;
}

export class ConfigError extends Error {}

function readInteger(flag: string, value: string | undefined): number {
  const parsed = value === undefined ? NaN : Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigError(`${flag} expects a whole number, got ${value ?? 'nothing'}`);
  }
  return parsed;
}

export function parseArgs(argv: string[]): GameConfig {
  const config: GameConfig = {
    players: 2,
    maxTurns: 500,
    logFile: null,
    seed: undefined,
    verbose: false,
    help: false,
  };

  for (let i = 2; i < argv.length; i++) {
    switch (argv[i]) {
      case '--players':
        config.players = readInteger('--players', argv[++i]);
        if (config.players < MIN_PLAYERS || config.players > MAX_PLAYERS) {
          throw new ConfigError(`Players must be between ${MIN_PLAYERS} and ${MAX_PLAYERS}`);
        }
        break;
      case '--max-turns':
        config.maxTurns = readInteger('--max-turns', argv[++i]);
        if (config.maxTurns < 1) throw new ConfigError('--max-turns must be at least 1');
        break;
      case '--log-file': {
        const path = argv[++i];
        if (!path) throw new ConfigError('--log-file expects a path');
        config.logFile = path;
        break;
      }
      case '--seed':
        config.seed = readInteger('--seed', argv[++i]);
        break;
      case '--verbose':
        config.verbose = true;
        break;
      case '--help':
        config.help = true;
        break;
      default:
        throw new ConfigError(`Unknown option: ${argv[i]}`);
    }
  }

  return config;
}

export const HELP_TEXT = `
Board Game Engine - scripted autoplay

Usage: npx tsx src/index.ts [options]

Options:
  --players <n>        Number of players (${MIN_PLAYERS}-${MAX_PLAYERS}, default: 2)
  --max-turns <n>      Maximum turns before the game is stopped (default: 500)
  --log-file <path>    Write the action log to a JSON file
  --seed <n>           Random seed for reproducible games
  --verbose            Show every event, including moves and turn changes
  --help               Show this help message

Example:
  npx tsx src/index.ts --players 3 --seed 42 --log-file game.json
`;
