import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { GameLogger } from '../src/logger';
import { GameSession } from '../src/session/game-session';

let dir: string | null = null;

afterEach(() => {
  if (dir) rmSync(dir, { recursive: true, force: true });
  dir = null;
});

describe('GameLogger', () => {
  it('filters entries by session', () => {
    const logger = new GameLogger(null, () => 42);
    logger.logAction('a', 1, 'Alice', 'roll_dice', []);
    logger.logAction('b', 3, 'Bob', 'pay_debt', []);

    expect(logger.getEntries('b')).toEqual([
      { sessionId: 'b', turnNumber: 3, playerName: 'Bob', action: 'pay_debt', events: [], timestamp: 42 },
    ]);
    expect(logger.getEntries()).toHaveLength(2);
  });

  it('writes nothing without a log file', () => {
    expect(new GameLogger(null).flush()).toBeNull();
  });

  it('writes entries and final snapshots as JSON', () => {
    dir = mkdtempSync(join(tmpdir(), 'game-log-'));
    const file = join(dir, 'log.json');
    const logger = new GameLogger(file, () => 7);
    logger.logAction('game_1', 1, 'Alice', 'roll_dice', [{ type: 'extra_roll', playerId: 'player_0' }]);
    logger.logAction('game_1', 2, 'Bob', 'roll_dice', []);
    const snapshot = new GameSession('game_1', ['Alice', 'Bob'], { seed: 3 }).getState();

    expect(logger.flush([snapshot])).toBe(file);
    const written: unknown = JSON.parse(readFileSync(file, 'utf-8'));
    expect(written).toEqual({
      entries: logger.getEntries(),
      finalStates: [snapshot],
      totalTurns: 2,
    });
  });
});
