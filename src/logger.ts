import { writeFileSync } from 'fs';
import type { GameEvent } from './engine/types';
import type { GameSnapshot } from './session/views';

export interface GameLogEntry {
  sessionId: string;
  turnNumber: number;
  playerName: string;
  action: string;
  events: GameEvent[];
  timestamp: number;
}

export class GameLogger {
  private entries: GameLogEntry[] = [];
  private logFile: string | null;
  private now: () => number;

  constructor(logFile: string | null, now: () => number = Date.now) {
    this.logFile = logFile;
    this.now = now;
  }

  logAction(
    sessionId: string,
    turnNumber: number,
    playerName: string,
    action: string,
    events: GameEvent[],
  ): void {
    this.entries.push({
      sessionId,
      turnNumber,
      playerName,
      action,
      events,
      timestamp: this.now(),
    });
  }

  getEntries(sessionId?: string): GameLogEntry[] {
    return sessionId === undefined
      ? [...this.entries]
      : this.entries.filter(entry => entry.sessionId === sessionId);
  }

  /** Writes every entry plus the final snapshots as one JSON document. Returns the path written, if any. */
  flush(finalStates: GameSnapshot[] = []): string | null {
    if (!this.logFile) return null;

    const output = {
      entries: this.entries,
      finalStates,
      totalTurns: this.entries.length > 0
        ? this.entries[this.entries.length - 1].turnNumber
        : 0,
    };

    writeFileSync(this.logFile, JSON.stringify(output, null, 2));
    return this.logFile;
  }
}
