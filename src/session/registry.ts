import { GameSession, type SessionOptions, type SessionResult } from './game-session';
import { boardCatalog, type BoardSpaceView } from './views';
import type { GameLogger } from '../logger';

export const MIN_PLAYERS = 2;
export const MAX_PLAYERS = 8;

export interface SessionSummary {
  sessionId: string;
  players: string[];
  currentPlayer: string;
  turnNumber: number;
  gameOver: boolean;
  winner: string | null;
}

/** Holds every live session. Session ids come from a per-registry counter. */
export class GameRegistry {
  private sessions = new Map<string, GameSession>();
  private nextId = 1;
  private logger: GameLogger | null;

  constructor(logger: GameLogger | null = null) {
    this.logger = logger;
  }

  createSession(playerNames: string[], options: SessionOptions = {}): SessionResult<GameSession> {
    if (playerNames.length < MIN_PLAYERS || playerNames.length > MAX_PLAYERS) {
      return {
        success: false,
        errorKind: 'invalid_player_count',
        error: `A game needs ${MIN_PLAYERS}-${MAX_PLAYERS} players, got ${playerNames.length}`,
      };
    }
    const names = playerNames.map(name => name.trim());
    if (names.some(name => name.length === 0) || new Set(names).size !== names.length) {
      return {
        success: false,
        errorKind: 'invalid_player_count',
        error: 'Player names must be non-empty and unique',
      };
    }

    const sessionId = `game_${this.nextId++}`;
    const session = new GameSession(sessionId, names, { logger: this.logger ?? undefined, ...options });
    this.sessions.set(sessionId, session);
    return { success: true, data: session, events: [] };
  }

  getSession(sessionId: string): SessionResult<GameSession> {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return { success: false, errorKind: 'session_not_found', error: `Game ${sessionId} not found` };
    }
    return { success: true, data: session, events: [] };
  }

  removeSession(sessionId: string): SessionResult<{ sessionId: string }> {
    if (!this.sessions.delete(sessionId)) {
      return { success: false, errorKind: 'session_not_found', error: `Game ${sessionId} not found` };
    }
    return { success: true, data: { sessionId }, events: [] };
  }

  listSessions(): SessionSummary[] {
    return Array.from(this.sessions.values()).map(session => {
      const snapshot = session.getState();
      return {
        sessionId: session.id,
        players: snapshot.players.map(p => p.name),
        currentPlayer: snapshot.currentPlayer,
        turnNumber: snapshot.turnNumber,
        gameOver: snapshot.gameOver,
        winner: snapshot.winner,
      };
    });
  }

  boardCatalog(): BoardSpaceView[] {
    return boardCatalog();
  }
}
