import type { GameSession, SessionResult } from './session/game-session';
import type { GameSnapshot } from './session/views';
import type { Renderer } from './display/renderer';

export const PLAYER_NAMES = ['Alice', 'Bob', 'Charlie', 'Diana', 'Eve', 'Frank', 'Grace', 'Heidi'];

const MAX_ACTIONS_PER_TURN = 200;
// Cash a scripted player keeps back before building.
const BUILD_RESERVE = 400;

export interface AutoplayOptions {
  maxTurns: number;
  renderer?: Renderer;
}

export interface AutoplayResult {
  snapshot: GameSnapshot;
  actions: number;
  stoppedAtTurnLimit: boolean;
}

/**
 * Plays a session to the end with a fixed script: buy whatever is
 * affordable, build while cash stays above a reserve, leave jail with a
 * card when holding one, and raise cash by selling then mortgaging when in
 * debt. Every decision goes through the public session API.
 */
export function runAutoplay(session: GameSession, options: AutoplayOptions): AutoplayResult {
  const { renderer } = options;
  let actions = 0;
  let actionsThisTurn = 0;
  let turn = session.getState().turnNumber;

  renderer?.renderGameStart(session.getState());

  while (!session.isOver() && session.getState().turnNumber <= options.maxTurns) {
    const snapshot = session.getState();
    if (snapshot.turnNumber !== turn) {
      turn = snapshot.turnNumber;
      actionsThisTurn = 0;
    }
    if (++actionsThisTurn > MAX_ACTIONS_PER_TURN) {
      throw new Error(`Autoplay made no progress on turn ${turn} of ${session.id}`);
    }

    const result = nextMove(session, snapshot);
    if (!result.success) {
      throw new Error(`${snapshot.actingPlayer} could not act (${result.errorKind}): ${result.error}`);
    }
    actions++;
    renderer?.renderEvents(result.events, session.getState());
  }

  const snapshot = session.getState();
  renderer?.renderGameOver(snapshot);
  return { snapshot, actions, stoppedAtTurnLimit: !snapshot.gameOver };
}

export function nextMove(session: GameSession, snapshot: GameSnapshot): SessionResult<unknown> {
  const name = snapshot.actingPlayer;
  const me = snapshot.players.find(p => p.name === name);
  if (!me) throw new Error(`Acting player ${name} is missing from the snapshot`);

  const available = session.availableActions(name);
  if (!available.success) return available;
  const positionsFor = (action: string): number[] =>
    available.data.find(a => a.action === action)?.positions ?? [];

  switch (snapshot.phase) {
    case 'awaiting_roll': {
      if (me.inJail) {
        return me.getOutOfJailCards > 0 ? session.useJailCard(name) : session.roll(name);
      }
      const buildable = positionsFor('build');
      if (buildable.length > 0 && me.balance >= BUILD_RESERVE) {
        return session.build(name, buildable[0]);
      }
      return session.roll(name);
    }

    case 'purchase_decision': {
      const offer = snapshot.pendingPurchase;
      if (!offer) throw new Error('Purchase decision without a pending purchase');
      return me.balance >= offer.price ? session.buy(name, offer.position) : session.decline(name, offer.position);
    }

    case 'paying_debt': {
      const debt = snapshot.pendingDebts[0];
      if (debt && me.balance >= debt.amount) return session.payDebt(name);
      const sellable = positionsFor('sell_building');
      if (sellable.length > 0) return session.sellBuilding(name, sellable[0]);
      const mortgageable = positionsFor('mortgage_property');
      if (mortgageable.length > 0) return session.mortgage(name, mortgageable[0]);
      return session.declareBankruptcy(name);
    }

    case 'trading':
      return session.rejectTrade(name);

    case 'game_over':
      throw new Error('The game is already over');
  }
}
