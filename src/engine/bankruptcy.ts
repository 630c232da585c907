import type { GameState, GameEvent, PlayerState, Payment, Creditor, PendingDebt } from './types';
import {
  getPlayerById, getActivePlayers, liquidationValue, debit, credit, releaseBuildings,
} from './ledger';
import { getJailCardId, returnCardToDeck } from './cards';
import type { GameRules } from './rules';
import { ActionError, InvariantViolation } from './errors';

function owedBy(state: GameState, playerId: string): number {
  return state.pendingDebts
    .filter(debt => debt.debtorId === playerId)
    .reduce((sum, debt) => sum + debt.amount, 0);
}

// Bankruptcy on a split payment goes to the bank, not to the individual recipients.
function bankruptcyCreditor(payment: Payment): Creditor {
  return payment.shares ? 'bank' : payment.creditor;
}

function settle(state: GameState, debtor: PlayerState, payment: Payment, events: GameEvent[]): void {
  debit(debtor, payment.amount);
  if (payment.shares) {
    for (const share of payment.shares) {
      const recipient = getPlayerById(state, share.playerId);
      // A recipient who has gone bankrupt since the debt was queued forfeits the share
      if (!recipient.isBankrupt) credit(recipient, share.amount);
    }
  } else if (payment.creditor !== 'bank') {
    credit(getPlayerById(state, payment.creditor), payment.amount);
  }
  events.push({
    type: 'payment',
    playerId: debtor.id,
    creditor: payment.creditor,
    amount: payment.amount,
    reason: payment.reason,
  });
}

/**
 * The single path for every payment a player cannot refuse (rent, tax,
 * card charges, the forced jail fine, repairs).
 *
 * Pays at once when cash allows. When only selling buildings and mortgaging
 * could cover it, the payment is queued as a debt and the debtor settles it
 * later in the paying_debt phase. Otherwise the debtor is bankrupt now.
 */
export function chargePlayer(
  state: GameState,
  debtor: PlayerState,
  payment: Payment,
  events: GameEvent[],
  rules: GameRules,
): void {
  if (state.winner !== null || debtor.isBankrupt || payment.amount <= 0) return;

  const alreadyOwed = owedBy(state, debtor.id);
  if (alreadyOwed === 0 && debtor.balance >= payment.amount) {
    settle(state, debtor, payment, events);
    return;
  }

  if (debtor.balance + liquidationValue(state, debtor, rules) >= alreadyOwed + payment.amount) {
    state.pendingDebts.push({ ...payment, debtorId: debtor.id });
    events.push({
      type: 'debt_incurred',
      playerId: debtor.id,
      creditor: payment.creditor,
      amount: payment.amount,
      reason: payment.reason,
    });
    return;
  }

  // A player already in debt goes bankrupt to whoever they owed first.
  const earliest = state.pendingDebts.find(debt => debt.debtorId === debtor.id);
  bankruptPlayer(state, debtor, bankruptcyCreditor(earliest ?? payment), events);
}

export function headDebt(state: GameState): PendingDebt | null {
  return state.pendingDebts[0] ?? null;
}

/** Pays the debt at the head of the queue from the debtor's cash. */
export function payHeadDebt(state: GameState, events: GameEvent[]): void {
  const debt = headDebt(state);
  if (!debt) throw new ActionError('invalid_phase', 'There is no debt to pay');
  const debtor = getPlayerById(state, debt.debtorId);
  if (debtor.balance < debt.amount) {
    throw new ActionError(
      'insufficient_funds',
      `${debtor.name} owes $${debt.amount} but has $${debtor.balance}. Sell buildings or mortgage first.`,
    );
  }
  state.pendingDebts.shift();
  settle(state, debtor, debt, events);
}

/** The head debtor gives up: bankrupt to the creditor of the debt they could not pay. */
export function declareBankruptcy(state: GameState, events: GameEvent[]): void {
  const debt = headDebt(state);
  if (!debt) throw new ActionError('invalid_phase', 'There is no debt to declare bankruptcy on');
  bankruptPlayer(state, getPlayerById(state, debt.debtorId), bankruptcyCreditor(debt), events);
}

/**
 * Eliminates a player. Assets go to a player creditor as they are, or back
 * to the bank (buildings to the pools, deeds unowned, jail cards to their
 * decks). Ends the game when one player is left.
 */
export function bankruptPlayer(
  state: GameState,
  player: PlayerState,
  creditor: Creditor,
  events: GameEvent[],
): void {
  if (player.isBankrupt) throw new InvariantViolation(`${player.name} is already bankrupt`);

  const recipient = creditor === 'bank' ? null : getPlayerById(state, creditor);
  if (recipient?.isBankrupt) {
    throw new InvariantViolation(`Cannot go bankrupt to ${recipient.name}, who is already out`);
  }

  if (recipient) {
    credit(recipient, player.balance);
    for (const [pos, propState] of player.properties) {
      recipient.properties.set(pos, { ...propState });
    }
    recipient.getOutOfJailCards.push(...player.getOutOfJailCards);
  } else {
    releaseBuildings(state, player);
    for (const deck of player.getOutOfJailCards) {
      if (deck === 'chance') {
        state.chanceDeck = returnCardToDeck(state.chanceDeck, getJailCardId(deck));
      } else {
        state.communityChestDeck = returnCardToDeck(state.communityChestDeck, getJailCardId(deck));
      }
    }
  }

  player.balance = 0;
  player.properties.clear();
  player.getOutOfJailCards = [];
  player.inJail = false;
  player.jailTurns = 0;
  player.doublesCount = 0;
  player.isBankrupt = true;
  events.push({ type: 'bankruptcy', playerId: player.id, creditor });

  state.pendingDebts = state.pendingDebts
    .filter(debt => debt.debtorId !== player.id)
    .map(debt => (debt.creditor === player.id ? { ...debt, creditor: 'bank' } : debt));
  if (state.activeTrade && [state.activeTrade.offer.fromPlayerId, state.activeTrade.offer.toPlayerId].includes(player.id)) {
    state.activeTrade = null;
  }

  declareWinnerIfLastStanding(state, events);
}

export function declareWinnerIfLastStanding(state: GameState, events: GameEvent[]): void {
  if (state.winner !== null) return;
  const active = getActivePlayers(state);
  if (active.length !== 1) return;

  const [winner] = active;
  state.winner = winner.id;
  state.pendingDebts = [];
  state.pendingPurchase = null;
  state.turnPhase = 'game_over';
  events.push({ type: 'game_over', winnerId: winner.id, reason: 'All other players are bankrupt' });
}
