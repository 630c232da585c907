import type {
  GameState, GameAction, ActionName, ActionResult, GameEvent, AvailableAction,
  PlayerState, CardEffect, DeckType, TurnPhase,
} from './types';
import {
  BOARD_SIZE, JAIL_POSITION, RAILROAD_POSITIONS, UTILITY_POSITIONS, getSpace, getOwnableSpace,
} from './board-data';
import {
  cloneState, getPlayerById, getPropertyOwner, getCurrentPlayer, countHousesAndHotels,
  credit, debit,
} from './ledger';
import { calculateRent } from './rent-calculator';
import { rollDice, type Rng } from './dice';
import { getDeckCards, drawCard, getJailCardId, returnCardToDeck } from './cards';
import {
  chargePlayer, payHeadDebt, declareBankruptcy, headDebt,
} from './bankruptcy';
import {
  buyProperty, resolveAuction, buildOnProperty, sellBuilding, mortgageProperty, unmortgageProperty,
  proposeTrade, acceptTrade, rejectTrade,
  validateBuild, validateSellBuilding, validateMortgage, validateUnmortgage,
} from './transactions';
import { assertInvariants } from './invariants';
import { type GameRules, DEFAULT_RULES } from './rules';
import { ActionError, InvariantViolation } from './errors';

const PHASE_ACTIONS: Record<TurnPhase, readonly ActionName[]> = {
  awaiting_roll: [
    'roll_dice', 'pay_jail_fine', 'use_get_out_of_jail_card',
    'build', 'sell_building', 'mortgage_property', 'unmortgage_property', 'trade_offer',
  ],
  purchase_decision: [
    'buy_property', 'decline_property', 'sell_building', 'mortgage_property', 'trade_offer',
  ],
  paying_debt: [
    'pay_debt', 'declare_bankruptcy', 'sell_building', 'mortgage_property', 'trade_offer',
  ],
  trading: ['accept_trade', 'reject_trade'],
  game_over: [],
};

const JAILED_ACTIONS: readonly ActionName[] = ['roll_dice', 'pay_jail_fine', 'use_get_out_of_jail_card'];

export class GameEngine {
  private rng: Rng;
  private rules: GameRules;

  constructor(rng: Rng, rules: GameRules = DEFAULT_RULES) {
    this.rng = rng;
    this.rules = rules;
  }

  /** The only player allowed to act right now: debtor, trade target or current player. */
  actingPlayer(state: GameState): PlayerState {
    const debt = headDebt(state);
    if (state.turnPhase === 'paying_debt' && debt) {
      return getPlayerById(state, debt.debtorId);
    }
    if (state.turnPhase === 'trading' && state.activeTrade) {
      return getPlayerById(state, state.activeTrade.offer.toPlayerId);
    }
    return getCurrentPlayer(state);
  }

  isActionLegal(state: GameState, action: ActionName): boolean {
    if (!PHASE_ACTIONS[state.turnPhase].includes(action)) return false;
    if (state.turnPhase === 'awaiting_roll' && getCurrentPlayer(state).inJail) {
      return JAILED_ACTIONS.includes(action);
    }
    return true;
  }

  /**
   * Validates and applies one action. The input state is never touched: the
   * action runs on a clone, which is returned only when everything succeeded.
   */
  applyAction(state: GameState, playerId: string, action: GameAction): ActionResult {
    const events: GameEvent[] = [];

    try {
      if (state.winner !== null || state.turnPhase === 'game_over') {
        throw new ActionError('game_over', 'The game is over');
      }
      if (!state.players.some(p => p.id === playerId)) {
        throw new ActionError('player_not_found', `No player with id ${playerId}`);
      }
      const actor = this.actingPlayer(state);
      if (actor.id !== playerId) {
        throw new ActionError('not_current_player', `It is ${actor.name}'s move`);
      }
      if (!this.isActionLegal(state, action.action)) {
        throw new ActionError('invalid_phase', `Cannot ${action.action.replace(/_/g, ' ')} during ${state.turnPhase}`);
      }

      const newState = cloneState(state);
      this.dispatch(newState, getPlayerById(newState, playerId), action, events);
      assertInvariants(newState, this.rules);

      newState.gameLog.push(...events);
      return { success: true, newState, events };
    } catch (e) {
      if (e instanceof ActionError) {
        return { success: false, newState: state, events: [], error: e.message, errorKind: e.kind };
      }
      throw e;
    }
  }

  private dispatch(state: GameState, player: PlayerState, action: GameAction, events: GameEvent[]): void {
    switch (action.action) {
      case 'roll_dice':
        this.handleRollDice(state, player, events);
        break;
      case 'pay_jail_fine':
        this.handlePayJailFine(player, events);
        break;
      case 'use_get_out_of_jail_card':
        this.handleUseJailCard(state, player, events);
        break;
      case 'buy_property':
        buyProperty(state, player, action.propertyPosition, events);
        this.continueTurn(state, events);
        break;
      case 'decline_property':
        resolveAuction(state, player, action.propertyPosition, action.bids, events, this.rules);
        this.continueTurn(state, events);
        break;
      case 'build':
        buildOnProperty(state, player, action.propertyPosition, events, this.rules);
        break;
      case 'sell_building':
        sellBuilding(state, player, action.propertyPosition, events, this.rules);
        break;
      case 'mortgage_property':
        mortgageProperty(player, action.propertyPosition, events);
        break;
      case 'unmortgage_property':
        unmortgageProperty(player, action.propertyPosition, events, this.rules);
        break;
      case 'trade_offer':
        proposeTrade(state, player, action.offer, events);
        break;
      case 'accept_trade':
        acceptTrade(state, player, events);
        break;
      case 'reject_trade':
        rejectTrade(state, player, events);
        break;
      case 'pay_debt':
        payHeadDebt(state, events);
        this.continueTurn(state, events);
        break;
      case 'declare_bankruptcy':
        declareBankruptcy(state, events);
        this.continueTurn(state, events);
        break;
    }
  }

  // ── Action Handlers ──

  private handleRollDice(state: GameState, player: PlayerState, events: GameEvent[]): void {
    const roll = rollDice(this.rng);
    state.lastDiceRoll = roll.dice;
    events.push({ type: 'roll_dice', playerId: player.id, dice: roll.dice, doubles: roll.isDoubles });

    if (player.inJail) {
      if (roll.isDoubles) {
        this.releaseFromJail(player, events, 'rolled doubles');
        this.movePlayer(state, player, roll.sum, events);
        this.resolveLanding(state, player, events);
      } else {
        player.jailTurns++;
        player.doublesCount = 0;
        events.push({ type: 'jail_roll_failed', playerId: player.id, attempt: player.jailTurns });
        if (player.jailTurns >= this.rules.maxJailTurns) {
          chargePlayer(state, player, {
            creditor: 'bank',
            amount: this.rules.jailFine,
            reason: `Jail fine (attempt ${player.jailTurns})`,
          }, events, this.rules);
          if (!player.isBankrupt) {
            this.releaseFromJail(player, events, `paid $${this.rules.jailFine} fine`);
            this.movePlayer(state, player, roll.sum, events);
            this.resolveLanding(state, player, events);
          }
        }
      }
      this.continueTurn(state, events);
      return;
    }

    if (!roll.isDoubles) {
      player.doublesCount = 0;
    } else if (++player.doublesCount >= this.rules.maxConsecutiveDoubles) {
      this.sendToJail(player, events, `Rolled ${this.rules.maxConsecutiveDoubles} consecutive doubles`);
      this.continueTurn(state, events);
      return;
    }

    this.movePlayer(state, player, roll.sum, events);
    this.resolveLanding(state, player, events);
    this.continueTurn(state, events);
  }

  private handlePayJailFine(player: PlayerState, events: GameEvent[]): void {
    if (!player.inJail) throw new ActionError('invalid_phase', `${player.name} is not in jail`);
    if (player.balance < this.rules.jailFine) {
      throw new ActionError(
        'insufficient_funds',
        `The jail fine is $${this.rules.jailFine} but ${player.name} has $${player.balance}`,
      );
    }

    debit(player, this.rules.jailFine);
    events.push({ type: 'payment', playerId: player.id, creditor: 'bank', amount: this.rules.jailFine, reason: 'Jail fine' });
    this.releaseFromJail(player, events, `paid $${this.rules.jailFine} fine`);
  }

  private handleUseJailCard(state: GameState, player: PlayerState, events: GameEvent[]): void {
    if (!player.inJail) throw new ActionError('invalid_phase', `${player.name} is not in jail`);
    const deck = player.getOutOfJailCards.shift();
    if (!deck) throw new ActionError('invalid_phase', `${player.name} has no Get Out of Jail Free card`);

    this.returnJailCard(state, deck);
    this.releaseFromJail(player, events, 'used Get Out of Jail Free card');
  }

  // ── Turn flow ──

  /**
   * Settles where the turn goes once an action's effects are applied:
   * game over, debts first, then a pending purchase, then an extra roll
   * after doubles, and otherwise the next player's turn.
   */
  private continueTurn(state: GameState, events: GameEvent[]): void {
    if (state.winner !== null) {
      state.turnPhase = 'game_over';
      return;
    }
    if (state.pendingDebts.length > 0) {
      state.turnPhase = 'paying_debt';
      return;
    }

    const player = getCurrentPlayer(state);
    if (state.pendingPurchase !== null && !player.isBankrupt) {
      state.turnPhase = 'purchase_decision';
      return;
    }
    state.pendingPurchase = null;

    if (!player.isBankrupt && !player.inJail && player.doublesCount > 0) {
      state.turnPhase = 'awaiting_roll';
      events.push({ type: 'extra_roll', playerId: player.id });
      return;
    }

    this.advanceToNextPlayer(state, events);
  }

  private advanceToNextPlayer(state: GameState, events: GameEvent[]): void {
    getCurrentPlayer(state).doublesCount = 0;

    const numPlayers = state.players.length;
    let next = state.currentPlayerIndex;
    for (let attempts = 0; attempts < numPlayers; attempts++) {
      next = (next + 1) % numPlayers;
      if (!state.players[next].isBankrupt) break;
    }
    if (state.players[next].isBankrupt) {
      throw new InvariantViolation('No active player left to take a turn');
    }

    state.currentPlayerIndex = next;
    state.turnPhase = 'awaiting_roll';
    state.turnNumber++;
    state.players[next].doublesCount = 0;
    events.push({ type: 'turn_start', playerId: state.players[next].id, turnNumber: state.turnNumber });
  }

  // ── Movement ──

  private movePlayer(state: GameState, player: PlayerState, spaces: number, events: GameEvent[]): void {
    const from = player.position;
    const passedGo = from + spaces >= BOARD_SIZE;
    player.position = (from + spaces) % BOARD_SIZE;

    if (passedGo) this.collectGo(player, events);
    events.push({ type: 'move', playerId: player.id, from, to: player.position, passedGo });
  }

  // Card jumps go forward, so a target behind the player means GO was passed.
  private movePlayerTo(player: PlayerState, target: number, collectGo: boolean, events: GameEvent[]): void {
    const from = player.position;
    const passedGo = collectGo && target < from;
    player.position = target;

    if (passedGo) this.collectGo(player, events);
    events.push({ type: 'move', playerId: player.id, from, to: target, passedGo });
  }

  private collectGo(player: PlayerState, events: GameEvent[]): void {
    credit(player, this.rules.passGoAmount);
    events.push({ type: 'pass_go', playerId: player.id, collected: this.rules.passGoAmount });
  }

  private sendToJail(player: PlayerState, events: GameEvent[], reason: string): void {
    player.position = JAIL_POSITION;
    player.inJail = true;
    player.jailTurns = 0;
    player.doublesCount = 0;
    events.push({ type: 'go_to_jail', playerId: player.id, reason });
  }

  private releaseFromJail(player: PlayerState, events: GameEvent[], method: string): void {
    player.inJail = false;
    player.jailTurns = 0;
    player.doublesCount = 0;
    events.push({ type: 'get_out_of_jail', playerId: player.id, method });
  }

  private returnJailCard(state: GameState, deck: DeckType): void {
    if (deck === 'chance') {
      state.chanceDeck = returnCardToDeck(state.chanceDeck, getJailCardId(deck));
    } else {
      state.communityChestDeck = returnCardToDeck(state.communityChestDeck, getJailCardId(deck));
    }
  }

  // ── Landing ──

  private resolveLanding(state: GameState, player: PlayerState, events: GameEvent[], cardRent = false): void {
    const space = getSpace(player.position);
    events.push({ type: 'land', playerId: player.id, spaceName: space.name, position: space.position });

    switch (space.type) {
      case 'go':
      case 'jail':
      case 'free_parking':
        break;
      case 'go_to_jail':
        this.sendToJail(player, events, `Landed on ${space.name}`);
        break;
      case 'tax':
        chargePlayer(state, player, { creditor: 'bank', amount: space.amount, reason: space.name }, events, this.rules);
        break;
      case 'chance':
      case 'community_chest':
        this.resolveCardDraw(state, player, space.type, events);
        break;
      case 'property':
      case 'railroad':
      case 'utility': {
        const owner = getPropertyOwner(state, space.position);
        if (!owner) {
          state.pendingPurchase = space.position;
          events.push({
            type: 'purchase_offered',
            playerId: player.id,
            property: space.name,
            position: space.position,
            price: space.price,
          });
          break;
        }
        if (owner.id === player.id) break;

        const rent = calculateRent(state, space.position, this.lastRoll(state), cardRent);
        chargePlayer(state, player, { creditor: owner.id, amount: rent, reason: `Rent on ${space.name}` }, events, this.rules);
        break;
      }
    }
  }

  private lastRoll(state: GameState): [number, number] {
    if (!state.lastDiceRoll) throw new InvariantViolation('Rent needs a dice roll but none was made');
    return state.lastDiceRoll;
  }

  private resolveCardDraw(state: GameState, player: PlayerState, deck: DeckType, events: GameEvent[]): void {
    const isChance = deck === 'chance';
    const { card, newDeck } = drawCard(isChance ? state.chanceDeck : state.communityChestDeck, getDeckCards(deck));
    if (isChance) {
      state.chanceDeck = newDeck;
    } else {
      state.communityChestDeck = newDeck;
    }

    events.push({ type: 'draw_card', playerId: player.id, deck, cardText: card.text });
    this.applyCardEffect(state, player, deck, card.effect, events);
  }

  private applyCardEffect(
    state: GameState,
    player: PlayerState,
    deck: DeckType,
    effect: CardEffect,
    events: GameEvent[],
  ): void {
    switch (effect.type) {
      case 'move_to':
        this.movePlayerTo(player, effect.position, effect.collectGo, events);
        this.resolveLanding(state, player, events);
        break;

      case 'move_back': {
        const from = player.position;
        player.position = (from - effect.spaces + BOARD_SIZE) % BOARD_SIZE;
        events.push({ type: 'move', playerId: player.id, from, to: player.position, passedGo: false });
        this.resolveLanding(state, player, events);
        break;
      }

      case 'move_to_nearest': {
        const positions = effect.spaceType === 'railroad' ? RAILROAD_POSITIONS : UTILITY_POSITIONS;
        const nearest = positions.find(p => p > player.position) ?? positions[0];
        this.movePlayerTo(player, nearest, effect.collectGo, events);
        this.resolveLanding(state, player, events, true);
        break;
      }

      case 'collect':
        credit(player, effect.amount);
        events.push({ type: 'collect', playerId: player.id, amount: effect.amount, reason: 'Card' });
        break;

      case 'pay':
        chargePlayer(state, player, { creditor: 'bank', amount: effect.amount, reason: 'Card' }, events, this.rules);
        break;

      case 'pay_per_house': {
        const { houses, hotels } = countHousesAndHotels(player);
        const total = houses * effect.houseAmount + hotels * effect.hotelAmount;
        chargePlayer(state, player, {
          creditor: 'bank',
          amount: total,
          reason: `Repairs: ${houses} houses × $${effect.houseAmount} + ${hotels} hotels × $${effect.hotelAmount}`,
        }, events, this.rules);
        break;
      }

      case 'collect_from_each_player':
        for (const other of state.players) {
          if (other.id === player.id || other.isBankrupt) continue;
          chargePlayer(state, other, { creditor: player.id, amount: effect.amount, reason: 'Card' }, events, this.rules);
        }
        break;

      case 'pay_each_player': {
        const others = state.players.filter(p => p.id !== player.id && !p.isBankrupt);
        chargePlayer(state, player, {
          creditor: 'bank',
          amount: effect.amount * others.length,
          reason: 'Card: pay each player',
          shares: others.map(p => ({ playerId: p.id, amount: effect.amount })),
        }, events, this.rules);
        break;
      }

      case 'get_out_of_jail_free':
        player.getOutOfJailCards.push(deck);
        events.push({ type: 'receive_jail_card', playerId: player.id, deck });
        break;

      case 'go_to_jail':
        this.sendToJail(player, events, 'Card: Go to Jail');
        break;
    }
  }

  // ── Available Actions ──

  /**
   * What `playerId` (default: whoever must act) can do right now, with the
   * board positions each property action would accept.
   */
  getAvailableActions(state: GameState, playerId?: string): AvailableAction[] {
    if (state.winner !== null || state.turnPhase === 'game_over') return [];
    const actor = this.actingPlayer(state);
    if (playerId !== undefined && playerId !== actor.id) return [];

    const actions: AvailableAction[] = [];
    const offer = (action: ActionName, description: string, positions?: number[]): void => {
      if (!this.isActionLegal(state, action)) return;
      if (positions && positions.length === 0) return;
      actions.push(positions ? { action, description, positions } : { action, description });
    };

    const owned = Array.from(actor.properties.keys()).sort((a, b) => a - b);
    const passing = (check: (pos: number) => void): number[] => owned.filter(pos => passes(() => check(pos)));

    switch (state.turnPhase) {
      case 'awaiting_roll':
        if (actor.inJail) {
          offer('roll_dice', 'Roll the dice. Doubles gets you out of jail.');
          if (actor.balance >= this.rules.jailFine) {
            offer('pay_jail_fine', `Pay $${this.rules.jailFine} to get out of jail.`);
          }
          if (actor.getOutOfJailCards.length > 0) {
            offer('use_get_out_of_jail_card', 'Use a Get Out of Jail Free card.');
          }
          break;
        }
        offer('roll_dice', 'Roll the dice to move.');
        offer('build', 'Build a house or hotel.', passing(pos => validateBuild(state, actor, pos, this.rules)));
        break;
      case 'purchase_decision':
        if (state.pendingPurchase !== null) {
          const space = getOwnableSpace(state.pendingPurchase);
          if (!space) break;
          if (actor.balance >= space.price) {
            offer('buy_property', `Buy ${space.name} for $${space.price}.`, [space.position]);
          }
          offer('decline_property', `Decline ${space.name} and auction it.`, [space.position]);
        }
        break;
      case 'paying_debt': {
        const debt = headDebt(state);
        if (debt && actor.balance >= debt.amount) {
          offer('pay_debt', `Pay $${debt.amount} (${debt.reason}).`);
        }
        offer('declare_bankruptcy', 'Declare bankruptcy. You are eliminated from the game.');
        break;
      }
      case 'trading':
        offer('accept_trade', 'Accept the trade offer.');
        offer('reject_trade', 'Reject the trade offer.');
        break;
    }

    offer('sell_building', 'Sell a house or hotel back to the bank.', passing(pos => validateSellBuilding(state, actor, pos, this.rules)));
    offer('mortgage_property', 'Mortgage a property to the bank.', passing(pos => validateMortgage(actor, pos)));
    offer('unmortgage_property', 'Lift a mortgage (mortgage value plus interest).', passing(pos => validateUnmortgage(actor, pos, this.rules)));
    if (state.players.some(p => p.id !== actor.id && !p.isBankrupt)) {
      offer('trade_offer', 'Propose a trade with another player.');
    }

    return actions;
  }
}

// Runs a validator, reporting whether it accepted. Anything but a rule rejection propagates.
function passes(check: () => void): boolean {
  try {
    check();
    return true;
  } catch (e) {
    if (e instanceof ActionError) return false;
    throw e;
  }
}
