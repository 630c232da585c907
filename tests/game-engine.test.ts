import { describe, it, expect } from 'vitest';
import type { GameAction, GameState, GameEvent } from '../src/engine/types';
import type { GameEngine } from '../src/engine/game-engine';
import { COLOR_GROUP_MEMBERS } from '../src/engine/board-data';
import {
  createTestState, engineRolling, getPlayer, giveProperty, giveColorGroup, setPosition, setBalance,
  putInJail, giveJailCard, stackDeck,
} from './helpers';

function act(engine: GameEngine, state: GameState, playerId: string, action: GameAction): { state: GameState; events: GameEvent[] } {
  const result = engine.applyAction(state, playerId, action);
  if (!result.success) throw new Error(`${action.action} failed: ${result.error}`);
  return { state: result.newState, events: result.events };
}

const ROLL: GameAction = { action: 'roll_dice' };

describe('GameEngine', () => {
  describe('rolling and moving', () => {
    it('moves by the dice sum and hands the turn on', () => {
      const state = createTestState();
      setPosition(state, 'player_0', 6);
      const { state: next, events } = act(engineRolling(1, 3), state, 'player_0', ROLL);

      expect(getPlayer(next, 'player_0').position).toBe(10);
      expect(next.lastDiceRoll).toEqual([1, 3]);
      expect(next.currentPlayerIndex).toBe(1);
      expect(next.turnNumber).toBe(2);
      expect(events.map(e => e.type)).toEqual(['roll_dice', 'move', 'land', 'turn_start']);
    });

    it('leaves the input state untouched', () => {
      const state = createTestState();
      act(engineRolling(1, 3), state, 'player_0', ROLL);
      expect(getPlayer(state, 'player_0').position).toBe(0);
      expect(state.turnNumber).toBe(1);
      expect(state.gameLog).toEqual([]);
    });

    it('appends the events to the game log', () => {
      const { state, events } = act(engineRolling(1, 3), createTestState(), 'player_0', ROLL);
      expect(state.gameLog).toEqual(events);
    });

    it('pays $200 for passing Go', () => {
      const state = createTestState();
      setPosition(state, 'player_0', 38);
      const { state: next, events } = act(engineRolling(1, 2), state, 'player_0', ROLL);

      expect(getPlayer(next, 'player_0').position).toBe(1);
      expect(getPlayer(next, 'player_0').balance).toBe(1700);
      expect(events).toContainEqual({ type: 'pass_go', playerId: 'player_0', collected: 200 });
    });

    it('grants another roll after doubles', () => {
      const state = createTestState();
      setPosition(state, 'player_0', 8);
      const { state: next, events } = act(engineRolling(1, 1), state, 'player_0', ROLL);

      expect(next.currentPlayerIndex).toBe(0);
      expect(next.turnPhase).toBe('awaiting_roll');
      expect(getPlayer(next, 'player_0').doublesCount).toBe(1);
      expect(events.at(-1)).toEqual({ type: 'extra_roll', playerId: 'player_0' });
    });

    it('sends a player to jail on the third consecutive doubles', () => {
      const engine = engineRolling(5, 5);
      let state = createTestState();
      state = act(engine, state, 'player_0', ROLL).state;
      expect(getPlayer(state, 'player_0').position).toBe(10);
      state = act(engine, state, 'player_0', ROLL).state;
      expect(getPlayer(state, 'player_0').position).toBe(20);

      const third = act(engine, state, 'player_0', ROLL);
      const player = getPlayer(third.state, 'player_0');
      expect(player.position).toBe(10);
      expect(player.inJail).toBe(true);
      expect(player.doublesCount).toBe(0);
      expect(third.events.map(e => e.type)).toEqual(['roll_dice', 'go_to_jail', 'turn_start']);
      expect(third.state.currentPlayerIndex).toBe(1);
    });

    it('jails a player landing on Go To Jail without paying Go', () => {
      const state = createTestState();
      setPosition(state, 'player_0', 25);
      const { state: next } = act(engineRolling(2, 3), state, 'player_0', ROLL);
      const player = getPlayer(next, 'player_0');
      expect(player.position).toBe(10);
      expect(player.inJail).toBe(true);
      expect(player.balance).toBe(1500);
    });

    it('charges income tax', () => {
      const { state } = act(engineRolling(1, 3), createTestState(), 'player_0', ROLL);
      expect(getPlayer(state, 'player_0').balance).toBe(1300);
    });
  });

  describe('buying and auctions', () => {
    it('offers an unowned property and waits for the decision', () => {
      const { state, events } = act(engineRolling(1, 2), createTestState(), 'player_0', ROLL);
      expect(state.turnPhase).toBe('purchase_decision');
      expect(state.pendingPurchase).toBe(3);
      expect(state.currentPlayerIndex).toBe(0);
      expect(events).toContainEqual({
        type: 'purchase_offered', playerId: 'player_0', property: 'Baltic Avenue', position: 3, price: 60,
      });
    });

    it('buys and then hands the turn on', () => {
      const engine = engineRolling(1, 2);
      const rolled = act(engine, createTestState(), 'player_0', ROLL).state;
      const { state } = act(engine, rolled, 'player_0', { action: 'buy_property', propertyPosition: 3 });

      expect(getPlayer(state, 'player_0').balance).toBe(1440);
      expect(getPlayer(state, 'player_0').properties.has(3)).toBe(true);
      expect(state.pendingPurchase).toBeNull();
      expect(state.currentPlayerIndex).toBe(1);
    });

    it('auctions a declined property', () => {
      const engine = engineRolling(1, 2);
      const rolled = act(engine, createTestState(), 'player_0', ROLL).state;
      const { state } = act(engine, rolled, 'player_0', {
        action: 'decline_property',
        propertyPosition: 3,
        bids: [{ playerId: 'player_1', amount: 45 }],
      });

      expect(getPlayer(state, 'player_1').properties.has(3)).toBe(true);
      expect(getPlayer(state, 'player_1').balance).toBe(1455);
      expect(state.currentPlayerIndex).toBe(1);
    });

    it('rejects a purchase outside the purchase decision', () => {
      const result = engineRolling(1, 2).applyAction(createTestState(), 'player_0', { action: 'buy_property', propertyPosition: 3 });
      expect(result.success).toBe(false);
      expect(result.errorKind).toBe('invalid_phase');
    });
  });

  describe('rent', () => {
    it('charges $100 for landing on a railroad when the owner has three', () => {
      const state = createTestState();
      for (const pos of [5, 15, 25]) giveProperty(state, 'player_1', pos);
      const { state: next, events } = act(engineRolling(2, 3), state, 'player_0', ROLL);

      expect(getPlayer(next, 'player_0').balance).toBe(1400);
      expect(getPlayer(next, 'player_1').balance).toBe(1600);
      expect(events).toContainEqual({
        type: 'payment', playerId: 'player_0', creditor: 'player_1', amount: 100, reason: 'Rent on Reading Railroad',
      });
    });

    it('charges no rent on your own property', () => {
      const state = createTestState();
      giveProperty(state, 'player_0', 3);
      const { state: next } = act(engineRolling(1, 2), state, 'player_0', ROLL);
      expect(getPlayer(next, 'player_0').balance).toBe(1500);
      expect(next.currentPlayerIndex).toBe(1);
    });

    it('bankrupts a player with $40 and no assets facing $150 rent', () => {
      const state = createTestState();
      giveColorGroup(state, 'player_1', COLOR_GROUP_MEMBERS.pink, 2);
      setPosition(state, 'player_0', 4);
      setBalance(state, 'player_0', 40);
      const { state: next, events } = act(engineRolling(3, 4), state, 'player_0', ROLL);

      expect(getPlayer(next, 'player_0').isBankrupt).toBe(true);
      expect(getPlayer(next, 'player_1').balance).toBe(1540);
      expect(next.winner).toBe('player_1');
      expect(next.turnPhase).toBe('game_over');
      expect(events.slice(-2)).toEqual([
        { type: 'bankruptcy', playerId: 'player_0', creditor: 'player_1' },
        { type: 'game_over', winnerId: 'player_1', reason: 'All other players are bankrupt' },
      ]);

      const after = engineRolling(1, 2).applyAction(next, 'player_1', ROLL);
      expect(after.errorKind).toBe('game_over');
    });

    it('hands a bankrupt player\'s deeds to the creditor and skips their seat afterwards', () => {
      const engine = engineRolling(3, 4, 4, 6, 4, 6, 4, 6, 4, 6);
      let state = createTestState(3);
      giveColorGroup(state, 'player_1', COLOR_GROUP_MEMBERS.pink, 2);
      giveProperty(state, 'player_0', 1, 0, true);
      giveProperty(state, 'player_0', 15, 0, true);
      setPosition(state, 'player_0', 4);
      setBalance(state, 'player_0', 40);

      const seats: number[] = [];
      state = act(engine, state, 'player_0', ROLL).state;
      seats.push(state.currentPlayerIndex);

      const bankrupt = getPlayer(state, 'player_0');
      const creditor = getPlayer(state, 'player_1');
      expect(bankrupt.isBankrupt).toBe(true);
      expect(bankrupt.properties.size).toBe(0);
      expect([...creditor.properties.keys()].sort((a, b) => a - b)).toEqual([1, 11, 13, 14, 15]);
      expect(creditor.properties.get(1)).toEqual({ houses: 0, mortgaged: true });
      expect(creditor.balance).toBe(1540);
      expect(getPlayer(state, 'player_2').properties.size).toBe(0);
      expect(state.winner).toBeNull();

      for (const playerId of ['player_1', 'player_2', 'player_1', 'player_2']) {
        state = act(engine, state, playerId, ROLL).state;
        seats.push(state.currentPlayerIndex);
      }
      expect(seats).toEqual([1, 2, 1, 2, 1]);
      expect(engine.applyAction(state, 'player_0', ROLL).success).toBe(false);
    });

    it('queues rent the player can raise and lets them settle it', () => {
      const engine = engineRolling(2, 3);
      let state = createTestState();
      for (const pos of [5, 15, 25, 35]) giveProperty(state, 'player_1', pos);
      giveProperty(state, 'player_0', 39);
      setBalance(state, 'player_0', 100);

      state = act(engine, state, 'player_0', ROLL).state;
      expect(state.turnPhase).toBe('paying_debt');
      expect(engine.actingPlayer(state).id).toBe('player_0');
      expect(engine.getAvailableActions(state).map(a => a.action))
        .toEqual(['declare_bankruptcy', 'mortgage_property', 'trade_offer']);

      const early = engine.applyAction(state, 'player_0', { action: 'pay_debt' });
      expect(early.errorKind).toBe('insufficient_funds');

      state = act(engine, state, 'player_0', { action: 'mortgage_property', propertyPosition: 39 }).state;
      state = act(engine, state, 'player_0', { action: 'pay_debt' }).state;
      expect(getPlayer(state, 'player_0').balance).toBe(100);
      expect(getPlayer(state, 'player_1').balance).toBe(1700);
      expect(state.pendingDebts).toEqual([]);
      expect(state.currentPlayerIndex).toBe(1);
      expect(state.turnNumber).toBe(2);
    });
  });

  describe('cards', () => {
    it('collects Go exactly once for Advance to Go', () => {
      const state = createTestState();
      stackDeck(state, 'chance', 1);
      const { state: next, events } = act(engineRolling(3, 4), state, 'player_0', ROLL);

      expect(getPlayer(next, 'player_0').position).toBe(0);
      expect(getPlayer(next, 'player_0').balance).toBe(1700);
      expect(events.filter(e => e.type === 'pass_go')).toHaveLength(1);
      expect(next.chanceDeck.at(-1)).toBe(1);
    });

    it('charges double railroad rent for the nearest-railroad card', () => {
      const state = createTestState();
      giveProperty(state, 'player_1', 15);
      stackDeck(state, 'chance', 4);
      const { state: next } = act(engineRolling(3, 4), state, 'player_0', ROLL);

      expect(getPlayer(next, 'player_0').position).toBe(15);
      expect(getPlayer(next, 'player_0').balance).toBe(1450);
    });

    it('wraps past Go to the first railroad', () => {
      const state = createTestState();
      setPosition(state, 'player_0', 33);
      stackDeck(state, 'chance', 5);
      const { state: next } = act(engineRolling(1, 2), state, 'player_0', ROLL);

      expect(getPlayer(next, 'player_0').position).toBe(5);
      expect(getPlayer(next, 'player_0').balance).toBe(1700);
      expect(next.pendingPurchase).toBe(5);
    });

    it('charges ten times the dice for the nearest-utility card', () => {
      const state = createTestState();
      giveProperty(state, 'player_1', 12);
      stackDeck(state, 'chance', 6);
      const { state: next } = act(engineRolling(3, 4), state, 'player_0', ROLL);
      expect(getPlayer(next, 'player_0').balance).toBe(1430);
    });

    it('goes back three spaces and resolves the new space', () => {
      const state = createTestState();
      setPosition(state, 'player_0', 33);
      stackDeck(state, 'chance', 9);
      stackDeck(state, 'community_chest', 7);
      const { state: next } = act(engineRolling(1, 2), state, 'player_0', ROLL);

      expect(getPlayer(next, 'player_0').position).toBe(33);
      expect(getPlayer(next, 'player_0').balance).toBe(1520);
    });

    it('keeps a drawn Get Out of Jail Free card out of the deck', () => {
      const state = createTestState();
      setPosition(state, 'player_0', 14);
      stackDeck(state, 'community_chest', 4);
      const { state: next, events } = act(engineRolling(1, 2), state, 'player_0', ROLL);

      expect(getPlayer(next, 'player_0').getOutOfJailCards).toEqual(['community_chest']);
      expect(next.communityChestDeck).toHaveLength(15);
      expect(events).toContainEqual({ type: 'receive_jail_card', playerId: 'player_0', deck: 'community_chest' });
    });

    it('collects the birthday gift and lets a short player settle it', () => {
      const engine = engineRolling(1, 2);
      let state = createTestState(3);
      setPosition(state, 'player_0', 14);
      setBalance(state, 'player_1', 5);
      giveProperty(state, 'player_1', 1);
      stackDeck(state, 'community_chest', 8);

      state = act(engine, state, 'player_0', ROLL).state;
      expect(getPlayer(state, 'player_0').balance).toBe(1510);
      expect(state.turnPhase).toBe('paying_debt');
      expect(engine.actingPlayer(state).id).toBe('player_1');
      expect(engine.applyAction(state, 'player_0', ROLL).errorKind).toBe('not_current_player');

      state = act(engine, state, 'player_1', { action: 'mortgage_property', propertyPosition: 1 }).state;
      state = act(engine, state, 'player_1', { action: 'pay_debt' }).state;
      expect(getPlayer(state, 'player_0').balance).toBe(1520);
      expect(getPlayer(state, 'player_1').balance).toBe(25);
      expect(state.currentPlayerIndex).toBe(1);
    });
  });

  describe('jail', () => {
    it('counts a failed escape roll', () => {
      const state = createTestState();
      putInJail(state, 'player_0');
      const { state: next, events } = act(engineRolling(1, 2), state, 'player_0', ROLL);

      expect(getPlayer(next, 'player_0').inJail).toBe(true);
      expect(getPlayer(next, 'player_0').jailTurns).toBe(1);
      expect(getPlayer(next, 'player_0').position).toBe(10);
      expect(events[1]).toEqual({ type: 'jail_roll_failed', playerId: 'player_0', attempt: 1 });
      expect(next.currentPlayerIndex).toBe(1);
    });

    it('releases on doubles and moves, without an extra roll', () => {
      const engine = engineRolling(2, 2);
      const state = createTestState();
      putInJail(state, 'player_0');
      const rolled = act(engine, state, 'player_0', ROLL).state;
      expect(getPlayer(rolled, 'player_0').inJail).toBe(false);
      expect(getPlayer(rolled, 'player_0').position).toBe(14);
      expect(rolled.turnPhase).toBe('purchase_decision');

      const { state: next } = act(engine, rolled, 'player_0', { action: 'buy_property', propertyPosition: 14 });
      expect(next.currentPlayerIndex).toBe(1);
    });

    it('forces the fine on the last failed roll and moves the player', () => {
      const state = createTestState();
      putInJail(state, 'player_0', 2);
      const { state: next, events } = act(engineRolling(1, 2), state, 'player_0', ROLL);

      expect(events.slice(1, 4)).toEqual([
        { type: 'jail_roll_failed', playerId: 'player_0', attempt: 3 },
        { type: 'payment', playerId: 'player_0', creditor: 'bank', amount: 50, reason: 'Jail fine (attempt 3)' },
        { type: 'get_out_of_jail', playerId: 'player_0', method: 'paid $50 fine' },
      ]);
      expect(getPlayer(next, 'player_0').balance).toBe(1450);
      expect(getPlayer(next, 'player_0').position).toBe(13);
      expect(next.turnPhase).toBe('purchase_decision');
    });

    it('pays the fine before rolling', () => {
      const engine = engineRolling(1, 2);
      const state = createTestState();
      putInJail(state, 'player_0');
      const paid = act(engine, state, 'player_0', { action: 'pay_jail_fine' }).state;
      expect(getPlayer(paid, 'player_0').inJail).toBe(false);
      expect(getPlayer(paid, 'player_0').balance).toBe(1450);
      expect(paid.turnPhase).toBe('awaiting_roll');

      const { state: next } = act(engine, paid, 'player_0', ROLL);
      expect(getPlayer(next, 'player_0').position).toBe(13);
    });

    it('returns a used jail card to the bottom of its deck', () => {
      const state = createTestState();
      putInJail(state, 'player_0');
      giveJailCard(state, 'player_0', 'chance');
      const { state: next } = act(engineRolling(1, 2), state, 'player_0', { action: 'use_get_out_of_jail_card' });

      expect(getPlayer(next, 'player_0').inJail).toBe(false);
      expect(getPlayer(next, 'player_0').getOutOfJailCards).toEqual([]);
      expect(next.chanceDeck).toHaveLength(16);
      expect(next.chanceDeck.at(-1)).toBe(8);
    });

    it('limits a jailed player to the jail actions', () => {
      const state = createTestState();
      giveColorGroup(state, 'player_0', COLOR_GROUP_MEMBERS.brown);
      putInJail(state, 'player_0');
      const engine = engineRolling(1, 2);
      expect(engine.applyAction(state, 'player_0', { action: 'build', propertyPosition: 1 }).errorKind).toBe('invalid_phase');
      expect(engine.applyAction(state, 'player_0', { action: 'use_get_out_of_jail_card' }).errorKind).toBe('invalid_phase');
      expect(engine.getAvailableActions(state).map(a => a.action)).toEqual(['roll_dice', 'pay_jail_fine']);
    });
  });

  describe('buildings', () => {
    it('keeps houses and hotels conserved while building up to hotels', () => {
      const engine = engineRolling(1, 2);
      let state = createTestState();
      giveColorGroup(state, 'player_0', COLOR_GROUP_MEMBERS.brown);
      for (let i = 0; i < 5; i++) {
        for (const pos of [1, 3]) {
          state = act(engine, state, 'player_0', { action: 'build', propertyPosition: pos }).state;
          const { houses, hotels } = [1, 3].reduce((acc, p) => {
            const h = getPlayer(state, 'player_0').properties.get(p)?.houses ?? 0;
            return h === 5 ? { ...acc, hotels: acc.hotels + 1 } : { ...acc, houses: acc.houses + h };
          }, { houses: 0, hotels: 0 });
          expect(houses + state.bankHouses).toBe(32);
          expect(hotels + state.bankHotels).toBe(12);
        }
      }
      // eight houses at $50, two hotels at $200
      expect(getPlayer(state, 'player_0').balance).toBe(700);
      expect(state.bankHotels).toBe(10);
    });
  });

  describe('trades', () => {
    it('hands the move to the trade target until they answer', () => {
      const engine = engineRolling(1, 2);
      let state = createTestState();
      giveProperty(state, 'player_1', 3);
      state = act(engine, state, 'player_0', {
        action: 'trade_offer',
        offer: {
          fromPlayerId: 'player_0', toPlayerId: 'player_1',
          offeredProperties: [], offeredMoney: 100, offeredJailCards: 0,
          requestedProperties: [3], requestedMoney: 0, requestedJailCards: 0,
        },
      }).state;

      expect(engine.actingPlayer(state).id).toBe('player_1');
      expect(engine.applyAction(state, 'player_0', ROLL).errorKind).toBe('not_current_player');

      state = act(engine, state, 'player_1', { action: 'accept_trade' }).state;
      expect(state.turnPhase).toBe('awaiting_roll');
      expect(state.currentPlayerIndex).toBe(0);
      expect(getPlayer(state, 'player_0').properties.has(3)).toBe(true);
      expect(getPlayer(state, 'player_1').balance).toBe(1600);
    });
  });

  describe('validation', () => {
    it('rejects moves out of turn', () => {
      const result = engineRolling(1, 2).applyAction(createTestState(), 'player_1', ROLL);
      expect(result).toMatchObject({ success: false, errorKind: 'not_current_player', error: "It is Player0's move" });
    });

    it('rejects unknown players', () => {
      const state = createTestState();
      const result = engineRolling(1, 2).applyAction(state, 'ghost', ROLL);
      expect(result.errorKind).toBe('player_not_found');
      expect(result.newState).toBe(state);
    });

    it('rejects paying a fine when not in jail', () => {
      const result = engineRolling(1, 2).applyAction(createTestState(), 'player_0', { action: 'pay_jail_fine' });
      expect(result.errorKind).toBe('invalid_phase');
    });
  });

  describe('getAvailableActions', () => {
    it('offers a roll and a trade at the start', () => {
      expect(engineRolling(1, 2).getAvailableActions(createTestState())).toEqual([
        { action: 'roll_dice', description: 'Roll the dice to move.' },
        { action: 'trade_offer', description: 'Propose a trade with another player.' },
      ]);
    });

    it('offers nothing to a player who is not acting', () => {
      expect(engineRolling(1, 2).getAvailableActions(createTestState(), 'player_1')).toEqual([]);
    });

    it('lists the positions each property action accepts', () => {
      const state = createTestState();
      giveColorGroup(state, 'player_0', COLOR_GROUP_MEMBERS.brown);
      giveProperty(state, 'player_0', 5, 0, true);
      const actions = engineRolling(1, 2).getAvailableActions(state);

      expect(actions.find(a => a.action === 'build')?.positions).toEqual([1, 3]);
      expect(actions.find(a => a.action === 'mortgage_property')?.positions).toEqual([1, 3]);
      expect(actions.find(a => a.action === 'unmortgage_property')?.positions).toEqual([5]);
      expect(actions.find(a => a.action === 'sell_building')).toBeUndefined();
    });

    it('offers buy and decline during a purchase decision', () => {
      const engine = engineRolling(1, 2);
      const { state } = act(engine, createTestState(), 'player_0', ROLL);
      expect(engine.getAvailableActions(state).map(a => [a.action, a.positions])).toEqual([
        ['buy_property', [3]],
        ['decline_property', [3]],
        ['trade_offer', undefined],
      ]);
    });
  });
});
