import type { GameState, PlayerState, DeckType } from '../src/engine/types';
import { createInitialState } from '../src/engine/game-state';
import { createRng, type Rng } from '../src/engine/dice';
import { GameEngine } from '../src/engine/game-engine';
import { HOTEL } from '../src/engine/ledger';
import { getJailCardId } from '../src/engine/cards';
import { DEFAULT_RULES } from '../src/engine/rules';

/** Fixed seed for deterministic tests */
export const TEST_SEED = 42;

/** Create a deterministic RNG for tests */
export function testRng(): Rng {
  return createRng(TEST_SEED);
}

/**
 * An RNG whose dice come up with the given faces, in order, cycling.
 * `riggedRng(3, 4)` rolls [3, 4] every time.
 */
export function riggedRng(...faces: number[]): Rng {
  let i = 0;
  return () => {
    const face = faces[i % faces.length];
    i++;
    return (face - 0.5) / 6;
  };
}

/** Create a 2-player initial state with deterministic decks */
export function createTestState(playerCount = 2): GameState {
  const configs = [];
  for (let i = 0; i < playerCount; i++) {
    configs.push({ id: `player_${i}`, name: `Player${i}` });
  }
  return createInitialState(configs, testRng());
}

/** Engine whose dice show the given faces */
export function engineRolling(...faces: number[]): GameEngine {
  return new GameEngine(riggedRng(...faces), DEFAULT_RULES);
}

/** Helper: get player by id */
export function getPlayer(state: GameState, playerId: string): PlayerState {
  const player = state.players.find(p => p.id === playerId);
  if (!player) throw new Error(`No player ${playerId} in test state`);
  return player;
}

/** Helper: give a player a property (no cost), taking any buildings out of the bank */
export function giveProperty(
  state: GameState,
  playerId: string,
  position: number,
  houses = 0,
  mortgaged = false,
): void {
  getPlayer(state, playerId).properties.set(position, { houses, mortgaged });
  if (houses === HOTEL) {
    state.bankHotels--;
  } else {
    state.bankHouses -= houses;
  }
}

/** Helper: give player a complete color group, with the same building count on each */
export function giveColorGroup(
  state: GameState,
  playerId: string,
  positions: number[],
  houses = 0,
): void {
  for (const pos of positions) {
    giveProperty(state, playerId, pos, houses);
  }
}

/** Helper: set player position */
export function setPosition(state: GameState, playerId: string, position: number): void {
  getPlayer(state, playerId).position = position;
}

/** Helper: set player balance */
export function setBalance(state: GameState, playerId: string, balance: number): void {
  getPlayer(state, playerId).balance = balance;
}

/** Helper: put player in jail */
export function putInJail(state: GameState, playerId: string, jailTurns = 0): void {
  const player = getPlayer(state, playerId);
  player.position = 10;
  player.inJail = true;
  player.jailTurns = jailTurns;
}

/** Helper: hand a player the Get Out of Jail Free card of a deck */
export function giveJailCard(state: GameState, playerId: string, deck: DeckType): void {
  const cardId = getJailCardId(deck);
  if (deck === 'chance') {
    state.chanceDeck = state.chanceDeck.filter(id => id !== cardId);
  } else {
    state.communityChestDeck = state.communityChestDeck.filter(id => id !== cardId);
  }
  getPlayer(state, playerId).getOutOfJailCards.push(deck);
}

/** Helper: put a card on top of a deck */
export function stackDeck(state: GameState, deck: DeckType, cardId: number): void {
  if (deck === 'chance') {
    state.chanceDeck = [cardId, ...state.chanceDeck.filter(id => id !== cardId)];
  } else {
    state.communityChestDeck = [cardId, ...state.communityChestDeck.filter(id => id !== cardId)];
  }
}
