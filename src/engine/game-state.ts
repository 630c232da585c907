import type { GameState, PlayerState, ScenarioConfig } from './types';
import { CHANCE_CARDS, COMMUNITY_CHEST_CARDS, createShuffledDeck, getJailCardId } from './cards';
import { getOwnableSpace, JAIL_POSITION, BOARD_SIZE } from './board-data';
import { HOTEL, getPropertyOwner } from './ledger';
import type { Rng } from './dice';
import { type GameRules, DEFAULT_RULES } from './rules';

export function createInitialState(
  playerConfigs: { id: string; name: string }[],
  rng: Rng,
  rules: GameRules = DEFAULT_RULES,
): GameState {
  const players: PlayerState[] = playerConfigs.map(config => ({
    id: config.id,
    name: config.name,
    position: 0,
    balance: rules.startingBalance,
    properties: new Map(),
    inJail: false,
    jailTurns: 0,
    getOutOfJailCards: [],
    isBankrupt: false,
    doublesCount: 0,
  }));

  return {
    players,
    currentPlayerIndex: 0,
    turnPhase: 'awaiting_roll',
    turnNumber: 1,
    lastDiceRoll: null,
    chanceDeck: createShuffledDeck(CHANCE_CARDS, rng),
    communityChestDeck: createShuffledDeck(COMMUNITY_CHEST_CARDS, rng),
    bankHouses: rules.totalHouses,
    bankHotels: rules.totalHotels,
    pendingPurchase: null,
    pendingDebts: [],
    activeTrade: null,
    gameLog: [],
    winner: null,
  };
}

/**
 * Presets balances, positions and holdings, e.g. to start a session from the
 * middle of a game. Buildings are taken out of the bank pools and held jail
 * cards out of their decks.
 */
export function applyScenario(state: GameState, scenario: ScenarioConfig): GameState {
  for (let i = 0; i < scenario.players.length && i < state.players.length; i++) {
    const preset = scenario.players[i];
    const player = state.players[i];

    if (preset.balance !== undefined) player.balance = preset.balance;
    if (preset.position !== undefined) player.position = preset.position % BOARD_SIZE;
    if (preset.inJail !== undefined) {
      player.inJail = preset.inJail;
      if (preset.inJail) player.position = JAIL_POSITION;
    }
    if (preset.jailTurns !== undefined) player.jailTurns = preset.jailTurns;

    for (const deck of preset.getOutOfJailCards ?? []) {
      const cardId = getJailCardId(deck);
      const deckKey = deck === 'chance' ? 'chanceDeck' : 'communityChestDeck';
      if (!state[deckKey].includes(cardId)) {
        throw new Error(`The ${deck} Get Out of Jail Free card is already held`);
      }
      state[deckKey] = state[deckKey].filter(id => id !== cardId);
      player.getOutOfJailCards.push(deck);
    }

    for (const prop of preset.properties ?? []) {
      const space = getOwnableSpace(prop.position);
      if (!space) {
        throw new Error(`Position ${prop.position} is not an ownable property`);
      }
      if (getPropertyOwner(state, prop.position)) {
        throw new Error(`${space.name} is already owned`);
      }
      const houses = prop.houses ?? 0;
      if (houses > 0 && space.type !== 'property') {
        throw new Error(`${space.name} cannot hold buildings`);
      }
      player.properties.set(prop.position, {
        houses,
        mortgaged: prop.mortgaged ?? false,
      });

      // Deduct houses/hotels from bank supply
      if (houses === HOTEL) {
        state.bankHotels--;
      } else if (houses > 0) {
        state.bankHouses -= houses;
      }
    }
  }

  return state;
}
