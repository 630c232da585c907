import type { GameState, PlayerState, ColorGroup, OwnableSpace } from './types';
import { COLOR_GROUP_MEMBERS, getOwnableSpace, getSpace } from './board-data';
import type { GameRules } from './rules';
import { InvariantViolation } from './errors';

export const HOTEL = 5;
export const HOUSES_PER_HOTEL = 4;

export function getPlayerById(state: GameState, playerId: string): PlayerState {
  const player = state.players.find(p => p.id === playerId);
  if (!player) throw new Error(`Player ${playerId} not found`);
  return player;
}

export function findPlayerByName(state: GameState, name: string): PlayerState | null {
  return state.players.find(p => p.name === name) ?? null;
}

export function getPropertyOwner(state: GameState, position: number): PlayerState | null {
  for (const player of state.players) {
    if (player.properties.has(position)) {
      return player;
    }
  }
  return null;
}

// Mortgaged railroads and utilities still count towards the owner's set.
export function countOwnedOfType(player: PlayerState, type: 'railroad' | 'utility'): number {
  let count = 0;
  for (const pos of player.properties.keys()) {
    if (getSpace(pos).type === type) count++;
  }
  return count;
}

export function playerOwnsColorGroup(player: PlayerState, group: ColorGroup): boolean {
  return COLOR_GROUP_MEMBERS[group].every(pos => player.properties.has(pos));
}

export function colorGroupHasBuildings(player: PlayerState, group: ColorGroup): boolean {
  return COLOR_GROUP_MEMBERS[group].some(pos => (player.properties.get(pos)?.houses ?? 0) > 0);
}

export function colorGroupHasMortgage(player: PlayerState, group: ColorGroup): boolean {
  return COLOR_GROUP_MEMBERS[group].some(pos => player.properties.get(pos)?.mortgaged === true);
}

export function groupBuildingCounts(player: PlayerState, group: ColorGroup): number[] {
  return COLOR_GROUP_MEMBERS[group].map(pos => player.properties.get(pos)?.houses ?? 0);
}

export function countHousesAndHotels(player: PlayerState): { houses: number; hotels: number } {
  let houses = 0;
  let hotels = 0;
  for (const propState of player.properties.values()) {
    if (propState.houses === HOTEL) {
      hotels++;
    } else {
      houses += propState.houses;
    }
  }
  return { houses, hotels };
}

export function unmortgageCost(space: OwnableSpace, rules: GameRules): number {
  return space.mortgageValue + Math.floor(space.mortgageValue * rules.unmortgageInterestPercent / 100);
}

export function buildingRefund(houseCost: number, rules: GameRules): number {
  return Math.floor(houseCost * rules.buildingRefundPercent / 100);
}

export function hotelCost(houseCost: number, rules: GameRules): number {
  return houseCost * rules.hotelCostInHouses;
}

/** Refund for breaking a hotel back down to four houses. */
export function hotelRefund(houseCost: number, rules: GameRules): number {
  return Math.floor(hotelCost(houseCost, rules) * rules.buildingRefundPercent / 100);
}

function groupHasHotel(player: PlayerState, group: ColorGroup): boolean {
  return COLOR_GROUP_MEMBERS[group].some(pos => player.properties.get(pos)?.houses === HOTEL);
}

/**
 * Cash the player could raise by selling every building and mortgaging everything left.
 *
 * A hotel can only be broken up while the bank holds four houses. The player can
 * refill the pool by selling houses from groups without a hotel; when even that
 * leaves fewer than four, every group holding a hotel is frozen and counts for nothing.
 */
export function liquidationValue(state: GameState, player: PlayerState, rules: GameRules): number {
  let freeableHouses = state.bankHouses;
  for (const [pos, propState] of player.properties) {
    const space = getOwnableSpace(pos);
    if (space?.type === 'property' && !groupHasHotel(player, space.colorGroup)) {
      freeableHouses += propState.houses;
    }
  }
  const hotelsFrozen = freeableHouses < HOUSES_PER_HOTEL;

  let total = 0;
  for (const [pos, propState] of player.properties) {
    const space = getOwnableSpace(pos);
    if (!space) continue;
    if (space.type === 'property') {
      if (hotelsFrozen && groupHasHotel(player, space.colorGroup)) continue;
      if (propState.houses === HOTEL) {
        total += hotelRefund(space.houseCost, rules) + HOUSES_PER_HOTEL * buildingRefund(space.houseCost, rules);
      } else {
        total += propState.houses * buildingRefund(space.houseCost, rules);
      }
    }
    if (!propState.mortgaged) {
      total += space.mortgageValue;
    }
  }
  return total;
}

export function netWorth(player: PlayerState): number {
  let total = player.balance;
  for (const [pos, propState] of player.properties) {
    const space = getOwnableSpace(pos);
    if (!space) continue;
    total += propState.mortgaged ? space.price - space.mortgageValue : space.price;
    if (space.type === 'property') {
      total += propState.houses * space.houseCost;
    }
  }
  return total;
}

export function credit(player: PlayerState, amount: number): void {
  if (amount < 0) throw new InvariantViolation(`Cannot credit a negative amount (${amount})`);
  player.balance += amount;
}

export function debit(player: PlayerState, amount: number): void {
  if (amount < 0) throw new InvariantViolation(`Cannot debit a negative amount (${amount})`);
  if (player.balance < amount) {
    throw new InvariantViolation(`${player.name} cannot cover $${amount} with $${player.balance}`);
  }
  player.balance -= amount;
}

export function transferMoney(from: PlayerState, to: PlayerState, amount: number): void {
  debit(from, amount);
  credit(to, amount);
}

/** Returns a bankrupt player's buildings to the bank pools. */
export function releaseBuildings(state: GameState, player: PlayerState): void {
  for (const propState of player.properties.values()) {
    if (propState.houses === HOTEL) {
      state.bankHotels++;
    } else {
      state.bankHouses += propState.houses;
    }
    propState.houses = 0;
  }
}

// Deep clone the game state (properties Maps need special handling)
export function cloneState(state: GameState): GameState {
  return {
    ...state,
    players: state.players.map(p => ({
      ...p,
      properties: new Map(
        Array.from(p.properties.entries()).map(([k, v]) => [k, { ...v }]),
      ),
      getOutOfJailCards: [...p.getOutOfJailCards],
    })),
    lastDiceRoll: state.lastDiceRoll ? [state.lastDiceRoll[0], state.lastDiceRoll[1]] : null,
    chanceDeck: [...state.chanceDeck],
    communityChestDeck: [...state.communityChestDeck],
    pendingDebts: state.pendingDebts.map(debt => ({
      ...debt,
      shares: debt.shares?.map(share => ({ ...share })),
    })),
    activeTrade: state.activeTrade
      ? { ...state.activeTrade, offer: { ...state.activeTrade.offer } }
      : null,
    gameLog: [...state.gameLog],
  };
}

export function getActivePlayers(state: GameState): PlayerState[] {
  return state.players.filter(p => !p.isBankrupt);
}

export function getCurrentPlayer(state: GameState): PlayerState {
  const player = state.players[state.currentPlayerIndex];
  if (!player) throw new InvariantViolation(`No player at index ${state.currentPlayerIndex}`);
  return player;
}
