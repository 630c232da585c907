import type { GameState, PlayerState, PropertySpace } from './types';
import { getOwnableSpace } from './board-data';
import { getPropertyOwner, countOwnedOfType, playerOwnsColorGroup, colorGroupHasBuildings } from './ledger';

/**
 * Rent owed by a player landing on `position`. Pure: depends only on the
 * ledger and the dice that brought the player there.
 *
 * `cardRent` is set when a "nearest railroad/utility" card sent the player:
 * railroads then charge twice the table rent and utilities ten times the dice.
 */
export function calculateRent(
  state: GameState,
  position: number,
  diceRoll: [number, number],
  cardRent = false,
): number {
  const space = getOwnableSpace(position);
  if (!space) return 0;

  const owner = getPropertyOwner(state, position);
  if (!owner) return 0;

  const propState = owner.properties.get(position);
  if (!propState || propState.mortgaged) return 0;

  switch (space.type) {
    case 'property':
      return calculatePropertyRent(space, propState.houses, owner);
    case 'railroad':
      return calculateRailroadRent(owner) * (cardRent ? 2 : 1);
    case 'utility':
      return calculateUtilityRent(owner, diceRoll, cardRent);
  }
}

function calculatePropertyRent(
  space: PropertySpace,
  houses: number,
  owner: PlayerState,
): number {
  if (houses > 0) {
    // houses index: 1h=1, 2h=2, 3h=3, 4h=4, hotel(5)=5
    return space.rent[houses];
  }

  // Unimproved monopoly pays double
  if (playerOwnsColorGroup(owner, space.colorGroup) && !colorGroupHasBuildings(owner, space.colorGroup)) {
    return space.rent[0] * 2;
  }

  return space.rent[0];
}

export function calculateRailroadRent(owner: PlayerState): number {
  const count = countOwnedOfType(owner, 'railroad');
  if (count === 0) return 0;
  return 25 * Math.pow(2, count - 1); // 25, 50, 100, 200
}

function calculateUtilityRent(
  owner: PlayerState,
  diceRoll: [number, number],
  cardRent: boolean,
): number {
  const diceSum = diceRoll[0] + diceRoll[1];

  if (cardRent) {
    return diceSum * 10;
  }

  const count = countOwnedOfType(owner, 'utility');
  if (count === 1) return diceSum * 4;
  if (count >= 2) return diceSum * 10;
  return 0;
}
