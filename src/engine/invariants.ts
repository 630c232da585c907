import type { GameState } from './types';
import { BOARD_SIZE, COLOR_GROUPS, getOwnableSpace } from './board-data';
import { HOTEL, playerOwnsColorGroup, groupBuildingCounts, colorGroupHasMortgage } from './ledger';
import { getJailCardId } from './cards';
import type { GameRules } from './rules';
import { InvariantViolation } from './errors';

/**
 * Checks every ledger rule that must hold between actions. Throws
 * InvariantViolation on the first broken one.
 */
export function assertInvariants(state: GameState, rules: GameRules): void {
  const owners = new Map<number, string>();
  let housesInPlay = 0;
  let hotelsInPlay = 0;

  for (const player of state.players) {
    if (!Number.isInteger(player.position) || player.position < 0 || player.position >= BOARD_SIZE) {
      throw new InvariantViolation(`${player.name} is off the board at ${player.position}`);
    }
    if (!player.isBankrupt && player.balance < 0) {
      throw new InvariantViolation(`${player.name} has negative cash (${player.balance})`);
    }
    if (player.jailTurns < 0 || player.jailTurns > rules.maxJailTurns) {
      throw new InvariantViolation(`${player.name} has ${player.jailTurns} jail turns`);
    }
    if (player.isBankrupt && (player.properties.size > 0 || player.getOutOfJailCards.length > 0)) {
      throw new InvariantViolation(`Bankrupt player ${player.name} still holds assets`);
    }

    for (const [pos, propState] of player.properties) {
      const space = getOwnableSpace(pos);
      if (!space) throw new InvariantViolation(`${player.name} owns unownable position ${pos}`);

      const previousOwner = owners.get(pos);
      if (previousOwner !== undefined) {
        throw new InvariantViolation(`${space.name} is owned by both ${previousOwner} and ${player.name}`);
      }
      owners.set(pos, player.name);

      if (!Number.isInteger(propState.houses) || propState.houses < 0 || propState.houses > HOTEL) {
        throw new InvariantViolation(`${space.name} has ${propState.houses} buildings`);
      }
      if (propState.houses === 0) continue;
      if (space.type !== 'property') {
        throw new InvariantViolation(`${space.name} cannot hold buildings`);
      }
      if (!playerOwnsColorGroup(player, space.colorGroup)) {
        throw new InvariantViolation(`${space.name} has buildings without the full color group`);
      }
      if (colorGroupHasMortgage(player, space.colorGroup)) {
        throw new InvariantViolation(`${space.name} has buildings in a group with a mortgage`);
      }
      if (propState.houses === HOTEL) {
        hotelsInPlay++;
      } else {
        housesInPlay += propState.houses;
      }
    }

    for (const group of COLOR_GROUPS) {
      const counts = groupBuildingCounts(player, group);
      if (Math.max(...counts) - Math.min(...counts) > 1 && playerOwnsColorGroup(player, group)) {
        throw new InvariantViolation(`${player.name} has built unevenly on ${group}`);
      }
    }
  }

  if (housesInPlay + state.bankHouses !== rules.totalHouses || state.bankHouses < 0) {
    throw new InvariantViolation(
      `House count mismatch: ${housesInPlay} in play + ${state.bankHouses} in bank`,
    );
  }
  if (hotelsInPlay + state.bankHotels !== rules.totalHotels || state.bankHotels < 0) {
    throw new InvariantViolation(
      `Hotel count mismatch: ${hotelsInPlay} in play + ${state.bankHotels} in bank`,
    );
  }

  assertJailCardsAccountedFor(state);
}

function assertJailCardsAccountedFor(state: GameState): void {
  for (const deck of ['chance', 'community_chest'] as const) {
    const cardId = getJailCardId(deck);
    const inDeck = (deck === 'chance' ? state.chanceDeck : state.communityChestDeck)
      .filter(id => id === cardId).length;
    const held = state.players
      .reduce((n, p) => n + p.getOutOfJailCards.filter(d => d === deck).length, 0);
    if (inDeck + held !== 1) {
      throw new InvariantViolation(`The ${deck} Get Out of Jail Free card is counted ${inDeck + held} times`);
    }
  }
}
