import type {
  GameState, GameEvent, PlayerState, PropertySpace, OwnableSpace, TradeOffer, AuctionBid, PropertyState,
} from './types';
import { getOwnableSpace, getSpace } from './board-data';
import {
  HOTEL, HOUSES_PER_HOTEL, getPropertyOwner, playerOwnsColorGroup, colorGroupHasBuildings, colorGroupHasMortgage,
  groupBuildingCounts, unmortgageCost, buildingRefund, hotelCost, hotelRefund, debit, credit, transferMoney,
} from './ledger';
import type { GameRules } from './rules';
import { ActionError } from './errors';

function requireOwnable(position: number): OwnableSpace {
  const space = getOwnableSpace(position);
  if (!space) {
    throw new ActionError('property_not_ownable', `Position ${position} is not a purchasable property`);
  }
  return space;
}

function requireOwned(player: PlayerState, space: OwnableSpace): PropertyState {
  const propState = player.properties.get(space.position);
  if (!propState) {
    throw new ActionError('not_property_owner', `${player.name} does not own ${space.name}`);
  }
  return propState;
}

function requireStreet(position: number): PropertySpace {
  const space = requireOwnable(position);
  if (space.type !== 'property') {
    throw new ActionError('building_rule_violation', `${space.name} cannot hold buildings`);
  }
  return space;
}

function requireFunds(player: PlayerState, amount: number, what: string): void {
  if (player.balance < amount) {
    throw new ActionError(
      'insufficient_funds',
      `${what} costs $${amount} but ${player.name} has $${player.balance}`,
    );
  }
}

// ── Purchase & auction ──

function requirePendingPurchase(state: GameState, position: number): OwnableSpace {
  const space = requireOwnable(position);
  if (state.pendingPurchase !== position) {
    throw new ActionError('invalid_phase', `${space.name} is not up for purchase`);
  }
  if (getPropertyOwner(state, position)) {
    throw new ActionError('property_already_owned', `${space.name} is already owned`);
  }
  return space;
}

export function buyProperty(
  state: GameState,
  player: PlayerState,
  position: number,
  events: GameEvent[],
): void {
  const space = requirePendingPurchase(state, position);
  requireFunds(player, space.price, space.name);

  debit(player, space.price);
  player.properties.set(position, { houses: 0, mortgaged: false });
  state.pendingPurchase = null;
  events.push({
    type: 'buy_property',
    playerId: player.id,
    property: space.name,
    price: space.price,
    position,
  });
}

/**
 * Sealed-bid auction over the bids handed in with the decline. Invalid bids
 * are reported and skipped; the highest remaining bid pays the bank. Equal
 * bids go to whoever comes first in turn order starting from the decliner.
 */
export function resolveAuction(
  state: GameState,
  decliner: PlayerState,
  position: number,
  bids: AuctionBid[],
  events: GameEvent[],
  rules: GameRules,
): void {
  const space = requirePendingPurchase(state, position);
  const seats = state.players.length;
  const declinerSeat = state.players.indexOf(decliner);

  for (const bid of bids) {
    if (!state.players.some(p => p.id === bid.playerId)) {
      throw new ActionError('player_not_found', `Unknown bidder ${bid.playerId}`);
    }
    if (!Number.isInteger(bid.amount)) {
      throw new ActionError('invalid_bid', `Bid of ${bid.amount} is not a whole amount`);
    }
  }

  state.pendingPurchase = null;
  events.push({ type: 'auction_start', property: space.name, position });

  let best: { bidder: PlayerState; amount: number; seat: number } | null = null;
  for (const bid of bids) {
    const bidder = state.players.find(p => p.id === bid.playerId);
    if (!bidder) continue;

    let rejection: string | null = null;
    if (bidder.isBankrupt) rejection = 'bidder is bankrupt';
    else if (bid.amount < rules.auctionMinimumBid) rejection = `below the $${rules.auctionMinimumBid} minimum`;
    else if (bid.amount > bidder.balance) rejection = `bidder only has $${bidder.balance}`;

    if (rejection) {
      events.push({ type: 'auction_bid_rejected', playerId: bidder.id, amount: bid.amount, reason: rejection });
      continue;
    }

    events.push({ type: 'auction_bid', playerId: bidder.id, amount: bid.amount });
    const seat = (state.players.indexOf(bidder) - declinerSeat + seats) % seats;
    if (!best || bid.amount > best.amount || (bid.amount === best.amount && seat < best.seat)) {
      best = { bidder, amount: bid.amount, seat };
    }
  }

  if (!best) {
    events.push({ type: 'auction_no_bids', property: space.name });
    return;
  }

  debit(best.bidder, best.amount);
  best.bidder.properties.set(position, { houses: 0, mortgaged: false });
  events.push({ type: 'auction_won', playerId: best.bidder.id, property: space.name, price: best.amount });
}

// ── Buildings ──

export function validateBuild(
  state: GameState,
  player: PlayerState,
  position: number,
  rules: GameRules,
): { space: PropertySpace; cost: number } {
  const space = requireStreet(position);
  const propState = requireOwned(player, space);

  if (!playerOwnsColorGroup(player, space.colorGroup)) {
    throw new ActionError('building_rule_violation', `${player.name} must own every ${space.colorGroup} property to build`);
  }
  if (colorGroupHasMortgage(player, space.colorGroup)) {
    throw new ActionError('building_rule_violation', `Cannot build while a ${space.colorGroup} property is mortgaged`);
  }
  if (propState.houses >= HOTEL) {
    throw new ActionError('building_rule_violation', `${space.name} already has a hotel`);
  }
  if (propState.houses > Math.min(...groupBuildingCounts(player, space.colorGroup))) {
    throw new ActionError('building_rule_violation', 'Must build evenly. Build on properties with fewer houses first.');
  }

  const buildingHotel = propState.houses === HOUSES_PER_HOTEL;
  if (buildingHotel ? state.bankHotels <= 0 : state.bankHouses <= 0) {
    throw new ActionError('building_rule_violation', `No ${buildingHotel ? 'hotels' : 'houses'} left in the bank`);
  }

  const cost = buildingHotel ? hotelCost(space.houseCost, rules) : space.houseCost;
  requireFunds(player, cost, buildingHotel ? `A hotel on ${space.name}` : `A house on ${space.name}`);
  return { space, cost };
}

export function buildOnProperty(
  state: GameState,
  player: PlayerState,
  position: number,
  events: GameEvent[],
  rules: GameRules,
): void {
  const { space, cost } = validateBuild(state, player, position, rules);
  const propState = requireOwned(player, space);

  debit(player, cost);
  if (propState.houses === HOUSES_PER_HOTEL) {
    propState.houses = HOTEL;
    state.bankHotels--;
    state.bankHouses += HOUSES_PER_HOTEL;
    events.push({ type: 'build_hotel', playerId: player.id, property: space.name, position });
  } else {
    propState.houses++;
    state.bankHouses--;
    events.push({ type: 'build_house', playerId: player.id, property: space.name, position, houses: propState.houses });
  }
}

export function validateSellBuilding(
  state: GameState,
  player: PlayerState,
  position: number,
  rules: GameRules,
): { space: PropertySpace; refund: number } {
  const space = requireStreet(position);
  const propState = requireOwned(player, space);

  if (propState.houses === 0) {
    throw new ActionError('building_rule_violation', `${space.name} has no buildings to sell`);
  }
  if (propState.houses < Math.max(...groupBuildingCounts(player, space.colorGroup))) {
    throw new ActionError('building_rule_violation', 'Must sell evenly. Sell from properties with more houses first.');
  }
  if (propState.houses === HOTEL && state.bankHouses < HOUSES_PER_HOTEL) {
    throw new ActionError('building_rule_violation', `The bank needs ${HOUSES_PER_HOTEL} houses to break up a hotel`);
  }
  const refund = propState.houses === HOTEL
    ? hotelRefund(space.houseCost, rules)
    : buildingRefund(space.houseCost, rules);
  return { space, refund };
}

export function sellBuilding(
  state: GameState,
  player: PlayerState,
  position: number,
  events: GameEvent[],
  rules: GameRules,
): void {
  const { space, refund } = validateSellBuilding(state, player, position, rules);
  const propState = requireOwned(player, space);

  if (propState.houses === HOTEL) {
    propState.houses = HOUSES_PER_HOTEL;
    state.bankHotels++;
    state.bankHouses -= HOUSES_PER_HOTEL;
  } else {
    propState.houses--;
    state.bankHouses++;
  }
  credit(player, refund);
  events.push({
    type: 'sell_building',
    playerId: player.id,
    property: space.name,
    position,
    houses: propState.houses,
    refund,
  });
}

// ── Mortgages ──

export function validateMortgage(player: PlayerState, position: number): OwnableSpace {
  const space = requireOwnable(position);
  const propState = requireOwned(player, space);
  if (propState.mortgaged) {
    throw new ActionError('building_rule_violation', `${space.name} is already mortgaged`);
  }
  if (space.type === 'property' && colorGroupHasBuildings(player, space.colorGroup)) {
    throw new ActionError('building_rule_violation', `Sell the ${space.colorGroup} buildings before mortgaging ${space.name}`);
  }
  return space;
}

export function mortgageProperty(
  player: PlayerState,
  position: number,
  events: GameEvent[],
): void {
  const space = validateMortgage(player, position);
  requireOwned(player, space).mortgaged = true;
  credit(player, space.mortgageValue);
  events.push({
    type: 'mortgage',
    playerId: player.id,
    property: space.name,
    position,
    received: space.mortgageValue,
  });
}

export function validateUnmortgage(player: PlayerState, position: number, rules: GameRules): { space: OwnableSpace; cost: number } {
  const space = requireOwnable(position);
  const propState = requireOwned(player, space);
  if (!propState.mortgaged) {
    throw new ActionError('building_rule_violation', `${space.name} is not mortgaged`);
  }
  const cost = unmortgageCost(space, rules);
  requireFunds(player, cost, `Lifting the mortgage on ${space.name}`);
  return { space, cost };
}

export function unmortgageProperty(
  player: PlayerState,
  position: number,
  events: GameEvent[],
  rules: GameRules,
): void {
  const { space, cost } = validateUnmortgage(player, position, rules);
  debit(player, cost);
  requireOwned(player, space).mortgaged = false;
  events.push({ type: 'unmortgage', playerId: player.id, property: space.name, position, cost });
}

// ── Trades ──

function validateTradeSide(
  giver: PlayerState,
  positions: number[],
  money: number,
  jailCards: number,
): void {
  if (new Set(positions).size !== positions.length) {
    throw new ActionError('invalid_trade', 'A property is listed twice');
  }
  for (const pos of positions) {
    const space = requireOwnable(pos);
    if (!giver.properties.has(pos)) {
      throw new ActionError('not_property_owner', `${giver.name} does not own ${space.name}`);
    }
    if (space.type === 'property' && colorGroupHasBuildings(giver, space.colorGroup)) {
      throw new ActionError('invalid_trade', `Sell the ${space.colorGroup} buildings before trading ${space.name}`);
    }
  }
  if (!Number.isInteger(money) || money < 0) {
    throw new ActionError('invalid_trade', 'Trade money must be a non-negative whole amount');
  }
  if (money > giver.balance) {
    throw new ActionError('insufficient_funds', `${giver.name} cannot put $${money} into the trade`);
  }
  if (!Number.isInteger(jailCards) || jailCards < 0 || jailCards > giver.getOutOfJailCards.length) {
    throw new ActionError('invalid_trade', `${giver.name} does not hold ${jailCards} Get Out of Jail Free cards`);
  }
}

export function proposeTrade(
  state: GameState,
  proposer: PlayerState,
  offer: TradeOffer,
  events: GameEvent[],
): void {
  if (state.turnPhase === 'trading' || state.turnPhase === 'game_over') {
    throw new ActionError('invalid_phase', 'A trade cannot be proposed now');
  }
  if (offer.fromPlayerId !== proposer.id) {
    throw new ActionError('invalid_trade', 'Trades must be proposed by the acting player');
  }
  const target = state.players.find(p => p.id === offer.toPlayerId);
  if (!target) throw new ActionError('player_not_found', `Unknown trade partner ${offer.toPlayerId}`);
  if (target.isBankrupt || target.id === proposer.id) {
    throw new ActionError('invalid_trade', `Cannot trade with ${target.name}`);
  }

  validateTradeSide(proposer, offer.offeredProperties, offer.offeredMoney, offer.offeredJailCards);
  validateTradeSide(target, offer.requestedProperties, offer.requestedMoney, offer.requestedJailCards);

  const empty = offer.offeredProperties.length + offer.requestedProperties.length
    + offer.offeredMoney + offer.requestedMoney + offer.offeredJailCards + offer.requestedJailCards === 0;
  if (empty) throw new ActionError('invalid_trade', 'The trade exchanges nothing');

  state.activeTrade = {
    offer: {
      ...offer,
      offeredProperties: [...offer.offeredProperties],
      requestedProperties: [...offer.requestedProperties],
    },
    resumePhase: state.turnPhase,
  };
  state.turnPhase = 'trading';
  events.push({
    type: 'trade_proposed',
    fromPlayer: proposer.name,
    toPlayer: target.name,
    description: describeTradeOffer(offer),
  });
}

function handOver(from: PlayerState, to: PlayerState, positions: number[], money: number, jailCards: number): void {
  for (const pos of positions) {
    const propState = from.properties.get(pos);
    if (!propState) throw new ActionError('not_property_owner', `${from.name} no longer owns ${getSpace(pos).name}`);
    from.properties.delete(pos);
    to.properties.set(pos, { ...propState });
  }
  if (money > 0) transferMoney(from, to, money);
  to.getOutOfJailCards.push(...from.getOutOfJailCards.splice(0, jailCards));
}

export function acceptTrade(state: GameState, accepter: PlayerState, events: GameEvent[]): void {
  const trade = state.activeTrade;
  if (!trade) throw new ActionError('invalid_phase', 'No trade is waiting for an answer');
  const proposer = state.players.find(p => p.id === trade.offer.fromPlayerId);
  if (!proposer) throw new ActionError('player_not_found', `Unknown trade partner ${trade.offer.fromPlayerId}`);

  const { offer } = trade;
  handOver(proposer, accepter, offer.offeredProperties, offer.offeredMoney, offer.offeredJailCards);
  handOver(accepter, proposer, offer.requestedProperties, offer.requestedMoney, offer.requestedJailCards);

  state.activeTrade = null;
  state.turnPhase = trade.resumePhase;
  events.push({
    type: 'trade_completed',
    fromPlayer: proposer.name,
    toPlayer: accepter.name,
    description: describeTradeOffer(offer),
  });
}

export function rejectTrade(state: GameState, rejecter: PlayerState, events: GameEvent[]): void {
  const trade = state.activeTrade;
  if (!trade) throw new ActionError('invalid_phase', 'No trade is waiting for an answer');
  const proposer = state.players.find(p => p.id === trade.offer.fromPlayerId);

  state.activeTrade = null;
  state.turnPhase = trade.resumePhase;
  events.push({
    type: 'trade_rejected',
    fromPlayer: proposer?.name ?? trade.offer.fromPlayerId,
    toPlayer: rejecter.name,
  });
}

function describeSide(positions: number[], money: number, jailCards: number): string {
  const parts: string[] = [];
  if (positions.length > 0) {
    parts.push(positions.map(p => getSpace(p).name).join(', '));
  }
  if (money > 0) parts.push(`$${money}`);
  if (jailCards > 0) {
    parts.push(`${jailCards} Get Out of Jail Free card${jailCards === 1 ? '' : 's'}`);
  }
  return parts.join(' and ') || 'nothing';
}

export function describeTradeOffer(offer: TradeOffer): string {
  const offered = describeSide(offer.offeredProperties, offer.offeredMoney, offer.offeredJailCards);
  const requested = describeSide(offer.requestedProperties, offer.requestedMoney, offer.requestedJailCards);
  return `Offered ${offered} for ${requested}`;
}
