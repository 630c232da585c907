import type { GameState, ColorGroup, TurnPhase, SpaceType, RentTable, PlayerState } from '../engine/types';
import { BOARD_SPACES, getOwnableSpace, getSpace } from '../engine/board-data';
import { HOTEL, netWorth, playerOwnsColorGroup } from '../engine/ledger';
import { calculateRent } from '../engine/rent-calculator';
import { describeTradeOffer } from '../engine/transactions';

export interface PlayerSnapshot {
  id: string;
  name: string;
  position: number;
  spaceName: string;
  balance: number;
  inJail: boolean;
  jailTurns: number;
  getOutOfJailCards: number;
  isBankrupt: boolean;
  properties: string[];
  netWorth: number;
}

export interface DebtSnapshot {
  debtor: string;
  creditor: string;
  amount: number;
  reason: string;
}

export interface GameSnapshot {
  sessionId: string;
  turnNumber: number;
  currentPlayer: string;
  actingPlayer: string;
  phase: TurnPhase;
  gameOver: boolean;
  winner: string | null;
  lastDiceRoll: [number, number] | null;
  bankHouses: number;
  bankHotels: number;
  pendingPurchase: { position: number; name: string; price: number } | null;
  pendingDebts: DebtSnapshot[];
  activeTrade: { from: string; to: string; description: string } | null;
  players: PlayerSnapshot[];
}

export interface PropertyDetail {
  position: number;
  name: string;
  type: 'property' | 'railroad' | 'utility';
  colorGroup: ColorGroup | null;
  price: number;
  houses: number;
  hasHotel: boolean;
  mortgaged: boolean;
  mortgageValue: number;
  currentRent: number;
  monopoly: boolean;
}

export interface BoardSpaceView {
  position: number;
  name: string;
  type: SpaceType;
  price?: number;
  mortgageValue?: number;
  colorGroup?: ColorGroup;
  houseCost?: number;
  rent?: RentTable;
  amount?: number;
}

function nameOf(state: GameState, id: string): string {
  if (id === 'bank') return 'bank';
  return state.players.find(p => p.id === id)?.name ?? id;
}

export function buildSnapshot(sessionId: string, state: GameState, actingPlayerId: string): GameSnapshot {
  const pending = state.pendingPurchase === null ? null : getOwnableSpace(state.pendingPurchase);
  const trade = state.activeTrade;

  return {
    sessionId,
    turnNumber: state.turnNumber,
    currentPlayer: state.players[state.currentPlayerIndex].name,
    actingPlayer: nameOf(state, actingPlayerId),
    phase: state.turnPhase,
    gameOver: state.winner !== null,
    winner: state.winner === null ? null : nameOf(state, state.winner),
    lastDiceRoll: state.lastDiceRoll,
    bankHouses: state.bankHouses,
    bankHotels: state.bankHotels,
    pendingPurchase: pending ? { position: pending.position, name: pending.name, price: pending.price } : null,
    pendingDebts: state.pendingDebts.map(debt => ({
      debtor: nameOf(state, debt.debtorId),
      creditor: nameOf(state, debt.creditor),
      amount: debt.amount,
      reason: debt.reason,
    })),
    activeTrade: trade
      ? {
        from: nameOf(state, trade.offer.fromPlayerId),
        to: nameOf(state, trade.offer.toPlayerId),
        description: describeTradeOffer(trade.offer),
      }
      : null,
    players: state.players.map(p => ({
      id: p.id,
      name: p.name,
      position: p.position,
      spaceName: getSpace(p.position).name,
      balance: p.balance,
      inJail: p.inJail,
      jailTurns: p.jailTurns,
      getOutOfJailCards: p.getOutOfJailCards.length,
      isBankrupt: p.isBankrupt,
      properties: Array.from(p.properties.keys()).sort((a, b) => a - b).map(pos => getSpace(pos).name),
      netWorth: netWorth(p),
    })),
  };
}

// Utility rent depends on the dice, so it is quoted against the last roll (0 before any roll).
export function describeProperties(state: GameState, player: PlayerState): PropertyDetail[] {
  const roll = state.lastDiceRoll ?? [0, 0];
  const details: PropertyDetail[] = [];

  for (const pos of Array.from(player.properties.keys()).sort((a, b) => a - b)) {
    const space = getOwnableSpace(pos);
    const propState = player.properties.get(pos);
    if (!space || !propState) continue;

    const isStreet = space.type === 'property';
    details.push({
      position: pos,
      name: space.name,
      type: space.type,
      colorGroup: isStreet ? space.colorGroup : null,
      price: space.price,
      houses: propState.houses === HOTEL ? 0 : propState.houses,
      hasHotel: propState.houses === HOTEL,
      mortgaged: propState.mortgaged,
      mortgageValue: space.mortgageValue,
      currentRent: calculateRent(state, pos, roll),
      monopoly: isStreet && playerOwnsColorGroup(player, space.colorGroup),
    });
  }
  return details;
}

export function boardCatalog(): BoardSpaceView[] {
  return BOARD_SPACES.map(space => {
    switch (space.type) {
      case 'property':
        return {
          position: space.position,
          name: space.name,
          type: space.type,
          price: space.price,
          mortgageValue: space.mortgageValue,
          colorGroup: space.colorGroup,
          houseCost: space.houseCost,
          rent: space.rent,
        };
      case 'railroad':
      case 'utility':
        return {
          position: space.position,
          name: space.name,
          type: space.type,
          price: space.price,
          mortgageValue: space.mortgageValue,
        };
      case 'tax':
        return { position: space.position, name: space.name, type: space.type, amount: space.amount };
      default:
        return { position: space.position, name: space.name, type: space.type };
    }
  });
}
