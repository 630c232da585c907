import type {
  GameState, GameAction, GameEvent, ErrorKind, AvailableAction, TurnPhase, ScenarioConfig, PlayerState,
} from '../engine/types';
import { GameEngine } from '../engine/game-engine';
import { createInitialState, applyScenario } from '../engine/game-state';
import { findSpace } from '../engine/board-data';
import { cloneState, findPlayerByName, getPlayerById, HOTEL } from '../engine/ledger';
import { createRng, type Rng } from '../engine/dice';
import { type GameRules, resolveRules } from '../engine/rules';
import { assertInvariants } from '../engine/invariants';
import type { GameLogger } from '../logger';
import { buildSnapshot, describeProperties, type GameSnapshot, type PropertyDetail } from './views';

export type SessionResult<T> =
  | { success: true; data: T; events: GameEvent[] }
  | { success: false; errorKind: ErrorKind; error: string };

/** A board position or a space name (case-insensitive). */
export type PropertyRef = number | string;

export interface SessionOptions {
  seed?: number;
  rng?: Rng;
  // Dice source when it should differ from the shuffling source (e.g. loaded dice).
  diceRng?: Rng;
  rules?: Partial<GameRules>;
  scenario?: ScenarioConfig;
  logger?: GameLogger;
  // Called with each successful action's events while the action still holds the session.
  onEvents?: (events: GameEvent[], session: GameSession) => void;
}

export interface TurnOutcome {
  dice: [number, number] | null;
  doubles: boolean;
  landedOn: string | null;
  cashDelta: number;
  positionDelta: number;
  phase: TurnPhase;
}

export interface PurchaseOutcome {
  property: string;
  owner: string | null;
  price: number | null;
  phase: TurnPhase;
}

export interface PropertyOutcome {
  property: string;
  houses: number;
  hasHotel: boolean;
  mortgaged: boolean;
  balance: number;
  phase: TurnPhase;
}

export interface TradeProposal {
  to: string;
  offeredProperties?: PropertyRef[];
  offeredMoney?: number;
  offeredJailCards?: number;
  requestedProperties?: PropertyRef[];
  requestedMoney?: number;
  requestedJailCards?: number;
}

export interface BidRequest {
  player: string;
  amount: number;
}

export interface PhaseOutcome {
  phase: TurnPhase;
  winner: string | null;
}

type RollEvent = Extract<GameEvent, { type: 'roll_dice' }>;
type LandEvent = Extract<GameEvent, { type: 'land' }>;

function fail<T>(errorKind: ErrorKind, error: string): SessionResult<T> {
  return { success: false, errorKind, error };
}

/**
 * One running game. Callers name the acting player on every call; each call
 * either commits one engine action or leaves the game exactly as it was.
 */
export class GameSession {
  readonly id: string;
  private state: GameState;
  private engine: GameEngine;
  private logger: GameLogger | null;
  private onEvents: SessionOptions['onEvents'];
  private busy = false;

  constructor(id: string, playerNames: string[], options: SessionOptions = {}) {
    const rules = resolveRules(options.rules);
    const rng = options.rng ?? createRng(options.seed);

    this.id = id;
    this.engine = new GameEngine(options.diceRng ?? rng, rules);
    this.logger = options.logger ?? null;
    this.onEvents = options.onEvents;

    const state = createInitialState(
      playerNames.map((name, i) => ({ id: `player_${i}`, name })),
      rng,
      rules,
    );
    this.state = options.scenario ? applyScenario(state, options.scenario) : state;
    assertInvariants(this.state, rules);
  }

  // ── Queries ──

  getState(): GameSnapshot {
    return buildSnapshot(this.id, this.state, this.engine.actingPlayer(this.state).id);
  }

  /** A detached copy of the full engine state. */
  rawState(): GameState {
    return cloneState(this.state);
  }

  get playerNames(): string[] {
    return this.state.players.map(p => p.name);
  }

  isOver(): boolean {
    return this.state.winner !== null;
  }

  getPlayerProperties(playerName: string): SessionResult<PropertyDetail[]> {
    const player = findPlayerByName(this.state, playerName);
    if (!player) return fail('player_not_found', `No player named ${playerName}`);
    return { success: true, data: describeProperties(this.state, player), events: [] };
  }

  availableActions(playerName: string): SessionResult<AvailableAction[]> {
    const player = findPlayerByName(this.state, playerName);
    if (!player) return fail('player_not_found', `No player named ${playerName}`);
    return { success: true, data: this.engine.getAvailableActions(this.state, player.id), events: [] };
  }

  // ── Turn actions ──

  roll(playerName: string): SessionResult<TurnOutcome> {
    return this.turnAction(playerName, { action: 'roll_dice' });
  }

  payJailFine(playerName: string): SessionResult<TurnOutcome> {
    return this.turnAction(playerName, { action: 'pay_jail_fine' });
  }

  useJailCard(playerName: string): SessionResult<TurnOutcome> {
    return this.turnAction(playerName, { action: 'use_get_out_of_jail_card' });
  }

  buy(playerName: string, property: PropertyRef): SessionResult<PurchaseOutcome> {
    return this.withPosition(property, position =>
      this.perform(playerName, { action: 'buy_property', propertyPosition: position },
        (_before, after, events) => this.purchaseOutcome(position, after, events)));
  }

  decline(playerName: string, property: PropertyRef, bids: BidRequest[] = []): SessionResult<PurchaseOutcome> {
    const resolved: { playerId: string; amount: number }[] = [];
    for (const bid of bids) {
      const bidder = findPlayerByName(this.state, bid.player);
      if (!bidder) return fail('player_not_found', `No player named ${bid.player}`);
      resolved.push({ playerId: bidder.id, amount: bid.amount });
    }
    return this.withPosition(property, position =>
      this.perform(playerName, { action: 'decline_property', propertyPosition: position, bids: resolved },
        (_before, after, events) => this.purchaseOutcome(position, after, events)));
  }

  build(playerName: string, property: PropertyRef): SessionResult<PropertyOutcome> {
    return this.propertyAction(playerName, property, position => ({ action: 'build', propertyPosition: position }));
  }

  sellBuilding(playerName: string, property: PropertyRef): SessionResult<PropertyOutcome> {
    return this.propertyAction(playerName, property, position => ({ action: 'sell_building', propertyPosition: position }));
  }

  mortgage(playerName: string, property: PropertyRef): SessionResult<PropertyOutcome> {
    return this.propertyAction(playerName, property, position => ({ action: 'mortgage_property', propertyPosition: position }));
  }

  unmortgage(playerName: string, property: PropertyRef): SessionResult<PropertyOutcome> {
    return this.propertyAction(playerName, property, position => ({ action: 'unmortgage_property', propertyPosition: position }));
  }

  // ── Trades ──

  proposeTrade(playerName: string, proposal: TradeProposal): SessionResult<PhaseOutcome> {
    const from = findPlayerByName(this.state, playerName);
    if (!from) return fail('player_not_found', `No player named ${playerName}`);
    const to = findPlayerByName(this.state, proposal.to);
    if (!to) return fail('player_not_found', `No player named ${proposal.to}`);

    const offered = this.resolvePositions(proposal.offeredProperties ?? []);
    if (!offered.success) return offered;
    const requested = this.resolvePositions(proposal.requestedProperties ?? []);
    if (!requested.success) return requested;

    return this.perform(playerName, {
      action: 'trade_offer',
      offer: {
        fromPlayerId: from.id,
        toPlayerId: to.id,
        offeredProperties: offered.data,
        offeredMoney: proposal.offeredMoney ?? 0,
        offeredJailCards: proposal.offeredJailCards ?? 0,
        requestedProperties: requested.data,
        requestedMoney: proposal.requestedMoney ?? 0,
        requestedJailCards: proposal.requestedJailCards ?? 0,
      },
    }, (_before, after) => this.phaseOutcome(after));
  }

  acceptTrade(playerName: string): SessionResult<PhaseOutcome> {
    return this.perform(playerName, { action: 'accept_trade' }, (_before, after) => this.phaseOutcome(after));
  }

  rejectTrade(playerName: string): SessionResult<PhaseOutcome> {
    return this.perform(playerName, { action: 'reject_trade' }, (_before, after) => this.phaseOutcome(after));
  }

  // ── Debts ──

  payDebt(playerName: string): SessionResult<PhaseOutcome> {
    return this.perform(playerName, { action: 'pay_debt' }, (_before, after) => this.phaseOutcome(after));
  }

  declareBankruptcy(playerName: string): SessionResult<PhaseOutcome> {
    return this.perform(playerName, { action: 'declare_bankruptcy' }, (_before, after) => this.phaseOutcome(after));
  }

  // ── Internals ──

  private perform<T>(
    playerName: string,
    action: GameAction,
    toData: (before: GameState, after: GameState, events: GameEvent[]) => T,
  ): SessionResult<T> {
    if (this.busy) return fail('session_busy', `Session ${this.id} is already applying an action`);
    const player = findPlayerByName(this.state, playerName);
    if (!player) return fail('player_not_found', `No player named ${playerName}`);

    this.busy = true;
    try {
      const result = this.engine.applyAction(this.state, player.id, action);
      if (!result.success) {
        return fail(result.errorKind ?? 'invalid_phase', result.error ?? `${action.action} failed`);
      }

      const before = this.state;
      this.state = result.newState;
      this.logger?.logAction(this.id, before.turnNumber, playerName, action.action, result.events);
      this.onEvents?.(result.events, this);
      return { success: true, data: toData(before, result.newState, result.events), events: result.events };
    } finally {
      this.busy = false;
    }
  }

  private turnAction(playerName: string, action: GameAction): SessionResult<TurnOutcome> {
    return this.perform(playerName, action, (before, after, events) => {
      const was = findPlayerByName(before, playerName);
      const now = findPlayerByName(after, playerName);
      const rolled = events.find((e): e is RollEvent => e.type === 'roll_dice');
      const landings = events.filter((e): e is LandEvent => e.type === 'land');

      return {
        dice: rolled ? rolled.dice : null,
        doubles: rolled ? rolled.doubles : false,
        landedOn: landings.length > 0 ? landings[landings.length - 1].spaceName : null,
        cashDelta: was && now ? now.balance - was.balance : 0,
        positionDelta: was && now ? now.position - was.position : 0,
        phase: after.turnPhase,
      };
    });
  }

  private propertyAction(
    playerName: string,
    property: PropertyRef,
    toAction: (position: number) => GameAction,
  ): SessionResult<PropertyOutcome> {
    return this.withPosition(property, position =>
      this.perform(playerName, toAction(position), (_before, after) => {
        const owner = findPlayerByName(after, playerName);
        const propState = owner?.properties.get(position);
        return {
          property: this.spaceName(position),
          houses: propState && propState.houses !== HOTEL ? propState.houses : 0,
          hasHotel: propState?.houses === HOTEL,
          mortgaged: propState?.mortgaged ?? false,
          balance: owner?.balance ?? 0,
          phase: after.turnPhase,
        };
      }));
  }

  private purchaseOutcome(position: number, after: GameState, events: GameEvent[]): PurchaseOutcome {
    let owner: PlayerState | null = null;
    let price: number | null = null;
    for (const event of events) {
      if (event.type === 'buy_property' || event.type === 'auction_won') {
        owner = getPlayerById(after, event.playerId);
        price = event.price;
      }
    }
    return { property: this.spaceName(position), owner: owner?.name ?? null, price, phase: after.turnPhase };
  }

  private phaseOutcome(after: GameState): PhaseOutcome {
    const winner = after.winner === null ? null : getPlayerById(after, after.winner).name;
    return { phase: after.turnPhase, winner };
  }

  private spaceName(position: number): string {
    return findSpace(position)?.name ?? `#${position}`;
  }

  private withPosition<T>(ref: PropertyRef, run: (position: number) => SessionResult<T>): SessionResult<T> {
    const space = findSpace(ref);
    if (!space) return fail('property_not_ownable', `No board space matches ${String(ref)}`);
    return run(space.position);
  }

  private resolvePositions(refs: PropertyRef[]): SessionResult<number[]> {
    const positions: number[] = [];
    for (const ref of refs) {
      const space = findSpace(ref);
      if (!space) return fail('property_not_ownable', `No board space matches ${String(ref)}`);
      positions.push(space.position);
    }
    return { success: true, data: positions, events: [] };
  }
}
