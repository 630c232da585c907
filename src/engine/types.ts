// ── Space Types ──

export type SpaceType =
  | 'property'
  | 'railroad'
  | 'utility'
  | 'chance'
  | 'community_chest'
  | 'tax'
  | 'go'
  | 'jail'
  | 'free_parking'
  | 'go_to_jail';

export type ColorGroup =
  | 'brown'
  | 'light_blue'
  | 'pink'
  | 'orange'
  | 'red'
  | 'yellow'
  | 'green'
  | 'dark_blue';

export type RentTable = [number, number, number, number, number, number]; // [base, 1h, 2h, 3h, 4h, hotel]

export interface PropertySpace {
  position: number;
  name: string;
  type: 'property';
  colorGroup: ColorGroup;
  price: number;
  mortgageValue: number;
  houseCost: number;
  rent: RentTable;
}

export interface RailroadSpace {
  position: number;
  name: string;
  type: 'railroad';
  price: number;
  mortgageValue: number;
}

export interface UtilitySpace {
  position: number;
  name: string;
  type: 'utility';
  price: number;
  mortgageValue: number;
}

export interface TaxSpace {
  position: number;
  name: string;
  type: 'tax';
  amount: number;
}

export interface SimpleSpace {
  position: number;
  name: string;
  type: 'chance' | 'community_chest' | 'go' | 'jail' | 'free_parking' | 'go_to_jail';
}

export type Space = PropertySpace | RailroadSpace | UtilitySpace | TaxSpace | SimpleSpace;

export type OwnableSpace = PropertySpace | RailroadSpace | UtilitySpace;

// ── Scenario Seeding ──

export interface ScenarioPlayerConfig {
  balance?: number;
  position?: number;
  properties?: {
    position: number;
    houses?: number;
    mortgaged?: boolean;
  }[];
  getOutOfJailCards?: DeckType[];
  inJail?: boolean;
  jailTurns?: number;
}

export interface ScenarioConfig {
  players: ScenarioPlayerConfig[];
}

// ── Card Effects ──

export type DeckType = 'chance' | 'community_chest';

export type CardEffect =
  | { type: 'move_to'; position: number; collectGo: boolean }
  | { type: 'move_back'; spaces: number }
  | { type: 'move_to_nearest'; spaceType: 'railroad' | 'utility'; collectGo: boolean }
  | { type: 'collect'; amount: number }
  | { type: 'pay'; amount: number }
  | { type: 'pay_per_house'; houseAmount: number; hotelAmount: number }
  | { type: 'collect_from_each_player'; amount: number }
  | { type: 'pay_each_player'; amount: number }
  | { type: 'get_out_of_jail_free' }
  | { type: 'go_to_jail' };

export interface Card {
  id: number;
  deck: DeckType;
  text: string;
  effect: CardEffect;
}

// ── Player State ──

export interface PropertyState {
  houses: number; // 0-4 = houses, 5 = hotel
  mortgaged: boolean;
}

export interface PlayerState {
  id: string;
  name: string;
  position: number;
  balance: number;
  properties: Map<number, PropertyState>; // position → state
  inJail: boolean;
  jailTurns: number;
  getOutOfJailCards: DeckType[]; // deck each held card came from
  isBankrupt: boolean;
  doublesCount: number;
}

// ── Turn Phases ──

export type TurnPhase =
  | 'awaiting_roll'
  | 'purchase_decision'
  | 'paying_debt'
  | 'trading'
  | 'game_over';

// ── Trade ──

export interface TradeOffer {
  fromPlayerId: string;
  toPlayerId: string;
  offeredProperties: number[];
  offeredMoney: number;
  offeredJailCards: number;
  requestedProperties: number[];
  requestedMoney: number;
  requestedJailCards: number;
}

export interface PendingTrade {
  offer: TradeOffer;
  resumePhase: 'awaiting_roll' | 'purchase_decision' | 'paying_debt';
}

// ── Debt ──

export type Creditor = string | 'bank';

export interface DebtShare {
  playerId: string;
  amount: number;
}

export interface Payment {
  creditor: Creditor;
  amount: number;
  reason: string;
  // Set when one payment is split between several players (e.g. "pay each player").
  shares?: DebtShare[];
}

export interface PendingDebt extends Payment {
  debtorId: string;
}

// ── Auction ──

export interface AuctionBid {
  playerId: string;
  amount: number;
}

// ── Game State ──

export interface GameState {
  players: PlayerState[];
  currentPlayerIndex: number;
  turnPhase: TurnPhase;
  turnNumber: number;
  lastDiceRoll: [number, number] | null;
  chanceDeck: number[];
  communityChestDeck: number[];
  bankHouses: number;
  bankHotels: number;
  pendingPurchase: number | null;
  pendingDebts: PendingDebt[];
  activeTrade: PendingTrade | null;
  gameLog: GameEvent[];
  winner: string | null;
}

// ── Game Actions ──

export type GameAction =
  | { action: 'roll_dice' }
  | { action: 'pay_jail_fine' }
  | { action: 'use_get_out_of_jail_card' }
  | { action: 'buy_property'; propertyPosition: number }
  | { action: 'decline_property'; propertyPosition: number; bids: AuctionBid[] }
  | { action: 'build'; propertyPosition: number }
  | { action: 'sell_building'; propertyPosition: number }
  | { action: 'mortgage_property'; propertyPosition: number }
  | { action: 'unmortgage_property'; propertyPosition: number }
  | { action: 'trade_offer'; offer: TradeOffer }
  | { action: 'accept_trade' }
  | { action: 'reject_trade' }
  | { action: 'pay_debt' }
  | { action: 'declare_bankruptcy' };

export type ActionName = GameAction['action'];

export type ErrorKind =
  | 'session_not_found'
  | 'player_not_found'
  | 'not_current_player'
  | 'invalid_phase'
  | 'insufficient_funds'
  | 'property_not_ownable'
  | 'property_already_owned'
  | 'not_property_owner'
  | 'building_rule_violation'
  | 'invalid_player_count'
  | 'invalid_trade'
  | 'invalid_bid'
  | 'game_over'
  | 'session_busy';

export interface ActionResult {
  success: boolean;
  newState: GameState;
  events: GameEvent[];
  error?: string;
  errorKind?: ErrorKind;
}

export interface AvailableAction {
  action: ActionName;
  description: string;
  positions?: number[];
}

// ── Game Events ──

export type GameEvent =
  | { type: 'turn_start'; playerId: string; turnNumber: number }
  | { type: 'roll_dice'; playerId: string; dice: [number, number]; doubles: boolean }
  | { type: 'extra_roll'; playerId: string }
  | { type: 'move'; playerId: string; from: number; to: number; passedGo: boolean }
  | { type: 'pass_go'; playerId: string; collected: number }
  | { type: 'land'; playerId: string; spaceName: string; position: number }
  | { type: 'purchase_offered'; playerId: string; property: string; position: number; price: number }
  | { type: 'buy_property'; playerId: string; property: string; price: number; position: number }
  | { type: 'auction_start'; property: string; position: number }
  | { type: 'auction_bid'; playerId: string; amount: number }
  | { type: 'auction_bid_rejected'; playerId: string; amount: number; reason: string }
  | { type: 'auction_won'; playerId: string; property: string; price: number }
  | { type: 'auction_no_bids'; property: string }
  | { type: 'build_house'; playerId: string; property: string; position: number; houses: number }
  | { type: 'build_hotel'; playerId: string; property: string; position: number }
  | { type: 'sell_building'; playerId: string; property: string; position: number; houses: number; refund: number }
  | { type: 'draw_card'; playerId: string; deck: DeckType; cardText: string }
  | { type: 'receive_jail_card'; playerId: string; deck: DeckType }
  | { type: 'payment'; playerId: string; creditor: Creditor; amount: number; reason: string }
  | { type: 'collect'; playerId: string; amount: number; reason: string }
  | { type: 'debt_incurred'; playerId: string; creditor: Creditor; amount: number; reason: string }
  | { type: 'go_to_jail'; playerId: string; reason: string }
  | { type: 'jail_roll_failed'; playerId: string; attempt: number }
  | { type: 'get_out_of_jail'; playerId: string; method: string }
  | { type: 'mortgage'; playerId: string; property: string; position: number; received: number }
  | { type: 'unmortgage'; playerId: string; property: string; position: number; cost: number }
  | { type: 'trade_proposed'; fromPlayer: string; toPlayer: string; description: string }
  | { type: 'trade_completed'; fromPlayer: string; toPlayer: string; description: string }
  | { type: 'trade_rejected'; fromPlayer: string; toPlayer: string }
  | { type: 'bankruptcy'; playerId: string; creditor: Creditor }
  | { type: 'game_over'; winnerId: string; reason: string };
