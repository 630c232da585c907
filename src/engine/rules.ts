export interface GameRules {
  startingBalance: number;
  passGoAmount: number;
  jailFine: number;
  maxJailTurns: number;
  maxConsecutiveDoubles: number;
  auctionMinimumBid: number;
  unmortgageInterestPercent: number;
  buildingRefundPercent: number;
  hotelCostInHouses: number;
  totalHouses: number;
  totalHotels: number;
}

export const DEFAULT_RULES: GameRules = {
  startingBalance: 1500,
  passGoAmount: 200,
  jailFine: 50,
  maxJailTurns: 3,
  maxConsecutiveDoubles: 3,
  auctionMinimumBid: 10,
  unmortgageInterestPercent: 10,
  buildingRefundPercent: 100,
  hotelCostInHouses: 4,
  totalHouses: 32,
  totalHotels: 12,
};

export function resolveRules(overrides: Partial<GameRules> = {}): GameRules {
  const rules = { ...DEFAULT_RULES, ...overrides };
  for (const [key, value] of Object.entries(rules)) {
    if (!Number.isInteger(value) || value < 0) {
      throw new RangeError(`Rule ${key} must be a non-negative integer, got ${value}`);
    }
  }
  if (rules.maxJailTurns < 1 || rules.maxConsecutiveDoubles < 1) {
    throw new RangeError('maxJailTurns and maxConsecutiveDoubles must be at least 1');
  }
  return rules;
}
