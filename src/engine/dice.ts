export type Rng = () => number;

export interface DiceRoll {
  dice: [number, number];
  sum: number;
  isDoubles: boolean;
}

export function createRng(seed?: number): Rng {
  if (seed === undefined) {
    return Math.random;
  }
  // Simple seeded PRNG (mulberry32)
  let s = seed | 0;
  return () => {
    s = (s + 0x6d2b79f5) | 0;
    let t = Math.imul(s ^ (s >>> 15), 1 | s);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function rollDie(rng: Rng): number {
  return Math.floor(rng() * 6) + 1;
}

export function rollDice(rng: Rng): DiceRoll {
  const dice: [number, number] = [rollDie(rng), rollDie(rng)];
  return toDiceRoll(dice);
}

export function toDiceRoll(dice: [number, number]): DiceRoll {
  return {
    dice,
    sum: dice[0] + dice[1],
    isDoubles: dice[0] === dice[1],
  };
}
