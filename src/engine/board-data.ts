import { readFileSync } from 'fs';
import type { Space, ColorGroup, OwnableSpace, RentTable } from './types';

const BOARD_FILE = new URL('./data/board.json', import.meta.url);

export const COLOR_GROUPS: readonly ColorGroup[] = [
  'brown', 'light_blue', 'pink', 'orange', 'red', 'yellow', 'green', 'dark_blue',
];

const SIMPLE_TYPES = ['chance', 'community_chest', 'go', 'jail', 'free_parking', 'go_to_jail'] as const;

type RawSpace = Record<string, unknown>;

function isRecord(value: unknown): value is RawSpace {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readNumber(raw: RawSpace, key: string, where: string): number {
  const value = raw[key];
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new Error(`${where}: "${key}" must be a non-negative integer`);
  }
  return value;
}

function readRentTable(raw: RawSpace, where: string): RentTable {
  const value: unknown = raw.rent;
  if (!Array.isArray(value) || value.length !== 6) {
    throw new Error(`${where}: "rent" must list six amounts`);
  }
  const amounts = value.map((amount: unknown) => {
    if (typeof amount !== 'number') throw new Error(`${where}: rent amounts must be numbers`);
    return amount;
  });
  return [amounts[0], amounts[1], amounts[2], amounts[3], amounts[4], amounts[5]];
}

function isColorGroup(value: unknown): value is ColorGroup {
  return COLOR_GROUPS.some(group => group === value);
}

function isSimpleType(value: unknown): value is (typeof SIMPLE_TYPES)[number] {
  return SIMPLE_TYPES.some(type => type === value);
}

function parseSpace(raw: unknown, index: number): Space {
  const where = `board.json[${index}]`;
  if (!isRecord(raw)) throw new Error(`${where}: expected an object`);

  const position = readNumber(raw, 'position', where);
  if (position !== index) throw new Error(`${where}: position ${position} is out of order`);
  const name = raw.name;
  if (typeof name !== 'string' || name.length === 0) throw new Error(`${where}: missing name`);

  const type = raw.type;
  switch (type) {
    case 'property': {
      const colorGroup = raw.colorGroup;
      if (!isColorGroup(colorGroup)) throw new Error(`${where}: unknown color group`);
      const price = readNumber(raw, 'price', where);
      return {
        position, name, type: 'property', colorGroup, price,
        mortgageValue: price / 2,
        houseCost: readNumber(raw, 'houseCost', where),
        rent: readRentTable(raw, where),
      };
    }
    case 'railroad': {
      const price = readNumber(raw, 'price', where);
      return { position, name, type: 'railroad', price, mortgageValue: price / 2 };
    }
    case 'utility': {
      const price = readNumber(raw, 'price', where);
      return { position, name, type: 'utility', price, mortgageValue: price / 2 };
    }
    case 'tax':
      return { position, name, type: 'tax', amount: readNumber(raw, 'amount', where) };
    default:
      if (!isSimpleType(type)) throw new Error(`${where}: unknown space type ${String(type)}`);
      return { position, name, type };
  }
}

function loadBoard(): Space[] {
  const raw: unknown = JSON.parse(readFileSync(BOARD_FILE, 'utf-8'));
  if (!Array.isArray(raw) || raw.length !== BOARD_SIZE) {
    throw new Error(`board.json must list exactly ${BOARD_SIZE} spaces`);
  }
  return raw.map(parseSpace);
}

export const BOARD_SIZE = 40;
export const GO_POSITION = 0;
export const JAIL_POSITION = 10;

export const BOARD_SPACES: readonly Space[] = loadBoard();

function groupMembers(group: ColorGroup): number[] {
  return BOARD_SPACES
    .filter(space => space.type === 'property' && space.colorGroup === group)
    .map(space => space.position);
}

export const COLOR_GROUP_MEMBERS: Record<ColorGroup, number[]> = {
  brown: groupMembers('brown'),
  light_blue: groupMembers('light_blue'),
  pink: groupMembers('pink'),
  orange: groupMembers('orange'),
  red: groupMembers('red'),
  yellow: groupMembers('yellow'),
  green: groupMembers('green'),
  dark_blue: groupMembers('dark_blue'),
};

export const RAILROAD_POSITIONS = BOARD_SPACES.filter(s => s.type === 'railroad').map(s => s.position);
export const UTILITY_POSITIONS = BOARD_SPACES.filter(s => s.type === 'utility').map(s => s.position);

export function getSpace(position: number): Space {
  const space = BOARD_SPACES[position];
  if (!space) throw new RangeError(`No board space at position ${position}`);
  return space;
}

export function isOwnableSpace(space: Space): space is OwnableSpace {
  return space.type === 'property' || space.type === 'railroad' || space.type === 'utility';
}

export function getOwnableSpace(position: number): OwnableSpace | null {
  const space = BOARD_SPACES[position];
  return space && isOwnableSpace(space) ? space : null;
}

// Accepts a board position or a space name (case-insensitive).
export function findSpace(ref: number | string): Space | null {
  if (typeof ref === 'number') {
    return Number.isInteger(ref) ? BOARD_SPACES[ref] ?? null : null;
  }
  const wanted = ref.trim().toLowerCase();
  return BOARD_SPACES.find(space => space.name.toLowerCase() === wanted) ?? null;
}
