import type { Card, DeckType } from './types';
import type { Rng } from './dice';
import { InvariantViolation } from './errors';

export const CHANCE_CARDS: readonly Card[] = [
  { id: 0, deck: 'chance', text: 'Advance to Boardwalk.',
    effect: { type: 'move_to', position: 39, collectGo: false } },
  { id: 1, deck: 'chance', text: 'Advance to Go. Collect $200.',
    effect: { type: 'move_to', position: 0, collectGo: true } },
  { id: 2, deck: 'chance', text: 'Advance to Illinois Avenue. If you pass Go, collect $200.',
    effect: { type: 'move_to', position: 24, collectGo: true } },
  { id: 3, deck: 'chance', text: 'Advance to St. Charles Place. If you pass Go, collect $200.',
    effect: { type: 'move_to', position: 11, collectGo: true } },
  { id: 4, deck: 'chance', text: 'Advance to the nearest Railroad. Pay owner twice the rental.',
    effect: { type: 'move_to_nearest', spaceType: 'railroad', collectGo: true } },
  { id: 5, deck: 'chance', text: 'Advance to the nearest Railroad. Pay owner twice the rental.',
    effect: { type: 'move_to_nearest', spaceType: 'railroad', collectGo: true } },
  { id: 6, deck: 'chance', text: 'Advance to the nearest Utility. If unowned, you may buy it. If owned, pay owner 10 times the dice roll.',
    effect: { type: 'move_to_nearest', spaceType: 'utility', collectGo: true } },
  { id: 7, deck: 'chance', text: 'Bank pays you dividend of $50.',
    effect: { type: 'collect', amount: 50 } },
  { id: 8, deck: 'chance', text: 'Get Out of Jail Free.',
    effect: { type: 'get_out_of_jail_free' } },
  { id: 9, deck: 'chance', text: 'Go Back 3 Spaces.',
    effect: { type: 'move_back', spaces: 3 } },
  { id: 10, deck: 'chance', text: 'Go to Jail. Go directly to Jail, do not pass Go, do not collect $200.',
    effect: { type: 'go_to_jail' } },
  { id: 11, deck: 'chance', text: 'Make general repairs on all your property. For each house pay $25. For each hotel pay $100.',
    effect: { type: 'pay_per_house', houseAmount: 25, hotelAmount: 100 } },
  { id: 12, deck: 'chance', text: 'Speeding fine $15.',
    effect: { type: 'pay', amount: 15 } },
  { id: 13, deck: 'chance', text: 'Take a trip to Reading Railroad. If you pass Go, collect $200.',
    effect: { type: 'move_to', position: 5, collectGo: true } },
  { id: 14, deck: 'chance', text: 'You have been elected Chairman of the Board. Pay each player $50.',
    effect: { type: 'pay_each_player', amount: 50 } },
  { id: 15, deck: 'chance', text: 'Your building loan matures. Collect $150.',
    effect: { type: 'collect', amount: 150 } },
];

export const COMMUNITY_CHEST_CARDS: readonly Card[] = [
  { id: 0, deck: 'community_chest', text: 'Advance to Go. Collect $200.',
    effect: { type: 'move_to', position: 0, collectGo: true } },
  { id: 1, deck: 'community_chest', text: 'Bank error in your favor. Collect $200.',
    effect: { type: 'collect', amount: 200 } },
  { id: 2, deck: 'community_chest', text: "Doctor's fee. Pay $50.",
    effect: { type: 'pay', amount: 50 } },
  { id: 3, deck: 'community_chest', text: 'From sale of stock you get $50.',
    effect: { type: 'collect', amount: 50 } },
  { id: 4, deck: 'community_chest', text: 'Get Out of Jail Free.',
    effect: { type: 'get_out_of_jail_free' } },
  { id: 5, deck: 'community_chest', text: 'Go to Jail. Go directly to jail, do not pass Go, do not collect $200.',
    effect: { type: 'go_to_jail' } },
  { id: 6, deck: 'community_chest', text: 'Holiday fund matures. Receive $100.',
    effect: { type: 'collect', amount: 100 } },
  { id: 7, deck: 'community_chest', text: 'Income tax refund. Collect $20.',
    effect: { type: 'collect', amount: 20 } },
  { id: 8, deck: 'community_chest', text: 'It is your birthday. Collect $10 from every player.',
    effect: { type: 'collect_from_each_player', amount: 10 } },
  { id: 9, deck: 'community_chest', text: 'Life insurance matures. Collect $100.',
    effect: { type: 'collect', amount: 100 } },
  { id: 10, deck: 'community_chest', text: 'Pay hospital fees of $100.',
    effect: { type: 'pay', amount: 100 } },
  { id: 11, deck: 'community_chest', text: 'Pay school fees of $50.',
    effect: { type: 'pay', amount: 50 } },
  { id: 12, deck: 'community_chest', text: 'Receive $25 consultancy fee.',
    effect: { type: 'collect', amount: 25 } },
  { id: 13, deck: 'community_chest', text: 'You are assessed for street repair. $40 per house. $115 per hotel.',
    effect: { type: 'pay_per_house', houseAmount: 40, hotelAmount: 115 } },
  { id: 14, deck: 'community_chest', text: 'You have won second prize in a beauty contest. Collect $10.',
    effect: { type: 'collect', amount: 10 } },
  { id: 15, deck: 'community_chest', text: 'You inherit $100.',
    effect: { type: 'collect', amount: 100 } },
];

export function getDeckCards(deck: DeckType): readonly Card[] {
  return deck === 'chance' ? CHANCE_CARDS : COMMUNITY_CHEST_CARDS;
}

export function getJailCardId(deck: DeckType): number {
  const card = getDeckCards(deck).find(c => c.effect.type === 'get_out_of_jail_free');
  if (!card) throw new Error(`The ${deck} deck has no Get Out of Jail Free card`);
  return card.id;
}

export function createShuffledDeck(cards: readonly Card[], rng: Rng): number[] {
  const ids = cards.map(card => card.id);
  // Fisher-Yates shuffle
  for (let i = ids.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    [ids[i], ids[j]] = [ids[j], ids[i]];
  }
  return ids;
}

/**
 * Takes the top card. Every card except Get Out of Jail Free goes straight
 * back to the bottom; that one stays out until the holder gives it back.
 */
export function drawCard(
  deck: readonly number[],
  cards: readonly Card[],
): { card: Card; newDeck: number[] } {
  const [top, ...rest] = deck;
  if (top === undefined) {
    throw new Error('Cannot draw from an empty deck');
  }
  const card = cards[top];

  if (card.effect.type !== 'get_out_of_jail_free') {
    rest.push(top);
  }

  return { card, newDeck: rest };
}

export function returnCardToDeck(deck: readonly number[], cardId: number): number[] {
  if (deck.includes(cardId)) {
    throw new InvariantViolation(`Card ${cardId} is already in the deck`);
  }
  return [...deck, cardId];
}
