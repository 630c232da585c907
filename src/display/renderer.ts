import chalk from 'chalk';
import type { GameEvent } from '../engine/types';
import { getSpace } from '../engine/board-data';
import type { GameSnapshot } from '../session/views';
import { playerColor, COLOR_MAP, BOLD, MONEY, DANGER, DIM } from './colors';

const DIVIDER = chalk.dim('─'.repeat(80));

export class Renderer {
  private verbose: boolean;
  private write: (line: string) => void;

  constructor(verbose: boolean = false, write: (line: string) => void = line => console.log(line)) {
    this.verbose = verbose;
    this.write = write;
  }

  renderGameStart(snapshot: GameSnapshot): void {
    this.write('');
    this.write(BOLD(chalk.whiteBright(`═══ ${snapshot.sessionId}: ${snapshot.players.length} players ═══`)));
    snapshot.players.forEach((p, i) => {
      const color = playerColor(i);
      this.write(`  ${color(`[${i + 1}]`)} ${color(p.name)} — $${p.balance}`);
    });
    this.write(DIVIDER);
  }

  renderEvents(events: GameEvent[], snapshot: GameSnapshot): void {
    for (const event of events) {
      const msg = this.formatEvent(event, snapshot);
      if (msg) {
        this.write(`  ${msg}`);
      }
    }
  }

  renderActionError(playerName: string, error: string): void {
    this.write(`  ${DANGER(`✗ ${playerName}: ${error}`)}`);
  }

  renderGameOver(snapshot: GameSnapshot): void {
    this.write('');
    this.write(DIVIDER);

    if (snapshot.winner) {
      this.write(BOLD(chalk.whiteBright(`GAME OVER — ${snapshot.winner} WINS!`)));
    } else {
      this.write(BOLD('GAME OVER — No winner (turn limit reached)'));
    }

    this.write(BOLD('Final standings:'));
    const ranked = [...snapshot.players].sort((a, b) => {
      if (a.isBankrupt !== b.isBankrupt) return a.isBankrupt ? 1 : -1;
      return b.netWorth - a.netWorth;
    });

    ranked.forEach((p, rank) => {
      const color = playerColor(snapshot.players.indexOf(p));
      if (p.isBankrupt) {
        this.write(`  ${rank + 1}. ${DIM(p.name)} — BANKRUPT`);
      } else {
        this.write(`  ${rank + 1}. ${color(p.name)} — Net worth: ${MONEY(`$${p.netWorth}`)} (Cash: $${p.balance}, ${p.properties.length} properties)`);
      }
    });

    this.write(DIM(`Game ended on turn ${snapshot.turnNumber}`));
  }

  formatEvent(event: GameEvent, snapshot: GameSnapshot): string | null {
    const pn = (id: string): string => {
      if (id === 'bank') return 'the bank';
      const idx = snapshot.players.findIndex(p => p.id === id);
      return idx === -1 ? id : playerColor(idx)(snapshot.players[idx].name);
    };
    const property = (position: number, name: string): string => {
      const space = getSpace(position);
      return space.type === 'property' ? COLOR_MAP[space.colorGroup](name) : name;
    };

    switch (event.type) {
      case 'turn_start':
        return this.verbose ? BOLD(`━━━ TURN ${event.turnNumber}: ${pn(event.playerId)} ━━━`) : null;
      case 'roll_dice':
        return `🎲 ${pn(event.playerId)} rolled [${event.dice[0]}][${event.dice[1]}] = ${event.dice[0] + event.dice[1]}${event.doubles ? BOLD(' DOUBLES!') : ''}`;
      case 'extra_roll':
        return `🎲 ${pn(event.playerId)} rolls again`;
      case 'move':
        return this.verbose ? DIM(`${pn(event.playerId)} moved ${event.from} → ${event.to}`) : null;
      case 'land':
        return `📍 Landed on ${BOLD(property(event.position, event.spaceName))}`;
      case 'pass_go':
        return `💰 ${pn(event.playerId)} passed Go! Collected ${MONEY(`$${event.collected}`)}`;
      case 'purchase_offered':
        return `🏷️  ${event.property} is for sale at $${event.price}`;
      case 'buy_property':
        return `🏠 ${pn(event.playerId)} bought ${BOLD(property(event.position, event.property))} for ${MONEY(`$${event.price}`)}`;
      case 'auction_start':
        return BOLD(`AUCTION: ${event.property}`);
      case 'auction_bid':
        return `    ${pn(event.playerId)} bids ${MONEY(`$${event.amount}`)}`;
      case 'auction_bid_rejected':
        return DIM(`    ${pn(event.playerId)}'s bid of $${event.amount} rejected: ${event.reason}`);
      case 'auction_won':
        return `🔨 ${pn(event.playerId)} won auction for ${BOLD(event.property)} at ${MONEY(`$${event.price}`)}`;
      case 'auction_no_bids':
        return `🔨 No bids on ${event.property}, it stays unowned`;
      case 'build_house':
        return `🏗️  ${pn(event.playerId)} built house on ${event.property} (${event.houses} houses)`;
      case 'build_hotel':
        return `🏨 ${pn(event.playerId)} built HOTEL on ${event.property}`;
      case 'sell_building':
        return `📉 ${pn(event.playerId)} sold a building on ${event.property} for ${MONEY(`$${event.refund}`)} (${event.houses} left)`;
      case 'draw_card':
        return `🃏 ${pn(event.playerId)} drew ${event.deck === 'chance' ? 'Chance' : 'Community Chest'}: "${event.cardText}"`;
      case 'receive_jail_card':
        return `🎟️  ${pn(event.playerId)} keeps the Get Out of Jail Free card`;
      case 'payment':
        return `💸 ${pn(event.playerId)} paid ${DANGER(`$${event.amount}`)} to ${pn(event.creditor)}: ${event.reason}`;
      case 'collect':
        return `💰 ${pn(event.playerId)} collected ${MONEY(`$${event.amount}`)}: ${event.reason}`;
      case 'debt_incurred':
        return DANGER(`⚠️  ${pn(event.playerId)} owes $${event.amount} to ${pn(event.creditor)}: ${event.reason}`);
      case 'go_to_jail':
        return `🚔 ${pn(event.playerId)} goes to JAIL! (${event.reason})`;
      case 'jail_roll_failed':
        return DIM(`🔒 ${pn(event.playerId)} stays in jail (attempt ${event.attempt})`);
      case 'get_out_of_jail':
        return `🔓 ${pn(event.playerId)} got out of jail: ${event.method}`;
      case 'mortgage':
        return `📋 ${pn(event.playerId)} mortgaged ${event.property} for ${MONEY(`$${event.received}`)}`;
      case 'unmortgage':
        return `📋 ${pn(event.playerId)} unmortgaged ${event.property} for ${DANGER(`$${event.cost}`)}`;
      case 'trade_proposed':
        return `🤝 ${event.fromPlayer} proposes to ${event.toPlayer}: ${event.description}`;
      case 'trade_completed':
        return `🤝 Trade completed: ${event.fromPlayer} ↔ ${event.toPlayer}: ${event.description}`;
      case 'trade_rejected':
        return `❌ ${event.toPlayer} rejected trade from ${event.fromPlayer}`;
      case 'bankruptcy':
        return DANGER(`💀 ${pn(event.playerId)} is BANKRUPT (to ${pn(event.creditor)})`);
      case 'game_over':
        return null; // Handled by renderGameOver
    }
  }
}
