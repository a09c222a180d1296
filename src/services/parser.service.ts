import { AmountSpec, CommandPattern, CommandType, InboxItemKind, InboxMessage, ParsedCommand } from '../models/types';
import { parseAmount } from '../utils/amount';

export interface ParserOptions {
  botUsername: string;
  units: string[];
  decimals: number;
  addressPattern: string;
  keywords: Record<string, string>;
  commands: CommandPattern[];
}

interface CompiledRule {
  type: CommandType;
  scope: InboxItemKind;
  regex: RegExp;
}

type Groups = Record<string, string | undefined>;

const USER_PATTERN = '/?u/(?<recipient>[A-Za-z0-9_-]{3,20})';

export class ParserService {
  private rules: CompiledRule[];
  private keywords: Map<string, string>;
  private decimals: number;

  constructor(options: ParserOptions) {
    this.decimals = options.decimals;
    this.keywords = new Map(
      Object.entries(options.keywords).map(([phrase, value]) => [normalizePhrase(phrase), value])
    );

    const placeholders: Record<string, string> = {
      BOT: escapeRegExp(options.botUsername),
      USER: USER_PATTERN,
      ADDRESS: `(?<address>${options.addressPattern})`,
      AMOUNT: this.amountPattern(options.units, Object.keys(options.keywords))
    };

    this.rules = options.commands.map(command => ({
      type: command.type,
      scope: command.scope,
      regex: new RegExp(
        command.pattern.replace(/\{([A-Z]+)\}/g, (token, name: string) => placeholders[name] ?? token),
        'i'
      )
    }));
  }

  /**
   * Classify an inbox item. The first pattern of the item's scope that
   * matches and yields a well-formed command wins.
   * @returns The command, or null when nothing matched
   */
  parse(message: InboxMessage): ParsedCommand | null {
    for (const rule of this.rules) {
      if (rule.scope !== message.kind) continue;

      const match = rule.regex.exec(message.body);
      if (!match) continue;

      const command = this.toCommand(rule.type, match.groups ?? {}, message);
      if (command) {
        return command;
      }
    }

    return null;
  }

  private toCommand(type: CommandType, groups: Groups, message: InboxMessage): ParsedCommand | null {
    switch (type) {
      case 'register':
      case 'info':
      case 'accept':
      case 'decline':
        return { type };

      case 'tip': {
        // "+/u/bot 1 eth" in a comment tips the parent's author
        const recipient = groups.recipient ?? (message.kind === 'comment' ? message.parentAuthor : undefined);
        const amount = this.toAmount(groups);
        if (!recipient || !amount) return null;
        return { type: 'tip', recipient, amount };
      }

      case 'withdraw': {
        const amount = this.toAmount(groups);
        if (!groups.address || !amount) return null;
        return { type: 'withdraw', address: groups.address, amount };
      }
    }
  }

  private toAmount(groups: Groups): AmountSpec | null {
    let text = groups.amount;

    if (groups.keyword) {
      const value = this.keywords.get(normalizePhrase(groups.keyword));
      if (value === 'all') {
        return { kind: 'all' };
      }
      text = value;
    }

    if (!text) return null;

    const value = parseAmount(text, this.decimals);
    if (value === null || value <= 0n) {
      return null;
    }
    return { kind: 'exact', value };
  }

  private amountPattern(units: string[], keywords: string[]): string {
    const unitAlternation = byLengthDesc(units).map(escapeRegExp).join('|');
    const numeric = `(?<amount>\\d+(?:\\.\\d+)?|\\.\\d+)\\s*(?<unit>${unitAlternation})\\b`;

    if (keywords.length === 0) {
      return `(?:${numeric})`;
    }

    const keywordAlternation = byLengthDesc(keywords)
      .map(keyword => escapeRegExp(normalizePhrase(keyword)).replace(/ /g, '\\s+'))
      .join('|');
    return `(?:${numeric}|(?<keyword>${keywordAlternation})\\b)`;
  }
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}

function normalizePhrase(phrase: string): string {
  return phrase.trim().toLowerCase().replace(/\s+/g, ' ');
}

function byLengthDesc(values: string[]): string[] {
  return [...values].sort((a, b) => b.length - a.length);
}
