import { ParserService } from '../src/services/parser.service';
import { createParser } from '../src/context';
import { ADDRESS, BOT, comment, message, testConfig } from './support/fakes';

const ETH = 10n ** 18n;

describe('ParserService', () => {
  const parser = createParser(testConfig());

  describe('Private messages', () => {
    it('should parse register, accept, decline and info', () => {
      expect(parser.parse(message('alice', 'register'))).toEqual({ type: 'register' });
      expect(parser.parse(message('alice', '+accept'))).toEqual({ type: 'accept' });
      expect(parser.parse(message('alice', 'decline please'))).toEqual({ type: 'decline' });
      expect(parser.parse(message('alice', '+balance'))).toEqual({ type: 'info' });
    });

    it('should parse a tip with a decimal amount', () => {
      expect(parser.parse(message('alice', 'tip /u/bob 1.5 eth'))).toEqual({
        type: 'tip',
        recipient: 'bob',
        amount: { kind: 'exact', value: 3n * ETH / 2n }
      });
    });

    it('should parse "all" as the whole balance', () => {
      expect(parser.parse(message('alice', 'send u/bob all'))).toEqual({
        type: 'tip',
        recipient: 'bob',
        amount: { kind: 'all' }
      });
    });

    it('should parse a withdrawal', () => {
      expect(parser.parse(message('alice', `withdraw ${ADDRESS} 0.25 ether`))).toEqual({
        type: 'withdraw',
        address: ADDRESS,
        amount: { kind: 'exact', value: ETH / 4n }
      });
    });

    it('should let the first matching pattern win', () => {
      expect(parser.parse(message('alice', 'register and tip /u/bob 1 eth'))).toEqual({ type: 'register' });
    });

    it('should not apply comment patterns to messages', () => {
      expect(parser.parse(message('alice', `+/u/${BOT} /u/bob 1 eth`))).toBeNull();
    });
  });

  describe('Comments', () => {
    it('should parse a tip with an explicit recipient', () => {
      expect(parser.parse(comment('alice', `Great post! +/u/${BOT} /u/bob 0.01 ether`, 'carol'))).toEqual({
        type: 'tip',
        recipient: 'bob',
        amount: { kind: 'exact', value: ETH / 100n }
      });
    });

    it('should tip the parent author when no recipient is named', () => {
      expect(parser.parse(comment('alice', `+/u/${BOT} 0.5 eth`, 'carol'))).toEqual({
        type: 'tip',
        recipient: 'carol',
        amount: { kind: 'exact', value: ETH / 2n }
      });
    });

    it('should leave the comment unmatched when the parent author is unknown', () => {
      expect(parser.parse(comment('alice', `+/u/${BOT} 0.5 eth`))).toBeNull();
    });

    it('should resolve amount keywords', () => {
      expect(parser.parse(comment('alice', `+/u/${BOT} a  beer`, 'dave'))).toEqual({
        type: 'tip',
        recipient: 'dave',
        amount: { kind: 'exact', value: 3n * 10n ** 15n }
      });
    });

    it('should match case-insensitively', () => {
      expect(parser.parse(comment('alice', '+/U/TipBot /u/Bob 2 ETH', 'carol'))).toEqual({
        type: 'tip',
        recipient: 'Bob',
        amount: { kind: 'exact', value: 2n * ETH }
      });
    });
  });

  describe('Amounts', () => {
    it('should reject amounts finer than the coin allows', () => {
      expect(parser.parse(message('alice', 'tip /u/bob 0.0000000000000000001 eth'))).toBeNull();
    });

    it('should leave an amount too large to record unmatched', () => {
      expect(parser.parse(message('alice', `tip /u/bob ${'9'.repeat(70)} eth`))).toBeNull();
      expect(parser.parse(message('alice', `withdraw ${ADDRESS} ${'9'.repeat(70)} eth`))).toBeNull();
    });

    it('should reject zero', () => {
      expect(parser.parse(message('alice', 'tip /u/bob 0 eth'))).toBeNull();
    });

    it('should reject unknown units', () => {
      expect(parser.parse(message('alice', 'tip /u/bob 1 doge'))).toBeNull();
      expect(parser.parse(message('alice', 'tip /u/bob 1 ethereum'))).toBeNull();
    });

    it('should accept a unit glued to the number', () => {
      expect(parser.parse(message('alice', 'tip /u/bob .5eth'))).toEqual({
        type: 'tip',
        recipient: 'bob',
        amount: { kind: 'exact', value: ETH / 2n }
      });
    });
  });

  it('should follow the configured pattern order', () => {
    const custom = new ParserService({
      botUsername: BOT,
      units: ['eth'],
      decimals: 18,
      addressPattern: '0x[0-9a-fA-F]{40}',
      keywords: {},
      commands: [
        { type: 'info', scope: 'message', pattern: '^hello' },
        { type: 'register', scope: 'message', pattern: '^hello' }
      ]
    });

    expect(custom.parse(message('alice', 'hello there'))).toEqual({ type: 'info' });
    expect(custom.parse(message('alice', 'tip /u/bob all'))).toBeNull();
  });
});
