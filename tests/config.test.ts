import { loadBotConfig, loadCommandPatterns } from '../config/bot.config';
import { ConfigError } from '../src/services/errors';
import { testConfig } from './support/fakes';

describe('Bot configuration', () => {
  it('should apply defaults', () => {
    const config = testConfig();

    expect(config.reddit.username).toBe('tipbot');
    expect(config.reddit.userAgent).toBe('tipbot/1.0 (by /u/tipbot)');
    expect(config.reddit.batchLimit).toBe(25);
    expect(config.reddit.sendSorry).toBe(true);
    expect(config.coin.units).toEqual(['eth', 'ether']);
    expect(config.coin.minTip).toBe(100000000000000n);
    expect(config.coin.minWithdraw).toBe(1000000000000000n);
    expect(config.coin.withdrawFee).toBe(500000000000000n);
    expect(config.loop.expirePendingHours).toBe(48);
    expect(config.loop.autoRegisterRecipients).toBe(false);
    expect(config.stats.subreddit).toBeUndefined();
  });

  it('should load command patterns and keywords from JSON', () => {
    const config = testConfig();

    expect(config.commands).toHaveLength(8);
    expect(config.commands[0]).toEqual({ type: 'register', scope: 'message', pattern: '^\\s*\\+?(?:register|signup)\\b' });
    expect(config.keywords['a beer']).toBe('0.003');
  });

  it('should read lists and flags', () => {
    const config = testConfig({
      BANNED_USERS: 'Spammer, Troll ,',
      SEND_SORRY: 'false',
      AUTO_REGISTER_RECIPIENTS: '1',
      COIN_UNITS: 'ETH'
    });

    expect(config.reddit.bannedUsers).toEqual(['spammer', 'troll']);
    expect(config.reddit.sendSorry).toBe(false);
    expect(config.loop.autoRegisterRecipients).toBe(true);
    expect(config.coin.units).toEqual(['eth']);
  });

  it('should require the bot username and database URL', () => {
    expect(() => loadBotConfig({ DATABASE_URL: 'postgres://localhost/test' })).toThrow(ConfigError);
    expect(() => loadBotConfig({ REDDIT_USERNAME: 'tipbot' })).toThrow('DATABASE_URL environment variable not set');
  });

  it('should reject invalid numbers', () => {
    expect(() => testConfig({ BATCH_LIMIT: '0' })).toThrow('BATCH_LIMIT must be between 1 and 100');
    expect(() => testConfig({ SLEEP_SECONDS: 'soon' })).toThrow(ConfigError);
    expect(() => testConfig({ MIN_TIP: '0.1.2' })).toThrow('MIN_TIP is not a valid amount: "0.1.2"');
  });

  it('should reject integers with trailing text', () => {
    expect(() => testConfig({ SLEEP_SECONDS: '30abc' })).toThrow('SLEEP_SECONDS must be a non-negative integer, got "30abc"');
    expect(() => testConfig({ EXPIRE_PENDING_HOURS: '12h' })).toThrow('EXPIRE_PENDING_HOURS must be a non-negative number of hours, got "12h"');
  });

  it('should accept a fractional expiry window', () => {
    const config = testConfig({ EXPIRE_PENDING_HOURS: '0.5' });

    expect(config.loop.expirePendingHours).toBe(0.5);
  });

  it('should reject keyword amounts the coin cannot represent', () => {
    expect(() => testConfig({ COIN_DECIMALS: '2', MIN_TIP: '0.01', MIN_WITHDRAW: '0.01', WITHDRAW_FEE: '0.01' })).toThrow('Keyword "a coffee" has an invalid amount: 0.002');
  });

  it('should reject unknown command types', () => {
    expect(() => loadCommandPatterns([{ type: 'long', scope: 'message', pattern: '^long' }]))
      .toThrow('commands.json entry 0: unknown type "long" or scope "message"');
  });
});
