import { PollLoop } from '../src/workers/poll-loop';
import { ExecutorService } from '../src/services/executor.service';
import { createParser } from '../src/context';
import { BotConfig } from '../config/bot.config';
import { StorageError, TransientUpstreamError, UpstreamError } from '../src/services/errors';
import { didNotUnderstand } from '../src/services/templates';
import { MemoryLedger } from './support/memory-ledger';
import { FakeCoin, FakeNotifier, FakeSource, comment, message, silenceConsole, testConfig } from './support/fakes';

const ETH = 10n ** 18n;
const T0 = new Date('2024-03-01T12:00:00Z');

describe('PollLoop', () => {
  silenceConsole();

  let store: MemoryLedger;
  let source: FakeSource;
  let notifier: FakeNotifier;
  let config: BotConfig;
  let clock: Date;
  let executor: ExecutorService;
  let sleep: jest.Mock<Promise<void>, [number]>;
  let loop: PollLoop;

  const setup = (env: NodeJS.ProcessEnv = {}) => {
    store = new MemoryLedger();
    source = new FakeSource();
    notifier = new FakeNotifier();
    config = testConfig(env);
    clock = T0;
    executor = new ExecutorService({ config, store, coin: new FakeCoin(100n * ETH), now: () => clock });
    sleep = jest.fn(async (ms: number) => {
      expect(ms).toBeGreaterThan(0);
      loop.stop();
    });
    loop = new PollLoop({ config, store, source, notifier, parser: createParser(config), executor, sleep });
  };

  beforeEach(() => {
    setup();
    store.seedUser('alice', ETH / 10n);
    store.seedUser('bob', 0n);
  });

  it('should record one action per message in delivery order', async () => {
    const m1 = message('alice', 'tip /u/bob 1 eth');
    const m2 = message('alice', 'tip /u/bob 0.05 eth');
    const m3 = { ...m1 };
    source.inbox = [m1, m2, m3];

    const summary = await loop.runIteration();

    expect(summary.outcomes).toEqual(['executed', 'executed', 'duplicate']);
    expect(store.actions.map(action => [action.sourceMessageId, action.state])).toEqual([
      [m1.id, 'declined'],
      [m2.id, 'completed']
    ]);
    expect(store.balanceOf('alice')).toBe(ETH / 20n);
    expect(store.balanceOf('bob')).toBe(ETH / 20n);
    expect(source.replies).toHaveLength(2);
    expect(source.replyTo(m1.id)).toBe('❌ Insufficient balance for 1 ether');
    expect(source.replyTo(m2.id)).toBe('✅ /u/alice tipped /u/bob 0.05 ether');
    expect(loop.state).toBe('idle');
  });

  it('should not execute a redelivered message again', async () => {
    const tip = message('alice', 'tip /u/bob 0.05 eth');
    source.inbox = [tip];
    await loop.runIteration();

    source.read = [];
    const summary = await loop.runIteration();

    expect(summary.outcomes).toEqual(['duplicate']);
    expect(store.actions).toHaveLength(1);
    expect(store.balanceOf('bob')).toBe(ETH / 20n);
    expect(source.replies).toHaveLength(1);
  });

  it('should skip items without an author, from the bot or from banned users', async () => {
    setup({ BANNED_USERS: 'spammer' });
    const system = message(null, 'welcome');
    const own = message('TipBot', 'register');
    const banned = message('Spammer', 'register');
    source.inbox = [system, own, banned];

    const summary = await loop.runIteration();

    expect(summary.outcomes).toEqual(['no_author', 'own_message', 'banned']);
    expect(source.read).toEqual([system.id, own.id, banned.id]);
    expect(store.actions).toEqual([]);
    expect(source.replies).toEqual([]);
  });

  it('should answer unmatched messages unless they are unsolicited replies', async () => {
    const question = message('alice', 'what is this?');
    const chatter = comment('alice', 'nice bot', undefined, { subject: 'comment reply' });
    source.inbox = [question, chatter];

    const summary = await loop.runIteration();

    expect(summary.outcomes).toEqual(['unmatched', 'unmatched']);
    expect(source.replies).toEqual([{ id: question.id, body: didNotUnderstand('tipbot') }]);
    expect(source.read).toEqual([question.id, chatter.id]);
  });

  it('should stay quiet on unmatched messages when sorry replies are off', async () => {
    setup({ SEND_SORRY: 'false' });
    source.inbox = [message('alice', 'hello')];

    await loop.runIteration();

    expect(source.replies).toEqual([]);
    expect(source.read).toHaveLength(1);
  });

  it('should invite the recipient of a pending tip', async () => {
    source.inbox = [message('alice', 'tip /u/newbie 0.05 eth')];

    await loop.runIteration();

    expect(source.sent).toHaveLength(1);
    expect(source.sent[0].to).toBe('newbie');
    expect(source.sent[0].subject).toBe('/u/alice sent you a tip');
  });

  it('should end the batch on a transient failure and resume next time', async () => {
    const m1 = message('alice', 'tip /u/bob 0.02 eth');
    const m2 = message('alice', 'tip /u/bob 0.03 eth');
    source.inbox = [m1, m2];
    source.failures.push({ call: 'reply', error: new TransientUpstreamError('Reddit reply: HTTP 429', 429) });

    await expect(loop.runIteration()).rejects.toBeInstanceOf(TransientUpstreamError);
    expect(store.actions).toHaveLength(1);
    expect(source.read).toEqual([]);

    const summary = await loop.runIteration();

    expect(summary.outcomes).toEqual(['duplicate', 'executed']);
    expect(store.actions).toHaveLength(2);
    expect(store.balanceOf('bob')).toBe(ETH / 20n);
  });

  it('should carry on when a reply is refused', async () => {
    const tip = message('alice', 'tip /u/bob 0.05 eth');
    source.inbox = [tip];
    source.failures.push({ call: 'reply', error: new UpstreamError('Reddit reply: DELETED_COMMENT') });

    const summary = await loop.runIteration();

    expect(summary.outcomes).toEqual(['executed']);
    expect(source.read).toEqual([tip.id]);
  });

  it('should abort only the item that hit a ledger error', async () => {
    const m1 = message('alice', 'tip /u/bob 0.02 eth');
    const m2 = message('alice', 'tip /u/bob 0.03 eth');
    source.inbox = [m1, m2];
    jest.spyOn(executor, 'execute').mockRejectedValueOnce(new StorageError('connection lost'));

    const summary = await loop.runIteration();

    expect(summary.outcomes).toEqual(['aborted', 'executed']);
    expect(source.read).toEqual([m2.id]);
    expect(store.balanceOf('bob')).toBe(3n * ETH / 100n);
  });

  it('should abort the item when the duplicate check fails', async () => {
    const m1 = message('alice', 'tip /u/bob 0.02 eth');
    const m2 = message('alice', 'tip /u/bob 0.03 eth');
    source.inbox = [m1, m2];
    jest.spyOn(store, 'actionExists').mockRejectedValueOnce(new StorageError('connection lost'));

    const summary = await loop.runIteration();

    expect(summary.outcomes).toEqual(['aborted', 'executed']);
    expect(source.read).toEqual([m2.id]);
    expect(store.actions.map(action => action.sourceMessageId)).toEqual([m2.id]);
    expect(loop.state).toBe('idle');
  });

  it('should expire stale tips and tell the sender', async () => {
    source.inbox = [message('alice', 'tip /u/newbie 0.05 eth')];
    await loop.runIteration();

    clock = new Date(T0.getTime() + 49 * 3600 * 1000);
    const summary = await loop.runIteration();

    expect(summary.expired).toBe(1);
    expect(store.actions[0].state).toBe('expired');
    expect(source.sent.map(entry => [entry.to, entry.subject])).toEqual([
      ['newbie', '/u/alice sent you a tip'],
      ['alice', 'Your tip expired']
    ]);
  });

  it('should send the remaining expiry notices after one fails', async () => {
    store.seedUser('carol', ETH / 10n);
    source.inbox = [message('alice', 'tip /u/newbie 0.05 eth'), message('carol', 'tip /u/stranger 0.05 eth')];
    await loop.runIteration();
    source.sent = [];

    source.failures.push({ call: 'sendMessage', error: new TransientUpstreamError('Reddit compose: HTTP 503', 503) });
    clock = new Date(T0.getTime() + 49 * 3600 * 1000);
    const summary = await loop.runIteration();

    expect(summary.expired).toBe(2);
    expect(source.sent.map(entry => [entry.to, entry.subject])).toEqual([['carol', 'Your tip expired']]);
  });

  it('should book a withdrawal that was sent but not debited', async () => {
    await store.createAction({
      type: 'withdraw',
      state: 'pending',
      sourceMessageId: 'w1',
      fromUser: 'alice',
      amount: ETH / 20n,
      address: '0x1111111111111111111111111111111111111111',
      txid: '0xsent'
    });

    const summary = await loop.runIteration();

    expect(summary.settled).toBe(1);
    expect(store.actions[0]).toMatchObject({ state: 'completed', txid: '0xsent' });
    expect(store.balanceOf('alice')).toBe(495n * ETH / 10000n);
  });

  describe('run', () => {
    it('should sleep between polls and exit 0 when stopped', async () => {
      const code = await loop.run();

      expect(code).toBe(0);
      expect(sleep).toHaveBeenCalledWith(30000);
      expect(notifier.alerts).toEqual([]);
    });

    it('should treat an unreachable inbox as transient', async () => {
      source.failures.push({ call: 'fetchUnread', error: new TransientUpstreamError('Reddit fetch unread: ETIMEDOUT') });

      expect(await loop.run()).toBe(0);
      expect(sleep).toHaveBeenCalledTimes(1);
      expect(notifier.alerts).toEqual([]);
    });

    it('should notify the operator and exit 1 on an unexpected error', async () => {
      source.inbox = [message('alice', 'tip /u/bob 0.05 eth')];
      jest.spyOn(executor, 'execute').mockRejectedValue(new TypeError('boom'));

      const code = await loop.run();

      expect(code).toBe(1);
      expect(loop.state).toBe('failed');
      expect(sleep).not.toHaveBeenCalled();
      expect(notifier.alerts).toHaveLength(1);
      expect(notifier.alerts[0].subject).toBe('Tip bot /u/tipbot stopped');
      expect(notifier.alerts[0].body).toMatch(/^TypeError: boom/);
    });
  });
});
