import { createContext, createExecutor, createParser } from '../context';
import { runSelfChecks } from '../services/selfcheck.service';
import { PollLoop } from './poll-loop';

async function main(): Promise<number> {
  const ctx = createContext();
  const { config, store } = ctx;

  console.log('🚀 Starting Reddit inbox listener...');
  console.log(`🤖 Bot account: /u/${config.reddit.username}`);
  console.log(`📊 Polling interval: ${config.loop.sleepSeconds}s, batch ${config.reddit.batchLimit}`);

  try {
    await store.migrate();
    const executor = createExecutor(ctx);
    // sent-but-unbooked withdrawals would otherwise fail the wallet check
    await executor.settleWithdrawals();
    await runSelfChecks(store, ctx.coin, config.coin, config.reddit.username);

    const loop = new PollLoop({
      config,
      store,
      source: ctx.source,
      notifier: ctx.notifier,
      parser: createParser(config),
      executor
    });

    const shutdown = (signal: string) => {
      console.log(`\n${signal} received, stopping after the current step...`);
      loop.stop();
    };
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));

    return await loop.run();

  } catch (error) {
    console.error('❌ Startup failed:', error instanceof Error ? error.stack : error);
    try {
      await ctx.notifier.notify(`Tip bot /u/${config.reddit.username} failed to start`, String(error));
    } catch (notifyError) {
      console.error('❌ Operator notification failed:', notifyError);
    }
    return 1;

  } finally {
    await store.close();
  }
}

main()
  .then(code => process.exit(code))
  .catch(error => {
    console.error('❌ Fatal:', error);
    process.exit(1);
  });
