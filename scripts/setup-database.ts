import { loadBotConfig } from '../config/bot.config';
import { DbService } from '../src/services/db.service';

/**
 * Create the ledger tables and indexes if they are missing.
 */
async function setupDatabase() {
  const config = loadBotConfig();
  const db = DbService.connect(config.database.url, config.database.ssl);

  try {
    console.log('\n🗄️  Database Setup\n');
    await db.migrate();
    await db.createUser(config.reddit.username);
    console.log(`👤 Bot account /u/${config.reddit.username} registered`);
  } finally {
    await db.close();
  }
}

setupDatabase()
  .then(() => {
    console.log('Done!\n');
    process.exit(0);
  })
  .catch(error => {
    console.error('❌ Database setup failed:', error);
    process.exit(1);
  });
