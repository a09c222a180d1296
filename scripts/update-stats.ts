import { loadBotConfig } from '../config/bot.config';
import { DbService } from '../src/services/db.service';
import { RedditService } from '../src/services/reddit.service';
import { StatsService } from '../src/services/stats.service';

/**
 * Regenerate the stats wiki pages: global, completed tips and one per user.
 */
async function updateStats() {
  const config = loadBotConfig();
  const db = DbService.connect(config.database.url, config.database.ssl);

  try {
    const stats = new StatsService(db, config);
    const pages = await stats.publish(new RedditService(config.reddit), `Update by /u/${config.reddit.username}`);
    console.log(`✅ Updated: ${pages.join(', ')}`);
  } finally {
    await db.close();
  }
}

updateStats()
  .then(() => process.exit(0))
  .catch(error => {
    console.error('❌ Stats update failed:', error);
    process.exit(1);
  });
