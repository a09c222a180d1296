import express from 'express';
import cors from 'cors';
import { BotConfig, loadBotConfig } from '../config/bot.config';
import { LedgerSession } from './models/ledger';
import { DbService } from './services/db.service';
import { StatsService } from './services/stats.service';
import { balanceRoutes } from './api/routes/balance';
import { statsRoutes } from './api/routes/stats';

interface HttpError {
  status?: number;
  message?: string;
}

/**
 * Read-only HTTP API over the ledger: health, balances and stats pages.
 */
export function createApp(store: LedgerSession, config: BotConfig): express.Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  // Health check
  app.get('/health', (req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // API Routes
  app.use('/api/balance', balanceRoutes(store, config));
  app.use('/api/stats', statsRoutes(new StatsService(store, config)));

  app.use((req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Error handling middleware
  app.use((err: HttpError, req: express.Request, res: express.Response, next: express.NextFunction) => {
    console.error('Error:', err);
    res.status(err.status || 500).json({
      error: err.message || 'Internal server error',
      timestamp: new Date().toISOString()
    });
  });

  return app;
}

if (require.main === module) {
  const config = loadBotConfig();
  const store = DbService.connect(config.database.url, config.database.ssl);

  createApp(store, config).listen(config.port, () => {
    console.log(`🚀 Tip bot API server running on port ${config.port}`);
    console.log(`📊 Environment: ${process.env.NODE_ENV || 'development'}`);
    console.log(`🤖 Reddit bot: /u/${config.reddit.username}`);
  });
}
