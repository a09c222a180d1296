import { Router, Request, Response } from 'express';
import { BotConfig } from '../../../config/bot.config';
import { LedgerSession } from '../../models/ledger';
import { formatAmount } from '../../utils/amount';

export function balanceRoutes(store: LedgerSession, config: BotConfig): Router {
  const router = Router();
  const decimals = config.coin.decimals;

  /**
   * GET /api/balance/:username
   * Balance and pending outgoing tips
   */
  router.get('/:username', async (req: Request, res: Response) => {
    try {
      const user = await store.getUser(req.params.username);
      if (!user) {
        return res.status(404).json({ error: 'User not found' });
      }

      const pendingOutgoing = await store.sumPendingTips(user.username);

      res.json({
        username: user.username,
        coin: config.coin.name,
        balance: formatAmount(user.balance, decimals),
        pendingOutgoing: formatAmount(pendingOutgoing, decimals),
        available: formatAmount(user.balance - pendingOutgoing, decimals),
        registeredAt: user.registeredAt.toISOString()
      });

    } catch (error) {
      console.error('Balance fetch error:', error);
      res.status(500).json({
        error: error instanceof Error ? error.message : 'Internal server error'
      });
    }
  });

  /**
   * GET /api/balance/:username/actions
   * Most recent actions sent or received by the user
   */
  router.get('/:username/actions', async (req: Request, res: Response) => {
    try {
      const limit = parseInt(String(req.query.limit ?? ''), 10) || 50;

      const user = await store.getUser(req.params.username);
      if (!user) {
        return res.status(404).json({ error: 'User not found' });
      }

      const actions = await store.listActions({ involving: user.username, newestFirst: true, limit });

      res.json({
        username: user.username,
        actions: actions.map(action => ({
          id: action.id,
          type: action.type,
          state: action.state,
          from: action.fromUser,
          to: action.toUser,
          amount: action.amount === null ? null : formatAmount(action.amount, decimals),
          address: action.address,
          txid: action.txid,
          permalink: action.permalink,
          createdAt: action.createdAt.toISOString()
        }))
      });

    } catch (error) {
      console.error('Actions fetch error:', error);
      res.status(500).json({
        error: error instanceof Error ? error.message : 'Internal server error'
      });
    }
  });

  return router;
}
