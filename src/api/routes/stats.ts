import { Router, Request, Response } from 'express';
import { StatsService } from '../../services/stats.service';

// Stats pages as Markdown, the same text the wiki gets
export function statsRoutes(stats: StatsService): Router {
  const router = Router();

  const send = (res: Response, markdown: string) => {
    res.type('text/markdown; charset=utf-8').send(markdown);
  };

  const fail = (res: Response, error: unknown) => {
    console.error('Stats error:', error);
    res.status(500).json({
      error: error instanceof Error ? error.message : 'Internal server error'
    });
  };

  router.get('/', async (req: Request, res: Response) => {
    try {
      send(res, await stats.globalPage());
    } catch (error) {
      fail(res, error);
    }
  });

  router.get('/tips', async (req: Request, res: Response) => {
    try {
      send(res, await stats.tipsPage());
    } catch (error) {
      fail(res, error);
    }
  });

  router.get('/users/:username', async (req: Request, res: Response) => {
    try {
      const page = await stats.userPage(req.params.username);
      if (page === null) {
        return res.status(404).json({ error: 'User not found' });
      }
      send(res, page);
    } catch (error) {
      fail(res, error);
    }
  });

  return router;
}
