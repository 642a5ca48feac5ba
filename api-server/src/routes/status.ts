import { Router } from 'express';
import { WhaleService } from '../services/whaleService';
import { config } from '../../../shared/config';

// GET /api/status - 快取與行程狀態
export const createStatusRoutes = (whales: WhaleService) => {
  const router = Router();

  router.get('/', (req, res) => {
    res.json({
      success: true,
      data: {
        cache: whales.getCacheState(),
        api_server: {
          env: config.server.env,
          node_version: process.version,
          uptime: process.uptime(),
        },
        timestamp: new Date().toISOString()
      }
    });
  });

  return router;
};
