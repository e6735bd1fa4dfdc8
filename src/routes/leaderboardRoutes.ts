import express, { Router } from 'express';
import { LeaderboardController } from '../controllers/LeaderboardController';
import { SUPPORTED_IMAGE_TYPES } from '../services/ocr';

export const MAX_IMAGE_SIZE = '10mb';

export function createLeaderboardRoutes(controller: LeaderboardController): Router {
  const router = Router();

  // POST /leaderboard/extract - OCR a leaderboard screenshot (raw image body)
  router.post(
    '/leaderboard/extract',
    express.raw({ type: [...SUPPORTED_IMAGE_TYPES], limit: MAX_IMAGE_SIZE }),
    controller.extract
  );

  // POST /leaderboard/entries - Submit times
  router.post('/leaderboard/entries', controller.submit);

  // GET /leaderboard/entries - Recent submissions
  router.get('/leaderboard/entries', controller.getRecent);

  router.get('/roster', controller.getRoster);

  router.get('/settings', controller.getSettings);
  router.put('/settings', controller.updateSettings);

  // GET /health - Health check
  router.get('/health', controller.healthCheck);

  return router;
}
