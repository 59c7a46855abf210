import { Router } from 'express';
import { CouncilController } from '../controllers/CouncilController';
import { asyncHandler } from '../middleware/errorMiddleware';
import { iterationRateLimiter } from '../middleware/rateLimitMiddleware';

export function createCouncilRoutes(controller: CouncilController): Router {
  const router = Router();

  router.get('/agents', asyncHandler((req, res) => controller.listAgents(req, res)));
  router.get('/history', asyncHandler((req, res) => controller.getHistory(req, res)));
  router.get('/history/series', asyncHandler((req, res) => controller.getWeightSeries(req, res)));

  router.post('/iterations', iterationRateLimiter, asyncHandler((req, res) => controller.runIteration(req, res)));
  // before /iterations/:index so "compare" is not taken for an index
  router.get('/iterations/compare', asyncHandler((req, res) => controller.compareIterations(req, res)));
  router.get('/iterations/:index', asyncHandler((req, res) => controller.getIteration(req, res)));
  router.post('/iterations/:index/outcome', asyncHandler((req, res) => controller.submitOutcome(req, res)));

  return router;
}
