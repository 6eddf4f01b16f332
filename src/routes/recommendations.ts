import express from 'express';
import { RecommendationService } from '../services/recommendations';
import { handleRouteError } from '../utils/httpErrors';

function cityParam(query: unknown): unknown {
  if (typeof query !== 'object' || query === null || !('city' in query)) return undefined;
  return query.city;
}

export function createRecommendationsRouter(recommendations: RecommendationService) {
  const router = express.Router();

  // GET /api/recommendations/locations?city=Boston
  router.get('/locations', async (req, res) => {
    try {
      res.json(await recommendations.locationsFor(cityParam(req.query)));
    } catch (error) {
      handleRouteError(res, error, 'GET /api/recommendations/locations');
    }
  });

  router.get('/snacks', async (req, res) => {
    try {
      res.json(await recommendations.snacksFor(cityParam(req.query)));
    } catch (error) {
      handleRouteError(res, error, 'GET /api/recommendations/snacks');
    }
  });

  router.get('/seasonal', async (req, res) => {
    try {
      res.json(await recommendations.seasonalFor(cityParam(req.query)));
    } catch (error) {
      handleRouteError(res, error, 'GET /api/recommendations/seasonal');
    }
  });

  router.get('/pairing', async (req, res) => {
    try {
      res.json(await recommendations.pairingFor(cityParam(req.query)));
    } catch (error) {
      handleRouteError(res, error, 'GET /api/recommendations/pairing');
    }
  });

  return router;
}

export function createWeatherRouter(recommendations: RecommendationService) {
  const router = express.Router();

  // GET /api/weather?city=Boston
  router.get('/', async (req, res) => {
    try {
      res.json(await recommendations.currentWeather(cityParam(req.query)));
    } catch (error) {
      handleRouteError(res, error, 'GET /api/weather');
    }
  });

  return router;
}
