import express, { RequestHandler } from 'express';
import { ReviewStore } from '../services/reviewStore';
import { formatReview } from '../utils/formatReview';
import { handleRouteError } from '../utils/httpErrors';

export interface ReviewsRouterOptions {
  store: ReviewStore;
  requireAuth: RequestHandler;
  allowReset: boolean;
}

export function createReviewsRouter({ store, requireAuth, allowReset }: ReviewsRouterOptions) {
  const router = express.Router();

  // GET /api/reviews — all live reviews, oldest first
  router.get('/', async (req, res) => {
    try {
      const reviews = await store.listReviews();
      res.json(reviews.map(formatReview));
    } catch (error) {
      handleRouteError(res, error, 'GET /api/reviews');
    }
  });

  router.get('/favorites', async (req, res) => {
    try {
      const favorites = await store.listFavorites();
      res.json(favorites.map(formatReview));
    } catch (error) {
      handleRouteError(res, error, 'GET /api/reviews/favorites');
    }
  });

  router.get('/by-name/:name', async (req, res) => {
    try {
      const review = await store.getByName(req.params.name);
      res.json(formatReview(review));
    } catch (error) {
      handleRouteError(res, error, 'GET /api/reviews/by-name/:name');
    }
  });

  router.get('/:id', async (req, res) => {
    try {
      const review = await store.getById(req.params.id);
      res.json(formatReview(review));
    } catch (error) {
      handleRouteError(res, error, 'GET /api/reviews/:id');
    }
  });

  router.post('/', requireAuth, async (req, res) => {
    try {
      const { name, location, rating, favorite, review } = req.body ?? {};
      const created = await store.create(name, location, rating, favorite ?? false, review);
      res.status(201).json(formatReview(created));
    } catch (error) {
      handleRouteError(res, error, 'POST /api/reviews');
    }
  });

  router.patch('/:id/review', requireAuth, async (req, res) => {
    try {
      const updated = await store.updateReviewText(req.params.id, req.body?.review);
      res.json(formatReview(updated));
    } catch (error) {
      handleRouteError(res, error, 'PATCH /api/reviews/:id/review');
    }
  });

  router.patch('/:id/rating', requireAuth, async (req, res) => {
    try {
      const updated = await store.updateRating(req.params.id, req.body?.rating);
      res.json(formatReview(updated));
    } catch (error) {
      handleRouteError(res, error, 'PATCH /api/reviews/:id/rating');
    }
  });

  router.patch('/:id/favorite', requireAuth, async (req, res) => {
    try {
      const updated = await store.updateFavorite(req.params.id, req.body?.favorite);
      res.json(formatReview(updated));
    } catch (error) {
      handleRouteError(res, error, 'PATCH /api/reviews/:id/favorite');
    }
  });

  router.delete('/:id', requireAuth, async (req, res) => {
    try {
      await store.delete(req.params.id);
      res.status(204).end();
    } catch (error) {
      handleRouteError(res, error, 'DELETE /api/reviews/:id');
    }
  });

  // Wipes the whole store; only mounted when the reset switch is on.
  if (allowReset) {
    router.delete('/', requireAuth, async (req, res) => {
      try {
        await store.clearAll();
        res.status(204).end();
      } catch (error) {
        handleRouteError(res, error, 'DELETE /api/reviews');
      }
    });
  }

  return router;
}
