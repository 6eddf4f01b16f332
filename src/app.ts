import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import compression from 'compression';

import { AppConfig } from './config/env';
import { authenticateToken } from './middleware/auth';
import { ReviewRepository, UserRepository } from './repositories/types';
import { AccountService } from './services/accounts';
import { RecommendationService } from './services/recommendations';
import { ReviewStore } from './services/reviewStore';
import { WeatherLookup } from './services/weather';
import { createAuthRouter } from './routes/auth';
import { createRecommendationsRouter, createWeatherRouter } from './routes/recommendations';
import { createReviewsRouter } from './routes/reviews';

export interface AppDependencies {
  config: AppConfig;
  reviews: ReviewRepository;
  users: UserRepository;
  weather: WeatherLookup;
  random?: () => number;
}

function isBodyParseError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed';
}

export function createApp({ config, reviews, users, weather, random }: AppDependencies) {
  const store = new ReviewStore(reviews);
  const recommendations = new RecommendationService(weather, random);
  const accounts = new AccountService(users, {
    jwtSecret: config.jwt.secret,
    jwtExpiresInSeconds: config.jwt.expiresInSeconds,
    bcryptRounds: config.bcryptRounds,
  });
  const requireAuth = authenticateToken(config.jwt.secret);

  const app = express();

  app.use(helmet());
  app.use(cors({
    origin: function(origin, callback) {
      // Requests without an origin (curl, server to server) are allowed
      if (!origin || config.corsOrigins.includes(origin)) {
        callback(null, true);
      } else {
        callback(new Error('Not allowed by CORS'));
      }
    },
    credentials: true,
    allowedHeaders: ['Content-Type', 'Authorization'],
  }));
  app.use(express.json());
  app.use(compression());
  if (process.env.NODE_ENV !== 'test') {
    app.use(morgan('combined'));
  }

  app.get('/api/health', (req, res) => {
    res.json({ status: 'ok', storage: config.storageDriver });
  });

  app.use('/api/auth', createAuthRouter(accounts));
  app.use('/api/weather', createWeatherRouter(recommendations));
  app.use('/api/recommendations', createRecommendationsRouter(recommendations));
  app.use('/api/reviews', createReviewsRouter({ store, requireAuth, allowReset: config.allowStoreReset }));

  app.use((req, res) => {
    res.status(404).json({ error: `Route ${req.method} ${req.path} not found` });
  });

  app.use((err: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    if (isBodyParseError(err)) {
      res.status(400).json({ error: 'Malformed JSON body' });
      return;
    }
    console.error(err);
    res.status(500).json({ error: 'Something went wrong!' });
  });

  return app;
}
