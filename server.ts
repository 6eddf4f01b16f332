import http from 'http';

import { connectDatabase, disconnectDatabase } from './db';
import { createApp } from './src/app';
import { AppConfig, loadConfig, loadDotenv } from './src/config/env';
import { MemoryReviewRepository } from './src/repositories/memoryReviewRepository';
import { MongoReviewRepository } from './src/repositories/mongoReviewRepository';
import { MemoryUserRepository, MongoUserRepository } from './src/repositories/userRepositories';
import { OpenWeatherClient } from './src/services/weather';

loadDotenv();

async function createRepositories(config: AppConfig) {
  if (config.storageDriver === 'memory') {
    console.log('⚠️ Using in-memory storage, data is lost on restart');
    return { reviews: new MemoryReviewRepository(), users: new MemoryUserRepository() };
  }
  if (!config.mongoUri) {
    throw new Error('MONGODB_URI is not defined in .env!');
  }
  await connectDatabase(config.mongoUri);
  return { reviews: new MongoReviewRepository(), users: new MongoUserRepository() };
}

async function main() {
  const config = loadConfig();
  const { reviews, users } = await createRepositories(config);

  const weather = new OpenWeatherClient({
    apiKey: config.weather.apiKey,
    baseUrl: config.weather.baseUrl,
    timeoutMs: config.weather.timeoutMs,
  });

  const app = createApp({ config, reviews, users, weather });
  const server = http.createServer(app);

  server.listen(config.port, () => {
    console.log(`Server running on port ${config.port}`);
  });

  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down`);
    server.close(err => {
      if (err) console.error('Error while closing HTTP server:', err);
      const done = config.storageDriver === 'mongo' ? disconnectDatabase() : Promise.resolve();
      done
        .catch(dbErr => console.error('Error while closing MongoDB connection:', dbErr))
        .finally(() => process.exit(err ? 1 : 0));
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch(err => {
  console.error('❌ Server failed to start:', err);
  process.exit(1);
});
