import { createApp } from './app.js';
import { config } from './lib/config.js';
import { connectMongo } from './lib/mongo.js';
import { logger } from './lib/logger.js';
import { envSecretResolver } from './lib/secrets.js';
import { createMongoSessionStore } from './middleware/session.js';
import { mongoCatalog } from './services/catalog.js';
import { firestoreEventSink } from './services/firestoreEventSink.js';
import { mongoOrderStore } from './services/orderStore.js';

const app = createApp({
  catalog: mongoCatalog,
  store: mongoOrderStore,
  secrets: envSecretResolver,
  notifications: { eventSink: firestoreEventSink, secrets: envSecretResolver },
  sessionStore: createMongoSessionStore(),
});

// Start listening right away; MongoDB connects in the background
app.listen(config.port, () => {
  logger.info(`Server listening on port ${config.port}`);
  logger.info('Health check available at /health');
});

connectMongo()
  .then(() => {
    logger.info('MongoDB connected successfully');
  })
  .catch((err: unknown) => {
    logger.error({ err }, 'Failed to connect to MongoDB - some features may not work');
  });

export default app;
