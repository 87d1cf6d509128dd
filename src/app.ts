import express, { Express } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import morgan from 'morgan';
import { Store } from 'express-session';
import swaggerUi from 'swagger-ui-express';
import { config } from './lib/config.js';
import { buildSwaggerSpec } from './lib/swagger.js';
import { errorHandler, notFound } from './middleware/errorHandler.js';
import { createSessionMiddleware } from './middleware/session.js';
import { RouteDeps, registerRoutes } from './routes/index.js';

export interface AppOptions extends RouteDeps {
  sessionStore?: Store;
  requestLogging?: boolean;
}

export function createApp(options: AppOptions): Express {
  const app = express();

  if (config.isProduction) {
    // Secure session cookies behind the hosting proxy
    app.set('trust proxy', 1);
  }

  app.use(helmet({ contentSecurityPolicy: false }));
  app.use(cors({ origin: true, credentials: true }));
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true }));

  if (options.requestLogging !== false) {
    app.use(morgan('dev'));
  }

  app.use(createSessionMiddleware(options.sessionStore));

  registerRoutes(app, options);

  app.use('/docs', swaggerUi.serve, swaggerUi.setup(buildSwaggerSpec()));

  app.use(notFound);
  app.use(errorHandler);

  return app;
}
