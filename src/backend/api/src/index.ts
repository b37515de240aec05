/**
 * API Layer Entry Point
 *
 * Configures Express with request context, authentication, the recommendation
 * and contractor schedule routes, health probes and OpenAPI documentation.
 */

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import swaggerUi from 'swagger-ui-express';
import YAML from 'yamljs';
import path from 'path';
import { pathToFileURL } from 'url';
import { loadConfig, toError, type AppConfig } from '@dispatch/shared';

import { createServiceDependencies, type ServiceDependencies } from './bootstrap.js';
import { authMiddleware, type AuthConfig } from './middleware/auth.js';
import { requestContext } from './middleware/correlation.js';
import { errorHandler, notFoundHandler } from './middleware/error-handler.js';
import { createContractorsRouter } from './routes/contractors.js';
import { createRecommendationsRouter } from './routes/recommendations.js';

export const VERSION = '1.0.0';

export interface ApiConfig {
  port: number;
  auth: AuthConfig;
  enableSwagger: boolean;
}

export const defaultApiConfig: ApiConfig = {
  port: 3000,
  auth: {
    audience: 'api://contractor-dispatch',
    skipAuth: false,
  },
  enableSwagger: true,
};

export type ApiDependencies = Pick<
  ServiceDependencies,
  'engine' | 'availability' | 'logger' | 'metrics'
>;

export function toApiConfig(config: AppConfig): ApiConfig {
  return {
    port: config.PORT,
    auth: { ...defaultApiConfig.auth, skipAuth: config.SKIP_AUTH },
    enableSwagger: config.ENABLE_SWAGGER,
  };
}

/**
 * Creates and configures the Express application
 */
export function createApp(config: Partial<ApiConfig>, deps: ApiDependencies): Express {
  const fullConfig: ApiConfig = { ...defaultApiConfig, ...config };
  const { logger, metrics } = deps;
  const app = express();

  app.use(express.json());
  app.use(requestContext(metrics));

  app.use((_req: Request, res: Response, next: NextFunction) => {
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization, X-Correlation-ID');
    next();
  });

  app.options('*', (_req: Request, res: Response) => {
    res.sendStatus(204);
  });

  // Health check endpoint (no auth required)
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      version: VERSION,
      timestamp: new Date().toISOString(),
      metrics: metrics.getSummary().counters,
    });
  });

  app.get('/ready', (_req: Request, res: Response) => {
    res.json({ ready: true, timestamp: new Date().toISOString() });
  });

  app.get('/live', (_req: Request, res: Response) => {
    res.json({ alive: true, timestamp: new Date().toISOString() });
  });

  if (fullConfig.enableSwagger) {
    try {
      const openapiPath = path.join(process.cwd(), 'src/backend/api/src/openapi.yaml');
      const swaggerDocument = YAML.load(openapiPath);
      app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(swaggerDocument));
      app.get('/api-docs.json', (_req: Request, res: Response) => {
        res.json(swaggerDocument);
      });
    } catch (error) {
      logger.warn('Failed to load OpenAPI document', undefined, toError(error));
    }
  }

  const apiRouter = express.Router();
  apiRouter.use(authMiddleware(fullConfig.auth));
  apiRouter.use('/recommendations', createRecommendationsRouter(deps.engine));
  apiRouter.use('/contractors', createContractorsRouter(deps.engine, deps.availability));
  app.use('/api/v1', apiRouter);

  app.use(notFoundHandler());
  app.use(errorHandler(logger, metrics));

  return app;
}

/**
 * Starts the API server
 */
export function startServer(env: Record<string, string | undefined> = process.env): void {
  const appConfig = loadConfig(env);
  const apiConfig = toApiConfig(appConfig);
  const deps = createServiceDependencies(appConfig);
  const app = createApp(apiConfig, deps);

  app.listen(apiConfig.port, () => {
    deps.logger.info('Contractor dispatch API listening', {
      port: apiConfig.port,
      swagger: apiConfig.enableSwagger,
    });
  });
}

export { createServiceDependencies, seedRepositories, SeedDataSchema } from './bootstrap.js';
export { createMockToken, authMiddleware, UserRole, type AuthenticatedUser } from './middleware/auth.js';
export { requireRole } from './middleware/rbac.js';

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  startServer();
}
