import express, { Express, Request, Response } from 'express';
import { loadConfig } from './config/config';
import { logger } from './utils/logger';
import { handleError } from './utils/errorHandler';
import { createImageServices, DestinationImageService, ImageResolver } from './images';
import { ImageCacheStore } from './images/cache/imageCacheStore';
import { createImageRouter } from './routes/imageRoutes';

export interface AppServices {
  pipeline: ImageResolver;
  destinations: DestinationImageService;
  search: { readonly configured: boolean };
  ranker: { readonly available: boolean };
  cache: Pick<ImageCacheStore, 'kind'>;
}

export function createApp(services: AppServices): Express {
  const app = express();

  app.use(express.json({ limit: '100kb' }));

  app.get('/health', (req: Request, res: Response) => {
    res.json({
      status: 'ok',
      search: services.search.configured,
      ranking: services.ranker.available,
      cache: services.cache.kind,
    });
  });

  app.use('/api', createImageRouter({ resolver: services.pipeline, destinations: services.destinations }));

  return app;
}

export async function startServer(): Promise<void> {
  const config = loadConfig();
  const services = await createImageServices(config);
  const app = createApp(services);

  const server = app.listen(config.server.port, () => {
    logger.info(`Server running at http://localhost:${config.server.port}`);
  });

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down`);
    server.close(() => {
      services.close().then(
        () => process.exit(0),
        error => {
          handleError(error, 'shutdown');
          process.exit(1);
        }
      );
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

