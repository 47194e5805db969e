import { Router } from 'express';
import type { Request, Response } from 'express';

export interface PublicRouterOptions {
  serviceName: string;
  version: string;
}

/**
 * Root and health endpoints
 */
export function createPublicRouter(options: PublicRouterOptions): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json({ message: `Welcome to the ${options.serviceName} API` });
  });

  router.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      version: options.version,
    });
  });

  return router;
}
