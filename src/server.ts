import express, { Express, NextFunction, Request, Response } from 'express';
import { existsSync } from 'fs';
import { Server } from 'http';
import { extname, join, resolve } from 'path';
import { timestamp } from './logger';
import { Logger } from './types';

export interface AssetServerOptions {
  spaFallback?: boolean;
  logger?: Logger;
}

/**
 * Static server for the patched asset tree.
 * Must only be created after the injector has finished.
 */
export function createAssetServer(rootDir: string, options: AssetServerOptions = {}): Express {
  const app = express();
  const root = resolve(rootDir);
  const indexPath = join(root, 'index.html');
  const spaFallback = options.spaFallback ?? true;

  app.disable('x-powered-by');

  if (options.logger) {
    const logger = options.logger;
    app.use((req: Request, _res: Response, next: NextFunction) => {
      logger.info(`[${timestamp()}] 📨 ${req.method} ${req.path}`);
      next();
    });
  }

  app.use(express.static(root));

  // Client-side routes: extension-less GETs fall back to the app shell
  app.use((req: Request, res: Response, next: NextFunction) => {
    const isPageRoute = (req.method === 'GET' || req.method === 'HEAD') && extname(req.path) === '';
    if (!spaFallback || !isPageRoute || !existsSync(indexPath)) {
      next();
      return;
    }
    res.sendFile(indexPath);
  });

  app.use((_req: Request, res: Response) => {
    res.status(404).type('text/plain').send('Not found');
  });

  return app;
}

export function startAssetServer(
  rootDir: string,
  port: number,
  options: AssetServerOptions = {}
): Promise<Server> {
  const app = createAssetServer(rootDir, options);

  return new Promise((resolveServer, reject) => {
    const server = app.listen(port);
    server.once('listening', () => {
      options.logger?.info(`🌐 Serving ${resolve(rootDir)} on http://localhost:${port}`);
      resolveServer(server);
    });
    server.once('error', reject);
  });
}
