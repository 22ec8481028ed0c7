import 'dotenv/config';
import express, { NextFunction, Request, Response } from 'express';
import path from 'path';

import { resolveExplorerConfig } from '../config/explorer_config';
import { ApiError, handleExplore, listMaps, readNamedMap } from './api';

function clientErrorStatus(error: unknown): number | null {
  if (typeof error !== 'object' || error === null) {
    return null;
  }
  const status = 'status' in error ? error.status : 'statusCode' in error ? error.statusCode : null;
  if (typeof status === 'number' && status >= 400 && status < 500) {
    return status;
  }
  return null;
}

export function createServer(projectRoot: string, defaultMaxMoves: number) {
  const app = express();
  const mapsDir = path.resolve(projectRoot, 'maps');

  app.use(express.json({ limit: '256kb' }));

  app.get('/api/maps', async (_req, res, next) => {
    try {
      res.json({ maps: await listMaps(mapsDir) });
    } catch (error) {
      next(error);
    }
  });

  app.get('/api/maps/:name', async (req, res, next) => {
    try {
      const text = await readNamedMap(mapsDir, req.params.name);
      res.type('text/plain').send(text);
    } catch (error) {
      next(error);
    }
  });

  app.post('/api/explore', async (req, res, next) => {
    try {
      res.json(await handleExplore(req.body, mapsDir, defaultMaxMoves));
    } catch (error) {
      next(error);
    }
  });

  app.use((_req, res) => {
    res.status(404).send('Not Found');
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof ApiError) {
      res.status(error.status).json({ error: error.message });
      return;
    }
    const status = clientErrorStatus(error);
    if (status !== null) {
      res.status(status).json({ error: error instanceof Error ? error.message : 'Bad request' });
      return;
    }
    // eslint-disable-next-line no-console
    console.error('Request failed:', error);
    res.status(500).json({ error: 'Exploration failed', details: String(error) });
  });

  return app;
}

async function main(): Promise<void> {
  const projectRoot = path.resolve(__dirname, '..', '..');
  const port = Number(process.env.PORT ?? 5173);
  const config = resolveExplorerConfig();
  const app = createServer(projectRoot, config.maxMoves);
  app.listen(port, () => {
    // eslint-disable-next-line no-console
    console.log(`Maze explorer API running at http://localhost:${port}`);
  });
}

if (require.main === module) {
  main().catch((error) => {
    // eslint-disable-next-line no-console
    console.error(error);
    process.exit(1);
  });
}
