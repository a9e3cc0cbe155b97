import express, { type Express, type Request, type Response } from 'express';
import { attachBearerUser } from './middleware/attachBearerUser.js';
import { registerRoutes } from './routes/registry.js';
import { errorMiddleware } from './utils/httpHandler.js';

export function createApp(): Express {
  const app = express();

  // Trust proxy when deployed behind a load balancer
  if (process.env.NODE_ENV === 'production') {
    app.set('trust proxy', 1);
  }

  // ICS documents arrive as JSON strings, so the body limit matches the upload limit.
  app.use(express.json({ limit: '10mb' }));
  app.use(attachBearerUser);

  app.get('/', (_req: Request, res: Response) => {
    res.json({ status: 'ok', message: 'calsync API is running' });
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  registerRoutes(app);

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });
  app.use(errorMiddleware);

  return app;
}
