import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import cookieParser from 'cookie-parser';
import multer from 'multer';
import { authRouter } from './routes/auth';
import { createOrdersRouter } from './routes/orders';
import type { OrderStore } from './services/orderStore';
import { HttpError } from './utils/errors';

export function createApp(store: OrderStore) {
  const app = express();
  app.use(helmet());
  app.use(cors({ origin: true, credentials: true }));
  app.use(morgan('dev'));
  app.use(express.json({ limit: '10mb' }));
  app.use(cookieParser());

  app.get('/health', (_req, res) => {
    res.json({ ok: true, service: 'order-book-api' });
  });

  app.use('/api/auth', authRouter);
  app.use('/api/orders', createOrdersRouter(store));

  // Not found handler
  app.use((_req, res) => {
    res.status(404).json({ success: false, message: 'Not found' });
  });

  // Error handler
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (err instanceof multer.MulterError) {
      const status = err.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
      return res.status(status).json({ success: false, message: err.message });
    }
    if (err instanceof HttpError) {
      return res.status(err.statusCode).json({ success: false, message: err.message });
    }
    console.error('[ERROR]', err);
    return res.status(500).json({ success: false, message: err instanceof Error ? err.message : 'Internal server error' });
  });

  return app;
}
