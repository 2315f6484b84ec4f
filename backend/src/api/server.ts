import express from 'express';
import type { Express } from 'express';
import type { Server } from 'http';
import type { AutoAcceptService } from '../services/autoAcceptService';
import { createServiceLogger } from '../services/logger';
import { createApiRouter } from './routes';

const log = createServiceLogger('status-api');

export const createServer = (service: AutoAcceptService): Express => {
  const app = express();

  app.disable('x-powered-by');
  app.use(express.json());

  app.use('/api', createApiRouter(service));

  app.use((req, res) => {
    res.status(404).json({ error: { code: 'NOT_FOUND', message: `Route ${req.path} not found` } });
  });

  return app;
};

export const startServer = (service: AutoAcceptService, port = 3001, host = '127.0.0.1'): Server => {
  const app = createServer(service);
  return app.listen(port, host, () => {
    log.info('server_listening', `Status API listening on http://${host}:${port}`);
  });
};
