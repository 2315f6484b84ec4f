import { Router } from 'express';
import type { AutoAcceptService } from '../../services/autoAcceptService';
import { createHealthHandler } from './health';
import { createNotificationHandler } from './notifications';
import { createStatusHandler } from './status';

export const createApiRouter = (service: AutoAcceptService) => {
  const routes = Router();

  routes.get('/health', createHealthHandler(service));
  routes.get('/status', createStatusHandler(service));
  routes.post('/notifications', createNotificationHandler(service));

  return routes;
};
