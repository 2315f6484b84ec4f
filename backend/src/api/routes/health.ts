import type { Request, Response } from 'express';
import type { AutoAcceptService } from '../../services/autoAcceptService';
import type { HealthResponse } from '../../types/health';

const startedAt = Date.now();

export const createHealthHandler = (service: AutoAcceptService) => (_req: Request, res: Response) => {
  const status = service.status();
  const payload: HealthResponse = {
    status: status.serviceEnabled ? 'ok' : 'disabled',
    uptimeMs: Date.now() - startedAt,
    timestamp: new Date().toISOString(),
    processing: status.processing
  };
  res.status(200).json(payload);
};
