import type { Request, Response } from 'express';
import type { AutoAcceptService } from '../../services/autoAcceptService';
import type { StatusResponse } from '../../types/health';

export const createStatusHandler = (service: AutoAcceptService) => (_req: Request, res: Response) => {
  const status = service.status();
  const payload: StatusResponse = {
    ...status,
    lastActivityAt: new Date(status.lastActivityTime).toISOString()
  };
  res.status(200).json(payload);
};
