import type { Request, Response } from 'express';
import { z } from 'zod';
import type { AutoAcceptService } from '../../services/autoAcceptService';

const notificationSchema = z.object({
  sourceApplicationId: z.string().min(1),
  kind: z.enum(['window-state-changed', 'content-changed', 'click', 'focus']),
  eventTime: z.number().int().nonnegative().optional()
});

/**
 * POST /api/notifications - feed a change notification from an external
 * event source through the event gate
 */
export const createNotificationHandler = (service: AutoAcceptService) => (req: Request, res: Response) => {
  const parsed = notificationSchema.safeParse(req.body);
  if (!parsed.success) {
    return res.status(400).json({
      error: {
        code: 'INVALID_NOTIFICATION',
        message: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ')
      }
    });
  }

  const decision = service.onChange(parsed.data);
  return res.status(202).json({ decision });
};
