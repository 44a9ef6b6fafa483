import { Router, Request, Response, NextFunction } from 'express';
import { matchedData, query } from 'express-validator';
import type { EventLog } from '../events/eventLog';
import { validateRequest } from '../middlewares/validateRequest';
import { EventType } from '../types/events';

const EVENT_TYPES: string[] = Object.values(EventType);

const isEventType = (value: unknown): value is EventType =>
  typeof value === 'string' && EVENT_TYPES.includes(value);

const listValidation = [
  query('after').optional().isInt({ min: 0 }).withMessage('after must be a non-negative integer').toInt(),
  query('limit').optional().isInt({ min: 1, max: 500 }).withMessage('limit must be between 1 and 500').toInt(),
  query('type').optional().isIn(EVENT_TYPES).withMessage(`type must be one of ${EVENT_TYPES.join(', ')}`),
];

export const createEventRoutes = (events: EventLog): Router => {
  const router = Router();

  // GET /events - Committed notifications, oldest first
  router.get('/', listValidation, validateRequest, (req: Request, res: Response, next: NextFunction) => {
    try {
      const filters = matchedData(req, { locations: ['query'] });
      const after = typeof filters.after === 'number' ? filters.after : undefined;
      const limit = typeof filters.limit === 'number' ? filters.limit : undefined;
      const eventType = isEventType(filters.type) ? filters.type : undefined;

      res.status(200).json({
        success: true,
        data: {
          events: events.list({ after, limit, eventType }),
          latestSequence: events.latestSequence(),
        },
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
};
