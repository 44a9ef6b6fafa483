import { Router, Request, Response } from 'express';
import type { ReserveMintSystem } from '../system';

export interface HealthOptions {
  /** Status of the Redis relay, when one is running */
  eventRelay?: () => { connected: boolean };
}

export const createHealthRoutes = (system: ReserveMintSystem, options: HealthOptions = {}): Router => {
  const router = Router();

  const relayStatus = (): { enabled: boolean; connected: boolean } => {
    if (!options.eventRelay) {
      return { enabled: false, connected: false };
    }
    return { enabled: true, connected: options.eventRelay().connected };
  };

  router.get('/', (_req: Request, res: Response) => {
    const relay = relayStatus();
    const isHealthy = !relay.enabled || relay.connected;

    res.status(isHealthy ? 200 : 503).json({
      status: isHealthy ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      services: {
        ledger: {
          paused: system.ledger.paused(),
          totalSupply: system.ledger.totalSupply(),
          latestSequence: system.events.latestSequence(),
        },
        eventRelay: relay,
      },
    });
  });

  router.get('/live', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'alive',
      timestamp: new Date().toISOString(),
    });
  });

  router.get('/ready', (_req: Request, res: Response) => {
    const relay = relayStatus();
    const isReady = !relay.enabled || relay.connected;

    res.status(isReady ? 200 : 503).json({
      status: isReady ? 'ready' : 'not ready',
      timestamp: new Date().toISOString(),
    });
  });

  return router;
};
