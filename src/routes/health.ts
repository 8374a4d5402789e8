import { Router, Request, Response } from 'express';
import { HealthResponse } from '../types';

export interface EngineStatus {
  isConnected(): boolean;
}

/**
 * GET /health reports that the process is up.
 * GET /health?deep=true also checks the engine connection and answers 503 when it is down.
 */
export function createHealthRouter(serviceName: string, engine: EngineStatus): Router {
  const router = Router();

  router.get('/health', (req: Request, res: Response) => {
    if (req.query.deep !== 'true') {
      const response: HealthResponse = { status: 'ok', service: serviceName };
      res.json(response);
      return;
    }

    const connected = engine.isConnected();
    const response: HealthResponse = {
      status: connected ? 'ok' : 'degraded',
      service: serviceName,
      engine: connected ? 'connected' : 'disconnected',
    };
    res.status(connected ? 200 : 503).json(response);
  });

  return router;
}
