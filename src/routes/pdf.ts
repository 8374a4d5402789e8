import { randomUUID } from 'crypto';
import { Router, Request, Response, NextFunction } from 'express';
import { RenderServiceError, ValidationError } from '../errors';
import { RenderLifecycleManager } from '../services/RenderLifecycleManager';
import { ErrorResponse } from '../types';

export function toErrorResponse(error: RenderServiceError): ErrorResponse {
  return {
    success: false,
    error: {
      code: error.code,
      kind: error.kind,
      message: error.message,
      ...(error instanceof ValidationError ? { field: error.field } : {}),
    },
  };
}

function requestIdOf(req: Request): string {
  return req.header('x-request-id') ?? randomUUID().slice(0, 8);
}

export function createPdfRouter(manager: RenderLifecycleManager): Router {
  const router = Router();

  /**
   * POST /pdf
   * Render HTML to PDF
   */
  router.post('/pdf', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const controller = new AbortController();
      // 'close' before the response is written means the caller went away
      res.on('close', () => {
        if (!res.writableEnded) {
          controller.abort();
        }
      });

      const result = await manager.handle(req.body, {
        signal: controller.signal,
        requestId: requestIdOf(req),
      });

      if (controller.signal.aborted) {
        return;
      }

      res.setHeader('X-Processing-Time', `${result.durationMs}ms`);
      if (!result.success) {
        res.status(result.error.status).json(toErrorResponse(result.error));
        return;
      }

      res.status(200);
      res.setHeader('Content-Type', 'application/pdf');
      res.setHeader('Content-Disposition', 'inline; filename=document.pdf');
      res.send(result.pdf);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
