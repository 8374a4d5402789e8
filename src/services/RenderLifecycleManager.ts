/**
 * Request Lifecycle Manager
 * normalize -> acquire context -> render -> release -> result
 */
import { AcquisitionError, RenderServiceError, errorMessage } from '../errors';
import { ContextLease, EngineHandle, RELEASE_WAIT_MS } from '../engine/EngineHandle';
import { RenderResult } from '../types';
import { createLogger } from '../utils/logger';
import { remainingMs, withDeadline } from '../utils/deadline';
import { parseRenderRequest } from './OptionsNormalizer';
import { PdfRenderer, classifyRenderError } from './PdfRenderer';

const log = createLogger('LIFECYCLE');

export interface LifecycleSettings {
  requestTimeoutMs: number;
  acquireTimeoutMs: number;
  maxHtmlBytes: number;
}

export interface HandleOptions {
  /** Aborted when the caller disconnects */
  signal?: AbortSignal;
  /** Correlates log lines for one request */
  requestId?: string;
}

export class RenderLifecycleManager {
  private inFlightCount = 0;

  constructor(
    private readonly engine: EngineHandle,
    private readonly renderer: PdfRenderer,
    private readonly settings: LifecycleSettings
  ) {}

  get inFlight(): number {
    return this.inFlightCount;
  }

  /**
   * Handle one render request end to end. Never throws; every failure comes back classified.
   */
  async handle(payload: unknown, options: HandleOptions = {}): Promise<RenderResult> {
    const startTime = Date.now();
    const requestId = options.requestId ?? '-';

    const parsed = parseRenderRequest(payload, { maxHtmlBytes: this.settings.maxHtmlBytes });
    if (!parsed.valid) {
      log.info(`[${requestId}] Rejected: ${parsed.error.message}`);
      return { success: false, error: parsed.error, durationMs: Date.now() - startTime };
    }

    const { html, options: renderOptions } = parsed.value;
    const deadline = startTime + this.settings.requestTimeoutMs;

    log.info(`[${requestId}] Starting PDF render`, {
      htmlSize: `${(Buffer.byteLength(html, 'utf8') / 1024).toFixed(2)}KB`,
      format: renderOptions.format,
      fitContent: renderOptions.fitContent,
    });

    this.inFlightCount++;
    try {
      const lease = await this.acquire(deadline, requestId);
      try {
        const pdf = await this.renderer.render(lease, html, renderOptions, { deadline, signal: options.signal });
        const durationMs = Date.now() - startTime;
        log.info(`[${requestId}] PDF render successful`, {
          fileSize: `${(pdf.length / 1024).toFixed(2)}KB`,
          processingTime: `${durationMs}ms`,
        });
        return { success: true, pdf, durationMs };
      } finally {
        // the renderer has already started the release after a timeout or cancellation
        if (!lease.released) {
          await lease.releaseWithin(RELEASE_WAIT_MS);
        }
      }
    } catch (error) {
      return this.fail(error, startTime, requestId);
    } finally {
      this.inFlightCount--;
    }
  }

  /**
   * Check out a context; on AcquisitionError reconnect the engine once and retry once.
   */
  private async acquire(deadline: number, requestId: string): Promise<ContextLease> {
    const timeout = (): number => Math.min(this.settings.acquireTimeoutMs, Math.max(1, remainingMs(deadline)));

    try {
      return await this.engine.checkoutContext(timeout());
    } catch (error) {
      if (!(error instanceof AcquisitionError)) throw error;
      log.warn(`[${requestId}] Context checkout failed (${error.message}), reconnecting engine`);
    }

    // reconnect is shared between requests; this one waits no longer than its own deadline
    await withDeadline(this.engine.reconnect(), {
      timeoutMs: Math.max(1, remainingMs(deadline)),
      onTimeout: () => new AcquisitionError('Engine did not reconnect before the request deadline'),
    });
    return this.engine.checkoutContext(timeout());
  }

  private fail(error: unknown, startTime: number, requestId: string): RenderResult {
    const classified: RenderServiceError = error instanceof RenderServiceError ? error : classifyRenderError(error);
    const durationMs = Date.now() - startTime;

    if (classified.kind === 'engine-failure' && !this.engine.isConnected()) {
      log.warn(`[${requestId}] Engine connection is down; it will be reconnected on the next request`);
    }

    const cause = classified.cause !== undefined ? errorMessage(classified.cause) : undefined;
    if (classified.kind === 'cancelled') {
      log.info(`[${requestId}] Render cancelled after ${durationMs}ms`);
    } else {
      log.error(`[${requestId}] Render failed (${classified.kind}) after ${durationMs}ms: ${classified.message}`, undefined, {
        cause,
      });
    }
    return { success: false, error: classified, durationMs };
  }
}
