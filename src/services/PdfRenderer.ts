import { RenderError } from '../errors';
import { ContextLease, RELEASE_WAIT_MS } from '../engine/EngineHandle';
import { ContentSize, PdfParameters, RenderContext } from '../engine/types';
import { RenderOptions } from '../types';
import { createLogger } from '../utils/logger';
import { remainingMs, withDeadline } from '../utils/deadline';

const log = createLogger('RENDER');

export interface RenderBudget {
  /** Absolute deadline (epoch ms) */
  deadline: number;
  /** Fires when the caller goes away */
  signal?: AbortSignal;
}

/**
 * Map normalized options onto the engine's print parameters
 */
export function toPdfParameters(options: RenderOptions, timeoutMs?: number): PdfParameters {
  const parameters: PdfParameters = {
    format: options.format,
    landscape: options.landscape,
    printBackground: options.printBackground,
  };

  if (Object.keys(options.margin).length > 0) {
    parameters.margin = { ...options.margin };
  }
  if (options.scale !== undefined) {
    parameters.scale = options.scale;
  }
  if (timeoutMs !== undefined) {
    parameters.timeout = timeoutMs;
  }
  return parameters;
}

/**
 * Print parameters for a single page sized exactly to the content
 */
export function toFitContentParameters(size: ContentSize, options: RenderOptions, timeoutMs?: number): PdfParameters {
  const parameters: PdfParameters = {
    width: `${Math.max(1, size.width)}px`,
    height: `${Math.max(1, size.height)}px`,
    printBackground: options.printBackground,
    margin: { top: '0', right: '0', bottom: '0', left: '0' },
  };
  if (timeoutMs !== undefined) {
    parameters.timeout = timeoutMs;
  }
  return parameters;
}

/**
 * Translate anything thrown while rendering into a RenderError.
 * The engine's own message stays in `cause` and is never sent to callers.
 */
export function classifyRenderError(error: unknown): RenderError {
  if (error instanceof RenderError) {
    return error;
  }
  if (error instanceof Error && error.name === 'TimeoutError') {
    return new RenderError('timeout', 'The rendering engine timed out', { cause: error });
  }
  return new RenderError('engine-failure', 'The rendering engine failed to produce a PDF', { cause: error });
}

/** Engine timeouts of 0 mean "wait forever"; always hand it at least 1ms */
function engineTimeout(deadline: number): number {
  return Math.max(1, remainingMs(deadline));
}

/**
 * Render Executor
 * Drives one document through the engine inside an already checked-out context.
 */
export class PdfRenderer {
  /**
   * Render HTML to PDF bytes before the deadline.
   * On timeout or cancellation the context close is started, and waited for briefly, before the error is thrown.
   */
  async render(lease: ContextLease, html: string, options: RenderOptions, budget: RenderBudget): Promise<Buffer> {
    const { deadline, signal } = budget;
    const timeLeft = remainingMs(deadline);

    try {
      if (timeLeft === 0) {
        throw new RenderError('timeout', 'Render deadline elapsed before rendering started');
      }
      if (signal?.aborted) {
        throw new RenderError('cancelled', 'Caller disconnected before rendering started');
      }
      return await withDeadline(this.produce(lease.context, html, options, deadline), {
        timeoutMs: timeLeft,
        onTimeout: () => new RenderError('timeout', `Render did not complete within ${timeLeft}ms`),
        signal,
        onAbort: () => new RenderError('cancelled', 'Caller disconnected before the render completed'),
      });
    } catch (error) {
      const classified = classifyRenderError(error);
      if (classified.kind !== 'engine-failure') {
        log.warn(`Render ${classified.kind}, destroying context ${lease.context.id}`);
        await lease.releaseWithin(RELEASE_WAIT_MS);
      }
      throw classified;
    }
  }

  private async produce(context: RenderContext, html: string, options: RenderOptions, deadline: number): Promise<Buffer> {
    const page = await context.newPage();

    await page.setContent(html, { timeout: engineTimeout(deadline) });
    await page.waitForFonts();

    let parameters: PdfParameters;
    if (options.fitContent) {
      const size = await page.measureContent();
      log.debug(`Content size: ${size.width}x${size.height}`);
      await page.fitToContent(size);
      parameters = toFitContentParameters(size, options, engineTimeout(deadline));
    } else {
      parameters = toPdfParameters(options, engineTimeout(deadline));
    }

    const bytes = await page.pdf(parameters);
    if (bytes.byteLength === 0) {
      throw new RenderError('engine-failure', 'The rendering engine produced an empty document');
    }

    log.debug(`Generated PDF: ${bytes.byteLength} bytes`, { contextId: context.id });
    return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }
}
