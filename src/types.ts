import type { ErrorCode, ErrorKind, RenderServiceError } from './errors';

export const PAPER_FORMATS = [
  'Letter',
  'Legal',
  'Tabloid',
  'Ledger',
  'A0',
  'A1',
  'A2',
  'A3',
  'A4',
  'A5',
  'A6',
] as const;

export type PaperFormat = (typeof PAPER_FORMATS)[number];

/**
 * Rendering options as they arrive on the wire (POST /pdf body)
 */
export interface RawRenderOptions {
  format?: string;
  landscape?: boolean;
  print_background?: boolean;
  margin_top?: string;
  margin_bottom?: string;
  margin_left?: string;
  margin_right?: string;
  /** 0.1 to 2.0 */
  scale?: number;
  /** Size the page to the rendered content instead of a paper format */
  fit_content?: boolean;
}

export interface PdfRequestBody {
  html: string;
  options?: RawRenderOptions;
}

export interface PageMargin {
  top?: string;
  bottom?: string;
  left?: string;
  right?: string;
}

/**
 * Normalized rendering options. Frozen once built.
 */
export interface RenderOptions {
  readonly format: PaperFormat;
  readonly landscape: boolean;
  readonly printBackground: boolean;
  readonly margin: Readonly<PageMargin>;
  readonly scale?: number;
  readonly fitContent: boolean;
}

export interface RenderRequest {
  readonly html: string;
  readonly options: RenderOptions;
}

export type RenderResult =
  | { success: true; pdf: Buffer; durationMs: number }
  | { success: false; error: RenderServiceError; durationMs: number };

export interface ErrorResponse {
  success: false;
  error: {
    code: ErrorCode;
    kind?: ErrorKind;
    message: string;
    field?: string;
  };
}

export interface HealthResponse {
  status: 'ok' | 'degraded';
  service: string;
  engine?: 'connected' | 'disconnected';
}
