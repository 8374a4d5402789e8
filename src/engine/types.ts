import type { PaperFormat } from '../types';

/**
 * Engine abstraction
 * The browser is reached only through these interfaces so tests can run a fake engine.
 */

export interface ContentSize {
  width: number;
  height: number;
}

/**
 * Print parameters in the engine's own vocabulary
 */
export interface PdfParameters {
  format?: PaperFormat;
  width?: string;
  height?: string;
  landscape?: boolean;
  printBackground: boolean;
  margin?: {
    top?: string;
    right?: string;
    bottom?: string;
    left?: string;
  };
  scale?: number;
  /** Engine-side timeout for the print call (ms) */
  timeout?: number;
}

/**
 * A page inside an isolated context
 */
export interface RenderPage {
  /** Load the HTML as the document and resolve once the engine reports `load` */
  setContent(html: string, options: { timeout: number }): Promise<void>;
  /** Resolve once web fonts have finished loading */
  waitForFonts(): Promise<void>;
  /** Bounds of `.export-container`, or of the body when there is none */
  measureContent(): Promise<ContentSize>;
  /** Pin the content to the origin and size the viewport to it */
  fitToContent(size: ContentSize): Promise<void>;
  pdf(parameters: PdfParameters): Promise<Uint8Array>;
}

/**
 * Isolated browsing session: no cookies, cache or storage shared with any other context
 */
export interface RenderContext {
  readonly id: string;
  newPage(): Promise<RenderPage>;
  close(): Promise<void>;
}

/**
 * A live connection to one engine process
 */
export interface EngineConnection {
  isConnected(): boolean;
  createContext(): Promise<RenderContext>;
  /** Register a listener for the engine going away unexpectedly */
  onDisconnect(listener: () => void): void;
  close(): Promise<void>;
}

export interface EngineDriver {
  readonly name: string;
  launch(): Promise<EngineConnection>;
}
