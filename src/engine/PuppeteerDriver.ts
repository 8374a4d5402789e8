import { randomUUID } from 'crypto';
import puppeteer, { Browser, BrowserContext, BrowserEvent, Page } from 'puppeteer-core';
import { createLogger } from '../utils/logger';
import { ContentSize, EngineConnection, EngineDriver, PdfParameters, RenderContext, RenderPage } from './types';

const log = createLogger('ENGINE');

export const CHROMIUM_ARGS = [
  '--no-sandbox',
  '--disable-setuid-sandbox',
  '--disable-dev-shm-usage',
  '--disable-gpu',
  '--font-render-hinting=none',
];

/** Viewport used while measuring, so content width is not constrained */
const MEASURE_VIEWPORT = { width: 3000, height: 3000 };

const MEASURE_CONTENT_SCRIPT = `(() => {
  const container = document.querySelector('.export-container');
  if (container) {
    return { width: container.offsetWidth, height: container.offsetHeight };
  }
  return { width: document.body.scrollWidth, height: document.body.scrollHeight };
})()`;

const FONTS_READY_SCRIPT = `(document.fonts && document.fonts.ready)
  ? document.fonts.ready.then(() => true)
  : true`;

const FIT_CONTENT_STYLES = `
  html, body {
    margin: 0 !important;
    padding: 0 !important;
    width: auto !important;
    height: auto !important;
  }
  .export-container {
    position: absolute !important;
    top: 0 !important;
    left: 0 !important;
    margin: 0 !important;
  }
`;

function isContentSize(value: unknown): value is ContentSize {
  if (typeof value !== 'object' || value === null) return false;
  if (!('width' in value) || !('height' in value)) return false;
  return typeof value.width === 'number' && typeof value.height === 'number';
}

class PuppeteerPage implements RenderPage {
  constructor(private readonly page: Page) {}

  async setContent(html: string, options: { timeout: number }): Promise<void> {
    await this.page.setContent(html, { waitUntil: 'load', timeout: options.timeout });
  }

  async waitForFonts(): Promise<void> {
    await this.page.evaluate(FONTS_READY_SCRIPT);
  }

  async measureContent(): Promise<ContentSize> {
    await this.page.setViewport(MEASURE_VIEWPORT);
    const measured: unknown = await this.page.evaluate(MEASURE_CONTENT_SCRIPT);
    if (!isContentSize(measured)) {
      throw new Error('Content measurement returned an unexpected value');
    }
    return { width: Math.ceil(measured.width), height: Math.ceil(measured.height) };
  }

  async fitToContent(size: ContentSize): Promise<void> {
    await this.page.addStyleTag({ content: FIT_CONTENT_STYLES });
    await this.page.setViewport({ width: Math.max(1, size.width), height: Math.max(1, size.height) });
  }

  async pdf(parameters: PdfParameters): Promise<Uint8Array> {
    return this.page.pdf(parameters);
  }
}

class PuppeteerContext implements RenderContext {
  readonly id = randomUUID();

  constructor(private readonly context: BrowserContext) {}

  async newPage(): Promise<RenderPage> {
    return new PuppeteerPage(await this.context.newPage());
  }

  async close(): Promise<void> {
    await this.context.close();
  }
}

class PuppeteerConnection implements EngineConnection {
  constructor(private readonly browser: Browser) {}

  isConnected(): boolean {
    return this.browser.connected;
  }

  async createContext(): Promise<RenderContext> {
    return new PuppeteerContext(await this.browser.createBrowserContext());
  }

  onDisconnect(listener: () => void): void {
    this.browser.on(BrowserEvent.Disconnected, () => listener());
  }

  async close(): Promise<void> {
    await this.browser.close();
  }
}

export interface PuppeteerDriverOptions {
  executablePath: string;
}

/**
 * Launches headless Chromium through puppeteer-core
 */
export class PuppeteerDriver implements EngineDriver {
  readonly name = 'chromium';

  constructor(private readonly options: PuppeteerDriverOptions) {}

  async launch(): Promise<EngineConnection> {
    log.info(`Launching browser: ${this.options.executablePath}`);
    const browser = await puppeteer.launch({
      executablePath: this.options.executablePath,
      headless: true,
      args: CHROMIUM_ARGS,
    });
    log.info(`Browser launched: ${await browser.version()}`);
    return new PuppeteerConnection(browser);
  }
}
