// core/document-renderer.ts
// HTML to PDF rendering with headless Chromium (playwright-core)

import { chromium, errors } from 'playwright-core';
import type { Assets, DocumentRenderer, RenderRequest } from '../types/index.js';
import {
  AssetDecodeError,
  InvalidMarkupError,
  RenderError,
  RenderTimeoutError,
  describeError,
} from '../types/index.js';
import { composeDocument } from './html-writer.js';
import { createLimiter, type Limiter } from './limiter.js';

// ============================================
// Browser surface used by the renderer
// ============================================

export interface PdfOptions {
  format: string;
  printBackground: boolean;
  margin: { top: string; right: string; bottom: string; left: string };
}

export interface BrowserPage {
  setContent(html: string, options: { waitUntil: 'load'; timeout: number }): Promise<void>;
  pdf(options: PdfOptions): Promise<Buffer>;
}

export interface BrowserSession {
  newPage(): Promise<BrowserPage>;
  close(): Promise<void>;
}

export interface PdfBrowser {
  newContext(): Promise<BrowserSession>;
  close(): Promise<void>;
}

export type BrowserLauncher = () => Promise<PdfBrowser>;

export interface ChromiumRendererOptions {
  /** Renders allowed in flight at once */
  maxConcurrency?: number;
  timeoutMs?: number;
  executablePath?: string;
  launch?: BrowserLauncher;
}

const PDF_OPTIONS: PdfOptions = {
  format: 'A4',
  printBackground: true,
  margin: { top: '0', right: '0', bottom: '0', left: '0' },
};

const CHROMIUM_ARGS = [
  '--no-sandbox',
  '--disable-setuid-sandbox',
  '--disable-dev-shm-usage',
  '--disable-gpu',
];

// ============================================
// Asset validation
// ============================================

const IMAGE_DATA_URI = /^data:image\/(png|jpe?g|gif|webp|svg\+xml);base64,([A-Za-z0-9+/=\s]+)$/;

/**
 * Check that an image data URI carries decodable base64 content
 */
export function decodeImageDataUri(name: string, dataUri: string): Buffer {
  const match = IMAGE_DATA_URI.exec(dataUri.trim());
  if (!match || match[2] === undefined) {
    throw new AssetDecodeError(`Invalid ${name} image`, 'Expected a base64 image data URI');
  }

  const payload = match[2].replace(/\s+/g, '');
  if (payload.length % 4 === 1) {
    throw new AssetDecodeError(`Invalid ${name} image`, 'Truncated base64 payload');
  }

  const bytes = Buffer.from(payload, 'base64');
  if (bytes.length === 0) {
    throw new AssetDecodeError(`Invalid ${name} image`, 'Image is empty');
  }
  return bytes;
}

export function validateAssets(assets: Assets): void {
  if (assets.logo) decodeImageDataUri('logo', assets.logo);
  if (assets.signature) decodeImageDataUri('signature', assets.signature);
}

// ============================================
// Chromium renderer
// ============================================

export class ChromiumRenderer implements DocumentRenderer {
  private browser: Promise<PdfBrowser> | null = null;
  private readonly limit: Limiter;
  private readonly timeoutMs: number;
  private readonly launch: BrowserLauncher;

  constructor(options: ChromiumRendererOptions = {}) {
    this.limit = createLimiter(options.maxConcurrency ?? 1);
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.launch = options.launch ?? (() => chromium.launch({
      headless: true,
      executablePath: options.executablePath,
      args: CHROMIUM_ARGS,
    }));
  }

  async render(request: RenderRequest): Promise<Buffer> {
    validateAssets(request.assets);
    const html = composeDocument(request);
    return this.limit(() => this.print(html, request.filename));
  }

  async close(): Promise<void> {
    const pending = this.browser;
    this.browser = null;
    if (!pending) return;

    const browser = await pending;
    await browser.close();
  }

  private getBrowser(): Promise<PdfBrowser> {
    if (!this.browser) {
      const launching = this.launch();
      this.browser = launching;
      // A failed launch is retried on the next render
      void launching.catch(() => {
        if (this.browser === launching) this.browser = null;
      });
    }
    return this.browser;
  }

  /**
   * One fresh browser context per document so renders never share page state
   */
  private async print(html: string, filename: string): Promise<Buffer> {
    let session: BrowserSession | undefined;

    try {
      const browser = await this.getBrowser();
      session = await browser.newContext();
      const page = await session.newPage();

      try {
        await page.setContent(html, { waitUntil: 'load', timeout: this.timeoutMs });
      } catch (error) {
        if (error instanceof errors.TimeoutError) throw error;
        throw new InvalidMarkupError(`Failed to load markup for ${filename}`, describeError(error));
      }

      const pdf = await page.pdf(PDF_OPTIONS);
      if (pdf.length === 0) {
        throw new InvalidMarkupError(`Empty PDF produced for ${filename}`);
      }
      return pdf;
    } catch (error) {
      throw toRenderError(error, filename);
    } finally {
      if (session) {
        await session.close().catch((error: unknown) => {
          console.warn(`[render] Failed to close browser context: ${describeError(error)}`);
        });
      }
    }
  }
}

function toRenderError(error: unknown, filename: string): RenderError {
  if (error instanceof RenderError) return error;
  if (error instanceof errors.TimeoutError) {
    return new RenderTimeoutError(`Rendering timed out for ${filename}`, error.message);
  }
  return new RenderError(`Rendering failed for ${filename}`, 'RENDER_ERROR', describeError(error));
}
