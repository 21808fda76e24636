import * as fs from 'fs/promises';
import * as path from 'path';
import type { Logger } from './logger';
import { slugify } from './text';
import type { PageStatus } from './types';

export interface DebugCaptureOptions {
  directory: string;
  saveHtml: boolean;
  saveScreenshot: boolean;
}

/** The part of a page the capturer needs. */
export interface ScreenshotTarget {
  screenshot(options?: { path?: string; fullPage?: boolean }): Promise<Buffer>;
}

export interface CaptureRequest {
  url: string;
  status: PageStatus;
  attempt: number;
  html: string;
  /** Last attempt for this URL; screenshots are only taken then. */
  terminal: boolean;
  /** Write the HTML even when `saveHtml` is off (DUMP_HTML). */
  forceHtml?: boolean;
}

export interface DebugArtifacts {
  htmlPath: string | null;
  screenshotPath: string | null;
}

export function artifactBaseName(url: string, status: PageStatus, attempt: number, at: Date = new Date()): string {
  const timestamp = at.toISOString().replace(/[:.]/g, '-');
  return `${timestamp}_${slugify(url) || 'page'}_${status.toLowerCase()}_a${attempt}`;
}

export class DebugCapturer {
  constructor(private options: DebugCaptureOptions, private logger: Logger) {}

  async capture(page: ScreenshotTarget | null, request: CaptureRequest): Promise<DebugArtifacts> {
    const writeHtml = this.options.saveHtml || request.forceHtml === true;
    const writeShot = this.options.saveScreenshot && request.terminal && request.status !== 'OK' && page !== null;
    const artifacts: DebugArtifacts = { htmlPath: null, screenshotPath: null };
    if (!writeHtml && !writeShot) return artifacts;

    const base = path.join(this.options.directory, artifactBaseName(request.url, request.status, request.attempt));
    try {
      await fs.mkdir(this.options.directory, { recursive: true });
    } catch (error) {
      this.logger.warn('Could not create debug directory', { directory: this.options.directory, error });
      return artifacts;
    }

    if (writeHtml) {
      try {
        await fs.writeFile(`${base}.html`, request.html, 'utf-8');
        artifacts.htmlPath = `${base}.html`;
      } catch (error) {
        this.logger.warn('Failed to save debug HTML', { url: request.url, error });
      }
    }

    if (writeShot && page) {
      try {
        await page.screenshot({ path: `${base}.png`, fullPage: true });
        artifacts.screenshotPath = `${base}.png`;
      } catch (error) {
        this.logger.warn('Failed to save debug screenshot', { url: request.url, error });
      }
    }

    this.logger.debug('Saved debug artifacts', { url: request.url, ...artifacts });
    return artifacts;
  }
}
