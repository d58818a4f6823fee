/**
 * @fileoverview Renderer that fetches server-rendered HTML with axios.
 *
 * @module @candlefeed/provider-scrape/http-renderer
 */

import axios, { type AxiosInstance } from 'axios';
import { htmlToText } from './html.js';
import type { PageRenderer, RenderedPage } from './renderer.js';

export interface HttpPageRendererOptions {
  /** Request timeout in milliseconds (default: 15000) */
  timeoutMs?: number;
  userAgent?: string;
  httpClient?: AxiosInstance;
}

const DEFAULT_USER_AGENT = 'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';

/**
 * Loads pages without executing scripts. Charts drawn client-side yield
 * little text, which the provider reports as zero bars.
 */
export class HttpPageRenderer implements PageRenderer {
  private readonly http: AxiosInstance;

  constructor(options: HttpPageRendererOptions = {}) {
    this.http =
      options.httpClient ??
      axios.create({
        timeout: options.timeoutMs ?? 15_000,
        headers: { 'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT, Accept: 'text/html' },
        responseType: 'text',
      });
  }

  async open(url: string): Promise<RenderedPage> {
    const response = await this.http.get<unknown>(url, { responseType: 'text' });
    const html = typeof response.data === 'string' ? response.data : '';

    return {
      text: async () => htmlToText(html),
      close: async () => undefined,
    };
  }
}
