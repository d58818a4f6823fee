/**
 * @fileoverview Page rendering seam for the scrape provider.
 *
 * A renderer loads a chart page and exposes its visible text. The bundled
 * {@link HttpPageRenderer} fetches server-rendered HTML; a headless browser
 * can be plugged in by implementing the same two interfaces.
 *
 * @module @candlefeed/provider-scrape/renderer
 */

/**
 * A loaded page. Must be closed by whoever opened it.
 */
export interface RenderedPage {
  /** Visible text of the page, one block per line */
  text(): Promise<string>;
  close(): Promise<void>;
}

export interface PageRenderer {
  open(url: string): Promise<RenderedPage>;
}
