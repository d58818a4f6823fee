/**
 * @fileoverview Tests for the page-scrape provider.
 */

import { describe, it, expect } from 'vitest';
import axios, { type AxiosAdapter } from 'axios';
import type { ResolvedQuery } from '@candlefeed/contracts';
import {
  ScrapeProvider,
  HttpPageRenderer,
  buildChartUrl,
  htmlToText,
  parsePageText,
  parseVolume,
  rowDateToIso,
  type PageRenderer,
} from '../src/index.js';

class FakeRenderer implements PageRenderer {
  readonly opened: string[] = [];
  closed = 0;

  constructor(private readonly content: string | Error) {}

  async open(url: string) {
    this.opened.push(url);
    if (this.content instanceof Error) {
      throw this.content;
    }
    const content = this.content;
    return {
      text: async () => content,
      close: async () => {
        this.closed += 1;
      },
    };
  }
}

const query: ResolvedQuery = {
  provider: 'scrape',
  providerSymbol: 'WIN1!',
  interval: { timeframe: '1m', code: '1', minutes: 1 },
  barCount: 540,
};

const noSleep = async (): Promise<void> => undefined;

describe('htmlToText', () => {
  it('should keep table rows on separate lines', () => {
    const html =
      '<html><head><style>td{}</style><script>var x = "<td>";</script></head><body>' +
      '<table><tr><td>2025-01-15 13:00</td><td>1</td></tr><tr><td>2025-01-15 13:01</td><td>2&amp;3</td></tr></table>' +
      '</body></html>';

    expect(htmlToText(html)).toBe('2025-01-15 13:00\t1\n2025-01-15 13:01\t2&3');
  });

  it('should decode entities', () => {
    expect(htmlToText('<p>O&nbsp;1 &#72; 2 &#x4C; 0.5</p>')).toBe('O 1 H 2 L 0.5');
  });
});

describe('rowDateToIso', () => {
  it('should convert both date styles', () => {
    expect(rowDateToIso('15/01/2025 13:00')).toBe('2025-01-15T13:00:00Z');
    expect(rowDateToIso('2025-01-15')).toBe('2025-01-15T00:00:00Z');
    expect(rowDateToIso('2025-01-15T13:00:30')).toBe('2025-01-15T13:00:30Z');
  });
});

describe('parseVolume', () => {
  it('should apply suffix multipliers', () => {
    expect(parseVolume('1,200')).toBe(1200);
    expect(parseVolume('12K')).toBe(12000);
    expect(parseVolume('2M')).toBe(2000000);
    expect(parseVolume('n/a')).toBeNaN();
  });
});

describe('parsePageText', () => {
  it('should read dated rows in time order', () => {
    const text = [
      'Date\tOpen\tHigh\tLow\tClose\tVolume',
      '15/01/2025 13:01\t128,550\t128,700\t128,500\t128,650\t900',
      '15/01/2025 13:00\t128,450\t128,600\t128,300\t128,550\t1,500',
    ].join('\n');

    expect(parsePageText(text)).toEqual([
      {
        timestamp: '2025-01-15T13:00:00Z',
        fields: { open: 128450, high: 128600, low: 128300, close: 128550, volume: 1500 },
      },
      {
        timestamp: '2025-01-15T13:01:00Z',
        fields: { open: 128550, high: 128700, low: 128500, close: 128650, volume: 900 },
      },
    ]);
  });

  it('should fall back to the chart legend', () => {
    const observedAt = new Date('2025-01-15T13:05:00Z');
    const text = 'WIN1! · 1 · BMFBOVESPA\nO 128450 H 128600 L 128300 C 128550 +100 (+0.08%)\nVol 12K';

    expect(parsePageText(text, observedAt)).toEqual([
      { timestamp: observedAt, fields: { open: 128450, high: 128600, low: 128300, close: 128550, volume: null } },
    ]);
  });

  it('should read the legend volume on the same line', () => {
    const observedAt = new Date('2025-01-15T13:05:00Z');

    expect(parsePageText('O1.5 H2 L1 C1.8 Vol 3K', observedAt)[0]?.fields.volume).toBe(3000);
  });

  it('should return nothing for unrelated text', () => {
    expect(parsePageText('Sign in to continue')).toEqual([]);
  });
});

describe('buildChartUrl', () => {
  it('should encode the exchange-qualified symbol', () => {
    expect(buildChartUrl('https://www.tradingview.com/chart/', 'BMFBOVESPA', 'WIN1!', '1')).toBe(
      'https://www.tradingview.com/chart/?symbol=BMFBOVESPA%3AWIN1%21&interval=1'
    );
  });
});

describe('ScrapeProvider', () => {
  it('should open the default chart URL and close the page', async () => {
    const renderer = new FakeRenderer('O 1 H 2 L 0.5 C 1.5');
    const waits: number[] = [];
    const provider = new ScrapeProvider({
      renderer,
      settleMs: 2500,
      sleep: async (ms) => {
        waits.push(ms);
      },
      now: () => new Date('2025-01-15T13:00:00Z'),
    });

    const bars = await provider.fetchBars(query);

    expect(renderer.opened).toEqual(['https://www.tradingview.com/chart/?symbol=BMFBOVESPA%3AWIN1%21&interval=1']);
    expect(waits).toEqual([2500]);
    expect(renderer.closed).toBe(1);
    expect(bars).toHaveLength(1);
  });

  it('should prefer the URL carried by the query', async () => {
    const renderer = new FakeRenderer('');
    const provider = new ScrapeProvider({ renderer, sleep: noSleep });

    await provider.fetchBars({ ...query, sourceUrl: 'https://charts.test/win' });

    expect(renderer.opened).toEqual(['https://charts.test/win']);
  });

  it('should report an empty page as zero bars', async () => {
    const provider = new ScrapeProvider({ renderer: new FakeRenderer('Loading chart...'), sleep: noSleep });

    await expect(provider.fetchBars(query)).resolves.toEqual([]);
  });

  it('should map load failures to network errors', async () => {
    const provider = new ScrapeProvider({ renderer: new FakeRenderer(new Error('ECONNRESET')), sleep: noSleep });

    await expect(provider.fetchBars(query)).rejects.toMatchObject({
      name: 'ProviderError',
      provider: 'scrape',
      reason: 'network',
    });
  });

  it('should close the page when reading fails', async () => {
    let closed = false;
    const renderer: PageRenderer = {
      open: async () => ({
        text: async () => {
          throw new Error('detached');
        },
        close: async () => {
          closed = true;
        },
      }),
    };
    const provider = new ScrapeProvider({ renderer, sleep: noSleep });

    await expect(provider.fetchBars(query)).rejects.toMatchObject({ reason: 'network' });
    expect(closed).toBe(true);
  });
});

describe('HttpPageRenderer', () => {
  it('should fetch HTML and expose its text', async () => {
    const adapter: AxiosAdapter = async (config) => ({
      data: '<div>O 10 H 11 L 9 C 10.5</div>',
      status: 200,
      statusText: 'OK',
      headers: {},
      config,
    });
    const renderer = new HttpPageRenderer({ httpClient: axios.create({ adapter }) });

    const page = await renderer.open('https://charts.test/page');

    await expect(page.text()).resolves.toBe('O 10 H 11 L 9 C 10.5');
    await page.close();
  });
});
