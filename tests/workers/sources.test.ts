import { describe, it, expect, vi } from 'vitest';
import { FetchError } from '../../src/errors.js';
import type { WatchEntity } from '../../src/types.js';
import { BrowserSessions, type BrowserHandle, type PageHandle } from '../../src/workers/browser-session.js';
import type { ApiSourceSettings, BrowserSourceSettings } from '../../src/workers/channel-config.js';
import {
  ApiPriceSource,
  BrowserPriceSource,
  extractReading,
  parsePriceText,
  parseStock,
  readPath,
} from '../../src/workers/sources.js';

const entity = (overrides: Partial<WatchEntity> = {}): WatchEntity => ({
  id: 1,
  productGroupKey: 'PAN-28',
  channel: 'marketplace',
  role: 'own',
  endpointRef: 'LST-1',
  pollFrequencyMinutes: 60,
  gapThreshold: 0.1,
  active: true,
  ...overrides,
});

const apiSettings = (overrides: Partial<ApiSourceSettings> = {}): ApiSourceSettings => ({
  type: 'api',
  baseUrl: 'https://api.example/v1/listings/',
  priceField: 'pricing.current',
  stockField: 'inventory.available',
  headers: { Accept: 'application/json' },
  timeoutMs: 5000,
  ...overrides,
});

const browserSettings: BrowserSourceSettings = {
  type: 'browser',
  priceSelector: '.price',
  stockSelector: '.stock',
  waitUntil: 'domcontentloaded',
  timeoutMs: 5000,
};

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, statusText: status === 200 ? 'OK' : 'Not Found' });

describe('parsePriceText', () => {
  it('reads dot thousands separators', () => {
    expect(parsePriceText('$19.990')).toBe(19990);
    expect(parsePriceText('1.234.567')).toBe(1234567);
  });

  it('reads decimals', () => {
    expect(parsePriceText('19.99')).toBe(19.99);
    expect(parsePriceText('12,50')).toBe(12.5);
  });

  it('uses the last separator as the decimal point when both appear', () => {
    expect(parsePriceText('1,234.56')).toBe(1234.56);
    expect(parsePriceText('$ 1.299,90')).toBe(1299.9);
  });

  it('returns undefined without digits', () => {
    expect(parsePriceText('Agotado')).toBeUndefined();
    expect(parsePriceText('')).toBeUndefined();
  });
});

describe('parseStock', () => {
  it('extracts digits from text', () => {
    expect(parseStock('12 disponibles')).toBe(12);
    expect(parseStock(7)).toBe(7);
  });

  it('returns undefined for empty or digitless values', () => {
    expect(parseStock('sin stock')).toBeUndefined();
    expect(parseStock(null)).toBeUndefined();
    expect(parseStock('')).toBeUndefined();
  });
});

describe('readPath', () => {
  it('walks nested objects', () => {
    expect(readPath({ pricing: { current: 10 } }, 'pricing.current')).toBe(10);
    expect(readPath({ pricing: null }, 'pricing.current')).toBeUndefined();
    expect(readPath('text', 'length')).toBeUndefined();
  });
});

describe('ApiPriceSource', () => {
  it('resolves relative endpoints against the base URL', () => {
    const source = new ApiPriceSource(apiSettings(), 'test-agent', vi.fn());

    expect(source.resolveUrl('LST 1')).toBe('https://api.example/v1/listings/LST%201');
    expect(source.resolveUrl('https://other.example/item')).toBe('https://other.example/item');
  });

  it('refuses relative endpoints without a base URL', () => {
    const source = new ApiPriceSource(apiSettings({ baseUrl: undefined }), 'test-agent', vi.fn());

    expect(() => source.resolveUrl('LST-1')).toThrow('Failed to fetch LST-1: relative endpoint without a configured baseUrl');
  });

  it('reads price, stock and currency from the payload', async () => {
    const payload = { pricing: { current: 24990 }, inventory: { available: '3' }, currency: 'USD' };
    const fetchImpl = vi.fn(async () => jsonResponse(payload));
    const source = new ApiPriceSource(apiSettings({ currencyField: 'currency' }), 'test-agent', fetchImpl);

    const reading = await source.read(entity());

    expect(reading).toEqual({ price: 24990, stock: 3, currency: 'USD', rawPayload: payload });
    expect(fetchImpl).toHaveBeenCalledWith(
      'https://api.example/v1/listings/LST-1',
      expect.objectContaining({ headers: { 'User-Agent': 'test-agent', Accept: 'application/json' } })
    );
  });

  it('parses a price given as text', async () => {
    const source = new ApiPriceSource(
      apiSettings({ priceField: 'price', stockField: undefined }),
      'test-agent',
      async () => jsonResponse({ price: '$19.990' })
    );

    const reading = await source.read(entity());

    expect(reading.price).toBe(19990);
    expect(reading.stock).toBeUndefined();
    expect(reading.currency).toBeUndefined();
  });

  it('fails on an error status', async () => {
    const source = new ApiPriceSource(apiSettings(), 'test-agent', async () => jsonResponse({}, 404));

    await expect(source.read(entity())).rejects.toThrow('Failed to fetch LST-1: 404 Not Found');
  });

  it('fails when the payload has no price', async () => {
    const source = new ApiPriceSource(apiSettings(), 'test-agent', async () => jsonResponse({ pricing: {} }));

    await expect(source.read(entity())).rejects.toBeInstanceOf(FetchError);
  });
});

describe('extractReading', () => {
  it('reads the first match of each selector', () => {
    const html = '<div><span class="price"> $ 18.490 </span><span class="price">$1</span><p class="stock">5 unidades</p></div>';

    expect(extractReading(html, browserSettings, 'https://rival.example/pan')).toEqual({
      price: 18490,
      stock: 5,
      rawPayload: { priceText: '$ 18.490', stockText: '5 unidades' },
    });
  });

  it('omits stock when the selector matches nothing', () => {
    const reading = extractReading('<b class="price">990</b>', browserSettings, 'https://rival.example/pan');

    expect(reading).toEqual({ price: 990, stock: undefined, rawPayload: { priceText: '990' } });
  });

  it('fails when no price is found', () => {
    expect(() => extractReading('<p>Agotado</p>', browserSettings, 'https://rival.example/pan')).toThrow(
      'Failed to fetch https://rival.example/pan: no price found at selector .price'
    );
  });
});

describe('BrowserPriceSource', () => {
  const createPage = (html: string): PageHandle => ({
    setUserAgent: vi.fn(async () => undefined),
    goto: vi.fn(async () => null),
    waitForSelector: vi.fn(async () => null),
    content: vi.fn(async () => html),
    close: vi.fn(async () => undefined),
  });

  const sessionsFor = (page: PageHandle) => {
    const browser: BrowserHandle = { newPage: async () => page, close: vi.fn(async () => undefined) };
    return new BrowserSessions(async () => browser, { headless: true });
  };

  it('renders the page and closes it afterwards', async () => {
    const page = createPage('<span class="price">$15.000</span>');
    const source = new BrowserPriceSource(browserSettings, sessionsFor(page), 'test-agent');

    const reading = await source.read(entity({ role: 'competitor', endpointRef: 'https://rival.example/pan' }));

    expect(reading.price).toBe(15000);
    expect(page.setUserAgent).toHaveBeenCalledWith('test-agent');
    expect(page.goto).toHaveBeenCalledWith('https://rival.example/pan', { timeout: 5000, waitUntil: 'domcontentloaded' });
    expect(page.close).toHaveBeenCalledTimes(1);
  });

  it('closes the page when navigation fails', async () => {
    const page = createPage('');
    page.goto = vi.fn(async () => Promise.reject(new Error('net::ERR_NAME_NOT_RESOLVED')));
    const source = new BrowserPriceSource(browserSettings, sessionsFor(page), 'test-agent');

    await expect(source.read(entity({ endpointRef: 'https://rival.example/pan' }))).rejects.toThrow('net::ERR_NAME_NOT_RESOLVED');
    expect(page.close).toHaveBeenCalledTimes(1);
  });

  it('requires an absolute URL', async () => {
    const page = createPage('');
    const source = new BrowserPriceSource(browserSettings, sessionsFor(page), 'test-agent');

    await expect(source.read(entity({ endpointRef: 'LST-1' }))).rejects.toThrow(
      'Failed to fetch LST-1: browser sources need an absolute URL'
    );
  });
});
