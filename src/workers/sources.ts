import * as cheerio from 'cheerio';
import { FetchError } from '../errors.js';
import type { WatchEntity } from '../types.js';
import type { BrowserSessions } from './browser-session.js';
import type { ApiSourceSettings, BrowserSourceSettings } from './channel-config.js';

export interface PriceReading {
  price: number;
  stock?: number;
  currency?: string;
  rawPayload?: unknown;
}

export interface PriceSource {
  read(entity: WatchEntity): Promise<PriceReading>;
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * Turns a displayed price into a number. A lone `.` or `,` followed by exactly three
 * digits is a thousands separator ("$19.990" is 19990); when both appear, the last one
 * is the decimal separator.
 */
export function parsePriceText(value: string): number | undefined {
  const cleaned = value.replace(/[^\d.,]/g, '');
  if (!/\d/.test(cleaned)) return undefined;

  const lastDot = cleaned.lastIndexOf('.');
  const lastComma = cleaned.lastIndexOf(',');
  let normalized: string;

  if (lastDot !== -1 && lastComma !== -1) {
    const decimal = lastDot > lastComma ? '.' : ',';
    const thousands = decimal === '.' ? ',' : '.';
    normalized = cleaned.split(thousands).join('').replace(decimal, '.');
  } else if (lastDot !== -1 || lastComma !== -1) {
    const separator = lastDot !== -1 ? '.' : ',';
    const parts = cleaned.split(separator);
    const tail = parts[parts.length - 1] ?? '';
    normalized = parts.length > 2 || tail.length === 3 ? parts.join('') : parts.join('.');
  } else {
    normalized = cleaned;
  }

  const parsed = Number(normalized);
  return Number.isFinite(parsed) ? parsed : undefined;
}

export function parseStock(value: unknown): number | undefined {
  if (value === null || value === undefined || value === '') return undefined;
  const digits = typeof value === 'number' ? String(value) : String(value).replace(/[^\d]/g, '');
  if (!digits) return undefined;
  const parsed = Number(digits);
  return Number.isInteger(parsed) && parsed >= 0 ? parsed : undefined;
}

export function readPath(payload: unknown, path: string): unknown {
  let current: unknown = payload;
  for (const segment of path.split('.')) {
    if (current === null || typeof current !== 'object') return undefined;
    current = Reflect.get(current, segment);
  }
  return current;
}

export function isAbsoluteUrl(value: string): boolean {
  return /^https?:\/\//i.test(value);
}

export class ApiPriceSource implements PriceSource {
  private settings: ApiSourceSettings;
  private userAgent: string;
  private fetchImpl: FetchLike;

  constructor(settings: ApiSourceSettings, userAgent: string, fetchImpl: FetchLike = fetch) {
    this.settings = settings;
    this.userAgent = userAgent;
    this.fetchImpl = fetchImpl;
  }

  resolveUrl(endpointRef: string): string {
    if (isAbsoluteUrl(endpointRef)) return endpointRef;
    if (!this.settings.baseUrl) {
      throw new FetchError(endpointRef, 'relative endpoint without a configured baseUrl');
    }
    return `${this.settings.baseUrl.replace(/\/+$/, '')}/${encodeURIComponent(endpointRef)}`;
  }

  async read(entity: WatchEntity): Promise<PriceReading> {
    const url = this.resolveUrl(entity.endpointRef);
    const response = await this.fetchImpl(url, {
      headers: { 'User-Agent': this.userAgent, ...this.settings.headers },
      signal: AbortSignal.timeout(this.settings.timeoutMs),
    });

    if (!response.ok) {
      throw new FetchError(entity.endpointRef, `${response.status} ${response.statusText}`);
    }

    const payload: unknown = await response.json();
    const rawPrice = readPath(payload, this.settings.priceField);
    const price = typeof rawPrice === 'number' ? rawPrice : parsePriceText(String(rawPrice ?? ''));
    if (price === undefined || price < 0) {
      throw new FetchError(entity.endpointRef, `no usable price at "${this.settings.priceField}"`);
    }

    const currency = this.settings.currencyField ? readPath(payload, this.settings.currencyField) : undefined;
    return {
      price,
      stock: this.settings.stockField ? parseStock(readPath(payload, this.settings.stockField)) : undefined,
      currency: typeof currency === 'string' && currency ? currency : undefined,
      rawPayload: payload,
    };
  }
}

export class BrowserPriceSource implements PriceSource {
  private settings: BrowserSourceSettings;
  private sessions: BrowserSessions;
  private userAgent: string;

  constructor(settings: BrowserSourceSettings, sessions: BrowserSessions, userAgent: string) {
    this.settings = settings;
    this.sessions = sessions;
    this.userAgent = userAgent;
  }

  async read(entity: WatchEntity): Promise<PriceReading> {
    if (!isAbsoluteUrl(entity.endpointRef)) {
      throw new FetchError(entity.endpointRef, 'browser sources need an absolute URL');
    }

    const session = await this.sessions.get(this.userAgent);
    const page = await session.newPage();
    let html: string;
    try {
      await page.goto(entity.endpointRef, { timeout: this.settings.timeoutMs, waitUntil: this.settings.waitUntil });
      await page.waitForSelector(this.settings.priceSelector, { timeout: this.settings.timeoutMs });
      html = await page.content();
    } finally {
      await page.close();
    }

    return extractReading(html, this.settings, entity.endpointRef);
  }
}

export function extractReading(html: string, settings: BrowserSourceSettings, endpointRef: string): PriceReading {
  const $ = cheerio.load(html);
  const priceText = $(settings.priceSelector).first().text().trim();
  const price = parsePriceText(priceText);
  if (price === undefined) {
    throw new FetchError(endpointRef, `no price found at selector ${settings.priceSelector}`);
  }

  const stockText = settings.stockSelector ? $(settings.stockSelector).first().text().trim() : undefined;
  return {
    price,
    stock: stockText ? parseStock(stockText) : undefined,
    rawPayload: { priceText, ...(stockText ? { stockText } : {}) },
  };
}
