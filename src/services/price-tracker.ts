import { QuoteSource } from '../collectors/coingecko';
import { AssetQuote, Movement, PriceSnapshot, TrackedAsset } from '../types/index';
import { isRecord, log, roundPrice } from '../utils/helpers';
import { PriceStore } from './price-store';

export function classifyMovement(previous: number | undefined, current: number): Movement {
  if (previous === undefined) return 'flat';
  if (current > previous) return 'up';
  if (current < previous) return 'down';
  return 'flat';
}

function readPrice(payload: unknown, providerId: string, currency: string): number | null {
  if (!isRecord(payload)) return null;
  const entry = payload[providerId];
  if (!isRecord(entry)) return null;

  const value = entry[currency];
  const numeric = typeof value === 'number' ? value : typeof value === 'string' && value.trim() !== '' ? Number(value) : NaN;
  return Number.isFinite(numeric) ? roundPrice(numeric) : null;
}

export class PriceTracker {
  private source: QuoteSource;
  private store: PriceStore;
  private assets: TrackedAsset[];
  private currency: string;

  constructor(source: QuoteSource, store: PriceStore, assets: TrackedAsset[], currency: string = 'usd') {
    this.source = source;
    this.store = store;
    this.assets = assets;
    this.currency = currency;
  }

  getAssets(): TrackedAsset[] {
    return this.assets;
  }

  async fetchSnapshot(): Promise<PriceSnapshot> {
    const ids = this.assets.map(asset => asset.providerId);

    let payload: unknown = null;
    try {
      payload = await this.source.fetchSimplePrices(ids, this.currency);
      if (!isRecord(payload)) {
        log('error', 'Quote provider returned a non-object payload', { type: typeof payload });
      }
    } catch (error) {
      log('error', 'Quote provider request failed', { error: String(error) });
    }

    const snapshot = this.assets.map(asset => this.observe(asset, payload));

    const missing = snapshot.filter(quote => quote.price === null).map(quote => quote.symbol);
    if (missing.length > 0 && missing.length < snapshot.length) {
      log('warn', 'Some prices unavailable', { symbols: missing });
    }

    this.store.save();
    return snapshot;
  }

  private observe(asset: TrackedAsset, payload: unknown): AssetQuote {
    const price = readPrice(payload, asset.providerId, this.currency);
    if (price === null) {
      return { symbol: asset.symbol, icon: asset.icon, price: null, movement: 'unknown' };
    }

    const movement = classifyMovement(this.store.get(asset.symbol), price);
    this.store.set(asset.symbol, price);
    return { symbol: asset.symbol, icon: asset.icon, price, movement };
  }
}
