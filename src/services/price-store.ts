import fs from 'fs';
import { isRecord, log } from '../utils/helpers';

export class PriceStore {
  private prices = new Map<string, number>();
  private filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  load(): void {
    this.prices.clear();

    let raw: string;
    try {
      raw = fs.readFileSync(this.filePath, 'utf-8');
    } catch (error) {
      log('warn', 'Price store not found, starting empty', { path: this.filePath, error: String(error) });
      return;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      log('warn', 'Price store is not valid JSON, starting empty', { path: this.filePath, error: String(error) });
      return;
    }

    if (!isRecord(parsed)) {
      log('warn', 'Price store is not a JSON object, starting empty', { path: this.filePath });
      return;
    }

    for (const [symbol, value] of Object.entries(parsed)) {
      if (typeof value === 'number' && Number.isFinite(value)) {
        this.prices.set(symbol, value);
      }
    }
    log('info', `Loaded ${this.prices.size} last known prices`);
  }

  get(symbol: string): number | undefined {
    return this.prices.get(symbol);
  }

  set(symbol: string, price: number): void {
    this.prices.set(symbol, price);
  }

  toJSON(): Record<string, number> {
    return Object.fromEntries(this.prices);
  }

  save(): boolean {
    try {
      fs.writeFileSync(this.filePath, JSON.stringify(this.toJSON(), null, 4), 'utf-8');
      return true;
    } catch (error) {
      log('error', 'Failed to save price store', { path: this.filePath, error: String(error) });
      return false;
    }
  }
}
