import axios, { AxiosRequestConfig } from 'axios';

const COINGECKO_PRICE_URL = 'https://api.coingecko.com/api/v3/simple/price';

export interface QuoteSource {
  fetchSimplePrices(ids: string[], currency: string): Promise<unknown>;
}

export type HttpGet = (url: string, config: AxiosRequestConfig) => Promise<{ data: unknown }>;

const axiosGet: HttpGet = (url, config) => axios.get<unknown>(url, config);

export class CoinGeckoClient implements QuoteSource {
  private timeoutMs: number;
  private get: HttpGet;

  constructor(timeoutMs: number = 10000, get: HttpGet = axiosGet) {
    this.timeoutMs = timeoutMs;
    this.get = get;
  }

  async fetchSimplePrices(ids: string[], currency: string): Promise<unknown> {
    const response = await this.get(COINGECKO_PRICE_URL, {
      params: { ids: ids.join(','), vs_currencies: currency },
      timeout: this.timeoutMs,
      headers: { 'User-Agent': 'GroupPriceBot/1.0' },
    });
    return response.data;
  }
}
