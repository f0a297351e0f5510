import { Movement, PriceSnapshot } from '../types/index';
import { formatUsd, formatZonedTimestamp } from '../utils/helpers';

export const LIVE_PRICES_TITLE = '💹 Live Market Prices';
export const BROADCAST_TITLE = '📊 Market Update';
export const TAGLINE = '💰 One trade is enough to change your life 💸';

const MOVEMENT_ARROWS: Record<Movement, string> = {
  up: ' 🔼',
  down: ' 🔽',
  flat: ' ➡️',
  unknown: ' ❓',
};

export interface FormatOptions {
  title?: string;
  timezone?: string;
  now?: Date;
}

export function formatMarketMessage(snapshot: PriceSnapshot, options: FormatOptions = {}): string {
  const title = options.title ?? LIVE_PRICES_TITLE;
  const timestamp = formatZonedTimestamp(options.now ?? new Date(), options.timezone ?? 'Asia/Bangkok');

  const lines = snapshot.map(quote => {
    const arrow = MOVEMENT_ARROWS[quote.movement];
    if (quote.price === null) {
      return `⚠️ ${quote.symbol}/USD: N/A${arrow}`;
    }
    return `${quote.icon} ${quote.symbol}/USD: $${formatUsd(quote.price)}${arrow}`;
  });

  return [`${title} (${timestamp}):`, '', ...lines, '', TAGLINE].join('\n');
}
