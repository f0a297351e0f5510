import { BROADCAST_TITLE, formatMarketMessage, LIVE_PRICES_TITLE } from '../telegram/formatter';
import { MembershipChange, MemberStatus } from '../types/index';
import { escapeHtml, log } from '../utils/helpers';
import { PriceTracker } from './price-tracker';
import { ResponseTable } from './responses';

const DEFAULT_WELCOME = '👋 Welcome {name}!';
const DEFAULT_RELOAD_SUCCESS = 'Reloaded!';
const RELOAD_FAILED = '⚠️ Responses file is malformed, keeping the previous responses.';

const DEPARTED_STATUSES: MemberStatus[] = ['left', 'kicked'];

export function isPriceRequest(text: string): boolean {
  const message = text.toLowerCase();
  return message.includes('price') || message.startsWith('/price');
}

export function mentionHtml(user: MembershipChange['user']): string {
  const fullName = [user.firstName, user.lastName].filter(Boolean).join(' ');
  return `<a href="tg://user?id=${user.id}">${escapeHtml(fullName)}</a>`;
}

export class GroupAssistant {
  private tracker: PriceTracker;
  private responses: ResponseTable;
  private timezone: string;

  constructor(tracker: PriceTracker, responses: ResponseTable, timezone: string) {
    this.tracker = tracker;
    this.responses = responses;
    this.timezone = timezone;
  }

  async priceReport(title: string = LIVE_PRICES_TITLE): Promise<string> {
    const snapshot = await this.tracker.fetchSnapshot();
    return formatMarketMessage(snapshot, { title, timezone: this.timezone });
  }

  broadcastReport(): Promise<string> {
    return this.priceReport(BROADCAST_TITLE);
  }

  async replyTo(text: string): Promise<string | null> {
    if (isPriceRequest(text)) {
      return this.priceReport();
    }
    return this.responses.match(text);
  }

  welcomeFor(change: MembershipChange): string | null {
    if (!DEPARTED_STATUSES.includes(change.oldStatus) || change.newStatus !== 'member') {
      return null;
    }
    const template = this.responses.template('welcome') ?? DEFAULT_WELCOME;
    log('info', `Welcoming new member ${change.user.id}`);
    return template.split('{name}').join(mentionHtml(change.user));
  }

  reloadResponses(): string {
    const result = this.responses.load();
    if (result === 'invalid') {
      return RELOAD_FAILED;
    }
    return this.responses.template('reload_success') ?? DEFAULT_RELOAD_SUCCESS;
  }

  get keywordCount(): number {
    return this.responses.keywordCount;
  }

  get trackedSymbols(): string[] {
    return this.tracker.getAssets().map(asset => asset.symbol);
  }
}
