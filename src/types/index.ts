export interface TrackedAsset {
  symbol: string;
  providerId: string;
  icon: string;
}

export type Movement = 'up' | 'down' | 'flat' | 'unknown';

export interface AssetQuote {
  symbol: string;
  icon: string;
  price: number | null;
  movement: Movement;
}

export type PriceSnapshot = AssetQuote[];

export interface BroadcastTime {
  hour: number;
  minute: number;
}

export interface ZonedClock {
  date: string;
  hour: number;
  minute: number;
  second: number;
}

export interface KeywordReply {
  keyword: string;
  reply: string;
}

export type TemplateName = 'welcome' | 'reload_success';

export type MemberStatus = 'creator' | 'administrator' | 'member' | 'restricted' | 'left' | 'kicked';

export interface MembershipChange {
  oldStatus: MemberStatus;
  newStatus: MemberStatus;
  user: {
    id: number;
    firstName: string;
    lastName?: string;
  };
}

export interface AppConfig {
  telegramBotToken: string;
  telegramGroupId: number;
  pricesPath: string;
  responsesPath: string;
  timezone: string;
  quoteCurrency: string;
  quoteTimeoutMs: number;
  broadcastTimes: BroadcastTime[];
  pollIntervalSeconds: number;
}
