import dotenv from 'dotenv';
import path from 'path';
import { AppConfig, BroadcastTime, TrackedAsset } from './types/index';

dotenv.config();

function requireEnv(env: NodeJS.ProcessEnv, name: string): string {
  const value = env[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

function parseGroupId(raw: string): number {
  const trimmed = raw.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new Error(`TELEGRAM_GROUP_ID must be an integer, got "${raw}"`);
  }
  return Number(trimmed);
}

function parseTimezone(raw: string): string {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: raw });
  } catch {
    throw new Error(`TIMEZONE must be an IANA time zone, got "${raw}"`);
  }
  return raw;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    telegramBotToken: requireEnv(env, 'TELEGRAM_BOT_TOKEN'),
    telegramGroupId: parseGroupId(requireEnv(env, 'TELEGRAM_GROUP_ID')),
    pricesPath: env.PRICES_FILE || path.join(__dirname, '..', 'data', 'prices.json'),
    responsesPath: env.RESPONSES_FILE || path.join(__dirname, '..', 'data', 'responses.json'),
    timezone: parseTimezone(env.TIMEZONE || 'Asia/Bangkok'),
    quoteCurrency: 'usd',
    quoteTimeoutMs: 10000,
    broadcastTimes: BROADCAST_TIMES,
    pollIntervalSeconds: 30,
  };
}

export const TRACKED_ASSETS: TrackedAsset[] = [
  { symbol: 'BTC', providerId: 'bitcoin', icon: '💰' },
  { symbol: 'ETH', providerId: 'ethereum', icon: '💎' },
  { symbol: 'BNB', providerId: 'binancecoin', icon: '🟡' },
  { symbol: 'SOL', providerId: 'solana', icon: '🟣' },
  // Gold, via the tether-gold token
  { symbol: 'XAU', providerId: 'tether-gold', icon: '🏅' },
];

export const BROADCAST_TIMES: BroadcastTime[] = [
  { hour: 9, minute: 0 },
  { hour: 12, minute: 0 },
  { hour: 19, minute: 0 },
];

export const DEFAULT_RESPONSES: Record<string, string> = {
  hello: "👋 Welcome to our Trading Group! Type 'help' for commands.",
  help: '📌 Commands:\n- /price: Check live prices\n- deposit: How to deposit funds\n- withdraw: Withdrawal guide',
  _welcome: '👋 Welcome {name} to our Trading Group!',
  _reload_success: '🔄 Responses reloaded successfully!',
};
