import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { QuoteSource } from '../../collectors/coingecko';
import { TRACKED_ASSETS } from '../../config';
import { GroupAssistant, isPriceRequest, mentionHtml } from '../group-assistant';
import { PriceStore } from '../price-store';
import { PriceTracker } from '../price-tracker';
import { ResponseTable } from '../responses';

class StaticQuoteSource implements QuoteSource {
  calls = 0;

  async fetchSimplePrices(): Promise<unknown> {
    this.calls++;
    return {
      bitcoin: { usd: 65000.5 },
      ethereum: { usd: 3100 },
      binancecoin: { usd: 580.25 },
      solana: { usd: 145.1 },
    };
  }
}

describe('isPriceRequest', () => {
  it('matches "price" anywhere and the price command', () => {
    expect(isPriceRequest('What is the BTC PRICE today?')).toBe(true);
    expect(isPriceRequest('/price')).toBe(true);
    expect(isPriceRequest('hello there')).toBe(false);
  });
});

describe('mentionHtml', () => {
  it('links the full, escaped name to the user id', () => {
    expect(mentionHtml({ id: 42, firstName: 'Ana', lastName: '<B>' })).toBe('<a href="tg://user?id=42">Ana &lt;B&gt;</a>');
    expect(mentionHtml({ id: 7, firstName: 'Sam' })).toBe('<a href="tg://user?id=7">Sam</a>');
  });
});

describe('GroupAssistant', () => {
  let dir: string;
  let responsesPath: string;
  let source: StaticQuoteSource;
  let responses: ResponseTable;
  let assistant: GroupAssistant;

  const writeResponses = (content: Record<string, string>) =>
    fs.writeFileSync(responsesPath, JSON.stringify(content, null, 4));

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'group-assistant-'));
    responsesPath = path.join(dir, 'responses.json');
    writeResponses({
      deposit: 'How to deposit...',
      help: 'Help text',
      _welcome: '👋 Welcome {name} to our Trading Group!',
      _reload_success: '🔄 Responses reloaded successfully!',
    });

    source = new StaticQuoteSource();
    const store = new PriceStore(path.join(dir, 'prices.json'));
    const tracker = new PriceTracker(source, store, TRACKED_ASSETS, 'usd');
    responses = new ResponseTable(responsesPath);
    responses.load();
    assistant = new GroupAssistant(tracker, responses, 'Asia/Bangkok');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('replyTo', () => {
    it('answers price questions with a live price report', async () => {
      const reply = await assistant.replyTo('Price of BTC?');

      expect(source.calls).toBe(1);
      expect(reply?.startsWith('💹 Live Market Prices (')).toBe(true);
      const lines = reply?.split('\n') ?? [];
      expect(lines).toContain('💰 BTC/USD: $65,000.50 ➡️');
      expect(lines).toContain('🟡 BNB/USD: $580.25 ➡️');
      expect(lines).toContain('⚠️ XAU/USD: N/A ❓');
    });

    it('reports unchanged prices as flat on the next request', async () => {
      await assistant.replyTo('price');
      const reply = await assistant.replyTo('price');
      expect(reply?.split('\n')).toContain('💎 ETH/USD: $3,100.00 ➡️');
    });

    it('replies with the matching keyword text', async () => {
      expect(await assistant.replyTo('how do I deposit funds')).toBe('How to deposit...');
      expect(source.calls).toBe(0);
    });

    it('stays silent when nothing matches', async () => {
      expect(await assistant.replyTo('good morning everyone')).toBeNull();
    });

    it('never matches template keys', async () => {
      expect(await assistant.replyTo('_welcome')).toBeNull();
      expect(await assistant.replyTo('_reload_success')).toBeNull();
    });
  });

  describe('welcomeFor', () => {
    const user = { id: 42, firstName: 'Ana', lastName: 'Lee' };

    it('welcomes a user who joins after having left', () => {
      expect(assistant.welcomeFor({ oldStatus: 'left', newStatus: 'member', user })).toBe(
        '👋 Welcome <a href="tg://user?id=42">Ana Lee</a> to our Trading Group!',
      );
    });

    it('welcomes a user readmitted after a kick', () => {
      expect(assistant.welcomeFor({ oldStatus: 'kicked', newStatus: 'member', user })).not.toBeNull();
    });

    it('ignores other transitions', () => {
      expect(assistant.welcomeFor({ oldStatus: 'member', newStatus: 'administrator', user })).toBeNull();
      expect(assistant.welcomeFor({ oldStatus: 'member', newStatus: 'left', user })).toBeNull();
      expect(assistant.welcomeFor({ oldStatus: 'left', newStatus: 'restricted', user })).toBeNull();
    });

    it('falls back to a default template', () => {
      writeResponses({ deposit: 'How to deposit...' });
      assistant.reloadResponses();

      expect(assistant.welcomeFor({ oldStatus: 'left', newStatus: 'member', user: { id: 7, firstName: 'Sam' } })).toBe(
        '👋 Welcome <a href="tg://user?id=7">Sam</a>!',
      );
    });
  });

  describe('reloadResponses', () => {
    it('uses the edited file for later matches', async () => {
      writeResponses({
        withdraw: 'Withdrawal guide',
        _reload_success: '🔄 Responses reloaded successfully!',
      });

      expect(assistant.reloadResponses()).toBe('🔄 Responses reloaded successfully!');
      expect(await assistant.replyTo('how to withdraw?')).toBe('Withdrawal guide');
      expect(await assistant.replyTo('how do I deposit funds')).toBeNull();
    });

    it('confirms with a default text when the template is absent', () => {
      writeResponses({ hello: 'Hi' });
      expect(assistant.reloadResponses()).toBe('Reloaded!');
      expect(assistant.keywordCount).toBe(1);
    });

    it('keeps the old responses when the file is malformed', async () => {
      fs.writeFileSync(responsesPath, '{ not json');

      expect(assistant.reloadResponses()).toBe('⚠️ Responses file is malformed, keeping the previous responses.');
      expect(await assistant.replyTo('deposit')).toBe('How to deposit...');
    });
  });

  it('titles scheduled broadcasts as market updates', async () => {
    const report = await assistant.broadcastReport();
    expect(report.startsWith('📊 Market Update (')).toBe(true);
  });

  it('lists the tracked symbols', () => {
    expect(assistant.trackedSymbols).toEqual(['BTC', 'ETH', 'BNB', 'SOL', 'XAU']);
  });
});
