import { DEFAULT_RESPONSES, loadConfig, TRACKED_ASSETS } from './config';
import { CoinGeckoClient } from './collectors/coingecko';
import { GroupAssistant } from './services/group-assistant';
import { PriceStore } from './services/price-store';
import { PriceTracker } from './services/price-tracker';
import { ResponseTable } from './services/responses';
import { BroadcastScheduler } from './services/scheduler';
import { ALLOWED_UPDATES, registerHandlers } from './telegram/handlers';
import { TelegramSender } from './telegram/sender';
import { ensureJsonFile, log } from './utils/helpers';

async function main(): Promise<void> {
  log('info', 'group-price-bot starting...');

  const config = loadConfig();

  ensureJsonFile(config.responsesPath, DEFAULT_RESPONSES);
  ensureJsonFile(config.pricesPath, {});

  const store = new PriceStore(config.pricesPath);
  store.load();
  const responses = new ResponseTable(config.responsesPath);
  responses.load();

  const tracker = new PriceTracker(
    new CoinGeckoClient(config.quoteTimeoutMs),
    store,
    TRACKED_ASSETS,
    config.quoteCurrency,
  );
  const assistant = new GroupAssistant(tracker, responses, config.timezone);
  const sender = new TelegramSender(config.telegramBotToken, config.telegramGroupId);
  const bot = sender.getBot();

  let lastSuccessfulBroadcast: Date | null = null;
  const startTime = new Date();

  const sendMarketUpdate = async (): Promise<void> => {
    const message = await assistant.broadcastReport();
    await sender.sendText(message);
    lastSuccessfulBroadcast = new Date();
  };

  if (process.argv.includes('--test-send')) {
    log('info', '>>> Running in --test-send mode (immediate broadcast) <<<');
    await sendMarketUpdate();
    process.exit(0);
  }

  const scheduler = new BroadcastScheduler({
    targets: config.broadcastTimes,
    timezone: config.timezone,
    pollIntervalSeconds: config.pollIntervalSeconds,
    broadcast: sendMarketUpdate,
  });

  const healthReport = (): string => {
    const uptime = process.uptime();
    const hours = Math.floor(uptime / 3600);
    const minutes = Math.floor((uptime % 3600) / 60);
    const lastSend = lastSuccessfulBroadcast
      ? lastSuccessfulBroadcast.toISOString()
      : 'Never';

    return [
      `🤖 Group Price Bot - Health Check`,
      ``,
      `⏱️ Uptime: ${hours}h ${minutes}m`,
      `📅 Started: ${startTime.toISOString()}`,
      `📨 Last broadcast: ${lastSend}`,
      `💱 Tracking: ${assistant.trackedSymbols.join(', ')}`,
      `⏰ Schedule: ${scheduler.describeTargets()} (${config.timezone})`,
      `💬 Keyword replies: ${assistant.keywordCount}`,
      `🟢 Node: ${process.version}`,
    ].join('\n');
  };

  registerHandlers(bot, assistant, { healthReport });

  scheduler.start();

  bot.start({
    allowed_updates: ALLOWED_UPDATES,
    onStart: (info) => log('info', `Bot polling started as @${info.username}`),
  }).catch(err => {
    log('error', 'Bot polling stopped with an error', { error: String(err) });
    process.exit(1);
  });

  const shutdown = () => {
    log('info', 'Shutting down...');
    scheduler.stop();
    bot.stop()
      .catch(err => log('error', 'Failed to stop bot cleanly', { error: String(err) }))
      .finally(() => process.exit(0));
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch(err => {
  log('error', 'Fatal error during startup', { error: String(err) });
  process.exit(1);
});
