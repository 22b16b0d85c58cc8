// Order-book relay: exchange trading client with a streaming fan-out hub

import { Config } from './config';
import { TelegramController } from './controllers/telegramController';
import { TradingEngine } from './engine/tradingEngine';
import { AuthManager } from './exchange/authManager';
import { JsonRpcClient } from './exchange/jsonRpcClient';
import { StreamClient } from './feeds/streamClient';
import { StreamSession } from './feeds/streamSession';
import { BroadcastHub } from './hub/broadcastHub';
import { describeError } from './lib/errors';
import { createLogger } from './lib/logger';

const log = createLogger('main');

async function main(): Promise<void> {
  log.info('🤖 Order-book relay starting...');

  const config = Config.load();

  const rpc = new JsonRpcClient({
    baseUrl: config.exchange.restUrl,
    timeoutMs: config.exchange.requestTimeoutMs,
  });
  const auth = new AuthManager(rpc, config.exchange);
  await auth.authenticate();

  const tradingEngine = new TradingEngine(rpc, auth);
  const hub = new BroadcastHub();
  await hub.start(config.hub.port, config.hub.host);

  const { instrument, cadence, ...connection } = config.stream;
  const session = new StreamSession(new StreamClient(connection), hub);

  const telegram = config.telegram.botToken
    ? new TelegramController(config, tradingEngine, session, hub)
    : null;
  if (telegram) {
    telegram.start();
  } else {
    log.warn('TELEGRAM_BOT_TOKEN not set, operator bot disabled');
  }

  try {
    await session.start(instrument, cadence);
  } catch (error) {
    // Streaming is optional; trading commands keep working
    log.error({ error: describeError(error) }, 'Order-book stream unavailable');
  }

  log.info('✅ Relay is running');

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info({ signal }, '🛑 Shutting down...');

    await session.stop();
    telegram?.stop();
    await hub.stop();
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        log.error({ error: describeError(error) }, 'Shutdown failed');
        process.exit(1);
      });
    });
  }
}

main().catch((error: unknown) => {
  log.fatal({ error: describeError(error) }, 'Startup failed');
  process.exit(1);
});
