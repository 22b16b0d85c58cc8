import { Telegraf, type Context } from 'telegraf';
import type { Config } from '../config';
import type { TradingEngine } from '../engine/tradingEngine';
import type { StreamSession } from '../feeds/streamSession';
import type { BroadcastHub } from '../hub/broadcastHub';
import { describeError } from '../lib/errors';
import { createLogger } from '../lib/logger';
import type { OrderSide } from '../types';
import {
  commandArgs,
  formatBook,
  formatOrder,
  formatPosition,
  formatSummary,
  parseEditArgs,
  parseOrderArgs,
} from './commandArgs';

const log = createLogger('telegram');

const HELP = `
🤖 Order-book relay

/status - Stream and hub status
/stream [instrument] [cadence] - Start streaming the order book
/stop - Stop streaming
/buy <instrument> <amount> <price> - Limit buy
/sell <instrument> <amount> <price> - Limit sell
/edit <orderId> <amount> <price> - Modify an order
/cancel <orderId> - Cancel an order
/orders <instrument> - Open orders
/summary [currency] - Account summary
/positions [currency] - Open positions
/book <instrument> [depth] - Order-book snapshot
/ping - Health check
/help - This help
`;

export class TelegramController {
  private bot: Telegraf;
  private config: Config;
  private tradingEngine: TradingEngine;
  private session: StreamSession;
  private hub: BroadcastHub;
  private launched = false;

  constructor(config: Config, tradingEngine: TradingEngine, session: StreamSession, hub: BroadcastHub) {
    this.config = config;
    this.tradingEngine = tradingEngine;
    this.session = session;
    this.hub = hub;
    this.bot = new Telegraf(config.telegram.botToken);
    this.setupCommands();
  }

  private isAllowed(ctx: Context): boolean {
    const { allowedUsers } = this.config.telegram;
    if (allowedUsers.length === 0) return true;
    const from = ctx.from;
    if (!from) return false;
    const names = [String(from.id), from.username].filter((name): name is string => Boolean(name));
    return names.some((name) => allowedUsers.includes(name));
  }

  private async respond(ctx: Context, action: () => Promise<string>): Promise<void> {
    let text: string;
    try {
      text = await action();
    } catch (error) {
      log.warn({ error: describeError(error) }, 'Command failed');
      text = `❌ ${describeError(error)}`;
    }
    await ctx.reply(text);
  }

  private setupCommands(): void {
    this.bot.use(async (ctx, next) => {
      if (!this.isAllowed(ctx)) {
        log.warn({ user: ctx.from?.id }, 'Rejected unauthorised user');
        await ctx.reply('⛔ Not authorised');
        return;
      }
      await next();
    });

    this.bot.start((ctx) => ctx.reply(HELP));
    this.bot.help((ctx) => ctx.reply(HELP));
    this.bot.command('ping', (ctx) => ctx.reply('✅ Relay is alive'));

    this.bot.command('status', (ctx) =>
      this.respond(ctx, async () => {
        const status = this.session.status();
        return [
          `📡 Stream: ${status.state}${status.running ? ` (${status.topic})` : ''}`,
          `Frames: ${status.framesReceived}`,
          `Last error: ${status.lastError ?? 'none'}`,
          `👥 Hub consumers: ${this.hub.consumerCount()}`,
        ].join('\n');
      }),
    );

    this.bot.command('stream', (ctx) =>
      this.respond(ctx, async () => {
        const [instrument = this.config.stream.instrument, cadence = this.config.stream.cadence] =
          commandArgs(ctx.message.text);
        const topic = await this.session.start(instrument, cadence);
        return `📡 Streaming ${topic}`;
      }),
    );

    this.bot.command('stop', (ctx) =>
      this.respond(ctx, async () => {
        if (!this.session.isRunning()) return '📭 Stream is not running';
        await this.session.stop();
        return '🛑 Stream stopped';
      }),
    );

    const placeOrder = (side: OrderSide) =>
      this.bot.command(side, (ctx) =>
        this.respond(ctx, async () => {
          const args = parseOrderArgs(commandArgs(ctx.message.text));
          if (!args) return `Usage: /${side} <instrument> <amount> <price>`;
          const { order } = await this.tradingEngine.placeOrder(args.instrument, side, args.amount, args.price);
          return `📝 ${formatOrder(order)}`;
        }),
      );
    placeOrder('buy');
    placeOrder('sell');

    this.bot.command('edit', (ctx) =>
      this.respond(ctx, async () => {
        const args = parseEditArgs(commandArgs(ctx.message.text));
        if (!args) return 'Usage: /edit <orderId> <amount> <price>';
        const { order } = await this.tradingEngine.modifyOrder(args.orderId, args.amount, args.price);
        return `✏️ ${formatOrder(order)}`;
      }),
    );

    this.bot.command('cancel', (ctx) =>
      this.respond(ctx, async () => {
        const [orderId] = commandArgs(ctx.message.text);
        if (!orderId) return 'Usage: /cancel <orderId>';
        const order = await this.tradingEngine.cancelOrder(orderId);
        return `🗑 ${formatOrder(order)}`;
      }),
    );

    this.bot.command('orders', (ctx) =>
      this.respond(ctx, async () => {
        const [instrument] = commandArgs(ctx.message.text);
        if (!instrument) return 'Usage: /orders <instrument>';
        const orders = await this.tradingEngine.getOpenOrders(instrument);
        if (orders.length === 0) return '📭 No open orders';
        return `📋 Open orders:\n${orders.map(formatOrder).join('\n')}`;
      }),
    );

    this.bot.command('summary', (ctx) =>
      this.respond(ctx, async () => {
        const [currency = 'BTC'] = commandArgs(ctx.message.text);
        return formatSummary(await this.tradingEngine.getAccountSummary(currency.toUpperCase()));
      }),
    );

    this.bot.command('positions', (ctx) =>
      this.respond(ctx, async () => {
        const [currency = 'BTC'] = commandArgs(ctx.message.text);
        const positions = await this.tradingEngine.getPositions(currency.toUpperCase());
        if (positions.length === 0) return '📭 No open positions';
        return `📊 Positions:\n${positions.map(formatPosition).join('\n')}`;
      }),
    );

    this.bot.command('book', (ctx) =>
      this.respond(ctx, async () => {
        const [instrument, depth] = commandArgs(ctx.message.text);
        if (!instrument) return 'Usage: /book <instrument> [depth]';
        const levels = depth === undefined ? undefined : Number.parseInt(depth, 10);
        const book = await this.tradingEngine.getOrderBook(instrument, Number.isNaN(levels) ? undefined : levels);
        return formatBook(book);
      }),
    );

    this.bot.catch((error, ctx) => {
      log.error({ error: describeError(error), update: ctx.updateType }, 'Unhandled bot error');
    });
  }

  start(): void {
    log.info('Starting Telegram bot...');
    this.launched = true;
    this.bot
      .launch(() => log.info('Telegram bot started'))
      .catch((error: unknown) => {
        this.launched = false;
        log.error({ error: describeError(error) }, 'Telegram bot stopped');
      });
  }

  stop(): void {
    if (!this.launched) return;
    this.launched = false;
    try {
      this.bot.stop('shutdown');
    } catch (error) {
      log.warn({ error: describeError(error) }, 'Telegram bot was not running');
    }
  }
}
