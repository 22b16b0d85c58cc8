import { z } from 'zod';
import type { AuthManager } from '../exchange/authManager';
import type { JsonRpcClient } from '../exchange/jsonRpcClient';
import { createLogger } from '../lib/logger';
import {
  AccountSummarySchema,
  OrderBookSchema,
  OrderPlacementSchema,
  OrderSchema,
  PositionSchema,
  type AccountSummary,
  type Order,
  type OrderBook,
  type OrderPlacement,
  type OrderSide,
  type Position,
} from '../types';

const log = createLogger('trading');

export class TradingEngine {
  private rpc: JsonRpcClient;
  private auth: AuthManager;

  constructor(rpc: JsonRpcClient, auth: AuthManager) {
    this.rpc = rpc;
    this.auth = auth;
  }

  async placeOrder(instrument: string, side: OrderSide, amount: number, price: number): Promise<OrderPlacement> {
    log.info({ instrument, side, amount, price }, 'Placing limit order');

    const placement = await this.rpc.call(
      side === 'buy' ? 'private/buy' : 'private/sell',
      { instrument_name: instrument, amount, type: 'limit', price },
      OrderPlacementSchema,
      { accessToken: this.auth.getAccessToken() },
    );

    log.info({ orderId: placement.order.order_id, state: placement.order.order_state }, 'Order placed');
    return placement;
  }

  async modifyOrder(orderId: string, amount: number, price: number): Promise<OrderPlacement> {
    log.info({ orderId, amount, price }, 'Modifying order');

    return this.rpc.call(
      'private/edit',
      { order_id: orderId, amount, price },
      OrderPlacementSchema,
      { accessToken: this.auth.getAccessToken() },
    );
  }

  async cancelOrder(orderId: string): Promise<Order> {
    log.info({ orderId }, 'Cancelling order');

    return this.rpc.call('private/cancel', { order_id: orderId }, OrderSchema, {
      accessToken: this.auth.getAccessToken(),
    });
  }

  async getOpenOrders(instrument: string): Promise<Order[]> {
    return this.rpc.call(
      'private/get_open_orders_by_instrument',
      { instrument_name: instrument },
      z.array(OrderSchema),
      { accessToken: this.auth.getAccessToken() },
    );
  }

  async getAccountSummary(currency = 'BTC'): Promise<AccountSummary> {
    return this.rpc.call('private/get_account_summary', { currency }, AccountSummarySchema, {
      accessToken: this.auth.getAccessToken(),
    });
  }

  async getPositions(currency = 'BTC', kind = 'future'): Promise<Position[]> {
    return this.rpc.call('private/get_positions', { currency, kind }, z.array(PositionSchema), {
      accessToken: this.auth.getAccessToken(),
    });
  }

  /** Public snapshot; needs no token. */
  async getOrderBook(instrument: string, depth?: number): Promise<OrderBook> {
    return this.rpc.call('public/get_order_book', { instrument_name: instrument, depth }, OrderBookSchema);
  }
}
