import { z } from 'zod';

export enum ConnectionState {
  Disconnected = 'disconnected',
  Connecting = 'connecting',
  Connected = 'connected',
}

export interface ConnectionConfig {
  readonly host: string;
  readonly port: number;
  readonly path: string;
  /** wss:// when true, plain ws:// otherwise (local relays, tests) */
  readonly secure: boolean;
  readonly verifySsl: boolean;
  readonly connectTimeoutMs: number;
  /** 0 waits for the next frame without a deadline */
  readonly readTimeoutMs: number;
}

export type OrderSide = 'buy' | 'sell';

export const OrderSchema = z
  .object({
    order_id: z.string(),
    instrument_name: z.string(),
    direction: z.enum(['buy', 'sell']),
    amount: z.number(),
    filled_amount: z.number().optional(),
    price: z.union([z.number(), z.literal('market_price')]).optional(),
    order_state: z.string(),
    order_type: z.string().optional(),
    creation_timestamp: z.number().optional(),
  })
  .passthrough();

export type Order = z.infer<typeof OrderSchema>;

export const OrderPlacementSchema = z
  .object({
    order: OrderSchema,
    trades: z.array(z.record(z.unknown())).default([]),
  })
  .passthrough();

export type OrderPlacement = z.infer<typeof OrderPlacementSchema>;

export const AccountSummarySchema = z
  .object({
    currency: z.string(),
    balance: z.number(),
    equity: z.number(),
    available_funds: z.number(),
    margin_balance: z.number().optional(),
    initial_margin: z.number().optional(),
    maintenance_margin: z.number().optional(),
  })
  .passthrough();

export type AccountSummary = z.infer<typeof AccountSummarySchema>;

export const PositionSchema = z
  .object({
    instrument_name: z.string(),
    direction: z.enum(['buy', 'sell', 'zero']),
    size: z.number(),
    average_price: z.number(),
    mark_price: z.number().optional(),
    floating_profit_loss: z.number().optional(),
    kind: z.string().optional(),
  })
  .passthrough();

export type Position = z.infer<typeof PositionSchema>;

const BookLevelSchema = z.tuple([z.number(), z.number()]);

export const OrderBookSchema = z
  .object({
    instrument_name: z.string(),
    timestamp: z.number(),
    bids: z.array(BookLevelSchema),
    asks: z.array(BookLevelSchema),
    best_bid_price: z.number().nullable().optional(),
    best_ask_price: z.number().nullable().optional(),
    mark_price: z.number().optional(),
  })
  .passthrough();

export type OrderBook = z.infer<typeof OrderBookSchema>;
