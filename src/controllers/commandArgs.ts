import type { AccountSummary, Order, OrderBook, Position } from '../types';

/** Words after the `/command` token. */
export function commandArgs(text: string): string[] {
  return text.trim().split(/\s+/).slice(1);
}

function positiveNumber(value: string | undefined): number | null {
  if (value === undefined) return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : null;
}

export interface OrderArgs {
  instrument: string;
  amount: number;
  price: number;
}

/** `<instrument> <amount> <price>` */
export function parseOrderArgs(args: string[]): OrderArgs | null {
  const [instrument, amount, price] = args;
  const parsedAmount = positiveNumber(amount);
  const parsedPrice = positiveNumber(price);
  if (!instrument || parsedAmount === null || parsedPrice === null || args.length !== 3) {
    return null;
  }
  return { instrument, amount: parsedAmount, price: parsedPrice };
}

export interface EditArgs {
  orderId: string;
  amount: number;
  price: number;
}

/** `<orderId> <amount> <price>` */
export function parseEditArgs(args: string[]): EditArgs | null {
  const order = parseOrderArgs(args);
  return order && { orderId: order.instrument, amount: order.amount, price: order.price };
}

export function formatOrder(order: Order): string {
  const price = order.price === undefined ? 'market' : order.price;
  return `${order.order_id} ${order.direction.toUpperCase()} ${order.amount} ${order.instrument_name} @ ${price} [${order.order_state}]`;
}

export function formatSummary(summary: AccountSummary): string {
  return [
    `💰 ${summary.currency}`,
    `Balance: ${summary.balance}`,
    `Equity: ${summary.equity}`,
    `Available: ${summary.available_funds}`,
  ].join('\n');
}

export function formatPosition(position: Position): string {
  return `${position.instrument_name}: ${position.direction.toUpperCase()} ${position.size} @ ${position.average_price}`;
}

export function formatBook(book: OrderBook, levels = 5): string {
  const side = (rows: [number, number][]) =>
    rows.slice(0, levels).map(([price, amount]) => `  ${price} x ${amount}`).join('\n') || '  (empty)';
  return `📖 ${book.instrument_name}\nAsks:\n${side(book.asks)}\nBids:\n${side(book.bids)}`;
}
