import type { Candle, CandleGranularity, TradeDirection } from "@pipwatch/shared";

export const BROKERAGE_GATEWAY = Symbol("BROKERAGE_GATEWAY");

export type GatewayAccount = {
  currency: string;
  balance: number;
  equity: number;
  marginAvailable: number;
  marginUsed: number;
};

export type OrderRequest = {
  instrument: string;
  direction: TradeDirection;
  units: number;
  stopLossPrice: number;
  takeProfitPrice: number;
  precision: number;
};

export type OrderFill = {
  tradeId: string;
  price: number;
  filledUnits: number;
  requestedUnits: number;
  time: string;
};

export type TradeCloseFill = {
  tradeId: string;
  price: number;
  realizedPnl: number;
  time: string;
};

/**
 * Account, price and order transport. Implementations throw
 * TransientGatewayError, RejectedOrderError or GatewayAuthError.
 */
export interface BrokerageGateway {
  getAccountSnapshot(): Promise<GatewayAccount>;
  getPriceHistory(instrument: string, lookback: number, granularity?: CandleGranularity): Promise<Candle[]>;
  submitOrder(request: OrderRequest): Promise<OrderFill>;
  closeTrade(tradeId: string): Promise<TradeCloseFill>;
  listOpenTrades(): Promise<string[]>;
  close(): Promise<void>;
}
