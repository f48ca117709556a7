export const TIMEFRAMES = [
  "1m",
  "3m",
  "5m",
  "15m",
  "30m",
  "1h",
  "2h",
  "4h",
  "6h",
  "8h",
  "12h",
  "1d"
] as const;

export type Timeframe = (typeof TIMEFRAMES)[number];

export type Candle = {
  openTime: number;
  closeTime: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
};

export const SIGNALS = ["buy", "sell", "neutral"] as const;

export type Signal = (typeof SIGNALS)[number];

export const TRADE_SIDES = ["BUY", "SELL"] as const;

export type TradeSide = (typeof TRADE_SIDES)[number];

export type IndicatorParameters = {
  rsiPeriod: number;
  macdFast: number;
  macdSlow: number;
  macdSignal: number;
  emaShortPeriod: number;
  emaLongPeriod: number;
  bollingerPeriod: number;
  bollingerStdDev: number;
};

export type IndicatorSnapshot = {
  symbol: string;
  timeframe: Timeframe;
  timestamp: number;
  closePrice: number;
  rsi: number | null;
  macd: number | null;
  macdSignal: number | null;
  macdHistogram: number | null;
  emaShort: number | null;
  emaLong: number | null;
  bbUpper: number | null;
  bbMiddle: number | null;
  bbLower: number | null;
  rsiSignal: Signal;
  macdCrossSignal: Signal;
  bbSignal: Signal;
  combinedSignal: Signal;
  parameters: IndicatorParameters;
};

export type AccountBalance = {
  asset: string;
  free: number;
  locked: number;
};

export type MarketOrderRequest = {
  symbol: string;
  side: TradeSide;
  quantity?: number;
  quoteOrderQty?: number;
};

export type OrderResult = {
  orderId: number;
  status: string;
  executedQty: number;
  quoteQty: number;
};

export const TRADE_REASONS = [
  "SIGNAL",
  "STOP_LOSS",
  "TAKE_PROFIT_1",
  "TAKE_PROFIT_2",
  "RSI_EXTREME"
] as const;

export type TradeReason = (typeof TRADE_REASONS)[number];

export type TradeRecord = {
  id: string;
  symbol: string;
  side: TradeSide;
  orderId: number;
  orderStatus: string;
  quantity: number;
  quoteQty: number;
  averagePrice: number;
  signal: Signal;
  reason: TradeReason;
  /** Realised PnL in the quote asset; null for entries. */
  pnl: number | null;
  placedAt: number;
};

export type Position = {
  id: string;
  symbol: string;
  /** Base asset still held for this position. */
  quantity: number;
  entryPrice: number;
  stopLoss: number;
  takeProfit1: number;
  takeProfit2: number;
  tp1Filled: boolean;
  tp2Filled: boolean;
  openedAt: number;
  updatedAt: number;
};

export type DailyPerformance = {
  /** UTC day, YYYY-MM-DD. */
  date: string;
  totalTrades: number;
  winningTrades: number;
  losingTrades: number;
  dailyPnl: number;
  openPositions: number;
  quoteBalance: number | null;
};

export type BotStatus = "starting" | "running" | "error" | "stopped";

export type BotStatusRecord = {
  instanceId: string;
  host: string;
  status: BotStatus;
  lastHeartbeat: string;
  errorMessage: string | null;
  memoryUsageMb: number;
  cpuUsagePct: number;
  activeSince: string;
  version: string;
  environment: string;
  metadata: Record<string, string>;
};
