import { MainClient } from "binance";
import { config } from "../config";
import { ClockSync } from "../services/clockSync";
import type { Candle, Timeframe } from "../types";
import { logger } from "../utils/logger";
import {
  createAxiosTransport,
  fetchServerTime,
  SignedRestClient
} from "./binanceRest";
import { RequestSigner } from "./requestSigner";
import { sendTelegramMessage } from "./telegram";

// Public market data only; signed calls go through SignedRestClient so every
// timestamp comes from the shared clock offset.
export const marketClient = new MainClient({
  api_key: config.binance.apiKey,
  api_secret: config.binance.apiSecret,
  baseUrl: config.binance.baseUrl,
  beautifyResponses: true,
  disableTimeSync: true
});

export const httpTransport = createAxiosTransport(
  config.binance.baseUrl,
  config.binance.requestTimeoutMs
);

export const clock = new ClockSync({
  fetchServerTime: () =>
    fetchServerTime(httpTransport, {
      timeoutMs: config.clock.syncTimeoutMs,
      attempts: config.clock.syncAttempts,
      retryDelayMs: config.clock.syncRetryDelayMs
    }),
  maxAgeMs: config.clock.maxOffsetAgeMs,
  failureCooldownMs: config.clock.failureCooldownMs
});

export const signer = new RequestSigner(clock, config.binance.apiSecret, {
  recvWindowMs: config.clock.recvWindowMs,
  maxRecvWindowMs: config.clock.maxRecvWindowMs
});

export const signedClient = new SignedRestClient({
  transport: httpTransport,
  clock,
  signer,
  apiKey: config.binance.apiKey,
  onClockDrift: (error) =>
    sendTelegramMessage(
      [
        "Clock drift: Binance keeps rejecting request timestamps",
        `Endpoint: ${error.path}`,
        `Offset: ${clock.current?.offsetMs ?? "unknown"} ms`,
        "Check the host clock (NTP) of this instance."
      ].join("\n")
    )
});

const stepSizes = new Map<string, number | null>();

export async function fetchKlines(
  symbol: string,
  interval: Timeframe,
  limit: number
): Promise<Candle[]> {
  const data = await marketClient.getKlines({ symbol, interval, limit });

  return data.map((kline) => ({
    openTime: kline[0],
    open: Number(kline[1]),
    high: Number(kline[2]),
    low: Number(kline[3]),
    close: Number(kline[4]),
    volume: Number(kline[5]),
    closeTime: kline[6]
  }));
}

/** LOT_SIZE step for a symbol, or null when the exchange reports none. */
export async function fetchLotStepSize(symbol: string): Promise<number | null> {
  const cached = stepSizes.get(symbol);
  if (cached !== undefined) return cached;

  const info = await marketClient.getExchangeInfo({ symbol });
  const meta = info.symbols.find((s) => s.symbol === symbol);
  const lot = meta?.filters.find((f) => f.filterType === "LOT_SIZE");
  const step = lot && "stepSize" in lot ? Number(lot.stepSize) : NaN;
  const resolved = Number.isFinite(step) && step > 0 ? step : null;

  stepSizes.set(symbol, resolved);
  logger.debug({ symbol, stepSize: resolved }, "Cached lot step size");
  return resolved;
}
