import crypto from "node:crypto";
import path from "node:path";
import dotenv from "dotenv";
import { TIMEFRAMES, type Timeframe } from "../types";

dotenv.config();

function flag(value: string | undefined, fallback: boolean): boolean {
	if (value === undefined || value === "") return fallback;
	return ["true", "t", "1"].includes(value.toLowerCase());
}

function parseTimeframe(value: string): Timeframe {
	const match = TIMEFRAMES.find((tf) => tf === value);
	if (!match) {
		throw new Error(
			`Unsupported TIMEFRAME "${value}". Use one of: ${TIMEFRAMES.join(", ")}`,
		);
	}
	return match;
}

/** Numeric env var; throws on anything that is not a finite number >= min. */
export function numberFromEnv(name: string, fallback: number, min = 0): number {
	const raw = process.env[name];
	if (raw === undefined || raw.trim() === "") return fallback;
	const value = Number(raw);
	if (!Number.isFinite(value) || value < min) {
		throw new Error(`Invalid ${name} "${raw}": expected a number >= ${min}`);
	}
	return value;
}

function parseSymbols(value: string): string[] {
	return value
		.split(",")
		.map((s) => s.trim().toUpperCase())
		.filter(Boolean);
}

const useTestnet = flag(process.env.BINANCE_USE_TESTNET, true);
const spotUrl =
	process.env.BINANCE_BASE_URL ||
	(useTestnet ? "https://testnet.binance.vision" : "https://api.binance.com");

export const config = {
	binance: {
		apiKey: (process.env.BINANCE_API_KEY || "").trim(),
		apiSecret: (process.env.BINANCE_API_SECRET || "").trim(),
		baseUrl: spotUrl,
		useTestnet,
		requestTimeoutMs: numberFromEnv("BINANCE_REQUEST_TIMEOUT_MS", 10_000, 1),
	},
	clock: {
		// also the period of the background re-sync
		maxOffsetAgeMs: numberFromEnv("TIME_SYNC_INTERVAL_SEC", 60, 1) * 1000,
		syncTimeoutMs: numberFromEnv("TIME_SYNC_TIMEOUT_MS", 5_000, 1),
		syncAttempts: Math.floor(numberFromEnv("TIME_SYNC_ATTEMPTS", 3, 1)),
		syncRetryDelayMs: numberFromEnv("TIME_SYNC_RETRY_DELAY_MS", 1_000),
		failureCooldownMs: numberFromEnv("TIME_SYNC_FAILURE_COOLDOWN_MS", 30_000),
		recvWindowMs: numberFromEnv("BINANCE_RECV_WINDOW_MS", 120_000, 1),
		// Binance refuses anything above 60s
		maxRecvWindowMs: 60_000,
	},
	telegram: {
		botToken: process.env.TELEGRAM_BOT_TOKEN || "",
		chatId: process.env.TELEGRAM_CHAT_ID || "",
	},
	database: {
		url: process.env.DATABASE_URL || "",
		ssl: flag(process.env.DATABASE_SSL, true),
		autoMigrate: flag(process.env.DATABASE_AUTO_MIGRATE, false),
	},
	strategy: {
		symbols: parseSymbols(process.env.SYMBOLS || "BTCUSDT,ETHUSDT"),
		timeframe: parseTimeframe(process.env.TIMEFRAME || "15m"),
		candleLimit: numberFromEnv("CANDLE_LIMIT", 100, 1),
		adaptivePeriods: flag(process.env.ADAPTIVE_PERIODS, true),
		rsiPeriod: numberFromEnv("RSI_PERIOD", 14, 1),
		rsiOversold: numberFromEnv("RSI_OVERSOLD", 30),
		rsiOverbought: numberFromEnv("RSI_OVERBOUGHT", 70),
		macdFast: numberFromEnv("MACD_FAST", 12, 1),
		macdSlow: numberFromEnv("MACD_SLOW", 26, 1),
		macdSignal: numberFromEnv("MACD_SIGNAL", 9, 1),
		emaShortPeriod: numberFromEnv("EMA_SHORT_PERIOD", 20, 1),
		emaLongPeriod: numberFromEnv("EMA_LONG_PERIOD", 50, 1),
		bollingerPeriod: numberFromEnv("BOLLINGER_PERIOD", 20, 2),
		bollingerStdDev: numberFromEnv("BOLLINGER_STD_DEV", 2),
		minAgreement: numberFromEnv("SIGNAL_MIN_AGREEMENT", 2, 1),
		analysisConcurrency: numberFromEnv("ANALYSIS_CONCURRENCY", 3, 1),
		tradingEnabled: flag(process.env.TRADING_ENABLED, false),
		quoteAsset: (process.env.QUOTE_ASSET || "USDT").toUpperCase(),
		tradeAmountQuote: numberFromEnv("TRADE_AMOUNT_QUOTE", 25),
		tradingStartHour: numberFromEnv("TRADING_START_HOUR", 0),
		tradingEndHour: numberFromEnv("TRADING_END_HOUR", 23),
	},
	risk: {
		stopLossPct: numberFromEnv("STOP_LOSS_PCT", 2),
		takeProfit1Pct: numberFromEnv("TAKE_PROFIT_1_PCT", 2),
		takeProfit2Pct: numberFromEnv("TAKE_PROFIT_2_PCT", 4),
		trailingStopPct: numberFromEnv("TRAILING_STOP_PCT", 1.5),
		// share of the position sold at TP1, then of the remainder at TP2
		takeProfit1Fraction: 0.3,
		takeProfit2Fraction: 0.5,
		rsiExitLevel: numberFromEnv("RSI_EXIT_LEVEL", 80),
		maxPositions: numberFromEnv("MAX_POSITIONS", 5, 1),
		maxPositionsPerSymbol: numberFromEnv("MAX_POSITIONS_PER_SYMBOL", 2, 1),
	},
	scheduling: {
		tickCron: process.env.TICK_CRON || "*/15 * * * *",
		heartbeatCron: process.env.HEARTBEAT_CRON || "* * * * *",
		dailyReportCron: process.env.DAILY_REPORT_CRON || "0 0 * * *",
		timezone: "UTC",
		runTickOnStart: flag(process.env.RUN_TICK_ON_START, true),
	},
	server: {
		port: numberFromEnv("PORT", 8080),
	},
	monitor: {
		instanceId:
			process.env.K_REVISION ||
			process.env.RENDER_INSTANCE_ID ||
			crypto.randomUUID(),
		version: process.env.npm_package_version || "1.0.0",
		environment:
			process.env.ENVIRONMENT || (useTestnet ? "testnet" : "production"),
	},
	paths: {
		indicatorLog: path.join(process.cwd(), "data/indicators.log"),
		tradeLog: path.join(process.cwd(), "data/trades.log"),
		positions: path.join(process.cwd(), "data/positions.json"),
		schema: path.join(process.cwd(), "db/schema.sql"),
	},
};

export type StrategyConfig = typeof config.strategy;
export type RiskConfig = typeof config.risk;
