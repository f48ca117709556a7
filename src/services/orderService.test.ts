import { describe, expect, it, vi } from "vitest";
import type { RiskConfig } from "../config";
import type {
	AccountBalance,
	IndicatorSnapshot,
	MarketOrderRequest,
	Position,
	Signal,
	TradeRecord,
} from "../types";
import {
	type OrderServiceDeps,
	baseAssetOf,
	executeSignal,
	floorToStep,
	positionFromEntry,
	sellPosition,
} from "./orderService";
import type { PositionRepository } from "./positionStore";

const NOW = 1_700_000_000_000;
const PRICE = 50;

const risk: RiskConfig = {
	stopLossPct: 2,
	takeProfit1Pct: 2,
	takeProfit2Pct: 4,
	trailingStopPct: 1.5,
	takeProfit1Fraction: 0.3,
	takeProfit2Fraction: 0.5,
	rsiExitLevel: 80,
	maxPositions: 5,
	maxPositionsPerSymbol: 2,
};

function snapshot(symbol: string, combinedSignal: Signal): IndicatorSnapshot {
	return {
		symbol,
		timeframe: "15m",
		timestamp: 0,
		closePrice: PRICE,
		rsi: 25,
		macd: null,
		macdSignal: null,
		macdHistogram: null,
		emaShort: null,
		emaLong: null,
		bbUpper: null,
		bbMiddle: null,
		bbLower: null,
		rsiSignal: combinedSignal,
		macdCrossSignal: "neutral",
		bbSignal: combinedSignal,
		combinedSignal,
		parameters: {
			rsiPeriod: 14,
			macdFast: 12,
			macdSlow: 26,
			macdSignal: 9,
			emaShortPeriod: 20,
			emaLongPeriod: 50,
			bollingerPeriod: 20,
			bollingerStdDev: 2,
		},
	};
}

function position(overrides: Partial<Position> = {}): Position {
	return {
		id: "pos-1",
		symbol: "BTCUSDT",
		quantity: 0.3,
		entryPrice: 40,
		stopLoss: 39.2,
		takeProfit1: 40.8,
		takeProfit2: 41.6,
		tp1Filled: false,
		tp2Filled: false,
		openedAt: NOW - 1_000,
		updatedAt: NOW - 1_000,
		...overrides,
	};
}

function fakeDeps(balances: AccountBalance[], open: Position[] = []) {
	const orders: MarketOrderRequest[] = [];
	const trades: TradeRecord[] = [];
	const messages: string[] = [];
	const store = new Map(open.map((p) => [p.id, p]));
	const positions: PositionRepository = {
		listOpen: async () => [...store.values()],
		save: async (p) => {
			store.set(p.id, p);
		},
		remove: async (id) => {
			store.delete(id);
		},
	};
	const deps: OrderServiceDeps = {
		api: {
			getAccountBalances: vi.fn(async () => balances),
			submitMarketOrder: async (order) => {
				orders.push(order);
				const executedQty = order.quantity ?? (order.quoteOrderQty ?? 0) / PRICE;
				return {
					orderId: 42,
					status: "FILLED",
					executedQty,
					quoteQty: executedQty * PRICE,
				};
			},
		},
		resolveStepSize: async () => 0.001,
		trades: {
			record: async (trade) => {
				trades.push(trade);
			},
			listBetween: async () => trades,
		},
		positions,
		notify: async (text) => {
			messages.push(text);
		},
		quoteAsset: "USDT",
		tradeAmountQuote: 25,
		risk,
		now: () => NOW,
	};
	return { deps, orders, trades, messages, store };
}

describe("executeSignal", () => {
	it("does nothing on a neutral signal", async () => {
		const { deps, orders } = fakeDeps([]);

		await expect(
			executeSignal(deps, snapshot("BTCUSDT", "neutral")),
		).resolves.toEqual([]);
		expect(deps.api.getAccountBalances).not.toHaveBeenCalled();
		expect(orders).toEqual([]);
	});

	it("buys the configured quote amount and opens a position", async () => {
		const { deps, orders, trades, messages, store } = fakeDeps([
			{ asset: "USDT", free: 100, locked: 0 },
		]);

		const result = await executeSignal(deps, snapshot("BTCUSDT", "buy"));

		expect(orders).toEqual([
			{ symbol: "BTCUSDT", side: "BUY", quoteOrderQty: 25 },
		]);
		expect(result).toHaveLength(1);
		expect(result[0]).toMatchObject({
			symbol: "BTCUSDT",
			side: "BUY",
			orderId: 42,
			orderStatus: "FILLED",
			quantity: 0.5,
			quoteQty: 25,
			averagePrice: 50,
			signal: "buy",
			reason: "SIGNAL",
			pnl: null,
			placedAt: NOW,
		});
		expect(trades).toEqual(result);
		expect(messages).toEqual([
			"BUY BTCUSDT (buy signal)\nQty: 0.5\nQuote: 25\nAvg price: 50\nOrder: 42 FILLED",
		]);

		const opened = [...store.values()];
		expect(opened).toHaveLength(1);
		expect(opened[0]).toMatchObject({
			id: result[0]?.id,
			symbol: "BTCUSDT",
			quantity: 0.5,
			entryPrice: 50,
			tp1Filled: false,
			tp2Filled: false,
			openedAt: NOW,
		});
		expect(opened[0]?.stopLoss).toBeCloseTo(49, 9);
		expect(opened[0]?.takeProfit1).toBeCloseTo(51, 9);
		expect(opened[0]?.takeProfit2).toBeCloseTo(52, 9);
	});

	it("skips a buy when the quote balance is short", async () => {
		const { deps, orders, store } = fakeDeps([
			{ asset: "USDT", free: 10, locked: 50 },
		]);

		await expect(
			executeSignal(deps, snapshot("BTCUSDT", "buy")),
		).resolves.toEqual([]);
		expect(orders).toEqual([]);
		expect(store.size).toBe(0);
	});

	it("skips a buy once the overall position limit is reached", async () => {
		const open = ["A", "B", "C", "D", "E"].map((name, i) =>
			position({ id: `pos-${i}`, symbol: `${name}USDT` }),
		);
		const { deps, orders } = fakeDeps(
			[{ asset: "USDT", free: 100, locked: 0 }],
			open,
		);

		await expect(
			executeSignal(deps, snapshot("BTCUSDT", "buy")),
		).resolves.toEqual([]);
		expect(orders).toEqual([]);
		expect(deps.api.getAccountBalances).not.toHaveBeenCalled();
	});

	it("skips a buy once the symbol has its maximum positions", async () => {
		const { deps, orders } = fakeDeps(
			[{ asset: "USDT", free: 100, locked: 0 }],
			[position({ id: "pos-1" }), position({ id: "pos-2" })],
		);

		await expect(
			executeSignal(deps, snapshot("BTCUSDT", "buy")),
		).resolves.toEqual([]);
		expect(orders).toEqual([]);
	});

	it("sells only the tracked position, not the whole free balance", async () => {
		const { deps, orders, messages, store } = fakeDeps(
			[
				{ asset: "BTC", free: 1, locked: 0 },
				{ asset: "USDT", free: 5, locked: 0 },
			],
			[
				position({ id: "pos-1", symbol: "BTCUSDT", quantity: 0.3 }),
				position({ id: "pos-2", symbol: "ETHUSDT", quantity: 2 }),
			],
		);

		const result = await executeSignal(deps, snapshot("BTCUSDT", "sell"));

		expect(orders).toEqual([{ symbol: "BTCUSDT", side: "SELL", quantity: 0.3 }]);
		expect(result).toHaveLength(1);
		expect(result[0]).toMatchObject({ side: "SELL", reason: "SIGNAL" });
		expect(result[0]?.pnl).toBeCloseTo(3, 9);
		expect(messages).toEqual([
			"SELL BTCUSDT (sell signal)\nQty: 0.3\nQuote: 15\nAvg price: 50\nPnL: 3.00\nOrder: 42 FILLED",
		]);
		expect([...store.keys()]).toEqual(["pos-2"]);
	});

	it("does not sell without a tracked position", async () => {
		const { deps, orders } = fakeDeps([{ asset: "BTC", free: 1, locked: 0 }]);

		await expect(
			executeSignal(deps, snapshot("BTCUSDT", "sell")),
		).resolves.toEqual([]);
		expect(orders).toEqual([]);
	});

	it("caps a sell at the free balance and drops an unbacked position", async () => {
		const { deps, orders, store } = fakeDeps(
			[{ asset: "BTC", free: 0.1234, locked: 0 }],
			[
				position({ id: "pos-1", quantity: 0.3 }),
				position({ id: "pos-2", quantity: 0.3 }),
			],
		);
		const balances = [
			[{ asset: "BTC", free: 0.1234, locked: 0 }],
			[{ asset: "BTC", free: 0.0004, locked: 0 }],
		];
		deps.api.getAccountBalances = async () => balances.shift() ?? [];

		const result = await executeSignal(deps, snapshot("BTCUSDT", "sell"));

		expect(orders).toEqual([{ symbol: "BTCUSDT", side: "SELL", quantity: 0.123 }]);
		expect(result).toHaveLength(1);
		expect(store.size).toBe(0);
	});
});

describe("sellPosition", () => {
	it("sells a fraction and reports the lot-rounded remainder", async () => {
		const { deps, orders } = fakeDeps([{ asset: "BTC", free: 1, locked: 0 }]);

		const sale = await sellPosition(deps, position({ quantity: 1 }), 0.3, {
			signal: "neutral",
			reason: "TAKE_PROFIT_1",
		});

		expect(orders).toEqual([{ symbol: "BTCUSDT", side: "SELL", quantity: 0.3 }]);
		expect(sale?.remaining).toBe(0.7);
		expect(sale?.trade).toMatchObject({ reason: "TAKE_PROFIT_1", signal: "neutral" });
	});

	it("returns null when nothing is left after rounding", async () => {
		const { deps, orders } = fakeDeps([{ asset: "BTC", free: 0.0004, locked: 0 }]);

		await expect(
			sellPosition(deps, position(), 1, { signal: "sell", reason: "SIGNAL" }),
		).resolves.toBeNull();
		expect(orders).toEqual([]);
	});
});

describe("positionFromEntry", () => {
	it("derives stop and take-profit levels from the fill price", () => {
		const opened = positionFromEntry(
			{
				id: "trade-1",
				symbol: "ETHUSDT",
				side: "BUY",
				orderId: 1,
				orderStatus: "FILLED",
				quantity: 2,
				quoteQty: 200,
				averagePrice: 100,
				signal: "buy",
				reason: "SIGNAL",
				pnl: null,
				placedAt: NOW,
			},
			risk,
		);

		expect(opened).toMatchObject({
			id: "trade-1",
			symbol: "ETHUSDT",
			quantity: 2,
			entryPrice: 100,
			tp1Filled: false,
			tp2Filled: false,
			openedAt: NOW,
			updatedAt: NOW,
		});
		expect(opened.stopLoss).toBeCloseTo(98, 9);
		expect(opened.takeProfit1).toBeCloseTo(102, 9);
		expect(opened.takeProfit2).toBeCloseTo(104, 9);
	});
});

describe("floorToStep", () => {
	it("rounds down to whole steps", () => {
		expect(floorToStep(0.0123456, 0.001)).toBe(0.012);
		expect(floorToStep(5.7, 0.1)).toBe(5.7);
		expect(floorToStep(3, 1)).toBe(3);
	});

	it("keeps eight decimals without a step", () => {
		expect(floorToStep(1.23456789123, null)).toBe(1.23456789);
	});
});

describe("baseAssetOf", () => {
	it("strips the quote asset", () => {
		expect(baseAssetOf("ETHUSDT", "USDT")).toBe("ETH");
	});

	it("rejects symbols quoted in another asset", () => {
		expect(() => baseAssetOf("ETHBTC", "USDT")).toThrow(
			"ETHBTC is not quoted in USDT",
		);
		expect(() => baseAssetOf("USDT", "USDT")).toThrow();
	});
});
