import crypto from "node:crypto";
import type { RiskConfig } from "../config";
import type {
	AccountBalance,
	IndicatorSnapshot,
	MarketOrderRequest,
	OrderResult,
	Position,
	Signal,
	TradeReason,
	TradeRecord,
} from "../types";
import { logger } from "../utils/logger";
import type { PositionRepository } from "./positionStore";
import type { TradeRepository } from "./tradeStore";

/** Signed account and order endpoints; SignedRestClient in production. */
export interface TradingApi {
	getAccountBalances(): Promise<AccountBalance[]>;
	submitMarketOrder(order: MarketOrderRequest): Promise<OrderResult>;
}

export type OrderServiceDeps = {
	api: TradingApi;
	resolveStepSize: (symbol: string) => Promise<number | null>;
	trades: TradeRepository;
	positions: PositionRepository;
	notify: (text: string) => Promise<void>;
	quoteAsset: string;
	tradeAmountQuote: number;
	risk: RiskConfig;
	now?: () => number;
};

export function baseAssetOf(symbol: string, quoteAsset: string): string {
	if (!symbol.endsWith(quoteAsset) || symbol.length === quoteAsset.length) {
		throw new Error(`${symbol} is not quoted in ${quoteAsset}`);
	}
	return symbol.slice(0, -quoteAsset.length);
}

export function floorToStep(quantity: number, step: number | null): number {
	if (!step) return Number(quantity.toFixed(8));
	const steps = Math.floor(quantity / step + 1e-9);
	const decimals = Math.max(0, Math.ceil(-Math.log10(step)));
	return Number((steps * step).toFixed(decimals));
}

function freeBalance(balances: AccountBalance[], asset: string): number {
	return balances.find((b) => b.asset === asset)?.free ?? 0;
}

/** Stop and take-profit levels around the fill price of an entry. */
export function positionFromEntry(
	trade: TradeRecord,
	risk: RiskConfig,
): Position {
	const entry = trade.averagePrice;
	return {
		id: trade.id,
		symbol: trade.symbol,
		quantity: trade.quantity,
		entryPrice: entry,
		stopLoss: entry * (1 - risk.stopLossPct / 100),
		takeProfit1: entry * (1 + risk.takeProfit1Pct / 100),
		takeProfit2: entry * (1 + risk.takeProfit2Pct / 100),
		tp1Filled: false,
		tp2Filled: false,
		openedAt: trade.placedAt,
		updatedAt: trade.placedAt,
	};
}

function describeReason(trade: TradeRecord): string {
	return trade.reason === "SIGNAL" ? `${trade.signal} signal` : trade.reason;
}

function formatOrderMessage(trade: TradeRecord): string {
	const lines = [
		`${trade.side} ${trade.symbol} (${describeReason(trade)})`,
		`Qty: ${trade.quantity}`,
		`Quote: ${trade.quoteQty}`,
		`Avg price: ${trade.averagePrice}`,
	];
	if (trade.pnl !== null) lines.push(`PnL: ${trade.pnl.toFixed(2)}`);
	lines.push(`Order: ${trade.orderId} ${trade.orderStatus}`);
	return lines.join("\n");
}

type OrderContext = {
	signal: Signal;
	reason: TradeReason;
	/** Set on exits; realised PnL is measured against it. */
	entryPrice?: number;
};

async function placeOrder(
	deps: OrderServiceDeps,
	order: MarketOrderRequest,
	context: OrderContext,
): Promise<TradeRecord> {
	const result = await deps.api.submitMarketOrder(order);
	const now = deps.now ?? Date.now;
	const averagePrice =
		result.executedQty > 0 ? result.quoteQty / result.executedQty : 0;
	const trade: TradeRecord = {
		id: crypto.randomUUID(),
		symbol: order.symbol,
		side: order.side,
		orderId: result.orderId,
		orderStatus: result.status,
		quantity: result.executedQty,
		quoteQty: result.quoteQty,
		averagePrice,
		signal: context.signal,
		reason: context.reason,
		pnl:
			context.entryPrice === undefined
				? null
				: (averagePrice - context.entryPrice) * result.executedQty,
		placedAt: now(),
	};

	await deps.trades.record(trade);
	await deps.notify(formatOrderMessage(trade));

	logger.info(
		{
			symbol: trade.symbol,
			side: trade.side,
			reason: trade.reason,
			qty: trade.quantity,
			pnl: trade.pnl,
			orderId: trade.orderId,
		},
		"Market order placed",
	);

	return trade;
}

export type PositionSale = {
	trade: TradeRecord;
	/** Base quantity left in the position after the sale, floored to the lot step. */
	remaining: number;
};

/**
 * Sells `fraction` of a tracked position, capped by the free base balance.
 * Returns null when nothing is left to sell after lot rounding.
 */
export async function sellPosition(
	deps: OrderServiceDeps,
	position: Position,
	fraction: number,
	context: { signal: Signal; reason: TradeReason },
): Promise<PositionSale | null> {
	const step = await deps.resolveStepSize(position.symbol);
	const balances = await deps.api.getAccountBalances();
	const free = freeBalance(
		balances,
		baseAssetOf(position.symbol, deps.quoteAsset),
	);
	const quantity = floorToStep(
		Math.min(position.quantity * fraction, free),
		step,
	);
	if (quantity <= 0) {
		logger.warn(
			{ symbol: position.symbol, positionId: position.id, free },
			"Nothing to sell for position",
		);
		return null;
	}

	const trade = await placeOrder(
		deps,
		{ symbol: position.symbol, side: "SELL", quantity },
		{ ...context, entryPrice: position.entryPrice },
	);
	const remaining =
		fraction >= 1
			? 0
			: floorToStep(Math.max(0, position.quantity - trade.quantity), step);
	return { trade, remaining };
}

async function enterPosition(
	deps: OrderServiceDeps,
	snapshot: IndicatorSnapshot,
): Promise<TradeRecord[]> {
	const open = await deps.positions.listOpen();
	if (open.length >= deps.risk.maxPositions) {
		logger.info(
			{ symbol: snapshot.symbol, open: open.length },
			"Skipping buy; max positions reached",
		);
		return [];
	}
	const forSymbol = open.filter((p) => p.symbol === snapshot.symbol).length;
	if (forSymbol >= deps.risk.maxPositionsPerSymbol) {
		logger.info(
			{ symbol: snapshot.symbol, open: forSymbol },
			"Skipping buy; max positions for symbol reached",
		);
		return [];
	}

	const balances = await deps.api.getAccountBalances();
	const available = freeBalance(balances, deps.quoteAsset);
	if (available < deps.tradeAmountQuote) {
		logger.info(
			{ symbol: snapshot.symbol, available, required: deps.tradeAmountQuote },
			"Skipping buy; quote balance too low",
		);
		return [];
	}

	const trade = await placeOrder(
		deps,
		{
			symbol: snapshot.symbol,
			side: "BUY",
			quoteOrderQty: deps.tradeAmountQuote,
		},
		{ signal: snapshot.combinedSignal, reason: "SIGNAL" },
	);
	if (trade.quantity > 0) {
		const position = positionFromEntry(trade, deps.risk);
		await deps.positions.save(position);
		logger.info(
			{
				symbol: position.symbol,
				entryPrice: position.entryPrice,
				stopLoss: position.stopLoss,
				takeProfit1: position.takeProfit1,
				takeProfit2: position.takeProfit2,
			},
			"Position opened",
		);
	}
	return [trade];
}

async function exitPositions(
	deps: OrderServiceDeps,
	snapshot: IndicatorSnapshot,
): Promise<TradeRecord[]> {
	const open = (await deps.positions.listOpen()).filter(
		(p) => p.symbol === snapshot.symbol,
	);
	if (!open.length) {
		logger.info({ symbol: snapshot.symbol }, "Skipping sell; no open position");
		return [];
	}

	const trades: TradeRecord[] = [];
	for (const position of open) {
		const sale = await sellPosition(deps, position, 1, {
			signal: snapshot.combinedSignal,
			reason: "SIGNAL",
		});
		// an unbacked position is dropped either way
		await deps.positions.remove(position.id);
		if (sale) trades.push(sale.trade);
	}
	return trades;
}

/**
 * Acts on a non-neutral combined signal: a buy opens a tracked position within
 * the position limits, a sell closes the tracked positions of that symbol.
 */
export async function executeSignal(
	deps: OrderServiceDeps,
	snapshot: IndicatorSnapshot,
): Promise<TradeRecord[]> {
	if (snapshot.combinedSignal === "buy") return enterPosition(deps, snapshot);
	if (snapshot.combinedSignal === "sell") return exitPositions(deps, snapshot);
	return [];
}
