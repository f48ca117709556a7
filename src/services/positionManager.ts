import type { RiskConfig } from "../config";
import type {
	IndicatorSnapshot,
	Position,
	TradeReason,
	TradeRecord,
} from "../types";
import { logger } from "../utils/logger";
import { type OrderServiceDeps, sellPosition } from "./orderService";

export type ExitReason = Exclude<TradeReason, "SIGNAL">;

export type ExitStep = {
	reason: ExitReason;
	/** Share of the remaining position to sell. */
	fraction: number;
};

/** Never lowers the stop. */
export function trailStop(
	stopLoss: number,
	price: number,
	trailingStopPct: number,
): number {
	return Math.max(stopLoss, price * (1 - trailingStopPct / 100));
}

/**
 * Exits due for a position at `price`, in execution order. A stop-loss hit
 * closes everything and suppresses the rest; TP2 only follows TP1.
 */
export function planExits(
	position: Position,
	price: number,
	rsi: number | null,
	risk: RiskConfig,
): ExitStep[] {
	if (price <= position.stopLoss) {
		return [{ reason: "STOP_LOSS", fraction: 1 }];
	}

	const steps: ExitStep[] = [];
	let tp1Filled = position.tp1Filled;
	if (!tp1Filled && price >= position.takeProfit1) {
		steps.push({ reason: "TAKE_PROFIT_1", fraction: risk.takeProfit1Fraction });
		tp1Filled = true;
	}
	if (tp1Filled && !position.tp2Filled && price >= position.takeProfit2) {
		steps.push({ reason: "TAKE_PROFIT_2", fraction: risk.takeProfit2Fraction });
	}
	if (rsi !== null && rsi > risk.rsiExitLevel) {
		steps.push({ reason: "RSI_EXTREME", fraction: 1 });
	}
	return steps;
}

function markFilled(position: Position, reason: ExitReason): Position {
	if (reason === "TAKE_PROFIT_1") return { ...position, tp1Filled: true };
	if (reason === "TAKE_PROFIT_2") return { ...position, tp2Filled: true };
	return position;
}

async function managePosition(
	deps: OrderServiceDeps,
	original: Position,
	snapshot: IndicatorSnapshot,
): Promise<TradeRecord[]> {
	const now = deps.now ?? Date.now;
	const price = snapshot.closePrice;
	const trades: TradeRecord[] = [];
	let position = original;

	for (const step of planExits(original, price, snapshot.rsi, deps.risk)) {
		const sale = await sellPosition(deps, position, step.fraction, {
			signal: snapshot.combinedSignal,
			reason: step.reason,
		});
		if (!sale || sale.remaining <= 0) {
			await deps.positions.remove(position.id);
			logger.info(
				{ symbol: position.symbol, positionId: position.id, reason: step.reason },
				"Position closed",
			);
			if (sale) trades.push(sale.trade);
			return trades;
		}
		trades.push(sale.trade);
		position = markFilled(
			{ ...position, quantity: sale.remaining, updatedAt: now() },
			step.reason,
		);
		await deps.positions.save(position);
	}

	if (position.tp1Filled) {
		const stopLoss = trailStop(
			position.stopLoss,
			price,
			deps.risk.trailingStopPct,
		);
		if (stopLoss > position.stopLoss) {
			await deps.positions.save({ ...position, stopLoss, updatedAt: now() });
			logger.info(
				{ symbol: position.symbol, from: position.stopLoss, to: stopLoss },
				"Trailing stop raised",
			);
		}
	}
	return trades;
}

/**
 * Reviews the open positions of the snapshot's symbol against the latest close:
 * stop-loss, staged take-profits, extreme-RSI exit and the trailing stop.
 */
export async function managePositions(
	deps: OrderServiceDeps,
	snapshot: IndicatorSnapshot,
): Promise<TradeRecord[]> {
	const open = (await deps.positions.listOpen()).filter(
		(p) => p.symbol === snapshot.symbol,
	);
	const trades: TradeRecord[] = [];
	for (const position of open) {
		trades.push(...(await managePosition(deps, position, snapshot)));
	}
	return trades;
}
