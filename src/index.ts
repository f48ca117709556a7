import type { Server } from "node:http";
import cron from "node-cron";
import {
	clock,
	fetchKlines,
	fetchLotStepSize,
	signedClient,
} from "./clients/binance";
import { ensureSchema, pool } from "./clients/database";
import { formatError, sendTelegramMessage } from "./clients/telegram";
import { config } from "./config";
import { createApp } from "./server";
import {
	HealthMonitor,
	LogBotStatusRepository,
	PgBotStatusRepository,
} from "./services/healthMonitor";
import {
	createPerformanceRepository,
	sendDailyReport,
} from "./services/dailyReport";
import { createIndicatorRepository } from "./services/indicatorStore";
import { type OrderServiceDeps, executeSignal } from "./services/orderService";
import { managePositions } from "./services/positionManager";
import { createPositionRepository } from "./services/positionStore";
import { TickRunner } from "./services/tickRunner";
import { createTradeRepository } from "./services/tradeStore";
import { logger } from "./utils/logger";

const health = new HealthMonitor(
	pool ? new PgBotStatusRepository(pool) : new LogBotStatusRepository(),
	config.monitor,
);

const trades = createTradeRepository(pool, config.paths.tradeLog);
const positions = createPositionRepository(pool, config.paths.positions);

const orderDeps: OrderServiceDeps = {
	api: signedClient,
	resolveStepSize: fetchLotStepSize,
	trades,
	positions,
	notify: sendTelegramMessage,
	quoteAsset: config.strategy.quoteAsset,
	tradeAmountQuote: config.strategy.tradeAmountQuote,
	risk: config.risk,
};

const tickRunner = new TickRunner(
	{
		fetchCandles: fetchKlines,
		indicators: createIndicatorRepository(pool, config.paths.indicatorLog),
		trade: config.strategy.tradingEnabled
			? (snapshot) => executeSignal(orderDeps, snapshot)
			: undefined,
		manage: config.strategy.tradingEnabled
			? (snapshot) => managePositions(orderDeps, snapshot)
			: undefined,
		notify: sendTelegramMessage,
		health,
	},
	config.strategy,
);

async function runDailyReportJob(): Promise<void> {
	try {
		await sendDailyReport({
			trades,
			positions,
			performance: createPerformanceRepository(pool),
			notify: sendTelegramMessage,
			balances: config.binance.apiKey
				? () => signedClient.getAccountBalances()
				: undefined,
			quoteAsset: config.strategy.quoteAsset,
		});
	} catch (error) {
		logger.error({ error }, "Daily report failed");
		await sendTelegramMessage(formatError("Daily report failed", error));
	}
}

async function runTickJob(): Promise<void> {
	try {
		await tickRunner.run();
	} catch (error) {
		logger.error({ error }, "Tick job failed");
		await health.reportError(formatError("Tick failed", error));
		await sendTelegramMessage(formatError("Tick failed", error));
	}
}

function scheduleJobs() {
	cron.schedule(config.scheduling.tickCron, runTickJob, {
		timezone: config.scheduling.timezone,
	});

	cron.schedule(config.scheduling.heartbeatCron, () => health.heartbeat(), {
		timezone: config.scheduling.timezone,
	});

	cron.schedule(config.scheduling.dailyReportCron, runDailyReportJob, {
		timezone: config.scheduling.timezone,
	});
}

function startServer(): Server {
	const app = createApp({
		health: () => health.snapshot(),
		clock: () => ({ state: clock.state, offset: clock.current }),
		runTick: () => tickRunner.run(),
	});
	return app.listen(config.server.port, () => {
		logger.info({ port: config.server.port }, "Health server listening");
	});
}

function registerShutdown(server: Server, stopClockSync: () => void) {
	let stopping = false;
	const shutdown = async (signal: string) => {
		if (stopping) return;
		stopping = true;
		logger.info({ signal }, "Shutting down");
		cron.getTasks().forEach((task) => task.stop());
		stopClockSync();
		server.close();
		await health.stop();
		await pool?.end();
		process.exit(0);
	};
	const onSignal = (signal: NodeJS.Signals) => {
		shutdown(signal).catch((err) => {
			logger.error({ err }, "Shutdown failed");
			process.exit(1);
		});
	};
	process.on("SIGINT", onSignal);
	process.on("SIGTERM", onSignal);
}

async function bootstrap() {
	logger.info(
		{
			symbols: config.strategy.symbols,
			timeframe: config.strategy.timeframe,
			testnet: config.binance.useTestnet,
			tradingEnabled: config.strategy.tradingEnabled,
		},
		"Starting Binance signal bot",
	);

	if (pool && config.database.autoMigrate) {
		await ensureSchema(pool);
	}

	const server = startServer();

	await clock.forceSync();
	registerShutdown(server, clock.startAutoSync());
	await health.start();
	scheduleJobs();

	if (config.scheduling.runTickOnStart) {
		await runTickJob();
	}
}

bootstrap().catch((err) => {
	logger.error({ err }, "Fatal error");
	process.exit(1);
});
