import express, { type Request, type Response } from "express";
import type { ClockState, ClockOffset } from "./services/clockSync";
import type { HealthSnapshot } from "./services/healthMonitor";
import type { TickSummary } from "./services/tickRunner";
import { logger } from "./utils/logger";

export type ServerDeps = {
	health: () => HealthSnapshot;
	clock: () => { state: ClockState; offset: ClockOffset | null };
	runTick: () => Promise<TickSummary>;
};

export function createApp(deps: ServerDeps): express.Express {
	const app = express();

	app.get("/health", (_req: Request, res: Response) => {
		res.json(deps.health());
	});

	app.get("/clock", (_req: Request, res: Response) => {
		const { state, offset } = deps.clock();
		res.json({
			state,
			offsetMs: offset?.offsetMs ?? null,
			latencyMs: offset?.latencyMs ?? null,
			measuredAt: offset ? new Date(offset.measuredAt).toISOString() : null,
		});
	});

	const runHandler = async (_req: Request, res: Response) => {
		try {
			const summary = await deps.runTick();
			res.json(summary);
		} catch (err) {
			logger.error({ err }, "Manual tick failed");
			res.status(500).json({
				error: err instanceof Error ? err.message : String(err),
			});
		}
	};
	app.get("/run", runHandler);
	app.post("/run", runHandler);

	return app;
}
