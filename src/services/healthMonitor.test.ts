import { describe, expect, it } from "vitest";
import type { BotStatusRecord } from "../types";
import { HealthMonitor, PgBotStatusRepository } from "./healthMonitor";

const START = Date.UTC(2024, 0, 1);

function monitorWithClock() {
	let now = START;
	const records: BotStatusRecord[] = [];
	const monitor = new HealthMonitor(
		{
			upsert: async (record) => {
				records.push(record);
			},
		},
		{
			instanceId: "test-instance",
			version: "1.2.3",
			environment: "test",
			now: () => now,
		},
	);
	return {
		monitor,
		records,
		advance: (ms: number) => {
			now += ms;
		},
	};
}

describe("HealthMonitor", () => {
	it("starts in starting and writes a heartbeat on every transition", async () => {
		const { monitor, records } = monitorWithClock();
		expect(monitor.status).toBe("starting");

		await monitor.start();
		await monitor.reportError("exchange down");
		await monitor.recover();
		await monitor.stop();

		expect(records.map((r) => r.status)).toEqual([
			"running",
			"error",
			"running",
			"stopped",
		]);
		expect(records[1]?.errorMessage).toBe("exchange down");
		expect(records[2]?.errorMessage).toBeNull();
	});

	it("only recovers from the error state", async () => {
		const { monitor, records } = monitorWithClock();

		await monitor.recover();
		expect(monitor.status).toBe("starting");
		expect(records).toEqual([]);

		await monitor.stop();
		await monitor.recover();
		expect(monitor.status).toBe("stopped");
	});

	it("fills the heartbeat record", async () => {
		const { monitor, records, advance } = monitorWithClock();
		advance(5_000);

		await monitor.heartbeat();

		expect(records[0]).toMatchObject({
			instanceId: "test-instance",
			status: "starting",
			lastHeartbeat: "2024-01-01T00:00:05.000Z",
			activeSince: "2024-01-01T00:00:00.000Z",
			version: "1.2.3",
			environment: "test",
			errorMessage: null,
		});
		expect(records[0]?.memoryUsageMb).toBeGreaterThan(0);
		expect(records[0]?.cpuUsagePct).toBeGreaterThanOrEqual(0);
	});

	it("reports uptime in whole seconds", async () => {
		const { monitor, advance } = monitorWithClock();
		await monitor.start();
		advance(90_500);

		expect(monitor.snapshot()).toMatchObject({
			status: "running",
			timestamp: "2024-01-01T00:01:30.500Z",
			instanceId: "test-instance",
			version: "1.2.3",
			uptimeSeconds: 90,
			errorMessage: null,
		});
	});

	it("survives a failing repository", async () => {
		const monitor = new HealthMonitor(
			{
				upsert: async () => {
					throw new Error("connection refused");
				},
			},
			{ instanceId: "test-instance", version: "1.2.3", environment: "test" },
		);

		await expect(monitor.start()).resolves.toBeUndefined();
		expect(monitor.status).toBe("running");
	});
});

describe("PgBotStatusRepository", () => {
	it("upserts on instance_id", async () => {
		const calls: Array<{ text: string; values: unknown[] | undefined }> = [];
		const repository = new PgBotStatusRepository({
			query: async (text, values) => {
				calls.push({ text, values });
				return { rows: [] };
			},
		});

		await repository.upsert({
			instanceId: "test-instance",
			host: "worker-1",
			status: "running",
			lastHeartbeat: "2024-01-01T00:00:05.000Z",
			errorMessage: null,
			memoryUsageMb: 81.25,
			cpuUsagePct: 3.5,
			activeSince: "2024-01-01T00:00:00.000Z",
			version: "1.2.3",
			environment: "test",
			metadata: { platform: "linux" },
		});

		expect(calls).toHaveLength(1);
		expect(calls[0]?.text).toContain("ON CONFLICT (instance_id) DO UPDATE");
		expect(calls[0]?.values).toEqual([
			"test-instance",
			"worker-1",
			"running",
			"2024-01-01T00:00:05.000Z",
			null,
			81.25,
			3.5,
			"2024-01-01T00:00:00.000Z",
			"1.2.3",
			"test",
			'{"platform":"linux"}',
		]);
	});
});
