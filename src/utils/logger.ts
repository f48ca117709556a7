import pino from "pino";

export const logger = pino({
	level: process.env.LOG_LEVEL || "info",
	timestamp: pino.stdTimeFunctions.isoTime,
	serializers: {
		err: pino.stdSerializers.err,
		error: pino.stdSerializers.err,
	},
});
