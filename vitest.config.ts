import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["src/**/*.test.ts"],
		environment: "node",
		env: {
			LOG_LEVEL: "silent",
			TELEGRAM_BOT_TOKEN: "",
			TELEGRAM_CHAT_ID: "",
			DATABASE_URL: "",
		},
	},
});
