import axios from "axios";
import { config } from "../config";
import { logger } from "../utils/logger";

/**
 * Best-effort notification. Missing credentials or a failing Telegram API are
 * logged; the trading path never fails because of a notification.
 */
export async function sendTelegramMessage(text: string): Promise<void> {
	if (!config.telegram.botToken || !config.telegram.chatId) {
		logger.debug("Telegram bot token or chat id missing, skipping notification");
		return;
	}

	const url = `https://api.telegram.org/bot${config.telegram.botToken}/sendMessage`;

	try {
		await axios.post(
			url,
			{
				chat_id: config.telegram.chatId,
				text,
			},
			{ timeout: 10_000 },
		);
	} catch (err) {
		logger.warn({ err }, "Failed to send Telegram message");
	}
}

export function formatError(context: string, error: unknown): string {
	const reason = error instanceof Error ? error.message : String(error);
	return `${context}: ${reason}`;
}
