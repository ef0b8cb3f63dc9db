import fs from "node:fs/promises";
import path from "node:path";
import axios from "axios";
import type { Notifier } from "../types";
import { logger } from "../utils/logger";

export type TelegramSettings = {
	botToken: string;
	chatId: string;
	timeoutMs: number;
};

export function createTelegramNotifier(settings: TelegramSettings): Notifier {
	const baseUrl = `https://api.telegram.org/bot${settings.botToken}`;
	const configured = Boolean(settings.botToken && settings.chatId);

	return {
		async sendMessage(text: string): Promise<void> {
			if (!configured) {
				logger.warn("Telegram bot token or chat id missing, skipping notification");
				return;
			}

			await axios.post(
				`${baseUrl}/sendMessage`,
				{ chat_id: settings.chatId, text },
				{ timeout: settings.timeoutMs },
			);
		},

		async sendDocument(filePath: string, caption: string): Promise<void> {
			if (!configured) {
				logger.warn("Telegram bot token or chat id missing, skipping document");
				return;
			}

			const content = await fs.readFile(filePath);
			const form = new FormData();
			form.append("chat_id", settings.chatId);
			form.append("caption", caption);
			form.append("document", new Blob([content]), path.basename(filePath));

			await axios.post(`${baseUrl}/sendDocument`, form, {
				timeout: settings.timeoutMs,
			});
		},
	};
}
