/**
 * Notifier selection: webhook when NOTIFY_WEBHOOK_URL is set, log otherwise.
 */
import config from "../config";
import type { Notifier } from "./notifier.types";
import { LogNotifier } from "./log.notifier";
import { WebhookNotifier } from "./webhook.notifier";

export function createNotifier(webhookUrl: string = config.notifyWebhookUrl): Notifier {
  return webhookUrl ? new WebhookNotifier(webhookUrl) : new LogNotifier();
}

export type { Notifier } from "./notifier.types";
export { hasChanges } from "./notifier.types";
