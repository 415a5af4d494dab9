/**
 * Webhook Notifier
 *
 * POSTs the JSON check report to a configured URL. Delivery failures are
 * logged and rethrown; the snapshot is already saved by then, so the
 * next run will not re-announce the same changes.
 */
import axios, { type AxiosInstance } from "axios";
import type { CheckReport } from "../workers/check.types";
import type { Notifier } from "./notifier.types";
import config from "../config";
import { logger } from "../monitoring/logger";

export class WebhookNotifier implements Notifier {
  readonly name = "webhook";
  private url: string;
  private client: AxiosInstance;

  constructor(
    url: string,
    client: AxiosInstance = axios.create({ timeout: config.fetchTimeoutMs })
  ) {
    this.url = url;
    this.client = client;
  }

  async notify(report: CheckReport): Promise<void> {
    try {
      const response = await this.client.post(this.url, report, {
        headers: { "Content-Type": "application/json" },
      });
      logger.info(
        { scope: report.scope, status: response.status },
        "Webhook notification delivered"
      );
    } catch (error) {
      logger.error(
        { scope: report.scope, error: (error as Error).message },
        "Webhook notification failed"
      );
      throw error;
    }
  }
}
