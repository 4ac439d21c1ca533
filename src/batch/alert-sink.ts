import { Effect } from "effect";
import { runEffectPromise, withTimeout } from "../core/effect-concurrency.js";
import type { Logger } from "../core/observability.js";
import type { AlertConfig } from "../config/types.js";
import { errorMessage, formatTimestamp, now } from "../types/index.js";
import type { Clock } from "../types/index.js";

export interface Alert {
  title: string;
  body: string;
}

/** Fire-and-forget notification channel. `send` may reject; callers log it. */
export interface AlertSink {
  send(alert: Alert): Promise<void>;
}

export class AlertDeliveryError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AlertDeliveryError";
  }
}

export interface WebhookPayload {
  msg_type: "text";
  content: { text: string };
}

export function buildWebhookPayload(alert: Alert, timestamp: string): WebhookPayload {
  return {
    msg_type: "text",
    content: {
      text: `[phosflow Alert]\n${alert.title}\n----------------\n${alert.body}\n\nTime: ${timestamp}`,
    },
  };
}

/** Used when no webhook is configured: alerts only reach the log. */
export class LogAlertSink implements AlertSink {
  constructor(private readonly logger: Logger) {}

  async send(alert: Alert): Promise<void> {
    this.logger.warn(alert.title, { body: alert.body });
  }
}

export interface WebhookAlertSinkOptions {
  url: string;
  timeoutMs: number;
  clock?: Clock;
  fetchImpl?: typeof fetch;
}

export class WebhookAlertSink implements AlertSink {
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly clock: Clock;
  private readonly fetchImpl: typeof fetch;

  constructor(options: WebhookAlertSinkOptions) {
    this.url = options.url;
    this.timeoutMs = options.timeoutMs;
    this.clock = options.clock ?? now;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  send(alert: Alert): Promise<void> {
    const body = JSON.stringify(buildWebhookPayload(alert, formatTimestamp(this.clock())));
    const post = Effect.tryPromise({
      try: (signal) =>
        this.fetchImpl(this.url, {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body,
          signal,
        }),
      catch: (err) =>
        new AlertDeliveryError(`Webhook request failed: ${errorMessage(err)}`, { cause: err }),
    }).pipe(
      Effect.flatMap((res) =>
        res.ok
          ? Effect.void
          : Effect.fail(new AlertDeliveryError(`Webhook responded with HTTP ${res.status}`)),
      ),
    );
    return runEffectPromise(
      withTimeout(
        post,
        this.timeoutMs,
        () => new AlertDeliveryError(`Webhook timed out after ${this.timeoutMs}ms`),
      ),
    );
  }
}

export function createAlertSink(config: AlertConfig, logger: Logger): AlertSink {
  if (config.webhookUrl === null || config.webhookUrl === "") {
    return new LogAlertSink(logger);
  }
  return new WebhookAlertSink({ url: config.webhookUrl, timeoutMs: config.timeoutMs });
}
