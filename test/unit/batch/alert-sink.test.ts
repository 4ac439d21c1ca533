import { describe, expect, test } from "vitest";
import {
  AlertDeliveryError,
  LogAlertSink,
  WebhookAlertSink,
  buildWebhookPayload,
  createAlertSink,
} from "../../../src/batch/alert-sink.js";
import { silentLogger } from "../../../src/core/observability.js";
import { T0, captureLogger } from "../../helpers/fixtures.js";

const alert = { title: "Calculation failed: mol", body: "Reason: boom" };

interface Call {
  url: string;
  init: RequestInit | undefined;
}

function recordingFetch(response: () => Promise<Response>): { calls: Call[]; fetchImpl: typeof fetch } {
  const calls: Call[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    calls.push({ url: String(input), init });
    return response();
  };
  return { calls, fetchImpl };
}

describe("buildWebhookPayload", () => {
  test("formats a text message", () => {
    expect(buildWebhookPayload(alert, "2024-01-01 00:00:00")).toEqual({
      msg_type: "text",
      content: {
        text: "[phosflow Alert]\nCalculation failed: mol\n----------------\nReason: boom\n\nTime: 2024-01-01 00:00:00",
      },
    });
  });
});

describe("WebhookAlertSink", () => {
  test("posts the payload as JSON", async () => {
    const { calls, fetchImpl } = recordingFetch(async () => new Response(null, { status: 200 }));
    const sink = new WebhookAlertSink({
      url: "http://hooks.test/alert",
      timeoutMs: 1_000,
      clock: () => T0,
      fetchImpl,
    });

    await sink.send(alert);
    expect(calls).toHaveLength(1);
    expect(calls[0]?.url).toBe("http://hooks.test/alert");
    expect(calls[0]?.init?.method).toBe("POST");
    expect(JSON.parse(String(calls[0]?.init?.body))).toEqual(
      buildWebhookPayload(alert, "2024-01-01 00:00:00"),
    );
  });

  test("a non-2xx response is a delivery error", async () => {
    const { fetchImpl } = recordingFetch(async () => new Response("nope", { status: 500 }));
    const sink = new WebhookAlertSink({ url: "http://hooks.test", timeoutMs: 1_000, fetchImpl });
    await expect(sink.send(alert)).rejects.toThrow("Webhook responded with HTTP 500");
  });

  test("a network failure is a delivery error", async () => {
    const { fetchImpl } = recordingFetch(async () => {
      throw new Error("connection refused");
    });
    const sink = new WebhookAlertSink({ url: "http://hooks.test", timeoutMs: 1_000, fetchImpl });
    await expect(sink.send(alert)).rejects.toThrow(AlertDeliveryError);
    await expect(sink.send(alert)).rejects.toThrow("Webhook request failed: connection refused");
  });

  test("a slow endpoint times out", async () => {
    const fetchImpl: typeof fetch = (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
      });
    const sink = new WebhookAlertSink({ url: "http://hooks.test", timeoutMs: 20, fetchImpl });
    await expect(sink.send(alert)).rejects.toThrow("Webhook timed out after 20ms");
  });
});

describe("createAlertSink", () => {
  test("no webhook means alerts go to the log", async () => {
    const { logger, entries } = captureLogger("alerts");
    const sink = createAlertSink({ webhookUrl: null, timeoutMs: 1_000 }, logger);
    expect(sink).toBeInstanceOf(LogAlertSink);

    await sink.send(alert);
    expect(entries()).toEqual([
      expect.objectContaining({
        level: "warn",
        component: "alerts",
        message: "Calculation failed: mol",
        data: { body: "Reason: boom" },
      }),
    ]);
  });

  test("a webhook URL selects the webhook sink", () => {
    const sink = createAlertSink({ webhookUrl: "http://hooks.test", timeoutMs: 1_000 }, silentLogger());
    expect(sink).toBeInstanceOf(WebhookAlertSink);
    expect(createAlertSink({ webhookUrl: "", timeoutMs: 1_000 }, silentLogger())).toBeInstanceOf(
      LogAlertSink,
    );
  });
});
