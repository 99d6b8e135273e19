// pattern: Imperative Shell
import type { Logger } from "pino";
import { DispatchError, errorMessage } from "./errors";
import type { FloodGate } from "./flood";
import type { NotificationPayload } from "./types";

export type DispatchResult =
  | { readonly success: true; readonly status: number }
  | { readonly success: false; readonly error: DispatchError };

/**
 * Delivers one notification. Never throws; failures come back in the result.
 */
export type SendNotificationFn = (
  payload: NotificationPayload,
  logger: Logger,
) => Promise<DispatchResult>;

export type NtfyOptions = {
  readonly baseUrl: string;
  readonly token?: string;
  readonly userAgent: string;
  readonly timeoutMs: number;
};

export type NotificationRequest = {
  readonly url: string;
  readonly init: {
    readonly method: "POST";
    readonly headers: Record<string, string>;
    readonly body: string;
  };
};

/**
 * Makes a value safe for an HTTP header. Line breaks become spaces and
 * non-ASCII text is sent as an RFC 2047 encoded word, which ntfy decodes.
 */
export function encodeHeaderValue(value: string): string {
  const singleLine = value.replace(/[\r\n]+/g, " ").trim();
  if (/^[\x20-\x7e]*$/.test(singleLine)) return singleLine;
  return `=?UTF-8?B?${Buffer.from(singleLine, "utf-8").toString("base64")}?=`;
}

export function buildNotificationRequest(
  payload: NotificationPayload,
  options: Pick<NtfyOptions, "baseUrl" | "token" | "userAgent">,
): NotificationRequest {
  const headers: Record<string, string> = {
    "User-Agent": options.userAgent,
    Title: encodeHeaderValue(payload.title),
    Priority: String(payload.priority),
  };

  if (payload.tags.length > 0) {
    headers["Tags"] = encodeHeaderValue(payload.tags.join(","));
  }
  if (payload.icon) headers["Icon"] = payload.icon;
  if (payload.attachment) headers["Attach"] = payload.attachment;
  if (payload.clickUrl) headers["Click"] = payload.clickUrl;
  if (payload.publishedAt) headers["X-Publish-Date"] = payload.publishedAt;
  if (payload.markdown) headers["Markdown"] = "yes";
  if (options.token) headers["Authorization"] = `Bearer ${options.token}`;

  const base = options.baseUrl.replace(/\/+$/, "");

  return {
    url: `${base}/${encodeURIComponent(payload.topic)}`,
    init: { method: "POST", headers, body: payload.message },
  };
}

/**
 * Creates a sender that publishes notifications to an ntfy server.
 */
export function createNtfySender(options: NtfyOptions): SendNotificationFn {
  return async function sendNotification(
    payload: NotificationPayload,
    logger: Logger,
  ): Promise<DispatchResult> {
    const request = buildNotificationRequest(payload, options);

    try {
      const response = await fetch(request.url, {
        ...request.init,
        signal: AbortSignal.timeout(options.timeoutMs),
      });

      if (!response.ok) {
        const message = `HTTP ${response.status}: ${response.statusText}`;
        logger.error(
          { topic: payload.topic, title: payload.title, status: response.status },
          "notification rejected",
        );
        return {
          success: false,
          error: new DispatchError(payload.topic, response.status, message),
        };
      }

      logger.info(
        {
          topic: payload.topic,
          title: payload.title,
          priority: payload.priority,
          status: response.status,
        },
        "notification sent",
      );
      return { success: true, status: response.status };
    } catch (err) {
      const message = errorMessage(err);
      logger.error(
        { topic: payload.topic, title: payload.title, error: message },
        "notification send failed",
      );
      return {
        success: false,
        error: new DispatchError(payload.topic, null, message, { cause: err }),
      };
    }
  };
}

export type Dispatcher = {
  readonly dispatch: (payload: NotificationPayload) => Promise<DispatchResult>;
};

export type DispatcherDeps = {
  readonly send: SendNotificationFn;
  readonly gate: FloodGate;
  readonly logger: Logger;
  /** Aborts a pending flood-gate wait. A send already in flight still completes. */
  readonly signal?: AbortSignal;
};

/**
 * Serializes dispatches through one flood gate. Create one per sync cycle so
 * the first notification of a cycle is never delayed.
 */
export function createDispatcher(deps: DispatcherDeps): Dispatcher {
  return {
    dispatch: async (payload) => {
      const waitedMs = await deps.gate.wait(payload.priority, deps.signal);
      if (waitedMs > 0) {
        deps.logger.debug(
          { topic: payload.topic, priority: payload.priority, waitedMs },
          "dispatch paced by flood gate",
        );
      }

      deps.gate.markDispatched();
      return deps.send(payload, deps.logger);
    },
  };
}
