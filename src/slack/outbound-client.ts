import type { WebClient } from "@slack/web-api";
import type { Block, HomeView, ModalView } from "../blocks/types.js";

export type OutboundOperation = "send" | "update" | "publish" | "open";

/**
 * Everything the bot sends to Slack goes through this interface.
 * Implementations reject with DeliveryError when Slack refuses a call.
 */
export interface OutboundClient {
  /** `text` is the notification fallback; an empty `blocks` sends text only. */
  send(channel: string, blocks: Block[], text: string): Promise<void>;
  update(channel: string, ts: string, blocks: Block[], text: string): Promise<void>;
  publish(userId: string, view: HomeView): Promise<void>;
  open(triggerId: string, view: ModalView): Promise<void>;
}

/** Pull Slack's error code out of a Web API failure (e.g. "channel_not_found"). */
export function slackErrorCode(err: unknown): string {
  if (typeof err === "object" && err !== null) {
    if (
      "data" in err &&
      typeof err.data === "object" &&
      err.data !== null &&
      "error" in err.data &&
      typeof err.data.error === "string"
    ) {
      return err.data.error;
    }
    if ("code" in err && typeof err.code === "string") {
      return err.code;
    }
  }
  return err instanceof Error ? err.message : String(err);
}

export class DeliveryError extends Error {
  readonly operation: OutboundOperation;
  readonly target: string;
  readonly code: string;

  constructor(operation: OutboundOperation, target: string, cause: unknown) {
    const code = slackErrorCode(cause);
    super(`${operation} to ${target} failed: ${code}`, { cause });
    this.name = "DeliveryError";
    this.operation = operation;
    this.target = target;
    this.code = code;
  }
}

/** OutboundClient backed by the Slack Web API. Retries are left to WebClient. */
export class SlackOutboundClient implements OutboundClient {
  private client: WebClient;

  constructor(client: WebClient) {
    this.client = client;
  }

  async send(channel: string, blocks: Block[], text: string): Promise<void> {
    try {
      await this.client.chat.postMessage({
        channel,
        text,
        ...(blocks.length > 0 ? { blocks } : {}),
      });
    } catch (err) {
      throw new DeliveryError("send", channel, err);
    }
  }

  async update(channel: string, ts: string, blocks: Block[], text: string): Promise<void> {
    try {
      await this.client.chat.update({ channel, ts, blocks, text });
    } catch (err) {
      throw new DeliveryError("update", channel, err);
    }
  }

  async publish(userId: string, view: HomeView): Promise<void> {
    try {
      await this.client.views.publish({ user_id: userId, view });
    } catch (err) {
      throw new DeliveryError("publish", userId, err);
    }
  }

  async open(triggerId: string, view: ModalView): Promise<void> {
    try {
      await this.client.views.open({ trigger_id: triggerId, view });
    } catch (err) {
      throw new DeliveryError("open", triggerId, err);
    }
  }
}
