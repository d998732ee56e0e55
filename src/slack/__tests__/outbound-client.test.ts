import { describe, it, expect, vi, afterEach } from "vitest";
import { WebClient } from "@slack/web-api";
import { DeliveryError, SlackOutboundClient, slackErrorCode } from "../outbound-client.js";
import { deliver } from "../deliver.js";
import { header } from "../../blocks/builders.js";
import { dashboardHome, taskModal } from "../../blocks/documents.js";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("slackErrorCode()", () => {
  it("prefers the Web API error code", () => {
    const err = Object.assign(new Error("An API error occurred: channel_not_found"), {
      code: "slack_webapi_platform_error",
      data: { ok: false, error: "channel_not_found" },
    });
    expect(slackErrorCode(err)).toBe("channel_not_found");
  });

  it("falls back to the client's own code", () => {
    const err = Object.assign(new Error("request failed"), { code: "slack_webapi_request_error" });
    expect(slackErrorCode(err)).toBe("slack_webapi_request_error");
  });

  it("falls back to the message, then to the value itself", () => {
    expect(slackErrorCode(new Error("socket hang up"))).toBe("socket hang up");
    expect(slackErrorCode("plain")).toBe("plain");
  });
});

describe("DeliveryError", () => {
  it("names the operation, target and Slack code", () => {
    const cause = { data: { error: "not_in_channel" } };
    const err = new DeliveryError("send", "C1", cause);
    expect(err.message).toBe("send to C1 failed: not_in_channel");
    expect(err.code).toBe("not_in_channel");
    expect(err.cause).toBe(cause);
  });
});

describe("SlackOutboundClient", () => {
  function setup() {
    const web = new WebClient("xoxb-test");
    return { web, client: new SlackOutboundClient(web) };
  }

  it("omits blocks from a text-only message", async () => {
    const { web, client } = setup();
    const post = vi.spyOn(web.chat, "postMessage").mockResolvedValue({ ok: true });

    await client.send("C1", [], "Hello");

    expect(post).toHaveBeenCalledWith({ channel: "C1", text: "Hello" });
  });

  it("posts blocks with their fallback text", async () => {
    const { web, client } = setup();
    const post = vi.spyOn(web.chat, "postMessage").mockResolvedValue({ ok: true });
    const blocks = [header("Hi")];

    await client.send("C1", blocks, "fallback");

    expect(post).toHaveBeenCalledWith({ channel: "C1", text: "fallback", blocks });
  });

  it("updates a message by channel and ts", async () => {
    const { web, client } = setup();
    const update = vi.spyOn(web.chat, "update").mockResolvedValue({ ok: true });
    const blocks = [header("Done")];

    await client.update("C1", "1700000000.000100", blocks, "Request approved");

    expect(update).toHaveBeenCalledWith({
      channel: "C1",
      ts: "1700000000.000100",
      blocks,
      text: "Request approved",
    });
  });

  it("publishes home views and opens modals", async () => {
    const { web, client } = setup();
    const publish = vi.spyOn(web.views, "publish").mockResolvedValue({ ok: true });
    const open = vi.spyOn(web.views, "open").mockResolvedValue({ ok: true });

    await client.publish("U1", dashboardHome());
    await client.open("T1", taskModal());

    expect(publish).toHaveBeenCalledWith({ user_id: "U1", view: dashboardHome() });
    expect(open).toHaveBeenCalledWith({ trigger_id: "T1", view: taskModal() });
  });

  it("wraps a refused call in DeliveryError", async () => {
    const { web, client } = setup();
    vi.spyOn(web.views, "open").mockRejectedValue(
      Object.assign(new Error("An API error occurred: expired_trigger_id"), {
        data: { ok: false, error: "expired_trigger_id" },
      })
    );

    await expect(client.open("T1", taskModal())).rejects.toMatchObject({
      name: "DeliveryError",
      operation: "open",
      target: "T1",
      code: "expired_trigger_id",
    });
  });
});

describe("deliver()", () => {
  it("returns true when the call succeeds", async () => {
    expect(await deliver("test", "do it", async () => {})).toBe(true);
  });

  it("logs the Slack code and returns false on a DeliveryError", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const ok = await deliver("jobs", "send report", async () => {
      throw new DeliveryError("send", "C1", { data: { error: "is_archived" } });
    });
    expect(ok).toBe(false);
    expect(error).toHaveBeenCalledWith("[jobs] Failed to send report: is_archived");
  });

  it("logs any other error as-is", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const boom = new TypeError("bad");
    expect(await deliver("router", "open modal", async () => { throw boom; })).toBe(false);
    expect(error).toHaveBeenCalledWith("[router] Failed to open modal:", boom);
  });
});
