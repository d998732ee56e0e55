import type { App } from "@slack/bolt";
import type { EventRouter } from "../router/event-router.js";
import {
  InboundValidationError,
  parseAction,
  parseCommand,
  parseHomeOpened,
  parseMessage,
  parseViewSubmission,
  type Ack,
  type InboundUnit,
} from "../router/inbound.js";

// Events API deliveries are acknowledged by Bolt's receiver itself.
const eventAck: Ack = async () => {};

/**
 * Normalize a raw payload and hand it to the router. A payload that does
 * not match its schema is still acknowledged, then logged and dropped.
 */
export async function forward(
  router: EventRouter,
  kind: string,
  parse: () => InboundUnit,
  ack: Ack
): Promise<void> {
  let unit: InboundUnit;
  try {
    unit = parse();
  } catch (err) {
    await ack();
    if (err instanceof InboundValidationError) {
      console.warn(`[slack] Dropped malformed ${kind} payload:`);
      for (const issue of err.issues) {
        console.warn(`  • [${issue.path.join(".")}] ${issue.message}`);
      }
      return;
    }
    throw err;
  }
  await router.dispatch(unit, ack);
}

/**
 * Register one Bolt listener per entry in the router's dispatch table,
 * plus the two Events API subscriptions.
 */
export function registerSlackListeners(app: App, router: EventRouter): void {
  for (const name of router.names("event")) {
    if (name === "app_home_opened") {
      app.event("app_home_opened", async ({ event }) => {
        await forward(router, name, () => parseHomeOpened(event), eventAck);
      });
    } else if (name === "message") {
      app.event("message", async ({ event }) => {
        await forward(router, name, () => parseMessage(event), eventAck);
      });
    } else {
      console.warn(`[slack] No Bolt subscription for event "${name}"`);
    }
  }

  for (const name of router.names("command")) {
    app.command(name, async ({ ack, body }) => {
      await forward(router, name, () => parseCommand(body), () => ack());
    });
  }

  for (const name of router.names("action")) {
    app.action(name, async ({ ack, body }) => {
      await forward(router, name, () => parseAction(body), () => ack());
    });
  }

  for (const name of router.names("view_submission")) {
    app.view(name, async ({ ack, body }) => {
      await forward(router, name, () => parseViewSubmission(body), () => ack());
    });
  }

  console.log(
    `[slack] Registered listeners: ${(["event", "command", "action", "view_submission"] as const)
      .map((c) => `${router.names(c).length} ${c}`)
      .join(", ")}`
  );
}
