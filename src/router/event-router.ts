import type { AutomationStore } from "../store/automation-store.js";
import type { OutboundClient } from "../slack/outbound-client.js";
import type { Ack, InboundCategory, InboundUnit } from "./inbound.js";

export interface HandlerContext {
  store: AutomationStore;
  client: OutboundClient;
  now: () => Date;
}

type UnitOf<C extends InboundCategory> = Extract<InboundUnit, { category: C }>;

export type Handler<U extends InboundUnit> = (unit: U, ctx: HandlerContext) => Promise<void>;

type DispatchTable = { [C in InboundCategory]: Map<string, Handler<UnitOf<C>>> };

export type DispatchResult =
  | { handled: false }
  | { handled: true; ok: boolean };

export function describeUnit(unit: InboundUnit): string {
  return `${unit.category}:${unit.name}`;
}

/**
 * Routes inbound units to handlers keyed by (category, name).
 * Stateless between units: anything that must outlive a dispatch lives in
 * the store.
 *
 * Every unit is acknowledged before its handler runs. A unit with no
 * handler resolves to { handled: false }; a failing handler is logged and
 * resolves to { handled: true, ok: false }. dispatch() never rejects.
 */
export class EventRouter {
  private ctx: HandlerContext;
  private table: DispatchTable = {
    event: new Map(),
    command: new Map(),
    action: new Map(),
    view_submission: new Map(),
  };

  constructor(store: AutomationStore, client: OutboundClient, now: () => Date = () => new Date()) {
    this.ctx = { store, client, now };
  }

  on<C extends InboundCategory>(category: C, name: string, handler: Handler<UnitOf<C>>): this {
    this.table[category].set(name, handler);
    return this;
  }

  /** Names registered under a category, in registration order. */
  names(category: InboundCategory): string[] {
    return [...this.table[category].keys()];
  }

  async dispatch(unit: InboundUnit, ack: Ack): Promise<DispatchResult> {
    try {
      await ack();
    } catch (err) {
      console.error(`[router] Failed to acknowledge ${describeUnit(unit)}:`, err);
    }

    const run = this.resolve(unit);
    if (!run) return { handled: false };

    try {
      await run();
      return { handled: true, ok: true };
    } catch (err) {
      console.error(`[router] Handler for ${describeUnit(unit)} failed:`, err);
      return { handled: true, ok: false };
    }
  }

  private resolve(unit: InboundUnit): (() => Promise<void>) | undefined {
    switch (unit.category) {
      case "event":
        return bind(this.table.event.get(unit.name), unit, this.ctx);
      case "command":
        return bind(this.table.command.get(unit.name), unit, this.ctx);
      case "action":
        return bind(this.table.action.get(unit.name), unit, this.ctx);
      case "view_submission":
        return bind(this.table.view_submission.get(unit.name), unit, this.ctx);
    }
  }
}

function bind<U extends InboundUnit>(
  handler: Handler<U> | undefined,
  unit: U,
  ctx: HandlerContext
): (() => Promise<void>) | undefined {
  return handler && (() => handler(unit, ctx));
}
