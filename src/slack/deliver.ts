import { DeliveryError } from "./outbound-client.js";

/**
 * Run one outbound call, logging and swallowing any failure.
 * Returns false when the call failed.
 */
export async function deliver(
  tag: string,
  what: string,
  call: () => Promise<void>
): Promise<boolean> {
  try {
    await call();
    return true;
  } catch (err) {
    if (err instanceof DeliveryError) {
      console.error(`[${tag}] Failed to ${what}: ${err.code}`);
    } else {
      console.error(`[${tag}] Failed to ${what}:`, err);
    }
    return false;
  }
}
