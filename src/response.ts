import { STATUS_BIT_MESSAGES, STATUS_OK_BIT } from "./constants.js";

export interface WriteStatus {
  /** True when bit 7 is set, whatever else is */
  success: boolean;
  messages: string[];
}

/**
 * Decode the status byte of an `S:<code>` reply.
 *
 * The success message comes first, followed by every failure bit that is
 * set, lowest bit first.
 */
export function interpretWriteStatus(code: number): WriteStatus {
  if (!Number.isInteger(code) || code < 0 || code > 0xff) {
    return { success: false, messages: [`Unknown response code: ${code}`] };
  }

  const success = (code & (1 << STATUS_OK_BIT)) !== 0;
  const messages: string[] = [];

  if (success) {
    messages.push(STATUS_BIT_MESSAGES[STATUS_OK_BIT]);
  }
  for (let bit = 0; bit < STATUS_OK_BIT; bit++) {
    if (code & (1 << bit)) {
      messages.push(STATUS_BIT_MESSAGES[bit]);
    }
  }

  if (messages.length === 0) {
    messages.push("No status bits set (Code 0)");
  }

  return { success, messages };
}
