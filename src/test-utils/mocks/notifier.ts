/**
 * Scripted notifier for dispatcher and scheduler tests
 */

import type { NotificationMessage, Notifier, SendResult } from "../../alerting/types";

export interface ScriptedNotifier extends Notifier {
  sent: NotificationMessage[];
}

/**
 * Returns the scripted results in order, repeating the last one.
 * A step that is an Error is thrown instead of returned.
 */
export function createScriptedNotifier(script: Array<SendResult | Error>): ScriptedNotifier {
  const sent: NotificationMessage[] = [];

  return {
    name: "scripted",
    sent,
    async send(message) {
      const step = script[Math.min(sent.length, script.length - 1)];
      sent.push(message);

      if (step === undefined) {
        return { status: "delivered" };
      }
      if (step instanceof Error) {
        throw step;
      }
      return step;
    },
  };
}
