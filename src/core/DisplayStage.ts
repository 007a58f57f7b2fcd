import type { DisplayMessage } from "../types";
import { ErrorCodes } from "../utils/error";
import { failureOutcome, type StageHandler, type StageOutcome } from "./StageWorker";

export type DisplayDelivery = (message: DisplayMessage) => void;

// Gives the event loop a turn between messages so display code runs on its
// own tick, never inside a stage worker's call stack.
function nextTick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/**
 * Consumer side of the display channel. Workers only post messages; this
 * stage hands them to the display one at a time.
 */
export class DisplayStage implements StageHandler<DisplayMessage, never> {
  constructor(private readonly deliver: DisplayDelivery) {}

  async handle(message: DisplayMessage): Promise<StageOutcome> {
    await nextTick();

    try {
      this.deliver(message);
    } catch (error) {
      return failureOutcome(error, "Display rejected a message", ErrorCodes.DISPLAY_FAILED, {
        component: "DisplayStage",
        kind: message.kind,
      });
    }

    return { status: "ok", produced: 0 };
  }
}
