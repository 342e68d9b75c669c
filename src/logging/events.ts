import { errorMessage } from "../errors.js";
import { type EventSink, type RLMRuntimeEvent, type RuntimeEventEmitter } from "./traceTypes.js";

/**
 * Builds the emitter used by the orchestrator and the agent runner. Sink
 * failures are reported on stderr when verbose and never reach the caller.
 */
export function createEventEmitter(eventSink: EventSink | undefined, verbose: boolean): RuntimeEventEmitter {
  return async (event) => {
    if (!eventSink) {
      return;
    }

    const payload: RLMRuntimeEvent = {
      ts: Date.now(),
      ...event,
    };

    try {
      await eventSink(payload);
    } catch (error) {
      if (verbose) {
        process.stderr.write(`[rlm] event sink error: ${errorMessage(error)}\n`);
      }
    }
  };
}

export function logVerbose(verbose: boolean, message: string): void {
  if (verbose) {
    process.stderr.write(`[rlm] ${message}\n`);
  }
}
