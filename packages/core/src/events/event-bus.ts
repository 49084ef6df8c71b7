import { EventEmitter } from "node:events";
import type { RunEventEnvelope } from "../contracts/events.js";

export class RunEventBus extends EventEmitter {
  emitEvent<T>(event: RunEventEnvelope<T>): void {
    this.emit("event", event);
    this.emit(event.type, event);
  }
}
