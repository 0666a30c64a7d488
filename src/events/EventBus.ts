import { EventEmitter } from "node:events"

import type { ConclaveEvent } from "./types.js"

type EventHandler = (event: ConclaveEvent) => void

/** In-process observability channel. Not the agent message bus. */
export class EventBus {
    private emitter: EventEmitter = new EventEmitter()

    constructor() {
        this.emitter.setMaxListeners(0)
    }

    public on(handler: EventHandler): void {
        this.emitter.on("event", handler)
    }

    public emit(event: ConclaveEvent): void {
        this.emitter.emit("event", event)
    }

    public off(handler: EventHandler): void {
        this.emitter.off("event", handler)
    }

    public removeAllListeners(): void {
        this.emitter.removeAllListeners("event")
    }
}
