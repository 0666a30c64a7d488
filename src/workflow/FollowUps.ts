import { publishWithRetry, type PublishRetryOptions } from "../bus/delivery.js"
import type { MessageBus } from "../bus/MessageBus.js"
import type { A2AMessage } from "../bus/messages.js"
import { log } from "../core/Logger.js"

interface Owed {
    messages: A2AMessage[]
    flushing: Promise<void> | null
}

/**
 * Messages owed after a committed transition, keyed by the id of the message
 * that caused them.
 *
 * Once the registry has moved a task, the message that moved it is stale, so
 * a redelivery would be discarded and whatever the first handling failed to
 * publish would be lost. A follow-up whose publish fails stays here instead,
 * and `resend` publishes it again (same message id) when the trigger comes
 * back.
 */
export class FollowUps {
    private readonly owed = new Map<string, Owed>()

    constructor(
        private readonly bus: MessageBus,
        private readonly retry?: PublishRetryOptions
    ) {}

    /** Messages still waiting to be published. */
    public get size(): number {
        let count = 0
        for (const entry of this.owed.values()) count += entry.messages.length
        return count
    }

    /** Publish what `trigger` still owes. Returns false when it owes nothing. */
    public async resend(trigger: A2AMessage): Promise<boolean> {
        const entry = this.owed.get(trigger.id)
        if (!entry) return false
        log.bus(
            "Resending %d follow-up(s) of %s %s",
            entry.messages.length,
            trigger.type,
            trigger.id.slice(0, 8)
        )
        await this.flush(trigger.id, entry)
        return true
    }

    /** Publish `message` on behalf of `trigger`, keeping it owed until it goes out. */
    public async send(trigger: A2AMessage, message: A2AMessage): Promise<void> {
        const entry = this.owed.get(trigger.id) ?? { messages: [], flushing: null }
        entry.messages.push(message)
        this.owed.set(trigger.id, entry)
        await this.flush(trigger.id, entry)
    }

    // One publisher per trigger: a redelivery racing the first handling waits for it.
    private flush(triggerId: string, entry: Owed): Promise<void> {
        if (!entry.flushing) {
            entry.flushing = this.publishAll(triggerId, entry).finally(() => {
                entry.flushing = null
            })
        }
        return entry.flushing
    }

    private async publishAll(triggerId: string, entry: Owed): Promise<void> {
        for (let next = entry.messages[0]; next; next = entry.messages[0]) {
            await publishWithRetry(this.bus, next, this.retry)
            entry.messages.shift()
        }
        this.owed.delete(triggerId)
    }
}
