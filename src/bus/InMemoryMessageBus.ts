import { randomUUID } from "node:crypto"

import { DeliveryError, MessageValidationError, errorMessage } from "../core/errors.js"
import { log } from "../core/Logger.js"
import type { EventBus } from "../events/EventBus.js"
import type {
    MessageBus,
    MessageHandler,
    MessagePredicate,
    Subscription,
} from "./MessageBus.js"
import { type A2AMessage, MessageSchema, deepFreeze } from "./messages.js"

export interface InMemoryMessageBusOptions {
    /** Handler invocations per message before it is dead-lettered. */
    maxDeliveryAttempts?: number
    /** Published messages kept for `redeliver`. */
    historyLimit?: number
    events?: EventBus
}

export interface DeadLetter {
    message: A2AMessage
    subscriberId: string
    error: string
}

interface SubscriberEntry {
    id: string
    agentId: string
    predicate: MessagePredicate
    handler: MessageHandler
    active: boolean
}

const DEFAULT_MAX_DELIVERY_ATTEMPTS = 3
const DEFAULT_HISTORY_LIMIT = 10_000

export class InMemoryMessageBus implements MessageBus {
    private readonly maxDeliveryAttempts: number
    private readonly historyLimit: number
    private readonly events?: EventBus
    private readonly subscribers = new Map<string, SubscriberEntry>()
    private readonly lanes = new Map<string, Promise<void>>()
    private readonly inflight = new Set<Promise<void>>()
    private readonly history = new Map<string, A2AMessage>()
    private readonly deadLetters: DeadLetter[] = []
    private state: "idle" | "connected" | "closed" = "idle"

    constructor(options: InMemoryMessageBusOptions = {}) {
        this.maxDeliveryAttempts =
            options.maxDeliveryAttempts ?? DEFAULT_MAX_DELIVERY_ATTEMPTS
        this.historyLimit = options.historyLimit ?? DEFAULT_HISTORY_LIMIT
        this.events = options.events
    }

    public get connected(): boolean {
        return this.state === "connected"
    }

    public async connect(): Promise<void> {
        if (this.state === "closed") {
            throw new DeliveryError("Message bus has been closed")
        }
        this.state = "connected"
        log.bus("Connected")
    }

    public async publish(message: A2AMessage): Promise<string> {
        if (this.state !== "connected") {
            throw new DeliveryError(
                `Message bus is ${this.state === "closed" ? "closed" : "not connected"}; cannot publish ${message.type} ${message.id}`
            )
        }
        const parsed = MessageSchema.safeParse(message)
        if (!parsed.success) {
            const issues = parsed.error.issues.map(
                (issue) => `${issue.path.join(".")}: ${issue.message}`
            )
            throw new MessageValidationError(
                `Rejected ${String(message.type)} message ${message.id}`,
                issues
            )
        }
        const accepted: A2AMessage = deepFreeze(parsed.data)
        this.remember(accepted)

        log.bus(
            "Published %s %s from %s to %s",
            accepted.type,
            accepted.id.slice(0, 8),
            accepted.sender_id,
            accepted.recipient_id ?? `role:${accepted.recipient_role}`
        )
        this.events?.emit({
            type: "message:published",
            messageId: accepted.id,
            messageType: accepted.type,
            senderId: accepted.sender_id,
            recipient: accepted.recipient_id ?? `role:${accepted.recipient_role}`,
            taskId: accepted.task_id,
        })

        this.dispatch(accepted)
        return accepted.id
    }

    public subscribe(
        agentId: string,
        predicate: MessagePredicate,
        handler: MessageHandler
    ): Subscription {
        const entry: SubscriberEntry = {
            id: randomUUID(),
            agentId,
            predicate,
            handler,
            active: true,
        }
        this.subscribers.set(entry.id, entry)
        log.bus("Subscribed %s (%s)", agentId, entry.id.slice(0, 8))
        return {
            id: entry.id,
            agentId,
            unsubscribe: (): void => {
                entry.active = false
                this.subscribers.delete(entry.id)
            },
        }
    }

    /** Deliver an already-published message again, as a broker would after a lost ack. */
    public redeliver(messageId: string): void {
        const message = this.history.get(messageId)
        if (!message) {
            throw new DeliveryError(`Unknown message ${messageId}`)
        }
        log.bus("Redelivering %s %s", message.type, messageId.slice(0, 8))
        this.dispatch(message)
    }

    public getDeadLetters(): DeadLetter[] {
        return [...this.deadLetters]
    }

    public async drain(): Promise<void> {
        while (this.inflight.size > 0) {
            await Promise.all([...this.inflight])
        }
    }

    public async close(): Promise<void> {
        if (this.state === "closed") return
        await this.drain()
        this.state = "closed"
        for (const entry of this.subscribers.values()) {
            entry.active = false
        }
        this.subscribers.clear()
        log.bus("Closed")
    }

    private remember(message: A2AMessage): void {
        this.history.set(message.id, message)
        if (this.history.size > this.historyLimit) {
            const oldest = this.history.keys().next()
            if (!oldest.done) this.history.delete(oldest.value)
        }
    }

    private dispatch(message: A2AMessage): void {
        for (const entry of this.subscribers.values()) {
            if (entry.predicate(message)) {
                this.enqueue(entry, message)
            }
        }
    }

    private enqueue(entry: SubscriberEntry, message: A2AMessage): void {
        const laneKey = `${entry.id}|${message.sender_id}|${message.task_id}`
        const previous = this.lanes.get(laneKey) ?? Promise.resolve()
        const next = previous.then(() => this.deliver(entry, message))
        this.lanes.set(laneKey, next)
        this.inflight.add(next)
        void next.then(() => {
            this.inflight.delete(next)
            if (this.lanes.get(laneKey) === next) {
                this.lanes.delete(laneKey)
            }
        })
    }

    private async deliver(
        entry: SubscriberEntry,
        message: A2AMessage
    ): Promise<void> {
        let lastError = ""
        for (let attempt = 1; attempt <= this.maxDeliveryAttempts; attempt++) {
            if (!entry.active) return
            try {
                await entry.handler(message)
                return
            } catch (error) {
                lastError = errorMessage(error)
                log.bus(
                    "Handler %s failed on %s %s (attempt %d/%d): %s",
                    entry.agentId,
                    message.type,
                    message.id.slice(0, 8),
                    attempt,
                    this.maxDeliveryAttempts,
                    lastError
                )
            }
        }
        this.deadLetters.push({
            message,
            subscriberId: entry.agentId,
            error: lastError,
        })
        this.events?.emit({
            type: "message:dead_letter",
            messageId: message.id,
            messageType: message.type,
            subscriberId: entry.agentId,
            error: lastError,
        })
    }
}
