import type { AgentRole } from "../types.js"
import type { A2AMessage } from "./messages.js"

export type MessagePredicate = (message: A2AMessage) => boolean

export type MessageHandler = (message: A2AMessage) => Promise<void> | void

export interface Subscription {
    readonly id: string
    readonly agentId: string
    unsubscribe(): void
}

/**
 * Delivery contract shared by every transport.
 *
 * - `publish` fails with `DeliveryError` while the bus is not connected.
 * - Delivery is at-least-once: handlers must be idempotent on `message.id`.
 * - Messages with the same `(sender_id, task_id)` reach a subscriber in
 *   publish order. Nothing is promised across senders.
 */
export interface MessageBus {
    readonly connected: boolean
    connect(): Promise<void>
    publish(message: A2AMessage): Promise<string>
    subscribe(
        agentId: string,
        predicate: MessagePredicate,
        handler: MessageHandler
    ): Subscription
    /** Resolves once every accepted message has been handled or dead-lettered. */
    drain(): Promise<void>
    close(): Promise<void>
}

/**
 * Matches messages addressed to `agentId`, plus role broadcasts
 * (`recipient_id === null`) for `role`.
 */
export function forRecipient(agentId: string, role: AgentRole): MessagePredicate {
    return (message: A2AMessage): boolean =>
        message.recipient_id === agentId ||
        (message.recipient_id === null && message.recipient_role === role)
}
