import { setTimeout as sleep } from "node:timers/promises"

import { DeliveryError, errorMessage } from "../core/errors.js"
import { log } from "../core/Logger.js"
import type { MessageBus } from "./MessageBus.js"
import type { A2AMessage, MessageOf } from "./messages.js"

const DEFAULT_RETRY_DELAYS = [100, 200, 400]

export interface PublishRetryOptions {
    /** One entry per retry; the first publish is not delayed. */
    delaysMs?: number[]
}

/**
 * Publish, retrying `DeliveryError` with backoff. Any other error (an invalid
 * message, for one) is not retryable and is thrown straight away.
 */
export async function publishWithRetry(
    bus: MessageBus,
    message: A2AMessage,
    options: PublishRetryOptions = {}
): Promise<string> {
    const delays = options.delaysMs ?? DEFAULT_RETRY_DELAYS
    for (let attempt = 0; ; attempt++) {
        try {
            return await bus.publish(message)
        } catch (error) {
            if (!(error instanceof DeliveryError) || attempt >= delays.length) {
                throw error
            }
            const delay = delays[attempt] ?? 0
            log.bus(
                "Publish of %s %s failed (attempt %d/%d), retrying in %dms: %s",
                message.type,
                message.id.slice(0, 8),
                attempt + 1,
                delays.length + 1,
                delay,
                errorMessage(error)
            )
            await sleep(delay)
        }
    }
}

export interface RequestOptions {
    timeoutMs: number
}

/**
 * Publish a query and wait for the `query_response` carrying the same
 * correlation id. Rejects with `DeliveryError` on timeout.
 */
export function request(
    bus: MessageBus,
    query: MessageOf<"query_request">,
    options: RequestOptions
): Promise<MessageOf<"query_response">> {
    const correlationId = query.payload.correlationId
    return new Promise((resolve, reject) => {
        const subscription = bus.subscribe(
            query.sender_id,
            (message) =>
                message.type === "query_response" &&
                message.payload.correlationId === correlationId,
            (message) => {
                if (message.type !== "query_response") return
                cleanup()
                resolve(message)
            }
        )
        const timer = setTimeout(() => {
            cleanup()
            reject(
                new DeliveryError(
                    `No response to ${query.payload.query} query ${correlationId} within ${options.timeoutMs}ms`
                )
            )
        }, options.timeoutMs)
        const cleanup = (): void => {
            clearTimeout(timer)
            subscription.unsubscribe()
        }
        bus.publish(query).catch((error: unknown) => {
            cleanup()
            reject(error)
        })
    })
}
