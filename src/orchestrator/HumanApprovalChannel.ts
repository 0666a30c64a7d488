import { publishWithRetry, type PublishRetryOptions } from "../bus/delivery.js"
import { forRecipient, type MessageBus, type Subscription } from "../bus/MessageBus.js"
import { createMessage, type A2AMessage, type MessageOf } from "../bus/messages.js"
import { EscalationNotFoundError, errorMessage } from "../core/errors.js"
import { log } from "../core/Logger.js"
import type { EscalationResolution } from "../types.js"

export const HUMAN_CHANNEL_ID = "human"

export interface HumanDecision {
    resolution: EscalationResolution
    note?: string
}

export type ApprovalRequest = MessageOf<"human_approval_request">

/** Return `null` to leave the request open for a later `answer`. */
export type ApprovalDecider = (
    request: ApprovalRequest
) => Promise<HumanDecision | null> | HumanDecision | null

export interface HumanApprovalChannelOptions {
    bus: MessageBus
    escalationManagerId: string
    decide?: ApprovalDecider
    id?: string
    retry?: PublishRetryOptions
}

/** Bus endpoint for the human role: collects approval requests and sends decisions back. */
export class HumanApprovalChannel {
    public readonly id: string
    private readonly waiting = new Map<string, ApprovalRequest>()
    private subscription: Subscription | null = null

    constructor(private readonly options: HumanApprovalChannelOptions) {
        this.id = options.id ?? HUMAN_CHANNEL_ID
    }

    public start(): void {
        if (this.subscription) return
        this.subscription = this.options.bus.subscribe(
            this.id,
            forRecipient(this.id, "human"),
            (message) => this.onMessage(message)
        )
    }

    public stop(): void {
        this.subscription?.unsubscribe()
        this.subscription = null
    }

    /** Drop a request that was settled some other way (timeout, cancellation). */
    public forget(escalationId: string): void {
        if (this.waiting.delete(escalationId)) {
            log.escalation("Approval request for %s closed without an answer", escalationId)
        }
    }

    /** Requests still waiting for a decision, oldest first. */
    public pending(): ApprovalRequest[] {
        return [...this.waiting.values()]
    }

    public async answer(
        escalationId: string,
        resolution: EscalationResolution,
        note?: string
    ): Promise<void> {
        const request = this.waiting.get(escalationId)
        if (!request) throw new EscalationNotFoundError(escalationId)
        this.waiting.delete(escalationId)
        log.escalation("Human chose %s for %s", resolution, escalationId)
        const payload: MessageOf<"escalation_resolution">["payload"] = {
            escalationId,
            resolution,
        }
        if (note !== undefined) payload.note = note
        await publishWithRetry(
            this.options.bus,
            createMessage(
                "escalation_resolution",
                {
                    senderId: this.id,
                    senderRole: "human",
                    recipientId: this.options.escalationManagerId,
                    recipientRole: "escalation",
                    taskId: request.task_id,
                },
                payload
            ),
            this.options.retry
        )
    }

    private async onMessage(message: A2AMessage): Promise<void> {
        if (message.type !== "human_approval_request") return
        const { escalationId } = message.payload
        if (this.waiting.has(escalationId)) return
        this.waiting.set(escalationId, message)
        log.escalation("Approval requested for %s: %s", message.task_id, message.payload.summary)

        const decide = this.options.decide
        if (!decide) return
        let decision: HumanDecision | null
        try {
            decision = await decide(message)
        } catch (error) {
            log.escalation(
                "Decision for %s failed, leaving it open: %s",
                escalationId,
                errorMessage(error)
            )
            return
        }
        if (!decision) return
        if (!this.waiting.has(escalationId)) {
            log.escalation("Escalation %s closed while deciding, dropping %s", escalationId, decision.resolution)
            return
        }
        await this.answer(escalationId, decision.resolution, decision.note)
    }
}
