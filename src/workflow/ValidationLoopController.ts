import type { PublishRetryOptions } from "../bus/delivery.js"
import type { MessageBus } from "../bus/MessageBus.js"
import { createMessage, type A2AMessage, type MessageOf } from "../bus/messages.js"
import type { CapabilityRegistry } from "../agents/CapabilityRegistry.js"
import { AgentUnavailableError, ConflictError } from "../core/errors.js"
import { log } from "../core/Logger.js"
import type { EventBus } from "../events/EventBus.js"
import type { TaskRegistry } from "../registry/TaskRegistry.js"
import type { Task, ValidationAttempt } from "../types.js"
import {
    buildAssignmentMessage,
    buildValidationRequest,
    isCurrentAttempt,
    type Sender,
} from "./assignments.js"
import { FollowUps } from "./FollowUps.js"

export interface ValidationLoopControllerOptions {
    bus: MessageBus
    registry: TaskRegistry
    agents: CapabilityRegistry
    /** Identity the controller publishes under. */
    sender: Sender
    escalationManagerId: string
    events?: EventBus
    retry?: PublishRetryOptions
    /** Shared with the other handlers on the same bus; one is created when omitted. */
    followUps?: FollowUps
}

/**
 * Drives the produce -> validate -> retry -> escalate loop for one task at a
 * time. Every decision is a registry transition from the state the message
 * was meant for, so duplicates and late arrivals lose the race and are
 * dropped.
 */
export class ValidationLoopController {
    private readonly followUps: FollowUps

    constructor(private readonly options: ValidationLoopControllerOptions) {
        this.followUps = options.followUps ?? new FollowUps(options.bus, options.retry)
    }

    public async submit(message: MessageOf<"task_completion">): Promise<void> {
        if (await this.followUps.resend(message)) return
        const { registry } = this.options
        const { episode, attemptNumber, artifact } = message.payload
        const task = registry.find(message.task_id)
        if (!task) {
            this.stale(message, "unknown task")
            return
        }
        if (task.state !== "assigned" && task.state !== "in_progress") {
            this.stale(message, `task is ${task.state}`)
            return
        }
        if (message.sender_id !== task.ownerAgentId) {
            this.stale(message, `${message.sender_id} does not own the task`)
            return
        }
        if (!isCurrentAttempt(task, episode, attemptNumber)) {
            this.stale(message, `attempt ${episode}/${attemptNumber} is not current`)
            return
        }

        await this.whileCurrent(message, async () => {
            // Completion can overtake the producer's own state update.
            const current =
                task.state === "assigned"
                    ? await registry.transition(task.id, "assigned", "in_progress")
                    : task
            const owner = current.ownerAgentId
            const validator = this.options.agents.select(
                "validator",
                current.validatorCapabilities,
                owner ? [owner] : []
            )
            if (!validator) {
                await registry.transition(current.id, "in_progress", "failed", (draft) => {
                    draft.ownerAgentId = null
                    draft.latestArtifact = structuredClone(artifact)
                    draft.failure = {
                        kind: "agent_unavailable",
                        message: new AgentUnavailableError(
                            `No validator with capabilities [${current.validatorCapabilities.join(", ")}] other than the producer`
                        ).message,
                    }
                })
                return
            }
            const validating = await registry.transition(
                current.id,
                "in_progress",
                "validating",
                (draft) => {
                    draft.validatorAgentId = validator.id
                    draft.latestArtifact = structuredClone(artifact)
                }
            )
            log.validation(
                "Task %s attempt %d sent to %s",
                validating.id,
                attemptNumber,
                validator.id
            )
            await this.followUps.send(
                message,
                buildValidationRequest(validating, this.options.sender)
            )
        })
    }

    public async onValidationResult(
        message: MessageOf<"validation_result">
    ): Promise<void> {
        if (await this.followUps.resend(message)) return
        const { registry, events } = this.options
        const { episode, attemptNumber, result, feedback, issues } = message.payload
        const task = registry.find(message.task_id)
        if (!task) {
            this.stale(message, "unknown task")
            return
        }
        if (task.state !== "validating") {
            this.stale(message, `task is ${task.state}`)
            return
        }
        if (message.sender_id !== task.validatorAgentId) {
            this.stale(message, `${message.sender_id} is not the assigned validator`)
            return
        }
        if (!isCurrentAttempt(task, episode, attemptNumber)) {
            this.stale(message, `attempt ${episode}/${attemptNumber} is not current`)
            return
        }

        const attempt: ValidationAttempt = {
            attemptNumber,
            episode,
            validatorId: message.sender_id,
            result,
            feedback,
            issues: [...issues],
            timestamp: new Date().toISOString(),
        }

        await this.whileCurrent(message, async () => {
            const updated = await this.applyVerdict(task, attempt)
            events?.emit({
                type: "validation:attempt",
                taskId: task.id,
                episode,
                attemptNumber,
                validatorId: attempt.validatorId,
                result,
                feedback,
            })
            if (updated.state === "in_progress") {
                await this.followUps.send(
                    message,
                    buildAssignmentMessage(updated, this.options.sender)
                )
            } else if (updated.state === "escalated") {
                await this.followUps.send(message, this.escalationRequest(updated))
            }
        })
    }

    /**
     * Hand a task stuck in validation to another validator. Returns false when
     * no other eligible validator exists. The new request is owed to `trigger`.
     */
    public async reassignValidator(
        task: Task,
        failedValidatorId: string,
        trigger: A2AMessage
    ): Promise<boolean> {
        const exclude = [failedValidatorId]
        if (task.ownerAgentId) exclude.push(task.ownerAgentId)
        const next = this.options.agents.select(
            "validator",
            task.validatorCapabilities,
            exclude
        )
        if (!next) return false
        const updated = await this.options.registry.transition(
            task.id,
            "validating",
            "validating",
            (draft) => {
                draft.validatorAgentId = next.id
                draft.reassignments += 1
            }
        )
        log.validation("Task %s validation moved from %s to %s", task.id, failedValidatorId, next.id)
        await this.followUps.send(trigger, buildValidationRequest(updated, this.options.sender))
        return true
    }

    private async applyVerdict(task: Task, attempt: ValidationAttempt): Promise<Task> {
        const { registry } = this.options
        if (attempt.result === "pass") {
            log.validation("Task %s passed on attempt %d", task.id, attempt.attemptNumber)
            return registry.transition(task.id, "validating", "completed", (draft) => {
                draft.attemptHistory.push(attempt)
                draft.ownerAgentId = null
                draft.validatorAgentId = null
            })
        }

        const nextRetry = task.retryCount + 1
        if (nextRetry < task.maxRetries) {
            log.validation(
                "Task %s rejected (attempt %d/%d): %s",
                task.id,
                nextRetry,
                task.maxRetries,
                attempt.feedback
            )
            return registry.transition(task.id, "validating", "in_progress", (draft) => {
                draft.attemptHistory.push(attempt)
                draft.retryCount = nextRetry
                draft.validatorAgentId = null
            })
        }

        log.validation("Task %s exhausted %d attempts, escalating", task.id, task.maxRetries)
        return registry.transition(task.id, "validating", "escalated", (draft) => {
            draft.attemptHistory.push(attempt)
            draft.retryCount = draft.maxRetries
            draft.ownerAgentId = null
            draft.validatorAgentId = null
        })
    }

    private escalationRequest(task: Task): MessageOf<"escalation_request"> {
        return createMessage(
            "escalation_request",
            {
                senderId: this.options.sender.id,
                senderRole: this.options.sender.role,
                recipientId: this.options.escalationManagerId,
                recipientRole: "escalation",
                taskId: task.id,
            },
            {
                episode: task.episode,
                rejectionCount: task.maxRetries,
                maxRetries: task.maxRetries,
                attemptHistory: task.attemptHistory,
            }
        )
    }

    /** Runs `work`, treating a lost compare-and-swap as a stale message. */
    private async whileCurrent(
        message: A2AMessage,
        work: () => Promise<void>
    ): Promise<void> {
        try {
            await work()
        } catch (error) {
            if (error instanceof ConflictError) {
                this.stale(message, error.message)
                return
            }
            throw error
        }
    }

    private stale(message: A2AMessage, reason: string): void {
        log.validation(
            "Discarding %s %s for %s: %s",
            message.type,
            message.id.slice(0, 8),
            message.task_id,
            reason
        )
        this.options.events?.emit({
            type: "task:stale_message",
            taskId: message.task_id,
            messageId: message.id,
            messageType: message.type,
            reason,
        })
    }
}
