import { publishWithRetry, type PublishRetryOptions } from "../bus/delivery.js"
import { forRecipient, type MessageBus, type Subscription } from "../bus/MessageBus.js"
import { createMessage, type A2AMessage, type MessageOf } from "../bus/messages.js"
import type { CapabilityRegistry } from "../agents/CapabilityRegistry.js"
import {
    AgentUnavailableError,
    AlreadyResolvedError,
    ConflictError,
    EscalationConflictError,
    errorMessage,
} from "../core/errors.js"
import { log } from "../core/Logger.js"
import type { EventBus } from "../events/EventBus.js"
import type { TaskRegistry } from "../registry/TaskRegistry.js"
import type {
    Escalation,
    EscalationResolution,
    FailureKind,
    Task,
} from "../types.js"
import { buildAssignmentMessage, failuresInEpisode } from "./assignments.js"
import {
    analyzeRejectionPattern,
    classifyRejections,
    recommendationsFor,
    summarizeEscalation,
} from "./rejectionAnalysis.js"
import { FollowUps } from "./FollowUps.js"

export const ESCALATION_MANAGER_ID = "escalation-manager"

const RESOLUTION_OPTIONS: EscalationResolution[] = ["retry_reset", "abort", "force_accept"]

const DEFAULT_RESET_NOTE = "A reviewer asked for a fresh attempt"

export interface EscalationManagerOptions {
    bus: MessageBus
    registry: TaskRegistry
    agents: CapabilityRegistry
    id?: string
    events?: EventBus
    /** Resolve as ABORT (task fails with `timeout`) when no human answers in time. */
    approvalTimeoutMs?: number
    retry?: PublishRetryOptions
    followUps?: FollowUps
}

/**
 * Turns exhausted retries into one human request per episode and applies the
 * human's decision. The only writer of escalation records.
 */
export class EscalationManager {
    public readonly id: string
    private readonly timers = new Map<string, NodeJS.Timeout>()
    private readonly followUps: FollowUps
    private subscription: Subscription | null = null

    constructor(private readonly options: EscalationManagerOptions) {
        this.id = options.id ?? ESCALATION_MANAGER_ID
        this.followUps = options.followUps ?? new FollowUps(options.bus, options.retry)
    }

    public start(): void {
        if (this.subscription) return
        this.subscription = this.options.bus.subscribe(
            this.id,
            forRecipient(this.id, "escalation"),
            (message) => this.onMessage(message)
        )
    }

    public stop(): void {
        this.subscription?.unsubscribe()
        this.subscription = null
        for (const timer of this.timers.values()) clearTimeout(timer)
        this.timers.clear()
    }

    public async onEscalationRequest(
        message: MessageOf<"escalation_request">
    ): Promise<Escalation | null> {
        const { registry } = this.options
        // The escalation was opened but the human was never asked.
        if (await this.followUps.resend(message)) {
            return registry.findOpenEscalation(message.task_id) ?? null
        }
        const task = registry.find(message.task_id)
        if (!task || task.state !== "escalated" || task.episode !== message.payload.episode) {
            log.escalation(
                "Ignoring escalation request for %s: task is %s",
                message.task_id,
                task ? `${task.state} in episode ${task.episode}` : "unknown"
            )
            return null
        }

        const failures = failuresInEpisode(task.attemptHistory, task.episode)
        const classification = classifyRejections(failures, task.maxRetries)
        const analysis = analyzeRejectionPattern(failures)

        let escalation: Escalation
        try {
            escalation = await registry.openEscalation({
                taskId: task.id,
                episode: task.episode,
                reason: classification,
                rejectionCount: message.payload.rejectionCount,
                context: task.attemptHistory,
                analysis,
            })
        } catch (error) {
            if (error instanceof EscalationConflictError) {
                log.escalation(
                    "Task %s already has escalation %s open",
                    task.id,
                    error.openEscalationId
                )
                return null
            }
            throw error
        }

        log.escalation(
            "Task %s escalated as %s after %d rejections",
            task.id,
            classification,
            escalation.rejectionCount
        )
        this.scheduleApprovalTimeout(escalation)
        await this.followUps.send(
            message,
            createMessage(
                "human_approval_request",
                {
                    senderId: this.id,
                    senderRole: "escalation",
                    recipientId: null,
                    recipientRole: "human",
                    taskId: task.id,
                    priority: classification === "repeated_same_failure" ? 1 : 3,
                },
                {
                    escalationId: escalation.id,
                    classification,
                    summary: summarizeEscalation(task.id, classification, analysis),
                    rejectionCount: escalation.rejectionCount,
                    analysis,
                    recommendations: recommendationsFor(classification, analysis),
                    context: escalation.context,
                    options: RESOLUTION_OPTIONS,
                }
            )
        )
        return escalation
    }

    /**
     * Record the decision, then move the task out of `escalated`. A second
     * resolution throws `AlreadyResolvedError` before anything changes.
     */
    public async resolve(
        escalationId: string,
        resolution: EscalationResolution,
        note?: string,
        abortKind: FailureKind = "aborted"
    ): Promise<Task> {
        return this.apply(escalationId, resolution, note, abortKind)
    }

    /** Close the open escalation of a cancelled task, if it has one. */
    public async closeForCancellation(taskId: string, reason: string): Promise<void> {
        const open = this.options.registry.findOpenEscalation(taskId)
        if (!open) return
        this.clearTimer(open.id)
        await this.options.registry.resolveEscalation(open.id, "abort", reason)
    }

    /** `trigger` is the resolution message, when there is one. */
    private async apply(
        escalationId: string,
        resolution: EscalationResolution,
        note: string | undefined,
        abortKind: FailureKind,
        trigger?: A2AMessage
    ): Promise<Task> {
        const { registry } = this.options
        const escalation = await registry.resolveEscalation(escalationId, resolution, note)
        this.clearTimer(escalationId)
        const taskId = escalation.taskId

        switch (resolution) {
            case "force_accept":
                log.escalation("Task %s force-accepted", taskId)
                return registry.transition(taskId, "escalated", "completed")
            case "abort":
                log.escalation("Task %s aborted", taskId)
                return registry.transition(taskId, "escalated", "failed", (draft) => {
                    draft.failure = {
                        kind: abortKind,
                        message: note ?? `Aborted after escalation ${escalationId}`,
                    }
                })
            case "retry_reset":
                return this.restart(registry.get(taskId), note, trigger)
        }
    }

    private async restart(
        task: Task,
        note: string | undefined,
        trigger: A2AMessage | undefined
    ): Promise<Task> {
        const { registry, agents } = this.options
        const previousId = task.assignedAgents[task.assignedAgents.length - 1]
        const previous = previousId ? agents.get(previousId) : undefined
        const producer =
            previous?.role === "producer"
                ? previous
                : agents.select("producer", task.requiredCapabilities)
        if (!producer) {
            return registry.transition(task.id, "escalated", "failed", (draft) => {
                draft.failure = {
                    kind: "agent_unavailable",
                    message: new AgentUnavailableError(
                        `No producer with capabilities [${task.requiredCapabilities.join(", ")}] for a fresh attempt`
                    ).message,
                }
            })
        }

        const restarted = await registry.transition(
            task.id,
            "escalated",
            "in_progress",
            (draft) => {
                draft.retryCount = 0
                draft.episode += 1
                draft.ownerAgentId = producer.id
                if (draft.assignedAgents[draft.assignedAgents.length - 1] !== producer.id) {
                    draft.assignedAgents.push(producer.id)
                }
            }
        )
        log.escalation(
            "Task %s reset to episode %d on %s",
            task.id,
            restarted.episode,
            producer.id
        )
        const lastFailure = failuresInEpisode(task.attemptHistory, task.episode).pop()
        const feedback = [note ?? DEFAULT_RESET_NOTE]
        if (lastFailure) feedback.push(lastFailure.feedback)
        const assignment = buildAssignmentMessage(
            restarted,
            { id: this.id, role: "escalation" },
            feedback
        )
        if (trigger) {
            await this.followUps.send(trigger, assignment)
        } else {
            await publishWithRetry(this.options.bus, assignment, this.options.retry)
        }
        return restarted
    }

    private async onMessage(message: A2AMessage): Promise<void> {
        switch (message.type) {
            case "escalation_request":
                await this.onEscalationRequest(message)
                break
            case "escalation_resolution":
                await this.onResolution(message)
                break
            default:
                log.escalation("Ignoring %s from %s", message.type, message.sender_id)
        }
    }

    private async onResolution(message: MessageOf<"escalation_resolution">): Promise<void> {
        if (await this.followUps.resend(message)) return
        const { escalationId, resolution, note } = message.payload
        try {
            await this.apply(escalationId, resolution, note, "aborted", message)
        } catch (error) {
            // Already decided, or the task moved on (cancelled). Redelivery would not help.
            if (error instanceof AlreadyResolvedError || error instanceof ConflictError) {
                log.escalation(
                    "Resolution %s for %s not applied: %s",
                    resolution,
                    escalationId,
                    error.message
                )
                return
            }
            throw error
        }
    }

    private scheduleApprovalTimeout(escalation: Escalation): void {
        const ms = this.options.approvalTimeoutMs
        if (ms === undefined || this.timers.has(escalation.id)) return
        const timer = setTimeout(() => {
            this.timers.delete(escalation.id)
            this.options.events?.emit({
                type: "task:expired",
                taskId: escalation.taskId,
                state: "escalated",
                kind: "timeout",
            })
            this.resolve(
                escalation.id,
                "abort",
                `No decision within ${ms}ms`,
                "timeout"
            ).catch((error: unknown) => {
                log.escalation(
                    "Approval timeout for %s not applied: %s",
                    escalation.id,
                    errorMessage(error)
                )
            })
        }, ms)
        timer.unref()
        this.timers.set(escalation.id, timer)
    }

    private clearTimer(escalationId: string): void {
        const timer = this.timers.get(escalationId)
        if (!timer) return
        clearTimeout(timer)
        this.timers.delete(escalationId)
    }
}
