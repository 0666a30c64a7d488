import type { AgentProxy } from "../agents/AgentProxy.js"
import { AgentRuntime } from "../agents/AgentRuntime.js"
import { CapabilityRegistry } from "../agents/CapabilityRegistry.js"
import { publishWithRetry, type PublishRetryOptions } from "../bus/delivery.js"
import { InMemoryMessageBus } from "../bus/InMemoryMessageBus.js"
import { forRecipient, type MessageBus, type Subscription } from "../bus/MessageBus.js"
import {
    createMessage,
    type A2AMessage,
    type MessageOf,
    type MessageRoute,
} from "../bus/messages.js"
import {
    getTaskClassTimeouts,
    resolveConfig,
    type ConclaveConfig,
    type ConclaveConfigInput,
} from "../core/Config.js"
import { ConflictError, TaskNotFoundError, errorMessage } from "../core/errors.js"
import { log } from "../core/Logger.js"
import { EventBus } from "../events/EventBus.js"
import type { ConclaveEvent } from "../events/types.js"
import { FileStore } from "../persistence/FileStore.js"
import { TaskRegistry } from "../registry/TaskRegistry.js"
import { isTerminal } from "../registry/stateMachine.js"
import type {
    EscalationResolution,
    FailureKind,
    PipelineProgress,
    Task,
    TaskDefinition,
    TaskState,
} from "../types.js"
import { buildAssignmentMessage, isCurrentAttempt, type Sender } from "../workflow/assignments.js"
import { EscalationManager } from "../workflow/EscalationManager.js"
import { FollowUps } from "../workflow/FollowUps.js"
import { LivenessWatch } from "../workflow/LivenessWatch.js"
import { ValidationLoopController } from "../workflow/ValidationLoopController.js"
import { HumanApprovalChannel, type ApprovalDecider } from "./HumanApprovalChannel.js"

export const ORCHESTRATOR_ID = "orchestrator"

const SENDER: Sender = { id: ORCHESTRATOR_ID, role: "orchestrator" }

const TERMINAL: TaskState[] = ["completed", "failed"]

export interface OrchestratorOptions {
    agents: AgentProxy[]
    config?: ConclaveConfigInput
    bus?: MessageBus
    events?: EventBus
    store?: FileStore
    /** Answers human approval requests automatically. Without it they wait for `human.answer`. */
    decide?: ApprovalDecider
    retry?: PublishRetryOptions
}

/**
 * Owns the bus lifecycle and every component on it. Assigns pending work,
 * watches liveness, reacts to agent errors and cancellations, and answers
 * status queries. The validation loop and escalations are delegated.
 */
export class Orchestrator {
    public readonly config: ConclaveConfig
    public readonly events: EventBus
    public readonly bus: MessageBus
    public readonly registry: TaskRegistry
    public readonly agents: CapabilityRegistry
    public readonly escalations: EscalationManager
    public readonly human: HumanApprovalChannel
    private readonly controller: ValidationLoopController
    private readonly runtimes: AgentRuntime[]
    private readonly watch: LivenessWatch
    private readonly followUps: FollowUps
    private readonly retry?: PublishRetryOptions
    private readonly eventHandler: (event: ConclaveEvent) => void
    private subscription: Subscription | null = null
    private started = false

    constructor(options: OrchestratorOptions) {
        this.config = resolveConfig(options.config ?? {})
        this.events = options.events ?? new EventBus()
        this.retry = options.retry
        this.bus =
            options.bus ??
            new InMemoryMessageBus({
                maxDeliveryAttempts: this.config.maxDeliveryAttempts,
                events: this.events,
            })
        const store =
            options.store ??
            (this.config.persistencePath
                ? new FileStore(this.config.persistencePath)
                : undefined)
        this.registry = new TaskRegistry({
            store,
            events: this.events,
            defaultMaxRetries: this.config.maxRetries,
        })

        this.agents = new CapabilityRegistry()
        for (const agent of options.agents) {
            this.agents.register(agent)
        }
        this.runtimes = options.agents.map(
            (agent) =>
                new AgentRuntime({
                    agent,
                    bus: this.bus,
                    orchestratorId: ORCHESTRATOR_ID,
                    retry: this.retry,
                })
        )

        this.followUps = new FollowUps(this.bus, this.retry)
        this.escalations = new EscalationManager({
            bus: this.bus,
            registry: this.registry,
            agents: this.agents,
            events: this.events,
            approvalTimeoutMs: this.config.approvalTimeoutMs,
            retry: this.retry,
            followUps: this.followUps,
        })
        this.controller = new ValidationLoopController({
            bus: this.bus,
            registry: this.registry,
            agents: this.agents,
            sender: SENDER,
            escalationManagerId: this.escalations.id,
            events: this.events,
            retry: this.retry,
            followUps: this.followUps,
        })
        this.human = new HumanApprovalChannel({
            bus: this.bus,
            escalationManagerId: this.escalations.id,
            decide: options.decide,
            retry: this.retry,
        })
        this.watch = new LivenessWatch(
            this.events,
            (taskId) => {
                const task = this.registry.find(taskId)
                return task ? getTaskClassTimeouts(this.config, task.taskClass) : undefined
            },
            (taskId, state, kind) => this.expire(taskId, state, kind)
        )

        this.eventHandler = (event: ConclaveEvent): void => this.onEvent(event)
        this.events.on(this.eventHandler)
    }

    public get isRunning(): boolean {
        return this.started
    }

    /** Follow-up messages whose publish failed and that wait for their trigger to come back. */
    public get owedMessages(): number {
        return this.followUps.size
    }

    public async start(): Promise<void> {
        if (this.started) return
        this.agents.seal()
        await this.bus.connect()
        this.subscription = this.bus.subscribe(
            ORCHESTRATOR_ID,
            forRecipient(ORCHESTRATOR_ID, "orchestrator"),
            (message) => this.onMessage(message)
        )
        for (const runtime of this.runtimes) runtime.start()
        this.escalations.start()
        this.human.start()
        this.watch.attach()
        this.started = true
        log.engine("Started with %d agents", this.runtimes.length)
        await this.assignPending()
    }

    public async shutdown(): Promise<void> {
        if (!this.started) return
        this.started = false
        this.watch.detach()
        // Agents may never return; their late output has nowhere to go.
        for (const runtime of this.runtimes) runtime.stop()
        await this.bus.drain()
        this.escalations.stop()
        this.human.stop()
        this.subscription?.unsubscribe()
        this.subscription = null
        await this.bus.close()
        await this.registry.flush()
        this.events.off(this.eventHandler)
        log.engine("Shut down")
    }

    /** Create a task and hand it to a capable producer if the engine is running. */
    public async submitTask(definition: TaskDefinition): Promise<Task> {
        const task = await this.registry.create(definition)
        if (!this.started) return task
        return (await this.assign(task)) ?? task
    }

    /** Retry assignment of every pending task. Returns how many were assigned. */
    public async assignPending(): Promise<number> {
        let assigned = 0
        for (const task of this.registry.list({ states: ["pending"] })) {
            if (await this.assign(task)) assigned++
        }
        return assigned
    }

    /** Publish a cancellation; the task fails once it is handled. */
    public async cancelTask(taskId: string, reason = "Cancelled by request"): Promise<void> {
        if (!this.registry.find(taskId)) throw new TaskNotFoundError(taskId)
        await this.publish(
            createMessage(
                "cancel_task",
                this.route(taskId, ORCHESTRATOR_ID, "orchestrator"),
                { reason }
            )
        )
    }

    public async resolveEscalation(
        escalationId: string,
        resolution: EscalationResolution,
        note?: string
    ): Promise<Task> {
        return this.escalations.resolve(escalationId, resolution, note)
    }

    public getTask(taskId: string): Task {
        return this.registry.get(taskId)
    }

    public getProgress(): PipelineProgress {
        const progress: PipelineProgress = {
            pending: 0,
            assigned: 0,
            in_progress: 0,
            validating: 0,
            escalated: 0,
            completed: 0,
            failed: 0,
            total: 0,
        }
        for (const task of this.registry.list()) {
            progress[task.state] += 1
            progress.total += 1
        }
        this.events.emit({ type: "pipeline:progress", progress })
        return progress
    }

    /**
     * Resolve once the task is in one of `states` (terminal by default).
     * Rejects after `timeoutMs` when given.
     */
    public waitForTask(
        taskId: string,
        states: TaskState[] = TERMINAL,
        timeoutMs?: number
    ): Promise<Task> {
        const current = this.registry.get(taskId)
        if (states.includes(current.state)) return Promise.resolve(current)
        return new Promise((resolve, reject) => {
            let timer: NodeJS.Timeout | undefined
            const handler = (event: ConclaveEvent): void => {
                if (
                    event.type === "task:state_change" &&
                    event.taskId === taskId &&
                    states.includes(event.to)
                ) {
                    cleanup()
                    resolve(this.registry.get(taskId))
                }
            }
            const cleanup = (): void => {
                if (timer) clearTimeout(timer)
                this.events.off(handler)
            }
            this.events.on(handler)
            if (timeoutMs !== undefined) {
                timer = setTimeout(() => {
                    cleanup()
                    const task = this.registry.get(taskId)
                    reject(
                        new Error(
                            `Task ${taskId} still ${task.state} after ${timeoutMs}ms, waiting for ${states.join("|")}`
                        )
                    )
                }, timeoutMs)
            }
        })
    }

    private async assign(task: Task): Promise<Task | null> {
        const producer = this.agents.select("producer", task.requiredCapabilities)
        if (!producer) {
            log.engine(
                "No producer for %s [%s], leaving it pending",
                task.id,
                task.requiredCapabilities.join(", ")
            )
            return null
        }
        try {
            const assigned = await this.registry.transition(
                task.id,
                "pending",
                "assigned",
                (draft) => {
                    draft.ownerAgentId = producer.id
                    draft.assignedAgents.push(producer.id)
                }
            )
            await this.publish(buildAssignmentMessage(assigned, SENDER))
            return assigned
        } catch (error) {
            if (error instanceof ConflictError) return null
            throw error
        }
    }

    private async onMessage(message: A2AMessage): Promise<void> {
        switch (message.type) {
            case "state_update":
                await this.onStateUpdate(message)
                break
            case "task_completion":
                await this.controller.submit(message)
                break
            case "validation_result":
                await this.controller.onValidationResult(message)
                break
            case "error_report":
                await this.onErrorReport(message)
                break
            case "cancel_task":
                await this.cancel(message.task_id, message.payload.reason)
                break
            case "query_request":
                await this.onQuery(message)
                break
            default:
                log.engine("Ignoring %s from %s", message.type, message.sender_id)
        }
    }

    private async onStateUpdate(message: MessageOf<"state_update">): Promise<void> {
        const task = this.registry.find(message.task_id)
        if (!task || isTerminal(task.state)) return
        const sender = message.sender_id
        if (sender !== task.ownerAgentId && sender !== task.validatorAgentId) return
        const { episode, attemptNumber, toState, progress, detail } = message.payload
        if (episode !== undefined && !isCurrentAttempt(task, episode, attemptNumber)) return

        if (toState === "in_progress" && task.state === "assigned" && sender === task.ownerAgentId) {
            try {
                await this.registry.transition(task.id, "assigned", "in_progress")
                return
            } catch (error) {
                if (!(error instanceof ConflictError)) throw error
            }
        }
        this.events.emit({
            type: "task:progress",
            taskId: task.id,
            agentId: sender,
            progress,
            detail,
        })
    }

    private async onErrorReport(message: MessageOf<"error_report">): Promise<void> {
        if (await this.followUps.resend(message)) return
        const task = this.registry.find(message.task_id)
        if (!task) return
        const { phase, episode, attemptNumber, error, retryable } = message.payload
        const sender = message.sender_id
        const relevant =
            phase === "production"
                ? (task.state === "assigned" || task.state === "in_progress") &&
                  sender === task.ownerAgentId
                : task.state === "validating" && sender === task.validatorAgentId
        if (!relevant || !isCurrentAttempt(task, episode, attemptNumber)) {
            log.engine("Discarding stale error report from %s for %s", sender, task.id)
            return
        }

        this.events.emit({
            type: "agent:error",
            taskId: task.id,
            agentId: sender,
            phase,
            message: error.message,
        })

        try {
            if (retryable && task.reassignments < this.config.maxReassignments) {
                if (phase === "validation") {
                    if (await this.controller.reassignValidator(task, sender, message)) return
                } else if (await this.reassignProducer(task, sender, message)) {
                    return
                }
            }
            await this.registry.transition(task.id, task.state, "failed", (draft) => {
                draft.ownerAgentId = null
                draft.validatorAgentId = null
                draft.failure = {
                    kind: "agent_error",
                    message: `${sender} failed ${phase} (${error.code}): ${error.message}`,
                }
            })
        } catch (caught) {
            if (caught instanceof ConflictError) return
            throw caught
        }
    }

    private async reassignProducer(
        task: Task,
        failedAgentId: string,
        trigger: A2AMessage
    ): Promise<boolean> {
        const next = this.agents.select("producer", task.requiredCapabilities, [failedAgentId])
        if (!next) return false
        const reassigned = await this.registry.transition(
            task.id,
            task.state,
            "assigned",
            (draft) => {
                draft.ownerAgentId = next.id
                draft.assignedAgents.push(next.id)
                draft.reassignments += 1
            }
        )
        log.engine("Task %s moved from %s to %s", task.id, failedAgentId, next.id)
        await this.followUps.send(trigger, buildAssignmentMessage(reassigned, SENDER))
        return true
    }

    private async cancel(taskId: string, reason: string): Promise<void> {
        for (;;) {
            const task = this.registry.find(taskId)
            if (!task || isTerminal(task.state)) {
                log.engine("Nothing to cancel for %s", taskId)
                return
            }
            try {
                if (task.state === "escalated") {
                    await this.escalations.closeForCancellation(taskId, reason)
                }
                await this.registry.transition(taskId, task.state, "failed", (draft) => {
                    draft.ownerAgentId = null
                    draft.validatorAgentId = null
                    draft.failure = { kind: "cancelled", message: reason }
                })
                log.engine("Cancelled %s while %s", taskId, task.state)
                return
            } catch (error) {
                // Moved while we were cancelling: read it again.
                if (!(error instanceof ConflictError)) throw error
            }
        }
    }

    private async onQuery(message: MessageOf<"query_request">): Promise<void> {
        const { correlationId, query } = message.payload
        const payload: MessageOf<"query_response">["payload"] = { correlationId, ok: true }
        if (query === "pipeline_progress") {
            payload.data = this.getProgress()
        } else {
            const task = this.registry.find(message.task_id)
            if (task) {
                payload.data = task
            } else {
                payload.ok = false
                payload.error = new TaskNotFoundError(message.task_id).message
            }
        }
        await this.publish(
            createMessage(
                "query_response",
                this.route(message.task_id, message.sender_id, message.sender_role),
                payload
            )
        )
    }

    private expire(taskId: string, state: TaskState, kind: FailureKind): void {
        this.events.emit({ type: "task:expired", taskId, state, kind })
        this.registry
            .transition(taskId, state, "failed", (draft) => {
                draft.ownerAgentId = null
                draft.validatorAgentId = null
                draft.failure = {
                    kind,
                    message:
                        kind === "timeout"
                            ? `No validation result while ${state}`
                            : `No state update while ${state}`,
                }
            })
            .catch((error: unknown) => {
                log.engine("Expiry of %s not applied: %s", taskId, errorMessage(error))
            })
    }

    private onEvent(event: ConclaveEvent): void {
        if (event.type === "escalation:resolved") {
            this.human.forget(event.escalationId)
            return
        }
        if (event.type !== "task:state_change") return
        if (isTerminal(event.to)) {
            // Work still running for a settled task can only produce stale messages.
            for (const runtime of this.runtimes) runtime.abandon(event.taskId)
        }
        if (event.previousOwner !== event.owner) {
            if (event.previousOwner) this.agents.release(event.previousOwner)
            if (event.owner) this.agents.acquire(event.owner)
        }
        if (event.previousValidator !== event.validator) {
            if (event.previousValidator) this.agents.release(event.previousValidator)
            if (event.validator) this.agents.acquire(event.validator)
        }
        // An agent was freed: pending work may now fit.
        const freed =
            (event.previousOwner !== null && event.previousOwner !== event.owner) ||
            (event.previousValidator !== null && event.previousValidator !== event.validator)
        if (freed && this.started && this.registry.list({ states: ["pending"] }).length > 0) {
            this.assignPending().catch((error: unknown) => {
                log.engine("Assigning pending tasks failed: %s", errorMessage(error))
            })
        }
    }

    private route(
        taskId: string,
        recipientId: string,
        recipientRole: MessageRoute["recipientRole"]
    ): MessageRoute {
        return {
            senderId: ORCHESTRATOR_ID,
            senderRole: "orchestrator",
            recipientId,
            recipientRole,
            taskId,
        }
    }

    private async publish(message: A2AMessage): Promise<void> {
        await publishWithRetry(this.bus, message, this.retry)
    }
}
