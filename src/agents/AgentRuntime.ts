import type { PublishRetryOptions } from "../bus/delivery.js"
import { forRecipient, type MessageBus, type Subscription } from "../bus/MessageBus.js"
import type { A2AMessage, MessageOf } from "../bus/messages.js"
import { errorMessage } from "../core/errors.js"
import { log } from "../core/Logger.js"
import type { AgentProxy } from "./AgentProxy.js"
import { TaskTrackingInterceptor } from "./TaskTrackingInterceptor.js"

interface AgentRuntimeOptions {
    agent: AgentProxy
    bus: MessageBus
    orchestratorId: string
    retry?: PublishRetryOptions
    /** Message ids remembered for duplicate detection. */
    handledLimit?: number
}

const DEFAULT_HANDLED_LIMIT = 10_000

/**
 * Hosts one agent on the bus. Duplicate deliveries of a message the agent
 * already handled are dropped by message id.
 *
 * An invocation for a task that has settled can be abandoned: the bus lane is
 * released at once and whatever the agent still returns is published late and
 * discarded as stale.
 */
export class AgentRuntime {
    private readonly agent: AgentProxy
    private readonly bus: MessageBus
    private readonly interceptor: TaskTrackingInterceptor
    private readonly handled = new Set<string>()
    private readonly handledLimit: number
    private readonly abandoners = new Map<string, Set<() => void>>()
    private subscription: Subscription | null = null
    private active = 0

    constructor(options: AgentRuntimeOptions) {
        this.agent = options.agent
        this.bus = options.bus
        this.handledLimit = options.handledLimit ?? DEFAULT_HANDLED_LIMIT
        this.interceptor = new TaskTrackingInterceptor(
            options.bus,
            {
                agentId: options.agent.id,
                agentRole: options.agent.role,
                orchestratorId: options.orchestratorId,
            },
            options.retry
        )
    }

    public get agentId(): string {
        return this.agent.id
    }

    /** Invocations currently running inside the agent. */
    public get inFlight(): number {
        return this.active
    }

    public start(): void {
        if (this.subscription) return
        this.subscription = this.bus.subscribe(
            this.agent.id,
            forRecipient(this.agent.id, this.agent.role),
            (message) => this.onMessage(message)
        )
    }

    public stop(): void {
        this.subscription?.unsubscribe()
        this.subscription = null
        for (const taskId of [...this.abandoners.keys()]) this.abandon(taskId)
    }

    /** Stop waiting on every invocation running for `taskId`. */
    public abandon(taskId: string): void {
        const waiting = this.abandoners.get(taskId)
        if (!waiting) return
        this.abandoners.delete(taskId)
        log.agent("%s abandoning %d invocation(s) for %s", this.agent.id, waiting.size, taskId)
        for (const release of waiting) release()
    }

    private async onMessage(message: A2AMessage): Promise<void> {
        if (this.handled.has(message.id)) {
            log.agent(
                "%s dropping duplicate %s %s",
                this.agent.id,
                message.type,
                message.id.slice(0, 8)
            )
            return
        }
        this.active++
        try {
            switch (message.type) {
                case "task_assignment":
                    await this.unlessAbandoned(message, this.runAssignment(message))
                    break
                case "validation_request":
                    await this.unlessAbandoned(message, this.runValidation(message))
                    break
                default:
                    log.agent("%s ignoring %s", this.agent.id, message.type)
            }
        } finally {
            this.active--
        }
        this.remember(message.id)
    }

    private async unlessAbandoned(message: A2AMessage, work: Promise<void>): Promise<void> {
        const taskId = message.task_id
        let release: () => void = () => undefined
        const abandoned = new Promise<"abandoned">((resolve) => {
            release = () => resolve("abandoned")
        })
        const waiting = this.abandoners.get(taskId) ?? new Set<() => void>()
        waiting.add(release)
        this.abandoners.set(taskId, waiting)
        try {
            const outcome = await Promise.race([work.then(() => "done" as const), abandoned])
            if (outcome === "abandoned") {
                work.catch((error: unknown) => {
                    log.agent(
                        "%s abandoned %s for %s failed late: %s",
                        this.agent.id,
                        message.type,
                        taskId,
                        errorMessage(error)
                    )
                })
            }
        } finally {
            waiting.delete(release)
            if (waiting.size === 0 && this.abandoners.get(taskId) === waiting) {
                this.abandoners.delete(taskId)
            }
        }
    }

    private remember(messageId: string): void {
        this.handled.add(messageId)
        if (this.handled.size > this.handledLimit) {
            const oldest = this.handled.values().next()
            if (!oldest.done) this.handled.delete(oldest.value)
        }
    }

    private async runAssignment(
        message: MessageOf<"task_assignment">
    ): Promise<void> {
        const { payload } = message
        log.agent(
            "%s working on %s (episode %d, attempt %d)",
            this.agent.id,
            message.task_id,
            payload.episode,
            payload.attemptNumber
        )
        await this.interceptor.aroundAssignment(message, (context) =>
            this.agent.handleTaskAssignment(
                {
                    taskId: message.task_id,
                    componentId: payload.componentId,
                    episode: payload.episode,
                    attemptNumber: payload.attemptNumber,
                    input: payload.input,
                    criteria: payload.criteria,
                    feedback: payload.feedback,
                    history: payload.history,
                },
                context
            )
        )
    }

    private async runValidation(
        message: MessageOf<"validation_request">
    ): Promise<void> {
        const { payload } = message
        await this.interceptor.aroundValidation(message, () =>
            this.agent.handleValidationRequest({
                taskId: message.task_id,
                episode: payload.episode,
                attemptNumber: payload.attemptNumber,
                artifact: payload.artifact,
                criteria: payload.criteria,
                history: payload.history,
            })
        )
    }
}
