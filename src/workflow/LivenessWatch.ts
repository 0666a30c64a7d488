import type { TaskClassTimeouts } from "../core/Config.js"
import { log } from "../core/Logger.js"
import type { EventBus } from "../events/EventBus.js"
import type { ConclaveEvent } from "../events/types.js"
import type { FailureKind, TaskState } from "../types.js"

export type ExpiryHandler = (taskId: string, state: TaskState, kind: FailureKind) => void

interface Deadline {
    state: TaskState
    timer: NodeJS.Timeout
}

/**
 * Arms a deadline whenever a task enters a state that waits on an agent and
 * re-arms it on every progress report. Listens to the internal event bus
 * only; expiring a task is up to `onExpired`.
 */
export class LivenessWatch {
    private readonly deadlines = new Map<string, Deadline>()
    private handler: ((event: ConclaveEvent) => void) | null = null

    constructor(
        private readonly eventBus: EventBus,
        private readonly timeoutsFor: (taskId: string) => TaskClassTimeouts | undefined,
        private readonly onExpired: ExpiryHandler
    ) {}

    public attach(): void {
        if (this.handler) return
        this.handler = (event: ConclaveEvent): void => this.onEvent(event)
        this.eventBus.on(this.handler)
    }

    public detach(): void {
        if (this.handler) {
            this.eventBus.off(this.handler)
        }
        this.handler = null
        for (const deadline of this.deadlines.values()) {
            clearTimeout(deadline.timer)
        }
        this.deadlines.clear()
    }

    public get watching(): number {
        return this.deadlines.size
    }

    private onEvent(event: ConclaveEvent): void {
        switch (event.type) {
            case "task:state_change":
                if (
                    event.to === "assigned" ||
                    event.to === "in_progress" ||
                    event.to === "validating"
                ) {
                    this.arm(event.taskId, event.to)
                } else {
                    this.disarm(event.taskId)
                }
                break
            case "task:progress": {
                const deadline = this.deadlines.get(event.taskId)
                if (deadline) this.arm(event.taskId, deadline.state)
                break
            }
            default:
                break
        }
    }

    private arm(taskId: string, state: TaskState): void {
        this.disarm(taskId)
        const timeouts = this.timeoutsFor(taskId)
        if (!timeouts) return
        const waitingOnValidator = state === "validating"
        const ms = waitingOnValidator
            ? timeouts.validationTimeoutMs
            : timeouts.livenessTimeoutMs
        const kind: FailureKind = waitingOnValidator ? "timeout" : "agent_unavailable"
        const timer = setTimeout(() => {
            this.deadlines.delete(taskId)
            log.engine("Task %s silent for %dms while %s", taskId, ms, state)
            this.onExpired(taskId, state, kind)
        }, ms)
        timer.unref()
        this.deadlines.set(taskId, { state, timer })
    }

    private disarm(taskId: string): void {
        const deadline = this.deadlines.get(taskId)
        if (!deadline) return
        clearTimeout(deadline.timer)
        this.deadlines.delete(taskId)
    }
}
