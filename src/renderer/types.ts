import type { EventBus } from "../events/EventBus.js"
import type { TaskState } from "../types.js"

export interface TaskRow {
    taskId: string
    componentId: string
    state: TaskState
    retryCount: number
    owner: string | null
    validator: string | null
    lastFeedback?: string
    escalation?: string
    failure?: string
    startedAt: number
    completedAt?: number
}

export interface CreateRendererOptions {
    verbose?: boolean
    title?: string
    /** Line sink for the log renderer. Defaults to stdout. */
    write?: (line: string) => void
}

export interface Renderer {
    attach(bus: EventBus): void
    detach(): void
}
