import type { AgentError } from "../core/errors.js"
import type { Artifact, ValidationAttempt, ValidationOutcome } from "../types.js"

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E }

export type WorkerRole = "producer" | "validator"

export interface TaskAssignment {
    taskId: string
    componentId: string
    episode: number
    attemptNumber: number
    input: Record<string, unknown>
    criteria: string[]
    /** Feedback from earlier rejections, oldest first. Empty on a first attempt. */
    feedback: string[]
    history: ValidationAttempt[]
}

export interface ValidationRequest {
    taskId: string
    episode: number
    attemptNumber: number
    artifact: Artifact
    criteria: string[]
    history: ValidationAttempt[]
}

export interface AssignmentContext {
    agentId: string
    /** Publishes a state update and returns immediately. */
    reportProgress(progress: number, detail?: string): void
}

/**
 * What every worker and validator implements. Proxies never talk to each
 * other; the runtime feeds them bus messages and publishes their results.
 */
export interface AgentProxy {
    readonly id: string
    readonly role: WorkerRole
    readonly capabilities: readonly string[]
    handleTaskAssignment(
        assignment: TaskAssignment,
        context: AssignmentContext
    ): Promise<Result<Artifact, AgentError>>
    /** Pure judgement. Must not touch task state. */
    handleValidationRequest(request: ValidationRequest): Promise<ValidationOutcome>
}
