import type { EscalationStatus, TaskState } from "../types.js"

export class ConclaveError extends Error {
    public readonly code: string
    public override readonly cause?: Error

    constructor(message: string, code: string, cause?: Error) {
        super(message)
        this.name = "ConclaveError"
        this.code = code
        this.cause = cause
    }
}

/** The bus is unreachable (not connected, closed, or a request timed out). */
export class DeliveryError extends ConclaveError {
    constructor(message: string, cause?: Error) {
        super(message, "DELIVERY_ERROR", cause)
        this.name = "DeliveryError"
    }
}

export class MessageValidationError extends ConclaveError {
    public readonly issues: string[]

    constructor(message: string, issues: string[]) {
        super(message, "MESSAGE_INVALID")
        this.name = "MessageValidationError"
        this.issues = issues
    }
}

export class TaskNotFoundError extends ConclaveError {
    public readonly taskId: string

    constructor(taskId: string) {
        super(`Task ${taskId} not found`, "TASK_NOT_FOUND")
        this.name = "TaskNotFoundError"
        this.taskId = taskId
    }
}

/** Optimistic-concurrency clash: the task was not in the expected state. */
export class ConflictError extends ConclaveError {
    public readonly taskId: string
    public readonly expected: TaskState
    public readonly actual: TaskState

    constructor(taskId: string, expected: TaskState, actual: TaskState) {
        super(
            `Task ${taskId} is ${actual}, expected ${expected}`,
            "CONFLICT"
        )
        this.name = "ConflictError"
        this.taskId = taskId
        this.expected = expected
        this.actual = actual
    }
}

export class InvalidTransitionError extends ConclaveError {
    constructor(taskId: string, from: TaskState, to: TaskState) {
        super(
            `Task ${taskId} cannot move from ${from} to ${to}`,
            "INVALID_TRANSITION"
        )
        this.name = "InvalidTransitionError"
    }
}

export class InvariantViolationError extends ConclaveError {
    constructor(taskId: string, message: string) {
        super(`Task ${taskId}: ${message}`, "INVARIANT_VIOLATION")
        this.name = "InvariantViolationError"
    }
}

export class EscalationNotFoundError extends ConclaveError {
    constructor(escalationId: string) {
        super(`Escalation ${escalationId} not found`, "ESCALATION_NOT_FOUND")
        this.name = "EscalationNotFoundError"
    }
}

/** A task already has an OPEN escalation. */
export class EscalationConflictError extends ConclaveError {
    public readonly openEscalationId: string

    constructor(taskId: string, openEscalationId: string) {
        super(
            `Task ${taskId} already has open escalation ${openEscalationId}`,
            "ESCALATION_CONFLICT"
        )
        this.name = "EscalationConflictError"
        this.openEscalationId = openEscalationId
    }
}

export class AlreadyResolvedError extends ConclaveError {
    public readonly escalationId: string

    constructor(escalationId: string, status: EscalationStatus) {
        super(
            `Escalation ${escalationId} is ${status}, it cannot be resolved again`,
            "ALREADY_RESOLVED"
        )
        this.name = "AlreadyResolvedError"
        this.escalationId = escalationId
    }
}

/** Liveness timeout or no capable agent left to take the work. */
export class AgentUnavailableError extends ConclaveError {
    constructor(message: string) {
        super(message, "AGENT_UNAVAILABLE")
        this.name = "AgentUnavailableError"
    }
}

/** Retries exhausted with the same reason every time. Always escalated. */
export class DeadlockDetectedError extends ConclaveError {
    public readonly taskId: string
    public readonly reason: string

    constructor(taskId: string, reason: string) {
        super(
            `Task ${taskId} keeps failing validation with "${reason}"`,
            "DEADLOCK_DETECTED"
        )
        this.name = "DeadlockDetectedError"
        this.taskId = taskId
        this.reason = reason
    }
}

/** Raised by an agent's own work; travels as an error_report, never across the bus. */
export class AgentError extends ConclaveError {
    /** Another agent may succeed. Only retryable errors are reassigned. */
    public readonly retryable: boolean

    constructor(message: string, retryable = false, cause?: Error) {
        super(message, "AGENT_ERROR", cause)
        this.name = "AgentError"
        this.retryable = retryable
    }
}

export class ConfigError extends ConclaveError {
    constructor(message: string) {
        super(message, "CONFIG_ERROR")
        this.name = "ConfigError"
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error)
}
