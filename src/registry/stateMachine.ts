import type { Task, TaskState, TerminalTaskState } from "../types.js"

/**
 * Allowed edges. Every non-terminal state may also fall to `failed`
 * (cancellation, liveness timeout, unrecoverable agent error).
 * Self-edges on `assigned` and `validating` update the owner or the
 * validator without moving the task.
 */
const TRANSITIONS: Record<TaskState, readonly TaskState[]> = {
    pending: ["assigned", "failed"],
    assigned: ["in_progress", "assigned", "failed"],
    in_progress: ["validating", "assigned", "failed"],
    validating: ["completed", "in_progress", "escalated", "validating", "failed"],
    escalated: ["in_progress", "completed", "failed"],
    completed: [],
    failed: [],
}

const TERMINAL_STATES: readonly TaskState[] = ["completed", "failed"]

const OWNED_STATES: readonly TaskState[] = ["assigned", "in_progress", "validating"]

export function isTerminal(state: TaskState): state is TerminalTaskState {
    return TERMINAL_STATES.includes(state)
}

export function canTransition(from: TaskState, to: TaskState): boolean {
    return TRANSITIONS[from].includes(to)
}

/** Returns the first broken invariant, or `null` when the task is consistent. */
export function findInvariantViolation(task: Task): string | null {
    if (task.retryCount < 0 || task.retryCount > task.maxRetries) {
        return `retryCount ${task.retryCount} outside 0..${task.maxRetries}`
    }
    const owned = OWNED_STATES.includes(task.state)
    if (!owned && task.ownerAgentId !== null) {
        return `ownerAgentId must be null while ${task.state}`
    }
    if (owned && task.ownerAgentId === null) {
        return `ownerAgentId is required while ${task.state}`
    }
    if (task.state !== "validating" && task.validatorAgentId !== null) {
        return `validatorAgentId must be null while ${task.state}`
    }
    if ((task.state === "failed") !== (task.failure !== null)) {
        return "failure must be set exactly when the task has failed"
    }
    if (task.state === "escalated") {
        const last = task.attemptHistory[task.attemptHistory.length - 1]
        if (task.retryCount !== task.maxRetries || last?.result !== "fail") {
            return "escalated requires exhausted retries and a failed last attempt"
        }
    }
    return null
}

/** Attempt history may only grow; existing entries are immutable. */
export function isAppendOnly(before: Task, after: Task): boolean {
    if (after.attemptHistory.length < before.attemptHistory.length) return false
    return before.attemptHistory.every(
        (attempt, index) =>
            JSON.stringify(attempt) === JSON.stringify(after.attemptHistory[index])
    )
}
