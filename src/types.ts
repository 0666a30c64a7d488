export type TaskState =
    | "pending"
    | "assigned"
    | "in_progress"
    | "validating"
    | "escalated"
    | "completed"
    | "failed"

export type TerminalTaskState = Extract<TaskState, "completed" | "failed">

export type AgentRole =
    | "orchestrator"
    | "producer"
    | "validator"
    | "escalation"
    | "human"

export type ValidationVerdict = "pass" | "fail"

export type EscalationStatus = "open" | "resolved"

export type EscalationResolution = "retry_reset" | "abort" | "force_accept"

/**
 * Why a task was escalated. Rejection analysis raises the first two; the
 * others belong to the stored record format and are accepted when a
 * persisted registry is restored.
 */
export type EscalationReason =
    | "repeated_same_failure"
    | "divergent_failure"
    | "timeout"
    | "agent_unavailable"

export type FailureKind =
    | "cancelled"
    | "agent_unavailable"
    | "timeout"
    | "agent_error"
    | "aborted"

export interface TaskFailure {
    kind: FailureKind
    message: string
}

export interface Artifact {
    kind: string
    content: string
    metadata?: Record<string, unknown>
    createdAt: string
}

export interface ValidationAttempt {
    /** 1-indexed; equals `retryCount + 1` when the attempt was produced. */
    attemptNumber: number
    episode: number
    validatorId: string
    result: ValidationVerdict
    feedback: string
    issues: string[]
    timestamp: string
}

export interface Task {
    id: string
    componentId: string
    taskClass: string
    requiredCapabilities: string[]
    validatorCapabilities: string[]
    input: Record<string, unknown>
    criteria: string[]
    ownerAgentId: string | null
    validatorAgentId: string | null
    assignedAgents: string[]
    state: TaskState
    retryCount: number
    maxRetries: number
    /** Bumped by every RETRY_RESET so results from an older round stay stale. */
    episode: number
    reassignments: number
    attemptHistory: ValidationAttempt[]
    /** Last artifact submitted for validation; the accepted one once completed. */
    latestArtifact: Artifact | null
    failure: TaskFailure | null
    version: number
    createdAt: string
    updatedAt: string
}

export interface TaskDefinition {
    id?: string
    componentId: string
    taskClass?: string
    requiredCapabilities: string[]
    validatorCapabilities?: string[]
    input?: Record<string, unknown>
    criteria?: string[]
    maxRetries?: number
}

export interface RejectionAnalysis {
    totalRejections: number
    uniqueIssues: number
    mostCommonIssue: string
    mostCommonCount: number
    isDeadlock: boolean
    allReasons: string[]
}

export interface Escalation {
    id: string
    taskId: string
    episode: number
    reason: EscalationReason
    rejectionCount: number
    context: ValidationAttempt[]
    analysis: RejectionAnalysis
    status: EscalationStatus
    resolution: EscalationResolution | null
    note: string | null
    createdAt: string
    resolvedAt: string | null
}

export interface ValidationOutcome {
    result: ValidationVerdict
    feedback: string
    issues?: string[]
}

export type PipelineProgress = Record<TaskState, number> & { total: number }
