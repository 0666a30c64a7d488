import { randomUUID } from "node:crypto"

import { z } from "zod"

import type { AgentRole } from "../types.js"

/** Envelope task id used by messages that concern the pipeline as a whole. */
export const PIPELINE_TASK_ID = "pipeline"

export const DEFAULT_PRIORITY = 5

export const AgentRoleSchema = z.enum([
    "orchestrator",
    "producer",
    "validator",
    "escalation",
    "human",
])

export const TaskStateSchema = z.enum([
    "pending",
    "assigned",
    "in_progress",
    "validating",
    "escalated",
    "completed",
    "failed",
])

export const ArtifactSchema = z.object({
    kind: z.string().min(1),
    content: z.string(),
    metadata: z.record(z.string(), z.unknown()).optional(),
    createdAt: z.string(),
})

export const ValidationAttemptSchema = z.object({
    attemptNumber: z.number().int().min(1),
    episode: z.number().int().min(0),
    validatorId: z.string().min(1),
    result: z.enum(["pass", "fail"]),
    feedback: z.string(),
    issues: z.array(z.string()),
    timestamp: z.string(),
})

export const RejectionAnalysisSchema = z.object({
    totalRejections: z.number().int().min(0),
    uniqueIssues: z.number().int().min(0),
    mostCommonIssue: z.string(),
    mostCommonCount: z.number().int().min(0),
    isDeadlock: z.boolean(),
    allReasons: z.array(z.string()),
})

const EscalationResolutionSchema = z.enum([
    "retry_reset",
    "abort",
    "force_accept",
])

const attemptKey = {
    episode: z.number().int().min(0),
    attemptNumber: z.number().int().min(1),
}

export const PayloadSchemas = {
    task_assignment: z.object({
        ...attemptKey,
        componentId: z.string().min(1),
        input: z.record(z.string(), z.unknown()),
        criteria: z.array(z.string()),
        feedback: z.array(z.string()),
        history: z.array(ValidationAttemptSchema),
    }),
    task_completion: z.object({
        ...attemptKey,
        artifact: ArtifactSchema,
    }),
    validation_request: z.object({
        ...attemptKey,
        artifact: ArtifactSchema,
        criteria: z.array(z.string()),
        history: z.array(ValidationAttemptSchema),
    }),
    validation_result: z.object({
        ...attemptKey,
        result: z.enum(["pass", "fail"]),
        feedback: z.string(),
        issues: z.array(z.string()),
    }),
    escalation_request: z.object({
        episode: z.number().int().min(0),
        rejectionCount: z.number().int().min(1),
        maxRetries: z.number().int().min(1),
        attemptHistory: z.array(ValidationAttemptSchema),
    }),
    human_approval_request: z.object({
        escalationId: z.string().min(1),
        classification: z.enum([
            "repeated_same_failure",
            "divergent_failure",
            "timeout",
            "agent_unavailable",
        ]),
        summary: z.string(),
        rejectionCount: z.number().int().min(0),
        analysis: RejectionAnalysisSchema,
        recommendations: z.array(z.string()),
        context: z.array(ValidationAttemptSchema),
        options: z.array(EscalationResolutionSchema).min(1),
    }),
    escalation_resolution: z.object({
        escalationId: z.string().min(1),
        resolution: EscalationResolutionSchema,
        note: z.string().optional(),
    }),
    state_update: z.object({
        fromState: TaskStateSchema,
        toState: TaskStateSchema,
        episode: z.number().int().min(0).optional(),
        attemptNumber: z.number().int().min(1).optional(),
        progress: z.number().min(0).max(1).optional(),
        detail: z.string().optional(),
    }),
    error_report: z.object({
        phase: z.enum(["production", "validation"]),
        episode: z.number().int().min(0).optional(),
        attemptNumber: z.number().int().min(1).optional(),
        error: z.object({ code: z.string(), message: z.string() }),
        retryable: z.boolean(),
    }),
    query_request: z.object({
        correlationId: z.string().min(1),
        query: z.enum(["task_status", "pipeline_progress"]),
    }),
    query_response: z.object({
        correlationId: z.string().min(1),
        ok: z.boolean(),
        data: z.unknown().optional(),
        error: z.string().optional(),
    }),
    cancel_task: z.object({
        reason: z.string(),
    }),
} as const

export type MessageType = keyof typeof PayloadSchemas

export type PayloadOf<T extends MessageType> = z.infer<(typeof PayloadSchemas)[T]>

export interface Envelope {
    id: string
    sender_id: string
    sender_role: AgentRole
    /** `null` broadcasts to every subscriber of `recipient_role`. */
    recipient_id: string | null
    recipient_role: AgentRole
    task_id: string
    created_at: string
    /** 1 = highest, 10 = lowest, 5 unless the sender says otherwise. The bus does not reorder. */
    priority: number
}

export type MessageOf<T extends MessageType> = Envelope & {
    type: T
    payload: PayloadOf<T>
}

export type A2AMessage = { [K in MessageType]: MessageOf<K> }[MessageType]

const envelopeShape = {
    id: z.string().min(1),
    sender_id: z.string().min(1),
    sender_role: AgentRoleSchema,
    recipient_id: z.string().min(1).nullable(),
    recipient_role: AgentRoleSchema,
    task_id: z.string().min(1),
    created_at: z.string().min(1),
    priority: z.number().int().min(1).max(10).default(DEFAULT_PRIORITY),
}

function envelopeOf<T extends MessageType>(type: T) {
    return z.object({
        ...envelopeShape,
        type: z.literal(type),
        payload: PayloadSchemas[type],
    })
}

export const MessageSchema = z.discriminatedUnion("type", [
    envelopeOf("task_assignment"),
    envelopeOf("task_completion"),
    envelopeOf("validation_request"),
    envelopeOf("validation_result"),
    envelopeOf("escalation_request"),
    envelopeOf("human_approval_request"),
    envelopeOf("escalation_resolution"),
    envelopeOf("state_update"),
    envelopeOf("error_report"),
    envelopeOf("query_request"),
    envelopeOf("query_response"),
    envelopeOf("cancel_task"),
])

export interface MessageRoute {
    senderId: string
    senderRole: AgentRole
    recipientId?: string | null
    recipientRole: AgentRole
    taskId: string
    priority?: number
}

export function createMessage<T extends MessageType>(
    type: T,
    route: MessageRoute,
    payload: PayloadOf<T>
): MessageOf<T> {
    const envelope: Envelope = {
        id: randomUUID(),
        sender_id: route.senderId,
        sender_role: route.senderRole,
        recipient_id: route.recipientId ?? null,
        recipient_role: route.recipientRole,
        task_id: route.taskId,
        created_at: new Date().toISOString(),
        priority: route.priority ?? DEFAULT_PRIORITY,
    }
    return { ...envelope, type, payload }
}

/** Narrow a message to one kind. */
export function isMessageOf<T extends MessageType>(
    message: A2AMessage,
    type: T
): message is Extract<A2AMessage, { type: T }> {
    return message.type === type
}

export function deepFreeze<T>(value: T): Readonly<T> {
    if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
        for (const child of Object.values(value)) {
            deepFreeze(child)
        }
        Object.freeze(value)
    }
    return value
}
