import { createMessage, type MessageOf } from "../bus/messages.js"
import { InvariantViolationError } from "../core/errors.js"
import type { AgentRole, Task, ValidationAttempt } from "../types.js"

export interface Sender {
    id: string
    role: AgentRole
}

/** The attempt the task is waiting on right now. */
export function expectedAttempt(task: Task): { episode: number; attemptNumber: number } {
    return { episode: task.episode, attemptNumber: task.retryCount + 1 }
}

export function isCurrentAttempt(
    task: Task,
    episode: number | undefined,
    attemptNumber: number | undefined
): boolean {
    const expected = expectedAttempt(task)
    return episode === expected.episode && attemptNumber === expected.attemptNumber
}

export function failuresInEpisode(
    history: readonly ValidationAttempt[],
    episode: number
): ValidationAttempt[] {
    return history.filter((a) => a.episode === episode && a.result === "fail")
}

export function buildAssignmentMessage(
    task: Task,
    sender: Sender,
    extraFeedback: string[] = []
): MessageOf<"task_assignment"> {
    if (task.ownerAgentId === null) {
        throw new InvariantViolationError(task.id, "cannot dispatch work without an owner")
    }
    const feedback = [
        ...extraFeedback,
        ...failuresInEpisode(task.attemptHistory, task.episode).map((a) => a.feedback),
    ]
    return createMessage(
        "task_assignment",
        {
            senderId: sender.id,
            senderRole: sender.role,
            recipientId: task.ownerAgentId,
            recipientRole: "producer",
            taskId: task.id,
        },
        {
            ...expectedAttempt(task),
            componentId: task.componentId,
            input: task.input,
            criteria: task.criteria,
            feedback,
            history: task.attemptHistory,
        }
    )
}

export function buildValidationRequest(
    task: Task,
    sender: Sender
): MessageOf<"validation_request"> {
    if (task.validatorAgentId === null || task.latestArtifact === null) {
        throw new InvariantViolationError(
            task.id,
            "validation needs both a validator and a submitted artifact"
        )
    }
    return createMessage(
        "validation_request",
        {
            senderId: sender.id,
            senderRole: sender.role,
            recipientId: task.validatorAgentId,
            recipientRole: "validator",
            taskId: task.id,
        },
        {
            ...expectedAttempt(task),
            artifact: task.latestArtifact,
            criteria: task.criteria,
            history: task.attemptHistory,
        }
    )
}
