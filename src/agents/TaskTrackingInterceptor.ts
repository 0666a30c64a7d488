import { publishWithRetry, type PublishRetryOptions } from "../bus/delivery.js"
import type { MessageBus } from "../bus/MessageBus.js"
import { createMessage, type MessageOf, type MessageRoute } from "../bus/messages.js"
import { AgentError, ConclaveError, errorMessage } from "../core/errors.js"
import { log } from "../core/Logger.js"
import type { Artifact, ValidationOutcome } from "../types.js"
import type { AssignmentContext, Result, WorkerRole } from "./AgentProxy.js"

export interface TrackingTarget {
    agentId: string
    agentRole: WorkerRole
    orchestratorId: string
}

/**
 * Wraps every agent invocation so tracking is not up to the agent: a state
 * update on entry, then exactly one of task_completion / validation_result
 * or error_report on exit.
 */
export class TaskTrackingInterceptor {
    constructor(
        private readonly bus: MessageBus,
        private readonly target: TrackingTarget,
        private readonly retry?: PublishRetryOptions
    ) {}

    public async aroundAssignment(
        message: MessageOf<"task_assignment">,
        invoke: (context: AssignmentContext) => Promise<Result<Artifact, AgentError>>
    ): Promise<void> {
        const { episode, attemptNumber } = message.payload
        const route = this.route(message.task_id)
        await this.publish(
            createMessage("state_update", route, {
                fromState: "assigned",
                toState: "in_progress",
                episode,
                attemptNumber,
            })
        )

        const context: AssignmentContext = {
            agentId: this.target.agentId,
            reportProgress: (progress: number, detail?: string): void => {
                const update = createMessage("state_update", route, {
                    fromState: "in_progress",
                    toState: "in_progress",
                    episode,
                    attemptNumber,
                    progress: Math.min(1, Math.max(0, progress)),
                    detail,
                })
                publishWithRetry(this.bus, update, this.retry).catch(
                    (error: unknown) => {
                        log.agent(
                            "Progress update from %s for %s lost: %s",
                            this.target.agentId,
                            message.task_id,
                            errorMessage(error)
                        )
                    }
                )
            },
        }

        let result: Result<Artifact, AgentError>
        try {
            result = await invoke(context)
        } catch (error) {
            result = { ok: false, error: toAgentError(error) }
        }

        if (result.ok) {
            await this.publish(
                createMessage("task_completion", route, {
                    episode,
                    attemptNumber,
                    artifact: result.value,
                })
            )
            return
        }
        await this.publishError(message.task_id, "production", result.error, {
            episode,
            attemptNumber,
        })
    }

    public async aroundValidation(
        message: MessageOf<"validation_request">,
        invoke: () => Promise<ValidationOutcome>
    ): Promise<void> {
        const { episode, attemptNumber } = message.payload
        const route = this.route(message.task_id)
        await this.publish(
            createMessage("state_update", route, {
                fromState: "validating",
                toState: "validating",
                episode,
                attemptNumber,
                detail: `validation started by ${this.target.agentId}`,
            })
        )

        let outcome: ValidationOutcome
        try {
            outcome = await invoke()
        } catch (error) {
            await this.publishError(
                message.task_id,
                "validation",
                toAgentError(error),
                { episode, attemptNumber }
            )
            return
        }
        await this.publish(
            createMessage("validation_result", route, {
                episode,
                attemptNumber,
                result: outcome.result,
                feedback: outcome.feedback,
                issues: outcome.issues ?? [],
            })
        )
    }

    private async publishError(
        taskId: string,
        phase: "production" | "validation",
        error: AgentError,
        attempt: { episode: number; attemptNumber: number }
    ): Promise<void> {
        log.agent("%s failed %s for %s: %s", this.target.agentId, phase, taskId, error.message)
        await this.publish(
            createMessage("error_report", this.route(taskId), {
                phase,
                episode: attempt.episode,
                attemptNumber: attempt.attemptNumber,
                error: { code: error.code, message: error.message },
                retryable: error.retryable,
            })
        )
    }

    private route(taskId: string): MessageRoute {
        return {
            senderId: this.target.agentId,
            senderRole: this.target.agentRole,
            recipientId: this.target.orchestratorId,
            recipientRole: "orchestrator",
            taskId,
        }
    }

    private async publish(
        message: Parameters<MessageBus["publish"]>[0]
    ): Promise<void> {
        await publishWithRetry(this.bus, message, this.retry)
    }
}

function toAgentError(error: unknown): AgentError {
    if (error instanceof AgentError) return error
    if (error instanceof ConclaveError) {
        return new AgentError(error.message, false, error)
    }
    return new AgentError(
        errorMessage(error),
        false,
        error instanceof Error ? error : undefined
    )
}
