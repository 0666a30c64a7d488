import { AgentError, errorMessage } from "../core/errors.js"
import type { Artifact, ValidationOutcome } from "../types.js"
import type {
    AgentProxy,
    AssignmentContext,
    Result,
    TaskAssignment,
    ValidationRequest,
} from "./AgentProxy.js"

/** External, opaque producer of work. Returning an `AgentError` reports failure. */
export type ArtifactProducer = (
    input: Record<string, unknown>,
    feedback?: string
) => Promise<Artifact | AgentError>

/** External, opaque judgement of an artifact. */
export type ValidatorJudgment = (
    artifact: Artifact,
    criteria: string[]
) => Promise<{ pass: boolean; feedback: string; issues?: string[] }>

export class ProducerAgent implements AgentProxy {
    public readonly role = "producer" as const

    constructor(
        public readonly id: string,
        public readonly capabilities: readonly string[],
        private readonly produce: ArtifactProducer
    ) {}

    public async handleTaskAssignment(
        assignment: TaskAssignment,
        context: AssignmentContext
    ): Promise<Result<Artifact, AgentError>> {
        const latest = assignment.feedback[assignment.feedback.length - 1]
        const input =
            assignment.feedback.length > 0
                ? { ...assignment.input, previousFeedback: [...assignment.feedback] }
                : assignment.input
        context.reportProgress(0, `attempt ${assignment.attemptNumber} started`)
        try {
            const output = await this.produce(input, latest)
            if (output instanceof AgentError) return { ok: false, error: output }
            return { ok: true, value: output }
        } catch (error) {
            return {
                ok: false,
                error:
                    error instanceof AgentError
                        ? error
                        : new AgentError(
                              errorMessage(error),
                              false,
                              error instanceof Error ? error : undefined
                          ),
            }
        }
    }

    public async handleValidationRequest(): Promise<ValidationOutcome> {
        throw new AgentError(`${this.id} produces work and does not validate`)
    }
}

export class ValidatorAgent implements AgentProxy {
    public readonly role = "validator" as const

    constructor(
        public readonly id: string,
        public readonly capabilities: readonly string[],
        private readonly judge: ValidatorJudgment
    ) {}

    public async handleTaskAssignment(): Promise<Result<Artifact, AgentError>> {
        return {
            ok: false,
            error: new AgentError(`${this.id} validates work and does not produce it`),
        }
    }

    public async handleValidationRequest(
        request: ValidationRequest
    ): Promise<ValidationOutcome> {
        const verdict = await this.judge(request.artifact, request.criteria)
        return {
            result: verdict.pass ? "pass" : "fail",
            feedback: verdict.feedback,
            issues: verdict.issues ?? [],
        }
    }
}
