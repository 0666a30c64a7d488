import type {
    AgentProxy,
    AssignmentContext,
    Result,
    TaskAssignment,
    ValidationRequest,
} from "../agents/AgentProxy.js"
import { AgentError } from "../core/errors.js"
import type { ApprovalDecider, HumanDecision } from "../orchestrator/HumanApprovalChannel.js"
import type { Artifact, ValidationOutcome } from "../types.js"
import type { ProducerSpec, Scenario, ValidatorSpec } from "./Scenario.js"

const DEFAULT_REJECTION = "rejected"

export function parseVerdict(verdict: string): ValidationOutcome {
    if (verdict === "pass") return { result: "pass", feedback: "", issues: [] }
    const feedback = verdict.slice("fail:".length) || DEFAULT_REJECTION
    return { result: "fail", feedback, issues: [feedback] }
}

/** Produces a text artifact per call after `failures` scripted errors per task. */
export class ScriptedProducer implements AgentProxy {
    public readonly role = "producer" as const
    private readonly calls = new Map<string, number>()

    constructor(private readonly spec: ProducerSpec) {}

    public get id(): string {
        return this.spec.id
    }

    public get capabilities(): readonly string[] {
        return this.spec.capabilities
    }

    public async handleTaskAssignment(
        assignment: TaskAssignment,
        context: AssignmentContext
    ): Promise<Result<Artifact, AgentError>> {
        const call = (this.calls.get(assignment.taskId) ?? 0) + 1
        this.calls.set(assignment.taskId, call)
        context.reportProgress(0.5, `draft ${call}`)
        if (call <= this.spec.failures) {
            return {
                ok: false,
                error: new AgentError(
                    `${this.id} could not produce ${assignment.componentId} (call ${call})`,
                    true
                ),
            }
        }
        return {
            ok: true,
            value: {
                kind: "text",
                content: `${assignment.componentId} by ${this.id}, episode ${assignment.episode} attempt ${assignment.attemptNumber}`,
                metadata: { feedbackAddressed: assignment.feedback.length },
                createdAt: new Date().toISOString(),
            },
        }
    }

    public async handleValidationRequest(): Promise<ValidationOutcome> {
        throw new AgentError(`${this.id} produces work and does not validate`)
    }
}

/** Answers from a per-task verdict script, then with `defaultVerdict`. */
export class ScriptedValidator implements AgentProxy {
    public readonly role = "validator" as const
    private readonly remaining = new Map<string, string[]>()

    constructor(private readonly spec: ValidatorSpec) {
        for (const [taskId, verdicts] of Object.entries(spec.verdicts)) {
            this.remaining.set(taskId, [...verdicts])
        }
    }

    public get id(): string {
        return this.spec.id
    }

    public get capabilities(): readonly string[] {
        return this.spec.capabilities
    }

    public async handleTaskAssignment(): Promise<Result<Artifact, AgentError>> {
        return {
            ok: false,
            error: new AgentError(`${this.id} validates work and does not produce it`),
        }
    }

    public async handleValidationRequest(
        request: ValidationRequest
    ): Promise<ValidationOutcome> {
        const verdict = this.remaining.get(request.taskId)?.shift() ?? this.spec.defaultVerdict
        return parseVerdict(verdict)
    }
}

export function createScriptedAgents(scenario: Scenario): AgentProxy[] {
    return scenario.agents.map((spec) =>
        spec.role === "producer" ? new ScriptedProducer(spec) : new ScriptedValidator(spec)
    )
}

/** Decisions per task in order, then the default; `null` leaves the escalation open. */
export function createScriptedDecider(scenario: Scenario): ApprovalDecider {
    const remaining = new Map<string, HumanDecision[]>()
    for (const [taskId, decisions] of Object.entries(scenario.decisions)) {
        remaining.set(taskId, [...decisions])
    }
    return (request) =>
        remaining.get(request.task_id)?.shift() ?? scenario.defaultDecision ?? null
}
