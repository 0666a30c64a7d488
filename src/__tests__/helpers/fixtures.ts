import { ProducerAgent, ValidatorAgent, type ArtifactProducer } from "../../agents/adapters.js"
import { InMemoryMessageBus } from "../../bus/InMemoryMessageBus.js"
import type { A2AMessage, MessageType } from "../../bus/messages.js"
import { DeliveryError } from "../../core/errors.js"
import type { EventBus } from "../../events/EventBus.js"
import type { ConclaveEvent } from "../../events/types.js"
import type { TaskRegistry } from "../../registry/TaskRegistry.js"
import type { Artifact, Task, ValidationAttempt } from "../../types.js"

export const NO_DELAYS = { delaysMs: [] }

export function artifact(content = "draft"): Artifact {
    return { kind: "text", content, createdAt: "2026-01-01T00:00:00.000Z" }
}

export function producer(
    id: string,
    capabilities: string[] = ["code"],
    produce: ArtifactProducer = async () => artifact(`work of ${id}`)
): ProducerAgent {
    return new ProducerAgent(id, capabilities, produce)
}

/**
 * Validator answering from a script: "pass", or "fail:<feedback>".
 * Passes once the script runs out.
 */
export function scriptedValidator(
    id: string,
    verdicts: string[] = [],
    capabilities: string[] = []
): ValidatorAgent {
    const queue = [...verdicts]
    return new ValidatorAgent(id, capabilities, async () => {
        const verdict = queue.shift() ?? "pass"
        if (verdict === "pass") return { pass: true, feedback: "looks good" }
        const feedback = verdict.slice("fail:".length)
        return { pass: false, feedback, issues: [feedback] }
    })
}

/** In-memory bus whose next publishes of chosen message types fail. */
export class FlakyBus extends InMemoryMessageBus {
    private readonly failures = new Map<MessageType, number>()

    public failNext(type: MessageType, times = 1): void {
        this.failures.set(type, times)
    }

    public override async publish(message: A2AMessage): Promise<string> {
        const left = this.failures.get(message.type) ?? 0
        if (left > 0) {
            this.failures.set(message.type, left - 1)
            throw new DeliveryError(`Broker refused ${message.type} ${message.id}`)
        }
        return super.publish(message)
    }
}

export function recordEvents(events: EventBus): ConclaveEvent[] {
    const seen: ConclaveEvent[] = []
    events.on((event) => seen.push(event))
    return seen
}

export interface Deferred<T> {
    promise: Promise<T>
    resolve(value: T): void
}

export function deferred<T>(): Deferred<T> {
    let resolve: (value: T) => void = () => undefined
    const promise = new Promise<T>((r) => {
        resolve = r
    })
    return { promise, resolve }
}

export function makeTask(overrides: Partial<Task> = {}): Task {
    return {
        id: "t1",
        componentId: "component",
        taskClass: "default",
        requiredCapabilities: [],
        validatorCapabilities: [],
        input: {},
        criteria: [],
        ownerAgentId: null,
        validatorAgentId: null,
        assignedAgents: [],
        state: "pending",
        retryCount: 0,
        maxRetries: 3,
        episode: 0,
        reassignments: 0,
        attemptHistory: [],
        latestArtifact: null,
        failure: null,
        version: 1,
        createdAt: "2026-01-01T00:00:00.000Z",
        updatedAt: "2026-01-01T00:00:00.000Z",
        ...overrides,
    }
}

export function failedAttempt(
    attemptNumber: number,
    feedback: string,
    episode = 0
): ValidationAttempt {
    return {
        attemptNumber,
        episode,
        validatorId: "v1",
        result: "fail",
        feedback,
        issues: [feedback],
        timestamp: "2026-01-01T00:00:00.000Z",
    }
}

/** pending -> assigned(owner) -> in_progress, straight through the registry. */
export async function startWork(
    registry: TaskRegistry,
    taskId: string,
    owner = "p1"
): Promise<Task> {
    await registry.transition(taskId, "pending", "assigned", (draft) => {
        draft.ownerAgentId = owner
        draft.assignedAgents.push(owner)
    })
    return registry.transition(taskId, "assigned", "in_progress")
}

/**
 * Runs an in-progress task through one rejected attempt per feedback entry.
 * With `maxRetries` entries the task ends up escalated.
 */
export async function rejectAttempts(
    registry: TaskRegistry,
    taskId: string,
    feedbacks: string[],
    validator = "v1"
): Promise<Task> {
    let task = registry.get(taskId)
    for (const feedback of feedbacks) {
        await registry.transition(taskId, "in_progress", "validating", (draft) => {
            draft.validatorAgentId = validator
            draft.latestArtifact = artifact()
        })
        const attempt = {
            ...failedAttempt(task.retryCount + 1, feedback, task.episode),
            validatorId: validator,
        }
        const exhausted = task.retryCount + 1 >= task.maxRetries
        task = await registry.transition(
            taskId,
            "validating",
            exhausted ? "escalated" : "in_progress",
            (draft) => {
                draft.attemptHistory.push(attempt)
                draft.validatorAgentId = null
                if (exhausted) {
                    draft.retryCount = draft.maxRetries
                    draft.ownerAgentId = null
                } else {
                    draft.retryCount += 1
                }
            }
        )
    }
    return task
}
