import { randomUUID } from "node:crypto"

import { DEFAULT_MAX_RETRIES, DEFAULT_TASK_CLASS } from "../core/Config.js"
import {
    AlreadyResolvedError,
    ConflictError,
    EscalationConflictError,
    EscalationNotFoundError,
    InvalidTransitionError,
    InvariantViolationError,
    TaskNotFoundError,
    errorMessage,
} from "../core/errors.js"
import { log } from "../core/Logger.js"
import type { EventBus } from "../events/EventBus.js"
import type { FileStore } from "../persistence/FileStore.js"
import type {
    Escalation,
    EscalationResolution,
    Task,
    TaskDefinition,
    TaskState,
} from "../types.js"
import {
    canTransition,
    findInvariantViolation,
    isAppendOnly,
} from "./stateMachine.js"

export type TaskMutator = (draft: Task) => void

export type EscalationDraft = Pick<
    Escalation,
    "taskId" | "episode" | "reason" | "rejectionCount" | "context" | "analysis"
>

export interface TaskRegistryOptions {
    store?: FileStore
    events?: EventBus
    defaultMaxRetries?: number
}

export interface TaskFilter {
    states?: TaskState[]
}

/**
 * Authoritative store of tasks and escalations.
 *
 * `transition` is the only way to change a task. The state check, the
 * mutation and the commit run without yielding, so of two concurrent
 * transitions out of the same state exactly one wins and the other gets a
 * `ConflictError`. Persistence happens after the commit and cannot undo it.
 */
export class TaskRegistry {
    private readonly store?: FileStore
    private readonly events?: EventBus
    private readonly defaultMaxRetries: number
    private readonly tasks = new Map<string, Task>()
    private readonly escalations = new Map<string, Escalation>()
    private readonly openEscalations = new Map<string, string>()
    private writes: Promise<void> = Promise.resolve()
    private failedWrites = 0

    constructor(options: TaskRegistryOptions = {}) {
        this.store = options.store
        this.events = options.events
        this.defaultMaxRetries = options.defaultMaxRetries ?? DEFAULT_MAX_RETRIES
    }

    public async create(definition: TaskDefinition): Promise<Task> {
        const id = definition.id ?? randomUUID()
        if (this.tasks.has(id)) {
            throw new InvariantViolationError(id, "a task with this id already exists")
        }
        const maxRetries = definition.maxRetries ?? this.defaultMaxRetries
        if (!Number.isInteger(maxRetries) || maxRetries < 1) {
            throw new InvariantViolationError(id, `maxRetries must be a positive integer, got ${maxRetries}`)
        }
        const now = new Date().toISOString()
        const task: Task = {
            id,
            componentId: definition.componentId,
            taskClass: definition.taskClass ?? DEFAULT_TASK_CLASS,
            requiredCapabilities: [...definition.requiredCapabilities],
            validatorCapabilities: [...(definition.validatorCapabilities ?? [])],
            input: structuredClone(definition.input ?? {}),
            criteria: [...(definition.criteria ?? [])],
            ownerAgentId: null,
            validatorAgentId: null,
            assignedAgents: [],
            state: "pending",
            retryCount: 0,
            maxRetries,
            episode: 0,
            reassignments: 0,
            attemptHistory: [],
            latestArtifact: null,
            failure: null,
            version: 1,
            createdAt: now,
            updatedAt: now,
        }
        this.tasks.set(id, task)
        log.registry("Created task %s for %s", id, task.componentId)
        this.events?.emit({
            type: "task:created",
            taskId: id,
            componentId: task.componentId,
        })
        await this.persist(`tasks/${id}`, task)
        return structuredClone(task)
    }

    public get(taskId: string): Task {
        const task = this.tasks.get(taskId)
        if (!task) throw new TaskNotFoundError(taskId)
        return structuredClone(task)
    }

    public find(taskId: string): Task | undefined {
        const task = this.tasks.get(taskId)
        return task ? structuredClone(task) : undefined
    }

    public list(filter: TaskFilter = {}): Task[] {
        const result: Task[] = []
        for (const task of this.tasks.values()) {
            if (filter.states && !filter.states.includes(task.state)) continue
            result.push(structuredClone(task))
        }
        return result
    }

    public async transition(
        taskId: string,
        expectedState: TaskState,
        newState: TaskState,
        mutator?: TaskMutator
    ): Promise<Task> {
        const current = this.tasks.get(taskId)
        if (!current) throw new TaskNotFoundError(taskId)
        if (current.state !== expectedState) {
            throw new ConflictError(taskId, expectedState, current.state)
        }
        if (!canTransition(expectedState, newState)) {
            throw new InvalidTransitionError(taskId, expectedState, newState)
        }

        const draft = structuredClone(current)
        draft.state = newState
        mutator?.(draft)
        // Fields the mutator does not get to choose.
        draft.id = current.id
        draft.state = newState
        draft.version = current.version + 1
        draft.createdAt = current.createdAt
        draft.updatedAt = new Date().toISOString()

        if (!isAppendOnly(current, draft)) {
            throw new InvariantViolationError(taskId, "attempt history is append-only")
        }
        const violation = findInvariantViolation(draft)
        if (violation) {
            throw new InvariantViolationError(taskId, violation)
        }

        this.tasks.set(taskId, draft)
        log.registry(
            "Task %s: %s -> %s (retry %d/%d, v%d)",
            taskId,
            expectedState,
            newState,
            draft.retryCount,
            draft.maxRetries,
            draft.version
        )
        this.events?.emit({
            type: "task:state_change",
            taskId,
            from: expectedState,
            to: newState,
            retryCount: draft.retryCount,
            previousOwner: current.ownerAgentId,
            owner: draft.ownerAgentId,
            previousValidator: current.validatorAgentId,
            validator: draft.validatorAgentId,
        })
        const snapshot = structuredClone(draft)
        await this.persist(`tasks/${taskId}`, draft)
        return snapshot
    }

    public async openEscalation(draft: EscalationDraft): Promise<Escalation> {
        if (!this.tasks.has(draft.taskId)) throw new TaskNotFoundError(draft.taskId)
        const openId = this.openEscalations.get(draft.taskId)
        if (openId) {
            throw new EscalationConflictError(draft.taskId, openId)
        }
        const escalation: Escalation = {
            ...structuredClone(draft),
            id: randomUUID(),
            status: "open",
            resolution: null,
            note: null,
            createdAt: new Date().toISOString(),
            resolvedAt: null,
        }
        this.escalations.set(escalation.id, escalation)
        this.openEscalations.set(draft.taskId, escalation.id)
        log.registry(
            "Opened escalation %s for task %s (%s)",
            escalation.id,
            draft.taskId,
            draft.reason
        )
        this.events?.emit({
            type: "escalation:opened",
            escalationId: escalation.id,
            taskId: escalation.taskId,
            reason: escalation.reason,
            rejectionCount: escalation.rejectionCount,
        })
        const snapshot = structuredClone(escalation)
        await this.persist(`escalations/${escalation.id}`, escalation)
        return snapshot
    }

    public async resolveEscalation(
        escalationId: string,
        resolution: EscalationResolution,
        note?: string
    ): Promise<Escalation> {
        const current = this.escalations.get(escalationId)
        if (!current) throw new EscalationNotFoundError(escalationId)
        if (current.status !== "open") {
            throw new AlreadyResolvedError(escalationId, current.status)
        }
        const resolved: Escalation = {
            ...current,
            status: "resolved",
            resolution,
            note: note ?? null,
            resolvedAt: new Date().toISOString(),
        }
        this.escalations.set(escalationId, resolved)
        this.openEscalations.delete(resolved.taskId)
        log.registry(
            "Resolved escalation %s for task %s: %s",
            escalationId,
            resolved.taskId,
            resolution
        )
        this.events?.emit({
            type: "escalation:resolved",
            escalationId,
            taskId: resolved.taskId,
            resolution,
            note: resolved.note,
        })
        const snapshot = structuredClone(resolved)
        await this.persist(`escalations/${escalationId}`, resolved)
        return snapshot
    }

    public getEscalation(escalationId: string): Escalation {
        const escalation = this.escalations.get(escalationId)
        if (!escalation) throw new EscalationNotFoundError(escalationId)
        return structuredClone(escalation)
    }

    public findOpenEscalation(taskId: string): Escalation | undefined {
        const id = this.openEscalations.get(taskId)
        const escalation = id ? this.escalations.get(id) : undefined
        return escalation ? structuredClone(escalation) : undefined
    }

    public listEscalations(taskId?: string): Escalation[] {
        return [...this.escalations.values()]
            .filter((e) => taskId === undefined || e.taskId === taskId)
            .map((e) => structuredClone(e))
    }

    /** Reload every persisted task and escalation. Returns the number of tasks loaded. */
    public async restore(): Promise<number> {
        if (!this.store) return 0
        const store = this.store
        let loaded = 0
        for (const key of await store.list("tasks")) {
            const task = await store.read<Task>(key)
            if (!task) continue
            this.tasks.set(task.id, task)
            loaded++
        }
        for (const key of await store.list("escalations")) {
            const escalation = await store.read<Escalation>(key)
            if (!escalation) continue
            this.escalations.set(escalation.id, escalation)
            if (escalation.status === "open") {
                this.openEscalations.set(escalation.taskId, escalation.id)
            }
        }
        log.registry("Restored %d tasks from disk", loaded)
        return loaded
    }

    /** Snapshot writes that failed since this registry was created. */
    public get persistenceFailures(): number {
        return this.failedWrites
    }

    /** Resolves once every pending snapshot write has finished. */
    public async flush(): Promise<void> {
        await this.writes
    }

    /** The change is already committed, so a failed write is logged, not thrown. */
    private async persist(key: string, data: Task | Escalation): Promise<void> {
        if (!this.store) return
        const store = this.store
        const snapshot = structuredClone(data)
        this.writes = this.writes
            .then(() => store.write(key, snapshot))
            .catch((error: unknown) => {
                this.failedWrites++
                log.persistence("Snapshot of %s not written: %s", key, errorMessage(error))
            })
        await this.writes
    }
}
