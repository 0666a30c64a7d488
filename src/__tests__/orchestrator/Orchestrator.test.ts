import { setTimeout as sleep } from "node:timers/promises"

import { afterEach, describe, expect, it, vi } from "vitest"

import type { AgentProxy } from "../../agents/AgentProxy.js"
import { request } from "../../bus/delivery.js"
import { InMemoryMessageBus } from "../../bus/InMemoryMessageBus.js"
import { PIPELINE_TASK_ID, createMessage } from "../../bus/messages.js"
import { AgentError, TaskNotFoundError } from "../../core/errors.js"
import { EventBus } from "../../events/EventBus.js"
import type { ConclaveEvent } from "../../events/types.js"
import {
    ORCHESTRATOR_ID,
    Orchestrator,
    type OrchestratorOptions,
} from "../../orchestrator/Orchestrator.js"
import type { Artifact } from "../../types.js"
import {
    FlakyBus,
    NO_DELAYS,
    artifact,
    deferred,
    producer,
    recordEvents,
    scriptedValidator,
} from "../helpers/fixtures.js"

const definition = { id: "t1", componentId: "auth", requiredCapabilities: ["code"] }

function staleReasons(events: ConclaveEvent[]): string[] {
    return events.flatMap((e) => (e.type === "task:stale_message" ? [e.reason] : []))
}

describe("Orchestrator", () => {
    const engines: Orchestrator[] = []

    afterEach(async () => {
        for (const engine of engines.splice(0)) await engine.shutdown()
    })

    async function startEngine(
        agents: AgentProxy[],
        options: Partial<OrchestratorOptions> = {}
    ): Promise<Orchestrator> {
        const engine = new Orchestrator({ agents, retry: NO_DELAYS, ...options })
        engines.push(engine)
        await engine.start()
        return engine
    }

    describe("validation loop", () => {
        it("should complete a task that passes on the first attempt", async () => {
            const engine = await startEngine([producer("p1"), scriptedValidator("v1")])
            await engine.submitTask(definition)
            const task = await engine.waitForTask("t1", undefined, 2000)

            expect(engine.isRunning).toBe(true)
            expect(task.state).toBe("completed")
            expect(task.retryCount).toBe(0)
            expect(task.attemptHistory).toHaveLength(1)
            expect(task.latestArtifact?.content).toBe("work of p1")
            expect(engine.agents.getLoad("p1")).toBe(0)
            expect(engine.agents.getLoad("v1")).toBe(0)
        })

        it("should escalate repeated failures and wait for a human", async () => {
            const engine = await startEngine([
                producer("p1"),
                scriptedValidator("v1", ["fail:no tests", "fail:No tests.", "fail:no_tests"]),
            ])
            await engine.submitTask(definition)
            const escalated = await engine.waitForTask("t1", ["escalated"], 2000)
            await vi.waitFor(() => {
                expect(engine.human.pending()).toHaveLength(1)
            })

            expect(escalated.retryCount).toBe(3)
            expect(escalated.attemptHistory.map((a) => a.attemptNumber)).toEqual([1, 2, 3])
            const [escalation] = engine.registry.listEscalations("t1")
            expect(escalation?.reason).toBe("repeated_same_failure")
            expect(engine.human.pending()[0]?.payload.escalationId).toBe(escalation?.id)

            await engine.human.answer(escalation?.id ?? "", "force_accept")
            const task = await engine.waitForTask("t1", undefined, 2000)
            expect(task.state).toBe("completed")
        })

        it("should start a new episode after a reset and then pass", async () => {
            const engine = await startEngine(
                [producer("p1"), scriptedValidator("v1", ["fail:sql injection", "fail:no tests", "fail:typo"])],
                { decide: () => ({ resolution: "retry_reset", note: "Split the query builder out" }) }
            )
            await engine.submitTask(definition)
            const task = await engine.waitForTask("t1", undefined, 2000)

            expect(task.state).toBe("completed")
            expect(task.episode).toBe(1)
            expect(task.retryCount).toBe(0)
            expect(task.attemptHistory.map((a) => [a.episode, a.attemptNumber, a.result])).toEqual([
                [0, 1, "fail"],
                [0, 2, "fail"],
                [0, 3, "fail"],
                [1, 1, "pass"],
            ])
            expect(engine.registry.listEscalations("t1")).toMatchObject([
                {
                    reason: "divergent_failure",
                    status: "resolved",
                    resolution: "retry_reset",
                    note: "Split the query builder out",
                },
            ])
        })

        it("should ignore a redelivered verdict", async () => {
            const events = new EventBus()
            const bus = new InMemoryMessageBus({ events })
            const seen = recordEvents(events)
            const engine = await startEngine([producer("p1"), scriptedValidator("v1")], { bus, events })
            await engine.submitTask(definition)
            const completed = await engine.waitForTask("t1", undefined, 2000)

            const published = seen.find(
                (e) => e.type === "message:published" && e.messageType === "validation_result"
            )
            const messageId = published?.type === "message:published" ? published.messageId : ""
            bus.redeliver(messageId)
            await bus.drain()

            expect(engine.getTask("t1").version).toBe(completed.version)
            expect(engine.getTask("t1").attemptHistory).toHaveLength(1)
            expect(staleReasons(seen)).toEqual(["task is completed"])
        })
    })

    describe("assignment", () => {
        it("should leave a task pending without a capable producer", async () => {
            const engine = await startEngine([scriptedValidator("v1")])
            const task = await engine.submitTask(definition)

            expect(task.state).toBe("pending")
            expect(await engine.assignPending()).toBe(0)
        })

        it("should fail the task when nobody else can validate", async () => {
            const engine = await startEngine([producer("p1")])
            await engine.submitTask(definition)
            const task = await engine.waitForTask("t1", undefined, 2000)

            expect(task.state).toBe("failed")
            expect(task.failure).toEqual({
                kind: "agent_unavailable",
                message: "No validator with capabilities [] other than the producer",
            })
        })

        it("should move work to another producer after a retryable agent error", async () => {
            const engine = await startEngine([
                producer("p1", ["code"], async () => new AgentError("compiler crashed", true)),
                producer("p2"),
                scriptedValidator("v1"),
            ])
            await engine.submitTask(definition)
            const task = await engine.waitForTask("t1", undefined, 2000)

            expect(task.state).toBe("completed")
            expect(task.assignedAgents).toEqual(["p1", "p2"])
            expect(task.reassignments).toBe(1)
            expect(task.latestArtifact?.content).toBe("work of p2")
        })

        it("should fail at once on an error the agent says is not retryable", async () => {
            const engine = await startEngine([
                producer("p1", ["code"], async () => new AgentError("license expired", false)),
                producer("p2"),
                scriptedValidator("v1"),
            ])
            await engine.submitTask(definition)
            const task = await engine.waitForTask("t1", undefined, 2000)

            expect(task.state).toBe("failed")
            expect(task.assignedAgents).toEqual(["p1"])
            expect(task.reassignments).toBe(0)
            expect(task.failure).toEqual({
                kind: "agent_error",
                message: "p1 failed production (AGENT_ERROR): license expired",
            })
        })

        it("should fail the task when no other producer can take over", async () => {
            const engine = await startEngine([
                producer("p1", ["code"], async () => new AgentError("compiler crashed")),
                scriptedValidator("v1"),
            ])
            await engine.submitTask(definition)
            const task = await engine.waitForTask("t1", undefined, 2000)

            expect(task.failure).toEqual({
                kind: "agent_error",
                message: "p1 failed production (AGENT_ERROR): compiler crashed",
            })
        })
    })

    describe("cancellation", () => {
        it("should fail a running task and drop its late result", async () => {
            const gate = deferred<Artifact>()
            const engine = await startEngine([
                producer("p1", ["code"], () => gate.promise),
                scriptedValidator("v1"),
            ])
            const seen = recordEvents(engine.events)
            await engine.submitTask(definition)
            await engine.waitForTask("t1", ["in_progress"], 2000)

            await engine.cancelTask("t1")
            const task = await engine.waitForTask("t1", undefined, 2000)
            expect(task.failure).toEqual({ kind: "cancelled", message: "Cancelled by request" })
            expect(task.ownerAgentId).toBeNull()

            gate.resolve(artifact("too late"))
            await vi.waitFor(() => {
                expect(staleReasons(seen)).toEqual(["task is failed"])
            })
            expect(engine.getTask("t1").state).toBe("failed")
        })

        it("should close the open escalation of a cancelled task", async () => {
            const engine = await startEngine([
                producer("p1"),
                scriptedValidator("v1", ["fail:a", "fail:b", "fail:c"]),
            ])
            await engine.submitTask(definition)
            await engine.waitForTask("t1", ["escalated"], 2000)
            await vi.waitFor(() => {
                expect(engine.registry.findOpenEscalation("t1")).toBeDefined()
            })

            await engine.cancelTask("t1", "Component dropped")
            const task = await engine.waitForTask("t1", undefined, 2000)

            expect(task.failure).toEqual({ kind: "cancelled", message: "Component dropped" })
            expect(engine.registry.listEscalations("t1")).toMatchObject([
                { status: "resolved", resolution: "abort", note: "Component dropped" },
            ])
        })

        it("should refuse to cancel an unknown task", async () => {
            const engine = await startEngine([])
            await expect(engine.cancelTask("nope")).rejects.toBeInstanceOf(TaskNotFoundError)
        })
    })

    it("should fail a task whose producer goes silent", async () => {
        const gate = deferred<Artifact>()
        const engine = await startEngine(
            [producer("p1", ["code"], () => gate.promise), scriptedValidator("v1")],
            {
                config: {
                    taskClasses: { default: { livenessTimeoutMs: 50, validationTimeoutMs: 50 } },
                },
            }
        )
        const seen = recordEvents(engine.events)
        await engine.submitTask(definition)
        const task = await engine.waitForTask("t1", undefined, 2000)
        gate.resolve(artifact())

        expect(task.failure).toEqual({
            kind: "agent_unavailable",
            message: "No state update while in_progress",
        })
        expect(seen).toContainEqual({
            type: "task:expired",
            taskId: "t1",
            state: "in_progress",
            kind: "agent_unavailable",
        })
    })

    it("should shut down while a producer that failed liveness never returns", async () => {
        const engine = await startEngine(
            [producer("p1", ["code"], () => new Promise<Artifact>(() => undefined)), scriptedValidator("v1")],
            {
                config: {
                    taskClasses: { default: { livenessTimeoutMs: 50, validationTimeoutMs: 50 } },
                },
            }
        )
        await engine.submitTask(definition)
        const task = await engine.waitForTask("t1", undefined, 2000)
        expect(task.state).toBe("failed")

        const outcome = await Promise.race([
            engine.shutdown().then(() => "stopped"),
            sleep(1000).then(() => "still draining"),
        ])
        expect(outcome).toBe("stopped")
        expect(engine.isRunning).toBe(false)
    })

    it("should shut down with a task still running on a stuck producer", async () => {
        const engine = await startEngine([
            producer("p1", ["code"], () => new Promise<Artifact>(() => undefined)),
            scriptedValidator("v1"),
        ])
        await engine.submitTask(definition)
        await engine.waitForTask("t1", ["in_progress"], 2000)

        const outcome = await Promise.race([
            engine.shutdown().then(() => "stopped"),
            sleep(1000).then(() => "still draining"),
        ])
        expect(outcome).toBe("stopped")
    })

    it("should finish the loop when a validation request is lost once", async () => {
        const bus = new FlakyBus()
        bus.failNext("validation_request")
        const engine = await startEngine([producer("p1"), scriptedValidator("v1")], { bus })
        await engine.submitTask(definition)
        const task = await engine.waitForTask("t1", undefined, 2000)

        expect(task.state).toBe("completed")
        expect(task.attemptHistory).toHaveLength(1)
        expect(engine.owedMessages).toBe(0)
        expect(bus.getDeadLetters()).toEqual([])
    })

    it("should drop an unanswered approval request once the escalation times out", async () => {
        const engine = await startEngine(
            [producer("p1"), scriptedValidator("v1", ["fail:a", "fail:b", "fail:c"])],
            { config: { approvalTimeoutMs: 200 } }
        )
        await engine.submitTask(definition)
        await vi.waitFor(
            () => {
                expect(engine.human.pending()).toHaveLength(1)
            },
            { timeout: 1000, interval: 5 }
        )
        const task = await engine.waitForTask("t1", undefined, 2000)

        expect(task.failure).toEqual({ kind: "timeout", message: "No decision within 200ms" })
        expect(engine.human.pending()).toEqual([])
    })

    describe("queries", () => {
        function query(taskId: string, kind: "task_status" | "pipeline_progress", correlationId: string) {
            return createMessage(
                "query_request",
                {
                    senderId: "dashboard",
                    senderRole: "human",
                    recipientId: ORCHESTRATOR_ID,
                    recipientRole: "orchestrator",
                    taskId,
                },
                { correlationId, query: kind }
            )
        }

        it("should report pipeline progress", async () => {
            const engine = await startEngine([])
            await engine.submitTask(definition)
            const response = await request(
                engine.bus,
                query(PIPELINE_TASK_ID, "pipeline_progress", "c-1"),
                { timeoutMs: 1000 }
            )

            expect(response.payload).toEqual({
                correlationId: "c-1",
                ok: true,
                data: {
                    pending: 1,
                    assigned: 0,
                    in_progress: 0,
                    validating: 0,
                    escalated: 0,
                    completed: 0,
                    failed: 0,
                    total: 1,
                },
            })
        })

        it("should report a task or say it does not exist", async () => {
            const engine = await startEngine([])
            await engine.submitTask(definition)

            const found = await request(engine.bus, query("t1", "task_status", "c-2"), { timeoutMs: 1000 })
            expect(found.payload.ok).toBe(true)
            expect(found.payload.data).toMatchObject({ id: "t1", state: "pending" })

            const missing = await request(engine.bus, query("nope", "task_status", "c-3"), { timeoutMs: 1000 })
            expect(missing.payload).toEqual({
                correlationId: "c-3",
                ok: false,
                error: "Task nope not found",
            })
        })
    })

    it("should time out waiting for a task that never settles", async () => {
        const engine = await startEngine([])
        await engine.submitTask(definition)

        await expect(engine.waitForTask("t1", ["completed"], 20)).rejects.toThrow(
            "Task t1 still pending after 20ms, waiting for completed"
        )
    })
})
