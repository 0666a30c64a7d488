import { mkdtemp, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"

import { describe, expect, it, vi } from "vitest"

import type { AssignmentContext, TaskAssignment } from "../../agents/AgentProxy.js"
import { createMessage } from "../../bus/messages.js"
import { analyzeRejectionPattern } from "../../workflow/rejectionAnalysis.js"
import { loadScenario, parseScenario, type Scenario } from "../../scenario/Scenario.js"
import {
    ScriptedProducer,
    ScriptedValidator,
    createScriptedDecider,
    parseVerdict,
} from "../../scenario/scriptedAgents.js"
import { artifact } from "../helpers/fixtures.js"

const minimal = {
    agents: [{ id: "p1", role: "producer" }],
    tasks: [{ id: "t1", componentId: "auth" }],
}

function assignmentFor(taskId: string, attemptNumber = 1): TaskAssignment {
    return {
        taskId,
        componentId: "auth",
        episode: 0,
        attemptNumber,
        input: {},
        criteria: [],
        feedback: [],
        history: [],
    }
}

function approvalRequest(taskId: string) {
    return createMessage(
        "human_approval_request",
        {
            senderId: "escalation-manager",
            senderRole: "escalation",
            recipientId: null,
            recipientRole: "human",
            taskId,
        },
        {
            escalationId: `esc-${taskId}`,
            classification: "divergent_failure",
            summary: "",
            rejectionCount: 3,
            analysis: analyzeRejectionPattern([]),
            recommendations: [],
            context: [],
            options: ["retry_reset", "abort", "force_accept"],
        }
    )
}

describe("parseScenario", () => {
    it("should apply defaults", () => {
        const scenario = parseScenario(minimal)
        expect(scenario.name).toBe("scenario")
        expect(scenario.config).toEqual({})
        expect(scenario.decisions).toEqual({})
        expect(scenario.timeoutMs).toBe(30_000)
        expect(scenario.agents[0]).toEqual({ id: "p1", role: "producer", capabilities: [], failures: 0 })
        expect(scenario.tasks[0]?.requiredCapabilities).toEqual([])
    })

    it("should name a bad verdict by its path", () => {
        expect(() =>
            parseScenario({
                ...minimal,
                agents: [{ id: "v1", role: "validator", verdicts: { t1: ["maybe"] } }],
            })
        ).toThrow('Invalid scenario: agents.0.verdicts.t1.0: expected "pass" or "fail:<feedback>"')
    })

    it("should reject unknown roles and invalid config", () => {
        expect(() =>
            parseScenario({ ...minimal, agents: [{ id: "x", role: "critic" }] })
        ).toThrow("agents.0.role")
        expect(() => parseScenario({ ...minimal, config: { maxRetries: 0 } })).toThrow(
            "config.maxRetries"
        )
    })

    it("should report malformed files", async () => {
        const dir = await mkdtemp(join(tmpdir(), "conclave-scenario-"))
        try {
            const path = join(dir, "broken.json")
            await writeFile(path, "{")
            await expect(loadScenario(path)).rejects.toThrow(`Invalid JSON in ${path}`)
        } finally {
            await rm(dir, { recursive: true, force: true })
        }
    })
})

describe("scripted agents", () => {
    it("should parse verdicts", () => {
        expect(parseVerdict("pass")).toEqual({ result: "pass", feedback: "", issues: [] })
        expect(parseVerdict("fail:no tests")).toEqual({
            result: "fail",
            feedback: "no tests",
            issues: ["no tests"],
        })
        expect(parseVerdict("fail").feedback).toBe("rejected")
    })

    it("should fail the scripted number of calls per task, then deliver", async () => {
        const producer = new ScriptedProducer({ id: "p1", role: "producer", capabilities: [], failures: 1 })
        const context: AssignmentContext = { agentId: "p1", reportProgress: vi.fn() }

        const first = await producer.handleTaskAssignment(assignmentFor("t1"), context)
        const second = await producer.handleTaskAssignment(assignmentFor("t1", 2), context)
        const other = await producer.handleTaskAssignment(assignmentFor("t2"), context)

        expect(first.ok ? null : first.error.message).toBe("p1 could not produce auth (call 1)")
        expect(second.ok ? second.value.content : null).toBe("auth by p1, episode 0 attempt 2")
        expect(other.ok).toBe(false)
        expect(context.reportProgress).toHaveBeenCalledWith(0.5, "draft 1")
    })

    it("should follow the verdict script per task, then the default", async () => {
        const validator = new ScriptedValidator({
            id: "v1",
            role: "validator",
            capabilities: [],
            verdicts: { t1: ["fail:typo"] },
            defaultVerdict: "pass",
        })
        const request = (taskId: string) => ({
            taskId,
            episode: 0,
            attemptNumber: 1,
            artifact: artifact(),
            criteria: [],
            history: [],
        })

        expect((await validator.handleValidationRequest(request("t1"))).result).toBe("fail")
        expect((await validator.handleValidationRequest(request("t1"))).result).toBe("pass")
        expect((await validator.handleValidationRequest(request("t2"))).result).toBe("pass")
    })

    it("should hand out decisions in order, then the default", async () => {
        const scenario: Scenario = parseScenario({
            ...minimal,
            decisions: { t1: [{ resolution: "retry_reset", note: "again" }] },
        })
        const decide = createScriptedDecider(scenario)
        expect(await decide(approvalRequest("t1"))).toEqual({ resolution: "retry_reset", note: "again" })
        expect(await decide(approvalRequest("t1"))).toBeNull()

        const withDefault = createScriptedDecider({ ...scenario, defaultDecision: { resolution: "abort" } })
        expect(await withDefault(approvalRequest("t2"))).toEqual({ resolution: "abort" })
    })
})
