import { describe, expect, it } from "vitest"

import { InvariantViolationError } from "../../core/errors.js"
import {
    buildAssignmentMessage,
    buildValidationRequest,
    failuresInEpisode,
    isCurrentAttempt,
} from "../../workflow/assignments.js"
import { artifact, failedAttempt, makeTask } from "../helpers/fixtures.js"

const orchestrator = { id: "orch", role: "orchestrator" } as const

describe("assignments", () => {
    const history = [failedAttempt(1, "old reason", 0), failedAttempt(1, "fresh reason", 1)]
    const task = makeTask({
        state: "in_progress",
        ownerAgentId: "p1",
        episode: 1,
        retryCount: 1,
        criteria: ["has tests"],
        input: { path: "src/auth.ts" },
        attemptHistory: history,
    })

    it("should know the attempt a task is waiting on", () => {
        expect(isCurrentAttempt(task, 1, 2)).toBe(true)
        expect(isCurrentAttempt(task, 0, 2)).toBe(false)
        expect(isCurrentAttempt(task, 1, 1)).toBe(false)
        expect(isCurrentAttempt(task, undefined, undefined)).toBe(false)
    })

    it("should keep only failures of the given episode", () => {
        expect(failuresInEpisode(history, 1).map((a) => a.feedback)).toEqual(["fresh reason"])
    })

    it("should address the owner with the current episode's feedback", () => {
        const message = buildAssignmentMessage(task, orchestrator, ["reviewer note"])
        expect(message).toMatchObject({
            type: "task_assignment",
            sender_id: "orch",
            sender_role: "orchestrator",
            recipient_id: "p1",
            recipient_role: "producer",
            task_id: "t1",
            payload: {
                episode: 1,
                attemptNumber: 2,
                componentId: "component",
                input: { path: "src/auth.ts" },
                criteria: ["has tests"],
                feedback: ["reviewer note", "fresh reason"],
            },
        })
        expect(message.payload.history).toHaveLength(2)
    })

    it("should refuse to dispatch an unowned task", () => {
        expect(() => buildAssignmentMessage(makeTask(), orchestrator)).toThrow(InvariantViolationError)
    })

    it("should send the latest artifact to the validator", () => {
        const validating = makeTask({
            state: "validating",
            ownerAgentId: "p1",
            validatorAgentId: "v1",
            latestArtifact: artifact("v2"),
        })
        expect(buildValidationRequest(validating, orchestrator)).toMatchObject({
            type: "validation_request",
            recipient_id: "v1",
            recipient_role: "validator",
            payload: { episode: 0, attemptNumber: 1, artifact: { content: "v2" } },
        })
        expect(() =>
            buildValidationRequest({ ...validating, latestArtifact: null }, orchestrator)
        ).toThrow("validation needs both a validator and a submitted artifact")
    })
})
