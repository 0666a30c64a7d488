import { describe, expect, it } from "vitest"

import {
    analyzeRejectionPattern,
    classifyRejections,
    normalizeFeedback,
    recommendationsFor,
    summarizeEscalation,
} from "../../workflow/rejectionAnalysis.js"
import { failedAttempt } from "../helpers/fixtures.js"

function failures(...feedback: string[]) {
    return feedback.map((text, index) => failedAttempt(index + 1, text))
}

describe("normalizeFeedback", () => {
    it("should ignore case, separators and trailing punctuation", () => {
        expect(normalizeFeedback("Missing error handling.")).toBe("missing error handling")
        expect(normalizeFeedback("missing_error_handling")).toBe("missing error handling")
        expect(normalizeFeedback("  SQL-Injection!! ")).toBe("sql injection")
    })

    it("should name empty feedback", () => {
        expect(normalizeFeedback("")).toBe("unspecified")
        expect(normalizeFeedback(" ... ")).toBe("unspecified")
    })
})

describe("classifyRejections", () => {
    it("should call identical reasons repeated", () => {
        expect(
            classifyRejections(
                failures("Missing error handling", "missing_error_handling", "missing error handling."),
                3
            )
        ).toBe("repeated_same_failure")
    })

    it("should call different reasons divergent", () => {
        expect(
            classifyRejections(failures("sql injection", "missing error handling", "sql injection"), 3)
        ).toBe("divergent_failure")
    })

    it("should only look at the last maxRetries failures", () => {
        expect(classifyRejections(failures("typo", "no tests", "no tests", "no tests"), 3)).toBe(
            "repeated_same_failure"
        )
    })

    it("should not call a short history repeated", () => {
        expect(classifyRejections(failures("no tests", "no tests"), 3)).toBe("divergent_failure")
        expect(classifyRejections([], 1)).toBe("divergent_failure")
    })
})

describe("analyzeRejectionPattern", () => {
    it("should count reasons and pick the most common", () => {
        expect(
            analyzeRejectionPattern(failures("SQL injection", "missing error handling", "sql_injection"))
        ).toEqual({
            totalRejections: 3,
            uniqueIssues: 2,
            mostCommonIssue: "sql injection",
            mostCommonCount: 2,
            isDeadlock: false,
            allReasons: ["sql injection", "missing error handling"],
        })
    })

    it("should flag a single reason as a deadlock", () => {
        const analysis = analyzeRejectionPattern(failures("no tests", "No tests."))
        expect(analysis.isDeadlock).toBe(true)
        expect(analysis.mostCommonCount).toBe(2)
    })

    it("should describe an empty history", () => {
        expect(analyzeRejectionPattern([])).toEqual({
            totalRejections: 0,
            uniqueIssues: 0,
            mostCommonIssue: "unspecified",
            mostCommonCount: 0,
            isDeadlock: false,
            allReasons: [],
        })
    })
})

describe("summarizeEscalation", () => {
    it("should name the repeated reason", () => {
        const analysis = analyzeRejectionPattern(failures("no tests", "no tests", "no tests"))
        expect(summarizeEscalation("t1", "repeated_same_failure", analysis)).toBe(
            'Task t1 keeps failing validation with "no tests"'
        )
    })

    it("should list divergent reasons", () => {
        const analysis = analyzeRejectionPattern(
            failures("sql injection", "missing error handling", "sql injection")
        )
        expect(summarizeEscalation("t1", "divergent_failure", analysis)).toBe(
            "Task t1 failed validation 3 times for 2 different reasons: sql injection, missing error handling"
        )
    })
})

describe("recommendationsFor", () => {
    it("should suggest more context for a repeated failure", () => {
        const analysis = analyzeRejectionPattern(failures("no tests", "no tests", "no tests"))
        expect(recommendationsFor("repeated_same_failure", analysis)).toEqual([
            'Give the producer more context or an alternative approach for "no tests", then retry',
        ])
    })

    it("should add hints matching the reasons", () => {
        const analysis = analyzeRejectionPattern(
            failures("unclear requirement", "validation criteria too strict", "typo", "no tests")
        )
        expect(recommendationsFor("divergent_failure", analysis)).toEqual([
            "Each attempt failed for a different reason; review whether the validation criteria are clear",
            "Clarify the specification with concrete examples and edge cases",
            "Check that the validation criteria are reasonable and the feedback is actionable",
            "Consider splitting the component into smaller tasks",
        ])
    })
})
