import { DeadlockDetectedError } from "../core/errors.js"
import type { EscalationReason, RejectionAnalysis, ValidationAttempt } from "../types.js"

const UNSPECIFIED = "unspecified"

/**
 * Reduce feedback to a comparable reason: case, separators, surrounding
 * whitespace and trailing punctuation are ignored, so "Missing error
 * handling." and "missing_error_handling" are the same reason.
 */
export function normalizeFeedback(feedback: string): string {
    const normalized = feedback
        .toLowerCase()
        .replace(/[_\-\s]+/g, " ")
        .trim()
        .replace(/[.!;:,]+$/, "")
        .trim()
    return normalized || UNSPECIFIED
}

/**
 * `repeated_same_failure` when the last `maxRetries` failures share one
 * normalized reason, otherwise `divergent_failure`.
 */
export function classifyRejections(
    failures: readonly ValidationAttempt[],
    maxRetries: number
): Extract<EscalationReason, "repeated_same_failure" | "divergent_failure"> {
    const window = failures.slice(-maxRetries)
    if (window.length < maxRetries || window.length === 0) {
        return "divergent_failure"
    }
    const reasons = new Set(window.map((a) => normalizeFeedback(a.feedback)))
    return reasons.size === 1 ? "repeated_same_failure" : "divergent_failure"
}

export function analyzeRejectionPattern(
    failures: readonly ValidationAttempt[]
): RejectionAnalysis {
    const counts = new Map<string, number>()
    for (const attempt of failures) {
        const reason = normalizeFeedback(attempt.feedback)
        counts.set(reason, (counts.get(reason) ?? 0) + 1)
    }
    let mostCommonIssue = UNSPECIFIED
    let mostCommonCount = 0
    for (const [reason, count] of counts) {
        if (count > mostCommonCount) {
            mostCommonIssue = reason
            mostCommonCount = count
        }
    }
    return {
        totalRejections: failures.length,
        uniqueIssues: counts.size,
        mostCommonIssue,
        mostCommonCount,
        isDeadlock: failures.length > 0 && counts.size === 1,
        allReasons: [...counts.keys()],
    }
}

export function summarizeEscalation(
    taskId: string,
    classification: EscalationReason,
    analysis: RejectionAnalysis
): string {
    if (classification === "repeated_same_failure") {
        return new DeadlockDetectedError(taskId, analysis.mostCommonIssue).message
    }
    return `Task ${taskId} failed validation ${analysis.totalRejections} times for ${analysis.uniqueIssues} different reasons: ${analysis.allReasons.join(", ")}`
}

/**
 * Advisory text for the human reviewer. It never changes which resolutions
 * are offered.
 */
export function recommendationsFor(
    classification: EscalationReason,
    analysis: RejectionAnalysis
): string[] {
    const recommendations: string[] = []
    const reasons = analysis.allReasons.join(" ")

    if (classification === "repeated_same_failure") {
        recommendations.push(
            `Give the producer more context or an alternative approach for "${analysis.mostCommonIssue}", then retry`
        )
    } else {
        recommendations.push(
            "Each attempt failed for a different reason; review whether the validation criteria are clear"
        )
    }
    if (/specification|requirement|ambiguous|unclear/.test(reasons)) {
        recommendations.push(
            "Clarify the specification with concrete examples and edge cases"
        )
    }
    if (/validation|criteria/.test(reasons)) {
        recommendations.push(
            "Check that the validation criteria are reasonable and the feedback is actionable"
        )
    }
    if (analysis.totalRejections >= 4) {
        recommendations.push(
            "Consider splitting the component into smaller tasks"
        )
    }
    return recommendations
}
