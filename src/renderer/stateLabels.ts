import chalk from "chalk"

import type { TaskState } from "../types.js"

export const STATE_LABELS: Record<TaskState, string> = {
    pending: "pending",
    assigned: "assigned",
    in_progress: "in progress",
    validating: "validating",
    escalated: "escalated",
    completed: "completed",
    failed: "failed",
}

export const STATE_GLYPHS: Record<TaskState, string> = {
    pending: chalk.dim("·"),
    assigned: chalk.dim("○"),
    in_progress: chalk.blue("⟳"),
    validating: chalk.cyan("◎"),
    escalated: chalk.yellow("!"),
    completed: chalk.green("✓"),
    failed: chalk.red("✗"),
}

export function getStateLabel(state: TaskState): string {
    return STATE_LABELS[state]
}

export function truncate(str: string, maxLen: number): string {
    if (str.length <= maxLen) return str
    return str.slice(0, maxLen - 1) + "…"
}

export function formatDuration(ms: number): string {
    const seconds = ms / 1000
    if (seconds < 60) return `${seconds.toFixed(1)}s`
    const minutes = Math.floor(seconds / 60)
    const remainingSeconds = Math.round(seconds % 60)
    return `${minutes}m${String(remainingSeconds).padStart(2, "0")}s`
}
