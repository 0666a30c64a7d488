import chalk from "chalk"
import logUpdate from "log-update"

import type { EventBus } from "../events/EventBus.js"
import type { ConclaveEvent } from "../events/types.js"
import { isTerminal } from "../registry/stateMachine.js"
import type { TaskState } from "../types.js"
import { STATE_GLYPHS, formatDuration, getStateLabel, truncate } from "./stateLabels.js"
import type { Renderer, TaskRow } from "./types.js"

/** Live task table, redrawn in place. */
export class TerminalRenderer implements Renderer {
    private readonly verbose: boolean
    private readonly title: string
    private bus: EventBus | null = null
    private handler: ((event: ConclaveEvent) => void) | null = null
    private readonly rows = new Map<string, TaskRow>()
    private readonly startedAt = Date.now()
    private deadLetters = 0
    private tickInterval: ReturnType<typeof setInterval> | null = null

    constructor(options?: { verbose?: boolean; title?: string }) {
        this.verbose = options?.verbose ?? false
        this.title = options?.title ?? "conclave"
    }

    public attach(bus: EventBus): void {
        this.bus = bus
        this.handler = (event: ConclaveEvent): void => this.handleEvent(event)
        this.bus.on(this.handler)
        this.startTick()
    }

    public detach(): void {
        if (this.bus && this.handler) {
            this.bus.off(this.handler)
        }
        this.stopTick()
        this.render()
        logUpdate.done()
        this.bus = null
        this.handler = null
    }

    private startTick(): void {
        if (this.tickInterval) return
        this.tickInterval = setInterval(() => this.render(), 1000)
        this.tickInterval.unref()
    }

    private stopTick(): void {
        if (this.tickInterval) {
            clearInterval(this.tickInterval)
            this.tickInterval = null
        }
    }

    private handleEvent(event: ConclaveEvent): void {
        switch (event.type) {
            case "task:created":
                this.rows.set(event.taskId, {
                    taskId: event.taskId,
                    componentId: event.componentId,
                    state: "pending",
                    retryCount: 0,
                    owner: null,
                    validator: null,
                    startedAt: Date.now(),
                })
                break
            case "task:state_change": {
                const row = this.rows.get(event.taskId)
                if (!row) return
                row.state = event.to
                row.retryCount = event.retryCount
                row.owner = event.owner
                row.validator = event.validator
                if (isTerminal(event.to)) row.completedAt = Date.now()
                break
            }
            case "validation:attempt": {
                const row = this.rows.get(event.taskId)
                if (row && event.result === "fail") row.lastFeedback = event.feedback
                break
            }
            case "escalation:opened": {
                const row = this.rows.get(event.taskId)
                if (row) row.escalation = event.reason
                break
            }
            case "escalation:resolved": {
                const row = this.rows.get(event.taskId)
                if (row) row.escalation = `resolved: ${event.resolution}`
                break
            }
            case "agent:error": {
                const row = this.rows.get(event.taskId)
                if (row) row.failure = event.message
                break
            }
            case "message:dead_letter":
                this.deadLetters++
                break
            default:
                return
        }
        this.render()
    }

    private render(): void {
        const lines: string[] = [
            `${chalk.bold.cyan(this.title)}  ${chalk.dim(formatDuration(Date.now() - this.startedAt))}`,
            chalk.dim("│"),
        ]
        const rows = [...this.rows.values()]
        rows.forEach((row, i) => {
            const isLast = i === rows.length - 1
            this.renderRow(row, lines, isLast ? "└" : "├", isLast ? " " : "│")
        })

        const done = rows.filter((r) => r.state === "completed").length
        const failed = rows.filter((r) => r.state === "failed").length
        const escalated = rows.filter((r) => r.state === "escalated").length
        lines.push(chalk.dim("│"))
        const summary = [
            `${done}/${rows.length} completed`,
            failed ? chalk.red(`${failed} failed`) : "",
            escalated ? chalk.yellow(`${escalated} escalated`) : "",
            this.deadLetters ? chalk.red(`${this.deadLetters} dead letters`) : "",
        ]
            .filter(Boolean)
            .join("  ·  ")
        lines.push(chalk.dim("╰─ ") + summary)
        logUpdate(lines.join("\n"))
    }

    private renderRow(
        row: TaskRow,
        lines: string[],
        connector: string,
        childPrefix: string
    ): void {
        const elapsed = formatDuration((row.completedAt ?? Date.now()) - row.startedAt)
        const retries = row.retryCount > 0 ? chalk.yellow(`retry ${row.retryCount}`) : ""
        lines.push(
            [
                chalk.dim(`${connector}─`),
                STATE_GLYPHS[row.state],
                row.componentId,
                chalk.dim(stateTag(row.state)),
                chalk.dim(elapsed),
                retries,
            ]
                .filter(Boolean)
                .join("  ")
        )

        const details: string[] = []
        if (row.owner) details.push(`owner: ${row.owner}`)
        if (row.validator) details.push(`validator: ${row.validator}`)
        if (row.escalation) details.push(`escalation: ${row.escalation}`)
        if (row.lastFeedback && (this.verbose || row.state !== "completed")) {
            details.push(`feedback: ${truncate(row.lastFeedback, 70)}`)
        }
        if (row.failure && row.state === "failed") {
            details.push(`error: ${truncate(row.failure, 70)}`)
        }
        details.forEach((detail, i) => {
            const branch = i === details.length - 1 ? "└─" : "├─"
            lines.push(chalk.dim(`${childPrefix}  ${branch} ${detail}`))
        })
    }
}

function stateTag(state: TaskState): string {
    return `[${getStateLabel(state)}]`
}
