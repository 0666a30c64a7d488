import type { EventBus } from "../events/EventBus.js"
import type { ConclaveEvent } from "../events/types.js"
import { getStateLabel, truncate } from "./stateLabels.js"
import type { Renderer } from "./types.js"

export interface LogRendererOptions {
    verbose?: boolean
    write?: (line: string) => void
    now?: () => number
}

export class LogRenderer implements Renderer {
    private readonly verbose: boolean
    private readonly write: (line: string) => void
    private readonly now: () => number
    private bus: EventBus | null = null
    private handler: ((event: ConclaveEvent) => void) | null = null
    private startedAt = 0

    constructor(options: LogRendererOptions = {}) {
        this.verbose = options.verbose ?? false
        this.write = options.write ?? ((line: string): void => {
            process.stdout.write(`${line}\n`)
        })
        this.now = options.now ?? Date.now
    }

    public attach(bus: EventBus): void {
        this.bus = bus
        this.handler = (event: ConclaveEvent): void => this.handleEvent(event)
        this.bus.on(this.handler)
    }

    public detach(): void {
        if (this.bus && this.handler) {
            this.bus.off(this.handler)
        }
        this.bus = null
        this.handler = null
    }

    private handleEvent(event: ConclaveEvent): void {
        const line = this.formatEvent(event)
        if (line) {
            this.write(`[${this.formatElapsed()}] ${line}`)
        }
    }

    private formatElapsed(): string {
        if (!this.startedAt) this.startedAt = this.now()
        const seconds = (this.now() - this.startedAt) / 1000
        const minutes = Math.floor(seconds / 60)
        const secs = (seconds % 60).toFixed(1)
        return `${String(minutes).padStart(2, "0")}:${secs.padStart(4, "0")}`
    }

    public formatEvent(event: ConclaveEvent): string | null {
        switch (event.type) {
            case "task:created":
                return `task:created    ${pad(event.taskId)}  ${event.componentId}`
            case "task:state_change": {
                const owner = event.owner ? `  owner=${event.owner}` : ""
                const validator = event.validator ? `  validator=${event.validator}` : ""
                return `task:state      ${pad(event.taskId)}  ${getStateLabel(event.from)} → ${getStateLabel(event.to)}  retry=${event.retryCount}${owner}${validator}`
            }
            case "validation:attempt":
                return `validation      ${pad(event.taskId)}  attempt ${event.attemptNumber} ${event.result}${event.feedback ? `  "${truncate(event.feedback, 60)}"` : ""}`
            case "escalation:opened":
                return `escalation:open ${pad(event.taskId)}  ${event.reason}  after ${event.rejectionCount} rejections`
            case "escalation:resolved":
                return `escalation:done ${pad(event.taskId)}  ${event.resolution}${event.note ? `  "${truncate(event.note, 60)}"` : ""}`
            case "agent:error":
                return `agent:error     ${pad(event.taskId)}  ${event.agentId} (${event.phase})  ${truncate(event.message, 60)}`
            case "task:expired":
                return `task:expired    ${pad(event.taskId)}  ${getStateLabel(event.state)}  ${event.kind}`
            case "message:dead_letter":
                return `dead_letter     ${event.messageType} ${event.messageId.slice(0, 8)}  ${event.subscriberId}  ${truncate(event.error, 60)}`
            case "task:stale_message":
                return this.verbose
                    ? `stale           ${pad(event.taskId)}  ${event.messageType}  ${event.reason}`
                    : null
            case "task:progress":
                return this.verbose && event.progress !== undefined
                    ? `progress        ${pad(event.taskId)}  ${event.agentId}  ${Math.round(event.progress * 100)}%`
                    : null
            case "message:published":
                return this.verbose
                    ? `message         ${event.messageType.padEnd(22)}  ${event.senderId} → ${event.recipient}`
                    : null
            case "pipeline:progress":
                return null
            default:
                return null
        }
    }
}

function pad(str: string): string {
    return str.padEnd(16)
}
