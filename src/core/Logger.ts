import createDebug from "debug"

const APP_PREFIX = "conclave"

/**
 * Create a namespaced logger instance.
 * All loggers are prefixed with the APP_PREFIX for easy filtering.
 *
 * @param namespace - The subsystem name (e.g., "bus", "registry")
 * @returns A debug logger function
 */
export function createLogger(namespace: string): createDebug.Debugger {
    return createDebug(`${APP_PREFIX}:${namespace}`)
}

/**
 * Pre-defined loggers for each subsystem.
 *
 * Usage:
 * ```typescript
 * import { log } from "./core/Logger.js"
 * log.bus("Published %s to %s", message.type, message.recipient_role)
 * log.registry("Task %s: %s -> %s", task.id, from, to)
 * ```
 *
 * Enable via env: `DEBUG=conclave:*`
 * Enable specific: `DEBUG=conclave:validation,conclave:escalation`
 */
export const log = {
    bus: createLogger("bus"),
    registry: createLogger("registry"),
    agent: createLogger("agent"),
    validation: createLogger("validation"),
    escalation: createLogger("escalation"),
    engine: createLogger("engine"),
    persistence: createLogger("persistence"),
    cli: createLogger("cli"),
}
