import { readFile } from "node:fs/promises"
import { join } from "node:path"

import { z } from "zod"

import { ConfigError } from "./errors.js"

export const DEFAULT_TASK_CLASS = "default"
export const DEFAULT_MAX_RETRIES = 3
export const RC_FILE_NAME = ".conclaverc.json"

export const TaskClassTimeoutsSchema = z.object({
    /** ASSIGNED / IN_PROGRESS without any state update. */
    livenessTimeoutMs: z.number().int().positive(),
    /** VALIDATING without a validator response. */
    validationTimeoutMs: z.number().int().positive(),
})

export const ConclaveConfigSchema = z.object({
    maxRetries: z.number().int().min(1).default(DEFAULT_MAX_RETRIES),
    maxDeliveryAttempts: z.number().int().min(1).default(3),
    maxReassignments: z.number().int().min(0).max(1).default(1),
    approvalTimeoutMs: z.number().int().positive().optional(),
    taskClasses: z
        .record(z.string(), TaskClassTimeoutsSchema)
        .default({})
        .transform((classes): Record<string, TaskClassTimeouts> => ({
            [DEFAULT_TASK_CLASS]: {
                livenessTimeoutMs: 10 * 60_000,
                validationTimeoutMs: 5 * 60_000,
            },
            ...classes,
        })),
    persistencePath: z.string().optional(),
    renderer: z.enum(["terminal", "log", "none"]).default("none"),
    verbose: z.boolean().default(false),
})

export type TaskClassTimeouts = z.infer<typeof TaskClassTimeoutsSchema>
export type ConclaveConfig = z.infer<typeof ConclaveConfigSchema>
export type ConclaveConfigInput = z.input<typeof ConclaveConfigSchema>
export type RendererType = ConclaveConfig["renderer"]

export function resolveConfig(
    input: ConclaveConfigInput | Record<string, unknown> = {}
): ConclaveConfig {
    const parsed = ConclaveConfigSchema.safeParse(input)
    if (!parsed.success) {
        const details = parsed.error.issues
            .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
            .join("; ")
        throw new ConfigError(`Invalid configuration: ${details}`)
    }
    return parsed.data
}

export function getTaskClassTimeouts(
    config: ConclaveConfig,
    taskClass: string
): TaskClassTimeouts {
    return (
        config.taskClasses[taskClass] ?? config.taskClasses[DEFAULT_TASK_CLASS]
    )
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value)
}

export async function loadRcConfig(
    cwd: string
): Promise<Record<string, unknown>> {
    const rcPath = join(cwd, RC_FILE_NAME)
    let content: string
    try {
        content = await readFile(rcPath, "utf-8")
    } catch (error) {
        if ((error as NodeJS.ErrnoException).code === "ENOENT") return {}
        throw error
    }
    let raw: unknown
    try {
        raw = JSON.parse(content)
    } catch (parseError) {
        throw new ConfigError(
            `Invalid JSON in ${rcPath}: ${parseError instanceof Error ? parseError.message : String(parseError)}`
        )
    }
    if (!isRecord(raw)) {
        throw new ConfigError(`${rcPath} must contain a JSON object`)
    }
    return raw
}
