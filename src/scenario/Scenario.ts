import { readFile } from "node:fs/promises"

import { z } from "zod"

import { ConclaveConfigSchema } from "../core/Config.js"
import { ConfigError } from "../core/errors.js"

/** `pass`, or `fail:<feedback>`. */
export const VerdictSchema = z
    .string()
    .regex(/^(pass|fail(:.*)?)$/, 'expected "pass" or "fail:<feedback>"')

const ResolutionSchema = z.enum(["retry_reset", "abort", "force_accept"])

export const DecisionSchema = z.object({
    resolution: ResolutionSchema,
    note: z.string().optional(),
})

const ProducerSpecSchema = z.object({
    id: z.string().min(1),
    role: z.literal("producer"),
    capabilities: z.array(z.string()).default([]),
    /** Calls per task that report an error before the producer starts delivering. */
    failures: z.number().int().min(0).default(0),
})

const ValidatorSpecSchema = z.object({
    id: z.string().min(1),
    role: z.literal("validator"),
    capabilities: z.array(z.string()).default([]),
    /** Verdicts per task id, consumed in order. */
    verdicts: z.record(z.string(), z.array(VerdictSchema)).default({}),
    defaultVerdict: VerdictSchema.default("pass"),
})

export const ScenarioSchema = z.object({
    name: z.string().default("scenario"),
    config: ConclaveConfigSchema.partial().default({}),
    agents: z
        .array(z.discriminatedUnion("role", [ProducerSpecSchema, ValidatorSpecSchema]))
        .min(1),
    tasks: z
        .array(
            z.object({
                id: z.string().min(1),
                componentId: z.string().min(1),
                taskClass: z.string().optional(),
                requiredCapabilities: z.array(z.string()).default([]),
                validatorCapabilities: z.array(z.string()).optional(),
                input: z.record(z.string(), z.unknown()).optional(),
                criteria: z.array(z.string()).optional(),
                maxRetries: z.number().int().min(1).optional(),
            })
        )
        .min(1),
    /** Human decisions per task id, consumed in order. */
    decisions: z.record(z.string(), z.array(DecisionSchema)).default({}),
    /** Used once a task's own decisions run out. Without it escalations stay open. */
    defaultDecision: DecisionSchema.optional(),
    timeoutMs: z.number().int().positive().default(30_000),
})

export type Scenario = z.infer<typeof ScenarioSchema>
export type ScenarioInput = z.input<typeof ScenarioSchema>
export type ProducerSpec = z.infer<typeof ProducerSpecSchema>
export type ValidatorSpec = z.infer<typeof ValidatorSpecSchema>

export function parseScenario(raw: unknown, source = "scenario"): Scenario {
    const parsed = ScenarioSchema.safeParse(raw)
    if (!parsed.success) {
        const details = parsed.error.issues
            .map((issue) => `${issue.path.join(".") || "scenario"}: ${issue.message}`)
            .join("; ")
        throw new ConfigError(`Invalid ${source}: ${details}`)
    }
    return parsed.data
}

export async function loadScenario(path: string): Promise<Scenario> {
    const content = await readFile(path, "utf-8")
    let raw: unknown
    try {
        raw = JSON.parse(content)
    } catch (parseError) {
        throw new ConfigError(
            `Invalid JSON in ${path}: ${parseError instanceof Error ? parseError.message : String(parseError)}`
        )
    }
    return parseScenario(raw, path)
}
