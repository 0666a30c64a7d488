#!/usr/bin/env node

import { resolve } from "node:path"

import chalk from "chalk"
import { Command } from "commander"

import { loadRcConfig, resolveConfig, type RendererType } from "./core/Config.js"
import { ConfigError } from "./core/errors.js"
import { log } from "./core/Logger.js"
import { loadScenario } from "./scenario/Scenario.js"
import { runScenario } from "./scenario/runScenario.js"
import type { Task } from "./types.js"

const RENDERERS: readonly RendererType[] = ["terminal", "log", "none"]

function parseRenderer(value: string): RendererType {
    const match = RENDERERS.find((r) => r === value)
    if (!match) {
        throw new ConfigError(`Unknown renderer "${value}" (expected ${RENDERERS.join(", ")})`)
    }
    return match
}

function formatTask(task: Task): string {
    const state =
        task.state === "completed"
            ? chalk.green(task.state)
            : task.state === "failed"
              ? chalk.red(task.state)
              : chalk.yellow(task.state)
    const reason = task.failure
        ? `  ${task.failure.kind}: ${task.failure.message}`
        : ""
    return `${task.id.padEnd(16)} ${task.componentId.padEnd(20)} ${state.padEnd(20)} attempts=${task.attemptHistory.length} episode=${task.episode}${reason}`
}

const program = new Command()

program
    .name("conclave")
    .description("Multi-agent task orchestration with validation loops and human escalation")
    .version("0.1.0")

program
    .command("simulate")
    .description("Run a scripted scenario through the full engine")
    .argument("<scenario>", "Path to a scenario JSON file")
    .option("--renderer <type>", "Output renderer (terminal, log, none)", parseRenderer)
    .option("--cwd <path>", "Directory holding .conclaverc.json (defaults to current directory)")
    .option("--verbose", "Also log stale messages, progress and every published message")
    .option("--max-retries <n>", "Validation attempts before escalation", (v) => parseInt(v, 10))
    .option("--json", "Print the final tasks as JSON")
    .action(
        async (
            scenarioPath: string,
            options: {
                renderer?: RendererType
                cwd?: string
                verbose?: boolean
                maxRetries?: number
                json?: boolean
            }
        ) => {
            const projectRoot = options.cwd ? resolve(options.cwd) : process.cwd()
            const rcConfig = await loadRcConfig(projectRoot)
            const scenario = await loadScenario(resolve(scenarioPath))

            // Precedence: flags, then the scenario, then .conclaverc.json.
            const merged: Record<string, unknown> = { ...rcConfig, ...scenario.config }
            if (options.maxRetries !== undefined) merged.maxRetries = options.maxRetries
            if (options.verbose !== undefined) merged.verbose = options.verbose
            const config = resolveConfig(merged)
            const renderer = options.renderer ?? (config.renderer === "none" ? "log" : config.renderer)
            log.cli("Running %s with %d tasks (renderer %s)", scenario.name, scenario.tasks.length, renderer)

            const result = await runScenario(
                { ...scenario, config },
                { renderer: options.json ? "none" : renderer }
            )

            if (options.json) {
                console.log(JSON.stringify(result, null, 2))
            } else {
                console.log(`\n${chalk.bold(scenario.name)}  ${(result.duration / 1000).toFixed(1)}s`)
                for (const task of result.tasks) {
                    console.log(formatTask(task))
                }
                for (const taskId of result.unsettled) {
                    console.error(`Still open after ${scenario.timeoutMs}ms: ${taskId}`)
                }
            }
            process.exit(result.allCompleted ? 0 : 1)
        }
    )

program
    .command("check-config")
    .description("Validate .conclaverc.json and print the resolved configuration")
    .option("--cwd <path>", "Directory holding .conclaverc.json (defaults to current directory)")
    .action(async (options: { cwd?: string }) => {
        const projectRoot = options.cwd ? resolve(options.cwd) : process.cwd()
        const config = resolveConfig(await loadRcConfig(projectRoot))
        console.log(JSON.stringify(config, null, 2))
    })

program.parseAsync().catch((error: unknown) => {
    console.error(
        "Fatal error:",
        error instanceof Error ? error.message : String(error)
    )
    process.exit(1)
})
