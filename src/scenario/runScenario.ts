import type { RendererType } from "../core/Config.js"
import { Conclave, type RunResult } from "../Conclave.js"
import type { EventBus } from "../events/EventBus.js"
import type { Scenario } from "./Scenario.js"
import { createScriptedAgents, createScriptedDecider } from "./scriptedAgents.js"

export interface ScenarioRunOptions {
    renderer?: RendererType
    events?: EventBus
}

export async function runScenario(
    scenario: Scenario,
    options: ScenarioRunOptions = {}
): Promise<RunResult> {
    const conclave = new Conclave({
        agents: createScriptedAgents(scenario),
        config: scenario.config,
        decide: createScriptedDecider(scenario),
        events: options.events,
        renderer: options.renderer,
    })
    return conclave.run(scenario.tasks, { timeoutMs: scenario.timeoutMs })
}
