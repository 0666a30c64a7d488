import type { RendererType } from "./core/Config.js"
import { Orchestrator, type OrchestratorOptions } from "./orchestrator/Orchestrator.js"
import { createRenderer } from "./renderer/index.js"
import type { Renderer } from "./renderer/types.js"
import type { Escalation, PipelineProgress, Task, TaskDefinition } from "./types.js"

export interface ConclaveOptions extends OrchestratorOptions {
    /** Overrides `config.renderer`. */
    renderer?: RendererType
}

export interface RunOptions {
    /** Per task. Tasks still open afterwards are reported in `unsettled`. */
    timeoutMs?: number
}

export interface RunResult {
    tasks: Task[]
    escalations: Escalation[]
    progress: PipelineProgress
    allCompleted: boolean
    unsettled: string[]
    duration: number
}

const DEFAULT_RUN_TIMEOUT_MS = 30_000

/** Runs a batch of tasks through a fresh engine until each one settles. */
export class Conclave {
    private readonly engine: Orchestrator
    private readonly renderer: Renderer | null

    constructor(options: ConclaveOptions) {
        this.engine = new Orchestrator(options)
        this.renderer = createRenderer(options.renderer ?? this.engine.config.renderer, {
            verbose: this.engine.config.verbose,
        })
        this.renderer?.attach(this.engine.events)
    }

    public get orchestrator(): Orchestrator {
        return this.engine
    }

    public async run(
        definitions: TaskDefinition[],
        options: RunOptions = {}
    ): Promise<RunResult> {
        const startTime = Date.now()
        const timeoutMs = options.timeoutMs ?? DEFAULT_RUN_TIMEOUT_MS
        await this.engine.start()
        try {
            const submitted: Task[] = []
            for (const definition of definitions) {
                submitted.push(await this.engine.submitTask(definition))
            }
            const outcomes = await Promise.allSettled(
                submitted.map((task) =>
                    this.engine.waitForTask(task.id, ["completed", "failed"], timeoutMs)
                )
            )
            const unsettled = submitted
                .filter((_, i) => outcomes[i]?.status === "rejected")
                .map((task) => task.id)
            const tasks = submitted.map((task) => this.engine.getTask(task.id))
            return {
                tasks,
                escalations: this.engine.registry.listEscalations(),
                progress: this.engine.getProgress(),
                allCompleted: tasks.every((task) => task.state === "completed"),
                unsettled,
                duration: Date.now() - startTime,
            }
        } finally {
            await this.engine.shutdown()
            this.renderer?.detach()
        }
    }
}
