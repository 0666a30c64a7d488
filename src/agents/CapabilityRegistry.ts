import { ConfigError } from "../core/errors.js"
import { log } from "../core/Logger.js"
import type { AgentProxy, WorkerRole } from "./AgentProxy.js"

/**
 * Maps declared capability sets to agents. Filled before the engine starts
 * and sealed afterwards, so routing never changes at call time.
 */
export class CapabilityRegistry {
    private readonly agents: AgentProxy[] = []
    private readonly load = new Map<string, number>()
    private sealed = false

    public register(agent: AgentProxy): void {
        if (this.sealed) {
            throw new ConfigError(
                `Cannot register ${agent.id}: agents are resolved at startup`
            )
        }
        if (this.load.has(agent.id)) {
            throw new ConfigError(`Agent ${agent.id} is already registered`)
        }
        this.agents.push(agent)
        this.load.set(agent.id, 0)
        log.agent(
            "Registered %s %s [%s]",
            agent.role,
            agent.id,
            agent.capabilities.join(", ")
        )
    }

    public seal(): void {
        this.sealed = true
    }

    public get isSealed(): boolean {
        return this.sealed
    }

    public get(agentId: string): AgentProxy | undefined {
        return this.agents.find((a) => a.id === agentId)
    }

    public list(role?: WorkerRole): AgentProxy[] {
        return this.agents.filter((a) => role === undefined || a.role === role)
    }

    public eligible(
        role: WorkerRole,
        required: readonly string[],
        exclude: readonly string[] = []
    ): AgentProxy[] {
        return this.agents.filter(
            (a) =>
                a.role === role &&
                !exclude.includes(a.id) &&
                required.every((c) => a.capabilities.includes(c))
        )
    }

    /**
     * First idle eligible agent in registration order; when all are busy, the
     * least loaded one (earliest registered wins a tie).
     */
    public select(
        role: WorkerRole,
        required: readonly string[],
        exclude: readonly string[] = []
    ): AgentProxy | undefined {
        let best: AgentProxy | undefined
        let bestLoad = Number.POSITIVE_INFINITY
        for (const agent of this.eligible(role, required, exclude)) {
            const load = this.getLoad(agent.id)
            if (load === 0) return agent
            if (load < bestLoad) {
                best = agent
                bestLoad = load
            }
        }
        return best
    }

    public getLoad(agentId: string): number {
        return this.load.get(agentId) ?? 0
    }

    public acquire(agentId: string): void {
        if (!this.load.has(agentId)) return
        this.load.set(agentId, this.getLoad(agentId) + 1)
    }

    public release(agentId: string): void {
        if (!this.load.has(agentId)) return
        this.load.set(agentId, Math.max(0, this.getLoad(agentId) - 1))
    }
}
