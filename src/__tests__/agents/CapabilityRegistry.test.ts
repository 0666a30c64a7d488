import { beforeEach, describe, expect, it } from "vitest"

import { CapabilityRegistry } from "../../agents/CapabilityRegistry.js"
import { ConfigError } from "../../core/errors.js"
import { producer, scriptedValidator } from "../helpers/fixtures.js"

describe("CapabilityRegistry", () => {
    let registry: CapabilityRegistry

    beforeEach(() => {
        registry = new CapabilityRegistry()
        registry.register(producer("coder-1", ["code"]))
        registry.register(producer("coder-2", ["code", "sql"]))
        registry.register(scriptedValidator("reviewer-1", [], ["security"]))
    })

    it("should match every required capability", () => {
        expect(registry.eligible("producer", ["code"]).map((a) => a.id)).toEqual([
            "coder-1",
            "coder-2",
        ])
        expect(registry.eligible("producer", ["code", "sql"]).map((a) => a.id)).toEqual([
            "coder-2",
        ])
        expect(registry.eligible("producer", ["design"])).toEqual([])
        expect(registry.eligible("validator", []).map((a) => a.id)).toEqual(["reviewer-1"])
    })

    it("should pick the first idle agent, then the least loaded", () => {
        expect(registry.select("producer", ["code"])?.id).toBe("coder-1")
        registry.acquire("coder-1")
        expect(registry.select("producer", ["code"])?.id).toBe("coder-2")
        registry.acquire("coder-2")
        registry.acquire("coder-2")
        expect(registry.select("producer", ["code"])?.id).toBe("coder-1")
        registry.release("coder-2")
        expect(registry.select("producer", ["code"])?.id).toBe("coder-1")
    })

    it("should honour exclusions", () => {
        expect(registry.select("producer", ["code"], ["coder-1"])?.id).toBe("coder-2")
        expect(registry.select("producer", ["code"], ["coder-1", "coder-2"])).toBeUndefined()
    })

    it("should never let load go negative", () => {
        registry.release("coder-1")
        expect(registry.getLoad("coder-1")).toBe(0)
        registry.acquire("unknown")
        expect(registry.getLoad("unknown")).toBe(0)
    })

    it("should refuse duplicates and registration once sealed", () => {
        expect(() => registry.register(producer("coder-1"))).toThrow(
            "Agent coder-1 is already registered"
        )
        registry.seal()
        expect(registry.isSealed).toBe(true)
        expect(() => registry.register(producer("coder-3"))).toThrow(ConfigError)
    })

    it("should list agents by role", () => {
        expect(registry.list().map((a) => a.id)).toEqual(["coder-1", "coder-2", "reviewer-1"])
        expect(registry.list("validator").map((a) => a.id)).toEqual(["reviewer-1"])
        expect(registry.get("coder-2")?.capabilities).toEqual(["code", "sql"])
    })
})
