import { randomUUID } from "node:crypto"
import { mkdir, readFile, readdir, rename, writeFile } from "node:fs/promises"
import { dirname, join } from "node:path"

import { log } from "../core/Logger.js"

/** JSON documents on disk, one file per key. Writes are atomic via rename. */
export class FileStore {
    private readonly basePath: string

    constructor(basePath: string) {
        this.basePath = basePath
    }

    public async write(key: string, data: unknown): Promise<void> {
        const filePath = this.keyToPath(key)
        const tempPath = `${filePath}.tmp.${randomUUID()}`
        const content = JSON.stringify(data, null, 2)

        await mkdir(dirname(filePath), { recursive: true })

        try {
            await writeFile(tempPath, content, "utf-8")
            await rename(tempPath, filePath)
        } catch (error) {
            log.persistence(
                "Failed to write %s: %s",
                key,
                error instanceof Error ? error.message : String(error)
            )
            throw error
        }
    }

    public async read<T>(key: string): Promise<T | null> {
        const filePath = this.keyToPath(key)
        try {
            const content = await readFile(filePath, "utf-8")
            return JSON.parse(content) as T
        } catch (error) {
            if ((error as NodeJS.ErrnoException).code === "ENOENT") {
                return null
            }
            log.persistence(
                "Failed to read %s: %s",
                key,
                error instanceof Error ? error.message : String(error)
            )
            throw error
        }
    }

    /** Keys stored directly under `prefix` (e.g. `"tasks"` -> `["tasks/a", ...]`). */
    public async list(prefix: string): Promise<string[]> {
        try {
            const entries = await readdir(join(this.basePath, prefix), {
                withFileTypes: true,
            })
            return entries
                .filter((e) => e.isFile() && e.name.endsWith(".json"))
                .map((e) => `${prefix}/${e.name.slice(0, -".json".length)}`)
                .sort()
        } catch (error) {
            if ((error as NodeJS.ErrnoException).code === "ENOENT") return []
            throw error
        }
    }

    private keyToPath(key: string): string {
        return join(this.basePath, `${key}.json`)
    }
}
