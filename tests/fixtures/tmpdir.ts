import { mkdtemp, rm } from "fs/promises"
import { tmpdir } from "os"
import { join } from "path"

export interface TempDir {
    path: string
    cleanup: () => Promise<void>
}

/**
 * Creates an isolated temporary directory for testing.
 *
 * @example
 * const tmp = await createTempDir()
 * try {
 *   // use tmp.path
 * } finally {
 *   await tmp.cleanup()
 * }
 */
export async function createTempDir(prefix = "context-fit-test-"): Promise<TempDir> {
    const path = await mkdtemp(join(tmpdir(), prefix))

    return {
        path,
        cleanup: () => rm(path, { recursive: true, force: true }),
    }
}
