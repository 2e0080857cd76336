/**
 * MemoryStreamRepository that keeps one snapshot file per identity.
 *
 * Files are replaced whole: written to a temp file, then renamed over the
 * old one. Saves for the same identity run one at a time.
 */

import { mkdir, readFile, rename, unlink, writeFile } from "node:fs/promises"
import { join } from "node:path"

import {
  KeyedSerialQueue,
  type MemoryChanges,
  type MemoryRecord,
  type MemoryStreamRepository,
  MemoryStream,
  parseSnapshot,
  SnapshotFormatError,
  stringifySnapshot,
} from "@mnemos/engine"

export function snapshotFileName(identity: string): string {
  return `${encodeURIComponent(identity)}.json`
}

export class JsonFileMemoryRepository implements MemoryStreamRepository {
  private readonly queue = new KeyedSerialQueue()

  constructor(private readonly dir: string) {}

  pathFor(identity: string): string {
    return join(this.dir, snapshotFileName(identity))
  }

  async load(identity: string): Promise<MemoryRecord[]> {
    return this.queue.run(identity, async () => [...(await this.read(identity))])
  }

  async save(identity: string, changes: MemoryChanges): Promise<void> {
    if (changes.inserted.length === 0 && changes.touched.length === 0) return

    await this.queue.run(identity, async () => {
      const merged = mergeChanges(await this.read(identity), changes)
      await this.write(identity, MemoryStream.restore(identity, merged))
    })
  }

  private async read(identity: string): Promise<readonly MemoryRecord[]> {
    let json: string
    try {
      json = await readFile(this.pathFor(identity), "utf-8")
    } catch (err) {
      if (isNotFound(err)) return []
      throw err
    }

    const stream = parseSnapshot(json)
    if (stream.identity !== identity) {
      throw new SnapshotFormatError(
        `Snapshot ${snapshotFileName(identity)} belongs to "${stream.identity}", not "${identity}"`,
      )
    }
    return stream.all()
  }

  private async write(identity: string, stream: MemoryStream): Promise<void> {
    const path = this.pathFor(identity)
    const tempPath = `${path}.tmp`
    await mkdir(this.dir, { recursive: true })

    try {
      await writeFile(tempPath, stringifySnapshot(stream), "utf-8")
      await rename(tempPath, path)
    } catch (err) {
      await unlink(tempPath).catch(() => undefined)
      throw err
    }
  }
}

/**
 * Apply a change batch to stored records. Inserts already present are
 * replaced by the incoming version; access times never move backwards.
 */
export function mergeChanges(
  stored: readonly MemoryRecord[],
  changes: MemoryChanges,
): MemoryRecord[] {
  const byId = new Map<number, MemoryRecord>(stored.map((r) => [r.id, r]))
  for (const record of changes.inserted) {
    const existing = byId.get(record.id)
    byId.set(
      record.id,
      existing && existing.lastAccessedAt > record.lastAccessedAt
        ? { ...record, lastAccessedAt: existing.lastAccessedAt }
        : record,
    )
  }
  for (const update of changes.touched) {
    const existing = byId.get(update.id)
    if (existing && update.lastAccessedAt > existing.lastAccessedAt) {
      byId.set(update.id, { ...existing, lastAccessedAt: update.lastAccessedAt })
    }
  }
  return [...byId.values()].sort((a, b) => a.id - b.id)
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}
