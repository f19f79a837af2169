import { randomUUID } from "node:crypto"
import type { Dirent } from "node:fs"
import * as fs from "node:fs/promises"
import * as path from "node:path"
import type { Clock, Milliseconds } from "../../core/time/clock"
import { lastWriteWins, unique } from "../../core/keys/unique"
import type { BytesKeyValueStore } from "../../ports/bytes-kv-store"
import type { KvKey } from "../../ports/kv-key"
import type { KvSetOptions } from "../../ports/kv-options"
import type { KvResult } from "../../ports/kv-result"
import type { KvEntry } from "../../ports/kv-value"

// Encoded names only contain [A-Za-z0-9_-] and `%XX` escapes, so a raw `+`
// or a `%` followed by non-hex characters cannot collide with a key.
const EXPIRY_SUFFIX = "%ttl"
const TEMP_MARKER = "%tmp-"
const EMPTY_KEY_NAME = "%empty"
const CHUNK_DIR_MARKER = "+"

// Longest encoded run kept in a single name; leaves room for the suffixes
// under the usual 255-byte file name limit.
const MAX_NAME_LENGTH = 200

const EXTRA_ESCAPES = /[.!~*'()]/g
const CHUNK_DIR_PREFIX = /^\+/

export type FsKvStoreOptions = {
  rootDir: string

  /** Permission bits applied to entry files (e.g. `0o600`). */
  fileMode?: number

  /** Permission bits applied to directories the store creates. */
  dirMode?: number
}

export type FsKvStoreDeps = {
  clock: Clock
}

/**
 * One file per key below `rootDir`.
 *
 * @remarks
 * - Every key is accepted. It is percent-encoded into a single file name
 *   (`/`, `.` and the other URI-safe punctuation included) and decoded again
 *   by `keys()`.
 * - An encoded key longer than 200 characters is split into 200-character
 *   runs: all but the last become directories named `+<run>`, the last is the
 *   file name.
 * - An entry file holds exactly the value bytes. Writes land in a temporary
 *   sibling and are renamed over the target, so readers see either the old or
 *   the new value, never a truncated one.
 * - A TTL lives in a sidecar file (`<entry>%ttl`) holding the expiry time in
 *   epoch milliseconds.
 */
export class FileSystemBytesKeyValueStore implements BytesKeyValueStore {
  private readonly rootDir: string

  public constructor(
    private readonly deps: FsKvStoreDeps,
    private readonly opts: FsKvStoreOptions,
  ) {
    this.rootDir = path.resolve(opts.rootDir)
  }

  async get(key: KvKey): Promise<KvResult<Uint8Array>> {
    const filePath = this.resolveFilePath(key)

    if (await this.expireIfDue(filePath)) return { kind: "not_found" }

    try {
      const buffer = await fs.readFile(filePath)
      return { kind: "found", value: new Uint8Array(buffer) }
    } catch (err) {
      if (this.isNotFoundError(err)) return { kind: "not_found" }
      throw err
    }
  }

  async set(key: KvKey, value: Uint8Array, opts?: Partial<KvSetOptions>): Promise<void> {
    const filePath = this.resolveFilePath(key)
    await fs.mkdir(path.dirname(filePath), {
      recursive: true,
      ...(this.opts.dirMode !== undefined && { mode: this.opts.dirMode }),
    })

    if (opts?.ttl) {
      const expiresAtMs = this.deps.clock.nowMs() + opts.ttl.milliseconds
      await this.writeAtomic(this.getExpiryPath(filePath), String(expiresAtMs))
    } else {
      await this.expireIfDue(filePath)
    }

    await this.writeAtomic(filePath, value)
  }

  async delete(key: KvKey): Promise<void> {
    await this.removeEntry(this.resolveFilePath(key))
  }

  async has(key: KvKey): Promise<boolean> {
    const filePath = this.resolveFilePath(key)

    if (await this.expireIfDue(filePath)) return false

    try {
      const stat = await fs.stat(filePath)
      return stat.isFile()
    } catch (err) {
      if (this.isNotFoundError(err)) return false
      throw err
    }
  }

  async getMany(keys: readonly KvKey[]): Promise<Map<KvKey, KvResult<Uint8Array>>> {
    const distinct = unique(keys)
    const results = await Promise.all(distinct.map((key) => this.get(key)))

    return new Map<KvKey, KvResult<Uint8Array>>(
      distinct.map((key, i) => [key, results[i] ?? { kind: "not_found" }]),
    )
  }

  async setMany(
    entries: readonly KvEntry<Uint8Array>[],
    opts?: Partial<KvSetOptions>,
  ): Promise<void> {
    await Promise.all(lastWriteWins(entries).map(([key, value]) => this.set(key, value, opts)))
  }

  async deleteMany(keys: readonly KvKey[]): Promise<void> {
    await Promise.all(unique(keys).map((key) => this.delete(key)))
  }

  async *keys(prefix = ""): AsyncGenerator<KvKey> {
    for await (const filePath of this.walk(this.rootDir)) {
      const key = this.toKey(filePath)

      if (!key.startsWith(prefix)) continue
      if (await this.expireIfDue(filePath)) continue

      yield key
    }
  }

  private async *walk(dir: string): AsyncGenerator<string> {
    let entries: Dirent[]

    try {
      entries = await fs.readdir(dir, { withFileTypes: true })
    } catch (err) {
      if (this.isNotFoundError(err)) return
      throw err
    }

    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name)

      if (entry.isDirectory() && entry.name.startsWith(CHUNK_DIR_MARKER)) {
        yield* this.walk(fullPath)
      } else if (entry.isFile() && !this.isInternalFile(entry.name)) {
        yield fullPath
      }
    }
  }

  private resolveFilePath(key: KvKey): string {
    const encoded = encodeKey(key)
    if (encoded.length === 0) return path.join(this.rootDir, EMPTY_KEY_NAME)

    const runs: string[] = []
    for (let i = 0; i < encoded.length; i += MAX_NAME_LENGTH) {
      runs.push(encoded.slice(i, i + MAX_NAME_LENGTH))
    }

    const fileName = runs.pop() ?? ""
    const dirs = runs.map((run) => `${CHUNK_DIR_MARKER}${run}`)

    return path.join(this.rootDir, ...dirs, fileName)
  }

  private toKey(filePath: string): KvKey {
    const relative = path.relative(this.rootDir, filePath)
    if (relative === EMPTY_KEY_NAME) return ""

    const encoded = relative
      .split(path.sep)
      .map((name) => name.replace(CHUNK_DIR_PREFIX, ""))
      .join("")

    return decodeURIComponent(encoded)
  }

  /**
   * Removes the entry if its TTL has passed. Returns `true` when it did.
   */
  private async expireIfDue(filePath: string): Promise<boolean> {
    const expiresAtMs = await this.readExpiry(filePath)
    if (expiresAtMs === undefined || this.deps.clock.nowMs() < expiresAtMs) return false

    await this.removeEntry(filePath)
    return true
  }

  private async readExpiry(filePath: string): Promise<Milliseconds | undefined> {
    let raw: string

    try {
      raw = await fs.readFile(this.getExpiryPath(filePath), "utf-8")
    } catch (err) {
      if (this.isNotFoundError(err)) return undefined
      throw err
    }

    const expiresAtMs = Number(raw)
    if (!Number.isFinite(expiresAtMs)) {
      throw new Error(`Malformed expiry marker for ${filePath}`)
    }

    return expiresAtMs
  }

  private async writeAtomic(target: string, data: Uint8Array | string): Promise<void> {
    const tempPath = `${target}${TEMP_MARKER}${randomUUID()}`

    try {
      await fs.writeFile(tempPath, data, {
        ...(this.opts.fileMode !== undefined && { mode: this.opts.fileMode }),
      })
      await fs.rename(tempPath, target)
    } catch (err) {
      await this.unlinkSafe(tempPath)
      throw err
    }
  }

  private async removeEntry(filePath: string): Promise<void> {
    await this.unlinkSafe(filePath)
    await this.unlinkSafe(this.getExpiryPath(filePath))
  }

  private getExpiryPath(filePath: string): string {
    return `${filePath}${EXPIRY_SUFFIX}`
  }

  private isInternalFile(name: string): boolean {
    return name.endsWith(EXPIRY_SUFFIX) || name.includes(TEMP_MARKER)
  }

  private async unlinkSafe(filePath: string): Promise<void> {
    try {
      await fs.unlink(filePath)
    } catch (err) {
      if (!this.isNotFoundError(err)) throw err
    }
  }

  private isNotFoundError(err: unknown): boolean {
    return err instanceof Error && "code" in err && err.code === "ENOENT"
  }
}

function encodeKey(key: KvKey): string {
  return encodeURIComponent(key).replace(
    EXTRA_ESCAPES,
    (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`,
  )
}
