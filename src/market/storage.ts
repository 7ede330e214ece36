import { mkdir, readFile, readdir, rename, rm, stat, writeFile } from "node:fs/promises";
import path from "node:path";

import { isEnoent } from "../lib/fsErrors";

import { StoreError, errorMessage } from "./errors";
import type {
  ArtifactKey,
  ArtifactKind,
  ArtifactPayloads,
  LatestPointer,
  PipelineRunRecord
} from "./types";

// Artifacts are stored under:
//   <root>/<SYMBOL>/<KIND>/<VERSION>.json
//   <root>/<SYMBOL>/<KIND>/latest.json      (pointer, replaced atomically)
//   <root>/_runs/<RUN_ID>.json
//
// A version is the compact UTC as-of timestamp (YYYYMMDDTHHmmssZ). A forced
// recompute of an as-of that already has a version gets a `~N` revision suffix.
// Versions are never rewritten.

const LATEST = "latest";
const VERSION_PATTERN = /^\d{8}T\d{6}Z(~\d+)?$/;

function safeSymbol(symbol: string): string {
  return encodeURIComponent(symbol);
}

export function formatVersion(asOf: string): string {
  const ms = Date.parse(asOf);
  if (!Number.isFinite(ms)) {
    throw new StoreError(`Invalid as-of timestamp for version: ${asOf}`);
  }

  return new Date(ms).toISOString().replace(/\.\d{3}Z$/, "Z").replace(/[-:]/g, "");
}

function revisionOf(version: string): number {
  const idx = version.indexOf("~");
  return idx === -1 ? 1 : Number(version.slice(idx + 1));
}

export function compareVersions(a: string, b: string): number {
  const baseA = a.split("~")[0] ?? a;
  const baseB = b.split("~")[0] ?? b;
  if (baseA !== baseB) {
    return baseA < baseB ? -1 : 1;
  }
  return revisionOf(a) - revisionOf(b);
}

async function withFileLock<T>(filePath: string, fn: () => Promise<T>): Promise<T> {
  const lockPath = `${filePath}.lock`;
  const start = Date.now();
  const timeoutMs = 5000;

  for (;;) {
    try {
      await mkdir(lockPath);
      break;
    } catch (error) {
      const code =
        typeof error === "object" && error !== null && "code" in error
          ? (error as { code?: unknown }).code
          : undefined;

      if (code !== "EEXIST") {
        throw error;
      }
      if (Date.now() - start > timeoutMs) {
        console.error(`[market:storage] Lock timeout for ${filePath}; possible stale lock at ${lockPath}`);
        throw new StoreError(`Timed out acquiring lock for ${filePath}`);
      }

      await new Promise((r) => setTimeout(r, 25));
    }
  }

  try {
    return await fn();
  } finally {
    await rm(lockPath, { recursive: true, force: true });
  }
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await stat(filePath);
    return true;
  } catch (error) {
    if (isEnoent(error)) {
      return false;
    }

    throw error;
  }
}

async function writeJsonAtomic(filePath: string, value: unknown): Promise<void> {
  const tmpPath = `${filePath}.tmp`;
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(tmpPath, `${JSON.stringify(value)}\n`, "utf8");
  await rename(tmpPath, filePath);
}

async function readJsonOrNull<T>(filePath: string): Promise<T | null> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (error) {
    if (isEnoent(error)) {
      return null;
    }
    throw new StoreError(`[market:storage] Failed reading ${filePath}: ${errorMessage(error)}`, error);
  }

  try {
    return JSON.parse(raw) as T;
  } catch (error) {
    throw new StoreError(`[market:storage] Corrupt JSON in ${filePath}: ${errorMessage(error)}`, error);
  }
}

function wrapStoreError(action: string, error: unknown): StoreError {
  if (error instanceof StoreError) {
    return error;
  }
  return new StoreError(`[market:storage] ${action} failed: ${errorMessage(error)}`, error);
}

/**
* Key-addressed, versioned artifact store.
*
* `advanceLatest` is the only operation that replaces existing state; everything
* else appends new versions.
*/
export interface ArtifactStore {
  put<K extends ArtifactKind>(key: ArtifactKey<K>, payload: ArtifactPayloads[K]): Promise<void>;
  get<K extends ArtifactKind>(key: ArtifactKey<K>): Promise<ArtifactPayloads[K] | null>;
  advanceLatest(symbol: string, kind: ArtifactKind, version: string): Promise<LatestPointer>;
  getLatestPointer(symbol: string, kind: ArtifactKind): Promise<LatestPointer | null>;
  restoreLatest(symbol: string, kind: ArtifactKind, pointer: LatestPointer | null): Promise<void>;
  listVersions(symbol: string, kind: ArtifactKind): Promise<string[]>;
  nextVersion(symbol: string, kind: ArtifactKind, asOf: string): Promise<string>;
  writeRunRecord(record: PipelineRunRecord): Promise<void>;
  readRunRecord(runId: string): Promise<PipelineRunRecord | null>;
}

export class FileArtifactStore implements ArtifactStore {
  readonly rootDir: string;
  readonly #now: () => Date;

  constructor(rootDir: string, opts: { now?: () => Date } = {}) {
    this.rootDir = rootDir;
    this.#now = opts.now ?? (() => new Date());
  }

  kindDir(symbol: string, kind: ArtifactKind): string {
    return path.join(this.rootDir, safeSymbol(symbol), kind);
  }

  objectPath(symbol: string, kind: ArtifactKind, version: string): string {
    if (version !== LATEST && !VERSION_PATTERN.test(version)) {
      throw new StoreError(`Invalid artifact version: ${version}`);
    }
    return path.join(this.kindDir(symbol, kind), `${version}.json`);
  }

  async put<K extends ArtifactKind>(key: ArtifactKey<K>, payload: ArtifactPayloads[K]): Promise<void> {
    if (key.version === LATEST) {
      throw new StoreError("Cannot put to the latest pointer; use advanceLatest");
    }

    const filePath = this.objectPath(key.symbol, key.kind, key.version);
    try {
      await mkdir(path.dirname(filePath), { recursive: true });
      await withFileLock(filePath, async () => {
        if (await fileExists(filePath)) {
          throw new StoreError(
            `[market:storage] ${key.symbol}/${key.kind}/${key.version} is already committed; versions are immutable`
          );
        }
        await writeJsonAtomic(filePath, payload);
      });
    } catch (error) {
      throw wrapStoreError(`put ${key.symbol}/${key.kind}/${key.version}`, error);
    }
  }

  async get<K extends ArtifactKind>(key: ArtifactKey<K>): Promise<ArtifactPayloads[K] | null> {
    let version = key.version;
    if (version === LATEST) {
      const pointer = await this.getLatestPointer(key.symbol, key.kind);
      if (!pointer) {
        return null;
      }
      version = pointer.version;
    }

    return readJsonOrNull<ArtifactPayloads[K]>(this.objectPath(key.symbol, key.kind, version));
  }

  async getLatestPointer(symbol: string, kind: ArtifactKind): Promise<LatestPointer | null> {
    return readJsonOrNull<LatestPointer>(this.objectPath(symbol, kind, LATEST));
  }

  /**
  * Points `latest` at an already written version. The pointer file is replaced
  * with a rename, so concurrent readers see either the old or the new pointer.
  */
  async advanceLatest(symbol: string, kind: ArtifactKind, version: string): Promise<LatestPointer> {
    const pointerPath = this.objectPath(symbol, kind, LATEST);
    const targetPath = this.objectPath(symbol, kind, version);

    try {
      return await withFileLock(pointerPath, async () => {
        if (!(await fileExists(targetPath))) {
          throw new StoreError(`[market:storage] Cannot advance ${symbol}/${kind} to missing version ${version}`);
        }

        const pointer: LatestPointer = { symbol, kind, version, committedAt: this.#now().toISOString() };
        await writeJsonAtomic(pointerPath, pointer);
        return pointer;
      });
    } catch (error) {
      throw wrapStoreError(`advanceLatest ${symbol}/${kind}`, error);
    }
  }

  async restoreLatest(symbol: string, kind: ArtifactKind, pointer: LatestPointer | null): Promise<void> {
    const pointerPath = this.objectPath(symbol, kind, LATEST);
    try {
      await withFileLock(pointerPath, async () => {
        if (pointer === null) {
          await rm(pointerPath, { force: true });
          return;
        }
        await writeJsonAtomic(pointerPath, pointer);
      });
    } catch (error) {
      throw wrapStoreError(`restoreLatest ${symbol}/${kind}`, error);
    }
  }

  async listVersions(symbol: string, kind: ArtifactKind): Promise<string[]> {
    let entries: string[];
    try {
      entries = await readdir(this.kindDir(symbol, kind));
    } catch (error) {
      if (isEnoent(error)) {
        return [];
      }
      throw wrapStoreError(`listVersions ${symbol}/${kind}`, error);
    }

    return entries
      .filter((e) => e.endsWith(".json"))
      .map((e) => e.replace(/\.json$/, ""))
      .filter((name) => VERSION_PATTERN.test(name))
      .sort(compareVersions);
  }

  async nextVersion(symbol: string, kind: ArtifactKind, asOf: string): Promise<string> {
    const base = formatVersion(asOf);
    const existing = (await this.listVersions(symbol, kind)).filter((v) => v === base || v.startsWith(`${base}~`));
    if (existing.length === 0) {
      return base;
    }

    const maxRevision = Math.max(...existing.map(revisionOf));
    return `${base}~${maxRevision + 1}`;
  }

  runRecordPath(runId: string): string {
    return path.join(this.rootDir, "_runs", `${encodeURIComponent(runId)}.json`);
  }

  async writeRunRecord(record: PipelineRunRecord): Promise<void> {
    try {
      await writeJsonAtomic(this.runRecordPath(record.runId), record);
    } catch (error) {
      throw wrapStoreError(`writeRunRecord ${record.runId}`, error);
    }
  }

  async readRunRecord(runId: string): Promise<PipelineRunRecord | null> {
    return readJsonOrNull<PipelineRunRecord>(this.runRecordPath(runId));
  }
}
