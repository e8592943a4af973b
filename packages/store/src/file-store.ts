/**
 * @cardflow/store: File-backed LedgerStore.
 *
 * Keeps the whole state in memory and rewrites one JSON file after every
 * committed mutation:
 *
 *   { "savedAt": "...", "stateHash": "<sha256>", "state": { ... } }
 *
 * The hash covers the canonical JSON of `state`, so a file edited by hand
 * or truncated mid-write is refused on load with CORRUPT_STATE.
 * Writes go to a sibling temp file first and are renamed into place.
 *
 * Several processes may open the same file (the server and the CLI).
 * A commit is refused with STALE_STATE when the file no longer holds what
 * this store last read or wrote; the store then reloads the file, so a
 * retry works on the other writer's state.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import type { StoreState } from "./types.js";
import { StoreError } from "./types.js";
import { InMemoryLedgerStore } from "./in-memory-store.js";
import { computeStateHash, decodeState, emptyState } from "./state.js";

export interface FileLedgerStoreOptions {
  /** Path of the JSON state file. Created on first commit. */
  readonly path: string;
  readonly now?: (() => Date) | undefined;
}

/**
 * Read and verify a state file. A missing file is an empty state.
 */
export function readStateFile(path: string): StoreState {
  if (!existsSync(path)) {
    return emptyState();
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new StoreError(
      "CORRUPT_STATE",
      `State file ${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  if (parsed === null || typeof parsed !== "object" || !("state" in parsed) || !("stateHash" in parsed)) {
    throw new StoreError("CORRUPT_STATE", `State file ${path} has no state`);
  }

  const state = decodeState(parsed.state);
  if (parsed.stateHash !== computeStateHash(state)) {
    throw new StoreError("CORRUPT_STATE", `State file ${path} failed its integrity check`);
  }
  return state;
}

/**
 * File-backed ledger store.
 */
export class FileLedgerStore extends InMemoryLedgerStore {
  private readonly _path: string;
  /** Hash of the state this store last read from or wrote to the file */
  private _diskHash: string;

  constructor(options: FileLedgerStoreOptions) {
    const initialState = readStateFile(options.path);
    super({ initialState, now: options.now });
    this._path = options.path;
    this._diskHash = computeStateHash(initialState);
  }

  /** Path of the backing file */
  get path(): string {
    return this._path;
  }

  override transaction<T>(fn: () => T): T {
    try {
      return super.transaction(fn);
    } catch (err) {
      if (err instanceof StoreError && err.code === "STALE_STATE") {
        this.reload();
      }
      throw err;
    }
  }

  /**
   * Replace the in-memory state with the file's.
   */
  reload(): void {
    const state = readStateFile(this._path);
    this.restore(state);
    this._diskHash = computeStateHash(state);
  }

  /**
   * True when the file on disk holds exactly the in-memory state.
   */
  override verify(): boolean {
    try {
      return computeStateHash(readStateFile(this._path)) === this.stateHash();
    } catch (err) {
      if (err instanceof StoreError) {
        return false;
      }
      throw err;
    }
  }

  protected override commit(): void {
    if (computeStateHash(readStateFile(this._path)) !== this._diskHash) {
      throw new StoreError(
        "STALE_STATE",
        `State file ${this._path} was changed by another writer; retry the change`,
      );
    }

    const state = this.snapshot();
    const stateHash = computeStateHash(state);
    const body = JSON.stringify(
      {
        savedAt: this.now().toISOString(),
        stateHash,
        state,
      },
      null,
      2,
    );

    mkdirSync(dirname(this._path), { recursive: true });
    const temp = `${this._path}.tmp`;
    writeFileSync(temp, body, "utf-8");
    renameSync(temp, this._path);
    this._diskHash = stateHash;
  }
}
