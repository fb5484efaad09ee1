import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { decodeSnapshot, encodeSnapshot } from "../codec/rlp";
import { MemoryKvStore } from "../core/store";

/**
 * MemoryKvStore persisted as one RLP snapshot. Every committed change set
 * rewrites the snapshot through a temp file and a rename, and memory is only
 * updated once the file is in place.
 */
export class FileKvStore extends MemoryKvStore {
  constructor(private readonly path: string) {
    super(existsSync(path) ? decodeSnapshot(readFileSync(path)) : []);
  }

  override write(changes: ReadonlyMap<string, Uint8Array>): void {
    const next = new Map(this.data);
    for (const [k, v] of changes) next.set(k, v);
    this.persist(next);
    super.write(changes);
  }

  private persist(entries: Map<string, Uint8Array>): void {
    mkdirSync(dirname(this.path), { recursive: true });
    const tmp = `${this.path}.tmp`;
    writeFileSync(tmp, encodeSnapshot(entries));
    renameSync(tmp, this.path);
  }
}
