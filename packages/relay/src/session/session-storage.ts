import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { SessionSchema, type Session } from '@qbo-relay/core';

/**
 * Single-slot persistence for the OAuth session.
 *
 * `load()` resolves to null when nothing has been stored yet. Implementations
 * may throw on a corrupt record; SessionStore decides what to do with it.
 */
export interface ISessionStorage {
  readonly name: string;
  load(): Promise<Session | null>;
  save(session: Session): Promise<void>;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/** JSON file on disk, replaced atomically on every save. */
export class FileSessionStorage implements ISessionStorage {
  readonly name = 'file';

  constructor(readonly path: string) {}

  async load(): Promise<Session | null> {
    let raw: string;
    try {
      raw = await readFile(this.path, 'utf-8');
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
    const parsed: unknown = JSON.parse(raw);
    return SessionSchema.parse(parsed);
  }

  async save(session: Session): Promise<void> {
    const tmpPath = `${this.path}.tmp`;
    await mkdir(dirname(this.path), { recursive: true });

    // Atomic write: write to .tmp then rename
    await writeFile(tmpPath, JSON.stringify(session), 'utf-8');
    await rename(tmpPath, this.path);
  }
}

/** In-process storage; nothing survives a restart. */
export class MemorySessionStorage implements ISessionStorage {
  readonly name = 'memory';
  private record: string | null = null;

  constructor(initial?: Session) {
    if (initial) this.record = JSON.stringify(initial);
  }

  async load(): Promise<Session | null> {
    if (this.record === null) return null;
    return SessionSchema.parse(JSON.parse(this.record));
  }

  async save(session: Session): Promise<void> {
    this.record = JSON.stringify(session);
  }
}
