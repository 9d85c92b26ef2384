import { readFile, writeFile, mkdir, rename } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import type { Unit } from '../types/unit.types.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import { errorMessage } from '../errors/base.js';

export const SNAPSHOT_VERSION = 1;

const snapshotSchema = z.object({
  version: z.number(),
  embedder: z.string(),
  dimensions: z.number().int().nonnegative(),
  savedAt: z.string(),
  units: z.array(
    z.object({
      id: z.string(),
      text: z.string(),
      metadata: z.record(z.string()),
      vector: z.string().optional(),
    }),
  ),
});

export interface Snapshot {
  embedder: string;
  dimensions: number;
  units: Unit[];
}

/** Float32 values as base64 of their little-endian bytes. */
export function encodeVector(vector: Float32Array): string {
  const buf = Buffer.alloc(vector.length * 4);
  vector.forEach((v, i) => buf.writeFloatLE(v, i * 4));
  return buf.toString('base64');
}

export function decodeVector(encoded: string): Float32Array {
  const buf = Buffer.from(encoded, 'base64');
  const vector = new Float32Array(Math.floor(buf.length / 4));
  for (let i = 0; i < vector.length; i++) {
    vector[i] = buf.readFloatLE(i * 4);
  }
  return vector;
}

/**
 * Persists indexed units (text, metadata, vectors) as one JSON file.
 * A snapshot that is missing, unreadable, or built under another embedder
 * signature or dimension loads as null and the caller rebuilds from the corpus.
 */
export class IndexSnapshotStore {
  constructor(
    readonly path: string,
    private readonly logger: Logger = silentLogger,
  ) {}

  async save(snapshot: Snapshot): Promise<void> {
    const payload = {
      version: SNAPSHOT_VERSION,
      embedder: snapshot.embedder,
      dimensions: snapshot.dimensions,
      savedAt: new Date().toISOString(),
      units: snapshot.units.map((unit) => ({
        id: unit.id,
        text: unit.text,
        metadata: { ...unit.metadata },
        ...(unit.vector !== undefined && { vector: encodeVector(unit.vector) }),
      })),
    };
    await mkdir(dirname(this.path), { recursive: true });
    // Written beside the target, then renamed into place
    const tmp = `${this.path}.tmp`;
    await writeFile(tmp, JSON.stringify(payload), 'utf8');
    await rename(tmp, this.path);
    this.logger.debug(`saved ${payload.units.length} units to ${this.path}`);
  }

  async load(expected: { embedder: string; dimensions: number }): Promise<Snapshot | null> {
    let raw: string;
    try {
      raw = await readFile(this.path, 'utf8');
    } catch (err) {
      this.logger.debug(`no snapshot at ${this.path}: ${errorMessage(err)}`);
      return null;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      this.logger.warn(`ignoring corrupt snapshot ${this.path}: ${errorMessage(err)}`);
      return null;
    }

    const parsed = snapshotSchema.safeParse(json);
    if (!parsed.success) {
      this.logger.warn(`ignoring malformed snapshot ${this.path}`);
      return null;
    }
    const data = parsed.data;
    if (
      data.version !== SNAPSHOT_VERSION ||
      data.embedder !== expected.embedder ||
      (data.dimensions !== 0 && data.dimensions !== expected.dimensions)
    ) {
      this.logger.info(`snapshot ${this.path} was built with ${data.embedder}; rebuilding`);
      return null;
    }

    return {
      embedder: data.embedder,
      dimensions: data.dimensions,
      units: data.units.map((u) => ({
        id: u.id,
        text: u.text,
        metadata: u.metadata,
        ...(u.vector !== undefined && { vector: decodeVector(u.vector) }),
      })),
    };
  }
}
