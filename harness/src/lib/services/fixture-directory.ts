import { existsSync } from 'node:fs';
import { mkdir, readFile, readdir, writeFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { ulid } from 'ulid';
import type { FixtureFile, RecordedCall, SessionManifest } from '@fixture-harness/shared';
import { StaleRecordingError, ValidationError } from '../errors.js';
import { formatJson } from '../json.js';
import {
  fixtureFileSchema,
  operationNameSchema,
  parseWith,
  sessionManifestSchema,
} from '../validation.js';

export const MANIFEST_FILE = '_session.json';

// ec2:DescribeInstances -> ec2.DescribeInstances.json
export function fixtureFileName(operationName: string): string {
  const name = parseWith(operationNameSchema, operationName, 'operation name');
  return `${name.replace(':', '.')}.json`;
}

export function isFixtureFileName(name: string): boolean {
  return name !== MANIFEST_FILE && name.endsWith('.json');
}

export type NewRecordedCall = Omit<RecordedCall, 'callIndex'>;

// Pending appends per directory; each read-modify-write runs after the previous one settles
const appendQueues = new Map<string, Promise<void>>();

function enqueueAppend<T>(dir: string, task: () => Promise<T>): Promise<T> {
  const key = resolve(dir);
  const next = (appendQueues.get(key) ?? Promise.resolve()).then(task);
  const settled = next.then(
    () => undefined,
    () => undefined
  );
  const tail: Promise<void> = settled.then(() => {
    if (appendQueues.get(key) === tail) appendQueues.delete(key);
  });
  appendQueues.set(key, tail);
  return next;
}

/**
 * Recording directory for one record session.
 *
 * Holds one file per operation plus a manifest with the next call index.
 * Every append re-reads the manifest, so several processes attached to the
 * same directory one after another share a single call sequence. Appends
 * within one process are queued per directory.
 */
export class FixtureDirectory {
  private constructor(
    readonly dir: string,
    readonly sessionId: string
  ) {}

  static async create(dir: string): Promise<FixtureDirectory> {
    if (existsSync(dir)) {
      throw new StaleRecordingError(dir);
    }

    await mkdir(dir, { recursive: true });
    const manifest: SessionManifest = {
      sessionId: ulid(),
      startedAt: new Date().toISOString(),
      nextCallIndex: 1,
    };
    await writeFile(join(dir, MANIFEST_FILE), formatJson(manifest), 'utf8');
    return new FixtureDirectory(dir, manifest.sessionId);
  }

  static async open(dir: string): Promise<FixtureDirectory> {
    const manifest = await readManifest(dir);
    return new FixtureDirectory(dir, manifest.sessionId);
  }

  append(call: NewRecordedCall): Promise<RecordedCall> {
    return enqueueAppend(this.dir, () => this.appendNow(call));
  }

  private async appendNow(call: NewRecordedCall): Promise<RecordedCall> {
    const manifest = await readManifest(this.dir);
    const fileName = fixtureFileName(call.operationName);
    const file = await this.readFixtureFile(fileName, call.operationName);

    const recorded: RecordedCall = { callIndex: manifest.nextCallIndex, ...call };
    file.calls.push(recorded);

    await writeFile(join(this.dir, fileName), formatJson(file), 'utf8');
    await writeFile(
      join(this.dir, MANIFEST_FILE),
      formatJson({ ...manifest, nextCallIndex: manifest.nextCallIndex + 1 }),
      'utf8'
    );
    return recorded;
  }

  async listFiles(): Promise<string[]> {
    const entries = await readdir(this.dir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name)
      .sort();
  }

  private async readFixtureFile(fileName: string, operationName: string): Promise<FixtureFile> {
    const path = join(this.dir, fileName);
    if (!existsSync(path)) {
      return { operationName, calls: [] };
    }
    return parseWith(fixtureFileSchema, JSON.parse(await readFile(path, 'utf8')), path);
  }
}

async function readManifest(dir: string): Promise<SessionManifest> {
  const path = join(dir, MANIFEST_FILE);
  if (!existsSync(path)) {
    throw new ValidationError(`Not a recording directory (no ${MANIFEST_FILE}): ${dir}`, { dir });
  }
  return parseWith(sessionManifestSchema, JSON.parse(await readFile(path, 'utf8')), path);
}
