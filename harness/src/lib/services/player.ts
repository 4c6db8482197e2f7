import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { readFile, readdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { ArchiveEntry, JsonObject, RecordedCall, ReplayCursor } from '@fixture-harness/shared';
import { validateOperation } from '../aws.js';
import type { ApiClient, ApiResponse } from '../client.js';
import { ApiCallError, UnexpectedCallError } from '../errors.js';
import { formatJson } from '../json.js';
import { logger } from '../logger.js';
import { parseWith, replayCursorSchema } from '../validation.js';
import { loadRecordedCalls, readArchive } from './archive.js';

export const CURSOR_FILE = '_cursor.json';

// How many recorded calls of each operation have been served
export interface CursorStore {
  consumed(operation: string): number;
  advance(operation: string): void;
  snapshot(): ReplayCursor;
}

export class InMemoryCursorStore implements CursorStore {
  protected readonly counts = new Map<string, number>();

  consumed(operation: string): number {
    return this.counts.get(operation) ?? 0;
  }

  advance(operation: string): void {
    this.counts.set(operation, this.consumed(operation) + 1);
  }

  snapshot(): ReplayCursor {
    return { consumed: Object.fromEntries(this.counts) };
  }

  protected hydrate(cursor: ReplayCursor): void {
    for (const [operation, count] of Object.entries(cursor.consumed)) {
      this.counts.set(operation, count);
    }
  }
}

// Cursor persisted beside the unpacked fixtures. Re-read on every access, so
// clients in one process and processes run one after another share progress.
export class FileCursorStore extends InMemoryCursorStore {
  constructor(private readonly filePath: string) {
    super();
    this.load();
  }

  override consumed(operation: string): number {
    this.load();
    return super.consumed(operation);
  }

  override advance(operation: string): void {
    this.load();
    super.advance(operation);
    this.persist();
  }

  override snapshot(): ReplayCursor {
    this.load();
    return super.snapshot();
  }

  private load(): void {
    this.counts.clear();
    if (!existsSync(this.filePath)) return;
    const raw: unknown = JSON.parse(readFileSync(this.filePath, 'utf8'));
    this.hydrate(parseWith(replayCursorSchema, raw, this.filePath));
  }

  private persist(): void {
    writeFileSync(this.filePath, formatJson(super.snapshot()), 'utf8');
  }
}

/**
 * Archive-backed client.
 *
 * The Nth call to an operation gets the Nth recorded response of that
 * operation, whatever other operations were called in between. Parameters
 * are validated as the live client does, but not compared with the recording.
 */
export class ReplayClient implements ApiClient {
  private readonly queues = new Map<string, RecordedCall[]>();

  constructor(
    calls: readonly RecordedCall[],
    private readonly cursor: CursorStore = new InMemoryCursorStore()
  ) {
    for (const call of [...calls].sort((a, b) => a.callIndex - b.callIndex)) {
      const queue = this.queues.get(call.operationName) ?? [];
      queue.push(call);
      this.queues.set(call.operationName, queue);
    }
  }

  static async fromArchive(archivePath: string): Promise<ReplayClient> {
    const archive = await readArchive(archivePath);
    return new ReplayClient(loadRecordedCalls(archive.files));
  }

  // Attach to fixtures unpacked by the CLI; progress is kept in _cursor.json
  static async fromDirectory(dir: string): Promise<ReplayClient> {
    const dirents = await readdir(dir, { withFileTypes: true });
    const files: ArchiveEntry[] = [];
    for (const entry of dirents.filter((e) => e.isFile() && e.name !== CURSOR_FILE)) {
      files.push({ name: entry.name, content: await readFile(join(dir, entry.name), 'utf8') });
    }
    return new ReplayClient(loadRecordedCalls(files), new FileCursorStore(join(dir, CURSOR_FILE)));
  }

  async invoke(operation: string, params: JsonObject = {}): Promise<ApiResponse> {
    // A call the live client would refuse never reached the recording either
    validateOperation(operation, params);

    const served = this.cursor.consumed(operation);
    const next = this.queues.get(operation)?.[served];
    if (!next) {
      throw new UnexpectedCallError(operation, served);
    }

    this.cursor.advance(operation);
    logger.debug({ operation, callIndex: next.callIndex }, 'Replaying recorded call');

    if (next.error) {
      throw ApiCallError.fromRecorded(operation, next.error);
    }
    return { body: next.responseBody, metadata: next.responseMetadata };
  }

  // Recorded calls never served; reported, not enforced
  unconsumed(): Record<string, number> {
    const result: Record<string, number> = {};
    for (const [operation, queue] of this.queues) {
      const remaining = queue.length - this.cursor.consumed(operation);
      if (remaining > 0) {
        result[operation] = remaining;
      }
    }
    return result;
  }
}
