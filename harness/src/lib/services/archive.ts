import { existsSync } from 'node:fs';
import { mkdir, readFile, readdir, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { promisify } from 'node:util';
import { gunzip, gzip } from 'node:zlib';
import type { ArchiveEntry, FixtureArchive, RecordedCall } from '@fixture-harness/shared';
import { AppError, ArchiveFormatError, ArchiveNotFoundError, ValidationError } from '../errors.js';
import { fixtureArchiveSchema, fixtureFileSchema, parseWith } from '../validation.js';
import { isFixtureFileName } from './fixture-directory.js';

const gzipAsync = promisify(gzip);
const gunzipAsync = promisify(gunzip);

export const ARCHIVE_FORMAT = 'fixture-archive';

async function readEntries(dir: string): Promise<ArchiveEntry[]> {
  const dirents = await readdir(dir, { withFileTypes: true });
  const names = dirents
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .sort();

  const entries: ArchiveEntry[] = [];
  for (const name of names) {
    entries.push({ name, content: await readFile(join(dir, name), 'utf8') });
  }
  return entries;
}

// Bundle every file of a recording directory into one gzip archive
export async function packDirectory(
  dir: string,
  archivePath: string,
  sessionId: string
): Promise<FixtureArchive> {
  if (existsSync(archivePath)) {
    throw new ValidationError(`Fixture archive already exists: ${archivePath}`, { archivePath });
  }

  const archive: FixtureArchive = {
    format: ARCHIVE_FORMAT,
    version: 1,
    sessionId,
    createdAt: new Date().toISOString(),
    files: await readEntries(dir),
  };

  await mkdir(dirname(archivePath), { recursive: true });
  await writeFile(archivePath, await gzipAsync(JSON.stringify(archive)));
  return archive;
}

export async function readArchive(archivePath: string): Promise<FixtureArchive> {
  if (!existsSync(archivePath)) {
    throw new ArchiveNotFoundError(archivePath);
  }

  let raw: unknown;
  try {
    const json = await gunzipAsync(await readFile(archivePath));
    raw = JSON.parse(json.toString('utf8'));
  } catch (error) {
    throw new ArchiveFormatError(archivePath, error instanceof Error ? error.message : String(error));
  }

  try {
    return parseWith(fixtureArchiveSchema, raw, 'fixture archive');
  } catch (error) {
    if (error instanceof AppError) {
      throw new ArchiveFormatError(archivePath, error.message);
    }
    throw error;
  }
}

// Write an archive's files to a scratch directory
export async function unpackArchive(archive: FixtureArchive, dir: string): Promise<string[]> {
  await mkdir(dir, { recursive: true });
  for (const entry of archive.files) {
    await writeFile(join(dir, entry.name), entry.content, 'utf8');
  }
  return archive.files.map((entry) => entry.name);
}

// Every recorded call of the bundle, in record order
export function loadRecordedCalls(files: readonly ArchiveEntry[]): RecordedCall[] {
  const calls: RecordedCall[] = [];

  for (const entry of files.filter((file) => isFixtureFileName(file.name))) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(entry.content);
    } catch (error) {
      throw new ArchiveFormatError(entry.name, error instanceof Error ? error.message : String(error));
    }

    const result = fixtureFileSchema.safeParse(parsed);
    if (!result.success) {
      throw new ArchiveFormatError(entry.name, result.error.issues[0]?.message ?? 'invalid fixture file');
    }
    calls.push(...result.data.calls);
  }

  return calls.sort((a, b) => a.callIndex - b.callIndex);
}
