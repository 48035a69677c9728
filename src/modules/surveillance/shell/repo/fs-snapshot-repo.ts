import fs from 'node:fs/promises';
import path from 'node:path';

import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';
import { parse as parseYaml } from 'yaml';

import { formatSchemaErrors, type SnapshotRepoError } from '../../core/errors.js';
import { SnapshotFileSchema, type CaseSnapshot, type SnapshotFileDTO } from '../../core/types.js';
import { normalizeCaseRows } from '../../core/usecases/normalize-case-rows.js';

import type { CaseSnapshotRepo } from '../../core/ports.js';
import type { Logger } from 'pino';

const validator = TypeCompiler.Compile(SnapshotFileSchema);

export interface SnapshotRepoOptions {
  /** YAML or JSON snapshot file */
  filePath: string;
  /** How long a loaded snapshot is served from memory (default 1 hour) */
  cacheTtlMs?: number;
  logger?: Logger;
}

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const isMissingFileError = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';

const readSnapshotFile = async (
  filePath: string
): Promise<Result<SnapshotFileDTO, SnapshotRepoError>> => {
  let contents: string;

  try {
    contents = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (isMissingFileError(error)) {
      return err({
        type: 'SnapshotNotFound',
        message: `Case snapshot not found at ${filePath}`,
        path: filePath,
      });
    }

    return err({
      type: 'SnapshotReadError',
      message: `Failed to read case snapshot at ${filePath}: ${describeError(error)}`,
      path: filePath,
    });
  }

  let parsed: unknown;
  try {
    // JSON is a subset of YAML, so one parser covers both formats
    parsed = parseYaml(contents);
  } catch (error) {
    return err({
      type: 'SnapshotParseError',
      message: `Failed to parse case snapshot at ${filePath}: ${describeError(error)}`,
      path: filePath,
    });
  }

  if (!validator.Check(parsed)) {
    const details = formatSchemaErrors(validator.Errors(parsed));
    return err({
      type: 'SnapshotSchemaError',
      message: `Schema validation failed for ${filePath}`,
      path: filePath,
      details,
    });
  }

  return ok(parsed);
};

export const createSnapshotRepo = (options: SnapshotRepoOptions): CaseSnapshotRepo => {
  const filePath = path.resolve(options.filePath);
  const ttlMs = options.cacheTtlMs ?? 60 * 60 * 1000;
  const log = options.logger?.child({ repo: 'snapshot', filePath });

  let cached: { snapshot: CaseSnapshot; expiresAt: number } | null = null;
  let pending: Promise<Result<CaseSnapshot, SnapshotRepoError>> | null = null;

  const loadFromDisk = async (): Promise<Result<CaseSnapshot, SnapshotRepoError>> => {
    const readResult = await readSnapshotFile(filePath);
    if (readResult.isErr()) {
      return err(readResult.error);
    }

    const dto = readResult.value;
    const { cases, rejected } = normalizeCaseRows(dto.cases);

    log?.info(
      { rows: dto.cases.length, accepted: cases.length, rejected: rejected.length },
      'Loaded case snapshot'
    );
    if (rejected.length > 0) {
      log?.debug({ rejected: rejected.slice(0, 20) }, 'Rejected snapshot rows');
    }

    return ok({ metadata: dto.metadata, cases, rejected });
  };

  return {
    async load(): Promise<Result<CaseSnapshot, SnapshotRepoError>> {
      if (cached !== null && cached.expiresAt > Date.now()) {
        return ok(cached.snapshot);
      }

      pending ??= loadFromDisk();

      try {
        const result = await pending;
        if (result.isOk()) {
          cached = { snapshot: result.value, expiresAt: Date.now() + ttlMs };
        }
        return result;
      } finally {
        pending = null;
      }
    },
  };
};
