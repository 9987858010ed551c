/**
 * Stash/unstash artifact hand-off between stages.
 *
 * Stores are shared between runs but every entry is keyed by run ID, so
 * two concurrent runs stashing the same key never see each other's files.
 * `release(runId)` drops a run's whole namespace; nothing outlives a run.
 *
 * Stages use the run-scoped {@link RunArtifacts} view, which is the plain
 * `stash(key, paths)` / `unstash(key)` contract.
 */

import { cp, mkdir, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { isAbsolute, join, normalize, sep } from 'node:path';
import { ArtifactNotFoundError, ErrorCode, PipelineError } from '../types/errors.js';
import { ARTIFACT_KEY_PATTERN } from '../types/pipeline.js';

// ---------------------------------------------------------------------------
// Interface
// ---------------------------------------------------------------------------

export interface ArtifactStore {
  /** Capture `paths` (workspace-relative) under `key` for this run. */
  stash(runId: string, key: string, paths: readonly string[], workspace: string): Promise<void>;
  /**
   * Restore `key` into `workspace` and return the stashed paths.
   * @throws ArtifactNotFoundError if this run never stashed `key`.
   */
  unstash(runId: string, key: string, workspace: string): Promise<string[]>;
  /** Drop everything stashed by `runId`. */
  release(runId: string): Promise<void>;
}

/** Run-scoped view of an {@link ArtifactStore}. */
export class RunArtifacts {
  constructor(
    private readonly store: ArtifactStore,
    readonly runId: string,
    private readonly workspace: string,
  ) {}

  stash(key: string, paths: readonly string[]): Promise<void> {
    return this.store.stash(this.runId, key, paths, this.workspace);
  }

  unstash(key: string): Promise<string[]> {
    return this.store.unstash(this.runId, key, this.workspace);
  }

  release(): Promise<void> {
    return this.store.release(this.runId);
  }
}

// ---------------------------------------------------------------------------
// Path validation
// ---------------------------------------------------------------------------

/** Reject paths that are absolute or climb out of the workspace. */
export function assertWorkspaceRelative(path: string): string {
  const normalized = normalize(path);
  if (
    isAbsolute(path) ||
    normalized === '..' ||
    normalized.startsWith(`..${sep}`) ||
    normalized.length === 0
  ) {
    throw new PipelineError(
      ErrorCode.STAGE_FAILED,
      `Artifact path "${path}" must stay inside the workspace`,
    );
  }
  return normalized;
}

/** Reject stash keys that are not a single path-safe segment. */
export function assertArtifactKey(key: string): string {
  if (!ARTIFACT_KEY_PATTERN.test(key)) {
    throw new PipelineError(ErrorCode.STAGE_FAILED, `Invalid artifact key "${key}"`);
  }
  return key;
}

// ---------------------------------------------------------------------------
// MemoryArtifactStore
// ---------------------------------------------------------------------------

/** Records stashed path lists without touching the filesystem. */
export class MemoryArtifactStore implements ArtifactStore {
  private readonly entries = new Map<string, Map<string, string[]>>();

  async stash(runId: string, key: string, paths: readonly string[]): Promise<void> {
    assertArtifactKey(key);
    const checked = paths.map(assertWorkspaceRelative);
    let run = this.entries.get(runId);
    if (!run) {
      run = new Map();
      this.entries.set(runId, run);
    }
    run.set(key, checked);
  }

  async unstash(runId: string, key: string): Promise<string[]> {
    const paths = this.entries.get(runId)?.get(key);
    if (paths === undefined) {
      throw new ArtifactNotFoundError(key);
    }
    return [...paths];
  }

  async release(runId: string): Promise<void> {
    this.entries.delete(runId);
  }

  /** Run IDs that currently hold stashed entries (test-only). */
  activeRuns(): string[] {
    return [...this.entries.keys()];
  }
}

// ---------------------------------------------------------------------------
// FileArtifactStore
// ---------------------------------------------------------------------------

interface StashIndex {
  key: string;
  paths: string[];
}

function isStashIndex(value: unknown): value is StashIndex {
  if (value === null || typeof value !== 'object' || !('key' in value) || !('paths' in value)) {
    return false;
  }
  const { key, paths } = value;
  return (
    typeof key === 'string' &&
    Array.isArray(paths) &&
    paths.every((p: unknown) => typeof p === 'string')
  );
}

/**
 * Copies stashed files to `<root>/<runId>/<key>/files/` and restores them
 * into the unstashing stage's workspace.
 */
export class FileArtifactStore implements ArtifactStore {
  constructor(private readonly root: string) {}

  /** `<root>/<runId>`, refusing IDs that would resolve to the root or above it. */
  private runDir(runId: string): string {
    const segment = encodeURIComponent(runId);
    if (segment === '' || segment === '.' || segment === '..') {
      throw new PipelineError(ErrorCode.INFRASTRUCTURE, `Invalid run ID "${runId}"`);
    }
    return join(this.root, segment);
  }

  private keyDir(runId: string, key: string): string {
    return join(this.runDir(runId), assertArtifactKey(key));
  }

  async stash(
    runId: string,
    key: string,
    paths: readonly string[],
    workspace: string,
  ): Promise<void> {
    const checked = paths.map(assertWorkspaceRelative);
    const dir = this.keyDir(runId, key);
    const filesDir = join(dir, 'files');

    await rm(dir, { recursive: true, force: true });
    await mkdir(filesDir, { recursive: true });

    for (const path of checked) {
      const source = join(workspace, path);
      try {
        await stat(source);
      } catch {
        throw new PipelineError(
          ErrorCode.STAGE_FAILED,
          `Cannot stash "${key}": "${path}" does not exist in the workspace`,
        );
      }
      await cp(source, join(filesDir, path), { recursive: true });
    }

    const index: StashIndex = { key, paths: checked };
    await writeFile(join(dir, 'index.json'), JSON.stringify(index, null, 2) + '\n', 'utf-8');
  }

  async unstash(runId: string, key: string, workspace: string): Promise<string[]> {
    const dir = this.keyDir(runId, key);

    let raw: string;
    try {
      raw = await readFile(join(dir, 'index.json'), 'utf-8');
    } catch {
      throw new ArtifactNotFoundError(key);
    }

    let index: unknown;
    try {
      index = JSON.parse(raw);
    } catch {
      throw new ArtifactNotFoundError(key);
    }
    if (!isStashIndex(index)) {
      throw new ArtifactNotFoundError(key);
    }

    const paths = index.paths.map(assertWorkspaceRelative);
    for (const path of paths) {
      await cp(join(dir, 'files', path), join(workspace, path), { recursive: true, force: true });
    }
    return paths;
  }

  async release(runId: string): Promise<void> {
    await rm(this.runDir(runId), { recursive: true, force: true });
  }
}
