/**
 * Artifact Store
 *
 * Versioned on-disk storage for uploaded model artifacts.
 *
 * Layout:
 * ```
 * rootDir/
 * └── <model>/
 *     ├── versions/
 *     │   ├── 1/
 *     │   │   ├── model.tar.gz
 *     │   │   └── metadata.json
 *     │   └── 2/ ...
 *     ├── ports.json
 *     ├── slot-a -> versions/2
 *     └── slot-b -> versions/1
 * ```
 *
 * Versions are immutable once written. A slot symlink names the version the
 * supervised worker for that slot loads at start; it is replaced with a
 * rename so a worker never sees a missing or half-written link.
 * `ports.json` records the worker ports the model was first given, which
 * must match the supervisor's group definitions across gateway restarts.
 *
 * @module core/artifact-store
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as crypto from 'node:crypto';
import type { Logger } from 'pino';
import { SwapError, zodErrorToSwapError } from '../api/errors.js';
import { ARTIFACTS } from '../config/defaults.js';
import { ModelNameSchema } from '../types/schemas/config.js';
import type { ArtifactVersion, SlotId, SlotPorts } from '../types/lifecycle.js';

const VERSIONS_DIR = 'versions';
const METADATA_FILE = 'metadata.json';
const PORTS_FILE = 'ports.json';

interface VersionMetadata {
  hash: string;
  sizeBytes: number;
  createdAt: number;
}

export interface ArtifactStoreConfig {
  rootDir: string;
  /** File name of the artifact inside each version directory */
  artifactFileName?: string;
  logger?: Logger;
}

export interface SaveResult {
  version: ArtifactVersion;
  /** True when identical content was already stored; `version` is the existing one */
  duplicate: boolean;
}

/**
 * Points a slot at an artifact version before its process is started.
 */
export interface SlotBinder {
  bindSlot(modelName: string, slot: SlotId, version: ArtifactVersion): Promise<void>;
}

function isVersionMetadata(value: unknown): value is VersionMetadata {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const record: Record<string, unknown> = { ...value };
  return (
    typeof record.hash === 'string' &&
    typeof record.sizeBytes === 'number' &&
    typeof record.createdAt === 'number'
  );
}

function isSlotPorts(value: unknown): value is SlotPorts {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const record: Record<string, unknown> = { ...value };
  return Number.isInteger(record.A) && Number.isInteger(record.B);
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export function hashArtifact(data: Buffer): string {
  return crypto.createHash('sha256').update(data).digest('hex');
}

export class ArtifactStore implements SlotBinder {
  public readonly rootDir: string;
  private readonly artifactFileName: string;
  private readonly logger?: Logger;

  /** Per-model write chains; saves for one model never interleave */
  private readonly writeChains = new Map<string, Promise<unknown>>();

  constructor(config: ArtifactStoreConfig) {
    this.rootDir = path.resolve(config.rootDir);
    this.artifactFileName = config.artifactFileName ?? ARTIFACTS.ARTIFACT_FILE_NAME;
    this.logger = config.logger;
  }

  /**
   * Persist `data` as the next version of `modelName`.
   *
   * Byte-identical content already stored for the model is not written
   * again; the existing version is returned with `duplicate: true`.
   */
  public save(modelName: string, data: Buffer): Promise<SaveResult> {
    this.assertModelName(modelName);
    return this.serialize(modelName, () => this.writeVersion(modelName, data));
  }

  /**
   * Atomically point `<model>/slot-<x>` at `version`'s directory.
   */
  public async bindSlot(modelName: string, slot: SlotId, version: ArtifactVersion): Promise<void> {
    this.assertModelName(modelName);
    const modelDir = this.modelDir(modelName);
    const linkPath = this.slotLinkPath(modelName, slot);
    const target = path.join(VERSIONS_DIR, String(version.version));
    const tempLink = `${linkPath}.tmp-${crypto.randomUUID()}`;

    await fs.mkdir(modelDir, { recursive: true });
    await fs.symlink(target, tempLink, 'dir');
    try {
      await fs.rename(tempLink, linkPath);
    } catch (error) {
      await fs.rm(tempLink, { force: true });
      throw new SwapError(
        'PromotionFailed',
        `Failed to bind slot ${slot} of '${modelName}' to version ${version.version}`,
        { model: modelName, slot, version: version.version },
        { cause: error }
      );
    }

    this.logger?.debug(
      { model: modelName, slot, version: version.version, link: linkPath },
      'Slot bound to artifact version'
    );
  }

  /**
   * Version a slot symlink currently names, or null if unbound.
   */
  public async boundVersion(modelName: string, slot: SlotId): Promise<number | null> {
    try {
      const target = await fs.readlink(this.slotLinkPath(modelName, slot));
      const version = Number.parseInt(path.basename(target), 10);
      return Number.isInteger(version) ? version : null;
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
  }

  /**
   * Worker ports recorded for `modelName`, or null when none were recorded.
   */
  public async readPorts(modelName: string): Promise<SlotPorts | null> {
    this.assertModelName(modelName);
    const file = path.join(this.modelDir(modelName), PORTS_FILE);

    let raw: unknown;
    try {
      raw = JSON.parse(await fs.readFile(file, 'utf8'));
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      this.logger?.warn(
        { model: modelName, error: error instanceof Error ? error.message : String(error) },
        'Ignoring unreadable port allocation'
      );
      return null;
    }

    if (!isSlotPorts(raw)) {
      this.logger?.warn({ model: modelName }, 'Ignoring invalid port allocation');
      return null;
    }
    return { A: raw.A, B: raw.B };
  }

  /**
   * Record the worker ports of `modelName`, replacing any earlier record.
   */
  public async writePorts(modelName: string, ports: SlotPorts): Promise<void> {
    this.assertModelName(modelName);
    const modelDir = this.modelDir(modelName);
    const file = path.join(modelDir, PORTS_FILE);
    const tempFile = `${file}.tmp-${crypto.randomUUID()}`;

    await fs.mkdir(modelDir, { recursive: true });
    try {
      await fs.writeFile(tempFile, JSON.stringify({ A: ports.A, B: ports.B }, null, 2));
      await fs.rename(tempFile, file);
    } catch (error) {
      await fs.rm(tempFile, { force: true });
      throw new SwapError(
        'InternalError',
        `Failed to record worker ports for '${modelName}'`,
        { model: modelName, ports },
        { cause: error }
      );
    }

    this.logger?.debug({ model: modelName, ports }, 'Worker ports recorded');
  }

  /**
   * All stored versions of a model, oldest first.
   */
  public async listVersions(modelName: string): Promise<ArtifactVersion[]> {
    this.assertModelName(modelName);
    const versionsDir = path.join(this.modelDir(modelName), VERSIONS_DIR);

    let names: string[];
    try {
      names = await fs.readdir(versionsDir);
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw error;
    }

    const numbers = names
      .filter((name) => /^\d+$/.test(name))
      .map((name) => Number.parseInt(name, 10))
      .sort((a, b) => a - b);

    const versions: ArtifactVersion[] = [];
    for (const version of numbers) {
      const loaded = await this.readVersion(modelName, version);
      if (loaded) {
        versions.push(loaded);
      }
    }
    return versions;
  }

  public async latest(modelName: string): Promise<ArtifactVersion | null> {
    const versions = await this.listVersions(modelName);
    return versions.at(-1) ?? null;
  }

  /**
   * Model names with at least one stored version.
   */
  public async listModels(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.rootDir);
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw error;
    }

    const models: string[] = [];
    for (const name of entries.sort()) {
      if (!ModelNameSchema.safeParse(name).success) {
        continue;
      }
      const versions = await this.listVersions(name);
      if (versions.length > 0) {
        models.push(name);
      }
    }
    return models;
  }

  private async writeVersion(modelName: string, data: Buffer): Promise<SaveResult> {
    const hash = hashArtifact(data);
    const existing = await this.listVersions(modelName);

    const duplicate = existing.find((candidate) => candidate.hash === hash);
    if (duplicate) {
      this.logger?.info(
        { model: modelName, version: duplicate.version, hash },
        'Artifact already stored'
      );
      return { version: duplicate, duplicate: true };
    }

    const next = (existing.at(-1)?.version ?? 0) + 1;
    const versionsDir = path.join(this.modelDir(modelName), VERSIONS_DIR);
    const stagingDir = path.join(versionsDir, `.staging-${crypto.randomUUID()}`);
    const finalDir = path.join(versionsDir, String(next));
    const metadata: VersionMetadata = { hash, sizeBytes: data.length, createdAt: Date.now() };

    await fs.mkdir(stagingDir, { recursive: true });
    try {
      await fs.writeFile(path.join(stagingDir, this.artifactFileName), data);
      await fs.writeFile(path.join(stagingDir, METADATA_FILE), JSON.stringify(metadata, null, 2));
      await fs.rename(stagingDir, finalDir);
    } catch (error) {
      await fs.rm(stagingDir, { recursive: true, force: true });
      throw new SwapError(
        'InternalError',
        `Failed to store artifact for '${modelName}'`,
        { model: modelName },
        { cause: error }
      );
    }

    const version: ArtifactVersion = {
      modelName,
      version: next,
      hash,
      path: path.join(finalDir, this.artifactFileName),
      sizeBytes: metadata.sizeBytes,
      createdAt: metadata.createdAt,
    };

    this.logger?.info(
      { model: modelName, version: next, hash, sizeBytes: data.length },
      'Artifact stored'
    );
    return { version, duplicate: false };
  }

  private async readVersion(modelName: string, version: number): Promise<ArtifactVersion | null> {
    const dir = path.join(this.modelDir(modelName), VERSIONS_DIR, String(version));
    try {
      const raw: unknown = JSON.parse(await fs.readFile(path.join(dir, METADATA_FILE), 'utf8'));
      if (!isVersionMetadata(raw)) {
        this.logger?.warn({ model: modelName, version }, 'Ignoring version with invalid metadata');
        return null;
      }
      return {
        modelName,
        version,
        hash: raw.hash,
        path: path.join(dir, this.artifactFileName),
        sizeBytes: raw.sizeBytes,
        createdAt: raw.createdAt,
      };
    } catch (error) {
      this.logger?.warn(
        { model: modelName, version, error: error instanceof Error ? error.message : String(error) },
        'Ignoring unreadable artifact version'
      );
      return null;
    }
  }

  private serialize<T>(modelName: string, task: () => Promise<T>): Promise<T> {
    const previous = this.writeChains.get(modelName) ?? Promise.resolve();
    const run = previous.then(task, task);
    const settled = run.catch(() => undefined);
    this.writeChains.set(modelName, settled);
    void settled.then(() => {
      if (this.writeChains.get(modelName) === settled) {
        this.writeChains.delete(modelName);
      }
    });
    return run;
  }

  private modelDir(modelName: string): string {
    return path.join(this.rootDir, modelName);
  }

  private slotLinkPath(modelName: string, slot: SlotId): string {
    return path.join(this.modelDir(modelName), `slot-${slot.toLowerCase()}`);
  }

  private assertModelName(modelName: string): void {
    const result = ModelNameSchema.safeParse(modelName);
    if (!result.success) {
      throw zodErrorToSwapError(result.error);
    }
  }
}
