import * as fs from 'fs/promises';
import * as path from 'path';
import { PersistenceError, describeError } from '../errors';
import { IIdMappingStore } from '../interfaces';
import { IdMapping } from '../types';
import { hasErrorCode, isRecord } from '../utils/records';

export const DEFAULT_MAPPING_FILENAME = 'id_mapping.json';

/**
 * Durable mapping from (resource type, old identifier) to the identifier
 * assigned by the restore target. The whole snapshot is rewritten after
 * every mutation.
 */
export class IdMappingStore implements IIdMappingStore {
  private mappings: Map<string, Map<string, string>> = new Map();
  private filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  /**
   * Store for the mapping file kept beside a restore input directory
   */
  static forRestoreDirectory(inputDir: string): IdMappingStore {
    return new IdMappingStore(path.join(inputDir, DEFAULT_MAPPING_FILENAME));
  }

  /**
   * Load the mapping file. A missing file yields an empty mapping.
   */
  async load(): Promise<void> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        this.mappings = new Map();
        return;
      }
      throw new PersistenceError(
        `Failed to read ID mapping from ${this.filePath}: ${describeError(error)}`,
        this.filePath,
        error
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new PersistenceError(
        `Failed to parse ID mapping ${this.filePath}: ${describeError(error)}`,
        this.filePath,
        error
      );
    }

    this.mappings = this.fromSnapshot(parsed);
  }

  /**
   * Insert or overwrite a mapping, then persist the full snapshot.
   * A failed write leaves the in-memory entry in place.
   */
  async addMapping(resourceType: string, oldId: string, newId: string): Promise<void> {
    let resourceMap = this.mappings.get(resourceType);
    if (!resourceMap) {
      resourceMap = new Map();
      this.mappings.set(resourceType, resourceMap);
    }
    resourceMap.set(oldId, newId);

    await this.save();
  }

  getNewId(resourceType: string, oldId: string): string | undefined {
    return this.mappings.get(resourceType)?.get(oldId);
  }

  has(resourceType: string, oldId: string): boolean {
    return this.mappings.get(resourceType)?.has(oldId) ?? false;
  }

  count(resourceType?: string): number {
    if (resourceType !== undefined) {
      return this.mappings.get(resourceType)?.size ?? 0;
    }
    let total = 0;
    for (const resourceMap of this.mappings.values()) {
      total += resourceMap.size;
    }
    return total;
  }

  snapshot(): IdMapping {
    const result: IdMapping = {};
    // defineProperty so a type named `__proto__` becomes an own key rather than the prototype
    for (const [resourceType, resourceMap] of this.mappings) {
      Object.defineProperty(result, resourceType, {
        value: Object.fromEntries(resourceMap),
        enumerable: true,
        writable: true,
        configurable: true
      });
    }
    return result;
  }

  /**
   * Rewrite the mapping file with the current snapshot
   */
  async save(): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(this.filePath, JSON.stringify(this.snapshot(), null, 2), 'utf-8');
    } catch (error) {
      throw new PersistenceError(
        `Failed to save ID mapping to ${this.filePath}: ${describeError(error)}`,
        this.filePath,
        error
      );
    }
  }

  getFilePath(): string {
    return this.filePath;
  }

  private fromSnapshot(value: unknown): Map<string, Map<string, string>> {
    if (!isRecord(value)) {
      throw new PersistenceError(`ID mapping ${this.filePath} must be a JSON object`, this.filePath);
    }

    const mappings = new Map<string, Map<string, string>>();
    for (const [resourceType, entries] of Object.entries(value)) {
      if (!isRecord(entries)) {
        throw new PersistenceError(
          `ID mapping ${this.filePath}: entry for ${resourceType} must be an object`,
          this.filePath
        );
      }
      const resourceMap = new Map<string, string>();
      for (const [oldId, newId] of Object.entries(entries)) {
        if (typeof newId !== 'string') {
          throw new PersistenceError(
            `ID mapping ${this.filePath}: ${resourceType}.${oldId} must map to a string`,
            this.filePath
          );
        }
        resourceMap.set(oldId, newId);
      }
      mappings.set(resourceType, resourceMap);
    }
    return mappings;
  }
}
