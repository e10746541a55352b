import { Dirent } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import { PersistenceError, ResolutionWarning, describeError } from '../errors';
import { IBackupStore } from '../interfaces';
import { ResourceRecord } from '../types';
import { PathNamespace } from '../utils/PathNamespace';
import { hasErrorCode, isRecord } from '../utils/records';

/**
 * Filesystem-backed path namespace holding one JSON file per record
 */
export class BackupStore implements IBackupStore {
  private rootDirectory: string;

  constructor(rootDirectory: string) {
    this.rootDirectory = rootDirectory;
  }

  getRoot(): string {
    return this.rootDirectory;
  }

  async ensureRoot(): Promise<void> {
    try {
      await fs.mkdir(this.rootDirectory, { recursive: true });
    } catch (error) {
      throw new PersistenceError(
        `Failed to create backup directory ${this.rootDirectory}: ${describeError(error)}`,
        this.rootDirectory,
        error
      );
    }
  }

  async writeRecord(segments: string[], id: string, record: ResourceRecord): Promise<string> {
    const filePath = this.resolve(segments, id);
    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, JSON.stringify(record, null, 2), 'utf-8');
      return filePath;
    } catch (error) {
      throw new PersistenceError(`Failed to write ${filePath}: ${describeError(error)}`, filePath, error);
    }
  }

  async readRecord(segments: string[], id: string): Promise<ResourceRecord> {
    const filePath = this.resolve(segments, id);

    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      throw new ResolutionWarning(`Error reading file ${filePath}: ${describeError(error)}`, {
        identifier: id,
        location: filePath
      });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new ResolutionWarning(`Error parsing JSON in ${filePath}: ${describeError(error)}`, {
        identifier: id,
        location: filePath
      });
    }

    if (!isRecord(parsed)) {
      throw new ResolutionWarning(`Record in ${filePath} is not a JSON object`, {
        identifier: id,
        location: filePath
      });
    }

    return parsed;
  }

  async listRecordIds(segments: string[]): Promise<string[] | undefined> {
    const entries = await this.readDirectory(segments);
    if (!entries) {
      return undefined;
    }

    const ids: string[] = [];
    for (const entry of entries) {
      if (!entry.isFile()) continue;
      const id = PathNamespace.idFromFileName(entry.name);
      if (id !== undefined) {
        ids.push(id);
      }
    }
    return ids.sort();
  }

  async listGroups(segments: string[]): Promise<string[] | undefined> {
    const entries = await this.readDirectory(segments);
    if (!entries) {
      return undefined;
    }
    return entries
      .filter(entry => entry.isDirectory())
      .map(entry => entry.name)
      .sort();
  }

  resolve(segments: string[], id?: string): string {
    const parts = id === undefined ? segments : [...segments, PathNamespace.fileName(id)];
    return path.join(this.rootDirectory, ...parts);
  }

  private async readDirectory(segments: string[]): Promise<Dirent[] | undefined> {
    const directory = this.resolve(segments);
    try {
      return await fs.readdir(directory, { withFileTypes: true });
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return undefined;
      }
      throw new ResolutionWarning(`Error reading directory ${directory}: ${describeError(error)}`, {
        location: directory
      });
    }
  }
}
