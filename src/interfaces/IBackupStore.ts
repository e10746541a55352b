import { ResourceRecord } from '../types';

/**
 * Interface for the persistence substrate: JSON records on a hierarchical path namespace
 */
export interface IBackupStore {
  /**
   * Root directory of the namespace
   */
  getRoot(): string;

  /**
   * Create the root directory if it does not exist
   */
  ensureRoot(): Promise<void>;

  /**
   * Persist a record as `<segments>/<id>.json`, returning the file path
   */
  writeRecord(segments: string[], id: string, record: ResourceRecord): Promise<string>;

  /**
   * Read the record stored as `<segments>/<id>.json`
   */
  readRecord(segments: string[], id: string): Promise<ResourceRecord>;

  /**
   * Identifiers of the records directly under `segments`, or undefined when the directory is missing
   */
  listRecordIds(segments: string[]): Promise<string[] | undefined>;

  /**
   * Names of the subdirectories under `segments`, or undefined when the directory is missing
   */
  listGroups(segments: string[]): Promise<string[] | undefined>;

  /**
   * Absolute path of a namespace location
   */
  resolve(segments: string[], id?: string): string;
}
