import { IdMapping } from '../types';

/**
 * Interface for the durable old-to-new identifier mapping
 */
export interface IIdMappingStore {
  /**
   * Insert or overwrite a mapping and persist the whole snapshot
   */
  addMapping(resourceType: string, oldId: string, newId: string): Promise<void>;

  /**
   * Look up the identifier assigned by the target, undefined when absent
   */
  getNewId(resourceType: string, oldId: string): string | undefined;

  has(resourceType: string, oldId: string): boolean;

  /**
   * Number of entries, for one resource type or overall
   */
  count(resourceType?: string): number;

  snapshot(): IdMapping;
}
