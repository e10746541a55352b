import { ResourceRecord } from '../types';

export interface CreateOptions {
  /** Parameters filling the creation route, e.g. the translated source identifier */
  params?: Record<string, string>;
  /** Retrieval command the record was captured with (singleton replays) */
  command?: string;
}

/**
 * Interface for the identity-platform backend that lists and creates records
 */
export interface IBackend {
  /**
   * List records of a resource type, optionally parameterized by a source identifier
   */
  list(resourceType: string, command: string, params?: Record<string, string>): Promise<ResourceRecord[]>;

  /**
   * Retrieve a singleton resource
   */
  get(resourceType: string, command: string): Promise<ResourceRecord>;

  /**
   * Create a record and return it with its newly assigned id
   */
  create(resourceType: string, record: ResourceRecord, options?: CreateOptions): Promise<ResourceRecord>;

  /**
   * Establish a relation between two existing entities
   */
  associate(
    resourceType: string,
    command: string,
    endpoints: Record<string, string>,
    payload?: ResourceRecord
  ): Promise<void>;
}
