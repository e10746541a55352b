import { ResourceDescriptor, ResourceRecord } from '../types';

/**
 * Layout of the on-disk backup namespace
 *
 *   <root>/<lowercased type>/<command>/<recordId>.json             independent and singleton
 *   <root>/<lowercased type>/<command>/<sourceId>/<recordId>.json  dependent
 */
export class PathNamespace {
  static readonly RECORD_EXTENSION = '.json';

  /**
   * Directory holding the records of an independent or singleton descriptor,
   * or the source-identifier subdirectories of a dependent one
   */
  static baseSegments(descriptor: Pick<ResourceDescriptor, 'name' | 'command'>): string[] {
    return [descriptor.name.toLowerCase(), descriptor.command];
  }

  static dependentSegments(descriptor: ResourceDescriptor, sourceId: string): string[] {
    return [...PathNamespace.baseSegments(descriptor), sourceId];
  }

  static fileName(id: string): string {
    return `${id}${PathNamespace.RECORD_EXTENSION}`;
  }

  /**
   * Recover an identifier from a record filename, undefined for non-record files
   */
  static idFromFileName(fileName: string): string | undefined {
    if (!fileName.endsWith(PathNamespace.RECORD_EXTENSION)) {
      return undefined;
    }
    const id = fileName.slice(0, -PathNamespace.RECORD_EXTENSION.length);
    return PathNamespace.isSafeIdentifier(id) ? id : undefined;
  }

  /**
   * Whether an identifier can be used as a single path segment
   */
  static isSafeIdentifier(id: string): boolean {
    if (id.length === 0 || id === '.' || id === '..') {
      return false;
    }
    return !/[/\\\0]/.test(id);
  }

  /**
   * The record's string id, undefined when missing or not a string
   */
  static recordId(record: ResourceRecord): string | undefined {
    const id = record.id;
    return typeof id === 'string' ? id : undefined;
  }
}
