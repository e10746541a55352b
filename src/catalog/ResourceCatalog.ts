import * as fs from 'fs/promises';
import * as path from 'path';
import { CatalogError, PersistenceError, describeError } from '../errors';
import {
  AssignmentRoute,
  DependencyKind,
  ResourceDescriptor,
  RetrievalCapability
} from '../types';
import { isRecord } from '../utils/records';

const RETRIEVAL_CAPABILITIES: readonly RetrievalCapability[] = ['listable', 'singleton'];
const DEPENDENCY_KINDS: readonly DependencyKind[] = ['independent', 'dependent'];

/**
 * Default catalog shipped with the package
 */
export const DEFAULT_CATALOG_PATH = path.resolve(__dirname, '../../config/catalog.json');

/**
 * Static, declarative table of the resource types envsync backs up and restores
 */
export class ResourceCatalog {
  private readonly descriptors: readonly ResourceDescriptor[];

  constructor(descriptors: ResourceDescriptor[]) {
    this.descriptors = Object.freeze(descriptors.map(descriptor => ResourceCatalog.freeze(descriptor)));
  }

  /**
   * Load a catalog from a JSON file (an array of descriptors or `{ "resources": [...] }`)
   */
  static async fromFile(filePath: string): Promise<ResourceCatalog> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      throw new PersistenceError(`Failed to read catalog from ${filePath}: ${describeError(error)}`, filePath, error);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new PersistenceError(`Failed to parse catalog ${filePath}: ${describeError(error)}`, filePath, error);
    }

    const entries = Array.isArray(parsed) ? parsed : ResourceCatalog.resourcesField(parsed);
    if (!entries) {
      throw new PersistenceError(`Catalog ${filePath} must contain a "resources" array`, filePath);
    }

    const descriptors: ResourceDescriptor[] = [];
    const problems: string[] = [];
    entries.forEach((entry, index) => {
      const descriptor = ResourceCatalog.parseDescriptor(entry);
      if (typeof descriptor === 'string') {
        problems.push(`entry ${index}: ${descriptor}`);
      } else {
        descriptors.push(descriptor);
      }
    });

    if (problems.length > 0) {
      throw new CatalogError(problems);
    }

    return new ResourceCatalog(descriptors);
  }

  static async loadDefault(): Promise<ResourceCatalog> {
    return ResourceCatalog.fromFile(DEFAULT_CATALOG_PATH);
  }

  /**
   * Check the referential integrity of the catalog, throwing a CatalogError listing every problem
   */
  validate(): void {
    const problems: string[] = [];
    const seen = new Set<string>();
    const independentNames = new Set<string>();

    for (const descriptor of this.descriptors) {
      const label = ResourceCatalog.label(descriptor);

      if (!descriptor.name.trim() || !descriptor.command.trim()) {
        problems.push(`${label}: name and command must not be empty`);
      }

      const key = `${descriptor.name}\u0000${descriptor.command}`;
      if (seen.has(key)) {
        problems.push(`${label}: duplicate descriptor`);
      }
      seen.add(key);

      if (this.isIndependentListable(descriptor)) {
        if (independentNames.has(descriptor.name)) {
          problems.push(`${label}: another independent resource is already named ${descriptor.name}`);
        }
        independentNames.add(descriptor.name);
      }
    }

    for (const descriptor of this.descriptors) {
      problems.push(...this.dependencyProblems(descriptor, independentNames));
    }

    if (problems.length > 0) {
      throw new CatalogError(problems);
    }
  }

  /**
   * Resources fetchable without any other resource's identifier
   */
  independentResources(): ResourceDescriptor[] {
    return this.descriptors.filter(d => this.isIndependentListable(d));
  }

  /**
   * Resources whose retrieval requires an identifier from their source type
   */
  dependentResources(): ResourceDescriptor[] {
    return this.descriptors.filter(d => d.retrievalCapability === 'listable' && d.dependencyKind === 'dependent');
  }

  singletonResources(): ResourceDescriptor[] {
    return this.descriptors.filter(d => d.retrievalCapability === 'singleton');
  }

  /**
   * The independent listable descriptor named `name`
   */
  findIndependent(name: string): ResourceDescriptor | undefined {
    return this.descriptors.find(d => d.name === name && this.isIndependentListable(d));
  }

  getDescriptors(): readonly ResourceDescriptor[] {
    return this.descriptors;
  }

  size(): number {
    return this.descriptors.length;
  }

  /**
   * Export the catalog as JSON
   */
  async saveToFile(filePath: string): Promise<void> {
    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, JSON.stringify({ resources: this.descriptors }, null, 2), 'utf-8');
    } catch (error) {
      throw new PersistenceError(`Failed to write catalog to ${filePath}: ${describeError(error)}`, filePath, error);
    }
  }

  private dependencyProblems(descriptor: ResourceDescriptor, independentNames: Set<string>): string[] {
    const label = ResourceCatalog.label(descriptor);
    const problems: string[] = [];

    if (descriptor.retrievalCapability === 'singleton' && descriptor.dependencyKind === 'dependent') {
      problems.push(`${label}: singleton resources cannot be dependent`);
    }

    if (descriptor.dependencyKind === 'independent') {
      if (descriptor.sourceType !== undefined) {
        problems.push(`${label}: independent resources cannot declare a sourceType`);
      }
      if (descriptor.assignment) {
        problems.push(`${label}: only dependent resources can be assignments`);
      }
      return problems;
    }

    const sourceType = descriptor.sourceType;
    if (!sourceType) {
      problems.push(`${label}: dependent resources require a sourceType`);
    } else if (!independentNames.has(sourceType)) {
      if (sourceType === descriptor.name) {
        problems.push(`${label}: sourceType ${sourceType} is self-referential`);
      } else if (this.descriptors.some(d => d.name === sourceType)) {
        problems.push(`${label}: sourceType ${sourceType} is not an independent listable resource`);
      } else {
        problems.push(`${label}: sourceType ${sourceType} is unresolved`);
      }
    }

    if (descriptor.assignment && !independentNames.has(descriptor.assignment.memberType)) {
      problems.push(`${label}: assignment memberType ${descriptor.assignment.memberType} is unresolved`);
    }

    return problems;
  }

  private isIndependentListable(descriptor: ResourceDescriptor): boolean {
    return descriptor.retrievalCapability === 'listable' && descriptor.dependencyKind === 'independent';
  }

  private static label(descriptor: ResourceDescriptor): string {
    return `${descriptor.name}/${descriptor.command}`;
  }

  private static freeze(descriptor: ResourceDescriptor): ResourceDescriptor {
    const copy: ResourceDescriptor = { ...descriptor };
    if (descriptor.assignment) {
      copy.assignment = Object.freeze({ ...descriptor.assignment });
    }
    return Object.freeze(copy);
  }

  private static resourcesField(value: unknown): unknown[] | undefined {
    if (isRecord(value) && Array.isArray(value.resources)) {
      return value.resources;
    }
    return undefined;
  }

  /**
   * Shape-check a descriptor read from JSON, returning a problem description on failure
   */
  private static parseDescriptor(value: unknown): ResourceDescriptor | string {
    if (!isRecord(value)) {
      return 'descriptor must be an object';
    }

    const { name, command, retrievalCapability, dependencyKind, sourceType, parameter, assignment } = value;

    if (typeof name !== 'string' || typeof command !== 'string') {
      return 'name and command must be strings';
    }
    if (!RETRIEVAL_CAPABILITIES.some(c => c === retrievalCapability)) {
      return `${name}/${command}: retrievalCapability must be one of ${RETRIEVAL_CAPABILITIES.join(', ')}`;
    }
    if (!DEPENDENCY_KINDS.some(k => k === dependencyKind)) {
      return `${name}/${command}: dependencyKind must be one of ${DEPENDENCY_KINDS.join(', ')}`;
    }
    if (sourceType !== undefined && typeof sourceType !== 'string') {
      return `${name}/${command}: sourceType must be a string`;
    }
    if (parameter !== undefined && typeof parameter !== 'string') {
      return `${name}/${command}: parameter must be a string`;
    }

    const descriptor: ResourceDescriptor = {
      name,
      command,
      retrievalCapability: retrievalCapability === 'singleton' ? 'singleton' : 'listable',
      dependencyKind: dependencyKind === 'dependent' ? 'dependent' : 'independent'
    };
    if (sourceType !== undefined) descriptor.sourceType = sourceType;
    if (parameter !== undefined) descriptor.parameter = parameter;

    if (assignment !== undefined) {
      const route = ResourceCatalog.parseAssignment(assignment);
      if (!route) {
        return `${name}/${command}: assignment requires memberType, resourceType, command and memberParameter strings`;
      }
      descriptor.assignment = route;
    }

    return descriptor;
  }

  private static parseAssignment(value: unknown): AssignmentRoute | undefined {
    if (!isRecord(value)) {
      return undefined;
    }
    const { memberType, resourceType, command, memberParameter } = value;
    if (
      typeof memberType !== 'string' ||
      typeof resourceType !== 'string' ||
      typeof command !== 'string' ||
      typeof memberParameter !== 'string'
    ) {
      return undefined;
    }
    return { memberType, resourceType, command, memberParameter };
  }
}
