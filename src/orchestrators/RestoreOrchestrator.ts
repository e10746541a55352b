import { ResourceCatalog } from '../catalog/ResourceCatalog';
import { AssociationHandlerRegistry } from '../handlers/AssociationHandlerRegistry';
import { BackendError, EnvSyncError, ResolutionWarning, describeError } from '../errors';
import {
  IBackend,
  IBackupStore,
  IIdMappingStore,
  IReporter,
  IRestoreOrchestrator
} from '../interfaces';
import { Report, ResourceDescriptor, ResourceRecord } from '../types';
import { PathNamespace } from '../utils/PathNamespace';
import { IssueContext, OperationJournal } from './OperationJournal';

export type RestoreState = 'init' | 'singleton' | 'first-pass' | 'second-pass' | 'association' | 'done';

const STATE_ORDER: readonly RestoreState[] = ['init', 'singleton', 'first-pass', 'second-pass', 'association', 'done'];

export interface RestoreSettings {
  /**
   * Skip first-pass records whose old identifier is already mapped, so an
   * interrupted restore can be resumed without creating duplicates
   */
  resume: boolean;
}

/**
 * Recreates a backup in the target organisation, translating identifiers
 * recorded at backup time into the identifiers the target assigns.
 *
 * Phases run strictly in order: singleton, first-pass, second-pass, association.
 */
export class RestoreOrchestrator implements IRestoreOrchestrator {
  private backend: IBackend;
  private store: IBackupStore;
  private mapping: IIdMappingStore;
  private reporter: IReporter;
  private catalog: ResourceCatalog;
  private handlers: AssociationHandlerRegistry;
  private settings: RestoreSettings;
  private state: RestoreState = 'init';

  constructor(
    backend: IBackend,
    store: IBackupStore,
    mapping: IIdMappingStore,
    reporter: IReporter,
    catalog: ResourceCatalog,
    handlers: AssociationHandlerRegistry,
    settings: RestoreSettings = { resume: false }
  ) {
    this.backend = backend;
    this.store = store;
    this.mapping = mapping;
    this.reporter = reporter;
    this.catalog = catalog;
    this.handlers = handlers;
    this.settings = settings;
  }

  /**
   * Execute the complete restore workflow
   */
  async executeRestore(): Promise<Report> {
    if (this.state !== 'init') {
      throw new Error(`Restore has already run (state: ${this.state})`);
    }

    const startTime = Date.now();
    const journal = new OperationJournal(this.reporter, 'restore');
    const mappingsBefore = this.mapping.count();

    this.catalog.validate();
    this.reporter.logOperationStart('restore', this.store.getRoot());

    this.advance('singleton');
    await this.restoreSingletons(journal);

    this.advance('first-pass');
    await this.restoreIndependentResources(journal);

    this.advance('second-pass');
    await this.restoreDependentResources(journal);

    this.advance('association');
    await this.restoreAssociations(journal);

    this.advance('done');

    const report = this.reporter.generateReport(
      'restore',
      this.store.getRoot(),
      journal.getPhases(),
      journal.getIssues(),
      this.mapping.count() - mappingsBefore,
      Date.now() - startTime
    );
    this.reporter.logOperationComplete(report);

    return report;
  }

  getState(): RestoreState {
    return this.state;
  }

  /**
   * Replay persisted singleton files through create
   */
  private async restoreSingletons(journal: OperationJournal): Promise<void> {
    const singletons = this.catalog.singletonResources();
    journal.beginPhase('singleton', singletons.length);

    for (const descriptor of singletons) {
      const segments = PathNamespace.baseSegments(descriptor);
      const ids = await this.listIds(journal, descriptor, segments);
      if (!ids) continue;

      this.reporter.logProgress(`Restoring ${descriptor.name} using ${descriptor.command} command...`);

      for (const id of ids) {
        const record = await this.readRecord(journal, descriptor, segments, id);
        if (!record) continue;

        try {
          await this.backend.create(descriptor.name, record, { command: descriptor.command });
          this.reporter.logRecordRestored(descriptor.name, id);
          journal.recordSuccess();
        } catch (error) {
          journal.recordFailure(
            this.asBackendError(error, `Failed to restore ${descriptor.name} ${id}`, descriptor, id),
            this.context(descriptor, id)
          );
        }
      }
    }
  }

  /**
   * Create every persisted independent record and capture its new identifier
   */
  private async restoreIndependentResources(journal: OperationJournal): Promise<void> {
    const independents = this.catalog.independentResources();
    journal.beginPhase('first-pass', independents.length);

    for (const descriptor of independents) {
      const segments = PathNamespace.baseSegments(descriptor);
      const ids = await this.listIds(journal, descriptor, segments);
      if (!ids) continue;

      this.reporter.logProgress(`Restoring ${descriptor.name} resources...`);

      for (const oldId of ids) {
        if (this.settings.resume && this.mapping.has(descriptor.name, oldId)) {
          this.reporter.logProgress(`Skipping ${descriptor.name} ${oldId}: already mapped`, {
            newId: this.mapping.getNewId(descriptor.name, oldId)
          });
          continue;
        }

        const record = await this.readRecord(journal, descriptor, segments, oldId);
        if (!record) continue;

        this.reporter.logProgress(`Restoring ${descriptor.name} from previous ID ${oldId}...`);

        let created: ResourceRecord;
        try {
          created = await this.backend.create(descriptor.name, record);
        } catch (error) {
          journal.recordFailure(
            this.asBackendError(error, `Error restoring ${descriptor.name} from ${oldId}`, descriptor, oldId),
            this.context(descriptor, oldId)
          );
          continue;
        }

        const newId = PathNamespace.recordId(created);
        if (newId === undefined) {
          journal.recordFailure(
            new ResolutionWarning(`Response for ${descriptor.name} ${oldId} does not contain an ID field`, {
              resourceType: descriptor.name,
              identifier: oldId
            }),
            this.context(descriptor, oldId)
          );
          continue;
        }

        // A failed mapping write is fatal: the run could not be resumed reliably
        await this.mapping.addMapping(descriptor.name, oldId, newId);
        this.reporter.logRecordRestored(descriptor.name, oldId, newId);
        journal.recordSuccess();
      }
    }
  }

  /**
   * Recreate dependent records under their translated source identifiers
   */
  private async restoreDependentResources(journal: OperationJournal): Promise<void> {
    const dependents = this.catalog.dependentResources().filter(d => !this.handlers.has(d.name));
    journal.beginPhase('second-pass', dependents.length);

    for (const descriptor of dependents) {
      const sourceType = descriptor.sourceType ?? '';
      const baseSegments = PathNamespace.baseSegments(descriptor);

      let sourceIds: string[] | undefined;
      try {
        sourceIds = await this.store.listGroups(baseSegments);
      } catch (error) {
        journal.warn(error, this.context(descriptor));
        continue;
      }
      if (!sourceIds) {
        this.reporter.logProgress(`No backup found for ${descriptor.name}/${descriptor.command}, skipping...`);
        continue;
      }

      this.reporter.logProgress(`Restoring ${descriptor.name} using ${descriptor.command} command...`);

      for (const oldSourceId of sourceIds) {
        const newSourceId = this.mapping.getNewId(sourceType, oldSourceId);
        if (newSourceId === undefined) {
          journal.warn(
            new ResolutionWarning(`Could not find new ID for ${sourceType} ${oldSourceId}, skipping...`, {
              resourceType: sourceType,
              identifier: oldSourceId
            }),
            this.context(descriptor, oldSourceId)
          );
          continue;
        }

        const segments = PathNamespace.dependentSegments(descriptor, oldSourceId);
        const ids = await this.listIds(journal, descriptor, segments);
        if (!ids) continue;

        for (const id of ids) {
          const record = await this.readRecord(journal, descriptor, segments, id);
          if (!record) continue;

          if (descriptor.assignment) {
            await this.restoreAssignment(journal, descriptor, newSourceId, id, record);
          } else {
            await this.restoreDependentRecord(journal, descriptor, newSourceId, id, record);
          }
        }
      }
    }
  }

  private async restoreDependentRecord(
    journal: OperationJournal,
    descriptor: ResourceDescriptor,
    newSourceId: string,
    id: string,
    record: ResourceRecord
  ): Promise<void> {
    const parameter = descriptor.parameter ?? 'id';
    try {
      await this.backend.create(descriptor.name, record, { params: { [parameter]: newSourceId } });
      this.reporter.logRecordRestored(descriptor.name, id);
      journal.recordSuccess();
    } catch (error) {
      journal.recordFailure(
        this.asBackendError(
          error,
          `Failed to restore ${descriptor.name} for ${descriptor.sourceType} ${newSourceId}`,
          descriptor,
          id
        ),
        this.context(descriptor, id)
      );
    }
  }

  /**
   * Attach an existing entity to the translated source instead of creating it
   */
  private async restoreAssignment(
    journal: OperationJournal,
    descriptor: ResourceDescriptor,
    newSourceId: string,
    id: string,
    record: ResourceRecord
  ): Promise<void> {
    const assignment = descriptor.assignment;
    if (!assignment) return;

    const oldMemberId = PathNamespace.recordId(record) ?? id;
    let newMemberId = this.mapping.getNewId(assignment.memberType, oldMemberId);
    if (newMemberId === undefined) {
      // Members may already exist in the target under the same id
      journal.warn(
        new ResolutionWarning(
          `Could not find new ID for ${assignment.memberType} ${oldMemberId}, using the persisted ID`,
          { resourceType: assignment.memberType, identifier: oldMemberId }
        ),
        this.context(descriptor, id)
      );
      newMemberId = oldMemberId;
    }

    const endpoints = {
      [descriptor.parameter ?? 'id']: newSourceId,
      [assignment.memberParameter]: newMemberId
    };

    try {
      await this.backend.associate(assignment.resourceType, assignment.command, endpoints);
      this.reporter.logAssociation(
        `${assignment.command}: ${assignment.memberType} ${newMemberId} -> ${descriptor.sourceType} ${newSourceId}`,
        false
      );
      journal.recordSuccess();
    } catch (error) {
      journal.recordFailure(
        this.asBackendError(
          error,
          `Failed to ${assignment.command} for ${assignment.memberType} ${newMemberId}`,
          descriptor,
          id
        ),
        this.context(descriptor, id)
      );
    }
  }

  /**
   * Run the registered handler of every catalogued relation type
   */
  private async restoreAssociations(journal: OperationJournal): Promise<void> {
    const relations = this.catalog.dependentResources().filter(d => this.handlers.has(d.name));
    journal.beginPhase('association', relations.length);

    for (const descriptor of relations) {
      const handler = this.handlers.get(descriptor.name);
      if (!handler) continue;

      this.reporter.logProgress(`Restoring ${descriptor.name}...`, { kind: handler.kind });

      try {
        const result = await handler.restore({
          descriptor,
          backend: this.backend,
          mapping: this.mapping,
          store: this.store,
          reporter: this.reporter
        });
        journal.absorb(result, result.issues);
      } catch (error) {
        if (error instanceof EnvSyncError && !error.recoverable) {
          throw error;
        }
        journal.warn(
          new ResolutionWarning(`Error restoring ${descriptor.name}: ${describeError(error)}`, {
            resourceType: descriptor.name
          }),
          this.context(descriptor)
        );
      }
    }
  }

  private async listIds(
    journal: OperationJournal,
    descriptor: ResourceDescriptor,
    segments: string[]
  ): Promise<string[] | undefined> {
    try {
      const ids = await this.store.listRecordIds(segments);
      if (!ids) {
        this.reporter.logProgress(`No backup found for ${segments.join('/')}, skipping...`, {
          resourceType: descriptor.name
        });
      }
      return ids;
    } catch (error) {
      journal.warn(error, this.context(descriptor));
      return undefined;
    }
  }

  /**
   * Read a persisted record; malformed files are skipped with a warning
   */
  private async readRecord(
    journal: OperationJournal,
    descriptor: ResourceDescriptor,
    segments: string[],
    id: string
  ): Promise<ResourceRecord | undefined> {
    try {
      return await this.store.readRecord(segments, id);
    } catch (error) {
      journal.recordSkip(error, this.context(descriptor, id));
      return undefined;
    }
  }

  private advance(next: RestoreState): void {
    const expected = STATE_ORDER[STATE_ORDER.indexOf(this.state) + 1];
    if (next !== expected) {
      throw new Error(`Invalid restore transition ${this.state} -> ${next}`);
    }
    this.state = next;
  }

  private asBackendError(
    error: unknown,
    message: string,
    descriptor: ResourceDescriptor,
    identifier: string
  ): EnvSyncError {
    if (error instanceof BackendError) {
      const hint = error.isConflict() ? ' (already exists in target)' : '';
      return new BackendError(`${message}: ${error.message}${hint}`, {
        resourceType: error.resourceType,
        command: error.command,
        status: error.status,
        identifier
      }, error);
    }
    if (error instanceof EnvSyncError) {
      return error;
    }
    return new BackendError(
      `${message}: ${describeError(error)}`,
      { resourceType: descriptor.name, command: 'create', identifier },
      error
    );
  }

  private context(descriptor: ResourceDescriptor, identifier?: string): IssueContext {
    return { resourceType: descriptor.name, command: descriptor.command, identifier };
  }
}
