import { ResourceCatalog } from '../catalog/ResourceCatalog';
import { BackendError, EnvSyncError, ResolutionWarning, describeError } from '../errors';
import { IBackend, IBackupOrchestrator, IBackupStore, IReporter } from '../interfaces';
import { Report, ResourceDescriptor, ResourceRecord } from '../types';
import { PathNamespace } from '../utils/PathNamespace';
import { IssueContext, OperationJournal } from './OperationJournal';

/**
 * Walks the catalog and persists every retrievable record into the backup namespace:
 * singletons, then independent resources, then resources parameterized by the
 * identifiers the first pass persisted
 */
export class BackupOrchestrator implements IBackupOrchestrator {
  private backend: IBackend;
  private store: IBackupStore;
  private reporter: IReporter;
  private catalog: ResourceCatalog;

  constructor(backend: IBackend, store: IBackupStore, reporter: IReporter, catalog: ResourceCatalog) {
    this.backend = backend;
    this.store = store;
    this.reporter = reporter;
    this.catalog = catalog;
  }

  /**
   * Execute the complete backup workflow
   */
  async executeBackup(): Promise<Report> {
    const startTime = Date.now();
    const journal = new OperationJournal(this.reporter, 'backup');
    const destination = this.store.getRoot();

    this.catalog.validate();
    this.reporter.logOperationStart('backup', destination);
    await this.store.ensureRoot();

    await this.backupSingletons(journal);
    await this.backupIndependentResources(journal);
    await this.backupDependentResources(journal);

    const report = this.reporter.generateReport(
      'backup',
      destination,
      journal.getPhases(),
      journal.getIssues(),
      0,
      Date.now() - startTime
    );
    this.reporter.logOperationComplete(report);

    return report;
  }

  /**
   * Singleton pass: one get call per descriptor
   */
  private async backupSingletons(journal: OperationJournal): Promise<void> {
    const singletons = this.catalog.singletonResources();
    journal.beginPhase('singleton', singletons.length);

    for (const descriptor of singletons) {
      this.reporter.logProgress(`Backing up ${descriptor.name} using ${descriptor.command} command...`);

      let record: ResourceRecord;
      try {
        record = await this.backend.get(descriptor.name, descriptor.command);
      } catch (error) {
        journal.recordFailure(this.asBackendError(error, descriptor), this.context(descriptor));
        continue;
      }

      const recordId = PathNamespace.recordId(record);
      const fileId = recordId !== undefined && PathNamespace.isSafeIdentifier(recordId)
        ? recordId
        : descriptor.command;

      await this.persist(journal, descriptor, PathNamespace.baseSegments(descriptor), fileId, record);
    }
  }

  /**
   * First pass: list each independent resource, one file per record
   */
  private async backupIndependentResources(journal: OperationJournal): Promise<void> {
    const independents = this.catalog.independentResources();
    journal.beginPhase('first-pass', independents.length);

    for (const descriptor of independents) {
      this.reporter.logProgress(`Backing up ${descriptor.name} using ${descriptor.command} command...`);

      let records: ResourceRecord[];
      try {
        records = await this.backend.list(descriptor.name, descriptor.command);
      } catch (error) {
        journal.recordFailure(this.asBackendError(error, descriptor), this.context(descriptor));
        continue;
      }

      await this.persistListing(journal, descriptor, PathNamespace.baseSegments(descriptor), records);
    }
  }

  /**
   * Second pass: parameterize each dependent listing by the source identifiers
   * recovered from the first pass's filenames
   */
  private async backupDependentResources(journal: OperationJournal): Promise<void> {
    const dependents = this.catalog.dependentResources();
    journal.beginPhase('second-pass', dependents.length);

    for (const descriptor of dependents) {
      const sourceIds = await this.sourceIdentifiers(journal, descriptor);
      if (!sourceIds) continue;

      this.reporter.logProgress(`Found ${sourceIds.length} IDs for ${descriptor.name}`, {
        sourceType: descriptor.sourceType
      });

      const parameter = descriptor.parameter ?? 'id';
      for (const sourceId of sourceIds) {
        this.reporter.logProgress(
          `Backing up ${descriptor.name} for ${descriptor.sourceType} ID ${sourceId} using ${descriptor.command} command...`
        );

        let records: ResourceRecord[];
        try {
          records = await this.backend.list(descriptor.name, descriptor.command, { [parameter]: sourceId });
        } catch (error) {
          journal.recordFailure(this.asBackendError(error, descriptor, sourceId), this.context(descriptor, sourceId));
          continue;
        }

        await this.persistListing(journal, descriptor, PathNamespace.dependentSegments(descriptor, sourceId), records);
      }
    }
  }

  /**
   * Identifiers persisted by the source's first-pass listing, undefined when the
   * descriptor has to be skipped
   */
  private async sourceIdentifiers(
    journal: OperationJournal,
    descriptor: ResourceDescriptor
  ): Promise<string[] | undefined> {
    const source = descriptor.sourceType ? this.catalog.findIndependent(descriptor.sourceType) : undefined;
    if (!source) {
      journal.warn(
        new ResolutionWarning(`No independent resource ${descriptor.sourceType} to source ${descriptor.name} from`, {
          resourceType: descriptor.name
        }),
        this.context(descriptor)
      );
      return undefined;
    }

    const sourceSegments = PathNamespace.baseSegments(source);
    let ids: string[] | undefined;
    try {
      ids = await this.store.listRecordIds(sourceSegments);
    } catch (error) {
      journal.warn(error, this.context(descriptor));
      return undefined;
    }

    if (ids === undefined) {
      journal.warn(
        new ResolutionWarning(
          `Source directory ${this.store.resolve(sourceSegments)} not found for ${descriptor.name}, skipping...`,
          { resourceType: descriptor.name, location: this.store.resolve(sourceSegments) }
        ),
        this.context(descriptor)
      );
      return undefined;
    }

    if (ids.length === 0) {
      journal.warn(
        new ResolutionWarning(
          `No IDs found in ${this.store.resolve(sourceSegments)} for ${descriptor.name}, skipping...`,
          { resourceType: descriptor.name }
        ),
        this.context(descriptor)
      );
      return undefined;
    }

    return ids;
  }

  private async persistListing(
    journal: OperationJournal,
    descriptor: ResourceDescriptor,
    segments: string[],
    records: ResourceRecord[]
  ): Promise<void> {
    for (const record of records) {
      const recordId = PathNamespace.recordId(record);
      if (recordId === undefined || !PathNamespace.isSafeIdentifier(recordId)) {
        journal.recordSkip(
          new ResolutionWarning(
            recordId === undefined
              ? `${descriptor.name} record without an id, skipping...`
              : `${descriptor.name} record has an unusable id ${JSON.stringify(recordId)}, skipping...`,
            { resourceType: descriptor.name }
          ),
          this.context(descriptor)
        );
        continue;
      }

      await this.persist(journal, descriptor, segments, recordId, record);
    }
  }

  /**
   * Write failures are fatal for the run
   */
  private async persist(
    journal: OperationJournal,
    descriptor: ResourceDescriptor,
    segments: string[],
    id: string,
    record: ResourceRecord
  ): Promise<void> {
    const filePath = await this.store.writeRecord(segments, id, record);
    this.reporter.logRecordSaved(descriptor.name, descriptor.command, id, filePath);
    journal.recordSuccess();
  }

  private asBackendError(error: unknown, descriptor: ResourceDescriptor, identifier?: string): EnvSyncError {
    if (error instanceof EnvSyncError) {
      return error;
    }
    return new BackendError(
      `Failed to execute ${descriptor.name} ${descriptor.command} backup${identifier ? ` for ID ${identifier}` : ''}: ${describeError(error)}`,
      { resourceType: descriptor.name, command: descriptor.command, identifier },
      error
    );
  }

  private context(descriptor: ResourceDescriptor, identifier?: string): IssueContext {
    return { resourceType: descriptor.name, command: descriptor.command, identifier };
  }
}
