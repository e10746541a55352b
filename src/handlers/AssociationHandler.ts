import { BackendError, EnvSyncError, ResolutionWarning, describeError } from '../errors';
import { AssociationContext, AssociationResult, IAssociationHandler } from '../interfaces';
import { RelationKind, ResourceRecord, SyncIssue } from '../types';
import { PathNamespace } from '../utils/PathNamespace';

/**
 * One side of a relation. With a resourceType the value is an old identifier
 * translated through the mapping, without one it is sent as is.
 */
export interface RelationEndpoint {
  parameter: string;
  value: string;
  resourceType?: string;
}

export interface RelationPlan {
  endpoints: RelationEndpoint[];
  /** Payload of the first attempt, none for a bare call */
  primary?: ResourceRecord;
  /** Payload of the single retry after the first attempt fails */
  degraded: ResourceRecord;
}

export interface PersistedRelation {
  id: string;
  record: ResourceRecord;
  /** Source directory the record was listed under, undefined for flat files */
  sourceId?: string;
}

/**
 * Restores the persisted relations of one resource type: both endpoints are
 * resolved before any call, then the primary form is tried with one degraded retry
 */
export abstract class AssociationHandler implements IAssociationHandler {
  abstract readonly kind: RelationKind;

  /** Resource type and command of the call that establishes the relation */
  protected abstract readonly route: { resourceType: string; command: string };

  /**
   * Build the call for one persisted relation, or a warning when the record
   * lacks what the relation needs
   */
  protected abstract plan(relation: PersistedRelation): RelationPlan | ResolutionWarning;

  async restore(context: AssociationContext): Promise<AssociationResult> {
    const result: AssociationResult = {
      phase: 'association',
      processed: 0,
      succeeded: 0,
      skipped: 0,
      failed: 0,
      issues: []
    };
    const { descriptor, store, reporter } = context;
    const baseSegments = PathNamespace.baseSegments(descriptor);

    const flatIds = await store.listRecordIds(baseSegments);
    const sourceIds = await store.listGroups(baseSegments);

    if (flatIds === undefined && sourceIds === undefined) {
      reporter.logProgress(`No backup found for ${descriptor.name}, skipping...`);
      return result;
    }

    for (const id of flatIds ?? []) {
      await this.restoreFile(context, result, baseSegments, id);
    }

    for (const sourceId of sourceIds ?? []) {
      const segments = [...baseSegments, sourceId];
      let ids: string[] | undefined;
      try {
        ids = await store.listRecordIds(segments);
      } catch (error) {
        this.skip(context, result, error, sourceId);
        continue;
      }
      for (const id of ids ?? []) {
        await this.restoreFile(context, result, segments, id, sourceId);
      }
    }

    return result;
  }

  private async restoreFile(
    context: AssociationContext,
    result: AssociationResult,
    segments: string[],
    id: string,
    sourceId?: string
  ): Promise<void> {
    let record: ResourceRecord;
    try {
      record = await context.store.readRecord(segments, id);
    } catch (error) {
      this.skip(context, result, error, id);
      return;
    }

    const plan = this.plan({ id, record, sourceId });
    if (plan instanceof ResolutionWarning) {
      this.skip(context, result, plan, id);
      return;
    }

    const endpoints: Record<string, string> = {};
    for (const endpoint of plan.endpoints) {
      if (endpoint.resourceType === undefined) {
        endpoints[endpoint.parameter] = endpoint.value;
        continue;
      }
      const newId = context.mapping.getNewId(endpoint.resourceType, endpoint.value);
      if (newId === undefined) {
        this.skip(
          context,
          result,
          new ResolutionWarning(`Could not find new ID for ${endpoint.resourceType} ${endpoint.value}`, {
            resourceType: endpoint.resourceType,
            identifier: endpoint.value
          }),
          id
        );
        return;
      }
      endpoints[endpoint.parameter] = newId;
    }

    const description = `${this.route.command}: ${this.describeEndpoints(endpoints)}`;
    const { resourceType, command } = this.route;

    try {
      await context.backend.associate(resourceType, command, endpoints, plan.primary);
      context.reporter.logAssociation(description, false);
      result.processed++;
      result.succeeded++;
      return;
    } catch (error) {
      context.reporter.logProgress(`Trying alternative ${command} for ${id}...`, { error: describeError(error) });
    }

    try {
      await context.backend.associate(resourceType, command, endpoints, plan.degraded);
      context.reporter.logAssociation(description, true);
      result.processed++;
      result.succeeded++;
    } catch (error) {
      result.processed++;
      result.failed++;
      const failure = error instanceof EnvSyncError
        ? error
        : new BackendError(`Failed to ${command}: ${describeError(error)}`, { resourceType, command, identifier: id }, error);
      this.report(context, result, {
        type: failure.type,
        message: `Failed to ${description}: ${failure.message}`,
        timestamp: new Date(),
        recoverable: true,
        phase: 'association',
        resourceType: context.descriptor.name,
        command,
        identifier: id
      });
    }
  }

  private skip(context: AssociationContext, result: AssociationResult, error: unknown, identifier: string): void {
    result.processed++;
    result.skipped++;
    this.report(context, result, {
      type: error instanceof EnvSyncError ? error.type : 'unknown',
      message: describeError(error),
      timestamp: new Date(),
      recoverable: true,
      phase: 'association',
      resourceType: context.descriptor.name,
      command: context.descriptor.command,
      identifier
    });
  }

  private report(context: AssociationContext, result: AssociationResult, issue: SyncIssue): void {
    result.issues.push(issue);
    context.reporter.logIssue(issue);
  }

  private describeEndpoints(endpoints: Record<string, string>): string {
    return Object.entries(endpoints)
      .map(([parameter, value]) => `${parameter}=${value}`)
      .join(', ');
  }
}
