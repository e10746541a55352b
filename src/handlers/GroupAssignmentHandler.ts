import { ResolutionWarning } from '../errors';
import { RelationKind } from '../types';
import { stringField } from '../utils/records';
import { AssociationHandler, PersistedRelation, RelationPlan } from './AssociationHandler';

export class GroupAssignmentHandler extends AssociationHandler {
  readonly kind: RelationKind = 'group-assignment';
  protected readonly route = { resourceType: 'applicationGroups', command: 'assignGroupToApplication' };

  protected plan({ id, record, sourceId }: PersistedRelation): RelationPlan | ResolutionWarning {
    // Flat exports carry the application in the record, listings carry it in the directory
    const appId = stringField(record, 'appId') ?? sourceId;
    if (appId === undefined) {
      return new ResolutionWarning(`Missing appId in group assignment ${id}`, { identifier: id });
    }

    const groupId = stringField(record, 'id');
    if (groupId === undefined) {
      return new ResolutionWarning(`Missing id in group assignment ${id}`, { identifier: id });
    }

    return {
      endpoints: [
        { parameter: 'appId', resourceType: 'application', value: appId },
        { parameter: 'groupId', resourceType: 'group', value: groupId }
      ],
      primary: record,
      degraded: {}
    };
  }
}
