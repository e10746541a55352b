import { ResolutionWarning } from '../errors';
import { RelationKind } from '../types';
import { stringField } from '../utils/records';
import { AssociationHandler, PersistedRelation, RelationPlan } from './AssociationHandler';

/**
 * Group memberships listed per user: `<user id>/<group id>.json` holds the group
 */
export class MembershipHandler extends AssociationHandler {
  readonly kind: RelationKind = 'membership';
  protected readonly route = { resourceType: 'group', command: 'addUserToGroup' };

  protected plan({ id, record, sourceId }: PersistedRelation): RelationPlan | ResolutionWarning {
    const userId = sourceId ?? stringField(record, 'userId');
    if (userId === undefined) {
      return new ResolutionWarning(`Membership ${id} is not listed under a user`, { identifier: id });
    }

    const groupId = stringField(record, 'id');
    if (groupId === undefined) {
      return new ResolutionWarning(`Missing id in membership ${id}`, { identifier: id });
    }

    return {
      endpoints: [
        { parameter: 'groupId', resourceType: 'group', value: groupId },
        { parameter: 'userId', resourceType: 'user', value: userId }
      ],
      degraded: {}
    };
  }
}
