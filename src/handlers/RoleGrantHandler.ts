import { ResolutionWarning } from '../errors';
import { RelationKind } from '../types';
import { stringField } from '../utils/records';
import { AssociationHandler, PersistedRelation, RelationPlan } from './AssociationHandler';

/**
 * Administrator roles granted to a user. The role is identified by its type,
 * which is the same in every organisation and needs no translation.
 */
export class RoleGrantHandler extends AssociationHandler {
  readonly kind: RelationKind = 'role-grant';
  protected readonly route = { resourceType: 'roleAssignment', command: 'assignRoleToUser' };

  protected plan({ id, record, sourceId }: PersistedRelation): RelationPlan | ResolutionWarning {
    if (sourceId === undefined) {
      return new ResolutionWarning(`Role assignment ${id} is not listed under a user`, { identifier: id });
    }

    const roleType = stringField(record, 'type');
    if (!roleType) {
      return new ResolutionWarning(`Missing role type in role assignment ${id}`, { identifier: id });
    }

    return {
      endpoints: [{ parameter: 'userId', resourceType: 'user', value: sourceId }],
      primary: record,
      degraded: { type: roleType }
    };
  }
}
