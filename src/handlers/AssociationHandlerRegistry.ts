import { IAssociationHandler } from '../interfaces';
import { GroupAssignmentHandler } from './GroupAssignmentHandler';
import { MembershipHandler } from './MembershipHandler';
import { RoleGrantHandler } from './RoleGrantHandler';

/**
 * Association handlers keyed by resource-type name. Dependent types without a
 * handler are restored by the generic second pass.
 */
export class AssociationHandlerRegistry {
  private handlers = new Map<string, IAssociationHandler>();

  static withDefaults(): AssociationHandlerRegistry {
    return new AssociationHandlerRegistry()
      .register('userGroups', new MembershipHandler())
      .register('roleAssignment', new RoleGrantHandler())
      .register('applicationGroups', new GroupAssignmentHandler());
  }

  register(resourceType: string, handler: IAssociationHandler): this {
    this.handlers.set(resourceType, handler);
    return this;
  }

  get(resourceType: string): IAssociationHandler | undefined {
    return this.handlers.get(resourceType);
  }

  has(resourceType: string): boolean {
    return this.handlers.has(resourceType);
  }

  resourceTypes(): string[] {
    return [...this.handlers.keys()];
  }
}
