export * from './AssociationHandler';
export { AssociationHandlerRegistry } from './AssociationHandlerRegistry';
export { GroupAssignmentHandler } from './GroupAssignmentHandler';
export { MembershipHandler } from './MembershipHandler';
export { RoleGrantHandler } from './RoleGrantHandler';
