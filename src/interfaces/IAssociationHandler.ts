import { PhaseResult, RelationKind, ResourceDescriptor, SyncIssue } from '../types';
import { IBackend } from './IBackend';
import { IBackupStore } from './IBackupStore';
import { IIdMappingStore } from './IIdMappingStore';
import { IReporter } from './IReporter';

export interface AssociationContext {
  descriptor: ResourceDescriptor;
  backend: IBackend;
  mapping: IIdMappingStore;
  store: IBackupStore;
  reporter: IReporter;
}

export interface AssociationResult extends PhaseResult {
  /** Issues already logged through the reporter */
  issues: SyncIssue[];
}

/**
 * Interface for relation types restored by resolving two endpoint identifiers
 */
export interface IAssociationHandler {
  readonly kind: RelationKind;

  /**
   * Restore every persisted relation of the descriptor's type
   */
  restore(context: AssociationContext): Promise<AssociationResult>;
}
