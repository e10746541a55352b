/**
 * Core type definitions for envsync
 */

// Catalog Types
export type RetrievalCapability = 'listable' | 'singleton';

export type DependencyKind = 'independent' | 'dependent';

/**
 * Routes an assignment relation to the call that attaches an existing entity
 * instead of creating a new one
 */
export interface AssignmentRoute {
  /** Resource type whose mapping translates the listed record's id */
  memberType: string;
  resourceType: string;
  command: string;
  memberParameter: string;
}

export interface ResourceDescriptor {
  name: string;
  /** List command for listable resources, get command for singletons */
  command: string;
  retrievalCapability: RetrievalCapability;
  dependencyKind: DependencyKind;
  sourceType?: string;
  /** Request parameter carrying the source identifier */
  parameter?: string;
  assignment?: AssignmentRoute;
}

export type RelationKind = 'membership' | 'role-grant' | 'group-assignment';

// Record Types
export type ResourceRecord = Record<string, unknown>;

export type IdMapping = Record<string, Record<string, string>>;

// Configuration Types
export interface OktaConfig {
  orgUrl: string;
  token: string;
  orgName: string;
  configFilePath?: string;
  allowAnyOrg: boolean;
}

export interface ClientOptions {
  timeout: number;
  maxRetries: number;
  retryDelay: number;
}

export interface BackupOptions {
  outputDir: string;
}

export interface RestoreOptions {
  inputDir: string;
  mappingPath?: string;
  resume: boolean;
}

export interface ReportingOptions {
  verbose: boolean;
  logPath: string;
}

export interface EnvSyncConfig {
  okta: OktaConfig;
  catalogPath?: string;
  client: ClientOptions;
  backup: BackupOptions;
  restore: RestoreOptions;
  reporting: ReportingOptions;
}

// Result Types
export type OperationMode = 'backup' | 'restore';

export type Phase = 'singleton' | 'first-pass' | 'second-pass' | 'association';

export type ErrorType =
  | 'catalog'
  | 'configuration'
  | 'persistence'
  | 'backend'
  | 'resolution'
  | 'unknown';

export interface SyncIssue {
  type: ErrorType;
  message: string;
  timestamp: Date;
  recoverable: boolean;
  phase?: Phase;
  resourceType?: string;
  command?: string;
  identifier?: string;
}

export interface PhaseResult {
  phase: Phase;
  processed: number;
  succeeded: number;
  skipped: number;
  failed: number;
}

// Report Types
export interface Report {
  timestamp: Date;
  mode: OperationMode;
  target: string;
  summary: {
    recordsProcessed: number;
    recordsSucceeded: number;
    recordsSkipped: number;
    recordsFailed: number;
    mappingsAdded: number;
    executionTime: number;
  };
  details: {
    phases: PhaseResult[];
    issues: SyncIssue[];
  };
}
