export * from './types';
export * from './errors';
export * from './interfaces';
export { ResourceCatalog, DEFAULT_CATALOG_PATH } from './catalog/ResourceCatalog';
export { OktaClient, OktaClientOptions, READ_ONLY_FIELDS } from './clients/OktaClient';
export { RouteTable, Route, HttpMethod, DEFAULT_ROUTES_PATH } from './clients/RouteTable';
export { ConfigLoader, ConfigLoadOptions, ConfigEnvironment } from './config/ConfigLoader';
export * from './handlers';
export { BackupStore } from './managers/BackupStore';
export { IdMappingStore, DEFAULT_MAPPING_FILENAME } from './managers/IdMappingStore';
export { BackupOrchestrator } from './orchestrators/BackupOrchestrator';
export { RestoreOrchestrator, RestoreSettings, RestoreState } from './orchestrators/RestoreOrchestrator';
export { OperationJournal, IssueContext } from './orchestrators/OperationJournal';
export { Reporter } from './reporters/Reporter';
export { PathNamespace } from './utils/PathNamespace';
