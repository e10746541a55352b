export * from './IBackend';
export * from './IBackupStore';
export * from './IIdMappingStore';
export * from './IReporter';
export * from './IAssociationHandler';
export * from './IOrchestrator';
