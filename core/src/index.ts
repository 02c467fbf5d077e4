export * from './models/lineage.js';
export * from './models/graph.js';
export * from './utils/errors.js';
export * from './utils/constants.js';
export * from './utils/logger.js';
export * from './utils/config.js';
export * from './utils/specId.js';
export * from './utils/keyedLock.js';
export * from './utils/dependencyGraph.js';
export * from './utils/graphCodec.js';
export * from './utils/backlogParser.js';
export * from './services/migrations.js';
export * from './services/lineageStore.js';
export * from './services/syncEngine.js';
export * from './services/readinessEngine.js';
export * from './services/gitService.js';
export * from './services/worktreeManager.js';
export * from './services/lifecycleService.js';
