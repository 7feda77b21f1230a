export * from './types.js';
export * from './errors.js';
export { loadEngineConfig, defaultEngineConfig } from './config.js';
export type { EngineConfig, RetractionPolicy, StorageKind, LogLevel } from './config.js';
export { createLogger } from './logger.js';
export type { Logger } from './logger.js';
export { AuditLogger } from './audit.js';
export type { AuditEvent, AuditEventType, AuditDetails } from './audit.js';
export { metrics, MetricsRegistry } from './metrics.js';
export { withSpan } from './tracing.js';
export { DatabaseConnection } from './db/database.js';
export type { EngineStore, NodeReader } from './store/types.js';
export { MemoryStore } from './store/memory.js';
export { SqliteStore } from './store/sqlite.js';
export { TreeNavigator } from './tree.js';
export { PermissionResolver, scopeCovers } from './permissions.js';
export type { ModeratorLevel } from './permissions.js';
export { ModerationStateMachine } from './moderation.js';
export { PublicationPropagator } from './publication.js';
export type { AuditSink } from './publication.js';
export { WorkflowOrchestrator } from './workflow.js';
export type { WorkflowOptions, CreateOptions, EditOptions, CopyOptions, ApproveOptions } from './workflow.js';
export { ModerationEngine, createEngine } from './engine.js';
export type { EngineRuntime } from './engine.js';
export type { GrantInput } from './schemas.js';
