export type { IAuditLogRepository } from "./audit-log-repository.js";
export { DrizzleAuditLogRepository, InMemoryAuditLogRepository } from "./audit-log-repository.js";
export { AuditLogger } from "./logger.js";
export type { AuditAction, AuditEntry, AuditEntryInput, ResourceType } from "./schema.js";
