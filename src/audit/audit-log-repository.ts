import type { DrizzleDb } from "../db/index.js";
import { auditLog } from "../db/schema/index.js";
import type { AuditEntry } from "./schema.js";

/** Append-only storage for audit entries. */
export interface IAuditLogRepository {
  insert(entry: AuditEntry): Promise<void>;
}

export class DrizzleAuditLogRepository implements IAuditLogRepository {
  constructor(private readonly db: DrizzleDb) {}

  async insert(entry: AuditEntry): Promise<void> {
    await this.db.insert(auditLog).values({
      id: entry.id,
      timestamp: entry.timestamp,
      userId: entry.user_id,
      action: entry.action,
      resourceType: entry.resource_type,
      resourceId: entry.resource_id,
      description: entry.description,
      ipAddress: entry.ip_address,
      userAgent: entry.user_agent,
    });
  }
}

/** Keeps entries in an array; for tests and development without a database. */
export class InMemoryAuditLogRepository implements IAuditLogRepository {
  readonly entries: AuditEntry[] = [];

  async insert(entry: AuditEntry): Promise<void> {
    this.entries.push(entry);
  }
}
