/** Resource types that appear in the audit trail. */
export type ResourceType = "user";

/** Audit actions recorded by the authentication flow. */
export type AuditAction = "create" | "login" | "token_refresh" | "password_change" | "view";

/** A single audit log entry as stored in the database. */
export interface AuditEntry {
  id: string;
  timestamp: number;
  user_id: string;
  action: AuditAction;
  resource_type: ResourceType;
  resource_id: string | null;
  description: string | null;
  ip_address: string | null;
  user_agent: string | null;
}

/** Parameters for creating a new audit entry (id and timestamp are generated). */
export interface AuditEntryInput {
  userId: string;
  action: AuditAction;
  resourceType: ResourceType;
  resourceId?: string | null;
  description?: string | null;
  ipAddress?: string | null;
  userAgent?: string | null;
}
