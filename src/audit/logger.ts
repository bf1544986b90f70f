import crypto from "node:crypto";
import { logger } from "../config/logger.js";
import type { IAuditLogRepository } from "./audit-log-repository.js";
import type { AuditEntry, AuditEntryInput } from "./schema.js";

/**
 * Append-only audit log writer.
 *
 * A failed write is logged and resolves null; `log` never rejects.
 */
export class AuditLogger {
  constructor(private readonly repo: IAuditLogRepository) {}

  /** Append a new audit entry. Returns the created entry, or null if it could not be stored. */
  async log(input: AuditEntryInput): Promise<AuditEntry | null> {
    const entry: AuditEntry = {
      id: crypto.randomUUID(),
      timestamp: Date.now(),
      user_id: input.userId,
      action: input.action,
      resource_type: input.resourceType,
      resource_id: input.resourceId ?? null,
      description: input.description ?? null,
      ip_address: input.ipAddress ?? null,
      user_agent: input.userAgent ?? null,
    };

    try {
      await this.repo.insert(entry);
      return entry;
    } catch (err) {
      logger.error("Failed to write audit entry", {
        action: entry.action,
        userId: entry.user_id,
        error: err instanceof Error ? err.message : String(err),
      });
      return null;
    }
  }
}
