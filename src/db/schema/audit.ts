import { bigint, index, pgTable, text } from "drizzle-orm/pg-core";

export const auditLog = pgTable(
  "audit_log",
  {
    id: text("id").primaryKey(),
    timestamp: bigint("timestamp", { mode: "number" }).notNull(),
    userId: text("user_id").notNull(),
    action: text("action").notNull(),
    resourceType: text("resource_type").notNull(),
    resourceId: text("resource_id"),
    description: text("description"),
    ipAddress: text("ip_address"),
    userAgent: text("user_agent"),
  },
  (table) => [
    index("idx_audit_timestamp").on(table.timestamp),
    index("idx_audit_user_id").on(table.userId),
    index("idx_audit_action").on(table.action),
    index("idx_audit_resource").on(table.resourceType, table.resourceId),
  ],
);
