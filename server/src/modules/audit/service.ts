import { AuditLog, type AuditTargetType } from "./model.js";
import { connectMongo } from "../../config/db.js";
import { logger, redact } from "../../config/logger.js";

export type AuditEntry = {
  actorId: string;
  action: string;
  target: { type: AuditTargetType; id: string };
  diff?: unknown;
};

/** Best-effort: an audit failure never fails the admin operation. */
export async function writeAudit(entry: AuditEntry): Promise<void> {
  try {
    await AuditLog.create({ ...entry, diff: redact(entry.diff) });
  } catch (err: unknown) {
    logger.warn("audit.write_failed", {
      action: entry.action,
      message: err instanceof Error ? err.message : String(err),
    });
  }
}

export async function listAudit(filters: { action?: string; limit: number }) {
  await connectMongo();
  const docs = await AuditLog.find(filters.action ? { action: filters.action } : {})
    .sort({ at: -1 })
    .limit(filters.limit)
    .lean();
  return docs.map((d) => ({
    id: String(d._id),
    actorId: String(d.actorId),
    action: d.action,
    target: d.target,
    diff: d.diff,
    at: d.at,
  }));
}
