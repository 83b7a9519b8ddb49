import mongoose, { Schema, type Model, type Types } from "mongoose";

export const AUDIT_TARGETS = ["user", "brand", "model", "car", "rental"] as const;
export type AuditTargetType = (typeof AUDIT_TARGETS)[number];

export interface AuditLogDoc {
  _id: Types.ObjectId;
  actorId: Types.ObjectId;
  /** e.g. "car.update", "rental.cancel" */
  action: string;
  target: { type: AuditTargetType; id: string };
  diff?: unknown;
  at: Date;
}

const AuditLogSchema = new Schema<AuditLogDoc>(
  {
    actorId: { type: Schema.Types.ObjectId, ref: "User", required: true, index: true },
    action: { type: String, required: true, index: true },
    target: {
      type: { type: String, enum: AUDIT_TARGETS, required: true },
      id: { type: String, required: true },
    },
    diff: { type: Schema.Types.Mixed },
    at: { type: Date, default: () => new Date(), index: true },
  },
  { versionKey: false }
);

export const AuditLog: Model<AuditLogDoc> =
  mongoose.models.AuditLog || mongoose.model<AuditLogDoc>("AuditLog", AuditLogSchema, "audit_logs");
