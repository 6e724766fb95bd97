import { randomUUID } from "node:crypto";
import { AUDIT_VECTOR, COLLECTIONS } from "./collections.js";
import { log } from "./logger.js";
import { StoredAuditSchema } from "./schemas.js";
import { epochSeconds } from "./text.js";
import type { AuditEvent, AuditEventType, ScalarValue } from "./types.js";
import type { MetadataFilter, VectorIndex } from "./vector/types.js";

export interface AuditInput {
  modelName?: string;
  workspaceId?: string;
  entryId?: string;
  details?: Record<string, ScalarValue | undefined>;
}

export interface AuditQuery {
  limit?: number;
  workspaceId?: string;
  modelName?: string;
}

function compactDetails(details: AuditInput["details"]): Record<string, ScalarValue> {
  const out: Record<string, ScalarValue> = {};
  for (const [key, value] of Object.entries(details ?? {})) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}

/** Append-only audit trail stored beside the knowledge collections. */
export class AuditLog {
  constructor(private readonly index: VectorIndex) {}

  /** Never throws: a failed append is logged and the triggering write stands. */
  async append(eventType: AuditEventType, input: AuditInput = {}): Promise<string | null> {
    const id = randomUUID();
    const now = new Date();
    try {
      await this.index.upsert(COLLECTIONS.audit, [
        {
          id,
          vector: AUDIT_VECTOR,
          document: eventType,
          metadata: {
            kind: "audit",
            eventType,
            modelName: input.modelName ?? "",
            workspaceId: input.workspaceId ?? "",
            entryId: input.entryId ?? "",
            createdAt: now.toISOString(),
            createdAtTs: epochSeconds(now),
            details: compactDetails(input.details),
          },
        },
      ]);
      return id;
    } catch (err) {
      log.error(`audit append failed (${eventType})`, err);
      return null;
    }
  }

  /** Newest first. */
  async list(query: AuditQuery = {}): Promise<AuditEvent[]> {
    const filter: MetadataFilter = { kind: "audit" };
    if (query.workspaceId !== undefined) filter.workspaceId = query.workspaceId;
    if (query.modelName !== undefined) filter.modelName = query.modelName;

    try {
      const records = await this.index.get(COLLECTIONS.audit, { filter });
      const events: AuditEvent[] = [];
      for (const record of records) {
        const parsed = StoredAuditSchema.safeParse(record.metadata);
        if (!parsed.success) {
          log.debug(`skipping undecodable audit record ${record.id}`);
          continue;
        }
        const { eventType, modelName, workspaceId, entryId, createdAt, details } = parsed.data;
        events.push({ id: record.id, eventType, modelName, workspaceId, entryId, createdAt, details });
      }
      // Stable sort keeps insertion order for equal timestamps; reversing puts newest first.
      events.sort((a, b) => a.createdAt.localeCompare(b.createdAt));
      events.reverse();
      return events.slice(0, Math.max(0, query.limit ?? 100));
    } catch (err) {
      log.error("listing audit events failed", err);
      return [];
    }
  }
}
