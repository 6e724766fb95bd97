import { randomUUID } from "node:crypto";
import { COLLECTIONS } from "./collections.js";
import type { Embedder } from "./embedding.js";
import { ValidationError } from "./errors.js";
import { log } from "./logger.js";
import { roundScore } from "./ranking.js";
import { StoredSkillSchema } from "./schemas.js";
import type {
  CreateSkillInput,
  LifecycleStatus,
  MemvaultConfig,
  SkillEntry,
  SkillSearchHit,
  SkillWriteResult,
  UpdateSkillInput,
} from "./types.js";
import type { MetadataFilter, StoredRecord, VectorIndex } from "./vector/types.js";

export type SkillConfig = Pick<
  MemvaultConfig,
  "skillConfidenceDefault" | "skillConfidenceMin" | "skillSearchTopK" | "skillUsageBoostRate"
>;

export interface SkillSearchOptions {
  topK?: number;
  minConfidence?: number;
  workspaceId?: string;
}

export interface SkillListOptions {
  workspaceId?: string;
  status?: LifecycleStatus;
}

const STEP_LINE = /^(?:\d+\s*[.)]|[-*•]\s|step\b)/i;
const STEP_PREFIX = /^(?:step\s*\d*\s*[:.)-]?|\d+\s*[.)]|[-*•])\s*/i;
const EXAMPLE_LINE = /\bexample|e\.g\.|for instance/i;
const CONSTRAINT_LINE = /\bnever\b|must not|do not|don't|forbidden|prohibited|not allowed/i;

/** Text embedded for a skill: goal plus every step, example and constraint. */
export function skillDocument(skill: Pick<SkillEntry, "goal" | "steps" | "examples" | "constraints">): string {
  return [skill.goal, ...skill.steps, ...skill.examples, ...skill.constraints]
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
    .join(" | ");
}

export interface DialogSkillParts {
  goal: string;
  steps: string[];
  examples: string[];
  constraints: string[];
}

/** First non-empty line is the goal; later lines are sorted into steps, examples and constraints. */
export function parseDialog(text: string): DialogSkillParts {
  const lines = text
    .split("\n")
    .map((l) => l.trim())
    .filter((l) => l.length > 0);
  const [goal = "", ...rest] = lines;
  const parts: DialogSkillParts = { goal, steps: [], examples: [], constraints: [] };
  for (const line of rest) {
    if (STEP_LINE.test(line)) {
      const step = line.replace(STEP_PREFIX, "").trim();
      if (step) parts.steps.push(step);
    } else if (EXAMPLE_LINE.test(line)) {
      parts.examples.push(line);
    } else if (CONSTRAINT_LINE.test(line)) {
      parts.constraints.push(line);
    }
  }
  return parts;
}

function checkConfidence(value: number): number {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new ValidationError(`confidence must be within [0, 1] (got ${value})`);
  }
  return value;
}

function toPayload(skill: SkillEntry): object {
  const { id: _id, ...rest } = skill;
  return { kind: "skill", ...rest };
}

function decodeSkill(record: StoredRecord): SkillEntry | null {
  const parsed = StoredSkillSchema.safeParse(record.metadata);
  if (!parsed.success) {
    log.debug(`skipping undecodable skill ${record.id}`);
    return null;
  }
  const { kind: _kind, createdAtTs: _createdAtTs, ...skill } = parsed.data;
  return { id: record.id, ...skill };
}

function decodeSkills(records: StoredRecord[]): SkillEntry[] {
  const out: SkillEntry[] = [];
  for (const record of records) {
    const skill = decodeSkill(record);
    if (skill) out.push(skill);
  }
  return out;
}

/** Versioned, confidence-scored procedures with usage-driven reinforcement. */
export class SkillEngine {
  constructor(
    private readonly index: VectorIndex,
    private readonly embedder: Embedder,
    private readonly config: SkillConfig,
    private readonly collection: string = COLLECTIONS.skills,
  ) {}

  private async write(skill: SkillEntry): Promise<void> {
    const vector = await this.embedder.embed(skillDocument(skill));
    await this.index.upsert(this.collection, [
      { id: skill.id, vector, document: skillDocument(skill), metadata: toPayload(skill) },
    ]);
  }

  private async rewrite(skill: SkillEntry): Promise<void> {
    await this.index.updateMetadata(this.collection, [skill.id], [toPayload(skill)]);
  }

  async getSkill(id: string): Promise<SkillEntry | null> {
    try {
      const [record] = await this.index.get(this.collection, { ids: [id] });
      return record ? decodeSkill(record) : null;
    } catch (err) {
      log.error(`loading skill ${id} failed`, err);
      return null;
    }
  }

  async createSkill(input: CreateSkillInput): Promise<SkillWriteResult> {
    const goal = input.goal.trim();
    if (!goal) throw new ValidationError("skill goal must not be blank");
    const confidence = checkConfidence(input.confidence ?? this.config.skillConfidenceDefault);
    const now = new Date().toISOString();

    const skill: SkillEntry = {
      id: randomUUID(),
      canonicalId: randomUUID(),
      goal,
      steps: input.steps ?? [],
      examples: input.examples ?? [],
      constraints: input.constraints ?? [],
      sources: input.sources ?? [],
      confidence,
      version: 1,
      tags: input.tags ?? [],
      status: "active",
      modelName: input.modelName ?? "",
      workspaceId: input.workspaceId ?? "",
      usageCount: 0,
      createdAt: now,
      updatedAt: now,
    };
    await this.write(skill);
    log.info(`skill created ${skill.canonicalId}: ${goal}`);
    return { id: skill.id, canonicalId: skill.canonicalId, version: 1, previousVersionId: null };
  }

  /**
   * Writes a new version under the same canonical id, then supersedes the
   * current record. Returns null for a missing or deleted skill.
   */
  async updateSkill(id: string, patch: UpdateSkillInput): Promise<SkillWriteResult | null> {
    const current = await this.getSkill(id);
    if (!current || current.status === "deleted") return null;

    const goal = patch.goal !== undefined ? patch.goal.trim() : current.goal;
    if (!goal) throw new ValidationError("skill goal must not be blank");
    const confidence = patch.confidence !== undefined ? checkConfidence(patch.confidence) : current.confidence;
    const now = new Date().toISOString();

    const next: SkillEntry = {
      ...current,
      id: randomUUID(),
      goal,
      steps: patch.steps ?? current.steps,
      examples: patch.examples ?? current.examples,
      constraints: patch.constraints ?? current.constraints,
      sources: patch.sources ?? current.sources,
      tags: patch.tags ?? current.tags,
      confidence,
      version: current.version + 1,
      previousVersionId: current.id,
      status: "active",
      createdAt: current.createdAt,
      updatedAt: now,
    };
    await this.write(next);
    await this.rewrite({ ...current, status: "superseded", updatedAt: now });
    log.info(`skill ${next.canonicalId} updated to v${next.version}`);
    return { id: next.id, canonicalId: next.canonicalId, version: next.version, previousVersionId: current.id };
  }

  /** Soft delete; false when missing or already deleted. */
  async deleteSkill(id: string): Promise<boolean> {
    const current = await this.getSkill(id);
    if (!current || current.status === "deleted") return false;
    const now = new Date().toISOString();
    await this.rewrite({ ...current, status: "deleted", deletedAt: now, updatedAt: now });
    return true;
  }

  async searchSkills(query: string, options: SkillSearchOptions = {}): Promise<SkillSearchHit[]> {
    const topK = Math.max(1, options.topK ?? this.config.skillSearchTopK);
    const minConfidence = options.minConfidence ?? this.config.skillConfidenceMin;
    const filter: MetadataFilter = { kind: "skill", status: "active" };
    if (options.workspaceId !== undefined) filter.workspaceId = options.workspaceId;

    try {
      const vector = await this.embedder.embed(query);
      const hits = await this.index.query(this.collection, vector, { filter, limit: topK });
      const out: SkillSearchHit[] = [];
      for (const hit of hits) {
        const skill = decodeSkill(hit);
        if (!skill || skill.status !== "active") continue;
        if (skill.confidence < minConfidence) continue;
        out.push({ ...skill, relevance: roundScore(1 - hit.distance) });
      }
      return out;
    } catch (err) {
      log.error("skill search failed", err);
      return [];
    }
  }

  /** Bumps usage and moves confidence toward 1 by the boost rate. Active skills only. */
  async recordUsage(id: string): Promise<boolean> {
    const current = await this.getSkill(id);
    if (!current || current.status !== "active") return false;
    const confidence = current.confidence + (1 - current.confidence) * this.config.skillUsageBoostRate;
    await this.rewrite({
      ...current,
      usageCount: current.usageCount + 1,
      confidence: Math.min(1, confidence),
      updatedAt: new Date().toISOString(),
    });
    return true;
  }

  async createFromDialog(text: string, modelName?: string, workspaceId?: string): Promise<SkillWriteResult> {
    const parts = parseDialog(text);
    return this.createSkill({ ...parts, sources: ["dialog"], modelName, workspaceId });
  }

  async listSkills(options: SkillListOptions = {}): Promise<SkillEntry[]> {
    const filter: MetadataFilter = { kind: "skill" };
    if (options.workspaceId !== undefined) filter.workspaceId = options.workspaceId;
    if (options.status) filter.status = options.status;
    try {
      return decodeSkills(await this.index.get(this.collection, { filter }));
    } catch (err) {
      log.error("listing skills failed", err);
      return [];
    }
  }

  async listSkillVersions(canonicalId: string): Promise<SkillEntry[]> {
    try {
      const skills = decodeSkills(
        await this.index.get(this.collection, { filter: { kind: "skill", canonicalId } }),
      );
      return skills.sort((a, b) => a.version - b.version);
    } catch (err) {
      log.error(`listing versions of skill ${canonicalId} failed`, err);
      return [];
    }
  }
}
