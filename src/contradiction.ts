import { log } from "./logger.js";
import { roundScore } from "./ranking.js";
import { normalizeText } from "./text.js";
import type { ContradictionRef, MemvaultConfig } from "./types.js";
import type { VectorIndex } from "./vector/types.js";

export interface ContradictionCheck {
  text: string;
  vector: number[];
  modelName: string;
  workspaceId: string;
  /** Id of the version being superseded by this write, if any. */
  excludeId?: string | null;
}

export type ContradictionConfig = Pick<
  MemvaultConfig,
  "contradictionSimilarityThreshold" | "contradictionCandidates"
>;

/**
 * Flags active entries of the same model/workspace that embed close to a new
 * learning but say something different.
 */
export class ContradictionDetector {
  constructor(
    private readonly index: VectorIndex,
    private readonly collection: string,
    private readonly config: ContradictionConfig,
  ) {}

  /** Best-effort: any backend failure yields no contradictions. */
  async detect(check: ContradictionCheck): Promise<ContradictionRef[]> {
    try {
      if ((await this.index.count(this.collection)) === 0) return [];

      const hits = await this.index.query(this.collection, check.vector, {
        filter: { modelName: check.modelName, workspaceId: check.workspaceId, status: "active" },
        limit: this.config.contradictionCandidates,
      });

      const normalized = normalizeText(check.text);
      const found: ContradictionRef[] = [];
      for (const hit of hits) {
        if (check.excludeId && hit.id === check.excludeId) continue;
        if (hit.metadata.status !== "active") continue;
        const similarity = 1 - hit.distance;
        if (similarity < this.config.contradictionSimilarityThreshold) continue;
        if (normalizeText(hit.document) === normalized) continue;
        const key = hit.metadata.learningKey;
        found.push({
          id: hit.id,
          text: hit.document,
          similarity: roundScore(similarity),
          learningKey: typeof key === "string" ? key : "",
        });
      }
      if (found.length > 0) {
        log.debug(`found ${found.length} contradiction(s) for model ${check.modelName}`);
      }
      return found;
    } catch (err) {
      log.warn(`contradiction detection failed: ${err instanceof Error ? err.message : String(err)}`);
      return [];
    }
  }
}
