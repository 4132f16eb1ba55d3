import type { BaselineStats, DriftIncident, TraceEvent } from '../models/types.js';
import { createLogger, type StructuredLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/json.js';
import { BaseDetector } from './base.js';
import { cosineSimilarity } from './similarity.js';

/**
 * Text → fixed-length vector. Supplied by the host; must be deterministic for
 * the same input. Implementations should stop work when `signal` aborts.
 */
export type EmbedFunction = (
  text: string,
  signal: AbortSignal,
) => ArrayLike<number> | Promise<ArrayLike<number>>;

export type SimilarityObserver = (event: TraceEvent, similarity: number) => void;

export interface GoalDriftOptions {
  embed?: EmbedFunction;
  goalDescription?: string;
  similarityThreshold?: number;
  embedTimeoutMs?: number;
  onSimilarity?: SimilarityObserver;
  logger?: StructuredLogger;
  enabled?: boolean;
}

const MIN_OUTPUT_LENGTH = 20;
const MAX_EMBED_CHARS = 512;
const MIN_BASELINE_STD = 0.05;

function round4(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

/** The model's textual answer, from `output_data.text` or `output_data.output`. */
export function extractOutputText(outputData: Record<string, unknown>): string {
  const { text, output } = outputData;
  if (typeof text === 'string' && text.length > 0) return text;
  if (typeof output === 'string') return output;
  return '';
}

/**
 * Compares model output against the declared goal by cosine similarity of
 * their embeddings. Without an embed function or a goal, nothing is flagged.
 */
export class GoalDriftDetector extends BaseDetector {
  readonly kind = 'goal_drift' as const;
  readonly similarityThreshold: number;
  readonly embedTimeoutMs: number;
  private embed: EmbedFunction | undefined;
  private goal: string;
  private goalVector: ArrayLike<number> | null = null;
  /** Bumped by setGoal so an in-flight goal embedding is not cached stale. */
  private goalVersion = 0;
  private onSimilarity: SimilarityObserver | undefined;
  private logger: StructuredLogger;

  constructor(options: GoalDriftOptions = {}) {
    super(options.enabled ?? true);
    this.embed = options.embed;
    this.goal = options.goalDescription ?? '';
    this.similarityThreshold = options.similarityThreshold ?? 0.5;
    this.embedTimeoutMs = options.embedTimeoutMs ?? 5_000;
    this.onSimilarity = options.onSimilarity;
    this.logger = options.logger ?? createLogger();
  }

  get goalDescription(): string {
    return this.goal;
  }

  /** Replace the goal; its embedding is recomputed on next use. */
  setGoal(goalDescription: string): void {
    this.goal = goalDescription;
    this.goalVector = null;
    this.goalVersion++;
  }

  protected async evaluate(event: TraceEvent, baseline: BaselineStats | null): Promise<DriftIncident | null> {
    if (event.action_type !== 'model_request') return null;

    const outputText = extractOutputText(event.output_data);
    if (outputText.trim().length < MIN_OUTPUT_LENGTH) return null;

    const embed = this.embed;
    if (!embed || !this.goal) return null;

    let similarity: number;
    try {
      const goalVector = await this.goalEmbedding(embed);
      const outputVector = await this.embedWithTimeout(embed, outputText.slice(0, MAX_EMBED_CHARS));
      similarity = cosineSimilarity(goalVector, outputVector);
      if (!Number.isFinite(similarity)) {
        throw new Error(`Embedding produced a non-finite similarity (${similarity})`);
      }
    } catch (err) {
      this.logger.warn('Goal drift check failed', {
        agent_id: event.agent_id,
        run_id: event.run_id,
        error: errorMessage(err),
      });
      return null;
    }

    this.onSimilarity?.(event, similarity);

    const threshold = this.effectiveThreshold(baseline);
    if (similarity >= threshold) return null;

    const score = threshold > 0 ? Math.min(1, (threshold - similarity) / threshold) : 1;
    const baselineInfo =
      baseline && baseline.mean_goal_similarity > 0
        ? ` (baseline: ${baseline.mean_goal_similarity.toFixed(2)})`
        : '';

    return this.createIncident(event, {
      score,
      message: `Goal drift: similarity dropped to ${similarity.toFixed(2)}${baselineInfo}`,
      suggested_action: 'Review context window for off-topic injection or prompt degradation',
      context: {
        similarity: round4(similarity),
        threshold: round4(threshold),
        output_preview: outputText.slice(0, 200),
        goal_preview: this.goal.slice(0, 200),
      },
    });
  }

  /** Calibration can only raise the configured threshold. */
  effectiveThreshold(baseline: BaselineStats | null): number {
    if (!baseline || !baseline.is_calibrated || baseline.mean_goal_similarity <= 0) {
      return this.similarityThreshold;
    }
    return Math.max(
      this.similarityThreshold,
      baseline.mean_goal_similarity - 2 * Math.max(baseline.std_goal_similarity, MIN_BASELINE_STD),
    );
  }

  private async goalEmbedding(embed: EmbedFunction): Promise<ArrayLike<number>> {
    if (this.goalVector) return this.goalVector;
    const version = this.goalVersion;
    const vector = await this.embedWithTimeout(embed, this.goal);
    if (version === this.goalVersion) {
      this.goalVector = vector;
    }
    return vector;
  }

  private async embedWithTimeout(embed: EmbedFunction, text: string): Promise<ArrayLike<number>> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new Error(`Embedding timed out after ${this.embedTimeoutMs}ms`));
      }, this.embedTimeoutMs);
    });

    try {
      return await Promise.race([Promise.resolve(embed(text, controller.signal)), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
