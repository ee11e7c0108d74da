/**
 * Ensemble Evaluator - Multi-model quality voting
 *
 * Sends the same document to every configured model and reconciles the
 * answers: a verdict kind needs a strict majority of the parseable answers.
 * Unparseable answers are recorded but do not vote.
 */

import type { QualityProvider, Verdict, VerdictKind } from '../llm/types.js';
import { QUALITY_PROMPT } from '../llm/prompts.js';
import { isParseable, unparseableVerdict } from '../llm/verdict.js';
import { logger } from '../utils/logger.js';

export interface EnsembleResult {
  /** One verdict per provider, in configured provider order */
  verdicts: Verdict[];
  consensus?: Verdict;
  reached: boolean;
}

export interface EnsembleConfig {
  /** Prompt prepended to the document content */
  promptTemplate: string;
  /** Run providers in parallel (faster) or sequential (gentler on a single local backend) */
  parallel: boolean;
  /**
   * Upper bound on one provider's whole call including retries. Providers
   * enforce their own timeouts; this guards against one that does not.
   */
  adapterDeadlineMs?: number;
}

const DEFAULT_CONFIG: EnsembleConfig = {
  promptTemplate: QUALITY_PROMPT,
  parallel: true,
};

/**
 * Strict majority among parseable verdicts. Ties and empty votes are no consensus.
 */
export function computeConsensus(verdicts: readonly Verdict[]): EnsembleResult {
  const parseable = verdicts.filter(isParseable);
  const counts = new Map<VerdictKind, number>();
  for (const verdict of parseable) {
    counts.set(verdict.kind, (counts.get(verdict.kind) ?? 0) + 1);
  }

  for (const [kind, count] of counts) {
    if (count * 2 > parseable.length) {
      return {
        verdicts: [...verdicts],
        consensus: parseable.find(verdict => verdict.kind === kind),
        reached: true,
      };
    }
  }

  return { verdicts: [...verdicts], reached: false };
}

export class EnsembleEvaluator {
  private config: EnsembleConfig;

  constructor(
    private providers: QualityProvider[],
    config: Partial<EnsembleConfig> = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  getProviders(): QualityProvider[] {
    return [...this.providers];
  }

  /**
   * Evaluate one document with every provider and compute consensus
   */
  async evaluate(
    content: string,
    documentId: string,
    providers: QualityProvider[] = this.providers
  ): Promise<EnsembleResult> {
    logger.info(`Evaluating document ${documentId} with ${providers.length} model(s)`);

    const verdicts = await this.collectVerdicts(content, documentId, providers);

    for (const verdict of verdicts) {
      logger.info(`Model ${verdict.sourceProviderId} result for document ${documentId}: ${verdict.kind}`, {
        latencyMs: verdict.latencyMs,
        failure: verdict.failure,
      });
    }

    const result = computeConsensus(verdicts);
    if (result.reached && result.consensus) {
      logger.info(`Consensus for document ${documentId}: ${result.consensus.kind}`);
    } else {
      logger.warn(`No consensus for document ${documentId}`, {
        votes: verdicts.map(verdict => verdict.kind),
      });
    }
    return result;
  }

  private async collectVerdicts(
    content: string,
    documentId: string,
    providers: QualityProvider[]
  ): Promise<Verdict[]> {
    if (this.config.parallel) {
      // Promise.all keeps input order whatever order the calls finish in
      return Promise.all(providers.map(provider => this.runSingleProvider(provider, content, documentId)));
    }

    const verdicts: Verdict[] = [];
    for (const provider of providers) {
      verdicts.push(await this.runSingleProvider(provider, content, documentId));
    }
    return verdicts;
  }

  /**
   * Run one provider in isolation; whatever it does, the result is a verdict
   */
  private async runSingleProvider(
    provider: QualityProvider,
    content: string,
    documentId: string
  ): Promise<Verdict> {
    const startTime = Date.now();
    let timer: NodeJS.Timeout | undefined;

    try {
      const call = provider.evaluate(content, this.config.promptTemplate, documentId);
      const deadlineMs = this.config.adapterDeadlineMs;
      if (deadlineMs === undefined) {
        return await call;
      }

      const deadline = new Promise<Verdict>(resolve => {
        timer = setTimeout(() => {
          logger.warn(`Model ${provider.id} exceeded ${deadlineMs}ms for document ${documentId}, abandoning`);
          resolve(unparseableVerdict(provider.id, 'transient_error', Date.now() - startTime));
        }, deadlineMs);
      });
      return await Promise.race([call, deadline]);
    } catch (error) {
      logger.error(`Model ${provider.id} failed for document ${documentId}`, error);
      return unparseableVerdict(provider.id, 'fatal_error', Date.now() - startTime);
    } finally {
      if (timer) clearTimeout(timer);
    }
  }
}
