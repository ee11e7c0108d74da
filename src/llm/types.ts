/**
 * Quality Model Types
 */

export type VerdictKind = 'high_quality' | 'low_quality' | 'unparseable';

/**
 * Why a verdict ended up unparseable. Parse ambiguity and provider failure
 * are kept apart so diagnostics can tell a confused model from a dead one.
 */
export type VerdictFailure = 'no_phrase' | 'both_phrases' | 'transient_error' | 'fatal_error';

export interface Verdict {
  readonly kind: VerdictKind;
  readonly sourceProviderId: string;
  readonly rawText: string;
  readonly latencyMs: number;
  readonly failure?: VerdictFailure;
}

export type ProviderKind = 'ollama' | 'openai' | 'anthropic';

export interface LLMProviderConfig {
  provider: ProviderKind;
  model: string;
  /** Optional for cloud providers (they have defaults) */
  baseUrl?: string;
  apiKey?: string;
  /** Overrides the generated `${model}-${provider}` id */
  id?: string;
  options?: {
    temperature?: number;
    maxTokens?: number;
    evaluationTimeoutMs?: number;
    titleTimeoutMs?: number;
    maxAttempts?: number;
    retryDelayMs?: number;
    evaluationMaxChars?: number;
    titleMaxChars?: number;
  };
}

export interface LLMProvidersConfigFile {
  providers: LLMProviderConfig[];
}

/**
 * One model endpoint queried by the ensemble.
 *
 * Implementations never reject: a failed evaluation resolves to an
 * `unparseable` verdict and a failed title request resolves to `''`.
 */
export interface QualityProvider {
  readonly id: string;
  evaluate(content: string, promptTemplate: string, documentId: string): Promise<Verdict>;
  generateTitle(content: string): Promise<string>;
  getModelInfo(): { name: string; provider: ProviderKind };
}
