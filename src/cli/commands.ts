/**
 * CLI commands for running a batch and for inspecting or clearing the checkpoint
 */

import { loadAppConfig, ConfigError, type AppConfig, type Env } from '../config/index.js';
import { CheckpointStore } from '../checkpoint/CheckpointStore.js';
import type { CheckpointSummary } from '../checkpoint/types.js';
import { EnsembleEvaluator } from '../consensus/EnsembleEvaluator.js';
import { PaperlessClient } from '../documents/PaperlessClient.js';
import { ProviderFactory } from '../llm/ProviderFactory.js';
import { ProcessingPipeline } from '../pipeline/ProcessingPipeline.js';
import type { DocumentOutcome, PipelineStats } from '../pipeline/types.js';
import { logger, setLogLevel } from '../utils/logger.js';

export interface CliOptions {
  help: boolean;
  clearState: boolean;
  showProgress: boolean;
  /** Process documents the checkpoint already has */
  reprocess: boolean;
  /** Include documents that already carry tags */
  includeTagged: boolean;
  limit?: number;
}

export const USAGE = `Usage: doc-quality [options]

Evaluates documents with an ensemble of language models, tags them as
high or low quality and optionally renames high quality documents.

Options:
  --clear-state      Reset the checkpoint file and exit
  --show-progress    Print the checkpoint summary and exit
  --reprocess        Evaluate documents the checkpoint already has
  --include-tagged   Also evaluate documents that already have tags
  --limit=N          Process at most N documents (overrides MAX_DOCUMENTS)
  --help             Show this help

Environment variables:
  API_URL, API_TOKEN                   Document store connection
  LOW_QUALITY_TAG_ID, HIGH_QUALITY_TAG_ID
  LLM_PROVIDER, OLLAMA_URL, LLM_BASE_URL, LLM_API_KEY
  MODEL_NAME, SECOND_MODEL_NAME, THIRD_MODEL_NAME, NUM_LLM_MODELS
  LLM_PROVIDERS_CONFIG                 JSON file listing providers explicitly
  EVALUATION_TIMEOUT_MS, TITLE_TIMEOUT_MS, LLM_MAX_ATTEMPTS, LLM_RETRY_DELAY_MS,
  CONTENT_MAX_CHARS, TITLE_CONTENT_MAX_CHARS
                                       Provider options; with LLM_PROVIDERS_CONFIG
                                       they are defaults under each entry's options
  RENAME_DOCUMENTS, IGNORE_ALREADY_TAGGED, SKIP_PROCESSED
  STATE_FILE, MAX_DOCUMENTS, PROCESSING_DELAY_MS, LOG_LEVEL
`;

export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = {
    help: false,
    clearState: false,
    showProgress: false,
    reprocess: false,
    includeTagged: false,
  };

  for (const arg of argv) {
    if (arg === '--help' || arg === '-h') {
      options.help = true;
    } else if (arg === '--clear-state') {
      options.clearState = true;
    } else if (arg === '--show-progress') {
      options.showProgress = true;
    } else if (arg === '--reprocess') {
      options.reprocess = true;
    } else if (arg === '--include-tagged') {
      options.includeTagged = true;
    } else if (arg.startsWith('--limit=')) {
      const limit = Number(arg.split('=')[1]);
      if (!Number.isInteger(limit) || limit <= 0) {
        throw new ConfigError(`--limit expects a positive integer, got '${arg}'`);
      }
      options.limit = limit;
    } else {
      throw new ConfigError(`Unknown option: ${arg}`);
    }
  }

  return options;
}

export function formatSummary(summary: CheckpointSummary): string {
  return [
    `Checkpoint created:   ${summary.createdAt}`,
    `Last updated:         ${summary.lastUpdated}`,
    `Documents processed:  ${summary.totalProcessed}`,
    `  High quality:       ${summary.highQuality}`,
    `  Low quality:        ${summary.lowQuality}`,
    `  Unparseable:        ${summary.unparseable}`,
    `Consensus reached:    ${summary.consensusCount}`,
    `Errors:               ${summary.errorCount}`,
    `Total time:           ${summary.totalProcessingTimeSeconds.toFixed(1)}s`,
  ].join('\n');
}

export function formatStats(stats: PipelineStats): string {
  return [
    `Total documents:      ${stats.total}`,
    `Tagged:               ${stats.processed}`,
    `  High quality:       ${stats.highQuality}`,
    `  Low quality:        ${stats.lowQuality}`,
    `No consensus:         ${stats.noConsensus}`,
    `Skipped:              ${stats.skipped}`,
    `Errors:               ${stats.errors}`,
    `Duration:             ${(stats.durationMs / 1000).toFixed(1)}s`,
  ].join('\n');
}

export function describeOutcome(outcome: DocumentOutcome, index: number, total: number): string {
  const prefix = `[${index + 1}/${total}] Document ${outcome.documentId}:`;
  switch (outcome.status) {
    case 'skipped':
      return `${prefix} skipped (${outcome.reason === 'checkpoint' ? 'already processed' : 'already tagged'})`;
    case 'high_quality_tagged':
      if (outcome.titleError) {
        return `${prefix} high quality, not renamed (${outcome.titleError})`;
      }
      return outcome.newTitle ? `${prefix} high quality, renamed to '${outcome.newTitle}'` : `${prefix} high quality`;
    case 'low_quality_tagged':
      return `${prefix} low quality`;
    case 'no_consensus':
      return `${prefix} no consensus, left untouched`;
    case 'error':
      return `${prefix} error: ${outcome.error}`;
  }
}

async function runBatch(config: AppConfig, options: CliOptions): Promise<void> {
  const checkpoint = new CheckpointStore(config.processing.stateFile);
  checkpoint.load();

  const providers = ProviderFactory.createAll(config.providers);
  const evaluator = new EnsembleEvaluator(providers);
  const documentStore = new PaperlessClient({
    apiUrl: config.documentStore.apiUrl,
    apiToken: config.documentStore.apiToken,
  });

  const documents = await documentStore.fetchDocuments({
    maxDocuments: options.limit ?? config.documentStore.maxDocuments,
    pageSize: config.documentStore.pageSize,
  });
  if (documents.length === 0) {
    console.log('No documents with content found.');
    return;
  }
  console.log(`Found ${documents.length} documents.`);

  const pipeline = new ProcessingPipeline(
    { evaluator, documentStore, checkpoint, titleProvider: providers[0] },
    {
      lowQualityTagId: config.tags.lowQualityTagId,
      highQualityTagId: config.tags.highQualityTagId,
      renameDocuments: config.processing.renameDocuments,
      skipProcessed: config.processing.skipProcessed && !options.reprocess,
      ignoreAlreadyTagged: config.processing.ignoreAlreadyTagged && !options.includeTagged,
      delayBetweenDocumentsMs: config.processing.delayBetweenDocumentsMs,
      onProgress: (outcome, index, total) => console.log(describeOutcome(outcome, index, total)),
    }
  );

  const { stats } = await pipeline.run(documents);
  console.log('\nProcessing complete.');
  console.log(formatStats(stats));
}

/**
 * Run the CLI and return the process exit code
 */
export async function runCli(argv: string[], env: Env = process.env): Promise<number> {
  try {
    const options = parseArgs(argv);
    if (options.help) {
      console.log(USAGE);
      return 0;
    }

    const config = loadAppConfig(env);
    setLogLevel(config.logLevel);

    if (options.clearState) {
      new CheckpointStore(config.processing.stateFile).clear();
      console.log('State cleared successfully.');
      return 0;
    }
    if (options.showProgress) {
      const checkpoint = new CheckpointStore(config.processing.stateFile);
      checkpoint.load();
      console.log(formatSummary(checkpoint.summary()));
      return 0;
    }

    await runBatch(config, options);
    return 0;
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`Configuration error: ${error.message}`);
      console.error('Run with --help for the list of settings.');
      return 2;
    }
    logger.error('Error during document processing', error);
    return 1;
  }
}
