import type { InferenceBackend } from '../backends/inferenceBackend.js';
import type { InferenceRequest } from '../types/inference.types.js';
import type { AnalysisOutcome, Confidence } from '../types/analysis.types.js';
import type { Unit } from '../types/unit.types.js';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import { withRetry, type RetryOptions } from '../util/retry.js';
import { RetryExhaustedError, errorMessage } from '../errors/base.js';
import { ReasoningFailedError } from '../errors/retrieval.js';
import { intentTokens } from '../memory/fingerprint.js';
import { tokenize } from '../indexing/tokenizer.js';
import { formatContext, unitLabel, type FormatOptions } from './contextFormatter.js';

/** The reasoning collaborator: draws a conclusion from a bounded set of units. */
export interface ReasoningAnalyzer {
  analyze(units: readonly Unit[], instruction: string): Promise<AnalysisOutcome>;
}

const SYSTEM_PROMPT = [
  'You analyze excerpts of a larger corpus to answer one focused question.',
  'Use only the units inside <corpus_context>; say so when they are not enough.',
  'Cite sources by path. Finish with a line of the form "Confidence: low|medium|high".',
].join('\n');

const CONFIDENCE_LINE = /^[ \t*_]*confidence[ \t*_]*[:=-][ \t*_]*(low|medium|high)\b.*$/gim;

/**
 * Split a model answer into its conclusion and declared confidence.
 * The last `Confidence:` line wins; without one the answer counts as low confidence.
 */
export function parseAnalysis(content: string): AnalysisOutcome {
  let confidence: Confidence = 'low';
  for (const match of content.matchAll(CONFIDENCE_LINE)) {
    const level = match[1]?.toLowerCase();
    if (level === 'low' || level === 'medium' || level === 'high') confidence = level;
  }
  const conclusion = content.replace(CONFIDENCE_LINE, '').trim();
  return { conclusion, confidence };
}

export interface BackendAnalyzerOptions {
  retry?: Omit<RetryOptions, 'shouldRetry'>;
  format?: FormatOptions;
  logger?: Logger;
}

export class BackendAnalyzer implements ReasoningAnalyzer {
  private readonly retry: Omit<RetryOptions, 'shouldRetry'>;
  private readonly logger: Logger;

  constructor(
    private readonly backend: InferenceBackend,
    private readonly options: BackendAnalyzerOptions = {},
  ) {
    this.retry = options.retry ?? { attempts: 3 };
    this.logger = options.logger ?? silentLogger;
  }

  async analyze(units: readonly Unit[], instruction: string): Promise<AnalysisOutcome> {
    const context = formatContext(units, instruction, this.options.format);
    const request: InferenceRequest = {
      messages: [
        { role: 'system', content: SYSTEM_PROMPT },
        { role: 'user', content: `${context}\n\nQuestion: ${instruction}` },
      ],
    };

    try {
      const response = await withRetry(() => this.backend.complete(request), {
        ...this.retry,
        onRetry: (err, attempt, delayMs) => {
          this.logger.warn(
            `reasoning call failed (attempt ${attempt}/${this.retry.attempts}), retrying in ${delayMs}ms: ${errorMessage(err)}`,
          );
        },
      });
      return parseAnalysis(response.content);
    } catch (err) {
      if (err instanceof RetryExhaustedError) {
        throw new ReasoningFailedError(
          `Reasoning failed after ${err.attempts} attempts: ${errorMessage(err.cause)}`,
          err.attempts,
          err.cause,
        );
      }
      throw err;
    }
  }
}

/**
 * Offline analyzer used when no inference backend is configured. Lists where
 * the relevant units live; confidence is medium when every content word of
 * the instruction occurs in them, low otherwise.
 */
export class ExtractiveAnalyzer implements ReasoningAnalyzer {
  async analyze(units: readonly Unit[], instruction: string): Promise<AnalysisOutcome> {
    const wanted = intentTokens(instruction);
    const present = new Set(units.flatMap((unit) => tokenize(unit.text)));
    const coveredAll = wanted.length > 0 && wanted.every((token) => present.has(token));

    const lines = [
      `${units.length} relevant unit(s) for "${instruction}":`,
      ...units.map((unit) => `- ${unitLabel(unit)}`),
    ];
    return { conclusion: lines.join('\n'), confidence: coveredAll ? 'medium' : 'low' };
  }
}
