/**
 * RAG Answer Service
 *
 * Orchestrates retrieval-augmented generation for a single question.
 * 1. Searches the index for relevant segments
 * 2. Builds a grounding prompt from them, in retrieval order
 * 3. Makes one generation round trip and returns the raw answer
 */

import type {
  GenerationCapability,
  GenerationParams,
  IndexHandle,
  RetrievedSegment,
} from '../../types/rag.js';
import { ConfigurationError, GenerationError, errorMessage } from './errors.js';
import { DEFAULT_SEARCH_COLUMNS, searchIndex } from './search.js';
import type { SearchDeps } from './search.js';

export interface AskOptions {
  k: number;
  params: GenerationParams;
}

export interface AskResult {
  answer: string;
  sources: RetrievedSegment[];
}

function validateParams(params: GenerationParams): void {
  const { temperature, max_tokens } = params;

  if (temperature !== undefined && (Number.isNaN(temperature) || temperature < 0 || temperature > 1)) {
    throw new ConfigurationError(`temperature must be within [0, 1], got ${temperature}`);
  }
  if (max_tokens !== undefined && (!Number.isInteger(max_tokens) || max_tokens <= 0)) {
    throw new ConfigurationError(`max_tokens must be a positive integer, got ${max_tokens}`);
  }
}

/**
 * Retrieved contents in order, then the question, separated by blank lines.
 */
export function buildGroundingPrompt(question: string, retrieved: RetrievedSegment[]): string {
  const context = retrieved
    .map((r) => r.content)
    .filter((content): content is string => content !== undefined && content.length > 0);

  return [...context, question].join('\n\n');
}

/**
 * Generate an answer grounded in the retrieved segments.
 *
 * Returns the capability's text unmodified. No retries, no re-ranking.
 */
export async function answerQuestion(
  question: string,
  retrieved: RetrievedSegment[],
  generator: GenerationCapability,
  params: GenerationParams
): Promise<string> {
  validateParams(params);

  const prompt = buildGroundingPrompt(question, retrieved);
  const contextPresent = prompt !== question;

  let answer: string;
  try {
    answer = await generator.generate(prompt, params);
  } catch (err) {
    console.error('[RAG Chat] Generation failed:', errorMessage(err));
    throw new GenerationError(
      question,
      contextPresent,
      `Generation failed (${contextPresent ? 'with' : 'without'} retrieved context): ${errorMessage(err)}`,
      err
    );
  }

  if (!answer || answer.trim().length === 0) {
    throw new GenerationError(
      question,
      contextPresent,
      `Generation returned no content (${contextPresent ? 'with' : 'without'} retrieved context)`
    );
  }

  return answer;
}

/**
 * Retrieve then answer: the per-query request/response cycle.
 */
export async function askQuestion(
  question: string,
  handle: IndexHandle,
  generator: GenerationCapability,
  options: AskOptions,
  deps: SearchDeps
): Promise<AskResult> {
  const sources = await searchIndex(handle, question, options.k, DEFAULT_SEARCH_COLUMNS, deps);

  console.log(`[RAG Chat] Retrieved ${sources.length} segments for question (k=${options.k})`);

  const answer = await answerQuestion(question, sources, generator, options.params);
  return { answer, sources };
}
