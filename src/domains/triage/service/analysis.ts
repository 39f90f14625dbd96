/**
 * @fileoverview Analysis client.
 *
 * Asks the model for an urgency level, a short justification and a
 * ticket-style summary. Never rejects: failures degrade to an Unknown
 * urgency with an explanatory reasoning string.
 */

import { callModel, parseJsonPayload } from '../../../services/anthropic/index.js';
import { createLogger } from '../../../utils/observability/index.js';
import { URGENCY_LEVELS, type AnalysisResult, type TriageClientDeps, type Urgency } from '../types.js';
import { ANALYSIS_SYSTEM_PROMPT, buildAnalysisPrompt } from './prompts.js';

const log = createLogger({ domain: 'analysis' });

export const UNPARSEABLE_REASONING = 'response was not parseable';
export const UNAVAILABLE_SUMMARY = 'unable to summarize';
export const MISSING_REASONING = 'No reasoning provided';
export const MISSING_SUMMARY = 'No summary available';

/** Map a model-supplied urgency onto Low/Medium/High, case-insensitively. */
export function parseUrgency(value: unknown): Urgency {
  if (typeof value !== 'string') return 'Unknown';
  const wanted = value.trim().toLowerCase();
  return URGENCY_LEVELS.find(level => level.toLowerCase() === wanted) ?? 'Unknown';
}

function textField(value: unknown, fallback: string): string {
  return typeof value === 'string' && value.trim() ? value.trim() : fallback;
}

export function unparseableAnalysis(): AnalysisResult {
  return { urgency: 'Unknown', reasoning: UNPARSEABLE_REASONING, summary: UNAVAILABLE_SUMMARY, degraded: true };
}

export function failedAnalysis(cause: string): AnalysisResult {
  return { urgency: 'Unknown', reasoning: `service call failed: ${cause}`, summary: UNAVAILABLE_SUMMARY, degraded: true };
}

export async function analyzeEmail(
  deps: TriageClientDeps,
  subject: string,
  body: string
): Promise<AnalysisResult> {
  const reply = await callModel(deps, {
    operation: 'analysis',
    model: deps.analysis.model,
    system: ANALYSIS_SYSTEM_PROMPT,
    prompt: buildAnalysisPrompt(subject, body),
    maxTokens: deps.analysis.maxTokens,
  });

  if (!reply.success) {
    if (reply.error.kind === 'malformed_response') {
      log.warn('analysis_unparseable', { subject, error: reply.error.cause.message });
      return unparseableAnalysis();
    }
    log.error('analysis_failed', {
      subject,
      error: reply.error.cause.message,
      status: reply.error.cause.status,
    });
    return failedAnalysis(reply.error.cause.message);
  }

  const payload = parseJsonPayload(reply.data);
  if (!payload.success) {
    log.warn('analysis_unparseable', { subject, error: payload.error.message });
    return unparseableAnalysis();
  }

  const result: AnalysisResult = {
    urgency: parseUrgency(payload.data.urgency),
    reasoning: textField(payload.data.reasoning, MISSING_REASONING),
    summary: textField(payload.data.summary, MISSING_SUMMARY),
    degraded: false,
  };
  log.info('analysis_completed', { subject, urgency: result.urgency });
  return result;
}
