/**
 * @fileoverview Response drafting client.
 *
 * Always returns something presentable: any failure, or an empty reply,
 * yields the generic acknowledgment so one bad call never blocks review.
 */

import { callModel } from '../../../services/anthropic/index.js';
import { createLogger } from '../../../utils/observability/index.js';
import type { DraftResponse, TriageClientDeps } from '../types.js';
import { DRAFTING_SYSTEM_PROMPT, buildDraftingPrompt } from './prompts.js';

const log = createLogger({ domain: 'drafting' });

export const FALLBACK_REPLY = 'Thank you for your email. I will get back to you soon.';

export async function draftReply(
  deps: TriageClientDeps,
  subject: string,
  body: string
): Promise<DraftResponse> {
  const reply = await callModel(deps, {
    operation: 'drafting',
    model: deps.drafting.model,
    system: DRAFTING_SYSTEM_PROMPT,
    prompt: buildDraftingPrompt(subject, body),
    maxTokens: deps.drafting.maxTokens,
  });

  if (!reply.success) {
    log.error('draft_failed', { subject, reason: reply.error.kind, error: reply.error.cause.message });
    return { text: FALLBACK_REPLY, degraded: true };
  }

  const text = reply.data.trim();
  if (!text) {
    log.warn('draft_failed', { subject, reason: 'empty_reply' });
    return { text: FALLBACK_REPLY, degraded: true };
  }

  log.info('draft_completed', { subject, draftLength: text.length });
  return { text, degraded: false };
}
