/**
 * @fileoverview Ticket aggregation and ordering.
 */

import type { NormalizedContent } from '../../mailbox/types.js';
import type { AnalysisResult, DraftResponse, Ticket, Urgency } from '../types.js';

export const URGENCY_RANK: Readonly<Record<Urgency, number>> = {
  High: 1,
  Medium: 2,
  Low: 3,
  Unknown: 4,
};

export function buildTicket(
  emailId: string,
  content: NormalizedContent,
  analysis: AnalysisResult,
  draft: DraftResponse
): Ticket {
  return {
    emailId,
    subject: content.subject,
    sender: content.sender,
    urgency: analysis.urgency,
    reasoning: analysis.reasoning,
    summary: analysis.summary,
    response: draft.text,
    sent: false,
  };
}

/**
 * Most urgent first. Array.prototype.sort is stable, so tickets of equal
 * urgency keep their fetch order. Returns a new array.
 */
export function sortTickets(tickets: readonly Ticket[]): Ticket[] {
  return [...tickets].sort((a, b) => URGENCY_RANK[a.urgency] - URGENCY_RANK[b.urgency]);
}
