/**
 * Prompts for the analysis and drafting calls.
 */

export const ANALYSIS_SYSTEM_PROMPT = 'You are an email analysis assistant.';

export const DRAFTING_SYSTEM_PROMPT = 'You are an email response assistant.';

export function buildAnalysisPrompt(subject: string, body: string): string {
  return `Analyze the following email content and perform two tasks:
1. Determine the urgency level (Low, Medium, High) based on keywords, tone, and context. Explain your reasoning briefly.
2. Summarize the email in 1-2 sentences in a ticket-like format, capturing the main point.

Subject: ${subject}
Body: ${body}

IMPORTANT: You must respond with ONLY valid JSON, no other text. Format:
{"urgency": "Low" | "Medium" | "High", "reasoning": "...", "summary": "..."}`;
}

export function buildDraftingPrompt(subject: string, body: string): string {
  return `Generate a polite, context-aware email response for the following email. The response should address the main points, match the tone, and be concise. Do not include sensitive information or commit to actions without confirmation.

Subject: ${subject}
Body: ${body}

Return the response as plain text.`;
}
