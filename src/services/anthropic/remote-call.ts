/**
 * Structured remote call with retry.
 *
 * Shared by the analysis and drafting clients: one request shape, one retry
 * policy, and failures returned as values instead of thrown.
 */

import { MalformedServiceResponseError, ServiceCallError, errorMessage, type Result } from '../../utils/errors.js';
import { getErrorStatus, withRetry, type RetryPolicy } from '../../utils/retry.js';
import { createLogger } from '../../utils/observability/index.js';
import type { ModelClient, ModelReply, RemoteCallFailure, RemoteCallRequest } from './types.js';

const log = createLogger({ domain: 'remote-call' });

export interface RemoteCallDeps {
  client: ModelClient;
  policy: RetryPolicy;
  /** Overrides the backoff sleep (tests) */
  wait?: (ms: number) => Promise<void>;
}

function firstText(reply: ModelReply): string | undefined {
  for (const block of reply.content) {
    if (block.type === 'text' && typeof block.text === 'string') {
      return block.text;
    }
  }
  return undefined;
}

/**
 * Send one request and return the reply text.
 * Never throws: transport failures and text-less replies come back as failures.
 */
export async function callModel(
  deps: RemoteCallDeps,
  request: RemoteCallRequest
): Promise<Result<string, RemoteCallFailure>> {
  let reply: ModelReply;
  try {
    reply = await withRetry(
      () => deps.client.messages.create({
        model: request.model,
        max_tokens: request.maxTokens,
        temperature: 0,
        stream: false,
        system: request.system,
        messages: [{ role: 'user', content: request.prompt }],
      }),
      request.operation,
      deps.policy,
      log,
      deps.wait
    );
  } catch (error) {
    return {
      success: false,
      error: {
        kind: 'service_call_failed',
        cause: new ServiceCallError(errorMessage(error), getErrorStatus(error)),
      },
    };
  }

  const text = firstText(reply);
  if (text === undefined) {
    return {
      success: false,
      error: {
        kind: 'malformed_response',
        cause: new MalformedServiceResponseError('Reply had no text content'),
      },
    };
  }

  return { success: true, data: text };
}

/**
 * Decode a JSON object payload from reply text.
 * Handles markdown code fences around the JSON.
 */
export function parseJsonPayload(
  text: string
): Result<Record<string, unknown>, MalformedServiceResponseError> {
  let jsonText = text.trim();
  const codeBlockMatch = jsonText.match(/```(?:json)?\s*\n?([\s\S]*?)\n?\s*```/);
  if (codeBlockMatch) {
    jsonText = codeBlockMatch[1].trim();
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(jsonText);
  } catch (error) {
    return { success: false, error: new MalformedServiceResponseError(errorMessage(error)) };
  }

  // Boundary: validate shape before use
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return { success: false, error: new MalformedServiceResponseError('Payload is not a JSON object') };
  }

  return { success: true, data: Object.fromEntries(Object.entries(parsed)) };
}
