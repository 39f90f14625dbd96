/**
 * Type definitions for the Anthropic service module.
 *
 * ModelClient is the slice of the SDK client the triage run uses, so tests
 * can hand in a plain object with a mocked `messages.create`.
 */

import type { MalformedServiceResponseError, ServiceCallError } from '../../utils/errors.js';

export interface ModelRequestParams {
  model: string;
  max_tokens: number;
  temperature: number;
  stream: false;
  system: string;
  messages: Array<{ role: 'user'; content: string }>;
}

export interface ModelReplyBlock {
  type: string;
  text?: string;
}

export interface ModelReply {
  content: ModelReplyBlock[];
}

export interface ModelClient {
  messages: {
    create(params: ModelRequestParams): Promise<ModelReply>;
  };
}

/** One structured remote call: a system instruction plus a single user prompt. */
export interface RemoteCallRequest {
  /** Label used in retry and audit logs */
  operation: string;
  model: string;
  system: string;
  prompt: string;
  maxTokens: number;
}

export type RemoteCallFailure =
  | { kind: 'service_call_failed'; cause: ServiceCallError }
  | { kind: 'malformed_response'; cause: MalformedServiceResponseError };
