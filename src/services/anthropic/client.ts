/**
 * Anthropic client factory.
 */

import Anthropic from '@anthropic-ai/sdk';
import type { TriageConfig } from '../../config.js';
import { ConfigError } from '../../utils/errors.js';
import type { ModelClient } from './types.js';

/**
 * Create the model client for a run.
 *
 * The SDK's built-in retries are disabled: withRetry owns the retry policy
 * so that only the configured transient statuses are retried.
 */
export function createModelClient(config: TriageConfig): ModelClient {
  if (!config.anthropicApiKey) {
    throw new ConfigError(['ANTHROPIC_API_KEY is required']);
  }
  return new Anthropic({ apiKey: config.anthropicApiKey, maxRetries: 0 });
}
