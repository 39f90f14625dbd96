/**
 * Anthropic service - model client and the shared structured remote call.
 */

export { createModelClient } from './client.js';
export { callModel, parseJsonPayload, type RemoteCallDeps } from './remote-call.js';
export type * from './types.js';
