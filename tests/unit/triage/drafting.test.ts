import { describe, expect, it } from 'vitest';
import { MockAPIError, createTextResponse, getCreateCalls, setMockResponses } from '../../mocks/anthropic.js';
import { FALLBACK_REPLY, draftReply } from '../../../src/domains/triage/service/drafting.js';
import { mockClientDeps } from '../../helpers/triage.js';

describe('draftReply', () => {
  it('returns the trimmed draft', async () => {
    setMockResponses([createTextResponse('\n  Thanks, we are looking into it.  \n')]);

    const draft = await draftReply(mockClientDeps(), 'Server down', 'Nothing loads.');

    expect(draft).toEqual({ text: 'Thanks, we are looking into it.', degraded: false });
    const [call] = getCreateCalls();
    expect(call.model).toBe('drafting-model');
    expect(call.max_tokens).toBe(300);
    expect(call.system).toBe('You are an email response assistant.');
  });

  it('falls back on an empty reply', async () => {
    setMockResponses([createTextResponse('   ')]);

    await expect(draftReply(mockClientDeps(), 'Subject', 'Body')).resolves.toEqual({ text: FALLBACK_REPLY, degraded: true });
  });

  it('falls back when the service keeps failing', async () => {
    setMockResponses([new MockAPIError(504), new MockAPIError(504), new MockAPIError(504)]);

    const draft = await draftReply(mockClientDeps(), 'Subject', 'Body');

    expect(draft.text).toBe('Thank you for your email. I will get back to you soon.');
    expect(draft.degraded).toBe(true);
    expect(getCreateCalls()).toHaveLength(3);
  });

  it('falls back on a non-retryable error after one attempt', async () => {
    setMockResponses([new MockAPIError(400, 'bad request')]);

    await expect(draftReply(mockClientDeps(), 'Subject', 'Body')).resolves.toEqual({ text: FALLBACK_REPLY, degraded: true });
    expect(getCreateCalls()).toHaveLength(1);
  });

  it('does not flag a drafted reply that reads like the fallback', async () => {
    setMockResponses([createTextResponse(FALLBACK_REPLY)]);

    await expect(draftReply(mockClientDeps(), 'Subject', 'Body')).resolves.toEqual({ text: FALLBACK_REPLY, degraded: false });
  });
});
