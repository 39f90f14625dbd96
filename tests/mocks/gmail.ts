/**
 * Mock for googleapis module (Gmail).
 *
 * Backs gmail.users.labels and gmail.users.messages with an in-memory
 * mailbox so session tests run without real API calls.
 */

import { vi } from 'vitest';

/**
 * Mock message structure (subset of gmail_v1.Schema$Message).
 */
export interface MockMessage {
  id: string;
  labelIds: string[];
  payload?: {
    mimeType?: string;
    headers?: Array<{ name: string; value: string }>;
    body?: { data?: string };
    parts?: Array<{ mimeType?: string; filename?: string; body?: { data?: string } }>;
  };
}

export interface MockLabel {
  id: string;
  name: string;
}

const DEFAULT_LABELS: MockLabel[] = [
  { id: 'INBOX', name: 'INBOX' },
  { id: 'UNREAD', name: 'UNREAD' },
  { id: 'Label_7', name: 'Support' },
];

// Gmail mock state
let mockLabels: MockLabel[] = [...DEFAULT_LABELS];
let mockMessages: MockMessage[] = [];
let pageSize = 100;
let labelsFailure: Error | null = null;

export function setMockLabels(labels: MockLabel[]): void {
  mockLabels = [...labels];
}

/**
 * Set the mailbox contents. Messages are listed in the order given.
 */
export function setMockMessages(messages: MockMessage[]): void {
  mockMessages = messages.map((message) => ({ ...message, labelIds: [...message.labelIds] }));
}

export function getMockMessage(id: string): MockMessage | undefined {
  return mockMessages.find((message) => message.id === id);
}

export function setListPageSize(size: number): void {
  pageSize = size;
}

/**
 * Make labels.list reject, as an unreachable API would.
 */
export function setLabelsFailure(error: Error | null): void {
  labelsFailure = error;
}

export function clearGmailMockState(): void {
  mockLabels = [...DEFAULT_LABELS];
  mockMessages = [];
  pageSize = 100;
  labelsFailure = null;
}

// Mock gmail.users.labels.list
const mockLabelsList = vi.fn(async () => {
  if (labelsFailure) {
    throw labelsFailure;
  }
  return { data: { labels: mockLabels } };
});

// Mock gmail.users.messages.list
const mockMessagesList = vi.fn(async (params: { labelIds: string[]; pageToken?: string }) => {
  const matching = mockMessages.filter((message) =>
    params.labelIds.every((label) => message.labelIds.includes(label))
  );
  const start = params.pageToken ? Number(params.pageToken) : 0;
  const page = matching.slice(start, start + pageSize);
  const next = start + pageSize < matching.length ? String(start + pageSize) : undefined;
  return {
    data: {
      messages: page.map((message) => ({ id: message.id })),
      nextPageToken: next,
    },
  };
});

// Mock gmail.users.messages.get
const mockMessagesGet = vi.fn(async (params: { id: string; format?: string }) => {
  const message = getMockMessage(params.id);
  if (!message) {
    throw Object.assign(new Error('Requested entity was not found.'), { code: 404 });
  }
  return { data: message };
});

// Mock gmail.users.messages.modify
const mockMessagesModify = vi.fn(async (params: { id: string; requestBody: { removeLabelIds?: string[] } }) => {
  const message = getMockMessage(params.id);
  if (!message) {
    throw Object.assign(new Error('Requested entity was not found.'), { code: 404 });
  }
  const removed = params.requestBody.removeLabelIds ?? [];
  message.labelIds = message.labelIds.filter((label) => !removed.includes(label));
  return { data: message };
});

// Mock gmail object
const mockGmail = {
  users: {
    labels: {
      list: mockLabelsList,
    },
    messages: {
      list: mockMessagesList,
      get: mockMessagesGet,
      modify: mockMessagesModify,
    },
  },
};

// Mock OAuth2 client
const mockSetCredentials = vi.fn();

class MockOAuth2 {
  setCredentials = mockSetCredentials;

  constructor(
    public readonly clientId?: string,
    public readonly clientSecret?: string
  ) {}
}

// Mock google object
const mockGoogle = {
  auth: {
    OAuth2: MockOAuth2,
  },
  gmail: vi.fn(() => mockGmail),
};

// Set up the module mock
vi.mock('googleapis', () => ({
  google: mockGoogle,
}));

export {
  mockGoogle,
  mockLabelsList,
  mockMessagesList,
  mockMessagesGet,
  mockMessagesModify,
  mockSetCredentials,
};
