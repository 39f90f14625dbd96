/**
 * @fileoverview Centralized application configuration.
 *
 * All environment variables are read here, once, into a plain object that
 * the CLI hands to every component. Nothing else in the codebase reads
 * process.env for settings.
 *
 * @see .env.example for the supported variables
 */

import 'dotenv/config';
import { ConfigError } from './utils/errors.js';

type Env = Record<string, string | undefined>;

// ---------------------------------------------------------------------------
// Config helpers: required vs optional
// ---------------------------------------------------------------------------

/** Read a required env var. Returns undefined if missing (caught by validateConfig). */
function required(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

/** Read an optional string env var with a default. */
function optional(env: Env, key: string, defaultValue: string): string {
  return env[key] || defaultValue;
}

/** Read an optional integer env var with a default. */
function optionalInt(env: Env, key: string, defaultValue: number): number {
  const raw = env[key];
  return raw ? parseInt(raw, 10) : defaultValue;
}

/** Read an optional boolean env var (defaults to `defaultValue`). */
function optionalBool(env: Env, key: string, defaultValue: boolean): boolean {
  const raw = env[key];
  if (raw === undefined) return defaultValue;
  return raw !== (defaultValue ? 'false' : 'true') ? defaultValue : !defaultValue;
}

/** Default audit log location, one file per day. */
function defaultLogFile(): string {
  return `./logs/${new Date().toISOString().slice(0, 10)}/triage.ndjson`;
}

// ---------------------------------------------------------------------------
// Config object
// ---------------------------------------------------------------------------

export interface TriageConfig {
  nodeEnv: string;
  anthropicApiKey: string | undefined;

  /** Model IDs for the two remote calls made per message */
  models: {
    analysis: string;
    drafting: string;
  };

  /** Retry policy shared by analysis and drafting calls */
  llm: {
    maxAttempts: number;
    retryBaseDelayMs: number;
    retryableStatuses: readonly number[];
    analysisMaxTokens: number;
    draftingMaxTokens: number;
  };

  /** Account the mailbox is read from and replies are sent as */
  email: {
    address: string | undefined;
  };

  /** Google OAuth credentials (obtained out of band) */
  google: {
    clientId: string | undefined;
    clientSecret: string | undefined;
    refreshToken: string | undefined;
  };

  smtp: {
    host: string;
    port: number;
    password: string | undefined;
  };

  triage: {
    defaultFolder: string;
    messageDelayMs: number;
    maxBodyChars: number;
  };

  log: {
    /** Audit log path, or null when the file sink is off */
    file: string | null;
    stdout: boolean;
  };
}

/**
 * Build the configuration object from the environment.
 * Called once at startup; the result is passed by reference from there on.
 */
export function loadConfig(env: Env = process.env): TriageConfig {
  const logFile = optional(env, 'APP_LOG_FILE', defaultLogFile());

  return {
    nodeEnv: optional(env, 'NODE_ENV', 'development'),
    anthropicApiKey: required(env, 'ANTHROPIC_API_KEY'),

    models: {
      analysis: optional(env, 'ANALYSIS_MODEL_ID', 'claude-sonnet-4-5-20250929'),
      drafting: optional(env, 'DRAFTING_MODEL_ID', 'claude-sonnet-4-5-20250929'),
    },

    llm: {
      maxAttempts: optionalInt(env, 'LLM_MAX_ATTEMPTS', 3),
      retryBaseDelayMs: optionalInt(env, 'LLM_RETRY_BASE_DELAY_MS', 1000),
      retryableStatuses: [502, 503, 504],
      analysisMaxTokens: 500,
      draftingMaxTokens: 300,
    },

    email: {
      address: required(env, 'EMAIL_ADDRESS'),
    },

    google: {
      clientId: required(env, 'GOOGLE_CLIENT_ID'),
      clientSecret: required(env, 'GOOGLE_CLIENT_SECRET'),
      refreshToken: required(env, 'GOOGLE_REFRESH_TOKEN'),
    },

    smtp: {
      host: optional(env, 'SMTP_HOST', 'smtp.gmail.com'),
      port: optionalInt(env, 'SMTP_PORT', 587),
      password: required(env, 'SMTP_PASSWORD'),
    },

    triage: {
      defaultFolder: 'inbox',
      messageDelayMs: optionalInt(env, 'TRIAGE_MESSAGE_DELAY_MS', 1000),
      maxBodyChars: optionalInt(env, 'TRIAGE_MAX_BODY_CHARS', 10_000),
    },

    log: {
      file: logFile === 'off' ? null : logFile,
      stdout: optionalBool(env, 'APP_LOG_STDOUT', false),
    },
  };
}

/**
 * Validate critical configuration at startup.
 * Throws ConfigError listing every problem found.
 */
export function validateConfig(config: TriageConfig): void {
  const errors: string[] = [];

  if (!config.anthropicApiKey) errors.push('ANTHROPIC_API_KEY is required');
  if (!config.email.address) errors.push('EMAIL_ADDRESS is required');

  // Google OAuth (required for the mailbox)
  if (!config.google.clientId) errors.push('GOOGLE_CLIENT_ID is required');
  if (!config.google.clientSecret) errors.push('GOOGLE_CLIENT_SECRET is required');
  if (!config.google.refreshToken) errors.push('GOOGLE_REFRESH_TOKEN is required');

  // Numeric bounds
  if (!(config.llm.maxAttempts >= 1 && config.llm.maxAttempts <= 10)) {
    errors.push(`LLM_MAX_ATTEMPTS must be 1-10, got ${config.llm.maxAttempts}`);
  }
  if (!(config.llm.retryBaseDelayMs >= 0)) {
    errors.push(`LLM_RETRY_BASE_DELAY_MS must be >= 0, got ${config.llm.retryBaseDelayMs}`);
  }
  if (!(config.smtp.port >= 1 && config.smtp.port <= 65535)) {
    errors.push(`SMTP_PORT must be 1-65535, got ${config.smtp.port}`);
  }
  if (!(config.triage.messageDelayMs >= 0)) {
    errors.push(`TRIAGE_MESSAGE_DELAY_MS must be >= 0, got ${config.triage.messageDelayMs}`);
  }
  if (!(config.triage.maxBodyChars >= 100)) {
    errors.push(`TRIAGE_MAX_BODY_CHARS must be >= 100, got ${config.triage.maxBodyChars}`);
  }

  if (errors.length > 0) {
    throw new ConfigError(errors);
  }
}
