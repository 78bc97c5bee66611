/**
 * Configuration: environment variables and per-call generation requests
 *
 * Both are validated with zod. Validation failures surface as
 * InvalidConfigError listing every issue.
 */

import os from 'os';
import path from 'path';
import { z } from 'zod';
import { InvalidConfigError } from '../shared/errors.js';
import { serverLog } from '../shared/serverLog.js';
import { DEFAULT_FILL_CONCURRENCY, LlmFiller, LlmTopicNamer, TemplateFiller, type ContentFiller } from './content.js';
import type { GraphPolicy } from './graphBuilder.js';
import { createChatClient, DEFAULT_LLM_TIMEOUT_MS, type FetchLike, type LlmProvider } from './llm.js';
import type { TopicNamer } from './topics.js';

export const DEFAULT_VAULT_ROOT = '~/Obsidian-Vaults';
export const DEFAULT_NOTE_COUNT = 30;
export const DEFAULT_DENSITY = 0.4;
export const MAX_NOTE_COUNT = 500;

export const ProviderSchema = z.enum(['template', 'openai', 'anthropic']);
export type ProviderName = z.infer<typeof ProviderSchema>;

/** Unset and empty environment variables read the same */
function blankToUndefined(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value;
}

const optionalEnvString = z.preprocess(blankToUndefined, z.string().trim().optional());

const EnvSchema = z.object({
  VAULT_PATH: z.preprocess(blankToUndefined, z.string().trim().default(DEFAULT_VAULT_ROOT)),
  VAULTWEAVE_PROVIDER: z.preprocess(blankToUndefined, ProviderSchema.default('template')),
  OPENAI_API_KEY: optionalEnvString,
  ANTHROPIC_API_KEY: optionalEnvString,
  VAULTWEAVE_MODEL: optionalEnvString,
  VAULTWEAVE_CONCURRENCY: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().min(1).max(32).default(DEFAULT_FILL_CONCURRENCY)
  ),
  VAULTWEAVE_TIMEOUT_MS: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().positive().default(DEFAULT_LLM_TIMEOUT_MS)
  ),
});

export interface VaultWeaveConfig {
  /** Directory that holds one sub-directory per vault */
  vaultRoot: string;
  provider: ProviderName;
  apiKeys: Partial<Record<LlmProvider, string>>;
  model?: string;
  concurrency: number;
  timeoutMs: number;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

export function expandHome(dir: string): string {
  if (dir === '~') return os.homedir();
  if (dir.startsWith('~/')) return path.join(os.homedir(), dir.slice(2));
  return dir;
}

/**
 * Read configuration from environment variables.
 * @throws InvalidConfigError if a variable holds an invalid value
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): VaultWeaveConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new InvalidConfigError(formatIssues(parsed.error));
  }

  const values = parsed.data;
  const apiKeys: Partial<Record<LlmProvider, string>> = {};
  if (values.OPENAI_API_KEY) apiKeys.openai = values.OPENAI_API_KEY;
  if (values.ANTHROPIC_API_KEY) apiKeys.anthropic = values.ANTHROPIC_API_KEY;

  const config: VaultWeaveConfig = {
    vaultRoot: path.resolve(expandHome(values.VAULT_PATH)),
    provider: values.VAULTWEAVE_PROVIDER,
    apiKeys,
    model: values.VAULTWEAVE_MODEL,
    concurrency: values.VAULTWEAVE_CONCURRENCY,
    timeoutMs: values.VAULTWEAVE_TIMEOUT_MS,
  };

  serverLog('config', `Vault root ${config.vaultRoot}, provider ${config.provider}, concurrency ${config.concurrency}`);
  return config;
}

// ---------------------------------------------------------------------------
// Provider selection
// ---------------------------------------------------------------------------

/** Filler and optional topic namer for one run */
export interface ContentServices {
  provider: ProviderName;
  filler: ContentFiller;
  namer?: TopicNamer;
}

/**
 * An LLM provider without an API key degrades to the template provider.
 */
export function resolveProvider(config: VaultWeaveConfig, requested?: ProviderName): ProviderName {
  const provider = requested ?? config.provider;
  if (provider !== 'template' && !config.apiKeys[provider]) {
    serverLog('config', `No API key for ${provider}; using template content`, 'warn');
    return 'template';
  }
  return provider;
}

export function createContentServices(
  config: VaultWeaveConfig,
  requested?: ProviderName,
  fetchImpl?: FetchLike
): ContentServices {
  const provider = resolveProvider(config, requested);
  if (provider === 'template') {
    return { provider, filler: new TemplateFiller() };
  }

  const apiKey = config.apiKeys[provider] ?? '';
  const client = createChatClient({
    provider,
    apiKey,
    model: config.model,
    timeoutMs: config.timeoutMs,
    fetch: fetchImpl,
  });
  return { provider, filler: new LlmFiller(client), namer: new LlmTopicNamer(client) };
}

// ---------------------------------------------------------------------------
// Generation requests
// ---------------------------------------------------------------------------

export const GenerateVaultRequestSchema = z.object({
  mainTopic: z.string().trim().min(1, 'mainTopic is required'),
  noteCount: z.number().int().max(MAX_NOTE_COUNT).default(DEFAULT_NOTE_COUNT),
  // Range is checked by the graph builder so the error carries its own code
  connectionDensity: z.number().default(DEFAULT_DENSITY),
  randomSeed: z.union([z.number().int(), z.string()]).optional(),
  vaultName: z.string().trim().min(1).optional(),
  provider: ProviderSchema.optional(),
  dryRun: z.boolean().default(false),
  hubCount: z.number().int().min(0).optional(),
  degreeCap: z.number().int().min(1).optional(),
  floorNeighbors: z.number().int().min(1).optional(),
});

export type GenerateVaultInput = z.input<typeof GenerateVaultRequestSchema>;
export type GenerateVaultRequest = z.output<typeof GenerateVaultRequestSchema>;

/**
 * @throws InvalidConfigError listing every invalid field
 */
export function parseGenerateRequest(input: unknown): GenerateVaultRequest {
  const parsed = GenerateVaultRequestSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidConfigError(formatIssues(parsed.error));
  }
  return parsed.data;
}

/** Graph policy overrides carried by a request */
export function policyOverrides(request: GenerateVaultRequest): Partial<GraphPolicy> {
  const overrides: Partial<GraphPolicy> = {};
  const { hubCount, degreeCap, floorNeighbors } = request;
  if (hubCount !== undefined) overrides.hubCount = () => hubCount;
  if (degreeCap !== undefined) overrides.degreeCap = () => degreeCap;
  if (floorNeighbors !== undefined) overrides.floorNeighbors = floorNeighbors;
  return overrides;
}
