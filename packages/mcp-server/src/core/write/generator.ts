/**
 * Vault generation pipeline
 *
 * expand topics → build and freeze the link graph → fill every note →
 * write every note → write the index → report.
 *
 * Phases run strictly in order. Structural errors abort before the first
 * file is written; content failures fall back per note and are counted.
 */

import fs from 'fs/promises';
import path from 'path';
import { InvalidConfigError, VaultExistsError } from '../shared/errors.js';
import { normalizeSeed } from '../shared/random.js';
import { serverLog } from '../shared/serverLog.js';
import type { VaultReport } from '../shared/types.js';
import {
  createContentServices,
  parseGenerateRequest,
  policyOverrides,
  type ContentServices,
  type VaultWeaveConfig,
} from './config.js';
import { fillNotes } from './content.js';
import { assertValidDensity, buildLinkGraph, graphStats } from './graphBuilder.js';
import type { FetchLike } from './llm.js';
import { expandTopics, expandTopicsWith, toNoteTitle } from './topics.js';
import { FileVaultWriter, MemoryVaultWriter, type VaultWriter } from './vaultWriter.js';
import { validatePath } from './writer.js';

export interface GeneratorDeps {
  config: VaultWeaveConfig;
  /** Replaces provider selection from config (tests, embedding) */
  services?: ContentServices;
  fetch?: FetchLike;
  /** Replaces the writer picked from dryRun */
  writer?: VaultWriter;
  now?: () => Date;
}

/** Directory name for a vault: explicit name, or the topic with dashes */
export function resolveVaultName(mainTopic: string, vaultName?: string): string {
  const name = toNoteTitle(vaultName ?? mainTopic.trim().replace(/\s+/g, '-'));
  if (!name) {
    throw new InvalidConfigError([`vaultName: cannot derive a directory name from "${vaultName ?? mainTopic}"`]);
  }
  return name;
}

async function assertEmptyDirectory(vaultPath: string): Promise<void> {
  let entries: string[];
  try {
    entries = await fs.readdir(vaultPath);
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return;
    throw err;
  }
  if (entries.length > 0) {
    throw new VaultExistsError(vaultPath);
  }
}

/**
 * Generate a vault from an unvalidated request.
 *
 * @throws InvalidConfigError, InvalidDensityError, InsufficientTopicsError,
 *   DuplicateTitleError, VaultExistsError
 */
export async function generateVault(input: unknown, deps: GeneratorDeps): Promise<VaultReport> {
  const startTime = Date.now();
  const request = parseGenerateRequest(input);
  const { mainTopic, noteCount, connectionDensity, dryRun } = request;

  assertValidDensity(connectionDensity);

  const vaultName = resolveVaultName(mainTopic, request.vaultName);
  const pathCheck = validatePath(deps.config.vaultRoot, vaultName);
  if (!pathCheck.valid) {
    throw new InvalidConfigError([`vaultName: ${pathCheck.reason ?? 'invalid'}`]);
  }
  const vaultPath = path.join(deps.config.vaultRoot, vaultName);
  if (!deps.writer && !dryRun) {
    await assertEmptyDirectory(vaultPath);
  }

  const services = deps.services ?? createContentServices(deps.config, request.provider, deps.fetch);
  const seed = normalizeSeed(request.randomSeed);
  const createdAt = deps.now?.() ?? new Date();

  serverLog('vault', `Generating "${mainTopic}": ${noteCount} notes, density ${connectionDensity}, seed ${seed}, provider ${services.provider}`);

  // 1. Topics
  const titles = services.namer
    ? await expandTopicsWith(mainTopic, noteCount, services.namer)
    : expandTopics(mainTopic, noteCount);

  // 2. Graph
  const graph = buildLinkGraph(titles, {
    density: connectionDensity,
    seed,
    policy: policyOverrides(request),
  });
  const stats = graphStats(graph);

  // 3. Content
  const filled = await fillNotes(graph, services.filler, {
    mainTopic,
    concurrency: deps.config.concurrency,
    timeoutMs: deps.config.timeoutMs,
  });

  // 4. Write
  const writer = deps.writer ?? (dryRun ? new MemoryVaultWriter(vaultPath, createdAt) : new FileVaultWriter(vaultPath, createdAt));
  for (const [order, note] of filled.notes.entries()) {
    await writer.write(note, order);
  }
  const indexPath = await writer.finalize(graph.titles, {
    mainTopic,
    density: connectionDensity,
    seed,
    degreeCap: graph.degreeCap,
    hubs: [...graph.hubs],
    edges: stats.edges,
    createdAt,
  });

  const report: VaultReport = {
    success: true,
    vaultName,
    vaultPath,
    mainTopic,
    provider: services.filler.name,
    dryRun,
    notes: stats.notes,
    hubs: stats.hubs,
    edges: stats.edges,
    generated: filled.generated,
    templated: filled.templateTitles.length,
    fallback: filled.fallbackTitles.length,
    fallbackTitles: filled.fallbackTitles,
    indexPath,
    seed,
    durationMs: Date.now() - startTime,
  };

  serverLog(
    'vault',
    `${dryRun ? 'Dry run for' : 'Wrote'} ${vaultPath}: ${report.notes} notes, ${report.edges} edges, ${report.fallback} fallback`
  );
  return report;
}
