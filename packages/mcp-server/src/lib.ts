/**
 * Library entry point: the generation pipeline without the MCP server
 */

export * from './core/shared/index.js';
export {
  expandTopics,
  expandTopicsWith,
  toNoteTitle,
  uniquifyTitles,
  type TopicNamer,
} from './core/write/topics.js';
export {
  buildLinkGraph,
  checkLinkGraph,
  graphStats,
  isHub,
  linksOf,
  resolvePolicy,
  DEFAULT_GRAPH_POLICY,
  type BuildGraphOptions,
  type GraphPolicy,
  type GraphStats,
  type GraphViolation,
} from './core/write/graphBuilder.js';
export {
  fillNotes,
  renderTemplate,
  LlmFiller,
  LlmTopicNamer,
  TemplateFiller,
  type ContentFiller,
  type FillRequest,
} from './core/write/content.js';
export { createChatClient, type ChatClient, type LlmProvider } from './core/write/llm.js';
export {
  FileVaultWriter,
  MemoryVaultWriter,
  INDEX_NOTE_PATH,
  type IndexSummary,
  type VaultWriter,
} from './core/write/vaultWriter.js';
export {
  createContentServices,
  loadConfig,
  parseGenerateRequest,
  type ContentServices,
  type GenerateVaultInput,
  type VaultWeaveConfig,
} from './core/write/config.js';
export { generateVault, type GeneratorDeps } from './core/write/generator.js';
export { inspectVault, loadVaultGraph } from './core/read/graph.js';
export type { VaultInspection } from './core/read/types.js';
export { createServer } from './server.js';
