/**
 * Error taxonomy for vault generation
 *
 * Structural errors (topics, density, titles, config) are fatal and abort the
 * run before anything is written. ContentGenerationError is recovered per note.
 */

export type VaultWeaveErrorCode =
  | 'INSUFFICIENT_TOPICS'
  | 'INVALID_DENSITY'
  | 'EMPTY_TOPIC_SET'
  | 'DUPLICATE_TITLE'
  | 'CONTENT_GENERATION_FAILED'
  | 'INVALID_CONFIG'
  | 'VAULT_EXISTS'
  | 'VAULT_NOT_FOUND';

export class VaultWeaveError extends Error {
  readonly code: VaultWeaveErrorCode;

  constructor(code: VaultWeaveErrorCode, message: string) {
    super(message);
    this.name = 'VaultWeaveError';
    this.code = code;
  }
}

/** Topic expansion produced fewer than 2 unique titles. */
export class InsufficientTopicsError extends VaultWeaveError {
  readonly mainTopic: string;
  readonly produced: number;

  constructor(mainTopic: string, produced: number) {
    super('INSUFFICIENT_TOPICS', `Need at least 2 unique titles for "${mainTopic}", got ${produced}`);
    this.name = 'InsufficientTopicsError';
    this.mainTopic = mainTopic;
    this.produced = produced;
  }
}

export class InvalidDensityError extends VaultWeaveError {
  readonly density: number;

  constructor(density: number) {
    super('INVALID_DENSITY', `Connection density must be between 0.0 and 1.0, got ${density}`);
    this.name = 'InvalidDensityError';
    this.density = density;
  }
}

export class EmptyTopicSetError extends VaultWeaveError {
  readonly count: number;

  constructor(count: number) {
    super('EMPTY_TOPIC_SET', `Graph needs at least 2 topic titles, got ${count}`);
    this.name = 'EmptyTopicSetError';
    this.count = count;
  }
}

export class DuplicateTitleError extends VaultWeaveError {
  readonly title: string;

  constructor(title: string) {
    super('DUPLICATE_TITLE', `Title appears more than once: "${title}"`);
    this.name = 'DuplicateTitleError';
    this.title = title;
  }
}

/** A filler failed for one note. The generator falls back to the template body. */
export class ContentGenerationError extends VaultWeaveError {
  readonly title: string;
  readonly provider: string;

  constructor(title: string, provider: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('CONTENT_GENERATION_FAILED', `${provider} failed for "${title}": ${reason}`);
    this.name = 'ContentGenerationError';
    this.title = title;
    this.provider = provider;
    this.cause = cause;
  }
}

export class InvalidConfigError extends VaultWeaveError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('INVALID_CONFIG', `Invalid configuration: ${issues.join('; ')}`);
    this.name = 'InvalidConfigError';
    this.issues = issues;
  }
}

/** The target vault directory already holds files. */
export class VaultExistsError extends VaultWeaveError {
  readonly vaultPath: string;

  constructor(vaultPath: string) {
    super('VAULT_EXISTS', `Vault directory is not empty: ${vaultPath}`);
    this.name = 'VaultExistsError';
    this.vaultPath = vaultPath;
  }
}

export class VaultNotFoundError extends VaultWeaveError {
  readonly vaultPath: string;

  constructor(vaultPath: string) {
    super('VAULT_NOT_FOUND', `No vault directory at ${vaultPath}`);
    this.name = 'VaultNotFoundError';
    this.vaultPath = vaultPath;
  }
}

export function isVaultWeaveError(err: unknown): err is VaultWeaveError {
  return err instanceof VaultWeaveError;
}
