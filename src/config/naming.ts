import { v4 as uuidv4 } from 'uuid';
import { ResourceKind } from '../types/index.js';

/** Kinds whose names are generated per run; the rest come from configuration */
export type GeneratedNameKind = Extract<ResourceKind, 'ResourceGroup' | 'CosmosDBAccount' | 'EventHubNamespace'>;

/**
 * Azure naming rules for the generated kinds
 */
export interface NameRule {
  minLength: number;
  maxLength: number;
  lowercase: boolean;
}

export const NAME_RULES: Record<GeneratedNameKind, NameRule> = {
  ResourceGroup: { minLength: 1, maxLength: 90, lowercase: false },
  // Cosmos DB account names become part of a DNS name
  CosmosDBAccount: { minLength: 3, maxLength: 44, lowercase: true },
  EventHubNamespace: { minLength: 6, maxLength: 50, lowercase: false }
};

export interface NamingStrategy {
  generate(kind: GeneratedNameKind, prefix: string): string;
}

const SUFFIX_LENGTH = 8;

function defaultSuffix(): string {
  return uuidv4().replace(/-/g, '').substring(0, SUFFIX_LENGTH);
}

/**
 * Collision-resistant names: sanitized prefix plus a random suffix,
 * truncated from the prefix side so the suffix always survives.
 */
export class RandomNamingStrategy implements NamingStrategy {
  constructor(private readonly randomSuffix: () => string = defaultSuffix) {}

  generate(kind: GeneratedNameKind, prefix: string): string {
    const rule = NAME_RULES[kind];
    const suffix = this.sanitizeName(this.randomSuffix(), rule);
    const room = Math.max(0, rule.maxLength - suffix.length);
    const head = this.sanitizeName(prefix, rule).substring(0, room);

    let name = this.sanitizeName(head + suffix, rule);
    if (!/^[a-zA-Z]/.test(name)) {
      name = ('r' + name).substring(0, rule.maxLength);
    }
    return this.padToMinimum(name, rule);
  }

  /**
   * Sanitize name to be Azure-compliant
   * - Replace invalid characters with hyphens
   * - Collapse consecutive hyphens
   * - Remove leading/trailing hyphens
   */
  private sanitizeName(name: string, rule: NameRule): string {
    let sanitized = name.replace(/[^a-zA-Z0-9-]/g, '-');
    sanitized = sanitized.replace(/-+/g, '-');
    sanitized = sanitized.replace(/^-+|-+$/g, '');
    return rule.lowercase ? sanitized.toLowerCase() : sanitized;
  }

  private padToMinimum(name: string, rule: NameRule): string {
    let padded = name;
    while (padded.length < rule.minLength) {
      padded += '0';
    }
    return padded;
  }
}

/**
 * Returns configured names as they are; for simulations and tests.
 */
export class FixedNamingStrategy implements NamingStrategy {
  constructor(private readonly names: Partial<Record<GeneratedNameKind, string>> = {}) {}

  generate(kind: GeneratedNameKind, prefix: string): string {
    return this.names[kind] ?? prefix;
  }
}

/**
 * Convenience function to create the default naming strategy
 */
export function createNamingStrategy(): NamingStrategy {
  return new RandomNamingStrategy();
}
