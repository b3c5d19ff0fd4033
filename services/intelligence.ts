import {
  ARTIFACT_CATEGORIES,
  HARD_ARTIFACT_CATEGORIES,
  type ExtractedIntelligence,
  type IntelligenceBundle,
} from '../types.js';
import { extractArtifacts } from './patterns.js';

export function createBundle(): IntelligenceBundle {
  return {
    bankAccounts: new Set(),
    upiIds: new Set(),
    phishingLinks: new Set(),
    phoneNumbers: new Set(),
    suspiciousKeywords: new Set(),
  };
}

export function emptyIntelligence(): ExtractedIntelligence {
  return { bankAccounts: [], upiIds: [], phishingLinks: [], phoneNumbers: [], suspiciousKeywords: [] };
}

/**
 * Merges every artifact found in `text` into `bundle` and returns only the
 * values the bundle did not already hold. Nothing is ever removed.
 */
export function absorb(bundle: IntelligenceBundle, text: string): ExtractedIntelligence {
  const found = extractArtifacts(text);
  const delta = emptyIntelligence();

  for (const category of ARTIFACT_CATEGORIES) {
    for (const value of found[category]) {
      if (!bundle[category].has(value)) {
        bundle[category].add(value);
        delta[category].push(value);
      }
    }
  }
  return delta;
}

export function isEmpty(intel: ExtractedIntelligence): boolean {
  return ARTIFACT_CATEGORIES.every((category) => intel[category].length === 0);
}

export function hasHardArtifacts(bundle: IntelligenceBundle): boolean {
  return HARD_ARTIFACT_CATEGORIES.some((category) => bundle[category].size > 0);
}

export function countArtifacts(bundle: IntelligenceBundle): number {
  return HARD_ARTIFACT_CATEGORIES.reduce((sum, category) => sum + bundle[category].size, 0);
}

export function snapshot(bundle: IntelligenceBundle): ExtractedIntelligence {
  return {
    bankAccounts: [...bundle.bankAccounts],
    upiIds: [...bundle.upiIds],
    phishingLinks: [...bundle.phishingLinks],
    phoneNumbers: [...bundle.phoneNumbers],
    suspiciousKeywords: [...bundle.suspiciousKeywords],
  };
}

export function describeDelta(delta: ExtractedIntelligence): string {
  return ARTIFACT_CATEGORIES.filter((category) => delta[category].length > 0)
    .map((category) => `${category}=${delta[category].join('|')}`)
    .join(' ');
}
