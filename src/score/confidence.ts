/**
 * Confidence tiers per source and evidence quality
 */

import type { Confidence, SourceLabel } from '../types.js';

export interface ConfidenceEvidence {
  hasExplicitDate: boolean;
}

/**
 * Assign the coarse confidence tier for a freshly normalized record. The tier
 * is fixed here and never revised during merge.
 *
 * - openstreetmap: high with an explicit opening/start date, medium when the
 *   venue only matched the recently-edited proxy
 * - registry: medium, registration date stands in for opening date
 * - google_places: low, the source cannot express venue age
 */
export function scoreConfidence(source: SourceLabel, evidence: ConfidenceEvidence): Confidence {
  switch (source) {
    case 'openstreetmap':
      return evidence.hasExplicitDate ? 'high' : 'medium';
    case 'registry':
      return 'medium';
    case 'google_places':
      return 'low';
  }
}

export function confidenceTag(confidence: Confidence): string {
  return `confidence:${confidence}`;
}
