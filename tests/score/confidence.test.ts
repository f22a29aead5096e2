import { describe, it, expect } from 'vitest';
import { confidenceTag, scoreConfidence } from '../../src/score/confidence.js';

describe('Confidence scoring', () => {
  it('should rate dated geo-tag records high', () => {
    expect(scoreConfidence('openstreetmap', { hasExplicitDate: true })).toBe('high');
  });

  it('should rate recently edited geo-tag records medium', () => {
    expect(scoreConfidence('openstreetmap', { hasExplicitDate: false })).toBe('medium');
  });

  it('should rate registry records medium', () => {
    expect(scoreConfidence('registry', { hasExplicitDate: true })).toBe('medium');
    expect(scoreConfidence('registry', { hasExplicitDate: false })).toBe('medium');
  });

  it('should rate place-search candidates low', () => {
    expect(scoreConfidence('google_places', { hasExplicitDate: false })).toBe('low');
  });

  it('should render the confidence tag', () => {
    expect(confidenceTag('high')).toBe('confidence:high');
  });
});
