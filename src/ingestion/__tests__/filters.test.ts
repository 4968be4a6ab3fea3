import { describe, it, expect } from 'vitest';
import { matchesGrade, matchesTitle, passesInclusionRule } from '../filters.js';
import type { FilterRule } from '../../config/run-config.js';

const rule: FilterRule = {
  titlePhrases: ['housing manag', 'building manag'],
  gradePatterns: ['WG|WS'],
};

function posting(title: string, grades: string[] = ['GS']) {
  return { title, grades };
}

describe('matchesTitle', () => {
  it('matches a phrase case-insensitively', () => {
    expect(matchesTitle('HOUSING MANAGEMENT SPECIALIST', ['housing manag'])).toBe(true);
  });

  it('matches a phrase in the middle of the title', () => {
    expect(matchesTitle('Supervisory Building Manager', ['building manag'])).toBe(true);
  });

  it('rejects when no phrase is present', () => {
    expect(matchesTitle('Budget Analyst', ['housing manag'])).toBe(false);
  });

  it('never matches an empty phrase list', () => {
    expect(matchesTitle('Anything', [])).toBe(false);
  });
});

describe('matchesGrade', () => {
  it('matches a whole grade code', () => {
    expect(matchesGrade(['WG'], ['WG|WS'])).toBe(true);
  });

  it('does not match a partial code', () => {
    expect(matchesGrade(['WGX'], ['WG|WS'])).toBe(false);
  });

  it('is case-insensitive', () => {
    expect(matchesGrade(['ws'], ['WG|WS'])).toBe(true);
  });

  it('matches when any of several codes matches', () => {
    expect(matchesGrade(['GS', 'WS'], ['WS'])).toBe(true);
  });

  it('rejects an empty grade list', () => {
    expect(matchesGrade([], ['GS'])).toBe(false);
  });
});

describe('passesInclusionRule', () => {
  it('passes on a title phrase', () => {
    expect(passesInclusionRule(posting('Housing Management Assistant'), rule)).toBe(true);
  });

  it('passes on a grade pattern even when the title does not match', () => {
    expect(passesInclusionRule(posting('Maintenance Mechanic', ['WG']), rule)).toBe(true);
  });

  it('rejects when neither title nor grade match', () => {
    expect(passesInclusionRule(posting('Budget Analyst', ['GS']), rule)).toBe(false);
  });

  it('lets everything through an empty rule', () => {
    expect(passesInclusionRule(posting('Budget Analyst'), { titlePhrases: [], gradePatterns: [] })).toBe(true);
  });

  it('applies the grade rule alone when no phrases are configured', () => {
    const gradeOnly: FilterRule = { titlePhrases: [], gradePatterns: ['WG'] };
    expect(passesInclusionRule(posting('Housing Manager', ['GS']), gradeOnly)).toBe(false);
    expect(passesInclusionRule(posting('Housing Manager', ['WG']), gradeOnly)).toBe(true);
  });
});
