import type { FilterRule } from '../config/run-config.js';
import type { Posting } from './providers/base.js';

export function matchesTitle(title: string, phrases: readonly string[]): boolean {
  const haystack = title.toLowerCase();
  return phrases.some(phrase => haystack.includes(phrase.toLowerCase()));
}

/** Patterns must match a whole grade code: 'G[SL]' accepts "GS" but not "GSR". */
export function matchesGrade(grades: readonly string[], patterns: readonly string[]): boolean {
  const compiled = patterns.map(p => new RegExp(`^(?:${p})$`, 'i'));
  return grades.some(grade => compiled.some(re => re.test(grade.trim())));
}

/** An empty rule lets everything through. */
export function passesInclusionRule(posting: Pick<Posting, 'title' | 'grades'>, rule: FilterRule): boolean {
  if (rule.titlePhrases.length === 0 && rule.gradePatterns.length === 0) {
    return true;
  }

  return matchesTitle(posting.title, rule.titlePhrases) || matchesGrade(posting.grades, rule.gradePatterns);
}
