/**
 * Project Analyzer
 *
 * Deterministic keyword and pattern classification of a free-text project
 * description into the AnalysisResult the planner consumes. All tables come
 * from config/analysis.yaml.
 */

import type { AnalysisKeywords, AnalysisResult, ComplexityLevel } from '../types/index.js';
import { ConfigurationError } from '../utils/errors.js';

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Spellings tried for a keyword ("react-native", "react native", "reactnative")
 */
function variations(keyword: string): string[] {
  const lower = keyword.toLowerCase();
  return [...new Set([lower, lower.replace(/-/g, ' '), lower.replace(/ /g, '-'), lower.replace(/ /g, '')])];
}

/**
 * Keyword present at the start of a word ("api" matches "APIs" but "ai"
 * does not match "email")
 */
function mentions(text: string, keyword: string): boolean {
  return variations(keyword).some((variant) =>
    new RegExp(`(?:^|[^a-z0-9])${escapeRegExp(variant)}`).test(text)
  );
}

/**
 * Domain keywords found in the description, unique and sorted
 */
export function extractKeywords(description: string, tables: Pick<AnalysisKeywords, 'domains'>): string[] {
  const text = description.toLowerCase();
  const found = new Set<string>();
  for (const keywords of Object.values(tables.domains)) {
    for (const keyword of keywords) {
      if (mentions(text, keyword)) found.add(keyword);
    }
  }
  return [...found].sort();
}

export function detectPatterns(description: string, tables: Pick<AnalysisKeywords, 'patterns'>): string[] {
  const detected: string[] = [];
  for (const [name, source] of Object.entries(tables.patterns)) {
    let pattern: RegExp;
    try {
      pattern = new RegExp(source, 'i');
    } catch (error) {
      throw new ConfigurationError(`Invalid analysis pattern '${name}': ${source}`, { pattern: name }, error);
    }
    if (pattern.test(description)) detected.push(name);
  }
  return detected.sort();
}

/**
 * Matched keywords per domain, in table order, only domains with a match
 */
export function scoreDomains(keywords: readonly string[], tables: Pick<AnalysisKeywords, 'domains'>): Map<string, number> {
  const present = new Set(keywords.map((keyword) => keyword.toLowerCase()));
  const scores = new Map<string, number>();
  for (const [domain, domainKeywords] of Object.entries(tables.domains)) {
    const score = domainKeywords.filter((keyword) => present.has(keyword.toLowerCase())).length;
    if (score > 0) scores.set(domain, score);
  }
  return scores;
}

/**
 * Highest-scoring domain; ties go to the domain listed first
 */
export function classifyDomain(scores: ReadonlyMap<string, number>): string | undefined {
  let best: string | undefined;
  let bestScore = 0;
  for (const [domain, score] of scores) {
    if (score > bestScore) {
      best = domain;
      bestScore = score;
    }
  }
  return best;
}

/**
 * Share of the matched keywords per domain, highest first
 */
export function domainConfidence(scores: ReadonlyMap<string, number>): Record<string, number> {
  const total = [...scores.values()].reduce((sum, score) => sum + score, 0);
  const ranked = [...scores.entries()].sort((a, b) => b[1] - a[1]);
  return Object.fromEntries(ranked.map(([domain, score]) => [domain, Math.round((score / total) * 100) / 100]));
}

export function calculateComplexity(
  description: string,
  keywordCount: number,
  patternCount: number,
  tables: Pick<AnalysisKeywords, 'complexity'>
): ComplexityLevel {
  const [shortLength, longLength] = tables.complexity.lengthThresholds;
  const [someKeywords, manyKeywords] = tables.complexity.keywordThresholds;

  let score = description.length < shortLength ? 1 : description.length < longLength ? 2 : 3;
  if (keywordCount > manyKeywords) {
    score += 2;
  } else if (keywordCount > someKeywords) {
    score += 1;
  }
  if (patternCount > tables.complexity.patternThreshold) score += 1;

  if (score <= 2) return 'low';
  if (score <= 4) return 'medium';
  if (score === 5) return 'high';
  return 'very_high';
}

export function suggestTechnologies(
  keywords: readonly string[],
  domain: string | undefined,
  tables: Pick<AnalysisKeywords, 'technologies' | 'domainTechnologies'>
): string[] {
  const present = new Set(keywords.map((keyword) => keyword.toLowerCase()));
  const direct = Object.entries(tables.technologies)
    .filter(([, indicators]) => indicators.some((indicator) => present.has(indicator.toLowerCase())))
    .map(([technology]) => technology);

  if (direct.length > 0 || domain === undefined) return direct;
  return [...(tables.domainTechnologies[domain] ?? [])];
}

export function inferRequirements(
  description: string,
  patterns: readonly string[],
  domain: string | undefined,
  tables: Pick<AnalysisKeywords, 'requirements'>
): string[] {
  const { requirements } = tables;
  const inferred: string[] = [];

  for (const pattern of patterns) {
    const requirement = requirements.patterns[pattern];
    if (requirement) inferred.push(requirement);
  }
  if (domain !== undefined) {
    const requirement = requirements.domains[domain];
    if (requirement) inferred.push(requirement);
  }
  if (description.length > requirements.generalMinLength) {
    inferred.push(...requirements.general);
  }

  return [...new Set(inferred)];
}

/**
 * Classify a project description.
 */
export function analyzeProject(description: string, tables: AnalysisKeywords): AnalysisResult {
  const text = description.trim();
  const keywords = extractKeywords(text, tables);
  const patterns = detectPatterns(text, tables);
  const scores = scoreDomains(keywords, tables);
  const domain = classifyDomain(scores);

  return {
    ...(domain !== undefined && { domain }),
    complexity: calculateComplexity(text, keywords.length, patterns.length, tables),
    keywords,
    technologyStack: suggestTechnologies(keywords, domain, tables),
    patterns,
    implicitRequirements: inferRequirements(text, patterns, domain, tables),
    ...(scores.size > 0 && { domainScores: domainConfidence(scores) }),
  };
}
