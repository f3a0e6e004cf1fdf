import { ExperienceRange, ExperienceRequirement } from '../types/job';
import { ExperienceWindow } from '../config';

/**
 * Added to N when a posting only states a lower bound ("5+ years").
 * Business rule carried as-is.
 */
export const OPEN_ENDED_SPAN_YEARS = 3;

interface RangePattern {
  pattern: RegExp;
  toRange(match: RegExpMatchArray): ExperienceRange;
}

function openEnded(match: RegExpMatchArray): ExperienceRange {
  const years = parseInt(match[1], 10);
  return { min: years, max: years + OPEN_ENDED_SPAN_YEARS };
}

// Order matters: an explicit range must win over any single-number form.
const RANGE_PATTERNS: readonly RangePattern[] = [
  {
    pattern: /(\d+)\s*(?:[-–]|to)+\s*(\d+)\s*\+?\s*years?/,
    toRange: (match) => ({ min: parseInt(match[1], 10), max: parseInt(match[2], 10) }),
  },
  { pattern: /(\d+)\s*\+\s*years?/, toRange: openEnded },
  { pattern: /(\d+)\s*years?/, toRange: openEnded },
  { pattern: /minimum\s*(?:of)?\s*(\d+)\s*years?/, toRange: openEnded },
  { pattern: /at\s*least\s*(\d+)\s*years?/, toRange: openEnded },
];

/**
 * Extracts the years-of-experience requirement from a job description.
 * The first matching pattern wins; `null` when nothing is stated.
 */
export function extractExperienceRange(text: string | undefined): ExperienceRequirement {
  if (!text) return null;

  const lower = text.toLowerCase();
  for (const { pattern, toRange } of RANGE_PATTERNS) {
    const match = lower.match(pattern);
    if (match) {
      return toRange(match);
    }
  }

  return null;
}

/**
 * Closed-interval overlap test. An unstated requirement always passes.
 */
export function isExperienceInRange(
  requirement: ExperienceRequirement,
  window: ExperienceWindow
): boolean {
  if (requirement === null) return true;
  return !(requirement.max < window.minYears || requirement.min > window.maxYears);
}

export function descriptionMatchesExperience(
  description: string | undefined,
  window: ExperienceWindow
): boolean {
  return isExperienceInRange(extractExperienceRange(description), window);
}

export function formatExperienceWindow(window: ExperienceWindow): string {
  return `${window.minYears}-${window.maxYears} years`;
}
