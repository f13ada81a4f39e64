/**
 * Salary Narration Extraction
 *
 * Decides whether a narration describes a salary-like payment and pulls out
 * the person and the pay period when it can.
 *
 * Detection:
 * - A primary keyword (salary, wage, payroll, ...) or "final settlement"
 * - No non-salary business term (rent, invoice, L/C, ...) unless the narration
 *   carries an explicit final settlement person reference
 *
 * Person names are tried in priority order: explicit "(Name - ID: n)" /
 * "Payable to Name - ID: n" references first, then the legacy free-text shapes.
 */

import {
  FINAL_SETTLEMENT_PHRASE,
  NON_SALARY_INDICATORS,
  PRIMARY_SALARY_KEYWORDS,
  SECONDARY_SALARY_KEYWORDS,
} from './constants';
import { extractPersonReference } from './finalSettlement';
import { safeExtract } from './safeExtract';
import type { SalaryDetails } from './types';

/**
 * Free-text person shapes, matched against the lower-cased narration.
 * Order matters: the first pattern that matches wins.
 */
const PERSON_PATTERNS: readonly RegExp[] = [
  /salary\s+of\s+([a-z\s]+?)(?:\s+for|\s+month|\s+period|$)/,
  /([a-z\s]+?)\s+salary/,
  /payroll\s+for\s+([a-z\s]+?)(?:\s+for|\s+month|\s+period|$)/,
  /([a-z\s]+?)\s+payroll/,
  // "(Md. Name-ID : 1042)"
  /\(([a-z]+\.\s+[a-z\s]+?)-id\s*:\s*\d+\)/,
  // "Md. Name-ID : 1042"
  /([a-z]+\.\s+[a-z\s]+?)-id\s*:\s*\d+/,
  /payable\s+to\s+([a-z]+\.\s+[a-z\s]+?)-id\s*:\s*\d+/,
  /amount\s+paid\s+to\s+([a-z]+\.\s+[a-z\s]+?)(?:\s*,|\s+for|\s+employee|\s+office|\s+human|\s+resources|\s+administration|\s+final|\s+settlement|\s+employee\s+id|\s*$)/,
  // Titled names: "Md. Name for ..."
  /([a-z]+\.\s+[a-z\s]+?)(?:\s+for|\s+month|\s+period|\s+employee|\s+id|\s*,|\s*$)/,
  /\(([a-z]+\.\s+[a-z\s]+?)\)/,
];

/**
 * "March 2024", "03/2024", "2024-03"
 */
const PERIOD_PATTERNS: readonly RegExp[] = [/(\w+\s+\d{4})/, /(\d{1,2}\/\d{4})/, /(\d{4}-\d{2})/];

function findFreeTextPerson(lower: string): string | null {
  for (const pattern of PERSON_PATTERNS) {
    const match = pattern.exec(lower);
    if (match) {
      return match[1].trim();
    }
  }

  // "(md. name-id : 1042)" with irregular spacing the patterns above miss
  const start = lower.indexOf('(');
  if (start === -1) {
    return null;
  }
  const end = lower.indexOf('-id :', start);
  if (end === -1) {
    return null;
  }
  const namePart = lower.slice(start + 1, end).trim();
  return namePart.includes('.') && namePart.split(/\s+/).length >= 2 ? namePart : null;
}

function findPeriod(particulars: string): string | null {
  for (const pattern of PERIOD_PATTERNS) {
    const match = pattern.exec(particulars);
    if (match) {
      return match[1];
    }
  }
  return null;
}

/**
 * Extracts salary details, or null when the narration is not salary-like.
 *
 * @example
 * extractSalaryDetails('Salary of John Doe for March 2024')
 * // Returns: { personName: 'john doe', period: 'March 2024', isSalary: true,
 * //            matchedKeywords: ['salary', 'sal', 'march', 'mar'], ... }
 */
export function extractSalaryDetails(particulars: string | null | undefined): SalaryDetails | null {
  if (!particulars) {
    return null;
  }

  return safeExtract<SalaryDetails>('salary', () => {
    const lower = particulars.toLowerCase();
    const explicitPerson = extractPersonReference(particulars);

    const hasPrimaryKeyword =
      PRIMARY_SALARY_KEYWORDS.some((keyword) => lower.includes(keyword)) ||
      lower.includes(FINAL_SETTLEMENT_PHRASE);
    if (!hasPrimaryKeyword) {
      return null;
    }

    const hasNonSalaryTerm = NON_SALARY_INDICATORS.some((term) => lower.includes(term));
    if (hasNonSalaryTerm && !explicitPerson) {
      return null;
    }

    const matchedKeywords = [...PRIMARY_SALARY_KEYWORDS, ...SECONDARY_SALARY_KEYWORDS].filter(
      (keyword) => lower.includes(keyword)
    );

    return {
      personName: explicitPerson ? explicitPerson.personName : findFreeTextPerson(lower),
      personId: explicitPerson ? explicitPerson.personId : null,
      personCombined: explicitPerson ? explicitPerson.personCombined : null,
      period: findPeriod(particulars),
      isSalary: true,
      matchedKeywords,
    };
  });
}
