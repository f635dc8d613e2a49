import type { HeadingLevel } from "./types";
import {
  countOf,
  endsWithAny,
  includesAny,
  isDigits,
  isTitleCase,
  isUpperCase,
  startsLowercase,
  startsWithAny,
  words,
} from "./text";

/**
 * Heading heuristics as ordered rule tables. Each table is evaluated top to
 * bottom; callers decide whether the first match or any match counts.
 */

export interface Rule {
  name: string;
  test: (text: string, lower: string) => boolean;
}

export interface PatternRule extends Rule {
  boost: number;
  /** Suggested level; null contributes confidence without steering the level. */
  level: HeadingLevel | null;
}

export interface VerdictRule extends Rule {
  verdict: boolean;
}

export function firstMatch<R extends Rule>(
  rules: readonly R[],
  text: string,
): R | undefined {
  const lower = text.toLowerCase();
  return rules.find((r) => r.test(text, lower));
}

export function matchesAny(rules: readonly Rule[], text: string): boolean {
  return firstMatch(rules, text) !== undefined;
}

// ---- vocabularies

export const DOCUMENT_STRUCTURE_TERMS = [
  "revision history",
  "table of contents",
  "acknowledgements",
  "references",
  "introduction to the foundation",
  "overview of the foundation",
];

export const DOCUMENT_HEADERS = [
  "revision history",
  "table of contents",
  "acknowledgements",
  "references",
  "trademarks",
  "documents and web sites",
];

export const MAJOR_SECTIONS = [
  "summary",
  "background",
  "introduction",
  "overview",
  "methodology",
  "conclusion",
  "timeline",
  "milestones",
];

export const SECTION_PHRASES = [
  "intended audience",
  "career paths",
  "learning objectives",
  "entry requirements",
  "structure and course",
  "keeping it current",
  "business outcomes",
  "content",
  "trademarks",
  "documents and web",
];

export const BUSINESS_PATTERNS = [
  "business plan",
  "approach and specific",
  "evaluation and awarding",
  "milestones",
  "requirements",
  "terms of reference",
];

export const IMPORTANT_SINGLES = [
  "summary",
  "background",
  "timeline",
  "milestones",
  "preamble",
  "membership",
  "chair",
  "term",
  "meetings",
  "acknowledgements",
  "references",
];

/** Single-word sections the hierarchy never treats as fragments. */
export const STRUCTURAL_SINGLES = [...IMPORTANT_SINGLES, "content", "trademarks"];

export const BUSINESS_TERMS = [
  "business plan",
  "requirements",
  "evaluation",
  "approach",
  "implementation",
  "methodology",
  "milestones",
  "funding",
  "terms of reference",
  "accountability",
  "communication",
  "intended audience",
  "career paths",
  "learning objectives",
  "entry requirements",
  "structure and course",
  "keeping it current",
  "business outcomes",
  "documents and web sites",
];

const PRINCIPLE_TERMS = [
  "funding",
  "governance",
  "decision-making",
  "access",
  "support",
  "training",
];

const TECHNICAL_TERMS = ["intended audience", "career paths", "learning objectives"];

const FRAGMENT_INDICATORS = [
  " is to ",
  " are to ",
  " will be ",
  " has been ",
  " have been ",
  " can be ",
  " should be ",
  " must be ",
  " to be ",
  " that ",
  " which ",
  " where ",
  " when ",
  " while ",
  " during ",
];

const LEADING_CONNECTIVES = ["and ", "or ", "but ", "the ", "a ", "an ", "of ", "in ", "to ", "for "];
const TRAILING_CONNECTIVES = [" and", " or", " of", " in", " to", " for", " the", " a"];
const INCOMPLETE_ENDINGS = [" to", " and", " or", " of", " in", " for", " the", " a", " an"];
const INCOMPLETE_STARTS = ["to ", "and ", "or ", "of ", "in ", "for "];
const DANGLING_ENDINGS = [...INCOMPLETE_ENDINGS, " that", " which"];

const NUMBERED_SECTION = /^\d+\.\s+[A-Za-z]/;
const NUMBERED_SUBSECTION = /^\d+\.\d+\s+[A-Za-z]/;

const isQuestion = (text: string, openers: readonly string[]) =>
  startsWithAny(text, openers) && text.endsWith("?");

// ---- candidate scorer

/** Shapes that are never headings: dates, contact details, sentences, figures. */
export const NON_HEADING_RULES: readonly Rule[] = [
  { name: "date", test: (t) => /^\w+\s+\d{1,2},?\s+\d{4}/.test(t) },
  { name: "email", test: (t) => t.includes("@") && t.includes(".") },
  { name: "url", test: (t) => startsWithAny(t, ["http://", "https://", "www."]) },
  {
    name: "sentence",
    test: (t) => t.endsWith(".") && t.length > 40 && t.includes(" "),
  },
  { name: "numeric", test: (t) => /^[\d$,.\s%-]+$/.test(t) },
  { name: "short-token", test: (t) => words(t).length === 1 && t.length < 8 },
];

export const CONTENT_FRAGMENT_RULES: readonly Rule[] = [
  { name: "leading-connective", test: (t) => startsWithAny(t, LEADING_CONNECTIVES) },
  { name: "trailing-connective", test: (t) => endsWithAny(t, TRAILING_CONNECTIVES) },
  {
    name: "timeline",
    test: (t, lower) => /^\w+ \d{4}\s*-?\s*$/.test(t) || lower.includes("timeline:"),
  },
  {
    name: "too-few-words",
    test: (t) => words(t).length < 2 && !t.endsWith(":") && !isUpperCase(t),
  },
];

export const DEFINITELY_NOT_HEADING_RULES: readonly Rule[] = [
  { name: "non-heading", test: (t) => matchesAny(NON_HEADING_RULES, t) },
  { name: "content-fragment", test: (t) => matchesAny(CONTENT_FRAGMENT_RULES, t) },
  { name: "tiny-token", test: (t) => words(t).length === 1 && t.length < 4 },
  { name: "multi-sentence", test: (t) => countOf(t, ".") > 1 && t.length > 60 },
];

/** Textual heading shapes in priority order; only the first match applies. */
export const HEADING_PATTERNS: readonly PatternRule[] = [
  {
    name: "document-structure",
    boost: 0.9,
    level: "H1",
    test: (_t, lower) => includesAny(lower, DOCUMENT_STRUCTURE_TERMS),
  },
  {
    name: "numbered-section",
    boost: 0.9,
    level: "H1",
    test: (t) => /^\d+\.\s+[A-Z][a-z]/.test(t),
  },
  {
    name: "numbered-subsection",
    boost: 0.8,
    level: "H2",
    test: (t) => /^\d+\.\d+\s+[A-Z][a-z]/.test(t),
  },
  { name: "appendix", boost: 0.8, level: "H2", test: (t) => /^appendix [a-z]:/i.test(t) },
  { name: "phase", boost: 0.7, level: "H3", test: (t) => /^phase [ivx]+:/i.test(t) },
  {
    name: "major-section",
    boost: 0.8,
    level: "H2",
    test: (_t, lower) => MAJOR_SECTIONS.includes(lower.trim()),
  },
  {
    name: "section-phrase",
    boost: 0.8,
    level: "H2",
    test: (_t, lower) => includesAny(lower, SECTION_PHRASES),
  },
  {
    name: "for-each",
    boost: 0.6,
    level: "H3",
    test: (t) => startsWithAny(t, ["What could", "For each", "For the"]),
  },
  {
    name: "business-pattern",
    boost: 0.7,
    level: "H2",
    test: (_t, lower) => includesAny(lower, BUSINESS_PATTERNS),
  },
  {
    name: "important-single",
    boost: 0.8,
    level: "H1",
    test: (_t, lower) => IMPORTANT_SINGLES.includes(lower.trim()),
  },
  {
    name: "principle-colon",
    boost: 0.6,
    level: "H3",
    test: (t, lower) =>
      t.endsWith(":") && t.length > 3 && t.length < 80 && includesAny(lower, PRINCIPLE_TERMS),
  },
  {
    name: "colon",
    boost: 0.5,
    level: "H3",
    test: (t) => t.endsWith(":") && t.length > 3 && t.length < 80,
  },
  {
    name: "all-caps",
    boost: 0.6,
    level: "H2",
    test: (t) => isUpperCase(t) && t.length > 3 && t.length < 60,
  },
  {
    name: "question",
    boost: 0.3,
    level: null,
    test: (t) => isQuestion(t, ["What ", "How ", "Why "]),
  },
];

export const WELL_FORMED_RULES: readonly Rule[] = [
  { name: "question", test: (t) => isQuestion(t, ["What ", "How ", "Why "]) },
  {
    name: "named-section",
    test: (t) => /^(Summary|Background|Introduction|Overview|Conclusion)$/i.test(t),
  },
  { name: "appendix", test: (t) => /^Appendix [A-Z]:/i.test(t) },
  { name: "phase", test: (t) => /^Phase [IVX]+:/i.test(t) },
  { name: "title-colon", test: (t) => /^[A-Z][a-z]+(\s+[A-Z][a-z]*)*:$/i.test(t) },
  { name: "numbered", test: (t) => /^\d+\.\s+[A-Z][a-z]+/i.test(t) },
  {
    name: "for-each-colon",
    test: (t) => startsWithAny(t, ["For each ", "For the "]) && t.endsWith(":"),
  },
];

export const INCOMPLETE_RULES: readonly Rule[] = [
  { name: "trailing-connective", test: (t) => endsWithAny(t, INCOMPLETE_ENDINGS) },
  { name: "leading-connective", test: (t) => startsWithAny(t, INCOMPLETE_STARTS) },
  { name: "ellipsis", test: (t) => t.includes("...") },
  { name: "wordy", test: (t) => countOf(t, " ") > 12 },
];

// ---- hierarchy builder

/** Shapes exempt from fragment detection, checked before FRAGMENT_RULES. */
export const FRAGMENT_EXEMPTIONS: readonly Rule[] = [
  { name: "structural-single", test: (_t, lower) => STRUCTURAL_SINGLES.includes(lower.trim()) },
  { name: "document-header", test: (_t, lower) => includesAny(lower, DOCUMENT_HEADERS) },
  {
    name: "numbered",
    test: (t) => NUMBERED_SECTION.test(t) || NUMBERED_SUBSECTION.test(t),
  },
];

export const FRAGMENT_RULES: readonly Rule[] = [
  {
    name: "lowercase-start",
    test: (t, lower) => startsLowercase(t) && !includesAny(lower, TECHNICAL_TERMS),
  },
  { name: "connective", test: (_t, lower) => includesAny(lower, FRAGMENT_INDICATORS) },
  {
    name: "dangling-ending",
    test: (t) => endsWithAny(t, DANGLING_ENDINGS) && !t.endsWith(":"),
  },
  {
    name: "single-word",
    test: (t, lower) =>
      words(t).length < 2 &&
      !t.endsWith(":") &&
      !isUpperCase(t) &&
      !STRUCTURAL_SINGLES.includes(lower),
  },
];

export function isSentenceFragment(text: string): boolean {
  if (matchesAny(FRAGMENT_EXEMPTIONS, text)) return false;
  return matchesAny(FRAGMENT_RULES, text);
}

/** Timeline rows, figures and page furniture that would corrupt the path. */
export const PATH_BREAK_RULES: readonly Rule[] = [
  {
    name: "timeline",
    test: (t, lower) => /^\d{4}[\s-]/.test(t) || lower.includes("timeline:"),
  },
  { name: "numeric", test: (t) => /^[\d$,.\s%\-()]+$/.test(t) },
  {
    name: "page-number",
    test: (t, lower) => t.length < 10 && (isDigits(t) || /^page \d+/.test(lower)),
  },
];

/** Ordered verdicts for "is this a meaningful heading"; no match means no. */
export const MEANINGFUL_RULES: readonly VerdictRule[] = [
  { name: "too-short", verdict: false, test: (t) => t.trim().length < 2 },
  { name: "numeric", verdict: false, test: (t) => /^[\d\s\-.()]+$/.test(t) },
  {
    name: "contact",
    verdict: false,
    test: (t) => t.includes("@") || startsWithAny(t, ["http://", "https://", "www."]),
  },
  { name: "document-header", verdict: true, test: (_t, lower) => includesAny(lower, DOCUMENT_HEADERS) },
  { name: "colon", verdict: true, test: (t) => t.endsWith(":") },
  {
    name: "question",
    verdict: true,
    test: (t) => isQuestion(t, ["What ", "How ", "Why ", "When ", "Where "]),
  },
  { name: "numbered-section", verdict: true, test: (t) => NUMBERED_SECTION.test(t) },
  { name: "numbered-subsection", verdict: true, test: (t) => NUMBERED_SUBSECTION.test(t) },
  { name: "appendix", verdict: true, test: (t) => /^Appendix [A-Z]:/i.test(t) },
  {
    name: "section-title",
    verdict: true,
    test: (t) =>
      /^(Summary|Background|Introduction|Overview|Conclusion|Timeline|Milestones|Acknowledgements|References)$/i.test(t) ||
      /^Phase [IVX]+:/i.test(t) ||
      /^[A-Z][a-z]+(\s+[A-Z][a-z]*)*:$/i.test(t) ||
      /^\d+\.\s+[A-Z][a-z]+/i.test(t) ||
      /^(Chair|Term|Meetings|Membership|Preamble|Content|Audience|Duration|Outcomes|Trademarks)$/i.test(t),
  },
  { name: "for-each", verdict: true, test: (t) => startsWithAny(t, ["For each ", "For the "]) },
  {
    name: "business-term",
    verdict: true,
    test: (t, lower) => includesAny(lower, BUSINESS_TERMS) && t.length < 120,
  },
  { name: "structural-single", verdict: true, test: (_t, lower) => STRUCTURAL_SINGLES.includes(lower.trim()) },
  { name: "leading-connective", verdict: false, test: (_t, lower) => startsWithAny(lower, LEADING_CONNECTIVES) },
  {
    name: "title-case",
    verdict: true,
    test: (t) => isTitleCase(t) && t.length >= 2 && t.length <= 80,
  },
  {
    name: "all-caps",
    verdict: true,
    test: (t) => isUpperCase(t) && t.length >= 2 && t.length <= 60,
  },
];

export function isMeaningfulHeading(text: string): boolean {
  return firstMatch(MEANINGFUL_RULES, text)?.verdict ?? false;
}
