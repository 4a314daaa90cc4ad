import type { GeneratedContent } from '../types/content';
import { InvalidArgumentError } from '../utils/errors';

const DEFAULT_TITLE = 'Professional Profile';
const TITLE_TOKENS = 6;
const KEYWORD_LIMIT = 10;
const OVERLAP_IN_TEXT = 6;
const SCANNED_LINES = 12;
const CANDIDATE_KEYWORDS = 8;
const MAX_BULLETS = 8;
const BULLET_LINE_CHARS = 140;
const FALLBACK_KEYWORDS = 5;

const KEYWORD_PATTERN = /[a-z]{4,}/g;

export const RESUME_HEADER = 'Impact-forward Resume';
export const RESUME_FOOTER = 'Created with Resume Builder';
export const LOOM_ADVICE =
  'Record a 60–90s Loom: start with a 10s intro (name, role), then 30s on a signature achievement, 20s on how it maps to the JD, ' +
  'and finish with a clear ask to connect. Smile, good lighting, and share 1 on-screen artifact (dashboard, code snippet, design).';

export function nonEmptyLines(text: string): string[] {
  return text
    .split(/\r\n|\r|\n/)
    .map((line) => line.trim())
    .filter(Boolean);
}

/**
 * Most frequent lowercase ASCII words of four letters or more.
 * Equal counts keep first-occurrence order (Map insertion order + stable sort).
 */
export function extractKeywords(text: string, limit = KEYWORD_LIMIT): string[] {
  const counts = new Map<string, number>();
  for (const word of text.toLowerCase().match(KEYWORD_PATTERN) ?? []) {
    counts.set(word, (counts.get(word) ?? 0) + 1);
  }
  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, limit)
    .map(([word]) => word);
}

// Counts code points so astral characters are never split
function truncateCodePoints(text: string, limit: number): string {
  return Array.from(text).slice(0, limit).join('');
}

function deriveTitle(lines: string[]): string {
  if (lines.length === 0) return DEFAULT_TITLE;
  return lines[0].split(/\s+/).slice(0, TITLE_TOKENS).join(' ');
}

function buildBullets(materialLines: string[], jobKeywords: string[], materialKeywords: string[]): string[] {
  const candidates = jobKeywords.slice(0, CANDIDATE_KEYWORDS);
  const bullets: string[] = [];

  for (const line of materialLines.slice(0, SCANNED_LINES)) {
    if (bullets.length >= MAX_BULLETS) break;
    const lowered = line.toLowerCase();
    const keyword = candidates.find((k) => lowered.includes(k));
    if (keyword) {
      bullets.push(`Delivered ${keyword}-focused outcomes: ${truncateCodePoints(line, BULLET_LINE_CHARS)}`);
    }
  }

  if (bullets.length === 0) {
    return [`Accomplished key outcomes across ${materialKeywords.slice(0, FALLBACK_KEYWORDS).join(', ')}.`];
  }
  return bullets;
}

function buildCoverLetter(overlap: string[]): string {
  return (
    'Dear Hiring Manager,\n\n' +
    "I'm excited to apply for this opportunity. After reviewing the job description, I curated the attached resume to emphasize the most relevant " +
    `skills and outcomes, including ${overlap.slice(0, OVERLAP_IN_TEXT).join(', ')}. ` +
    'I thrive in collaborative, fast-moving environments and would welcome the chance to contribute.\n\n' +
    'Sincerely,\nYour Name'
  );
}

// Keyword-overlap resume draft; deterministic for identical inputs
export function generateContent(jobDescription: string, userMaterial: string): GeneratedContent {
  if (!jobDescription.trim() || !userMaterial.trim()) {
    throw new InvalidArgumentError('Both job description and user material are required');
  }

  const jobLines = nonEmptyLines(jobDescription);
  const materialLines = nonEmptyLines(userMaterial);

  const jobKeywords = extractKeywords(jobDescription);
  const materialKeywords = extractKeywords(userMaterial);
  const materialSet = new Set(materialKeywords);
  const overlap = jobKeywords.filter((k) => materialSet.has(k));

  const summary =
    `Results-driven professional aligning closely with the role's priorities: ${overlap.slice(0, OVERLAP_IN_TEXT).join(', ')}. ` +
    'Brings proven experience highlighted below and tailored precisely to the job description.';

  return {
    title: deriveTitle(jobLines),
    summary,
    bullets: buildBullets(materialLines, jobKeywords, materialKeywords),
    cover_letter: buildCoverLetter(overlap),
    header: RESUME_HEADER,
    footer: RESUME_FOOTER,
    advice: LOOM_ADVICE,
  };
}
