import type { SubjectLabel } from "@/lib/knowledge/types";

export const DEFAULT_SUBJECT: SubjectLabel = "English";

/** A digit, an arithmetic operator, then a digit: "2+2", "7 x 3", "9 - 4". */
const ARITHMETIC_EXPRESSION = /\d\s*[+*/x×]\s*\d|\d\s+-\s+\d/;

export type SubjectKeyword = string | RegExp;

/**
 * Checked in order; the first subject with a keyword matching the
 * lower-cased text wins. String keywords match by substring containment.
 */
export const SUBJECT_KEYWORDS: ReadonlyArray<readonly [SubjectLabel, readonly SubjectKeyword[]]> = [
  [
    "Math",
    [
      "math",
      "algebra",
      "geometry",
      "equation",
      "theorem",
      "fraction",
      "decimal",
      "multiplication",
      "division",
      "linear",
      "function",
      "arithmetic",
      "calculus",
      "probability",
      "percentage",
      ARITHMETIC_EXPRESSION,
    ],
  ],
  [
    "Science",
    [
      "science",
      "biology",
      "physics",
      "chemistry",
      "ecosystem",
      "water cycle",
      "photosynthesis",
      "energy",
      "motion",
      "cell",
      "atom",
      "plant",
      "animal",
      "weather",
    ],
  ],
  ["Social", ["history", "war", "ancient", "revolution", "civil war", "geography", "culture", "government", "social"]],
  ["English", ["english", "literature", "grammar", "writing", "poem", "story", "reading"]],
];

function matchesKeyword(text: string, keyword: SubjectKeyword): boolean {
  return typeof keyword === "string" ? text.includes(keyword) : keyword.test(text);
}

export function inferSubject(text: string): SubjectLabel {
  const normalized = text.toLowerCase();

  for (const [subject, keywords] of SUBJECT_KEYWORDS) {
    if (keywords.some((keyword) => matchesKeyword(normalized, keyword))) {
      return subject;
    }
  }

  return DEFAULT_SUBJECT;
}
