export const SUBJECT_LABELS = ["Math", "Science", "Social", "English"] as const;

export type SubjectLabel = (typeof SUBJECT_LABELS)[number];

export type KnowledgeEntry = {
  readonly grade: number;
  readonly subject: string;
  readonly chapterNumber: number;
  readonly chapterName: string;
  readonly content: string;
};

export type AuxiliaryEntry = {
  readonly topic: string;
  readonly content: string;
};

export type IndexedEntry = {
  index: number;
  entry: KnowledgeEntry;
};

export type ScoredEntry<T> = {
  entry: T;
  score: number;
};
