export type LetterGrade = 'A' | 'B' | 'C' | 'D' | 'F';

/** Subject name → score. Scores are expected in 0–100 but not range-checked. */
export type SubjectScores = Record<string, number>;

/** Persisted shape: student name → subject scores. */
export type GradebookData = Record<string, SubjectScores>;

export interface StudentReport {
  name: string;
  subjects: SubjectScores;
  average: number;
  grade: LetterGrade;
}

export interface StudentSummary {
  name: string;
  subject_count: number;
  average: number;
  grade: LetterGrade;
}
