import { LetterGrade } from '../types';

// Minimum average for each grade, checked top-down.
export const GRADE_THRESHOLDS: ReadonlyArray<readonly [number, LetterGrade]> = [
  [90, 'A'],
  [80, 'B'],
  [70, 'C'],
  [60, 'D'],
];

export function computeAverage(scores: number[]): number {
  if (scores.length === 0) return 0;
  return scores.reduce((sum, score) => sum + score, 0) / scores.length;
}

export function computeGrade(average: number): LetterGrade {
  for (const [min, grade] of GRADE_THRESHOLDS) {
    if (average >= min) return grade;
  }
  return 'F';
}
