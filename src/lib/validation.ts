import { GradebookData, SubjectScores } from '../types';

export type ShapeCheck =
  | { valid: true; data: GradebookData }
  | { valid: false; error: string };

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isBlank(value: string): boolean {
  return value.trim().length === 0;
}

export function isValidScore(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Checks parsed JSON against the gradebook file shape:
 * an object of student name → object of subject → finite number,
 * with no empty or whitespace-only names, as the store itself requires.
 * Returns a detached copy so later edits to the input cannot leak in.
 */
export function validateGradebookData(value: unknown): ShapeCheck {
  if (!isPlainObject(value)) {
    return { valid: false, error: `expected an object at the top level, got ${describe(value)}` };
  }

  const students: Array<[string, SubjectScores]> = [];
  for (const [name, subjects] of Object.entries(value)) {
    if (isBlank(name)) {
      return { valid: false, error: 'student name cannot be empty' };
    }
    if (!isPlainObject(subjects)) {
      return { valid: false, error: `student '${name}' should map to an object, got ${describe(subjects)}` };
    }

    const scores: Array<[string, number]> = [];
    for (const [subject, score] of Object.entries(subjects)) {
      if (isBlank(subject)) {
        return { valid: false, error: `student '${name}' has an empty subject name` };
      }
      if (!isValidScore(score)) {
        return { valid: false, error: `score for '${name}' / '${subject}' is not a number` };
      }
      scores.push([subject, score]);
    }
    // fromEntries defines own keys, so a student called "__proto__" stays data.
    students.push([name, Object.fromEntries(scores)]);
  }

  return { valid: true, data: Object.fromEntries(students) };
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'an array';
  return typeof value;
}
