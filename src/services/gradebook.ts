import fs from 'fs';
import path from 'path';
import { logger } from '../logger';
import {
  DuplicateError,
  FormatError,
  IOError,
  InvalidScoreError,
  NotFoundError,
  ValidationError,
} from '../errors';
import { validateGradebookData, isBlank, isValidScore } from '../lib/validation';
import { computeAverage, computeGrade } from './gradingService';
import { GradebookData, StudentReport, StudentSummary, SubjectScores } from '../types';

// Fixed so list order does not depend on the host locale.
export const SORT_LOCALE = 'en';

/**
 * In-memory collection of student records, keyed by student name.
 *
 * All operations are synchronous. The instance is owned by whoever
 * constructs it; persistence happens only on an explicit save or load.
 */
export class Gradebook {
  private students = new Map<string, Map<string, number>>();

  get size(): number {
    return this.students.size;
  }

  addStudent(name: string): void {
    requireKey(name, 'Student name');
    if (this.students.has(name)) {
      throw new DuplicateError(name);
    }

    this.students.set(name, new Map());
    logger.debug({ module: 'services.gradebook', student: name }, 'Student added');
  }

  setScore(name: string, subject: string, score: unknown): void {
    const subjects = this.find(name);
    requireKey(subject, 'Subject');
    if (!isValidScore(score)) {
      throw new InvalidScoreError(score);
    }

    const previous = subjects.get(subject);
    subjects.set(subject, score);
    logger.debug({
      module: 'services.gradebook',
      student: name,
      subject,
      score,
      previous_score: previous ?? null,
    }, 'Score set');
  }

  deleteStudent(name: string): void {
    this.find(name);
    this.students.delete(name);
    logger.debug({ module: 'services.gradebook', student: name }, 'Student deleted');
  }

  report(name: string): StudentReport {
    const subjects = this.find(name);
    const average = computeAverage([...subjects.values()]);

    return {
      name,
      subjects: Object.fromEntries(subjects),
      average,
      grade: computeGrade(average),
    };
  }

  listStudents(): string[] {
    return [...this.students.keys()].sort((a, b) => a.localeCompare(b, SORT_LOCALE));
  }

  summaries(): StudentSummary[] {
    return this.listStudents().map((name) => {
      const { subjects, average, grade } = this.report(name);
      return { name, subject_count: Object.keys(subjects).length, average, grade };
    });
  }

  toJSON(): GradebookData {
    return Object.fromEntries(
      [...this.students].map(([name, subjects]): [string, SubjectScores] => [name, Object.fromEntries(subjects)]),
    );
  }

  save(filePath: string): void {
    const body = `${JSON.stringify(this.toJSON(), null, 2)}\n`;

    try {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      fs.writeFileSync(filePath, body, 'utf-8');
    } catch (err) {
      throw new IOError(filePath, err);
    }

    logger.info({
      module: 'services.gradebook',
      path: filePath,
      student_count: this.students.size,
      bytes: Buffer.byteLength(body),
    }, 'Gradebook saved');
  }

  load(filePath: string): void {
    let raw: string;
    try {
      raw = fs.readFileSync(filePath, 'utf-8');
    } catch (err) {
      throw new IOError(filePath, err);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new FormatError(filePath, 'not valid JSON', err);
    }

    const check = validateGradebookData(parsed);
    if (!check.valid) {
      throw new FormatError(filePath, check.error);
    }

    this.students = new Map(
      Object.entries(check.data).map(([name, subjects]): [string, Map<string, number>] => [
        name,
        new Map(Object.entries(subjects)),
      ]),
    );

    logger.info({
      module: 'services.gradebook',
      path: filePath,
      student_count: this.students.size,
    }, 'Gradebook loaded');
  }

  private find(name: string): Map<string, number> {
    const subjects = this.students.get(name);
    if (!subjects) {
      logger.debug({ module: 'services.gradebook', resource_type: 'student', student: name }, 'Not found');
      throw new NotFoundError(name);
    }
    return subjects;
  }
}

function requireKey(value: string, label: string): void {
  if (isBlank(value)) {
    throw new ValidationError(`${label} cannot be empty`);
  }
}
