import { logger } from '../logger';
import { Gradebook } from '../services/gradebook';
import { formatReport, formatSummaryTable } from './format';
import { Prompt } from './prompt';

export interface CommandContext {
  gradebook: Gradebook;
  prompt: Prompt;
  print: (line?: string) => void;
  dataFile: string;
}

export interface Command {
  name: string;
  label: string;
  run(ctx: CommandContext): Promise<void>;
}

const DONE_WORDS = ['done', 'd', ''];

// Plain decimal text only; Number() would also take "0x10" or "0b101".
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

/** Parses a typed score; null when the text is blank or not a number. */
export function parseScore(text: string): number | null {
  const trimmed = text.trim();
  if (!DECIMAL.test(trimmed)) return null;
  const score = Number(trimmed);
  return Number.isFinite(score) ? score : null;
}

async function askScore(ctx: CommandContext, question: string): Promise<number | null | undefined> {
  const answer = await ctx.prompt.ask(question);
  if (answer === null) return undefined;
  return parseScore(answer);
}

function recordScore(ctx: CommandContext, name: string, subject: string, score: number): void {
  ctx.gradebook.setScore(name, subject, score);
  if (score < 0 || score > 100) {
    ctx.print(`Warning: ${score} is outside 0-100; recorded anyway.`);
  }
  ctx.print(`${name} - ${subject}: ${score}`);
}

// 1) Add student, then collect subject scores until "done"
export const addStudentCommand: Command = {
  name: 'add',
  label: 'Add Student',
  async run(ctx) {
    const answer = await ctx.prompt.ask('Student name: ');
    if (answer === null) return;
    const name = answer.trim();

    ctx.gradebook.addStudent(name);
    ctx.print(`Added '${name}'`);
    logger.info({ module: 'cli.commands', command: 'add', student: name }, 'Student created');

    for (;;) {
      const subjectAnswer = await ctx.prompt.ask("Enter subject (or 'done'): ");
      if (subjectAnswer === null) return;
      const subject = subjectAnswer.trim();
      if (DONE_WORDS.includes(subject.toLowerCase())) return;

      const score = await askScore(ctx, `Marks for ${subject} (0-100): `);
      if (score === undefined) return;
      if (score === null) {
        ctx.print('Invalid score.');
        continue;
      }
      recordScore(ctx, name, subject, score);
    }
  },
};

// 2) Update one subject score
export const updateScoreCommand: Command = {
  name: 'update',
  label: 'Update Score',
  async run(ctx) {
    const name = await ctx.prompt.ask('Student name: ');
    if (name === null) return;
    const subject = await ctx.prompt.ask('Subject name: ');
    if (subject === null) return;
    const score = await askScore(ctx, 'Enter score (0-100): ');
    if (score === undefined) return;
    if (score === null) {
      ctx.print('Invalid score.');
      return;
    }
    recordScore(ctx, name.trim(), subject.trim(), score);
  },
};

// 3) View one student's report card
export const viewReportCommand: Command = {
  name: 'report',
  label: 'View Report',
  async run(ctx) {
    const name = await ctx.prompt.ask('Student name: ');
    if (name === null) return;
    formatReport(ctx.gradebook.report(name.trim())).forEach((line) => ctx.print(line));
  },
};

// 4) Delete a student
export const deleteStudentCommand: Command = {
  name: 'delete',
  label: 'Delete Student',
  async run(ctx) {
    const answer = await ctx.prompt.ask('Student name to delete: ');
    if (answer === null) return;
    const name = answer.trim();
    ctx.gradebook.deleteStudent(name);
    ctx.print(`Deleted '${name}'`);
    logger.info({ module: 'cli.commands', command: 'delete', student: name }, 'Student removed');
  },
};

// 5) Table of every student with average and grade
export const listStudentsCommand: Command = {
  name: 'list',
  label: 'List all students',
  async run(ctx) {
    formatSummaryTable(ctx.gradebook.summaries()).forEach((line) => ctx.print(line));
  },
};

// 6) Save now
export const saveCommand: Command = {
  name: 'save',
  label: 'Save now',
  async run(ctx) {
    ctx.gradebook.save(ctx.dataFile);
    ctx.print(`Data saved to ${ctx.dataFile}`);
  },
};

// 7) Reload from the data file, discarding unsaved changes
export const loadCommand: Command = {
  name: 'load',
  label: 'Load from file',
  async run(ctx) {
    ctx.gradebook.load(ctx.dataFile);
    ctx.print(`Loaded ${ctx.gradebook.size} students from ${ctx.dataFile}`);
  },
};

export const COMMANDS: Record<string, Command> = {
  '1': addStudentCommand,
  '2': updateScoreCommand,
  '3': viewReportCommand,
  '4': deleteStudentCommand,
  '5': listStudentsCommand,
  '6': saveCommand,
  '7': loadCommand,
};
