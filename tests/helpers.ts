import fs from 'fs';
import os from 'os';
import path from 'path';
import { Prompt } from '../src/cli/prompt';

/** Answers questions from a fixed script; null once the script runs out. */
export class ScriptedPrompt implements Prompt {
  readonly questions: string[] = [];
  interrupted = false;

  constructor(private answers: string[]) {}

  async ask(question: string): Promise<string | null> {
    this.questions.push(question);
    return this.answers.shift() ?? null;
  }

  close(): void {}
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'gradebook-test-'));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}
