import fs from 'fs';
import { logger } from '../logger';
import { Gradebook } from '../services/gradebook';
import { CommandContext } from './commands';
import { handleCommandError } from './errorHandler';
import { runMenu } from './menu';

export type SessionOptions = Omit<CommandContext, 'gradebook'>;

/**
 * One interactive session over a data file: load it if present, run the
 * menu, save on the way out. Resolves to the process exit code.
 *
 * A data file that exists but cannot be loaded stops the session before
 * the menu, so the exit-time save never overwrites it with an empty book.
 */
export async function runSession(options: SessionOptions): Promise<number> {
  const gradebook = new Gradebook();
  const ctx: CommandContext = { ...options, gradebook };

  if (fs.existsSync(ctx.dataFile)) {
    try {
      gradebook.load(ctx.dataFile);
      ctx.print(`Loaded ${gradebook.size} students from ${ctx.dataFile}`);
    } catch (err) {
      ctx.print(`Error: ${handleCommandError(err, 'startup')}`);
      ctx.print('Fix or move the data file, then start again.');
      return 1;
    }
  } else {
    logger.info({ module: 'cli.session', path: ctx.dataFile }, 'No data file yet, starting empty');
  }

  const saved = await runMenu(ctx);
  return saved ? 0 : 1;
}
