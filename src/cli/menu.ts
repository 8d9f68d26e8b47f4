import { logger } from '../logger';
import { COMMANDS, CommandContext } from './commands';
import { handleCommandError } from './errorHandler';

export const EXIT_CHOICE = '8';

export const MENU = [
  '',
  '--- Student Report Card Manager ---',
  ...Object.entries(COMMANDS).map(([key, command]) => `${key}) ${command.label}`),
  `${EXIT_CHOICE}) Exit`,
  '',
].join('\n');

export function saveOnExit(ctx: CommandContext): boolean {
  try {
    ctx.gradebook.save(ctx.dataFile);
    ctx.print(`Data saved to ${ctx.dataFile}`);
    return true;
  } catch (err) {
    ctx.print(`Error: ${handleCommandError(err, 'exit')}`);
    return false;
  }
}

/**
 * Runs the menu until the user exits or input ends, then saves.
 * Resolves to whether the final save succeeded.
 */
export async function runMenu(ctx: CommandContext): Promise<boolean> {
  for (;;) {
    ctx.print(MENU);
    const answer = await ctx.prompt.ask('Choose an option: ');

    if (answer === null) {
      ctx.print(ctx.prompt.interrupted ? 'Interrupted. Saving before exit...' : 'End of input. Saving before exit...');
      return saveOnExit(ctx);
    }

    const choice = answer.trim();
    if (choice === EXIT_CHOICE) {
      ctx.print('Saving and exiting...');
      return saveOnExit(ctx);
    }

    const command = COMMANDS[choice];
    if (!command) {
      ctx.print(`Invalid choice. Enter 1-${EXIT_CHOICE}.`);
      continue;
    }

    logger.debug({ module: 'cli.menu', command: command.name }, 'Command selected');
    try {
      await command.run(ctx);
    } catch (err) {
      ctx.print(`Error: ${handleCommandError(err, command.name)}`);
    }
  }
}
