#!/usr/bin/env node
import path from 'path';
import { loadConfig } from './config';
import { logger } from './logger';
import { ReadlinePrompt } from './cli/prompt';
import { runSession } from './cli/session';

async function main(): Promise<number> {
  const config = loadConfig();
  const dataFile = path.resolve(config.dataFile);
  const prompt = new ReadlinePrompt(process.stdin, process.stdout);

  // Non-terminal stdin gets SIGINT as a process signal.
  process.on('SIGINT', () => prompt.interrupt());
  process.on('SIGTERM', () => prompt.interrupt());

  logger.info({
    module: 'index',
    data_file: dataFile,
    log_level: config.logLevel,
    node_version: process.version,
  }, 'Gradebook started');

  try {
    return await runSession({
      prompt,
      dataFile,
      print: (line = '') => process.stdout.write(`${line}\n`),
    });
  } finally {
    prompt.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    const error = err instanceof Error ? err : new Error(String(err));
    logger.fatal({ module: 'index', error_message: error.message, stack_trace: error.stack }, 'Gradebook crashed');
    process.exitCode = 1;
  });
