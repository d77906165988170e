#!/usr/bin/env node
import { Command } from 'commander';
import { resolveImagesCommand, ResolveImagesOptions } from './commands/resolveImages';
import { describeError } from './utils/errorHandler';

const program = new Command();

program
  .name('resolve-images')
  .description('Resolve a destination query into attributed image URLs')
  .version('1.0.0')
  .requiredOption('-q, --query <string>', 'destination or landmark to find images for')
  .option('-c, --count <number>', 'number of images to return', '1')
  .option('--json', 'print the result as JSON')
  .action(async (options: ResolveImagesOptions) => {
    process.exitCode = await resolveImagesCommand(options);
  });

program.parseAsync().catch(error => {
  console.error('An unexpected error occurred:', describeError(error));
  process.exit(2);
});
