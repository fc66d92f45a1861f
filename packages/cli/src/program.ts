import { Command } from 'commander';
import { version } from '../package.json';
import { processEnvironment, type CliEnvironment } from './commands/context';
import { registerGenerateCommand } from './commands/generate';
import { registerIterateCommand } from './commands/iterate';

export function createProgram(environment: CliEnvironment = processEnvironment()): Command {
  const program = new Command();

  program
    .name('specforge')
    .description('Generate multi-file projects from natural-language specifications')
    .version(version)
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging')
    .option('--provider <id>', 'Provider to use instead of defaults.provider')
    .option('--api-key <key>', 'API key for the selected provider')
    .option('--yes', 'Automatically answer "yes" to all prompts')
    .option('--non-interactive', 'Disable interactive prompts (deny if a prompt is needed)');

  registerGenerateCommand(program, environment);
  registerIterateCommand(program, environment);

  return program;
}
