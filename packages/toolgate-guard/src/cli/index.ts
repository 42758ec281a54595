import { Command } from 'commander';

import { checkCommands } from './commands/check.js';
import { policyCommands } from './commands/policy.js';
import { toolsCommands } from './commands/tools.js';

export function createCli(): Command {
  const program = new Command();
  program
    .name('toolgate')
    .description('Guard rails for agent tool calls')
    .version('0.1.0');

  const policy = program.command('policy').description('Role policy management');

  policy
    .command('lint <file>')
    .description('Validate a policy file')
    .action(policyCommands.lint);

  policy
    .command('show')
    .option('-p, --policy <ref>', 'Policy file path or built-in name')
    .option('-r, --root <dir>', 'Project root')
    .description('Show the effective policy after extends and canonicalization')
    .action((options) => policyCommands.show(options));

  const check = program.command('check').description('Evaluate a single action');

  check
    .command('command <command>')
    .option('-w, --workdir <dir>', 'Working directory the command would run in')
    .description('Check a shell command against the blocklist')
    .action((command, options) => checkCommands.command(command, options));

  check
    .command('write <path>')
    .option('-p, --policy <ref>', 'Policy file path or built-in name')
    .option('-r, --root <dir>', 'Project root')
    .description('Check whether a write to a path is permitted')
    .action((target, options) => checkCommands.write(target, options));

  program
    .command('tools')
    .option('--non-interactive', 'Omit AskUserQuestion')
    .option('--allow <names...>', 'Only list these tools')
    .description('Print tool definitions as JSON')
    .action((options) => toolsCommands.list(options));

  return program;
}
