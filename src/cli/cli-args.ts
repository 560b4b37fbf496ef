/**
 * Command line arguments for `api-workbench`
 */

export interface CliArgs {
  projectDir?: string;
  help: boolean;
}

export const USAGE = `Usage: api-workbench [--project <dir>]

Options:
  -p, --project <dir>  Project directory containing project.json
  -h, --help           Show this help

Without --project the projects under $PROJECTS_DIR (default: current directory) are listed.`;

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '-h' || arg === '--help') {
      args.help = true;
    } else if (arg === '-p' || arg === '--project') {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith('-')) {
        throw new Error(`${arg} needs a directory`);
      }
      args.projectDir = value;
      i++;
    } else if (arg.startsWith('--project=')) {
      args.projectDir = arg.slice('--project='.length);
    } else {
      throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return args;
}
