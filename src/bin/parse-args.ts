import { DEFAULT_CONFIG_FILE } from "../config/load-config.js";
import { RepoCleanerError } from "../errors.js";

export interface CliArgs {
  /** Protected-branch file; menu option 0 can still replace it. */
  filename?: string;
  configFile: string;
  verbose: boolean;
  help: boolean;
}

export const HELP_TEXT = `
  repo-cleaner: delete the branches of a Bitbucket repository, keeping the
  default branch and the names listed in a protected-branch file.
  Apply the menu steps in order: set the file, project key and repository slug first.

  Usage: repo-cleaner [options]

  Options:
    --filename <path>  File of branch names that must not be deleted, one per line
    --config <path>    YAML file with url, username and password (default: ${DEFAULT_CONFIG_FILE})
    --verbose, -v      Debug logging on stderr
    --help, -h         Show this help
`;

function requireValue(argv: string[], index: number, flag: string): string {
  const value = argv[index];
  if (value === undefined || value.startsWith("--")) {
    throw new RepoCleanerError(`${flag} requires a value`, "USAGE");
  }
  return value;
}

/** Parses `process.argv`; the first two entries (runtime and script) are skipped. */
export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { configFile: DEFAULT_CONFIG_FILE, verbose: false, help: false };

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "--filename":
        args.filename = requireValue(argv, ++i, arg);
        break;
      case "--config":
        args.configFile = requireValue(argv, ++i, arg);
        break;
      case "--verbose":
      case "-v":
        args.verbose = true;
        break;
      case "--help":
      case "-h":
        args.help = true;
        break;
      default:
        throw new RepoCleanerError(`Unknown option: ${arg}`, "USAGE");
    }
  }

  return args;
}
