/**
 * Command-line parsing for rtfmerge.
 */

export type CliMode = "compile" | "extract" | "init" | "help";

export interface CliArgs {
  mode: CliMode;
  /** RTF file for --extract. */
  extractPath?: string;
  configPath?: string;
  clean: boolean;
  quiet: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export const USAGE = `Usage:
  rtfmerge [--config <path>] [--clean] [--quiet]     compile fragments into the template
  rtfmerge --extract <file.rtf> [--config <path>]    extract sections back to markup
  rtfmerge --init [--config <path>]                  write a starter config
  rtfmerge --help

Options:
  -c, --config <path>   config file (default: $RTFMERGE_CONFIG or rtfmerge.config.json)
  -e, --extract <file>  RTF file to extract from
      --clean           empty the output directory before compiling
  -q, --quiet           only print warnings and errors
      --init            create a starter rtfmerge.config.json
  -h, --help            show this help`;

const ALIASES: Record<string, string> = {
  "-c": "--config",
  "-e": "--extract",
  "-q": "--quiet",
  "-h": "--help",
};

export function parseCliArgs(argv: string[]): CliArgs {
  const args: CliArgs = { mode: "compile", clean: false, quiet: false };
  let init = false;
  let help = false;

  for (let i = 0; i < argv.length; i++) {
    let arg = argv[i];
    let inlineValue: string | undefined;

    const eq = arg.indexOf("=");
    if (arg.startsWith("--") && eq !== -1) {
      inlineValue = arg.slice(eq + 1);
      arg = arg.slice(0, eq);
    }
    arg = ALIASES[arg] ?? arg;

    const takeValue = (): string => {
      if (inlineValue !== undefined) return inlineValue;
      const next = argv[i + 1];
      if (next === undefined || next.startsWith("-")) {
        throw new UsageError(`${arg} requires a value`);
      }
      i++;
      return next;
    };

    switch (arg) {
      case "--config":
        args.configPath = takeValue();
        break;
      case "--extract":
        args.extractPath = takeValue();
        break;
      case "--clean":
        args.clean = true;
        break;
      case "--quiet":
        args.quiet = true;
        break;
      case "--init":
        init = true;
        break;
      case "--help":
        help = true;
        break;
      default:
        throw new UsageError(`Unknown argument: ${argv[i]}`);
    }
  }

  if (help) {
    args.mode = "help";
  } else if (init) {
    if (args.extractPath) throw new UsageError("--init cannot be combined with --extract");
    args.mode = "init";
  } else if (args.extractPath) {
    if (args.clean) throw new UsageError("--clean cannot be combined with --extract");
    args.mode = "extract";
  }

  return args;
}
