import { parseArgs } from "node:util";
import { buildProject, type BuildOptions } from "../build/pipeline.js";
import { ConfigError, parseConcurrency } from "../config.js";
import { PathNotFoundError } from "../errors.js";
import { plainFormatter, type Formatter } from "../format/colors.js";

export function buildUsage(formatter: Formatter = plainFormatter): string {
  return `
builds your site

USAGE:
  inkwell build ${formatter.highlight("<project>")} [options]

ARGUMENTS:
  <project>                 Project directory (default: .)

OPTIONS:
  -p, --project <path>      Project directory, when no <project> is given
  -c, --concurrency <n>     Items in flight per build phase (default: unbounded)
  -h, --help                Show this help message

PROJECT LAYOUT:
  site.json                 Site configuration (optional)
  pages/*.md                Pages, rendered with layout "page" by default
  posts/*.md                Posts, rendered with layout "post" by default
  theme/layouts/*           Mustache layouts, matched by name up to the first dot
  theme/assets/*            Copied to <outDir>/assets

ENVIRONMENT:
  LOG_LEVEL                 debug, info, warn or error (default: info)
  INKWELL_CONCURRENCY       Default for --concurrency (0 = unbounded)
`;
}

export type BuildCommand =
  | { kind: "help" }
  | { kind: "build"; path: string; concurrency?: number }
  | { kind: "invalid"; reason: string };

/**
 * Turn `inkwell build` arguments into a command. Never throws.
 */
export function parseBuildArgs(args: string[]): BuildCommand {
  let values: { help?: boolean; project?: string; concurrency?: string };
  let positionals: string[];
  try {
    ({ values, positionals } = parseArgs({
      args,
      options: {
        help: { type: "boolean", short: "h", default: false },
        project: { type: "string", short: "p" },
        concurrency: { type: "string", short: "c" },
      },
      allowPositionals: true,
      strict: true,
    }));
  } catch (err) {
    return { kind: "invalid", reason: err instanceof Error ? err.message : String(err) };
  }

  if (values.help || (positionals.length === 1 && positionals[0] === "help")) {
    return { kind: "help" };
  }

  if (positionals.length > 1) {
    return {
      kind: "invalid",
      reason: `Expected one project path, got ${positionals.length}: ${positionals.join(" ")}`,
    };
  }

  const path = positionals[0] ?? values.project ?? ".";

  if (values.concurrency === undefined) {
    return { kind: "build", path };
  }

  try {
    return {
      kind: "build",
      path,
      concurrency: parseConcurrency(values.concurrency, "--concurrency"),
    };
  } catch (err) {
    if (err instanceof ConfigError) {
      return { kind: "invalid", reason: err.message };
    }
    throw err;
  }
}

export interface BuildCommandOptions extends BuildOptions {
  formatter: Formatter;
  /** Final result line goes here */
  print?: (line: string) => void;
}

/**
 * Build the project at `path` and print exactly one result line.
 * Resolves to true when the build succeeded.
 */
export async function runBuild(
  path: string,
  options: BuildCommandOptions
): Promise<boolean> {
  const { formatter, print = console.log } = options;
  const outcome = await buildProject(path, options);

  if (outcome.ok) {
    print(formatter.success("Successfully built site!"));
    return true;
  }

  const message =
    outcome.error instanceof PathNotFoundError
      ? "Directory does not exist"
      : outcome.error.message;
  print(`Encountered issues building site, ${formatter.error(message)}`);
  return false;
}

/**
 * `inkwell build`. Resolves to the process exit code.
 */
export async function buildCommand(
  args: string[],
  options: BuildCommandOptions
): Promise<number> {
  const { formatter, print = console.log } = options;
  const command = parseBuildArgs(args);

  switch (command.kind) {
    case "help":
      print(buildUsage(formatter));
      return 0;
    case "invalid":
      print(`${formatter.error("Error:")} ${command.reason}`);
      print(buildUsage(formatter));
      return 1;
    case "build": {
      const ok = await runBuild(command.path, {
        ...options,
        concurrency: command.concurrency ?? options.concurrency,
      });
      return ok ? 0 : 1;
    }
  }
}
