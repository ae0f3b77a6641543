#!/usr/bin/env node

import { createRequire } from "node:module";
import { fileURLToPath } from "node:url";
import { Command, InvalidArgumentError } from "commander";
import { listCommand } from "./commands/list.js";
import { bugsCommand, repoCommand } from "./commands/repo.js";
import { errorMessage } from "./lib/errors.js";

const require = createRequire(import.meta.url);
const pkg = require("../package.json") as { version: string };

function parseTimeout(value: string): number {
  const ms = Number(value);
  if (!Number.isInteger(ms) || ms < 0) {
    throw new InvalidArgumentError("expected a non-negative number of milliseconds");
  }
  return ms;
}

function parsePattern(value: string): RegExp {
  try {
    return new RegExp(value);
  } catch (err) {
    throw new InvalidArgumentError(errorMessage(err));
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name("modscout")
    .description(
      "Look up available versions and source locations of Go modules",
    )
    .version(pkg.version);

  // List command
  program
    .command("list <module>")
    .description(
      "List versions of a module newer than --current, with retraction details",
    )
    .option("--current <version>", "version already in use")
    .option("--all", "list all versions, including older and retracted ones")
    .option(
      "--suffix <regexp>",
      "only list versions with a pre-release matching the pattern",
      parsePattern,
    )
    .option("--proxy <list>", "module proxy list (default: $GOPROXY)")
    .option("--timeout <ms>", "overall deadline, 0 for none", parseTimeout)
    .option("--json", "output as JSON")
    .option("--verbose", "log every request to stderr")
    .option("--cwd <path>", "working directory (default: current directory)")
    .action(
      async (
        modulePath: string,
        options: {
          current?: string;
          all?: boolean;
          suffix?: RegExp;
          proxy?: string;
          timeout?: number;
          json?: boolean;
          verbose?: boolean;
          cwd?: string;
        },
      ) => {
        await listCommand(modulePath, options);
      },
    );

  // Repo and bugs commands
  for (const [name, description, command] of [
    ["repo", "Print the source repository URL of a module", repoCommand],
    ["bugs", "Print the issue tracker URL of a module", bugsCommand],
  ] as const) {
    program
      .command(`${name} <module>`)
      .description(description)
      .option("--timeout <ms>", "overall deadline, 0 for none", parseTimeout)
      .option("--verbose", "log every request to stderr")
      .option("--cwd <path>", "working directory (default: current directory)")
      .action(
        async (
          modulePath: string,
          options: { timeout?: number; verbose?: boolean; cwd?: string },
        ) => {
          await command(modulePath, options);
        },
      );
  }

  return program;
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  await createProgram().parseAsync();
}
