#!/usr/bin/env node
// scanner.ts

/**
 * Entry-point for the tagged-comment scanner.
 *
 * Commands:
 *   init                 : create the .tdl working directory
 *   destroy [--yes]      : remove the .tdl directory after confirmation
 *   scan [dirpath]       : walk a tree and list TODO/FIXME/NOTE/HACK/BUG/OPTIMIZE/DEPRECATE comments
 *     --tag <list>       : comma-separated tags to keep (default: all)
 *     --workers <n>      : concurrent extractions (default: CPU count)
 *     --output <fmt>     : write comments.<fmt> (json, yaml, yml, text, txt) instead of printing
 *     --outputdir <dir>  : where --output writes (default: .tdl)
 *     --summarize        : print how often each tag occurs
 *     --blame            : attach git blame author/commit/time to every comment
 *     --exclude <glob>   : gitignore-style pattern to skip (repeatable)
 *     --ignore-file <f>  : gitignore-style file under dirpath to honour (repeatable)
 *   report               : tag counts from a saved comments.json / comments.yaml
 *
 * Every option can also be set through a TDL_<OPTION> environment variable,
 * e.g. TDL_WORKERS=4.
 */

import * as os from "os";
import * as path from "path";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { discover } from "./core/file_scanner_core";
import { GitBlameProvider } from "./core/git_blame";
import {
  countComments,
  formatSummary,
  loadSnapshot,
  prettyPrint,
  serialize,
  summarize,
} from "./core/result_sink";
import { scanAll } from "./core/scan_orchestrator";
import {
  WORKSPACE_DIR,
  destroyWorkspace,
  initWorkspace,
  promptConfirm,
} from "./core/workspace";
import { describe } from "./core/errors";

interface ScanArgs {
  dirpath: string;
  tag: string;
  color: boolean;
  ignoreErrors: boolean;
  workers: number;
  output?: string;
  outputdir: string;
  summarize: boolean;
  blame: boolean;
  exclude: string[];
  ignoreFile: string[];
}

/**
 * runScan(args):
 *   1. Discover candidate files under dirpath.
 *   2. Extract tagged comments concurrently.
 *   3. Then exactly one of: write the output file, print the tag summary,
 *      or pretty-print every comment.
 */
async function runScan(args: ScanArgs): Promise<void> {
  const t0 = process.hrtime.bigint();
  const files = await discover(args.dirpath, {
    ignoreFiles: args.ignoreFile,
    extraIgnorePatterns: args.exclude,
  });

  const results = await scanAll(files, args.workers, args.tag, args.ignoreErrors, {
    blame: args.blame ? new GitBlameProvider() : undefined,
  });
  const t1 = process.hrtime.bigint();

  if (args.output) {
    const outPath = await serialize(results, args.output, args.outputdir);
    console.log(`✅ Extracted ${countComments(results)} comments written to ${outPath}`);
    return;
  }

  if (args.summarize) {
    console.log(formatSummary(summarize(results, args.tag)));
    return;
  }

  prettyPrint(results, args.color);
  console.log(
    `Scanned ${files.length} files, found ${countComments(results)} comments in ${(
      Number(t1 - t0) / 1_000_000
    ).toFixed(2)} ms.`
  );
}

async function main() {
  await yargs(hideBin(process.argv))
    .scriptName("tdl")
    .env("TDL")
    .command(
      "init",
      `Create the ${WORKSPACE_DIR} directory`,
      () => {},
      async () => {
        const status = await initWorkspace(WORKSPACE_DIR);
        console.log(
          status === "created"
            ? `✅ Directory created: ${WORKSPACE_DIR}`
            : `ℹ️  Directory already exists: ${WORKSPACE_DIR}`
        );
      }
    )
    .command(
      "destroy",
      `Remove the ${WORKSPACE_DIR} directory`,
      (y) =>
        y.option("yes", {
          alias: "y",
          type: "boolean",
          default: false,
          description: "Skip the confirmation prompt.",
        }),
      async (argv) => {
        const confirm = argv.yes ? async () => true : promptConfirm;
        const status = await destroyWorkspace(WORKSPACE_DIR, confirm);
        if (status === "missing") {
          console.log(`ℹ️  Directory does not exist: ${WORKSPACE_DIR}`);
        } else if (status === "aborted") {
          console.log("Aborted");
        } else {
          console.log(`🗑️  Destroyed: ${WORKSPACE_DIR}`);
        }
      }
    )
    .command(
      "scan [dirpath]",
      "Scan a directory tree for tagged comments",
      (y) =>
        y
          .positional("dirpath", {
            type: "string",
            default: ".",
            description: "Directory to recursively scan.",
          })
          .option("tag", {
            alias: "t",
            type: "string",
            default: "",
            description: 'Comma-separated tags to keep (e.g. "TODO,FIXME").',
          })
          .option("color", {
            type: "boolean",
            default: true,
            description: "Colorize output (use --no-color to disable).",
          })
          .option("ignore-errors", {
            type: "boolean",
            default: true,
            description: "Do not report files that could not be read.",
          })
          .option("workers", {
            alias: "w",
            type: "number",
            default: os.availableParallelism(),
            description: "Number of files processed concurrently.",
          })
          .option("output", {
            alias: "o",
            type: "string",
            choices: ["json", "yaml", "yml", "text", "txt"],
            description: "Write comments.<format> instead of printing.",
          })
          .option("outputdir", {
            type: "string",
            default: WORKSPACE_DIR,
            description: "Directory for the --output file.",
          })
          .option("summarize", {
            alias: "s",
            type: "boolean",
            default: false,
            description: "Print the frequency of each tag.",
          })
          .option("blame", {
            type: "boolean",
            default: false,
            description: "Attach git blame metadata (one git process per comment).",
          })
          .option("exclude", {
            type: "string",
            array: true,
            description: "Gitignore-style pattern to skip. Repeatable.",
          })
          .option("ignore-file", {
            type: "string",
            array: true,
            description: 'Ignore file under dirpath to honour (e.g. ".gitignore"). Repeatable.',
          }),
      async (argv) => {
        await runScan({
          dirpath: argv.dirpath,
          tag: argv.tag,
          color: argv.color,
          ignoreErrors: argv.ignoreErrors,
          workers: argv.workers,
          output: argv.output,
          outputdir: argv.outputdir,
          summarize: argv.summarize,
          blame: argv.blame,
          exclude: argv.exclude ?? [],
          ignoreFile: argv.ignoreFile ?? [],
        });
      }
    )
    .command(
      "report",
      "Print tag counts from a saved snapshot",
      (y) =>
        y
          .option("snapshot", {
            type: "string",
            default: path.join(WORKSPACE_DIR, "comments.json"),
            description: "comments.json or comments.yaml written by `scan --output`.",
          })
          .option("tag", {
            alias: "t",
            type: "string",
            default: "all",
            description: 'Comma-separated tags to report, or "all".',
          }),
      async (argv) => {
        const entries = await loadSnapshot(argv.snapshot);
        console.log(formatSummary(summarize(entries, argv.tag)));
      }
    )
    .demandCommand(1, "Expected a command: init | destroy | scan | report")
    .strict()
    .fail(false)
    .help()
    .alias("help", "h")
    .parseAsync();
}

main().catch((err: unknown) => {
  console.error(`❌ ${describe(err)}`);
  process.exit(1);
});
