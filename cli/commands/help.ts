/**
 * Help command implementation.
 *
 * @module
 */

import type { Operation } from "effection";

const MAIN_HELP = `
Version Benchmark CLI

Usage: bench <command> [options]

Commands:
  run             Benchmark several versions of an application and report
  report          Generate the comparison report from recorded results
  status          Show recorded benchmark data
  help            Show this help message

Run 'bench help <command>' for command-specific help.

Examples:
  bench run --version 5.1.6 --version 5.2.4 --working-copy ../app
  bench report --format html
  bench status
`.trim();

const RUN_HELP = `
bench run - Benchmark several versions of an application and report

Usage:
  bench run --version <label> [--version <label> ...] [options]

For each version, in order: check it out in the working copy, run the
harness, and record its result file as .benchmarks/<platform>/NNNN_<label>.json.
A failing version is skipped. The report is generated once at the end if
at least one version was recorded. The working copy is returned to its
original ref afterwards.

Options:
  --version, -v       Version label to benchmark. Can be repeated.
                      (default: "versions" from config)
  --working-copy, -w  Git working copy of the application
  --harness           Harness command; {output} is the result file path,
                      {version} the version label
  --ref-template      Git ref for a version label (default: {version})
  --output, -o        Output directory (default: .)
  --platform          Platform folder name (default: <os>-<arch>-node<major>)
  --format, -f        Report format: pdf, html, markdown (default: pdf)
  --chart-style       Chart style: bar, line (default: bar)
  --title             Report title
  --config, -c        Config file (default: benchmark.config.json)

Examples:
  bench run -v 5.1.6 -v 5.2.4 -w ../app --harness "make bench OUT={output}"
  bench run --ref-template "v{version}" --format markdown
`.trim();

const REPORT_HELP = `
bench report - Generate the comparison report from recorded results

Usage:
  bench report [options]

Writes:
  <output>/benchmark_charts.<pdf|html|md>
  <output>/performance_comparison.md
  <output>/charts/<benchmark>.png

Options:
  --output, -o        Output directory (default: .)
  --results           Results directory (default: <output>/.benchmarks/<platform>)
  --file              Report on a single result file instead
  --version           Version label for --file (env: BENCH_VERSION)
  --platform          Platform folder name (default: <os>-<arch>-node<major>)
  --format, -f        Report format: pdf, html, markdown (default: pdf)
  --chart-style       Chart style: bar, line (default: bar)
  --title             Report title
  --config, -c        Config file (default: benchmark.config.json)

Examples:
  bench report
  bench report --format html --chart-style line
  bench report --file results.json --version 6.0.4 --format markdown
`.trim();

const STATUS_HELP = `
bench status - Show recorded benchmark data

Usage:
  bench status [options]

Shows, per platform folder:
  - Number of result files and benchmarks
  - Files and records per version, in version order
  - Files that were skipped and why

Options:
  --output, -o        Output directory (default: .)
  --platform          Only show this platform folder
  --config, -c        Config file (default: benchmark.config.json)

Examples:
  bench status
  bench status --platform Linux-x64-node20
`.trim();

const COMMAND_HELP: Record<string, string> = {
  run: RUN_HELP,
  report: REPORT_HELP,
  status: STATUS_HELP,
  help: MAIN_HELP,
};

/**
 * Display help for a command or general usage.
 */
export function* helpCommand(args: string[]): Operation<number> {
  const subcommand = args[0];

  if (subcommand && COMMAND_HELP[subcommand]) {
    console.log(COMMAND_HELP[subcommand]);
  } else if (subcommand) {
    console.error(`Unknown command: ${subcommand}`);
    console.log();
    console.log(MAIN_HELP);
    return 1;
  } else {
    console.log(MAIN_HELP);
  }

  return 0;
}
