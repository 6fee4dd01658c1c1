#!/usr/bin/env node
/**
 * @fileoverview Command-line entry point.
 *
 * Reads a farm description, solves it and prints the report.
 *
 * ## Phases
 * 1. CONFIG: flags over FARM_* environment variables over defaults
 * 2. LOAD: parse and validate the farm (halts on StructuralError)
 * 3. SOLVE: select routes, allocate agents, schedule turns
 * 4. REPORT: full report, or move lines only
 *
 * @module main
 */

import * as fs from "fs";
import { resolveSolverConfig } from "./config";
import { ConfigError } from "./errors";
import { loadFarm } from "./farm";
import { SolutionReporter } from "./report";
import { solveFarm } from "./solver";
import { ErrorMapper, setLogLevel } from "./utils";

export const USAGE = `
Farm Router

Usage:
  farm-router <file> [options]

Options:
  --strategy <name>   Route selection: disjoint (default) or per-neighbor
  --all-routes        List every simple route as a candidate
  --max-routes <n>    Cap on enumerated routes per first hop (default 1000)
  --moves-only        Print only the move lines
  --echo-input        Print the input, a blank line, then the move lines
  --verbose           Log solver progress to stderr
  --debug             Log every accepted route and turn to stderr
  --help              Show this message
`;

export interface CliOptions {
  file: string | null;
  movesOnly: boolean;
  echoInput: boolean;
  help: boolean;
  /** Solver configuration set by flags */
  overrides: Record<string, unknown>;
}

function requireValue(args: string[], index: number, flag: string): string {
  const value = args[index + 1];
  if (value === undefined || value.startsWith("--")) {
    throw new ConfigError(`${flag} requires a value`);
  }
  return value;
}

export function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = {
    file: null,
    movesOnly: false,
    echoInput: false,
    help: false,
    overrides: {},
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case "--help":
      case "-h":
        options.help = true;
        break;
      case "--strategy":
        options.overrides.strategy = requireValue(args, i, arg);
        i++;
        break;
      case "--max-routes": {
        const raw = requireValue(args, i, arg);
        options.overrides.maxCandidateRoutes = /^\d+$/.test(raw) ? Number(raw) : raw;
        i++;
        break;
      }
      case "--all-routes":
        options.overrides.enumerateAllRoutes = true;
        break;
      case "--moves-only":
        options.movesOnly = true;
        break;
      case "--echo-input":
        options.echoInput = true;
        break;
      case "--verbose":
        options.overrides.logLevel = "info";
        break;
      case "--debug":
        options.overrides.logLevel = "debug";
        break;
      default:
        if (arg.startsWith("-")) {
          throw new ConfigError(`Unknown option: ${arg}`);
        }
        if (options.file !== null) {
          throw new ConfigError(`Only one input file is accepted, got ${options.file} and ${arg}`);
        }
        options.file = arg;
    }
  }

  return options;
}

/**
 * Produces everything the CLI prints to stdout for one input text.
 */
export function renderOutput(
  text: string,
  options: Pick<CliOptions, "movesOnly" | "echoInput" | "overrides">,
  env: Record<string, string | undefined> = {}
): string {
  const config = resolveSolverConfig(options.overrides, env);
  setLogLevel(config.logLevel);

  const { description, graph } = loadFarm(text);
  const solution = solveFarm(graph, description.agentCount, config);
  const report = SolutionReporter.generateReport(graph, solution);

  if (options.echoInput) {
    return [text.replace(/\r?\n$/, ""), ""].concat(report.moveLines).join("\n");
  }
  if (options.movesOnly) {
    return report.moveLines.join("\n");
  }
  return report.formattedText;
}

export async function run(args: string[]): Promise<void> {
  const options = parseArgs(args);

  if (options.help) {
    console.log(USAGE);
    return;
  }
  if (options.file === null) {
    throw new ConfigError(`Missing input file\n${USAGE}`);
  }

  const file = options.file;
  const text = await fs.promises.readFile(file, "utf-8").catch((e: unknown) => {
    throw new ConfigError(`Cannot read ${file}: ${e instanceof Error ? e.message : String(e)}`);
  });
  console.log(renderOutput(text, options, process.env));
}

if (require.main === module) {
  void ErrorMapper.wrapMain(run)(process.argv.slice(2));
}
