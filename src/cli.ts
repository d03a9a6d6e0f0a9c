#!/usr/bin/env node
import process from "node:process";
import { realpathSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.
import { GraphDecodeError, parseGraph, parseRelationships, toWireGraph } from "./codec.js";
import { loadAnalysisConfig, type AnalysisConfig } from "./config/analysisConfig.js";
import { installDiagnostics } from "./diagnostics.js";
import { detectCyclesInGraph } from "./graph/cycles.js";
import { buildDagFromRelationships } from "./graph/dagBuilder.js";
import { inspectGraph } from "./graph/inspect.js";
import { findPathBetweenNodes } from "./graph/pathFinding.js";
import { computeTopologicalSort } from "./graph/topologicalSort.js";
import { ERROR_CODES, describeError, type ErrorCode } from "./types.js";

interface CliAnalysis {
  readonly name: string;
  readonly args: string[];
}

interface CliOptions {
  readonly file: string;
  readonly format: "text" | "json";
  readonly analyses: CliAnalysis[];
}

/** Raised for malformed command lines; reported with the usage text. */
export class CliUsageError extends Error {
  constructor(
    message: string,
    readonly code: ErrorCode = ERROR_CODES.CLI_INVALID_ARGUMENT,
  ) {
    super(message);
    this.name = "CliUsageError";
  }
}

/** Side effects of the CLI, injectable so suites run it in memory. */
export interface CliIo {
  readFile(path: string): Promise<string>;
  write(line: string): void;
}

interface AnalysisInput {
  readonly args: string[];
  readonly source: string;
  readonly config: AnalysisConfig;
}

/** Structured result plus its human readable rendering. */
interface AnalysisReport {
  readonly result: unknown;
  readonly text: string[];
}

type AnalysisHandler = (input: AnalysisInput) => AnalysisReport;

const yesNo = (value: boolean): string => (value ? "yes" : "no");

const analysisHandlers: Record<string, AnalysisHandler> = {
  topologicalSort: ({ source }) => {
    const result = computeTopologicalSort(parseGraph(source));
    return {
      result,
      text: [`Order: ${result.sorted.join(" -> ")}`, `Has cycle: ${yesNo(result.hasCycle)}`],
    };
  },
  detectCycles: ({ source, config }) => {
    const result = detectCyclesInGraph(parseGraph(source), { limit: config.maxCycles });
    const text = [`Has cycle: ${yesNo(result.hasCycle)}`];
    if (result.cycles.length > 0) {
      text.push("Cycles:");
      result.cycles.forEach((cycle, index) => {
        text.push(`  ${index + 1}. ${cycle.join(" -> ")}`);
      });
    }
    return { result, text };
  },
  findPath: ({ args, source }) => {
    const [from, to] = args;
    if (from === undefined || to === undefined) {
      throw new CliUsageError("findPath requires <from> and <to>");
    }
    const result = findPathBetweenNodes(parseGraph(source), from, to);
    const text = [`Exists: ${yesNo(result.exists)}`];
    if (result.exists) {
      text.push(`Path: ${result.path.join(" -> ")}`, `Distance: ${result.distance}`);
    }
    return { result, text };
  },
  buildDag: ({ source }) => {
    const result = toWireGraph(buildDagFromRelationships(parseRelationships(source)));
    const text = [`Nodes: ${result.nodes.join(", ")}`, "Edges:"];
    for (const edge of result.edges) {
      text.push(`  ${edge.from} -> ${edge.to}${edge.weight === null ? "" : ` (weight ${edge.weight})`}`);
    }
    return { result, text };
  },
  inspect: ({ source }) => {
    const result = inspectGraph(parseGraph(source));
    if (result.ok) {
      return { result, text: ["No issues found"] };
    }
    return {
      result,
      text: result.issues.map((issue) => `  [${issue.code}] ${issue.path}: ${issue.message}`),
    };
  },
};

/**
 * Runs the requested analyses against the JSON file named on the command line.
 * Malformed input surfaces as a {@link GraphDecodeError}; the fallback
 * payloads of the string bindings are not used here.
 */
export async function runCli(argv: string[], io: CliIo, config: AnalysisConfig = loadAnalysisConfig()): Promise<void> {
  const options = parseArgs(argv);
  if (options.analyses.length === 0) {
    io.write("No analyses requested. Nothing to do.");
    return;
  }

  const tasks = options.analyses.map((analysis) => {
    const handler = Object.hasOwn(analysisHandlers, analysis.name) ? analysisHandlers[analysis.name] : undefined;
    if (!handler) {
      throw new CliUsageError(`Unknown analysis '${analysis.name}'`, ERROR_CODES.CLI_UNKNOWN_ANALYSIS);
    }
    return { analysis, handler };
  });

  const source = await io.readFile(options.file);
  const reports = tasks.map(({ analysis, handler }) => ({
    name: analysis.name,
    report: handler({ args: analysis.args, source, config }),
  }));

  if (options.format === "json") {
    io.write(
      JSON.stringify(
        {
          file: options.file,
          analyses: reports.map(({ name, report }) => ({ name, result: report.result })),
        },
        null,
        2,
      ),
    );
    return;
  }

  reports.forEach(({ name, report }, index) => {
    if (index > 0) {
      io.write("");
    }
    io.write(`# ${name}`);
    for (const line of report.text) {
      io.write(line);
    }
  });
}

function parseArgs(argv: string[]): CliOptions {
  const [file, ...rest] = argv;
  if (!file || file.startsWith("--")) {
    throw new CliUsageError("First positional argument must be the path to a JSON file");
  }
  const analyses: CliAnalysis[] = [];
  let format: "text" | "json" = "text";

  for (let i = 0; i < rest.length; i++) {
    const token = rest[i];
    switch (token) {
      case "--analysis": {
        const name = rest[++i];
        if (!name || name.startsWith("--")) {
          throw new CliUsageError("--analysis expects a name");
        }
        const args: string[] = [];
        for (let next = rest[i + 1]; next !== undefined && !next.startsWith("--"); next = rest[i + 1]) {
          args.push(next);
          i++;
        }
        analyses.push({ name, args });
        break;
      }
      case "--format": {
        const value = rest[++i];
        if (value !== "json" && value !== "text") {
          throw new CliUsageError("--format must be 'json' or 'text'");
        }
        format = value;
        break;
      }
      default:
        throw new CliUsageError(`Unknown argument '${token}'`);
    }
  }

  return { file, format, analyses };
}

/** Stable code and normalised message reported for a failed invocation. */
export function describeCliFailure(error: unknown): { code: ErrorCode; message: string } {
  if (error instanceof CliUsageError || error instanceof GraphDecodeError) {
    return { code: error.code, message: describeError(error) };
  }
  return { code: ERROR_CODES.GRAPH_UNEXPECTED, message: describeError(error) };
}

function printUsage(): void {
  console.log(
    "Usage: graph-analysis <file.json> --analysis <name> [args...] [--analysis ...] [--format json|text]\n",
  );
  console.log("Analyses: topologicalSort, detectCycles, findPath <from> <to>, buildDag, inspect");
  console.log("Examples:");
  console.log("  graph-analysis pipeline.json --analysis topologicalSort");
  console.log("  graph-analysis pipeline.json --analysis findPath Ingest Store --format json");
  console.log("  graph-analysis relations.json --analysis buildDag");
}

async function main(argv: string[]): Promise<void> {
  installDiagnostics();
  if (argv.length === 0) {
    printUsage();
    process.exitCode = 1;
    return;
  }
  await runCli(argv, {
    readFile: (path) => readFile(path, "utf8"),
    write: (line) => console.log(line),
  });
}

const isCliEntryPoint = (() => {
  const executedFromCli = process.argv[1];
  if (!executedFromCli) {
    return false;
  }

  const thisModulePath = fileURLToPath(import.meta.url);
  try {
    return thisModulePath === realpathSync(executedFromCli);
  } catch {
    return false;
  }
})();

if (isCliEntryPoint) {
  main(process.argv.slice(2)).catch((error: unknown) => {
    const failure = describeCliFailure(error);
    console.error(`${failure.code}: ${failure.message}`);
    if (error instanceof CliUsageError) {
      printUsage();
    }
    process.exitCode = 1;
  });
}

/**
 * Exposes internal helpers for the test suite without making them part of the
 * runtime API surface.
 */
export const __testing = {
  parseArgs,
};
