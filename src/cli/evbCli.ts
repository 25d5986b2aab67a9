#!/usr/bin/env node
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import process from 'node:process';

import { diffReports } from './utils/diff.js';
import {
  AnalysisConfigValidationError,
  getAnalysisConfigBounds,
  isAnalysisMode,
  validateAnalysisConfig,
  type AnalysisConfigInit,
} from '../config/analysisConfig.js';
import {
  CARBONIC_ACID,
  formatSpeciationTable,
  speciationCurve,
} from '../chemistry/carbonateSpeciation.js';
import { serializeReport, type AnalysisReport } from '../report/analysisReport.js';
import {
  analyzeHops,
  analyzeProfile,
  analyzeSamples,
  TrajectoryLoadError,
  writeReportFile,
} from '../runtime/services.js';
import { TrajectoryAnalysisError } from '../trajectory/errors.js';
import type { ValidationIssue } from '../trajectory/types.js';

const exitWithError = (message: string): never => {
  console.error(message);
  process.exit(1);
};

const formatIssue = (issue: ValidationIssue) =>
  `${issue.message} (${issue.code}${issue.path.length > 0 ? ` @ ${issue.path.join('.')}` : ''})`;

const printMainUsage = () => {
  console.log(`evb-cli – proton hop and free-energy analysis for MS-EVB trajectories

Commands:
  hops <trajectory.json> [--config <path>] [--output <report.json>] [--json]
  profile <trajectory.json> [--mode <mode>] [--bins <n>] [--bandwidth <rule|h>] [--config <path>] [--output <report.json>] [--json]
  samples <trajectory.json> [--output <report.json>] [--json]
  speciation [--json]
  config validate <config.json> [--json]
  report diff <a.json> <b.json> [--tolerance <x>] [--json]

Run "evb-cli <command> --help" to learn more about a command.`);
};

const printHopsUsage = () => {
  console.log(`evb-cli hops

Classify proton hops along the reaction-center sequence and report the
cumulative hop function h(t).

Optional:
  --config <path>        Analysis config JSON
  --ps-scale <n>         Timesteps per picosecond (default 1000)
  --output <report.json> Write the canonical report to a file
  --json                 Print the report JSON instead of a summary
`);
};

const printProfileUsage = () => {
  const bounds = getAnalysisConfigBounds();
  console.log(`evb-cli profile

Fit densities to the squared CI amplitudes and emit either the densities or a
free-energy profile in kcal/mol.

Optional:
  --mode <mode>          ${bounds.modes.join(' | ')} (default density)
  --bins <n>             Grid points on [0,1]; difference mode uses 2n on [-1,1] (${bounds.bins.min}-${bounds.bins.max}, default 200)
  --bandwidth <rule|h>   ${bounds.bandwidthRules.join(' | ')} | positive number (default scott)
  --config <path>        Analysis config JSON
  --output <report.json> Write the canonical report to a file
  --json                 Print the report JSON instead of a summary
`);
};

const printSamplesUsage = () => {
  console.log(`evb-cli samples

List the largest and second-largest squared CI coefficient of every frame.

Optional:
  --output <report.json> Write the canonical report to a file
  --json                 Print the report JSON instead of a summary
`);
};

type AnalysisFlags = {
  input?: string;
  configPath?: string;
  output?: string;
  json: boolean;
  overrides: AnalysisConfigInit;
};

const parseNumberFlag = (flag: string, raw: string | undefined): number => {
  const value = Number(raw);
  if (raw === undefined || !Number.isFinite(value)) {
    return exitWithError(`${flag} expects a number (received "${raw ?? ''}")`);
  }
  return value;
};

const parseAnalysisFlags = (args: string[], allowed: ReadonlySet<string>): AnalysisFlags => {
  const options: AnalysisFlags = { json: false, overrides: {} };
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg) continue;
    if (!arg.startsWith('--')) {
      if (!options.input) {
        options.input = arg;
      } else {
        exitWithError(`Unexpected argument "${arg}"`);
      }
      continue;
    }
    if (!allowed.has(arg)) {
      exitWithError(`Unknown flag "${arg}"`);
    }
    switch (arg) {
      case '--input':
        options.input = args[++i];
        break;
      case '--config':
        options.configPath = args[++i];
        break;
      case '--output':
        options.output = args[++i];
        break;
      case '--json':
        options.json = true;
        break;
      case '--mode': {
        const mode = args[++i];
        if (!isAnalysisMode(mode)) {
          exitWithError(`Unsupported mode "${mode ?? ''}".`);
        } else {
          options.overrides.mode = mode;
        }
        break;
      }
      case '--bins':
        options.overrides.bins = parseNumberFlag(arg, args[++i]);
        break;
      case '--bandwidth': {
        const raw = args[++i];
        options.overrides.bandwidth =
          raw === 'scott' || raw === 'silverman' ? raw : parseNumberFlag(arg, raw);
        break;
      }
      case '--ps-scale':
        options.overrides.timestepsPerPicosecond = parseNumberFlag(arg, args[++i]);
        break;
    }
  }
  return options;
};

const printWarnings = (warnings: ValidationIssue[]) => {
  warnings.forEach((issue) => console.warn(`  ⚠ ${formatIssue(issue)}`));
};

const emitReport = async (report: AnalysisReport, options: AnalysisFlags) => {
  if (options.output) {
    const written = await writeReportFile(options.output, report);
    if (!options.json) {
      console.log(`[${report.kind}] report written to ${written.path}`);
      console.log(`  digest (BLAKE3-256): ${written.hash}`);
    }
  }
  if (options.json) {
    console.log(serializeReport(report).json);
  }
};

const HOPS_FLAGS = new Set(['--input', '--config', '--output', '--json', '--ps-scale']);
const PROFILE_FLAGS = new Set([
  '--input',
  '--config',
  '--output',
  '--json',
  '--mode',
  '--bins',
  '--bandwidth',
]);
const SAMPLES_FLAGS = new Set(['--input', '--output', '--json']);

const handleHopsCommand = async (args: string[]) => {
  if (args.includes('--help') || args.includes('-h')) {
    printHopsUsage();
    process.exit(0);
  }
  const options = parseAnalysisFlags(args, HOPS_FLAGS);
  if (!options.input) {
    return exitWithError('hops requires a trajectory path.');
  }
  const { report, warnings } = await analyzeHops({
    input: options.input,
    configPath: options.configPath,
    overrides: options.overrides,
  });
  if (!options.json) {
    const last = report.timeline[report.timeline.length - 1];
    console.log(`[hops] ${report.source ?? options.input}: ${report.frameCount} frames`);
    console.log(
      `  forward ${report.summary.forwardHops} | backward ${report.summary.backwardHops} | net ${report.summary.netDisplacement}`,
    );
    console.log(`  distinct donors recorded: ${report.summary.donorCount}`);
    console.log(`  span: ${report.timeline[0].timePs} → ${last.timePs} ps`);
    printWarnings(warnings);
  }
  await emitReport(report, options);
};

const handleProfileCommand = async (args: string[]) => {
  if (args.includes('--help') || args.includes('-h')) {
    printProfileUsage();
    process.exit(0);
  }
  const options = parseAnalysisFlags(args, PROFILE_FLAGS);
  if (!options.input) {
    return exitWithError('profile requires a trajectory path.');
  }
  const { report, warnings } = await analyzeProfile({
    input: options.input,
    configPath: options.configPath,
    overrides: options.overrides,
  });
  if (!options.json) {
    console.log(
      `[profile] ${report.source ?? options.input}: ${report.frameCount} frames, mode ${report.result.mode}, ${report.bins} bins, bandwidth ${report.bandwidth}`,
    );
    const { result } = report;
    if (result.mode === 'density') {
      const peak = (points: { coordinate: number; density: number }[]) =>
        points.reduce((best, point) => (point.density > best.density ? point : best));
      const dominantPeak = peak(result.curves.dominant);
      const secondaryPeak = peak(result.curves.secondary);
      console.log(`  c1^2 density peak at ${dominantPeak.coordinate.toFixed(4)}`);
      console.log(`  c2^2 density peak at ${secondaryPeak.coordinate.toFixed(4)}`);
    } else {
      const minimum = result.profile.find((point) => point.energy === 0);
      const maximum = result.profile.reduce((best, point) =>
        point.energy > best.energy ? point : best,
      );
      if (minimum) {
        console.log(`  minimum at ${minimum.coordinate.toFixed(4)}`);
      }
      console.log(
        `  barrier ${maximum.energy.toFixed(4)} kcal/mol at ${maximum.coordinate.toFixed(4)}`,
      );
    }
    printWarnings(warnings);
  }
  await emitReport(report, options);
};

const handleSamplesCommand = async (args: string[]) => {
  if (args.includes('--help') || args.includes('-h')) {
    printSamplesUsage();
    process.exit(0);
  }
  const options = parseAnalysisFlags(args, SAMPLES_FLAGS);
  if (!options.input) {
    return exitWithError('samples requires a trajectory path.');
  }
  const { report, warnings } = await analyzeSamples({ input: options.input });
  if (!options.json) {
    console.log(`[samples] ${report.source ?? options.input}: ${report.frameCount} frames`);
    console.log('  timestep   center      c1^2      c2^2');
    report.frames.slice(0, 20).forEach((row) => {
      console.log(
        `  ${String(row.timestep).padStart(8)} ${String(row.center).padStart(8)} ${row.dominantSq
          .toFixed(6)
          .padStart(9)} ${row.secondarySq.toFixed(6).padStart(9)}`,
      );
    });
    if (report.frames.length > 20) {
      console.log('  (truncated)');
    }
    printWarnings(warnings);
  }
  await emitReport(report, options);
};

const handleSpeciationCommand = (args: string[]) => {
  if (args.includes('--json')) {
    console.log(
      JSON.stringify(
        {
          acid: CARBONIC_ACID.name,
          species: CARBONIC_ACID.species,
          pka: [CARBONIC_ACID.pka1, CARBONIC_ACID.pka2],
          curve: speciationCurve(),
        },
        null,
        2,
      ),
    );
    return;
  }
  console.log();
  formatSpeciationTable().forEach((line) => console.log(line));
  console.log();
};

const handleConfigCommand = async (args: string[]) => {
  const [subcommand, ...rest] = args;
  if (subcommand !== 'validate') {
    return exitWithError(`Unknown config subcommand "${subcommand ?? ''}".`);
  }
  const flags = new Set(rest.filter((arg) => arg.startsWith('--')));
  const configPath = rest.find((arg) => !arg.startsWith('--'));
  if (!configPath) {
    return exitWithError('config validate requires a config path.');
  }
  const raw = await readFile(resolve(process.cwd(), configPath), 'utf8');
  try {
    const { config, issues } = validateAnalysisConfig(JSON.parse(raw));
    if (flags.has('--json')) {
      console.log(JSON.stringify({ status: 'ok', config, warnings: issues }, null, 2));
    } else {
      console.log(`✔ Config valid: ${configPath}`);
      console.log(`  mode: ${config.mode}, bins: ${config.bins}, bandwidth: ${config.bandwidth}`);
      printWarnings(issues);
    }
  } catch (error) {
    if (!(error instanceof AnalysisConfigValidationError)) {
      throw error;
    }
    if (flags.has('--json')) {
      console.log(
        JSON.stringify({ status: 'error', message: error.message, issues: error.issues }, null, 2),
      );
    } else {
      console.error(`✖ Config invalid: ${configPath}`);
      error.issues.forEach((issue) => console.error(`   • ${formatIssue(issue)}`));
    }
    process.exit(1);
  }
};

const handleReportCommand = async (args: string[]) => {
  const [subcommand, ...rest] = args;
  if (subcommand !== 'diff') {
    return exitWithError(`Unknown report subcommand "${subcommand ?? ''}".`);
  }
  let tolerance = 0;
  let json = false;
  const positional: string[] = [];
  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (arg === '--tolerance') {
      tolerance = parseNumberFlag(arg, rest[++i]);
    } else if (arg === '--json') {
      json = true;
    } else if (arg.startsWith('--')) {
      exitWithError(`Unknown flag "${arg}"`);
    } else {
      positional.push(arg);
    }
  }
  if (positional.length < 2) {
    return exitWithError('report diff requires two report paths.');
  }
  const [leftPath, rightPath] = positional;
  const left: unknown = JSON.parse(await readFile(resolve(process.cwd(), leftPath), 'utf8'));
  const right: unknown = JSON.parse(await readFile(resolve(process.cwd(), rightPath), 'utf8'));
  const diff = diffReports(left, right, { tolerance });
  if (json) {
    console.log(JSON.stringify({ status: 'ok', tolerance, changes: diff }, null, 2));
  } else if (diff.length === 0) {
    console.log('No differences detected.');
  } else {
    console.log(`Found ${diff.length} difference(s):`);
    diff.slice(0, 100).forEach((entry) => {
      if (entry.kind === 'added') {
        console.log(` + ${entry.path} = ${JSON.stringify(entry.value)}`);
      } else if (entry.kind === 'removed') {
        console.log(` - ${entry.path} = ${JSON.stringify(entry.value)}`);
      } else {
        console.log(
          ` ~ ${entry.path}: ${JSON.stringify(entry.left)} → ${JSON.stringify(entry.right)}`,
        );
      }
    });
    if (diff.length > 100) {
      console.log(' (truncated)');
    }
  }
  if (diff.length > 0) {
    process.exitCode = 1;
  }
};

const describeFailure = (error: unknown): string => {
  if (error instanceof TrajectoryLoadError) {
    const lines = [`✖ Trajectory invalid: ${error.sourceName}`, `  ${error.message}`];
    error.issues?.forEach((issue) => lines.push(`   • ${formatIssue(issue)}`));
    return lines.join('\n');
  }
  if (error instanceof AnalysisConfigValidationError) {
    return [`✖ ${error.message}`, ...error.issues.map((issue) => `   • ${formatIssue(issue)}`)].join(
      '\n',
    );
  }
  if (error instanceof TrajectoryAnalysisError) {
    return `✖ ${error.name} [${error.code}]: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
};

const main = async () => {
  const [, , ...argv] = process.argv;
  if (argv.length === 0 || argv[0] === '--help' || argv[0] === '-h') {
    printMainUsage();
    process.exit(0);
  }
  const [command, ...rest] = argv;
  switch (command) {
    case 'hops':
      await handleHopsCommand(rest);
      break;
    case 'profile':
      await handleProfileCommand(rest);
      break;
    case 'samples':
      await handleSamplesCommand(rest);
      break;
    case 'speciation':
      handleSpeciationCommand(rest);
      break;
    case 'config':
      await handleConfigCommand(rest);
      break;
    case 'report':
      await handleReportCommand(rest);
      break;
    default:
      exitWithError(`Unknown command "${command}".`);
  }
};

main().catch((error: unknown) => {
  console.error(describeFailure(error));
  process.exit(1);
});
