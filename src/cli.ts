import fs from 'node:fs';
import path from 'node:path';
import process from 'node:process';
import { Command, CommanderError, InvalidArgumentError, type OutputConfiguration } from 'commander';
import { OmdbClassifier } from './classifier';
import { DEFAULT_CONFIG_FILE, load, readConfigFile, type ConfigLayer, type Configuration } from './config';
import { errorMessage, RegistrationError, ValidationError } from './errors';
import { EventLog } from './eventLog';
import { FfmpegEngine } from './ffmpeg';
import { createLogger, logger as moduleLogger, type Logger } from './logger';
import { ExitCode, runOnce } from './orchestrator';
import { register, SUPPORTED_INTERVALS, type TaskRegistrar } from './recurrence';

type RunOptions = {
  config?: string;
  input?: string;
  output?: string;
  threads?: number;
  deleteOriginal?: boolean;
};

type ScheduleOptions = {
  config?: string;
  invoke?: string;
};

export type CliDeps = {
  env?: NodeJS.ProcessEnv;
  registrar?: TaskRegistrar; // defaults to the user crontab
  logger?: Logger; // reports errors raised before a configured logger exists
  output?: OutputConfiguration; // where commander writes help and usage errors
};

function integer(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) throw new InvalidArgumentError('Not a whole number.');
  return parsed;
}

// Config file, then environment, then command-line flags
function loadConfiguration(opts: RunOptions, env: NodeJS.ProcessEnv): Configuration {
  const file = readConfigFile(path.resolve(opts.config ?? DEFAULT_CONFIG_FILE), { required: opts.config !== undefined });
  const overrides: ConfigLayer = {
    inputPath: opts.input,
    outputPath: opts.output,
    maxConcurrentJobs: opts.threads,
    deleteOriginal: opts.deleteOriginal,
  };
  return load({ file, env, overrides });
}

// An unwritable log file is a setup problem like any other bad setting
function openLogger(config: Configuration): Logger {
  try {
    return createLogger({ level: config.logLevel, file: config.logFile });
  } catch (err) {
    throw new ValidationError([`logFile: cannot open ${config.logFile}: ${errorMessage(err)}`], { cause: err });
  }
}

async function runCommand(opts: RunOptions, deps: CliDeps): Promise<ExitCode> {
  const config = loadConfiguration(opts, deps.env ?? process.env);
  const log = openLogger(config);
  const controller = new AbortController();

  // Stop dispatching on a signal; running jobs finish
  const shutdown = (signal: NodeJS.Signals) => {
    log.warn({ signal, pid: process.pid }, 'Shutting down: no new jobs will start, running jobs will finish');
    controller.abort();
  };
  process.once('SIGTERM', shutdown);
  process.once('SIGINT', shutdown);

  try {
    log.info(
      { inputPath: config.inputPath, outputPath: config.outputPath, codec: config.codec, quality: config.quality },
      'Starting transcoding batch'
    );
    const { exitCode } = await runOnce(config, {
      engine: new FfmpegEngine({
        ffmpegPath: config.ffmpegPath,
        ffprobePath: config.ffprobePath,
        toleranceSeconds: config.durationToleranceSeconds,
        logger: log,
      }),
      classifier: config.mediaDetectionEnabled
        ? new OmdbClassifier({ timeoutMs: config.classificationTimeoutMs, logger: log })
        : undefined,
      logger: log,
      signal: controller.signal,
    });
    return exitCode;
  } finally {
    process.off('SIGTERM', shutdown);
    process.off('SIGINT', shutdown);
  }
}

async function scheduleCommand(
  time: string,
  intervalHours: number,
  opts: ScheduleOptions,
  scriptPath: string | undefined,
  deps: CliDeps
): Promise<ExitCode> {
  // Registrar events go to the same log file as the runs
  const config = loadConfiguration({ config: opts.config }, deps.env ?? process.env);
  const log = openLogger(config);

  let invocationPath: string;
  let args: string[] = [];
  if (opts.invoke) {
    invocationPath = path.resolve(opts.invoke);
  } else {
    // cron starts jobs from the home directory, so every path in the rule is absolute
    invocationPath = process.execPath;
    args = [path.resolve(scriptPath ?? 'dist/index.js'), 'run'];
    const configFile = path.resolve(opts.config ?? DEFAULT_CONFIG_FILE);
    if (opts.config !== undefined || fs.existsSync(configFile)) args.push('--config', configFile);
  }

  const { rule, added } = await register(time, intervalHours, invocationPath, {
    args,
    registrar: deps.registrar,
    eventLog: new EventLog(log),
  });
  if (!added) log.info({ expression: rule.scheduleExpression }, 'Nothing to do');
  return ExitCode.Success;
}

// Parse argv and run one command, resolving to the process exit code
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<ExitCode> {
  const errorLog = deps.logger ?? moduleLogger;
  let exitCode: ExitCode = ExitCode.Success;

  const program = new Command();
  // Usage errors throw instead of exiting so they map to the setup code
  program.exitOverride();
  if (deps.output) program.configureOutput(deps.output);

  program
    .name('transcode-batch')
    .description('Batch video transcoding with optional movie/series routing')
    .version('0.1.0');

  program
    .command('run', { isDefault: true })
    .description('Transcode every video in the input directory once')
    .option('-c, --config <path>', `Path to JSON configuration file (default ./${DEFAULT_CONFIG_FILE})`)
    .option('-i, --input <path>', 'Override the input directory')
    .option('-o, --output <path>', 'Override the default output directory')
    .option('-t, --threads <count>', 'Maximum concurrent jobs', integer)
    .option('--delete-original', 'Delete each source file after a verified transcode')
    .action(async (opts: RunOptions) => {
      exitCode = await runCommand(opts, deps);
    });

  program
    .command('schedule')
    .description('Register a recurring run in the user crontab')
    .argument('<time>', 'Time of day of the first run, as HH:MM')
    .argument('<intervalHours>', `Hours between runs: ${SUPPORTED_INTERVALS}`, integer)
    .option('-c, --config <path>', 'Configuration file the scheduled run should use')
    .option('--invoke <path>', 'Executable to schedule instead of this program')
    .action(async (time: string, intervalHours: number, opts: ScheduleOptions) => {
      exitCode = await scheduleCommand(time, intervalHours, opts, argv[1], deps);
    });

  try {
    await program.parseAsync([...argv]);
    return exitCode;
  } catch (err) {
    return exitCodeForError(err, errorLog);
  }
}

// Setup problems get their own code so callers can tell "could not start" from "items failed"
function exitCodeForError(err: unknown, log: Logger): ExitCode {
  if (err instanceof CommanderError) {
    // help and version also arrive here, with exit code 0; commander already printed the message
    return err.exitCode === 0 ? ExitCode.Success : ExitCode.SetupFailed;
  }
  if (err instanceof ValidationError || err instanceof RegistrationError) {
    log.error({ err }, err.message);
    return ExitCode.SetupFailed;
  }
  log.fatal({ err }, 'Unexpected error');
  return ExitCode.Unexpected;
}

// In short, this file:
// 1) Parses the command line with commander
// 2) `run` loads the configuration and runs one batch
// 3) `schedule` registers a recurring run and logs it to the log file
// 4) Maps every outcome, including usage errors, to an exit code
