#!/usr/bin/env node
// src/cli.ts

import dotenv from 'dotenv';
import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import { loadConfig } from './config/ConfigValidator';
import { PersonaPipeline, type PipelineOverrides } from './pipeline';
import { Logger, type LogFormat, type LogLevel } from './observability/Logger';
import { initializeTracing } from './observability/tracing';
import { DEFAULT_COLLECT_OPTIONS, MAX_STREAM_LIMIT } from './connectors/reddit/RedditConnector';
import { extractUsername } from './utils/profileUrl';
import { PersonaError, errorMessage, exitCodeFor } from './utils/errors';

type CliOptions = {
  posts: number;
  comments: number;
  outputDir?: string;
  logLevel?: LogLevel;
  logFormat?: LogFormat;
};

export interface CliDeps {
  env?: Record<string, string | undefined>;
  overrides?: PipelineOverrides;
  /** Receives the output path on success */
  writeOut?: (line: string) => void;
  /** Receives commander's usage and error text */
  writeErr?: (text: string) => void;
}

function parseLimit(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Must be a non-negative integer.');
  }
  const limit = Number(value);
  if (limit > MAX_STREAM_LIMIT) {
    throw new InvalidArgumentError(`Must be at most ${MAX_STREAM_LIMIT}.`);
  }
  return limit;
}

export function createProgram(deps: CliDeps = {}): Command {
  const program = new Command()
    .name('reddit-persona')
    .description("Generate a persona of a Reddit user from their latest posts and comments using Google Gemini.")
    .argument('<profile-url>', 'Reddit profile URL, e.g. https://www.reddit.com/user/alice/')
    .option('-p, --posts <count>', 'number of posts to fetch', parseLimit, DEFAULT_COLLECT_OPTIONS.postLimit)
    .option('-c, --comments <count>', 'number of comments to fetch', parseLimit, DEFAULT_COLLECT_OPTIONS.commentLimit)
    .option('-o, --output-dir <dir>', 'directory for <username>_persona.txt (default: current directory)')
    .addOption(new Option('--log-level <level>', 'log level').choices(['debug', 'info', 'warn', 'error']))
    .addOption(new Option('--log-format <format>', 'log format').choices(['json', 'pretty']))
    .addHelpText(
      'after',
      `
Environment (or .env in the working directory):
  REDDIT_CLIENT_ID, REDDIT_CLIENT_SECRET, REDDIT_USER_AGENT, GEMINI_API_KEY (required)
  REDDIT_TIMEOUT_MS, GEMINI_MODEL, LOG_LEVEL, LOG_FORMAT (optional)
  OTEL_ENABLED, OTEL_SERVICE_NAME, OTEL_EXPORTER_OTLP_ENDPOINT (tracing)`
    )
    .exitOverride();

  if (deps.writeErr) {
    const writeErr = deps.writeErr;
    program.configureOutput({ writeErr, writeOut: writeErr });
  }

  return program;
}

/**
 * Run the CLI and resolve to the process exit code
 */
export async function main(argv: string[], deps: CliDeps = {}): Promise<number> {
  const program = createProgram(deps);

  try {
    program.parse(argv, { from: 'user' });
  } catch (error: unknown) {
    if (error instanceof CommanderError) return error.exitCode;
    throw error;
  }

  const profileUrl = program.args[0] ?? '';
  const opts = program.opts<CliOptions>();
  const writeOut = deps.writeOut ?? ((line: string) => process.stdout.write(`${line}\n`));

  let logger =
    deps.overrides?.logger ?? new Logger({ level: opts.logLevel ?? 'info', format: opts.logFormat ?? 'json' });

  try {
    // Malformed URLs and missing credentials fail before any network call
    extractUsername(profileUrl);
    const config = loadConfig(deps.env ?? process.env);

    if (!deps.overrides?.logger) {
      logger = new Logger({
        level: opts.logLevel ?? config.logging.level,
        format: opts.logFormat ?? config.logging.format,
      });
    }

    const tracing = await initializeTracing(logger);
    try {
      const pipeline = PersonaPipeline.create(config, { ...deps.overrides, logger });
      const result = await pipeline.run(profileUrl, {
        postLimit: opts.posts,
        commentLimit: opts.comments,
        outputDir: opts.outputDir,
      });

      writeOut(result.outputPath);
      return 0;
    } finally {
      // Spans are batched; flush before the process exits
      await tracing
        ?.shutdown()
        .catch((error: unknown) => logger.warn('Failed to flush traces', { error: errorMessage(error) }));
    }
  } catch (error: unknown) {
    logger.error('Persona generation failed', {
      error: errorMessage(error),
      code: error instanceof PersonaError ? error.code : undefined,
      details: error instanceof PersonaError ? error.details : undefined,
    });
    return exitCodeFor(error);
  }
}

if (require.main === module) {
  dotenv.config();

  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      process.stderr.write(`Fatal error: ${errorMessage(error)}\n`);
      process.exitCode = 1;
    }
  );
}
