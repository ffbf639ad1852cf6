// src/pipeline.ts

import type { PersonaConfig } from './config/ConfigValidator';
import type { ContentCollector } from './connectors/types';
import type { CollectOptions } from './connectors/reddit/types';
import type { TextGenerator } from './synthesizer/types';
import { HttpCore } from './core/http/HttpCore';
import { RedditAuth } from './core/auth/RedditAuth';
import { Normalizer } from './core/normalizer/Normalizer';
import { Logger } from './observability/Logger';
import { generateCorrelationId, withStageSpan } from './observability/tracing';
import { RedditConnector, DEFAULT_COLLECT_OPTIONS } from './connectors/reddit/RedditConnector';
import { GeminiClient } from './synthesizer/GeminiClient';
import { PersonaSynthesizer } from './synthesizer/PersonaSynthesizer';
import { writePersona } from './output/PersonaWriter';
import { extractUsername } from './utils/profileUrl';

export interface PipelineOverrides {
  logger?: Logger;
  collector?: ContentCollector;
  generator?: TextGenerator;
}

export interface RunOptions extends Partial<CollectOptions> {
  /** Directory for `<username>_persona.txt`; defaults to the working directory */
  outputDir?: string;
}

export interface PipelineResult {
  username: string;
  outputPath: string;
  itemCount: number;
  postCount: number;
  commentCount: number;
}

export class PersonaPipeline {
  private constructor(
    private collector: ContentCollector,
    private synthesizer: PersonaSynthesizer,
    private logger: Logger
  ) {}

  /**
   * Wire the collector, synthesizer and their shared dependencies
   *
   * @param config - Validated configuration (see loadConfig)
   * @param overrides - Replacement components, e.g. a fake text generator in tests
   *
   * @example
   * ```typescript
   * const pipeline = PersonaPipeline.create(loadConfig());
   * const result = await pipeline.run('https://www.reddit.com/user/alice/');
   * console.log(result.outputPath); // ./alice_persona.txt
   * ```
   */
  static create(config: PersonaConfig, overrides: PipelineOverrides = {}): PersonaPipeline {
    const logger = overrides.logger ?? new Logger(config.logging);

    let collector = overrides.collector;
    if (!collector) {
      const http = new HttpCore(logger, {
        userAgent: config.reddit.userAgent,
        timeout: config.reddit.timeoutMs,
      });
      const auth = new RedditAuth(
        { clientId: config.reddit.clientId, clientSecret: config.reddit.clientSecret },
        http,
        logger
      );
      collector = new RedditConnector({ auth, http, normalizer: new Normalizer(), logger });
    }

    const generator = overrides.generator ?? new GeminiClient(config.gemini, logger);

    return new PersonaPipeline(collector, new PersonaSynthesizer(generator, logger), logger);
  }

  /**
   * Collect, synthesize, and write the persona for one profile URL
   *
   * The URL is validated before any network call. Every failure propagates;
   * nothing is written unless synthesis succeeds.
   */
  async run(profileUrl: string, options: RunOptions = {}): Promise<PipelineResult> {
    const username = extractUsername(profileUrl);
    const runId = generateCorrelationId();
    const logger = this.logger.child({ runId });

    const collectOptions: CollectOptions = {
      postLimit: options.postLimit ?? DEFAULT_COLLECT_OPTIONS.postLimit,
      commentLimit: options.commentLimit ?? DEFAULT_COLLECT_OPTIONS.commentLimit,
    };

    logger.info('Persona run started', { username, ...collectOptions });

    const items = await withStageSpan('collect', runId, () =>
      this.collector.collect(username, collectOptions)
    );
    const postCount = items.filter((item) => item.kind === 'post').length;

    const persona = await withStageSpan('synthesize', runId, () =>
      this.synthesizer.synthesize(username, items)
    );

    const outputPath = await withStageSpan('write', runId, () =>
      writePersona(options.outputDir ?? process.cwd(), username, persona)
    );

    logger.info('Persona saved', { username, outputPath });

    return {
      username,
      outputPath,
      itemCount: items.length,
      postCount,
      commentCount: items.length - postCount,
    };
  }
}
