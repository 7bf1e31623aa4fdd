/**
 * Service Wiring
 *
 * Builds the object graph shared by the HTTP server and the CLI from a
 * configuration. External collaborators (database, gateway, directory,
 * calculator) can be passed in, which is how the tests substitute
 * in-process stand-ins.
 *
 * @example
 * ```typescript
 * const services = createServices({ config });
 * await services.router.routeMultiple();
 * services.close();
 * ```
 */

import { ConfigValidationError, type Config } from './config';
import { MessageDispatcher, WebhookHandler } from './core/dispatch';
import { PersonRouter } from './core/routing';
import {
  SimpleGenerator,
  SmartGenerator,
  type Clock,
  type Generator,
  type RandomSource,
} from './core/scheduling';
import {
  ExactMatchCalculator,
  LlmSimilarityScorer,
  SemanticCalculator,
  type PointsCalculator,
} from './core/scoring';
import { StatisticsCalculator } from './core/statistics';
import { HttpDirectory, StaticDirectory, type Directory } from './directory';
import { HttpChatGateway, type ChatGateway } from './gateway';
import { AnthropicClient } from './llm';
import {
  QuestionRepository,
  RecordRepository,
  UnitOfWork,
  applySchema,
  createSchedulingStore,
  openDatabase,
  type DatabaseHandle,
} from './storage';

export interface ServiceOptions {
  config: Config;
  /** Open database; by default `config.database.path` is opened */
  database?: DatabaseHandle;
  gateway?: ChatGateway;
  directory?: Directory;
  calculator?: PointsCalculator;
  random?: RandomSource;
  now?: Clock;
}

export interface Services {
  config: Config;
  database: DatabaseHandle;
  questions: QuestionRepository;
  records: RecordRepository;
  unitOfWork: UnitOfWork;
  gateway: ChatGateway;
  directory: Directory;
  generator: Generator;
  dispatcher: MessageDispatcher;
  router: PersonRouter;
  webhook: WebhookHandler;
  statistics: StatisticsCalculator;
  /** Closes the database connection */
  close(): void;
}

export function createGateway(config: Config): ChatGateway {
  const { baseUrl, serviceId, timeoutMs } = config.gateway;
  if (!baseUrl || !serviceId) {
    throw new ConfigValidationError('GATEWAY_URL and GATEWAY_SERVICE_ID must be set', [
      ...(baseUrl ? [] : ['GATEWAY_URL']),
      ...(serviceId ? [] : ['GATEWAY_SERVICE_ID']),
    ]);
  }
  return new HttpChatGateway({ baseUrl, serviceId, timeoutMs });
}

export function createDirectory(config: Config): Directory {
  const { baseUrl, token, file, timeoutMs } = config.directory;
  if (file) {
    return StaticDirectory.fromFile(file);
  }
  if (baseUrl) {
    return new HttpDirectory({ baseUrl, token, timeoutMs });
  }
  throw new ConfigValidationError('DIRECTORY_URL or DIRECTORY_FILE must be set', ['DIRECTORY_URL']);
}

export function createCalculator(config: Config): PointsCalculator {
  if (config.scoring.openScorer === 'llm') {
    const client = new AnthropicClient({
      apiKey: config.anthropic.apiKey,
      model: config.anthropic.model,
    });
    return new SemanticCalculator(new LlmSimilarityScorer(client));
  }
  return new ExactMatchCalculator({ openScore: config.scoring.openScore });
}

export function createServices(options: ServiceOptions): Services {
  const { config } = options;

  const database = options.database ?? openDatabase(config.database.path);
  applySchema(database.sqlite);

  const questions = new QuestionRepository(database.db);
  const records = new RecordRepository(database.db);
  const unitOfWork = new UnitOfWork(database.sqlite);

  const gateway = options.gateway ?? createGateway(config);
  const directory = options.directory ?? createDirectory(config);
  const calculator = options.calculator ?? createCalculator(config);

  const store = createSchedulingStore(questions, records);
  const { strategy, mu, sigma, epsilon, periodUnitMs } = config.scheduler;
  const generatorOptions = { random: options.random, now: options.now };
  const generator: Generator =
    strategy === 'simple'
      ? new SimpleGenerator(store, generatorOptions)
      : new SmartGenerator(store, { ...generatorOptions, mu, sigma, epsilon, periodUnitMs });

  const dispatcher = new MessageDispatcher({
    gateway,
    records,
    unitOfWork,
    calculator,
    now: options.now,
  });

  const router = new PersonRouter({
    directory,
    generator,
    records,
    unitOfWork,
    dispatcher,
    batchSize: config.scheduler.batchSize,
    now: options.now,
  });

  return {
    config,
    database,
    questions,
    records,
    unitOfWork,
    gateway,
    directory,
    generator,
    dispatcher,
    router,
    webhook: new WebhookHandler(dispatcher, router),
    statistics: new StatisticsCalculator(directory, questions, records),
    close: () => database.sqlite.close(),
  };
}
