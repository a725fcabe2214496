import { ok, err, type Result } from 'neverthrow';
import { loadConfig } from './config/config-parser.js';
import { Neo4jGraphExecutor } from './graph/neo4j-executor.js';
import { QuestionAnswerer } from './pipeline/question-answerer.js';
import { PaperGraphLoader, type LoadStep } from './loader/paper-loader.js';
import type { GraphExecutor } from './types/provider.js';
import type { GraphConfig, PaperGraphConfig } from './types/config.js';

/** Everything needed to answer questions and load papers, connected and ready. */
export interface PaperGraphRuntime {
  readonly config: PaperGraphConfig;
  readonly executor: GraphExecutor;
  readonly answerer: QuestionAnswerer;
  /** A loader bound to the runtime's executor and loader settings. */
  createLoader(onProgress?: (step: LoadStep) => void): PaperGraphLoader;
  /** Close the graph connection. */
  close(): Promise<void>;
}

export type ExecutorFactory = (config: GraphConfig) => GraphExecutor;

export interface RuntimeOptions {
  /** Project root directory (must contain .papergraph.yaml). */
  rootDir: string;
  /** Environment used for `${VAR}` interpolation. Default: process.env */
  env?: NodeJS.ProcessEnv;
  /** Builds the graph executor. Default: a Neo4j driver connection. */
  createExecutor?: ExecutorFactory;
  /** Skip the connectivity check. Useful for commands that only plan queries. */
  skipConnectivityCheck?: boolean;
}

export class RuntimeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RuntimeError';
  }
}

/**
 * Initialize a PaperGraphRuntime: load config, connect to the graph and wire
 * the question answerer with the configured ranking cutoff.
 */
export async function createRuntime(
  options: RuntimeOptions,
): Promise<Result<PaperGraphRuntime, RuntimeError>> {
  const { rootDir, env = process.env, createExecutor = Neo4jGraphExecutor.fromConfig, skipConnectivityCheck = false } =
    options;

  // --- Load config ---
  const configResult = await loadConfig(rootDir, env);
  if (configResult.isErr()) {
    return err(new RuntimeError(`Config load failed: ${configResult.error.message}`));
  }
  const config = configResult.value;

  // --- Connect graph ---
  const executor = createExecutor(config.graph);
  if (!skipConnectivityCheck) {
    const connected = await executor.verifyConnectivity();
    if (connected.isErr()) {
      await executor.close();
      return err(new RuntimeError(`Graph connection failed: ${connected.error.message}`));
    }
  }

  const answerer = new QuestionAnswerer(executor, { topN: config.ranking.topN });

  return ok({
    config,
    executor,
    answerer,
    createLoader(onProgress?: (step: LoadStep) => void): PaperGraphLoader {
      return new PaperGraphLoader(executor, {
        maxSectionTextLength: config.loader.maxSectionTextLength,
        onProgress,
      });
    },
    async close(): Promise<void> {
      await executor.close();
    },
  });
}
