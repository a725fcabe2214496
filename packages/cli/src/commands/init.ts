import { Command } from 'commander';
import chalk from 'chalk';
import { writeFile, access } from 'node:fs/promises';
import { join } from 'node:path';
import { stringify } from 'yaml';
import { ok, err, type Result } from 'neverthrow';
import { CONFIG_FILE_NAME, ConfigError, DEFAULT_CONFIG } from '@papergraph/core';

export interface InitOptions {
  uri?: string;
  username?: string;
  database?: string;
  force?: boolean;
}

/** Environment variable the generated config reads the graph password from. */
export const PASSWORD_ENV_VAR = 'NEO4J_PASSWORD';

/**
 * Build the default config object for .papergraph.yaml. The password is never
 * written out; it is read from the environment when the config loads.
 */
export function buildDefaultConfig(options: InitOptions = {}): Record<string, unknown> {
  return {
    version: DEFAULT_CONFIG.version,
    graph: {
      uri: options.uri ?? DEFAULT_CONFIG.graph.uri,
      username: options.username ?? DEFAULT_CONFIG.graph.username,
      password: `\${${PASSWORD_ENV_VAR}}`,
      ...(options.database !== undefined ? { database: options.database } : {}),
    },
    ranking: { ...DEFAULT_CONFIG.ranking },
    loader: { ...DEFAULT_CONFIG.loader },
  };
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/** Write .papergraph.yaml into rootDir and return its path. */
export async function writeDefaultConfig(
  rootDir: string,
  options: InitOptions = {},
): Promise<Result<string, ConfigError>> {
  const configPath = join(rootDir, CONFIG_FILE_NAME);
  if (!options.force && (await exists(configPath))) {
    return err(new ConfigError(`${CONFIG_FILE_NAME} already exists. Use --force to overwrite.`));
  }

  await writeFile(configPath, stringify(buildDefaultConfig(options)), 'utf-8');
  return ok(configPath);
}

export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Create a .papergraph.yaml in the current directory')
    .option('--uri <uri>', 'Neo4j connection URI', DEFAULT_CONFIG.graph.uri)
    .option('--username <name>', 'Neo4j user', DEFAULT_CONFIG.graph.username)
    .option('--database <name>', 'Neo4j database (server default when omitted)')
    .option('--force', 'Overwrite existing configuration file')
    .action(async (options: InitOptions) => {
      try {
        const result = await writeDefaultConfig(process.cwd(), options);
        if (result.isErr()) {
          // eslint-disable-next-line no-console
          console.error(chalk.red(result.error.message));
          process.exit(1);
        }

        // eslint-disable-next-line no-console
        console.log(chalk.green('Created'), result.value);

        if (process.env[PASSWORD_ENV_VAR] === undefined) {
          // eslint-disable-next-line no-console
          console.log(chalk.yellow('⚠'), `Set ${PASSWORD_ENV_VAR} before connecting to the graph.`);
        }

        // eslint-disable-next-line no-console
        console.log(chalk.green('\nPaperGraph initialized successfully!'));
        // eslint-disable-next-line no-console
        console.log(chalk.dim('Run "papergraph load <paper.json>" to populate the graph.'));
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        // eslint-disable-next-line no-console
        console.error(chalk.red('Init failed:'), message);
        process.exit(1);
      }
    });
}
