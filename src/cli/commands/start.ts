import chalk from 'chalk';
import { TavusClient, type FetchLike, type TavusApi, type TavusClientOptions } from '../../core/api-client.js';
import { loadConfig, type AppConfig, type ConfigOverrides } from '../../core/config.js';
import { CredentialStore } from '../../core/credential-store.js';
import { ConfigurationError } from '../../core/errors.js';
import { createLogger, type Logger } from '../../core/logger.js';
import {
  cliRenderer,
  createDefaultRegistry,
  Navigator,
  type NavigationContext,
  type Renderer,
} from '../../interactions/index.js';

export interface StartOptions {
  apiKey?: string;
  keyFile?: string;
  apiUrl?: string;
  pageSize?: string;
  verbose?: boolean;
}

/**
 * Seams for tests; production uses the terminal and global fetch
 */
export interface StartDeps {
  renderer?: Renderer;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  fetch?: FetchLike;
}

function toOverrides(options: StartOptions): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  if (options.apiKey !== undefined) overrides.apiKey = options.apiKey;
  if (options.keyFile !== undefined) overrides.keyFile = options.keyFile;
  if (options.apiUrl !== undefined) overrides.apiUrl = options.apiUrl;
  if (options.pageSize !== undefined) overrides.pageSize = options.pageSize;
  if (options.verbose !== undefined) overrides.verbose = options.verbose;
  return overrides;
}

/**
 * Find the API key: flag or environment, then the key file, then a prompt.
 * Returns null when the operator gives nothing.
 */
export async function resolveApiKey(
  config: AppConfig,
  store: CredentialStore,
  renderer: Renderer,
  logger: Logger
): Promise<string | null> {
  if (config.apiKey) {
    logger.debug('Using API key from command line or environment');
    return config.apiKey;
  }

  try {
    const stored = await store.load();
    if (stored) {
      logger.debug(`Using API key from ${store.getPath()}`);
      return stored;
    }
  } catch (error) {
    logger.warn(`Could not read ${store.getPath()}`, error);
  }

  const answer = await renderer.input({ message: 'Enter your Tavus API Key:', mask: true });
  const apiKey = answer?.trim() ?? '';
  return apiKey.length > 0 ? apiKey : null;
}

/**
 * Interactive session: resolve the credential, warm up, run the navigator
 *
 * @throws ConfigurationError when configuration is invalid or no key is given
 */
export async function startCommand(options: StartOptions, deps: StartDeps = {}): Promise<void> {
  const config = loadConfig(toOverrides(options), deps.env, deps.cwd);
  const renderer = deps.renderer ?? cliRenderer;
  const logger = createLogger('tavus', { verbose: config.verbose });
  const store = new CredentialStore(config.keyFile);

  const apiKey = await resolveApiKey(config, store, renderer, logger);
  if (apiKey === null) {
    throw new ConfigurationError('An API key is required to start');
  }

  const createClient = (key: string): TavusApi => {
    const clientOptions: TavusClientOptions = { baseUrl: config.apiUrl };
    if (deps.fetch) clientOptions.fetch = deps.fetch;
    return new TavusClient(key, clientOptions);
  };

  const context: NavigationContext = { apiKey, client: createClient(apiKey) };
  const registry = createDefaultRegistry({
    renderer,
    logger,
    pageSize: config.pageSize,
    createClient,
    store,
  });

  const navigator = new Navigator(registry, renderer, context, logger.child('navigator'));
  await navigator.warmUp();
  await navigator.run();

  console.log(chalk.dim('\nGoodbye!\n'));
}
