import type {CosmiconfigResult} from 'cosmiconfig';
import {cosmiconfig} from 'cosmiconfig';

import {describeError} from '../@utils/index.js';
import {ConfigurationError} from '../errors.js';

import type {Configuration} from './config.js';
import {parseConfig} from './config.js';

export const CONFIG_MODULE_NAME = 'ddns-sync';

const ENVIRONMENT_VARIABLE_REFERENCE_REGEX = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

export type LoadedConfiguration = {
  /**
   * Absolute path of the file the configuration was read from.
   */
  path: string;
  config: Configuration;
};

export type ConfigurationLoader = (
  path?: string,
) => Promise<LoadedConfiguration>;

/**
 * Reads a YAML or JSON configuration file, or searches one with the usual
 * cosmiconfig names (".ddns-syncrc", "ddns-sync.config.json"...) from the
 * working directory when no path is given. Every read goes to the file
 * system, so the result always reflects the current file content.
 */
export async function loadConfiguration(
  path?: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<LoadedConfiguration> {
  const explorer = cosmiconfig(CONFIG_MODULE_NAME, {cache: false});

  let result: CosmiconfigResult;

  try {
    result =
      path === undefined ? await explorer.search() : await explorer.load(path);
  } catch (error) {
    throw new ConfigurationError(
      `Failed to read configuration: ${describeError(error)}`,
      {cause: error},
    );
  }

  if (!result) {
    throw new ConfigurationError('Configuration file not found.');
  }

  if (result.isEmpty) {
    throw new ConfigurationError(
      `Configuration file ${result.filepath} is empty.`,
    );
  }

  return {
    path: result.filepath,
    config: parseConfig(expandEnvironmentVariables(result.config, env)),
  };
}

/**
 * Replaces `${NAME}` references in every string of the document with the
 * value of the environment variable.
 */
export function expandEnvironmentVariables(
  value: unknown,
  env: NodeJS.ProcessEnv,
): unknown {
  if (typeof value === 'string') {
    return value.replace(
      ENVIRONMENT_VARIABLE_REFERENCE_REGEX,
      (_text: string, name: string) => {
        const variable = env[name];

        if (variable === undefined) {
          throw new ConfigurationError(
            `Environment variable ${name} referenced by configuration is not set.`,
          );
        }

        return variable;
      },
    );
  }

  if (Array.isArray(value)) {
    return value.map(item => expandEnvironmentVariables(item, env));
  }

  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [
        key,
        expandEnvironmentVariables(item, env),
      ]),
    );
  }

  return value;
}
