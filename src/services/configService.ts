import * as fs from 'fs';
import { DEFAULT_CONFIG } from '../generator/collectionAssembler';
import type { GeneratorConfig, GeneratorConfigFile } from '../models/config';
import { GeneratorError } from '../models/errors';
import { parseYaml } from './yamlParser';
import { describeErrors, validateConfig } from './validationService';

/** Values passed on the command line; they win over the config file. */
export interface ConfigOverrides {
  collectionName?: string;
  host?: string;
  environmentName?: string;
}

/**
 * Load the generator config: defaults, then the optional YAML/JSON file,
 * then command-line overrides.
 */
export async function loadConfig(configPath?: string, overrides: ConfigOverrides = {}): Promise<GeneratorConfig> {
  let file: GeneratorConfigFile = {};
  if (configPath) {
    let content: string;
    try {
      content = await fs.promises.readFile(configPath, 'utf-8');
    } catch (e: unknown) {
      const reason = e instanceof Error ? e.message : String(e);
      throw new GeneratorError('INVALID_CONFIG', `Cannot read config file ${configPath}: ${reason}`);
    }
    file = parseConfigFile(content, configPath);
  }
  return resolveConfig(file, overrides);
}

export function parseConfigFile(content: string, source = '<config>'): GeneratorConfigFile {
  let data: unknown;
  try {
    data = parseYaml(content);
  } catch (e: unknown) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new GeneratorError('INVALID_CONFIG', `${source} is not valid YAML: ${reason}`);
  }
  // An empty file parses to null
  if (data === null || data === undefined) return {};

  const result = validateConfig(data);
  if (!result.ok) {
    throw new GeneratorError('INVALID_CONFIG', `${source} is not a valid config file`, describeErrors(result.errors));
  }
  return result.value;
}

export function resolveConfig(file: GeneratorConfigFile, overrides: ConfigOverrides = {}): GeneratorConfig {
  const collectionName = overrides.collectionName ?? file.collectionName;
  return {
    ...(collectionName !== undefined ? { collectionName } : {}),
    tagOrder: file.tagOrder ?? [...DEFAULT_CONFIG.tagOrder],
    fallbackTag: file.fallbackTag ?? DEFAULT_CONFIG.fallbackTag,
    environment: {
      ...DEFAULT_CONFIG.environment,
      ...file.environment,
      ...(overrides.environmentName !== undefined ? { name: overrides.environmentName } : {}),
      ...(overrides.host !== undefined ? { host: overrides.host } : {}),
    },
    timestamps: {
      ...DEFAULT_CONFIG.timestamps,
      ...file.timestamps,
    },
  };
}
