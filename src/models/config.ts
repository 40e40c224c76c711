/**
 * Generator configuration. Connection values left undefined fall back to the
 * source document (`schemes`, `host`, `basePath`) when the collection is assembled.
 */

export interface EnvironmentConfig {
  /** Name of the single sub-environment. */
  name: string;
  scheme?: string;
  host?: string;
  basePath?: string;
  /** Placeholder credential stored in the sub-environment. */
  apiKey: string;
  color: string;
}

export interface TimestampConfig {
  collection: number;
  items: number;
}

export interface GeneratorConfig {
  /** Defaults to `<info.title> (<info.version>)`. */
  collectionName?: string;
  tagOrder: string[];
  fallbackTag: string;
  environment: EnvironmentConfig;
  timestamps: TimestampConfig;
}

/** Shape accepted from a config file: every field optional. */
export interface GeneratorConfigFile {
  collectionName?: string;
  tagOrder?: string[];
  fallbackTag?: string;
  environment?: Partial<EnvironmentConfig>;
  timestamps?: Partial<TimestampConfig>;
}
