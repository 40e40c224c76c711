export * from './generator';
export type { GeneratorConfig, GeneratorConfigFile, EnvironmentConfig, TimestampConfig } from './models/config';
export { GeneratorError, isGeneratorError, DiagnosticCollector } from './models/errors';
export type { Diagnostic, DiagnosticCode, GeneratorErrorCode } from './models/errors';
export * from './models/insomnia';
export type { SchemaNode, SchemaRegistry, JsonValue } from './models/schema';
export type { Operation, Parameter, SwaggerDocument } from './models/swagger';
export { loadConfig, parseConfigFile, resolveConfig } from './services/configService';
export { loadSwaggerDocument, parseSwaggerDocument } from './services/documentLoader';
export { findUndefinedVariables } from './services/unresolvedVars';
export { validateCollection, validateConfig, validateSourceDocument } from './services/validationService';
export { stringifyCollection, scalarStyle } from './services/yamlParser';
