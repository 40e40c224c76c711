import type { GeneratorConfig } from '../models/config';
import type { SwaggerDocument } from '../models/swagger';
import { findUndefinedVariables } from '../services/unresolvedVars';
import { stringifyCollection } from '../services/yamlParser';
import { DEFAULT_CONFIG, assembleCollection, type AssembleResult } from './collectionAssembler';

export interface GenerationResult extends AssembleResult {
  yaml: string;
  /** Variables requests reference that no environment defines. */
  undefinedVariables: string[];
}

/** Assemble the collection for a document and serialize it to YAML. */
export function generateCollection(doc: SwaggerDocument, config: GeneratorConfig = DEFAULT_CONFIG): GenerationResult {
  const result = assembleCollection(doc, config);
  return {
    ...result,
    yaml: stringifyCollection(result.collection),
    undefinedVariables: findUndefinedVariables(result.collection),
  };
}

export { DEFAULT_CONFIG, assembleCollection, defaultCollectionName } from './collectionAssembler';
export type { AssembleResult, AssembleStats } from './collectionAssembler';
export { collectOperations } from './swaggerParser';
export { groupOperations, compareOperations, DEFAULT_TAG_ORDER, DEFAULT_FALLBACK_TAG } from './operationGrouper';
export type { FolderGroup, GroupingOptions } from './operationGrouper';
export { emitRequest, formatUrlPath, DEFAULT_MIME_TYPE } from './requestEmitter';
export type { EmitContext } from './requestEmitter';
export { synthesize, MAX_SYNTHESIS_DEPTH } from './sampleSynthesizer';
export type { SynthesisContext } from './sampleSynthesizer';
export { resolveReference } from './refResolver';
export type { ResolveResult } from './refResolver';
export { parseSchema, buildSchemaRegistry } from './schemaParser';
export { stableId, SortKeyCounter, COLLECTION_TIMESTAMP, ITEM_TIMESTAMP } from './identity';
