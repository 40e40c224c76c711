import * as fs from 'fs';
import { GeneratorError } from '../models/errors';
import type { SwaggerDocument } from '../models/swagger';
import { describeErrors, validateSourceDocument } from './validationService';

/** Read and parse a Swagger JSON document from disk. */
export async function loadSwaggerDocument(filePath: string): Promise<SwaggerDocument> {
  let raw: string;
  try {
    raw = await fs.promises.readFile(filePath, 'utf-8');
  } catch (e: unknown) {
    if (isErrnoException(e) && (e.code === 'ENOENT' || e.code === 'EISDIR')) {
      throw new GeneratorError('MISSING_INPUT_DOCUMENT', `Swagger document not found at ${filePath}`);
    }
    throw e;
  }
  return parseSwaggerDocument(raw, filePath);
}

/** Parse and shape-check document text; `source` only labels error messages. */
export function parseSwaggerDocument(text: string, source = '<input>'): SwaggerDocument {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (e: unknown) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new GeneratorError('MALFORMED_INPUT_DOCUMENT', `${source} is not valid JSON: ${reason}`);
  }

  const result = validateSourceDocument(data);
  if (!result.ok) {
    throw new GeneratorError(
      'MALFORMED_INPUT_DOCUMENT',
      `${source} is not a Swagger 2.0 document`,
      describeErrors(result.errors),
    );
  }
  return result.value;
}

function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && 'code' in e;
}
