import * as fs from 'fs';
import * as path from 'path';
import yaml from 'js-yaml';
import Ajv from 'ajv';
import { CONFIG_DIR } from './dialogue-config';
import { ConfigError } from '../errors/dialogue-errors';
import { logger } from '../observability/logger';

const ajv = new Ajv({ allErrors: true });

/**
 * Read a YAML or JSON catalog from the config directory and validate it
 * against a JSON schema. Catalogs are required: a missing or malformed file
 * fails start-up.
 */
export function loadCatalog<T>(filename: string, schema: object, dir: string = CONFIG_DIR): T {
  const filepath = path.join(dir, filename);
  if (!fs.existsSync(filepath)) {
    throw new ConfigError(`Catalog file not found: ${filepath}`);
  }

  let data: unknown;
  try {
    const content = fs.readFileSync(filepath, 'utf-8');
    data = filename.endsWith('.json') ? JSON.parse(content) : yaml.load(content);
  } catch (err) {
    throw new ConfigError(`Failed to parse ${filename}: ${err instanceof Error ? err.message : String(err)}`);
  }

  const validate = ajv.compile<T>(schema);
  if (!validate(data)) {
    const errors = validate.errors?.map((e) => `${e.instancePath} ${e.message}`).join('; ');
    throw new ConfigError(`Invalid catalog ${filename}: ${errors}`);
  }

  logger.debug({ file: filename }, 'Loaded catalog');
  return data;
}

export const stringList = { type: 'array', items: { type: 'string', minLength: 1 } };

export const localizedText = {
  type: 'object',
  properties: { vi: { type: 'string' }, en: { type: 'string' } },
  required: ['vi', 'en'],
  additionalProperties: false,
};
