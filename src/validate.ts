import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { Ajv, type ValidateFunction } from 'ajv';
import { WriteError } from './errors.js';
import type { TransferRecord } from './types/index.js';

const ajv = new Ajv({ allErrors: true, strict: false });

const validatorCache = new Map<string, ValidateFunction>();

async function loadValidator (schemaPath: string): Promise<ValidateFunction> {
  const cached = validatorCache.get(schemaPath);
  if (cached) return cached;
  const schema = JSON.parse(await readFile(schemaPath, 'utf8'));
  const validator = ajv.compile(schema);
  validatorCache.set(schemaPath, validator);
  return validator;
}

const defaultSchemaDir = join(process.cwd(), 'schemas');

/**
 * Checks every record against `transfer_record.json` and reports the first
 * violation as a `WriteError` for `file`.
 */
export async function validateTransferRecords (
  records: readonly TransferRecord[],
  file: string,
  schemaDir: string = defaultSchemaDir
) {
  const validator = await loadValidator(join(schemaDir, 'transfer_record.json'));
  for (const [index, record] of records.entries()) {
    // The validator narrows its argument, so read the identity first.
    const details = { index, player_id: record.player_id, club: record.club };
    if (!validator(record)) {
      const message = ajv.errorsText(validator.errors, { dataVar: `records[${index}]` });
      throw new WriteError(message, { code: 'VALIDATION_FAILED', file, details });
    }
  }
}
