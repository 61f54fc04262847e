/**
 * Schema Validation Script
 * Compiles every JSON schema and checks the bundled quality profile against its schema
 *
 * Usage: npx tsx scripts/validate_schemas.ts
 */

import Ajv2020 from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import { readFileSync, readdirSync } from 'fs';
import { join } from 'path';
import { loadQualityProfile } from '../src/core/config';
import { errorMessage } from '../src/core/errors';

const schemasDir = join(process.cwd(), 'schemas');

const ajv = new Ajv2020({
  allErrors: true,
  strict: true,
  strictTypes: true,
  allowUnionTypes: true,
});
addFormats(ajv);

let hasErrors = false;

const files = readdirSync(schemasDir).filter((f) => f.endsWith('.json'));

for (const file of files) {
  try {
    ajv.compile(JSON.parse(readFileSync(join(schemasDir, file), 'utf-8')));
    console.log(`✓ ${file}`);
  } catch (error) {
    hasErrors = true;
    console.log(`✗ ${file}`);
    console.log(`  Error: ${errorMessage(error)}`);
  }
}

try {
  const profile = loadQualityProfile();
  console.log(`✓ profile '${profile.name}'`);
} catch (error) {
  hasErrors = true;
  console.log('✗ quality profile');
  console.log(`  Error: ${errorMessage(error)}`);
}

if (hasErrors) {
  console.log('\nSchema validation FAILED');
  process.exit(1);
} else {
  console.log(`\nAll ${files.length} schemas and the quality profile validated successfully`);
}
