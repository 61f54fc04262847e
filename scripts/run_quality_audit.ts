/**
 * Quality Audit Script
 * Grades a workbook sheet or database table against a quality profile and
 * prints the report as JSON
 *
 * Usage: npx tsx scripts/run_quality_audit.ts --source data/orders.xlsx [--unit Orders] [--profile config/quality_profile.json] [--data-profile]
 */

import dotenv from 'dotenv';
import { resolve } from 'path';

// Load .env.local first, then fall back to .env
dotenv.config({ path: resolve(process.cwd(), '.env.local') });
dotenv.config();

interface AuditCliArgs {
  source: string;
  unit?: string;
  profilePath?: string;
  includeDataProfile: boolean;
}

function readFlag(name: string): string | undefined {
  const equalsArg = process.argv.find((arg) => arg.startsWith(`${name}=`));
  if (equalsArg) return equalsArg.slice(name.length + 1);
  const index = process.argv.indexOf(name);
  return index >= 0 ? process.argv[index + 1] : undefined;
}

function parseCliArgs(): AuditCliArgs {
  const source = readFlag('--source');
  if (!source) {
    console.error('Usage: tsx scripts/run_quality_audit.ts --source <file.xlsx|file.db> [--unit <sheet|table>] [--profile <path>] [--data-profile]');
    process.exit(2);
  }
  return {
    source,
    unit: readFlag('--unit'),
    profilePath: readFlag('--profile'),
    includeDataProfile: process.argv.includes('--data-profile'),
  };
}

async function main(): Promise<void> {
  const args = parseCliArgs();
  // Imported after dotenv so LOG_LEVEL and QUALITY_* variables from .env apply.
  const { runQualityAudit } = await import('../src/analysis/audit');
  const { createChildLogger } = await import('../src/utils/logger');
  const logger = createChildLogger('run_quality_audit');

  try {
    const report = await runQualityAudit(args);
    console.log(JSON.stringify(report, null, 2));
    process.exit(report.overallStatus === 'failed' ? 1 : 0);
  } catch (error) {
    logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Quality audit failed');
    process.exit(1);
  }
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
