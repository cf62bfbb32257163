#!/usr/bin/env tsx

/**
 * Runner for the disaster feed pipeline
 * Loads environment variables, scans the configured feeds and writes the outputs
 */

// Load environment variables from .env.local or .env
import dotenv from 'dotenv';
import path from 'path';
import { fileURLToPath } from 'url';

// Find project root (two levels up from scripts/pipeline)
const projectRoot = fileURLToPath(new URL('../..', import.meta.url));

// Try to load .env.local first, then .env from project root
dotenv.config({ path: path.join(projectRoot, '.env.local') });
dotenv.config({ path: path.join(projectRoot, '.env') });

import { loadEnvironmentConfig, type EnvironmentConfig } from '../../src/config/environment';
import { runDisasterScan } from '../../src/pipeline/disaster-scan';
import { writeOutputs } from '../../src/output/writers';
import { logger } from '../../src/utils/logger';

const resolveFromRoot = (file: string) => (path.isAbsolute(file) ? file : path.join(projectRoot, file));

function loadConfigOrExit(): EnvironmentConfig {
  try {
    return loadEnvironmentConfig();
  } catch (error) {
    console.error('💥 Invalid configuration:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

async function main() {
  console.log('🚀 Starting disaster feed scan\n');
  console.log('═'.repeat(80));

  const config = loadConfigOrExit();
  logger.setLevel(config.logging.level);

  const controller = new AbortController();
  process.once('SIGINT', () => {
    logger.warn('Interrupt received, stopping after the current entry');
    controller.abort();
  });

  try {
    const result = await runDisasterScan(
      {
        ...config,
        feeds: {
          ...config.feeds,
          entriesFile: config.feeds.entriesFile && resolveFromRoot(config.feeds.entriesFile)
        },
        gazetteer: { ...config.gazetteer, referenceFile: resolveFromRoot(config.gazetteer.referenceFile) }
      },
      { signal: controller.signal }
    );

    const written = await writeOutputs(result.records, {
      format: config.output.format,
      csvFile: resolveFromRoot(config.output.csvFile),
      jsonFile: resolveFromRoot(config.output.jsonFile),
      listDelimiter: config.output.listDelimiter,
      envelope: result.envelope
    });

    const degraded = new Map<string, number>();
    for (const diagnostic of result.diagnostics) {
      degraded.set(diagnostic.kind, (degraded.get(diagnostic.kind) ?? 0) + 1);
    }

    console.log('\n' + '═'.repeat(80));
    console.log('🎉 DISASTER FEED SCAN COMPLETED');
    console.log('═'.repeat(80));
    console.log('📊 Final Results:');
    console.log(`   • Feeds consulted: ${result.feeds.length} (${result.feeds.filter(f => !f.success).length} failed)`);
    console.log(`   • Gazetteer size: ${result.gazetteerSize}`);
    console.log(`   • Entries processed: ${result.stats.totalEntries}`);
    console.log(`   • Records assembled: ${result.stats.assembled}`);
    console.log(`   • Skipped: ${result.stats.skipped}, failed: ${result.stats.failed}`);
    for (const [kind, count] of degraded) {
      console.log(`   • ${kind}: ${count}`);
    }
    console.log(`   • Written: ${written.join(', ')}`);

    process.exit(0);
  } catch (error) {
    console.error('\n💥 DISASTER FEED SCAN FAILED');
    console.error('═'.repeat(80));
    console.error('Error:', error);
    process.exit(1);
  }
}

void main();
