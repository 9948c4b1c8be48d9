#!/usr/bin/env node

import 'dotenv/config';
import { loadPipelineConfig, type PipelineConfig } from './config/pipeline.js';
import { Consolidator } from './core/Consolidator.js';
import { isFatalPipelineError } from './core/errors.js';
import { AnalysisPipeline } from './pipeline/AnalysisPipeline.js';
import { FilterPipeline, type FilterRunSummary } from './pipeline/FilterPipeline.js';
import { errorMeta, logger } from './utils/logger.js';

/**
 * CLI for the health-litigation pipeline
 *
 * Usage:
 *   health-litigation filter [--config <file>]       - Filter archives, export regions, consolidate
 *   health-litigation consolidate [--config <file>]  - Rebuild the national file from regional exports
 *   health-litigation analyze [--config <file>]      - Frequency analysis and reports
 *   health-litigation run [--config <file>]          - filter, then analyze
 */

const COMMANDS = ['filter', 'consolidate', 'analyze', 'run', 'help'];

/**
 * Value of `--config <file>` or `--config=<file>`
 */
function parseConfigPath(flags: string[]): string | undefined {
  for (let i = 0; i < flags.length; i++) {
    const flag = flags[i];
    if (flag === '--config') {
      const value = flags[i + 1];
      if (!value) {
        console.error('Error: --config requires a file path');
        process.exit(1);
      }
      return value;
    }
    if (flag.startsWith('--config=')) {
      return flag.slice('--config='.length);
    }
  }
  return undefined;
}

function printFilterSummary(summary: FilterRunSummary): void {
  console.log('\n📊 Filter summary:\n');
  for (const group of summary.groups) {
    console.log(`   ${group.groupName}`);
    console.log(`      Archives: ${group.archives - group.archivesSkipped}/${group.archives}`);
    console.log(`      Rows: ${group.rowsRetained} retained / ${group.rowsRead} read`);
    if (group.schemaMismatches > 0) {
      console.log(`      Tables with missing columns: ${group.schemaMismatches}`);
    }
  }

  console.log(`\n   Consolidated: ${summary.consolidation.rowCount} rows`);
  console.log(`   File: ${summary.consolidation.file}`);

  if (summary.archivesSkipped > 0) {
    console.log(`\n⚠️  ${summary.archivesSkipped} corrupt archive(s) skipped (see logs)`);
  }
}

async function runFilter(config: PipelineConfig): Promise<void> {
  const summary = await new FilterPipeline(config).run();
  printFilterSummary(summary);
}

async function runConsolidate(config: PipelineConfig): Promise<void> {
  const consolidator = new Consolidator(
    config.consolidatedFile,
    config.delimiter,
    config.neutralMarker
  );
  const exports = await consolidator.findRegionalExports(config.regionalDir, config.regions);
  const result = await consolidator.consolidate(exports);

  console.log(`\n✅ Consolidated ${result.rowCount} rows from ${result.sources.join(', ')}`);
  console.log(`   File: ${result.file}`);
}

async function runAnalyze(config: PipelineConfig): Promise<void> {
  const { contexts, reports } = await new AnalysisPipeline(config).run();

  console.log(`\n✅ Analyzed ${contexts.length} dataset(s)`);
  for (const context of contexts) {
    console.log(
      `   ${context.label}: ${context.subsetSizes.A} records, ` +
        `${context.subsetSizes.B} against public entities`
    );
  }
  console.log(`\n   CSV report: ${reports.combinedCsv}`);
  console.log(`   PDF report: ${reports.pdf} (${reports.pageCount} pages)`);
  console.log(`   Table exports: ${reports.tableCsvs.length}`);
}

/**
 * Print help message
 */
function printHelp(): void {
  console.log(`
Health-Litigation Extraction and Analysis

USAGE:
  health-litigation <command> [--config <file>]

COMMANDS:
  filter         Filter court-record archives by health subject code,
                 write one export per region and the consolidated file
  consolidate    Rebuild the consolidated file from existing regional exports
  analyze        Frequency analysis of the consolidated and regional files,
                 written as CSV tables, a combined CSV report and a PDF
  run            filter, then analyze
  help           Show this help message

OPTIONS:
  --config <file>    JSON file with pipeline settings (inputDir, outputDir,
                     reportsDir, regions, subjectCodes, projectedColumns,
                     analysisColumns, publicEntityKeywords, neutralMarker, topN)

ENVIRONMENT:
  Configuration is loaded from .env file
  Optional variables:
    - HL_INPUT_DIR, HL_OUTPUT_DIR, HL_REPORTS_DIR   Directory overrides
    - LOG_LEVEL                                     winston level (default: info)
    - LOG_FILES=false                               Disable logs/*.log
    - LOG_DIR                                       Log file directory

EXAMPLES:
  health-litigation filter
  health-litigation analyze --config pipeline.config.json
  HL_INPUT_DIR=/data/AnaliseBR health-litigation run
`);
}

/**
 * Main CLI entry point
 */
async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.length === 0 || args[0] === 'help') {
    printHelp();
    return;
  }

  const command = args[0];
  const flags = args.slice(1);

  if (!COMMANDS.includes(command)) {
    console.error(`Unknown command: ${command}`);
    console.error(`Valid commands: ${COMMANDS.join(', ')}`);
    printHelp();
    process.exit(1);
  }

  try {
    const config = loadPipelineConfig({ configPath: parseConfigPath(flags) });

    switch (command) {
      case 'filter':
        await runFilter(config);
        break;

      case 'consolidate':
        await runConsolidate(config);
        break;

      case 'analyze':
        await runAnalyze(config);
        break;

      case 'run':
        await runFilter(config);
        await runAnalyze(config);
        break;
    }
  } catch (error) {
    if (isFatalPipelineError(error)) {
      logger.error(`${error.code}: ${error.message}`);
      console.error(`\n❌ ${error.message}`);
    } else {
      logger.error('Command failed', errorMeta(error));
      console.error('\n❌ Command failed:', error instanceof Error ? error.message : String(error));
    }
    process.exit(1);
  }
}

// Run CLI
main().catch((error: unknown) => {
  logger.error('Unhandled error', errorMeta(error));
  process.exit(1);
});
