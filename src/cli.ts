#!/usr/bin/env node
// ============================================================================
// CLI - Command-line interface for endpoint posture scoring
// ============================================================================

import 'dotenv/config';
import fs from 'fs/promises';
import { Command } from 'commander';
import { loadAppConfig } from './config';
import { errorMessage } from './core/errors';
import { ScoringEngine } from './core/scoring-engine';
import { createRuntime } from './core/runtime';
import { KeywordStore, keywordSourceFor } from './store/keyword-store';
import { InMemoryEndpointConfigSource, StaticTrafficLogSource } from './store/sources';
import { ScoringOrchestrator } from './orchestrator';
import { parseEndpointConfig, parseTrafficSample } from './types/schemas';
import { CompositeScoreResult, SecurityLevel } from './types';

const PASSING_LEVELS: readonly SecurityLevel[] = ['Excellent', 'Good', 'Fair'];

export function exitCodeFor(level: SecurityLevel): number {
  return PASSING_LEVELS.includes(level) ? 0 : 1;
}

async function readJson(filePath: string): Promise<unknown> {
  return JSON.parse(await fs.readFile(filePath, 'utf-8'));
}

function bar(score: number): string {
  const filled = Math.round((score / 100) * 30);
  return '#'.repeat(filled) + '.'.repeat(30 - filled);
}

export function formatResult(result: CompositeScoreResult): string {
  const lines: string[] = [
    '',
    `  ${result.endpointName} (${result.endpointId})`,
    `  Window: ${result.timeRange.start} -> ${result.timeRange.end}`,
    '',
    `  OVERALL SCORE: ${result.overallScore.toFixed(2).padStart(6)}/100  ${result.level}`,
    '',
  ];

  for (const c of result.components) {
    lines.push(`  ${c.label.padEnd(24)} ${bar(c.score)} ${String(c.score).padStart(6)}/100`);
  }

  lines.push('', `  Requests: ${result.traffic.totalRequests}  Error rate: ${result.traffic.errorRate}%  Dropped: ${result.traffic.droppedEntries}`);
  if (result.traffic.anomalousHours.length > 0) {
    lines.push(`  Anomalous hours: ${result.traffic.anomalousHours.join(', ')}`);
  }
  if (result.sensitiveData.matchingEntries > 0) {
    lines.push(`  Sensitive keywords in ${result.sensitiveData.matchPercentage}% of requests`);
  }

  if (result.recommendations.length > 0) {
    lines.push('', '  Recommendations:');
    for (const r of result.recommendations) {
      lines.push(`   [${r.severity.toUpperCase().padEnd(8)}] ${r.title}`);
    }
  }

  lines.push('');
  return lines.join('\n');
}

function emit(result: CompositeScoreResult, json: boolean | undefined): void {
  console.log(json ? JSON.stringify(result, null, 2) : formatResult(result));
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('api-posture')
    .description('API security posture scoring from endpoint configuration and traffic logs')
    .version('1.0.0');

  program
    .command('score')
    .description('Score an endpoint against the PostgreSQL config and traffic stores')
    .argument('<endpointId>', 'Endpoint identifier')
    .option('-s, --start <date>', 'Window start (ISO-8601 or YYYY-MM-DD)')
    .option('-e, --end <date>', 'Window end (ISO-8601 or YYYY-MM-DD, date-only covers the whole day)')
    .option('--json', 'Output raw JSON result')
    .action(async (endpointId: string, options: { start?: string; end?: string; json?: boolean }) => {
      try {
        const runtime = createRuntime(loadAppConfig());
        try {
          await runtime.keywords.load();
          const range = runtime.orchestrator.createTimeRange(options.start, options.end);
          const result = await runtime.orchestrator.scoreEndpoint(endpointId, range);
          emit(result, options.json);
          process.exitCode = exitCodeFor(result.level);
        } finally {
          await runtime.close();
        }
      } catch (error) {
        console.error('Scoring failed:', errorMessage(error));
        process.exitCode = 2;
      }
    });

  program
    .command('score-file')
    .description('Score an endpoint offline from JSON config and traffic log files')
    .requiredOption('-c, --config <file>', 'Endpoint config JSON file')
    .requiredOption('-l, --logs <file>', 'Traffic log JSON file (array of entries)')
    .option('-k, --keywords <file>', 'Sensitive keyword list (defaults to SENSITIVE_KEYWORDS_SOURCE)')
    .option('-s, --start <date>', 'Window start (ISO-8601 or YYYY-MM-DD)')
    .option('-e, --end <date>', 'Window end (ISO-8601 or YYYY-MM-DD)')
    .option('--json', 'Output raw JSON result')
    .action(async (options: { config: string; logs: string; keywords?: string; start?: string; end?: string; json?: boolean }) => {
      try {
        const appConfig = loadAppConfig();
        const endpoint = parseEndpointConfig(await readJson(options.config));
        const sample = parseTrafficSample(await readJson(options.logs));
        const keywords = new KeywordStore(keywordSourceFor(options.keywords ?? appConfig.keywordSource));
        await keywords.load();

        const orchestrator = new ScoringOrchestrator(
          new ScoringEngine(appConfig.scoring),
          new InMemoryEndpointConfigSource([endpoint]),
          new StaticTrafficLogSource(sample),
          keywords,
          {
            sampleLimit: appConfig.sampleLimit,
            pageSize: appConfig.pageSize,
            defaultRangeDays: appConfig.defaultRangeDays,
            maxRangeDays: appConfig.maxRangeDays,
          },
        );
        const result = await orchestrator.scoreEndpoint(endpoint.id, orchestrator.createTimeRange(options.start, options.end));
        emit(result, options.json);
        process.exitCode = exitCodeFor(result.level);
      } catch (error) {
        console.error('Scoring failed:', errorMessage(error));
        process.exitCode = 2;
      }
    });

  program
    .command('keywords')
    .description('Print the parsed sensitive keyword set')
    .option('--source <location>', 'File path or http(s) URL (defaults to SENSITIVE_KEYWORDS_SOURCE)')
    .action(async (options: { source?: string }) => {
      try {
        const location = options.source ?? loadAppConfig().keywordSource;
        const snapshot = await new KeywordStore(keywordSourceFor(location)).load();
        console.log(`# ${snapshot.keywords.length} keyword(s) from ${snapshot.source}`);
        console.log(snapshot.keywords.join('\n'));
      } catch (error) {
        console.error('Keyword load failed:', errorMessage(error));
        process.exitCode = 2;
      }
    });

  return program;
}

if (require.main === module) {
  buildProgram().parseAsync(process.argv).catch((error) => {
    console.error(errorMessage(error));
    process.exit(2);
  });
}
