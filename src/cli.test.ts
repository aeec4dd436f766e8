import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { buildProgram, exitCodeFor, formatResult } from './cli';
import { ScoringEngine } from './core/scoring-engine';
import { KEYWORDS, RANGE, endpointConfig, flatDay, weakConfig, weakSample } from './testing/fixtures';

const engine = new ScoringEngine();

describe('exitCodeFor', () => {
  it('should pass Fair and above', () => {
    expect(exitCodeFor('Excellent')).toBe(0);
    expect(exitCodeFor('Good')).toBe(0);
    expect(exitCodeFor('Fair')).toBe(0);
    expect(exitCodeFor('Poor')).toBe(1);
    expect(exitCodeFor('Critical')).toBe(1);
  });
});

describe('formatResult', () => {
  it('should print the overall score and a bar per component', () => {
    const lines = formatResult(engine.score(endpointConfig(), flatDay(), RANGE, KEYWORDS)).split('\n');

    expect(lines).toContain('  Orders API (orders-api)');
    expect(lines).toContain('  OVERALL SCORE:  96.00/100  Excellent');
    expect(lines).toContain(`  Authentication Strength  ${'#'.repeat(24)}${'.'.repeat(6)}     80/100`);
    expect(lines).toContain('  Requests: 24  Error rate: 0%  Dropped: 0');
    expect(lines).not.toContain('  Recommendations:');
  });

  it('should list recommendations for a weak endpoint', () => {
    const lines = formatResult(engine.score(weakConfig(), weakSample(), RANGE, KEYWORDS)).split('\n');

    expect(lines).toContain('  Anomalous hours: 10');
    expect(lines).toContain('  Sensitive keywords in 25% of requests');
    expect(lines).toContain('   [CRITICAL] Configure an IP whitelist');
    expect(lines).toContain('   [MEDIUM  ] Mask sensitive data in logs');
  });
});

describe('score-file command', () => {
  let dir: string;
  let output: string[];

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'cli-'));
    output = [];
    vi.spyOn(console, 'log').mockImplementation((line: string) => {
      output.push(line);
    });
    vi.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
      output.push(args.join(' '));
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    delete process.env.SAMPLE_LIMIT;
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function writeInputs(): Promise<{ config: string; logs: string; keywords: string }> {
    const files = {
      config: path.join(dir, 'endpoint.json'),
      logs: path.join(dir, 'traffic.json'),
      keywords: path.join(dir, 'keywords.txt'),
    };
    await fs.writeFile(files.config, JSON.stringify(weakConfig()));
    await fs.writeFile(files.logs, JSON.stringify(weakSample()));
    await fs.writeFile(files.keywords, 'password\napi_key\ncredit_card\n');
    return files;
  }

  it('should score offline inputs and exit non-zero for a failing level', async () => {
    const files = await writeInputs();

    await buildProgram().parseAsync([
      'node', 'api-posture', 'score-file',
      '-c', files.config, '-l', files.logs, '-k', files.keywords,
      '-s', '2024-03-01', '-e', '2024-03-07', '--json',
    ]);

    const result = JSON.parse(output[0]);
    expect(result.overallScore).toBe(14.75);
    expect(result.level).toBe('Critical');
    expect(process.exitCode).toBe(1);
  });

  it('should cap the offline sample at the configured limit', async () => {
    const files = await writeInputs();
    process.env.SAMPLE_LIMIT = '2';

    await buildProgram().parseAsync([
      'node', 'api-posture', 'score-file',
      '-c', files.config, '-l', files.logs, '-k', files.keywords,
      '-s', '2024-03-01', '-e', '2024-03-07', '--json',
    ]);

    const result = JSON.parse(output[0]);
    expect(result.traffic.totalRequests).toBe(2);
    expect(result.traffic.errorCount).toBe(1);
  });

  it('should exit with code 2 on invalid input', async () => {
    const files = await writeInputs();
    await fs.writeFile(files.config, JSON.stringify({ id: 'broken' }));

    await buildProgram().parseAsync([
      'node', 'api-posture', 'score-file', '-c', files.config, '-l', files.logs, '-k', files.keywords,
    ]);

    expect(process.exitCode).toBe(2);
    expect(output[0]).toBe('Scoring failed: Invalid endpoint config: name: Required');
  });
});
