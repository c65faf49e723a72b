/*
 * Benchmark escaping.
 *
 * Notes:
 * - This is a micro-benchmark. Results vary by machine and Node.js version.
 * - "regex" is a replace() based reference implementation, included to put
 *   the numbers of the two-pass escaper into perspective.
 */

import { performance } from 'node:perf_hooks';

import { escape } from '../src/escaper.js';
import { unescape } from '../src/html-utils.js';

type BenchmarkKind = 'escape' | 'escape(quotes=false)' | 'regex' | 'unescape';

const KINDS: BenchmarkKind[] = [ 'escape', 'escape(quotes=false)', 'regex', 'unescape' ];

interface BenchmarkResult {
  kind: BenchmarkKind;
  scenario: string;
  iterations: number;
  totalMs: number;
  msPerOp: number;
  opsPerSec: number;
}

interface Scenario {
  name: string;
  text: string;
}

interface BenchArgs {
  iterations: number;
  warmup: number;
  format: 'table' | 'md' | 'json';
}

const REGEX_MAP: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&#34;',
  "'": '&#39;',
};

function regexEscape (str: string): string {
  return str.replace(/[&<>"']/g, (ch) => REGEX_MAP[ch]);
}

function parseArgs (argv: string[]): BenchArgs {
  const out: BenchArgs = {
    iterations: 100_000,
    warmup: 10_000,
    format: 'table',
  };

  for (const arg of argv) {
    const m = /^--(iterations|warmup)=(\d+)$/.exec(arg);
    if (!m) continue;

    const value = Number.parseInt(m[2] ?? '', 10);
    if (!Number.isFinite(value) || value < 0) continue;

    if (m[1] === 'iterations') out.iterations = value;
    if (m[1] === 'warmup') out.warmup = value;
  }

  // keep things sane
  out.warmup = Math.max(0, Math.min(out.warmup, 1_000_000));
  out.iterations = Math.max(1, Math.min(out.iterations, 10_000_000));

  for (const arg of argv) {
    const m = /^--format=(table|md|json)$/.exec(arg);
    if (!m) continue;
    if (m[1] === 'table' || m[1] === 'md' || m[1] === 'json') out.format = m[1];
  }

  return out;
}

function runOnce (kind: BenchmarkKind, text: string): number {
  switch (kind) {
    case 'escape': return escape(text).length;
    case 'escape(quotes=false)': return escape(text, false).length;
    case 'regex': return regexEscape(text).length;
    case 'unescape': return unescape(text).length;
  }
}

function bench (kind: BenchmarkKind, scenario: Scenario, iterations: number, warmup: number): BenchmarkResult {
  // unescape works on escaped input
  const text = (kind === 'unescape') ? escape(scenario.text).toString() : scenario.text;

  let sink = 0;
  for (let i = 0; i < warmup; i++) {
    sink += runOnce(kind, text);
  }

  const start = performance.now();
  for (let i = 0; i < iterations; i++) {
    sink += runOnce(kind, text);
  }
  const end = performance.now();

  if (sink === Number.NEGATIVE_INFINITY) {
    // Prevent DCE in case of overly aggressive optimizations.
    console.log('sink', sink);
  }

  const totalMs = end - start;

  return {
    kind,
    scenario: scenario.name,
    iterations,
    totalMs,
    msPerOp: totalMs / iterations,
    opsPerSec: (iterations / totalMs) * 1000,
  };
}

function main (): void {
  const args = parseArgs(process.argv.slice(2));

  if (process.execArgv.some((a) => a.startsWith('--inspect'))) {
    console.warn('Warning: Node inspector is enabled; benchmark results will be distorted.');
    console.warn('Tip: run in a normal terminal / unset NODE_OPTIONS.');
    console.warn('');
  }

  const scenarios: Scenario[] = [
    {
      name: 'plain (nothing to escape)',
      text: 'The quick brown fox jumps over the lazy dog. '.repeat(8),
    },
    {
      name: 'mixed (some markup)',
      text: '<p class="intro">Tom &amp; Jerry\'s <em>show</em></p>\n'.repeat(4),
    },
    {
      name: 'dense (only specials)',
      text: '<>&"\''.repeat(64),
    },
  ];

  const results: BenchmarkResult[] = [];

  for (const scenario of scenarios) {
    for (const kind of KINDS) {
      results.push(bench(kind, scenario, args.iterations, args.warmup));
    }
  }

  const rows = results.map((r) => ({
    kind: r.kind,
    scenario: r.scenario,
    iterations: r.iterations,
    totalMs: Number(r.totalMs.toFixed(2)),
    msPerOp: Number(r.msPerOp.toFixed(6)),
    opsPerSec: Number(r.opsPerSec.toFixed(0)),
  }));

  if (args.format === 'json') {
    console.log(JSON.stringify({
      node: process.version,
      params: {
        iterations: args.iterations,
        warmup: args.warmup,
      },
      results: rows,
    }));
    return;
  }

  if (args.format === 'md') {
    console.log('## safemark benchmark');
    console.log('');
    console.log(`- Node: ${process.version}`);
    console.log(`- Params: iterations=${args.iterations}, warmup=${args.warmup}`);
    console.log('');
    console.log('| Kind | Scenario | Iterations | Total (ms) | ms/op | ops/sec |');
    console.log('| --- | --- | ---: | ---: | ---: | ---: |');

    for (const r of rows) {
      console.log(`| ${r.kind} | ${r.scenario} | ${r.iterations} | ${r.totalMs} | ${r.msPerOp} | ${r.opsPerSec} |`);
    }
    return;
  }

  console.log('Escape benchmark');
  console.log(`Node: ${process.version}`);
  console.log(`iterations=${args.iterations} warmup=${args.warmup}`);
  console.log('');

  console.table(rows);
}

main();
