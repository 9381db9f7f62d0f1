/**
 * jsondescent/benchmarks/compare-to-json-parse.ts
 *
 * Micro-benchmark comparing `decode` against the built-in `JSON.parse` on
 * the generated documents in `document-cases.ts`.
 *
 * How to run:
 *   npm run bench
 */

import { compareKeys, createDecoder, toPlain } from '../src';
import { DOCUMENT_CASES } from './document-cases';

type ResultRow = {
  name: string;
  iterations: number;
  decodeMs: number;
  nativeMs: number;
};

// Keeps results observable so the loops are not optimized away.
let sink = 0;

function nowMs(): number {
  return performance.now();
}

function formatNumber(n: number): string {
  return n.toLocaleString(undefined, { maximumFractionDigits: 2 });
}

function pad(value: string, width: number): string {
  if (value.length >= width) return value.slice(0, width);
  return value + ' '.repeat(width - value.length);
}

function runBenchmark(): void {
  console.log('=== jsondescent vs JSON.parse benchmark ===');
  console.log();

  const decoder = createDecoder();
  const results: ResultRow[] = [];

  for (const testCase of DOCUMENT_CASES) {
    const { name, iterations } = testCase;
    const source = testCase.build();

    // Sanity check: both sides must agree before timing anything.
    const ours = JSON.stringify(toPlain(decoder.decode(source)));
    const native = JSON.stringify(sortKeys(JSON.parse(source)));
    if (ours !== native) {
      throw new Error(`Case "${name}": decode and JSON.parse disagree.`);
    }

    console.log(`--- Case: ${name} ---`);
    console.log(`Source length: ${formatNumber(source.length)}`);
    console.log(`Iterations: ${formatNumber(iterations)}`);

    for (let i = 0; i < Math.min(iterations, 500); i++) {
      sink ^= decoder.decode(source).type.length;
      sink ^= typeof JSON.parse(source) === 'object' ? 1 : 0;
    }

    const decodeStart = nowMs();
    for (let i = 0; i < iterations; i++) {
      sink ^= decoder.decode(source).type.length;
    }
    const decodeMs = nowMs() - decodeStart;

    const nativeStart = nowMs();
    for (let i = 0; i < iterations; i++) {
      sink ^= typeof JSON.parse(source) === 'object' ? 1 : 0;
    }
    const nativeMs = nowMs() - nativeStart;

    results.push({ name, iterations, decodeMs, nativeMs });

    console.log(`decode:     ${formatNumber(decodeMs)} ms`);
    console.log(`JSON.parse: ${formatNumber(nativeMs)} ms`);
    console.log();
  }

  console.log('Ignore (sink):', sink);
  console.log();

  printSummary(results);
}

/**
 * JSON.parse keeps insertion order; decode sorts keys. Sort the native
 * result the same way before comparing.
 */
function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (value === null || typeof value !== 'object') return value;

  const out: Record<string, unknown> = {};
  for (const key of Object.keys(value).sort(compareKeys)) {
    out[key] = sortKeys(Reflect.get(value, key));
  }
  return out;
}

function printSummary(rows: ResultRow[]): void {
  console.log('=== Summary (lower is better) ===');
  console.log();

  console.log(
    [pad('Case', 32), pad('Iterations', 12), pad('decode ms', 12), pad('JSON.parse ms', 14), pad('Ratio', 10)].join(' | '),
  );
  console.log(['-'.repeat(32), '-'.repeat(12), '-'.repeat(12), '-'.repeat(14), '-'.repeat(10)].join('-|-'));

  for (const row of rows) {
    const ratio = row.nativeMs > 0 ? row.decodeMs / row.nativeMs : NaN;
    console.log(
      [
        pad(row.name, 32),
        pad(formatNumber(row.iterations), 12),
        pad(formatNumber(row.decodeMs), 12),
        pad(formatNumber(row.nativeMs), 14),
        pad(Number.isFinite(ratio) ? `~${formatNumber(ratio)}x` : 'N/A', 10),
      ].join(' | '),
    );
  }

  console.log();
  console.log('Note: This benchmark is synthetic and only one data point.');
}

try {
  runBenchmark();
} catch (err) {
  console.error('Benchmark failed:', err);
  process.exitCode = 1;
}
