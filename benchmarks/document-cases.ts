/**
 * jsondescent/benchmarks/document-cases.ts
 *
 * Generated documents for benchmarking. Each case builds its source text on
 * demand so nothing large is checked in.
 *
 * NOTE:
 *  - This file is for local development and benchmarking only.
 *  - Sources avoid short escapes (\n, \t, ...) so JSON.parse and decode
 *    agree on every string.
 */

export type DocumentCase = {
  name: string;
  iterations: number;
  build(): string;
};

function flatNumbers(count: number): string {
  const items: string[] = [];
  for (let i = 0; i < count; i++) {
    items.push(String(i % 7 === 0 ? -i / 4 : i));
  }
  return `[${items.join(', ')}]`;
}

function records(count: number): string {
  const rows: string[] = [];
  for (let i = 0; i < count; i++) {
    rows.push(
      `{"id": ${i}, "name": "user-${i}", "active": ${i % 2 === 0}, ` +
        `"score": ${(i * 1.25).toFixed(2)}, "tags": ["a", "b"], "manager": null}`,
    );
  }
  return `{"count": ${count}, "rows": [${rows.join(', ')}]}`;
}

function deepObject(depth: number): string {
  let out = '"leaf"';
  for (let i = depth; i > 0; i--) {
    out = `{"level${i}": ${out}, "n": ${i}}`;
  }
  return out;
}

function unicodeStrings(count: number): string {
  const items: string[] = [];
  for (let i = 0; i < count; i++) {
    items.push('"\\u3042\\u3044\\u3046 \\ud83d\\ude04 plain text"');
  }
  return `[${items.join(',')}]`;
}

export const DOCUMENT_CASES: DocumentCase[] = [
  {
    name: 'Small object',
    iterations: 50_000,
    build: () => '{"togatoga": "monkey-json", "fugafuga": null, "n": [1, 2, 3]}',
  },
  {
    name: 'Flat number array (1k)',
    iterations: 2_000,
    build: () => flatNumbers(1_000),
  },
  {
    name: 'Records (200 rows)',
    iterations: 500,
    build: () => records(200),
  },
  {
    name: 'Deep object (100 levels)',
    iterations: 5_000,
    build: () => deepObject(100),
  },
  {
    name: 'Unicode escapes (500 strings)',
    iterations: 500,
    build: () => unicodeStrings(500),
  },
];
