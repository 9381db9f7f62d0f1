/**
 * jsondescent/examples/basic-node/index.ts
 *
 * Minimal Node.js example showing how to:
 *  - Decode a document and walk the value tree.
 *  - Use a configured decoder with limits.
 *  - Handle decode errors.
 *  - Decode request bodies with the middleware.
 *
 * How to run (from repo root):
 *   npm run example:node
 *   # or with a document of your own:
 *   npm run example:node -- '{"b": [1, 2], "a": null}'
 */

import { createServer } from 'node:http';

import {
  createDecoder,
  createJsonBodyMiddleware,
  decode,
  formatDecodeError,
  inspectSource,
  isDecodeError,
  toPlain,
} from '../../src'; // change to 'jsondescent' in external projects
import type { JsonValue } from '../../src';

// 1. Decode and walk a tree

function describe(value: JsonValue, path = '$'): string[] {
  switch (value.type) {
    case 'Array':
      return value.elements.flatMap((el, i) => describe(el, `${path}[${i}]`));
    case 'Object':
      return [...value.entries].flatMap(([key, child]) => describe(child, `${path}.${key}`));
    case 'Null':
      return [`${path} = null`];
    default:
      return [`${path} = ${JSON.stringify(value.value)}`];
  }
}

function runBasicDecode(): void {
  console.log('=== Basic decode() example ===');

  const source = '{"togatoga": "monkey-json", "fugafuga": null, "list": [1, true]}';
  const value = decode(source);

  console.log('Source:', source);
  console.log('Leaves (keys come out sorted):');
  for (const line of describe(value)) console.log(' ', line);
  console.log('As plain data:', toPlain(value));
  console.log();
}

// 2. Limits and error handling

function runLimits(): void {
  console.log('=== Decoder with limits ===');

  const decoder = createDecoder({ maxDepth: 2, maxInputLength: 64 });

  for (const source of ['[[1]]', '[[[1]]]', '{"key" "value"}', "{'a': 1}"]) {
    try {
      decoder.decode(source);
      console.log(`${source} → ok`);
    } catch (err) {
      handleDecodeError(source, err);
    }
  }
  console.log();
}

function handleDecodeError(source: string, err: unknown): void {
  if (isDecodeError(err)) {
    console.log(`${source} → ${formatDecodeError(err).detail}`);
    return;
  }
  throw err;
}

// 3. CLI: inspect a document given on the command line

function runWithCliDocument(): void {
  const [, , ...args] = process.argv;
  const cliSource = args.join(' ');

  if (!cliSource) {
    console.log('No CLI document provided, skipping CLI example.\n');
    return;
  }

  console.log('=== CLI document example ===');
  console.log(inspectSource(cliSource));
  console.log();
}

// 4. Middleware on a raw http.Server

async function runMiddleware(): Promise<void> {
  console.log('=== jsonBodyMiddleware example ===');

  const decodeBody = createJsonBodyMiddleware();

  const server = createServer((req, res) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => {
      decodeBody(Object.assign(req, { body: Buffer.concat(chunks) }), res).catch(
        (err: unknown) => {
          res.statusCode = 500;
          res.end(String(err));
        },
      );
    });
  });

  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('expected a TCP address');
  }
  const { port } = address;

  try {
    for (const body of ['{"b": 1, "a": 2}', '{"a": tru}']) {
      const response = await fetch(`http://127.0.0.1:${port}/`, { method: 'POST', body });
      console.log(`POST ${body} → ${response.status} ${await response.text()}`);
    }
  } finally {
    await new Promise<void>((resolve, reject) =>
      server.close((err) => (err ? reject(err) : resolve())),
    );
  }
  console.log();
}

// 5. Run the examples

async function main(): Promise<void> {
  console.log('### jsondescent basic Node example ###');
  console.log();

  runBasicDecode();
  runLimits();
  runWithCliDocument();
  await runMiddleware();
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exitCode = 1;
});
