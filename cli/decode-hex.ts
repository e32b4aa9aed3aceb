#!/usr/bin/env node
/**
 * CLI tool to decode a hex payload with one struct of a layout file.
 *
 * Usage:
 *   npx tsx cli/decode-hex.ts <input.layout> <StructName> <hex>
 *
 * Prints the decoded value as JSON. 64-bit integers are printed as
 * decimal strings and byte fields as hex strings.
 */

import * as fs from 'fs';
import * as path from 'path';
import { bytesToHex } from '../src/ByteBuffer';
import { isCodecError } from '../src/errors';
import { compileLayouts } from '../src/parser/toDefinition';
import { LayoutCodec } from '../src/schema/LayoutCodec';
import type { Value } from '../src/values';

type JsonValue = string | number | JsonValue[] | { [key: string]: JsonValue };

function toJson(value: Value): JsonValue {
  if (typeof value === 'bigint') return value.toString();
  if (value instanceof Uint8Array) return bytesToHex(value);
  if (typeof value === 'number' || typeof value === 'string') return value;
  if (Array.isArray(value)) return value.map(toJson);
  const result: { [key: string]: JsonValue } = {};
  for (const [key, entry] of Object.entries(value)) {
    result[key] = toJson(entry);
  }
  return result;
}

function main(): void {
  const args = process.argv.slice(2);

  if (args.length < 3) {
    console.error('Usage: decode-hex <input.layout> <StructName> <hex>');
    process.exit(1);
  }

  const [layoutFile, structName, hex] = args;
  const inputPath = path.resolve(layoutFile);
  if (!fs.existsSync(inputPath)) {
    console.error(`Error: input file not found: ${inputPath}`);
    process.exit(1);
  }

  try {
    const layouts = compileLayouts(fs.readFileSync(inputPath, 'utf-8'));
    const root = layouts[structName];
    if (!root) {
      console.error(`Error: no struct '${structName}' in ${inputPath}. Known: ${Object.keys(layouts).join(', ')}`);
      process.exit(1);
    }
    const value = new LayoutCodec(root).decodeFromHex(hex);
    process.stdout.write(JSON.stringify(toJson(value), null, 2) + '\n');
  } catch (err) {
    if (isCodecError(err) || err instanceof RangeError) {
      console.error(`Error: ${err.message}`);
      process.exit(1);
    }
    throw err;
  }
}

main();
