#!/usr/bin/env node
/**
 * CLI tool to compile a layout file into JSON layout definitions.
 *
 * Usage:
 *   npx tsx cli/compile-layout.ts <input.layout> [output.json]
 *
 * If no output path is given, prints to stdout.
 */

import * as fs from 'fs';
import * as path from 'path';
import { isCodecError } from '../src/errors';
import { LayoutBuilder } from '../src/schema/LayoutBuilder';
import { parseLayoutModule } from '../src/parser/LayoutParser';
import { convertModuleToDefinitions } from '../src/parser/toDefinition';

function main(): void {
  const args = process.argv.slice(2);

  if (args.length < 1) {
    console.error('Usage: compile-layout <input.layout> [output.json]');
    process.exit(1);
  }

  const inputPath = path.resolve(args[0]);
  const outputPath = args[1] ? path.resolve(args[1]) : null;

  if (!fs.existsSync(inputPath)) {
    console.error(`Error: input file not found: ${inputPath}`);
    process.exit(1);
  }

  const text = fs.readFileSync(inputPath, 'utf-8');

  let json: string;
  let count: number;
  try {
    const definitions = convertModuleToDefinitions(parseLayoutModule(text));
    // Reject unresolved references and field ordering errors.
    LayoutBuilder.buildAll(definitions);
    json = JSON.stringify(definitions, null, 2) + '\n';
    count = Object.keys(definitions).length;
  } catch (err) {
    if (!isCodecError(err)) throw err;
    console.error(`Error: ${err.message}`);
    process.exit(1);
  }

  if (outputPath) {
    fs.mkdirSync(path.dirname(outputPath), { recursive: true });
    fs.writeFileSync(outputPath, json, 'utf-8');
    console.log(`Wrote ${count} layout(s) to ${outputPath}`);
  } else {
    process.stdout.write(json);
  }
}

main();
