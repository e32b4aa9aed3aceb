import * as peggy from 'peggy';
import { InvalidSchemaError } from '../errors';
import { LAYOUT_GRAMMAR } from './grammar';
import type { LayoutModule } from './types';

let cachedParser: peggy.Parser | null = null;

function getParser(): peggy.Parser {
  if (!cachedParser) {
    cachedParser = peggy.generate(LAYOUT_GRAMMAR);
  }
  return cachedParser;
}

function describeLocation(err: Error): string {
  if (!('location' in err)) return '';
  const { location } = err;
  if (typeof location !== 'object' || location === null || !('start' in location)) return '';
  const { start } = location;
  if (typeof start !== 'object' || start === null || !('line' in start) || !('column' in start)) return '';
  return ` at line ${String(start.line)}, column ${String(start.column)}`;
}

/**
 * Parse layout source text into an AST.
 *
 * @throws InvalidSchemaError if the text is not valid layout notation
 */
export function parseLayoutModule(input: string): LayoutModule {
  const parser = getParser();
  try {
    const module: LayoutModule = parser.parse(input);
    return module;
  } catch (err) {
    if (err instanceof Error && err.name === 'SyntaxError') {
      throw new InvalidSchemaError(`Layout syntax error${describeLocation(err)}: ${err.message}`);
    }
    throw err;
  }
}
