#!/usr/bin/env npx tsx
/**
 * relalg - compile relational algebra from the command line
 *
 * Usage:
 *   npx tsx scripts/relalg.ts "\project_{a1} alpha;" --schema schema.txt
 *   npx tsx scripts/relalg.ts --file query.txt --schema schema.txt --bag
 *   npx tsx scripts/relalg.ts --qtree "alpha \join beta;" --schema schema.txt
 *
 * Output Modes:
 *   --sql     SQL with set semantics (default)
 *   --bag     SQL with bag semantics
 *   --qtree   LaTeX qtree diagrams
 *   --ast     Printed syntax trees
 *
 * A schema file holds relation definitions, one per statement:
 *   alpha(a1, a2, a3);
 *   beta(b1, b2);
 */

import * as fs from 'fs';
import {
  createRelalg,
  isUserError,
  loadSchema,
  printSyntaxTree,
  DIALECTS,
} from '../packages/index.js';
import type { Dialect, SchemaRecord } from '../packages/index.js';

type OutputMode = 'sql' | 'bag' | 'qtree' | 'ast';

const OUTPUT_MODES: readonly OutputMode[] = ['sql', 'bag', 'qtree', 'ast'];

interface CliOptions {
  mode: OutputMode;
  source: string;
  schemaFile: string | null;
  dialect: Dialect;
}

// ============================================================
// CLI Parsing
// ============================================================

function isOutputMode(value: string): value is OutputMode {
  return OUTPUT_MODES.some(mode => mode === value);
}

function isDialect(value: string): value is Dialect {
  return DIALECTS.some(dialect => dialect === value);
}

function fail(message: string): never {
  console.error(`Error: ${message}`);
  printUsage();
  process.exit(1);
}

function parseArgs(args: string[]): CliOptions {
  let mode: OutputMode = 'sql';
  let source: string | null = null;
  let schemaFile: string | null = null;
  let dialect: Dialect = 'dependency';

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = (): string => {
      const value = args[++i];
      if (value === undefined) fail(`${arg} requires a value`);
      return value;
    };

    if (arg === '--schema') {
      schemaFile = next();
    } else if (arg === '--file') {
      source = fs.readFileSync(next(), 'utf-8');
    } else if (arg === '--dialect') {
      const value = next();
      if (!isDialect(value)) fail(`Unknown dialect: ${value}`);
      dialect = value;
    } else if (arg.startsWith('--')) {
      const value = arg.substring(2);
      if (!isOutputMode(value)) fail(`Unknown mode: ${arg}`);
      mode = value;
    } else {
      source = arg;
    }
  }

  if (source === null) fail('relational algebra source required');
  return { mode, source, schemaFile, dialect };
}

function printUsage(): void {
  console.log(`
Usage:
  npx tsx scripts/relalg.ts [--mode] [--schema FILE] [--dialect NAME] "SOURCE"
  npx tsx scripts/relalg.ts [--mode] [--schema FILE] --file SOURCE_FILE

Modes:
  --sql     SQL with set semantics (default)
  --bag     SQL with bag semantics
  --qtree   LaTeX qtree diagrams
  --ast     Printed syntax trees

Dialects: ${DIALECTS.join(', ')} (default: dependency)
`);
}

// ============================================================
// Main
// ============================================================

function main(): void {
  const options = parseArgs(process.argv.slice(2));

  try {
    const schema: SchemaRecord = options.schemaFile
      ? loadSchema(fs.readFileSync(options.schemaFile, 'utf-8'))
      : {};
    const relalg = createRelalg({ dialect: options.dialect });

    switch (options.mode) {
      case 'sql':
      case 'bag':
        for (const statement of relalg.toSql(options.source, schema, { bagSemantics: options.mode === 'bag' })) {
          console.log(`${statement};`);
        }
        break;

      case 'qtree':
        for (const tree of relalg.toQtree(options.source, schema)) {
          console.log(tree);
        }
        break;

      case 'ast':
        for (const root of relalg.toSyntaxTree(options.source, schema)) {
          console.log(printSyntaxTree(root));
        }
        break;
    }
  } catch (error) {
    if (isUserError(error)) {
      console.error(`${error.name}: ${error.message}`);
    } else {
      console.error('ERROR:', error);
    }
    process.exit(1);
  }
}

main();
