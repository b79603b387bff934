/**
 * Debug script for the formula → table pipeline
 * Usage: npx tsx scripts/table-debug.ts "drug ~ age + weight"
 *
 * Each block holds the term pair and its position, so the layout can be
 * checked by eye.
 */

import { parseFormula, printFormula } from '../packages/parser/index.js';
import { compileTable, printTable, type CellEmitter } from '../packages/compiler/index.js';
import { renderTableToHTML } from '../packages/renderer/index.js';

const emitPair: CellEmitter = (builder, row, col) =>
  builder
    .addCol([`${printFormula(row)} | ${printFormula(col)}`], { subrow: builder.nrow, subcol: builder.ncol })
    .newLine()
    .cursorRight(builder.ncol - 1)
    .addCol([`@(${builder.nrow},${builder.ncol})`]);

function debugFormula(source: string): void {
  console.log('='.repeat(70));
  console.log(`Formula: ${source}`);
  console.log('='.repeat(70));

  try {
    const formula = parseFormula(source, { requireTwoSided: true });
    console.log(`\nParsed: ${printFormula(formula)}`);

    const { table } = compileTable(formula, emitPair);
    console.log('\n--- Table ---');
    console.log(printTable(table));

    console.log('\n--- HTML Output ---');
    console.log(renderTableToHTML(table));
  } catch (error) {
    console.error(`\nFailed: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  }
}

const inputs = process.argv.slice(2);
for (const source of inputs.length > 0 ? inputs : ['placebo + drug ~ age + sex * weight']) {
  debugFormula(source);
}
