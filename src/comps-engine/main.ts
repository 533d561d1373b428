#!/usr/bin/env npx tsx
// ═══════════════════════════════════════════════════════════════════════
//  Comparable Sales Engine: CLI
//  Six-stage adjustment grid, validation, reconciliation, sensitivity.
// ═══════════════════════════════════════════════════════════════════════

import { config as loadEnv } from 'dotenv';
loadEnv();

import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { basename, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import chalk from 'chalk';
import { hasFlag, getFlagValue, getVerboseFlag } from '../cli/argv';
import { toSnakeKeys } from './case-keys';
import { runValuation } from './engine';
import { createConsoleLogger } from './logger';
import type { ComparableResult, ValuationResult } from './types';

// ── CLI Flags ───────────────────────────────────────────────────────

function parseCliArgs() {
  return {
    verbose: getVerboseFlag(process.argv),
    write: hasFlag(process.argv, '--write'),
    json: hasFlag(process.argv, '--json'),
    sensitivity: hasFlag(process.argv, '--sensitivity'),
    input: getFlagValue(process.argv, '--input') ?? process.env.COMPS_INPUT_FILE ?? null,
  };
}

// ── Formatting ──────────────────────────────────────────────────────

export const dollar = (n: number) =>
  (n < 0 ? '-$' : '$') + Math.abs(n).toLocaleString('en-US', { minimumFractionDigits: 0, maximumFractionDigits: 0 });
export const pct = (n: number) => (n > 0 ? '+' : '') + n.toFixed(2) + '%';
const div = (c = '─', len = 72) => c.repeat(len);
function row(label: string, value: string, w = 44) {
  return `  ${label}${' '.repeat(Math.max(1, w - label.length))}${value}`;
}

function comparableSection(r: ComparableResult): string[] {
  const out: string[] = [];
  out.push('');
  out.push(`  Comparable #${r.index + 1}: ${r.comparable.address}`);
  out.push('  ' + div('─', 70));
  out.push(row('  Sale Price', dollar(r.comparable.salePrice)));
  for (const stage of r.stages) {
    const net = stage.priceAfter - stage.priceBefore;
    out.push(row(`  ${stage.stage}. ${stage.name}`, `${dollar(stage.priceAfter)}  (${net >= 0 ? '+' : ''}${dollar(net)})`));
    for (const rec of stage.records) {
      if (rec.amount === 0 && rec.status === 'applied') continue;
      out.push(`        ${rec.explanation}`);
    }
  }
  out.push(row('  Final Adjusted Price', dollar(r.finalAdjustedPrice)));
  out.push(row('  Gross / Net Adjustment', `${r.grossAdjustmentPct.toFixed(2)}% / ${pct(r.netAdjustmentPct)}`));
  out.push(row('  Status (weight)', `${r.validation.status} (${r.validation.weight.toFixed(1)})`));
  out.push(`        ${r.validation.recommendation}`);
  for (const w of r.validation.warnings) out.push(`        WARNING: ${w}`);
  if (r.incompleteCharacteristics.length > 0) {
    out.push(`        Incomplete: ${r.incompleteCharacteristics.join(', ')}`);
  }
  return out;
}

const IDENTIFIER_FIELDS: ReadonlySet<string> = new Set(['rateKey']);

/** snake_case JSON, rate keys included. */
export function toJsonReport(result: ValuationResult): string {
  return JSON.stringify(toSnakeKeys(result, IDENTIFIER_FIELDS), null, 2);
}

/** Plain-text report lines for a valuation result. */
export function formatReport(result: ValuationResult): string[] {
  const out: string[] = [];
  const { subject, reconciliation: rec } = result;

  out.push(div('═'));
  out.push('  COMPARABLE SALES ADJUSTMENT ENGINE');
  out.push(div('═'));
  out.push(row('  Subject', subject.address));
  out.push(row('  Property Type', subject.propertyType));
  out.push(row('  Valuation Date', result.marketParameters.valuationDate));

  const defaulted = Object.entries(result.factorSources)
    .filter(([, src]) => src === 'industry_default')
    .map(([key]) => key);
  if (defaulted.length > 0) {
    out.push(row('  Industry-Default Factors', String(defaulted.length)));
  }

  out.push('');
  out.push(div('═'));
  out.push('  SECTION A: ADJUSTMENT GRID');
  out.push(div('═'));
  for (const r of result.comparables) out.push(...comparableSection(r));

  if (result.exclusions.length > 0) {
    out.push('');
    out.push('  Excluded Comparables:');
    for (const ex of result.exclusions) {
      out.push(`    #${ex.index + 1} ${ex.address}: ${ex.errorName}: ${ex.reason}`);
    }
  }

  out.push('');
  out.push(div('═'));
  out.push('  SECTION B: RECONCILIATION');
  out.push(div('═'));
  out.push('');
  out.push(row('  Included Comparables', `${rec.included.length} (total weight ${rec.totalWeight.toFixed(1)})`));
  out.push(row('  Reconciled Value', dollar(rec.reconciledValue)));
  out.push(row('  Value Range', `${dollar(rec.valueRange.low)} – ${dollar(rec.valueRange.high)} (${rec.valueRange.spreadPct.toFixed(1)}%)`));
  out.push(row('  Mean / Median', `${dollar(rec.statistics.mean)} / ${dollar(rec.statistics.median)}`));
  out.push(row('  Std Dev (CV)', `${dollar(rec.statistics.stdev)} (${rec.statistics.coefficientOfVariation.toFixed(1)}%)`));
  out.push(row('  Q1 / Q3', `${dollar(rec.statistics.q1)} / ${dollar(rec.statistics.q3)}`));

  if (result.sensitivity) {
    out.push('');
    out.push(div('═'));
    out.push('  SECTION C: SENSITIVITY (±10% on material rates)');
    out.push(div('═'));
    out.push('');
    if (result.sensitivity.length === 0) {
      out.push(row('  Material Adjustments', 'None'));
    }
    for (const s of result.sensitivity) {
      const fmt = (v: number | null, c: number | null) =>
        v === null || c === null ? 'n/a' : `${dollar(v)} (${pct(c)})`;
      out.push(row(`  ${s.characteristic}`, `${fmt(s.low.reconciledValue, s.low.changePct)}  |  ${fmt(s.high.reconciledValue, s.high.changePct)}`));
    }
  }

  out.push('');
  out.push(div('═'));
  return out;
}

// ── Main (CLI) ──────────────────────────────────────────────────────

async function main() {
  const args = parseCliArgs();
  const logger = createConsoleLogger('comps', { verbose: args.verbose });

  if (!args.input) {
    logger.error('No input file. Pass --input <file> or set COMPS_INPUT_FILE.');
    process.exit(1);
  }

  const inputPath = resolve(args.input);
  logger.debug(`Reading ${inputPath}`);
  const raw: unknown = JSON.parse(await readFile(inputPath, 'utf-8'));

  const result = runValuation(raw, { sensitivity: args.sensitivity, logger });

  if (args.json) {
    const json = toJsonReport(result);
    console.log(json);
    if (args.write) await writeReport(inputPath, json, 'json');
    return;
  }

  for (const line of formatReport(result)) logger.line(line);

  if (args.write) await writeReport(inputPath, logger.lines.join('\n'), 'txt');
}

async function writeReport(inputPath: string, content: string, ext: 'txt' | 'json') {
  const dir = process.env.COMPS_REPORT_DIR ?? './reports';
  const dateStr = new Date().toISOString().slice(0, 10);
  const slug = basename(inputPath).replace(/\.json$/i, '');
  const file = join(dir, `${slug}-${dateStr}.${ext}`);
  await mkdir(dir, { recursive: true });
  await writeFile(file, content, 'utf-8');
  console.log(`  Report written to ${file}`);
}

// Only run CLI when executed directly (not when imported as a module)
const thisFile = fileURLToPath(import.meta.url);
const entryFile = resolve(process.argv[1] ?? '');
if (thisFile === entryFile) {
  main().catch((err: unknown) => {
    const message = err instanceof Error ? `${err.name}: ${err.message}` : String(err);
    console.error(chalk.red(`Fatal error: ${message}`));
    process.exit(1);
  });
}
