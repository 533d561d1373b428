// ═══════════════════════════════════════════════════════════════════════
//  Physical Characteristics: Declarative Rules
//  Each characteristic is a rule spec; one evaluator per rule kind.
//  Sign convention: positive amount ⇔ subject superior to comparable.
// ═══════════════════════════════════════════════════════════════════════

import { ValuationMath } from '../formulas';
import { UnrecognizedValueError, ValidationError } from '../errors';
import { levelOf } from '../scales';
import type { RateBook } from '../rate-book';
import type {
  AdjustmentRecord,
  CharacteristicKey,
  CharacteristicValue,
  PhysicalCategory,
  SubjectProperty,
} from '../types';
import { num, signedMoney } from '../stages/stage';

// ── Rule Specs ──────────────────────────────────────────────────────

interface RuleBase<K extends CharacteristicKey> {
  field: K;
  label: string;
}

export interface ContinuousRule<K extends CharacteristicKey = CharacteristicKey> extends RuleBase<K> {
  kind: 'continuous';
  basis: 'unit' | 'price_pct' | 'building_sf';
  unit: string;
  higherIsBetter: boolean;
  /** Differences smaller than this produce no record. */
  materialDifference?: number;
}

export interface OrdinalRule<K extends CharacteristicKey = CharacteristicKey> extends RuleBase<K> {
  kind: 'ordinal';
  basis: 'price_pct' | 'lump_sum';
  scale: readonly string[];
}

export interface BooleanRule<K extends CharacteristicKey = CharacteristicKey> extends RuleBase<K> {
  kind: 'boolean';
  basis: 'lump_sum' | 'price_pct' | 'building_sf';
  /** false for encumbrances: having the feature is worse. */
  beneficial: boolean;
}

export type RuleSpec<K extends CharacteristicKey = CharacteristicKey> =
  | ContinuousRule<K>
  | OrdinalRule<K>
  | BooleanRule<K>;

export type CharacteristicGroup = Readonly<Record<string, CharacteristicValue | undefined>>;

export interface CategoryModule {
  category: PhysicalCategory;
  rules: readonly RuleSpec[];
  groupOf(property: SubjectProperty): CharacteristicGroup | undefined;
}

export interface RuleContext {
  category: PhysicalCategory;
  /** Stage 6 input price. */
  price: number;
  /** Comparable's gross building area, the basis for per-SF rules. */
  buildingSf: number | undefined;
  rates: RateBook;
}

// ── Evaluation ──────────────────────────────────────────────────────

function record(
  rule: RuleSpec,
  ctx: RuleContext,
  subjectValue: CharacteristicValue | undefined,
  comparableValue: CharacteristicValue | undefined,
  amount: number,
  explanation: string,
  status: AdjustmentRecord['status'] = 'applied',
): AdjustmentRecord {
  return {
    stage: 6,
    category: ctx.category,
    characteristic: rule.label,
    rateKey: rule.field,
    subjectValue: subjectValue ?? null,
    comparableValue: comparableValue ?? null,
    amount,
    explanation,
    status,
  };
}

function incomplete(
  rule: RuleSpec,
  ctx: RuleContext,
  s: CharacteristicValue | undefined,
  c: CharacteristicValue | undefined,
  reason: string,
): AdjustmentRecord {
  return record(rule, ctx, s, c, 0, `${rule.label}: ${reason}; adjustment skipped`, 'incomplete');
}

function missingSide(s: CharacteristicValue | undefined, c: CharacteristicValue | undefined): string {
  if (s === undefined && c === undefined) return 'missing for subject and comparable';
  return s === undefined ? 'missing for subject' : 'missing for comparable';
}

function typeMismatch(rule: RuleSpec, value: CharacteristicValue, type: string): never {
  throw new ValidationError(`${rule.label} expects a ${type} (got ${JSON.stringify(value)})`, rule.field);
}

function evaluateContinuous(
  rule: ContinuousRule,
  s: number,
  c: number,
  ctx: RuleContext,
): AdjustmentRecord | null {
  const raw = s - c;
  if (raw === 0) return null;
  if (rule.materialDifference !== undefined && Math.abs(raw) < rule.materialDifference) return null;

  const diff = rule.higherIsBetter ? raw : -raw;
  const rate = ctx.rates.physical(rule.field);

  let amount: number;
  let formula: string;
  switch (rule.basis) {
    case 'unit':
      amount = diff * rate;
      formula = `${num(diff)} × $${num(rate)}${rule.unit}`;
      break;
    case 'price_pct':
      amount = ValuationMath.pctOf(ctx.price, diff * rate);
      formula = `${num(diff)} × ${num(rate)}%${rule.unit} of price`;
      break;
    case 'building_sf': {
      if (ctx.buildingSf === undefined) {
        return incomplete(rule, ctx, s, c, 'comparable building area unavailable');
      }
      amount = diff * rate * ctx.buildingSf;
      formula = `${num(diff)} × $${num(rate, 4)}${rule.unit} × ${num(ctx.buildingSf)} SF`;
      break;
    }
  }

  return record(rule, ctx, s, c, amount,
    `${rule.label}: subject ${num(s)} vs comparable ${num(c)}; ${formula} = ${signedMoney(amount)}`);
}

function evaluateOrdinal(
  rule: OrdinalRule,
  s: string,
  c: string,
  ctx: RuleContext,
): AdjustmentRecord | null {
  const sLevel = levelOf(rule.scale, s);
  if (sLevel < 0) throw new UnrecognizedValueError(rule.field, s, rule.scale);
  const cLevel = levelOf(rule.scale, c);
  if (cLevel < 0) throw new UnrecognizedValueError(rule.field, c, rule.scale);

  const diff = sLevel - cLevel;
  if (diff === 0) return null;

  const rate = ctx.rates.physical(rule.field);
  const amount = rule.basis === 'price_pct'
    ? ValuationMath.pctOf(ctx.price, diff * rate)
    : diff * rate;
  const perLevel = rule.basis === 'price_pct' ? `${num(rate)}%/level of price` : `$${num(rate)}/level`;

  return record(rule, ctx, s, c, amount,
    `${rule.label}: ${s} vs ${c} (${diff > 0 ? '+' : ''}${diff} levels × ${perLevel}) = ${signedMoney(amount)}`);
}

function evaluateBoolean(
  rule: BooleanRule,
  s: boolean,
  c: boolean,
  ctx: RuleContext,
): AdjustmentRecord | null {
  if (s === c) return null;
  const presence = Number(s) - Number(c);
  const diff = rule.beneficial ? presence : -presence;
  const rate = ctx.rates.physical(rule.field);

  let amount: number;
  switch (rule.basis) {
    case 'lump_sum':
      amount = diff * rate;
      break;
    case 'price_pct':
      amount = ValuationMath.pctOf(ctx.price, diff * rate);
      break;
    case 'building_sf': {
      if (ctx.buildingSf === undefined) {
        return incomplete(rule, ctx, s, c, 'comparable building area unavailable');
      }
      amount = diff * rate * ctx.buildingSf;
      break;
    }
  }

  const who = s ? 'subject has, comparable lacks' : 'comparable has, subject lacks';
  return record(rule, ctx, s, c, amount, `${rule.label}: ${who} = ${signedMoney(amount)}`);
}

export function evaluateRule(
  rule: RuleSpec,
  s: CharacteristicValue | undefined,
  c: CharacteristicValue | undefined,
  ctx: RuleContext,
): AdjustmentRecord | null {
  if (s === undefined || c === undefined) {
    return incomplete(rule, ctx, s, c, missingSide(s, c));
  }

  switch (rule.kind) {
    case 'continuous':
      if (typeof s !== 'number') return typeMismatch(rule, s, 'number');
      if (typeof c !== 'number') return typeMismatch(rule, c, 'number');
      return evaluateContinuous(rule, s, c, ctx);
    case 'ordinal':
      if (typeof s !== 'string') return typeMismatch(rule, s, 'string');
      if (typeof c !== 'string') return typeMismatch(rule, c, 'string');
      return evaluateOrdinal(rule, s, c, ctx);
    case 'boolean':
      if (typeof s !== 'boolean') return typeMismatch(rule, s, 'boolean');
      if (typeof c !== 'boolean') return typeMismatch(rule, c, 'boolean');
      return evaluateBoolean(rule, s, c, ctx);
  }
}

const NO_VALUES: CharacteristicGroup = {};

/** Runs every rule of one category; differing and incomplete characteristics produce records. */
export function evaluateCategory(
  categoryModule: CategoryModule,
  subject: SubjectProperty,
  comparable: SubjectProperty,
  ctx: Omit<RuleContext, 'category'>,
): AdjustmentRecord[] {
  const subjectGroup = categoryModule.groupOf(subject) ?? NO_VALUES;
  const compGroup = categoryModule.groupOf(comparable) ?? NO_VALUES;
  const ruleCtx: RuleContext = { ...ctx, category: categoryModule.category };

  const records: AdjustmentRecord[] = [];
  for (const rule of categoryModule.rules) {
    const rec = evaluateRule(rule, subjectGroup[rule.field], compGroup[rule.field], ruleCtx);
    if (rec) records.push(rec);
  }
  return records;
}
