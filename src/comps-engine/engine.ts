// ═══════════════════════════════════════════════════════════════════════
//  Comparable Sales Engine: Orchestrator
//  parse → resolve market parameters → evaluate each comparable →
//  reconcile → (optional) sensitivity
// ═══════════════════════════════════════════════════════════════════════

import { MAX_RECOMMENDED_COMPARABLES, MIN_COMPARABLES } from './config';
import { toCamelKeys } from './case-keys';
import {
  ConfigurationError,
  InsufficientDataError,
  ValidationError,
  isComparableLevelError,
} from './errors';
import { evaluateComparable } from './evaluator';
import { resolveMarketParameters, type IndustryDefaults } from './industry-defaults';
import {
  MarketParametersInputSchema,
  ValuationInputSchema,
  addressOf,
  parseComparable,
  parseSubject,
  parseWith,
} from './input-schema';
import { silentLogger, type Logger } from './logger';
import { RateBook } from './rate-book';
import { reconcile } from './reconciler';
import { analyzeSensitivity } from './sensitivity';
import type {
  ComparableExclusion,
  ComparableResult,
  ComparableSale,
  SubjectProperty,
  ValuationResult,
} from './types';

export interface EngineOptions {
  sensitivity?: boolean;
  logger?: Logger;
  /** Overrides data/industry-defaults.json. */
  industryDefaults?: IndustryDefaults;
}

interface ParsedComparable {
  index: number;
  comparable: ComparableSale;
}

export interface EvaluationBatch {
  results: ComparableResult[];
  exclusions: ComparableExclusion[];
}

function exclusion(index: number, address: string, err: Error): ComparableExclusion {
  return { index, address, errorName: err.name, reason: err.message };
}

/** Evaluates every parsed comparable; comparable-level errors become exclusions. */
export function evaluateAll(
  subject: SubjectProperty,
  comparables: readonly ParsedComparable[],
  rates: RateBook,
): EvaluationBatch {
  const results: ComparableResult[] = [];
  const exclusions: ComparableExclusion[] = [];

  for (const { index, comparable } of comparables) {
    try {
      results.push(evaluateComparable(subject, comparable, index, rates));
    } catch (err) {
      if (!isComparableLevelError(err)) throw err;
      exclusions.push(exclusion(index, comparable.address, err));
    }
  }
  return { results, exclusions };
}

export function runValuation(rawInput: unknown, options: EngineOptions = {}): ValuationResult {
  const log = options.logger ?? silentLogger;
  const input = parseWith(ValuationInputSchema, toCamelKeys(rawInput), 'input');

  if (input.comparableSales.length < MIN_COMPARABLES) {
    throw new ValidationError(
      `At least ${MIN_COMPARABLES} comparable sales are required (got ${input.comparableSales.length})`,
      'comparableSales',
    );
  }
  if (input.comparableSales.length > MAX_RECOMMENDED_COMPARABLES) {
    log.warn(
      `${input.comparableSales.length} comparables supplied; ` +
      `${MIN_COMPARABLES}-${MAX_RECOMMENDED_COMPARABLES} is the recommended range`,
    );
  }

  const subject = parseSubject(input.subjectProperty);

  const market = MarketParametersInputSchema.safeParse(input.marketParameters);
  if (!market.success) {
    throw new ConfigurationError(`Invalid market_parameters: ${market.error.issues.map(i => i.message).join('; ')}`);
  }
  const { params, factorSources } = resolveMarketParameters(market.data, subject.propertyType, options.industryDefaults);
  const defaulted = Object.entries(factorSources).filter(([, src]) => src === 'industry_default').length;
  log.debug(`${defaulted} of ${Object.keys(factorSources).length} factors taken from industry defaults`);

  const rates = new RateBook(params);
  const parsed: ParsedComparable[] = [];
  const parseExclusions: ComparableExclusion[] = [];

  input.comparableSales.forEach((raw, index) => {
    try {
      parsed.push({ index, comparable: parseComparable(raw, index) });
    } catch (err) {
      if (!isComparableLevelError(err)) throw err;
      parseExclusions.push(exclusion(index, addressOf(raw), err));
    }
  });

  const batch = evaluateAll(subject, parsed, rates);
  const exclusions = [...parseExclusions, ...batch.exclusions].sort((a, b) => a.index - b.index);
  for (const ex of exclusions) {
    log.warn(`Comparable #${ex.index + 1} (${ex.address}) excluded: ${ex.errorName}: ${ex.reason}`);
  }
  for (const r of batch.results) {
    log.debug(
      `Comparable #${r.index + 1}: gross ${r.grossAdjustmentPct.toFixed(2)}%, ` +
      `net ${r.netAdjustmentPct.toFixed(2)}% → ${r.validation.status} (${r.validation.weight})`,
    );
  }

  const reconciliation = reconcile(batch.results);
  log.info(
    `Reconciled ${reconciliation.included.length} of ${input.comparableSales.length} comparables ` +
    `→ ${reconciliation.reconciledValue.toFixed(0)}`,
  );

  const result: ValuationResult = {
    subject,
    marketParameters: params,
    comparables: batch.results,
    exclusions,
    reconciliation,
    factorSources,
  };
  if (!options.sensitivity) return result;

  const sensitivity = analyzeSensitivity(batch.results, reconciliation.reconciledValue, rates, perturbed => {
    try {
      return reconcile(evaluateAll(subject, parsed, perturbed).results).reconciledValue;
    } catch (err) {
      if (err instanceof InsufficientDataError) return null;
      throw err;
    }
  });
  log.debug(`Sensitivity: ${sensitivity.length} material rate keys perturbed`);

  return { ...result, sensitivity };
}
