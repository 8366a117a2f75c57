import type { ProgressRecord, RunState, RunUpdate, ToolExecution, ValidationResult } from '../orchestrator/states';
import { createProgressRecord } from '../orchestrator/data-flow';
import { isValidationEligible } from '../orchestrator/router';
import { ContextBuilder } from './context-builder';
import type { RunContext, ValidationSettings } from './types';

export const CONFIDENCE_CONSISTENT = 0.95;
export const CONFIDENCE_INCONSISTENT = 0.6;
export const CONFIDENCE_UNCHECKED = 0.7;

/** Characters of each result kept in the cross-check record */
const CROSS_CHECK_PREVIEW = 200;

interface PendingCheck {
  index: number;
  execution: ToolExecution;
  args: Record<string, unknown>;
}

/**
 * ResultValidator cross-checks calculation results by re-running the
 * calculation tool with the configured parameter swapped for its
 * complementary value. Cross-check calls are not added to the tool log.
 */
export class ResultValidator {
  constructor(private ctx: RunContext) {}

  async validate(state: Readonly<RunState>): Promise<RunUpdate> {
    const iterationCount = state.iterationCount + 1;
    const settings = this.ctx.validation;
    const validated = new Set(state.validations.map((v) => v.toolLogIndex));

    const pending: PendingCheck[] = state.toolLog.flatMap((execution, index) =>
      isValidationEligible(execution, settings.tool) && !validated.has(index) ? [{ index, execution, args: crossCheckArguments(execution, settings) }] : [],
    );

    if (!pending.length) {
      const note = createProgressRecord('validation', 'validate', 'No calculations need validation', this.ctx.now(), { validatedCount: 0 });
      return { needsValidation: false, progressLog: [note], iterationCount };
    }

    const settled = await Promise.allSettled(pending.map((check) => this.ctx.tools.invoke(settings.tool, check.args)));
    const timestamp = this.ctx.now();
    const records: ProgressRecord[] = [];

    const validations = pending.map((check, i): ValidationResult => {
      const outcome = settled[i];
      const original = check.execution.result ?? '';
      const swapped = String(check.args[settings.parameter]);
      records.push(createProgressRecord('validation', 'validate', `Cross-validating results from ${settings.tool} (${settings.parameter}=${swapped})`, timestamp, { toolLogIndex: check.index, subtaskId: check.execution.subtaskId }));

      if (!outcome || outcome.status === 'rejected') {
        const reason: unknown = outcome?.status === 'rejected' ? outcome.reason : undefined;
        const message = reason instanceof Error ? reason.message : String(reason);
        this.ctx.logger.warn('Cross-check failed', { toolLogIndex: check.index, error: message });
        return {
          isValid: true,
          confidence: CONFIDENCE_UNCHECKED,
          issues: [`Could not cross-validate: ${message}`],
          crossCheck: {},
          toolLogIndex: check.index,
        };
      }

      return compareResults(original, outcome.value, check, settings);
    });

    const average = validations.reduce((sum, v) => sum + v.confidence, 0) / validations.length;
    records.push(
      createProgressRecord('validation', 'validate', `Validated ${validations.length} calculation(s) with average confidence: ${average.toFixed(2)}`, timestamp, {
        validatedCount: validations.length,
        averageConfidence: average,
        allValid: validations.every((v) => v.isValid),
      }),
    );

    this.ctx.logger.info('Validation complete', { validated: validations.length, averageConfidence: Number(average.toFixed(2)) });

    return { validations, needsValidation: false, progressLog: records, iterationCount };
  }
}

/** The original arguments with the validation parameter replaced by its complement */
export function crossCheckArguments(execution: ToolExecution, settings: ValidationSettings): Record<string, unknown> {
  const current = execution.arguments[settings.parameter];
  const alternate = typeof current === 'string' && settings.alternates[current] !== undefined ? settings.alternates[current] : settings.defaultAlternate;
  return { ...execution.arguments, [settings.parameter]: alternate };
}

function compareResults(original: string, crossChecked: string, check: PendingCheck, settings: ValidationSettings): ValidationResult {
  const crossCheck = {
    originalParameter: check.execution.arguments[settings.parameter] ?? null,
    alternateParameter: check.args[settings.parameter],
    originalResult: ContextBuilder.truncate(original, CROSS_CHECK_PREVIEW),
    alternateResult: ContextBuilder.truncate(crossChecked, CROSS_CHECK_PREVIEW),
  };

  if (original.length > 0 && crossChecked.length > 0) {
    return { isValid: true, confidence: CONFIDENCE_CONSISTENT, issues: [], crossCheck, toolLogIndex: check.index };
  }

  const issue = original.length === 0 && crossChecked.length === 0 ? 'Original and cross-check results are both empty' : `Results inconsistent across ${settings.parameter} values`;
  return { isValid: false, confidence: CONFIDENCE_INCONSISTENT, issues: [issue], crossCheck, toolLogIndex: check.index };
}
