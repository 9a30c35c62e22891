// siemensCodegen.ts
// Siemens TIA Portal SCL generation: one REGION per step, assignments gated by the step flag

import { Activation, ClauseIR, ConditionMap, ConditionSpec, ConfigTables, GenerationOptions } from '../types';
import { compileCondition, lookupCondition } from './conditionCompiler';
import { groupActivationsByStep, resolveStepActivations } from './stepGrouper';
import {
  SEPARATOR_WIDTH,
  convertStepFlagToSiemens,
  formatBannerDate,
  formatStepFlagForSiemens,
  formatStepTitle
} from './vendorFormatters';

const INDENT = '    ';
const LABEL_PATTERN = /\bX\d+\b/g;

function labelNumber(label: string): number {
  const n = parseInt(label.slice(1), 10);
  return Number.isNaN(n) ? -1 : n;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export interface SclCondition {
  expression: string;
  unresolvedLabels: string[];
}

/**
 * Substitutes every label of the expression with its SCL operand. Labels match
 * whole words only and are tried from the highest number down (X10 before X1)
 * in a single pass, so a shorter label never matches inside a longer one, a
 * keyword, or an operand already substituted. AND / OR / NOT and parentheses are left as written.
 */
export function renderSclCondition(spec: ConditionSpec): SclCondition {
  const operands = new Map<string, string>();
  for (const literal of spec.literals) {
    const tag = convertStepFlagToSiemens(literal.tag);
    operands.set(literal.label, literal.negated ? `NOT ${tag}` : tag);
  }

  const labels = [...operands.keys()]
    .filter(label => label.length > 0)
    .sort((a, b) => labelNumber(b) - labelNumber(a) || b.length - a.length);

  const unresolvedLabels = (spec.expression.match(LABEL_PATTERN) ?? []).filter(label => !operands.has(label));

  if (labels.length === 0) {
    return { expression: 'TRUE', unresolvedLabels };
  }

  const pattern = new RegExp(`\\b(?:${labels.map(escapeRegExp).join('|')})\\b`, 'g');
  return {
    expression: spec.expression.replace(pattern, label => operands.get(label) ?? label),
    unresolvedLabels
  };
}

/**
 * Renders a compiled clause list. Used instead of the written expression when
 * it refers to undefined labels.
 */
export function renderSclClause(ir: ClauseIR): string {
  const conjunctions = ir.disjuncts.map(literals =>
    literals.map(l => `${l.negated ? 'NOT ' : ''}${convertStepFlagToSiemens(l.tag)}`)
  );
  if (conjunctions.length === 1) return conjunctions[0].join(' AND ');
  return conjunctions
    .map(terms => (terms.length > 1 ? `(${terms.join(' AND ')})` : terms[0]))
    .join(' OR ');
}

/**
 * SCL listing. A step without emitted activations still gets its REGION with
 * an empty "IF <flag> THEN RETURN; END_IF;" block.
 */
export function generateScl(
  activations: readonly Activation[],
  tables: ConfigTables,
  conditions?: ConditionMap,
  options: GenerationOptions = {}
): string {
  const banner = '='.repeat(SEPARATOR_WIDTH);
  const lines: string[] = [
    `(* ${banner} *)`,
    '(* Auto-Generated SCL Code *)',
    `(* Date: ${formatBannerDate(options.generatedAt ?? new Date())} *)`,
    `(* ${banner} *)`,
    ''
  ];

  for (const step of groupActivationsByStep(activations)) {
    lines.push(`REGION ${formatStepTitle(step.stepIndex, step.stepName, '-')}`);
    lines.push(`${INDENT}IF ${formatStepFlagForSiemens(step.stepIndex)} THEN`);

    for (const resolved of resolveStepActivations(step, tables)) {
      const spec = lookupCondition(conditions, step.stepIndex, resolved.tagWithSuffix);
      let expression = 'TRUE';
      if (spec && spec.literals.length > 0) {
        const rendered = renderSclCondition(spec);
        for (const label of rendered.unresolvedLabels) {
          options.onUnresolvedLabel?.(step.stepIndex, resolved.tagWithSuffix, label);
        }
        expression = rendered.unresolvedLabels.length === 0
          ? rendered.expression
          : renderSclClause(compileCondition(spec, formatStepFlagForSiemens(step.stepIndex)).ir);
      }
      lines.push(`${INDENT}${INDENT}"${resolved.activation.tag ?? ''}"${resolved.suffix} := ${expression};`);
    }

    lines.push(`${INDENT}${INDENT}RETURN;`);
    lines.push(`${INDENT}END_IF;`);
    lines.push('END_REGION ;');
    lines.push('');
  }

  return lines.join('\n');
}
