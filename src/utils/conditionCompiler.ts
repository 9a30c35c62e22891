// conditionCompiler.ts
// Compiles the activation condition DSL into a one-level OR-of-AND clause list.
//
// Grammar: expression := conjunction (" OR " conjunction)*
//          conjunction := term (" AND " term)*
//          term := label, optionally wrapped in parentheses

import { ClauseIR, ConditionMap, ConditionSpec, LiteralRef } from '../types';

const OR_SEPARATOR = ' OR ';
const AND_SEPARATOR = ' AND ';

export interface CompiledCondition {
  ir: ClauseIR;
  unresolvedLabels: string[];
}

export function singleLiteral(tag: string, negated = false): ClauseIR {
  return { disjuncts: [[{ tag, negated }]] };
}

function stripParentheses(text: string): string {
  return text.replace(/[()]/g, '').trim();
}

function compileConjunction(
  text: string,
  lookup: Map<string, LiteralRef>,
  unresolved: string[]
): LiteralRef[] {
  const literals: LiteralRef[] = [];
  for (const term of stripParentheses(text).split(AND_SEPARATOR)) {
    const label = stripParentheses(term);
    const literal = lookup.get(label);
    if (literal) {
      literals.push(literal);
    } else {
      unresolved.push(label);
    }
  }
  return literals;
}

/**
 * Without a condition (or with no literals) the result gates on `fallbackTag`,
 * normally the step's own activity flag.
 *
 * Labels missing from the literal list are dropped from their conjunction and
 * reported. When nothing at all resolves, the fallback gate is used instead of
 * an empty, always-true condition.
 */
export function compileCondition(spec: ConditionSpec | undefined, fallbackTag: string): CompiledCondition {
  if (!spec || spec.literals.length === 0) {
    return { ir: singleLiteral(fallbackTag), unresolvedLabels: [] };
  }

  const lookup = new Map<string, LiteralRef>();
  for (const literal of spec.literals) {
    lookup.set(literal.label, { tag: literal.tag, negated: literal.negated });
  }

  const expression = spec.expression.trim();

  if (expression === 'X1' && spec.literals.length === 1) {
    const only = lookup.get('X1');
    return {
      ir: only ? { disjuncts: [[only]] } : singleLiteral(fallbackTag),
      unresolvedLabels: only ? [] : ['X1']
    };
  }

  const unresolvedLabels: string[] = [];
  const parts = expression.includes(OR_SEPARATOR) ? expression.split(OR_SEPARATOR) : [expression];
  // Branches left without literals are dropped
  const disjuncts = parts
    .map(part => compileConjunction(part, lookup, unresolvedLabels))
    .filter(literals => literals.length > 0);

  if (disjuncts.length === 0) {
    return { ir: singleLiteral(fallbackTag), unresolvedLabels };
  }

  return { ir: { disjuncts }, unresolvedLabels };
}

export function lookupCondition(
  conditions: ConditionMap | undefined,
  stepIndex: number,
  tagWithSuffix: string
): ConditionSpec | undefined {
  return conditions?.get(stepIndex)?.get(tagWithSuffix);
}
