// stepGrouper.ts
// Partitions activation rows by step and resolves which of them are emitted

import { Activation, ConfigTables, ResolvedActivation, StepGroup } from '../types';
import { resolveActivationRule } from './activationRules';

/**
 * Groups rows by step number. Every step seen in the input gets a group, even
 * when all of its rows are tag-less placeholders. Groups come back in
 * ascending step order; activations keep their input order.
 */
export function groupActivationsByStep(activations: readonly Activation[]): StepGroup[] {
  const steps = new Map<number, { stepName: string; activations: Activation[] }>();

  for (const act of activations) {
    let step = steps.get(act.stepIndex);
    if (!step) {
      step = { stepName: act.stepName, activations: [] };
      steps.set(act.stepIndex, step);
    }
    if (act.tag !== null && act.tag !== '') {
      step.activations.push(act);
    }
  }

  return [...steps.entries()]
    .sort(([a], [b]) => a - b)
    .map(([stepIndex, step]) => Object.freeze({
      stepIndex,
      stepName: step.stepName,
      activations: Object.freeze(step.activations)
    }));
}

export function resolveStepActivations(step: StepGroup, tables: ConfigTables): ResolvedActivation[] {
  const resolved: ResolvedActivation[] = [];
  for (const activation of step.activations) {
    const rule = resolveActivationRule(activation.deviceClassCode, activation.qualifierCode, tables);
    if (rule.kind === 'skip') continue;
    resolved.push({
      activation,
      suffix: rule.suffix,
      tagWithSuffix: `${activation.tag ?? ''}${rule.suffix}`
    });
  }
  return resolved;
}

/** One line per step banner plus one per emitted activation */
export function countEmittedLines(steps: readonly StepGroup[], tables: ConfigTables): number {
  return steps.reduce((total, step) => total + 1 + resolveStepActivations(step, tables).length, 0);
}
