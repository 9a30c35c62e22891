import { Activation, ConditionMap, ConditionSpec } from '../src/types';

// Sunday, 18 Oct 2026 09:05:07 local time
export const GENERATED_AT = new Date(2026, 9, 18, 9, 5, 7);

export function activation(
  stepIndex: number,
  stepName: string,
  tag: string | null,
  deviceClassCode = 0,
  qualifierCode = 0
): Activation {
  return { stepIndex, stepName, tag, deviceClassCode, qualifierCode };
}

/**
 * Step 0 has no activations, one activation in each of steps 1 and 2 is skipped.
 * Rows are deliberately out of step order.
 */
export const MIXER_ACTIVATIONS: Activation[] = [
  activation(2, 'Transfer', 'V201', 0, 0),
  activation(0, 'Idle', null),
  activation(1, 'Fill', 'V101', 0, 0),
  activation(1, 'Fill', 'PIC101', 8, 4),
  activation(1, 'Fill', 'DO101', 7, 3),
  activation(2, 'Transfer', 'FQ201', 14, 2),
  activation(2, 'Transfer', 'V202', 1, 2),
];

export function conditionMap(entries: [number, string, ConditionSpec][]): ConditionMap {
  const map = new Map<number, Map<string, ConditionSpec>>();
  for (const [stepIndex, tag, spec] of entries) {
    const byTag = map.get(stepIndex) ?? new Map<string, ConditionSpec>();
    byTag.set(tag, spec);
    map.set(stepIndex, byTag);
  }
  return map;
}

export const FILL_INTERLOCK: ConditionSpec = {
  expression: '(X1 AND X2) OR X3',
  literals: [
    { label: 'X1', tag: 'StepFlag[1].Flag', negated: false },
    { label: 'X2', tag: 'LSH101', negated: true },
    { label: 'X3', tag: 'HS101', negated: false },
  ],
};
