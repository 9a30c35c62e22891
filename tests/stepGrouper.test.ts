import { describe, it, expect } from 'vitest';
import { countEmittedLines, groupActivationsByStep, resolveStepActivations } from '../src/utils/stepGrouper';
import { getDefaultConfigTables } from '../src/config/codegen-config';
import { activation, MIXER_ACTIVATIONS } from './fixtures';

const tables = getDefaultConfigTables();

describe('groupActivationsByStep', () => {
  it('orders steps ascending and keeps activation order within a step', () => {
    const steps = groupActivationsByStep(MIXER_ACTIVATIONS);
    expect(steps.map(s => s.stepIndex)).toEqual([0, 1, 2]);
    expect(steps.map(s => s.stepName)).toEqual(['Idle', 'Fill', 'Transfer']);
    expect(steps[1].activations.map(a => a.tag)).toEqual(['V101', 'PIC101', 'DO101']);
    expect(steps[2].activations.map(a => a.tag)).toEqual(['V201', 'FQ201', 'V202']);
  });

  it('keeps steps whose rows carry no tag', () => {
    const steps = groupActivationsByStep([activation(4, 'Hold', null), activation(4, 'Hold', '')]);
    expect(steps).toHaveLength(1);
    expect(steps[0].activations).toEqual([]);
  });

  it('returns frozen groups', () => {
    const [step] = groupActivationsByStep([activation(1, 'Fill', 'V101')]);
    expect(Object.isFrozen(step)).toBe(true);
    expect(Object.isFrozen(step.activations)).toBe(true);
  });
});

describe('resolveStepActivations', () => {
  it('drops skipped activations and appends suffixes', () => {
    const steps = groupActivationsByStep(MIXER_ACTIVATIONS);
    expect(resolveStepActivations(steps[1], tables).map(r => r.tagWithSuffix)).toEqual([
      'V101.activate',
      'PIC101.fixedoutput'
    ]);
    expect(resolveStepActivations(steps[2], tables).map(r => r.tagWithSuffix)).toEqual([
      'V201.activate',
      'FQ201.ResetTotalizer'
    ]);
  });
});

describe('countEmittedLines', () => {
  it('counts one banner per step plus each emitted activation', () => {
    expect(countEmittedLines(groupActivationsByStep(MIXER_ACTIVATIONS), tables)).toBe(3 + 4);
  });

  it('is zero for no input', () => {
    expect(countEmittedLines([], tables)).toBe(0);
  });
});
