import path from 'path';
import { describe, expect, it } from 'vitest';
import { getDefaultConfigTables } from '../src/config/codegen-config';
import { OutputPathError, resolveOutputDir } from '../src/routes/codegen';
import { buildPreview, renderControllerFiles, toConditionMap } from '../src/services/codeGenerationService';
import { activation, FILL_INTERLOCK, GENERATED_AT, MIXER_ACTIVATIONS } from './fixtures';

const tables = getDefaultConfigTables();

describe('toConditionMap', () => {
  it('keys conditions by numeric step and suffixed tag', () => {
    const map = toConditionMap({ '1': { 'V101.activate': FILL_INTERLOCK }, step: { 'V9.activate': FILL_INTERLOCK } });

    expect([...map.keys()]).toEqual([1]);
    expect(map.get(1)?.get('V101.activate')).toBe(FILL_INTERLOCK);
  });

  it('is empty without input', () => {
    expect(toConditionMap(undefined).size).toBe(0);
  });
});

describe('renderControllerFiles', () => {
  it('renders the Rockwell files only', () => {
    const files = renderControllerFiles(MIXER_ACTIVATIONS, tables, 'rockwell', undefined, { generatedAt: GENERATED_AT });
    expect(files.map(f => f.filename)).toEqual(['rockwell_ladder.txt', 'rockwell_ladder.L5X']);
  });

  it('renders the Siemens file only', () => {
    const files = renderControllerFiles(MIXER_ACTIVATIONS, tables, 'siemens', undefined, { generatedAt: GENERATED_AT });
    expect(files.map(f => f.filename)).toEqual(['siemens_scl.txt']);
    expect(files[0].content.startsWith('(* ')).toBe(true);
  });
});

describe('buildPreview', () => {
  it('leaves out steps without emitted activations', () => {
    const preview = buildPreview([activation(0, 'Idle', null), activation(1, 'Fill', 'DO101', 7, 3)], tables);
    expect(preview).toEqual({ steps: [], total_steps: 0, total_activations: 0 });
  });

  it('names unknown codes with an empty string', () => {
    const preview = buildPreview([activation(1, 'Fill', 'X100', 42, 9)], tables);
    expect(preview.steps[0].activations[0]).toEqual({
      tag_name: 'X100',
      tag_with_suffix: 'X100',
      i_type: 42,
      pid_type: 9,
      device_type: '',
      pid_type_name: ''
    });
  });
});

describe('resolveOutputDir', () => {
  const root = path.resolve('output');

  it('resolves inside the output root', () => {
    expect(resolveOutputDir('output')).toBe(root);
    expect(resolveOutputDir('output', 'batch/7')).toBe(path.join(root, 'batch', '7'));
  });

  it('accepts a sub-directory whose name starts with two dots', () => {
    expect(resolveOutputDir('output', '..cache')).toBe(path.join(root, '..cache'));
  });

  it('rejects paths that leave the output root', () => {
    expect(() => resolveOutputDir('output', '../etc')).toThrow(OutputPathError);
    expect(() => resolveOutputDir('output', '/tmp')).toThrow(OutputPathError);
  });
});
