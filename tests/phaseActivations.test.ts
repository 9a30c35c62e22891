import knex, { Knex } from 'knex';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import config from '../knexfile';
import { up } from '../knex-migrations/001_create_phase_tables';
import { PhaseActivationsTable, mapActivationRow } from '../src/db/tables/phaseActivations';
import { DatabaseManager } from '../src/db/database-manager';

async function seed(db: Knex): Promise<void> {
  await db('phase_instances').insert([
    { id: 1, class_id: 10, name: 'Mixer' },
    { id: 2, class_id: 20, name: 'Dosing' },
    { id: 3, class_id: 30, name: 'Empty Unit' }
  ]);
  await db('phase_steps').insert([
    { class_id: 10, index_no: 2, name: 'Transfer' },
    { class_id: 10, index_no: 0, name: 'Idle' },
    { class_id: 10, index_no: 1, name: 'Fill' },
    { class_id: 20, index_no: 0, name: 'Idle' },
    { class_id: 20, index_no: 1, name: 'Dose' }
  ]);
  await db('phase_activations').insert([
    { id: 1, phase_id: 1, step_no: 2, type: 14, pid_type: 2, tag_name: 'FQ201' },
    { id: 2, phase_id: 1, step_no: 1, type: 0, pid_type: 0, tag_name: 'V101' },
    { id: 3, phase_id: 1, step_no: 1, type: 8, pid_type: 4, tag_name: 'PIC101' },
    { id: 4, phase_id: 2, step_no: 1, type: 13, pid_type: null, tag_name: 'P201' }
  ]);
}

describe('PhaseActivationsTable', () => {
  let db: Knex;
  let table: PhaseActivationsTable;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    db = knex(config.test);
    await up(db);
    await seed(db);
    table = new PhaseActivationsTable(db);
  });

  afterEach(async () => {
    await db.destroy();
    vi.restoreAllMocks();
  });

  it('returns every step of the instance class in step order', async () => {
    const activations = await table.fetchActivations(1);

    expect(activations).toEqual([
      { stepIndex: 0, stepName: 'Idle', qualifierCode: 0, deviceClassCode: 0, tag: null },
      { stepIndex: 1, stepName: 'Fill', qualifierCode: 0, deviceClassCode: 0, tag: 'V101' },
      { stepIndex: 1, stepName: 'Fill', qualifierCode: 4, deviceClassCode: 8, tag: 'PIC101' },
      { stepIndex: 2, stepName: 'Transfer', qualifierCode: 2, deviceClassCode: 14, tag: 'FQ201' }
    ]);
  });

  it('reads a missing PID type as zero', async () => {
    const activations = await table.fetchActivations(2);
    expect(activations.map(a => [a.stepIndex, a.tag, a.deviceClassCode, a.qualifierCode])).toEqual([
      [0, null, 0, 0],
      [1, 'P201', 13, 0]
    ]);
  });

  it('reads every instance without a filter', async () => {
    const activations = await table.fetchActivations();

    expect(activations).toHaveLength(6);
    expect(activations.map(a => a.stepIndex)).toEqual([0, 0, 1, 1, 1, 2]);
    expect(activations.map(a => a.tag).filter(tag => tag !== null).sort()).toEqual(['FQ201', 'P201', 'PIC101', 'V101']);
  });

  it('returns no rows for an unknown instance or a class without steps', async () => {
    expect(await table.fetchActivations(99)).toEqual([]);
    expect(await table.fetchActivations(3)).toEqual([]);
  });

  it('lists phase instances by name', async () => {
    expect(await table.listPhaseInstances()).toEqual([
      { id: 2, name: 'Dosing' },
      { id: 3, name: 'Empty Unit' },
      { id: 1, name: 'Mixer' }
    ]);
  });
});

describe('mapActivationRow', () => {
  it('maps null codes to zero and keeps a null tag', () => {
    expect(mapActivationRow({
      index_no: 3,
      step_name: 'Heat',
      pid_type: null,
      type: null,
      tag_name: null
    })).toEqual({ stepIndex: 3, stepName: 'Heat', qualifierCode: 0, deviceClassCode: 0, tag: null });
  });
});

describe('DatabaseManager', () => {
  it('reports a working connection', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const db = knex(config.test);
    const manager = new DatabaseManager(db);

    expect(await manager.testConnection()).toBe(true);
    await manager.closeConnection();
    vi.restoreAllMocks();
  });
});
