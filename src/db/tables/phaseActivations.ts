// Queries over phase_instances / phase_steps / phase_activations
// Table creation is handled by Knex migrations

import type { Knex } from 'knex';
import { Activation, PhaseInstance } from '../../types';

export interface PhaseActivationRow {
  index_no: number;
  step_name: string;
  pid_type: number | null;
  type: number | null;
  tag_name: string | null;
}

/**
 * Source of activation rows for the code generators
 */
export interface ActivationSource {
  /** Every step of the instance's class, with or without activations, ordered by step */
  fetchActivations(phaseInstanceId?: number): Promise<Activation[]>;
  listPhaseInstances(): Promise<PhaseInstance[]>;
}

export function mapActivationRow(row: PhaseActivationRow): Activation {
  return {
    stepIndex: Number(row.index_no),
    stepName: row.step_name ?? '',
    qualifierCode: row.pid_type ? Number(row.pid_type) : 0,
    deviceClassCode: row.type ? Number(row.type) : 0,
    tag: row.tag_name ?? null
  };
}

export class PhaseActivationsTable implements ActivationSource {
  constructor(private readonly db: Knex) {}

  async fetchActivations(phaseInstanceId?: number): Promise<Activation[]> {
    const rows: PhaseActivationRow[] = await this.db('phase_instances as pi')
      .join('phase_steps as ps', 'pi.class_id', 'ps.class_id')
      .leftJoin('phase_activations as pa', (join) => {
        join.on('pa.phase_id', '=', 'pi.id').andOn('pa.step_no', '=', 'ps.index_no');
      })
      .select(
        'ps.index_no',
        'ps.name as step_name',
        'pa.pid_type',
        'pa.type',
        'pa.tag_name'
      )
      .modify((query) => {
        if (phaseInstanceId !== undefined) {
          query.where('pi.id', phaseInstanceId);
        }
      })
      .orderBy('ps.index_no')
      .orderBy('pa.step_no')
      .orderBy('pa.id');

    const activations = rows.map(mapActivationRow);
    const withTag = activations.filter(act => act.tag !== null).length;
    const filterMsg = phaseInstanceId !== undefined ? ` (phase instance ${phaseInstanceId})` : '';
    console.log(`📊 ${withTag} activations found in ${activations.length} rows${filterMsg}`);
    return activations;
  }

  async listPhaseInstances(): Promise<PhaseInstance[]> {
    const rows: { id: number; name: string }[] = await this.db('phase_instances')
      .select('id', 'name')
      .orderBy('name');

    return rows.map(row => ({ id: Number(row.id), name: row.name }));
  }
}
