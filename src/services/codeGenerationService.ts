import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import {
  Activation,
  ConditionMap,
  ConditionSpec,
  ConfigTables,
  ControllerType,
  GenerationOptions
} from '../types';
import { ActivationSource } from '../db/tables/phaseActivations';
import { CodegenConfigStore } from '../config/codegen-config';
import { describeDeviceClass, describeQualifier } from '../utils/activationRules';
import { groupActivationsByStep, resolveStepActivations } from '../utils/stepGrouper';
import { generateL5X, generateLadderText } from '../utils/rockwellCodegen';
import { generateScl } from '../utils/siemensCodegen';

export const OUTPUT_FILES = {
  rockwellText: 'rockwell_ladder.txt',
  rockwellL5X: 'rockwell_ladder.L5X',
  siemensScl: 'siemens_scl.txt'
} as const;

export interface RenderedFile {
  filename: string;
  content: string;
}

export interface PreviewActivation {
  tag_name: string;
  tag_with_suffix: string;
  i_type: number;
  pid_type: number;
  device_type: string;
  pid_type_name: string;
}

export interface PreviewStep {
  step_no: number;
  step_name: string;
  activations: PreviewActivation[];
}

export interface PreviewResult {
  steps: PreviewStep[];
  total_steps: number;
  total_activations: number;
}

export interface GenerateRequest {
  phaseInstanceId?: number;
  controllerType: ControllerType;
  conditions?: ConditionMap;
  outputDir: string;
  options?: Omit<GenerationOptions, 'onUnresolvedLabel'>;
}

export interface GenerationResult {
  runId: string;
  activationsCount: number;
  files: string[];
  outputDir: string;
  warnings: string[];
}

/** Wire shape of activation conditions: step number (as a JSON key) → suffixed tag → condition */
export type RawConditionMap = Record<string, Record<string, ConditionSpec>>;

export function toConditionMap(raw: RawConditionMap | undefined): ConditionMap {
  const map = new Map<number, ReadonlyMap<string, ConditionSpec>>();
  for (const [stepKey, byTag] of Object.entries(raw ?? {})) {
    const stepIndex = parseInt(stepKey, 10);
    if (Number.isNaN(stepIndex)) continue;
    map.set(stepIndex, new Map(Object.entries(byTag)));
  }
  return map;
}

/**
 * Renders every file of the chosen controller family. Pure: the same inputs and
 * `generatedAt` give the same output.
 */
export function renderControllerFiles(
  activations: readonly Activation[],
  tables: ConfigTables,
  controllerType: ControllerType,
  conditions?: ConditionMap,
  options: GenerationOptions = {}
): RenderedFile[] {
  const files: RenderedFile[] = [];

  if (controllerType === 'rockwell' || controllerType === 'all') {
    files.push({ filename: OUTPUT_FILES.rockwellText, content: generateLadderText(activations, tables, conditions, options) });
    files.push({ filename: OUTPUT_FILES.rockwellL5X, content: generateL5X(activations, tables, conditions, options) });
  }

  if (controllerType === 'siemens' || controllerType === 'all') {
    files.push({ filename: OUTPUT_FILES.siemensScl, content: generateScl(activations, tables, conditions, options) });
  }

  return files;
}

export function buildPreview(activations: readonly Activation[], tables: ConfigTables): PreviewResult {
  const steps: PreviewStep[] = [];

  for (const step of groupActivationsByStep(activations)) {
    const resolved = resolveStepActivations(step, tables);
    if (resolved.length === 0) continue;

    steps.push({
      step_no: step.stepIndex,
      step_name: step.stepName,
      activations: resolved.map(({ activation, tagWithSuffix }) => ({
        tag_name: activation.tag ?? '',
        tag_with_suffix: tagWithSuffix,
        i_type: activation.deviceClassCode,
        pid_type: activation.qualifierCode,
        device_type: describeDeviceClass(activation.deviceClassCode, tables),
        pid_type_name: describeQualifier(activation.qualifierCode, tables)
      }))
    });
  }

  return {
    steps,
    total_steps: steps.length,
    total_activations: steps.reduce((sum, step) => sum + step.activations.length, 0)
  };
}

/**
 * Writes one generated file; the handle is closed on every path
 */
export async function writeOutputFile(filePath: string, content: string): Promise<void> {
  const handle = await fs.promises.open(filePath, 'w');
  try {
    await handle.writeFile(content, 'utf-8');
  } finally {
    await handle.close();
  }
}

export class CodeGenerationService {
  constructor(
    private readonly source: ActivationSource,
    private readonly configStore: CodegenConfigStore
  ) {}

  listPhaseInstances() {
    return this.source.listPhaseInstances();
  }

  async preview(phaseInstanceId: number): Promise<PreviewResult | null> {
    const activations = await this.source.fetchActivations(phaseInstanceId);
    if (activations.length === 0) return null;
    return buildPreview(activations, this.configStore.snapshot());
  }

  /**
   * Returns null when the data source has no rows for the request
   */
  async generate(request: GenerateRequest): Promise<GenerationResult | null> {
    const runId = uuidv4();
    const tables = this.configStore.snapshot();

    const activations = await this.source.fetchActivations(request.phaseInstanceId);
    if (activations.length === 0) {
      console.log(`⚠️ [${runId}] No activations found`);
      return null;
    }

    const warnings = new Set<string>();
    const files = renderControllerFiles(activations, tables, request.controllerType, request.conditions, {
      ...request.options,
      onUnresolvedLabel: (stepIndex, tagWithSuffix, label) => {
        warnings.add(`Step ${stepIndex}, ${tagWithSuffix}: condition label ${label} is not defined`);
      }
    });

    await fs.promises.mkdir(request.outputDir, { recursive: true });

    const written: string[] = [];
    for (const file of files) {
      const filePath = path.join(request.outputDir, file.filename);
      await writeOutputFile(filePath, file.content);
      written.push(filePath);
      console.log(`✅ [${runId}] Saved ${filePath}`);
    }

    for (const warning of warnings) {
      console.warn(`⚠️ [${runId}] ${warning}`);
    }

    return {
      runId,
      activationsCount: activations.length,
      files: written,
      outputDir: path.resolve(request.outputDir),
      warnings: [...warnings]
    };
  }
}
