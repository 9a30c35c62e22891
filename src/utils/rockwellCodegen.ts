// rockwellCodegen.ts
// Rockwell Studio 5000 ladder generation: mnemonic text listing and L5X rung export
// Dependencies: xmlbuilder

import * as xmlbuilder from 'xmlbuilder';
import {
  Activation,
  ClauseIR,
  ConditionMap,
  ConfigTables,
  GenerationOptions,
  LiteralRef,
  ResolvedActivation,
  StepGroup
} from '../types';
import { compileCondition, lookupCondition } from './conditionCompiler';
import { countEmittedLines, groupActivationsByStep, resolveStepActivations } from './stepGrouper';
import {
  SEPARATOR_WIDTH,
  formatBannerDate,
  formatExportDate,
  formatStepFlagForRockwell,
  formatStepTitle
} from './vendorFormatters';

export const DEFAULT_ROUTINE_NAME = 'CM_Valve';
export const DEFAULT_PROGRAM_NAME = 'Phase01001_SEQ_DF_Master';
export const DEFAULT_CONTROLLER_NAME = 'PhaseGen_Controller';

export const STEP_FLAG_DATA_TYPE = 'PhaseControl_StepFlags';
export const STEP_FLAG_ARRAY_SIZE = 128;
// Rungs 0 and 1 belong to the routine preamble
export const FIRST_RUNG_NUMBER = 2;

const EXPORT_OPTIONS = [
  'References', 'NoRawData', 'L5KData', 'DecoratedData', 'Context', 'RoutineLabels',
  'AliasExtras', 'IOTags', 'NoStringData', 'ForceProtectedEncoding', 'AllProjDocTrans'
].join(' ');

// Bit members of PhaseControl_StepFlags, in bit order
const STEP_FLAG_MEMBERS = [
  { name: 'Flag', description: '- Equal to' },
  { name: 'FlagLE', description: '- Less than or Equal to' },
  { name: 'FlagGE', description: '- Greater than or Equal to' }
];
const STEP_FLAG_BACKING_MEMBER = 'ZZZZZZZZZZPhaseContr0';

function instruction(literal: LiteralRef): string {
  return literal.negated ? 'XIO' : 'XIC';
}

/**
 * Mnemonic form: "XIC A XIO B" for a single AND chain,
 * "BST XIC A NXB XIC B BND" when branches are OR-ed
 */
export function renderLadderMnemonic(ir: ClauseIR): string {
  const chain = (literals: LiteralRef[]) => literals.map(l => `${instruction(l)} ${l.tag}`);

  if (ir.disjuncts.length === 1) {
    return chain(ir.disjuncts[0]).join(' ');
  }

  const tokens: string[] = ['BST'];
  ir.disjuncts.forEach((literals, idx) => {
    if (idx > 0) tokens.push('NXB');
    tokens.push(...chain(literals));
  });
  tokens.push('BND');
  return tokens.join(' ');
}

/**
 * L5X neutral text form: instructions take their operand in parentheses and
 * branches become "[chain,chain]"
 */
export function renderLadderNeutral(ir: ClauseIR): string {
  const chains = ir.disjuncts.map(literals =>
    literals.map(l => `${instruction(l)}(${l.tag})`).join(' ')
  );
  return chains.length === 1 ? chains[0] : `[${chains.join(',')}]`;
}

function conditionFor(
  step: StepGroup,
  resolved: ResolvedActivation,
  conditions: ConditionMap | undefined,
  options: GenerationOptions
): ClauseIR {
  const spec = lookupCondition(conditions, step.stepIndex, resolved.tagWithSuffix);
  const { ir, unresolvedLabels } = compileCondition(spec, formatStepFlagForRockwell(step.stepIndex));
  for (const label of unresolvedLabels) {
    options.onUnresolvedLabel?.(step.stepIndex, resolved.tagWithSuffix, label);
  }
  return ir;
}

/**
 * Plain-text ladder listing, one "<condition> OTL <tag>" line per emitted activation
 */
export function generateLadderText(
  activations: readonly Activation[],
  tables: ConfigTables,
  conditions?: ConditionMap,
  options: GenerationOptions = {}
): string {
  const banner = '='.repeat(SEPARATOR_WIDTH);
  const divider = '-'.repeat(SEPARATOR_WIDTH);
  const lines: string[] = [
    banner,
    'Auto-Generated Ladder Code',
    `Date: ${formatBannerDate(options.generatedAt ?? new Date())}`,
    banner,
    ''
  ];

  for (const step of groupActivationsByStep(activations)) {
    lines.push(divider, formatStepTitle(step.stepIndex, step.stepName, '--'), divider);

    for (const resolved of resolveStepActivations(step, tables)) {
      const condition = renderLadderMnemonic(conditionFor(step, resolved, conditions, options));
      lines.push(`${condition} OTL ${resolved.tagWithSuffix}`);
    }

    lines.push('');
  }

  return lines.join('\n');
}

function appendStepFlagDataType(controller: xmlbuilder.XMLElement): void {
  const dataType = controller
    .ele('DataTypes', { Use: 'Context' })
    .ele('DataType', { Name: STEP_FLAG_DATA_TYPE, Family: 'NoFamily', Class: 'User' });

  dataType.ele('Description').ele('LocalizedDescription', { Lang: 'en-US' }).dat('Step Flags for Each Step -');

  const members = dataType.ele('Members');
  members.ele('Member', {
    Name: STEP_FLAG_BACKING_MEMBER,
    DataType: 'SINT',
    Dimension: '0',
    Radix: 'Decimal',
    Hidden: 'true',
    ExternalAccess: 'Read/Write'
  });

  STEP_FLAG_MEMBERS.forEach((member, bit) => {
    members
      .ele('Member', {
        Name: member.name,
        DataType: 'BIT',
        Dimension: '0',
        Radix: 'Decimal',
        Hidden: 'false',
        Target: STEP_FLAG_BACKING_MEMBER,
        BitNumber: String(bit),
        ExternalAccess: 'Read/Write'
      })
      .ele('Description')
      .ele('LocalizedDescription', { Lang: 'en-US' })
      .dat(member.description);
  });
}

function appendStepFlagTag(program: xmlbuilder.XMLElement, steps: readonly StepGroup[]): void {
  const tag = program.ele('Tags', { Use: 'Context' }).ele('Tag', {
    Name: 'StepFlag',
    TagType: 'Base',
    DataType: STEP_FLAG_DATA_TYPE,
    Dimensions: String(STEP_FLAG_ARRAY_SIZE),
    Constant: 'false',
    ExternalAccess: 'Read/Write',
    OpcUaAccess: 'None'
  });

  const comments = tag.ele('Comments');
  for (const step of steps) {
    comments
      .ele('Comment', { Operand: `[${step.stepIndex}]` })
      .ele('LocalizedComment', { Lang: 'en-US' })
      .dat(step.stepName);
  }

  // Step 0 is the idle step and starts active
  const l5kValues = Array.from({ length: STEP_FLAG_ARRAY_SIZE }, (_, i) => (i === 0 ? '[7]' : '[2]'));
  tag.ele('Data', { Format: 'L5K' }).dat(`[${l5kValues.join(',')}]`);

  const array = tag
    .ele('Data', { Format: 'Decorated' })
    .ele('Array', { DataType: STEP_FLAG_DATA_TYPE, Dimensions: String(STEP_FLAG_ARRAY_SIZE) });

  for (let i = 0; i < STEP_FLAG_ARRAY_SIZE; i++) {
    const initial = i === 0 ? '1' : '0';
    const structure = array.ele('Element', { Index: `[${i}]` }).ele('Structure', { DataType: STEP_FLAG_DATA_TYPE });
    structure.ele('DataValueMember', { Name: 'Flag', DataType: 'BOOL', Value: initial });
    structure.ele('DataValueMember', { Name: 'FlagLE', DataType: 'BOOL', Value: '1' });
    structure.ele('DataValueMember', { Name: 'FlagGE', DataType: 'BOOL', Value: initial });
  }
}

/**
 * generateL5X
 * Builds a Studio 5000 rung export (TargetType="Rung") containing the
 * PhaseControl_StepFlags type, the StepFlag[128] tag and one routine with a
 * NOP banner rung per step followed by one OTL rung per emitted activation.
 */
export function generateL5X(
  activations: readonly Activation[],
  tables: ConfigTables,
  conditions?: ConditionMap,
  options: GenerationOptions = {}
): string {
  const steps = groupActivationsByStep(activations);
  const targetCount = countEmittedLines(steps, tables);

  const root = xmlbuilder.create(
    'RSLogix5000Content',
    // Characters XML does not allow are dropped from names and tags
    { version: '1.0', encoding: 'UTF-8', standalone: true, invalidCharReplacement: '' }
  );
  root.att('SchemaRevision', '1.0');
  root.att('SoftwareRevision', '37.00');
  root.att('TargetType', 'Rung');
  root.att('TargetCount', String(targetCount));
  root.att('CurrentLanguage', 'en-US');
  root.att('ContainsContext', 'true');
  root.att('ExportDate', formatExportDate(options.generatedAt ?? new Date()));
  root.att('ExportOptions', EXPORT_OPTIONS);

  const controller = root.ele('Controller', {
    Use: 'Context',
    Name: options.controllerName ?? DEFAULT_CONTROLLER_NAME
  });
  appendStepFlagDataType(controller);

  const program = controller
    .ele('Programs', { Use: 'Context' })
    .ele('Program', { Use: 'Context', Name: options.programName ?? DEFAULT_PROGRAM_NAME });
  appendStepFlagTag(program, steps);

  const rll = program
    .ele('Routines', { Use: 'Context' })
    .ele('Routine', { Use: 'Context', Name: options.routineName ?? DEFAULT_ROUTINE_NAME })
    .ele('RLLContent', { Use: 'Context' });

  const divider = '-'.repeat(SEPARATOR_WIDTH);
  let rungNumber = FIRST_RUNG_NUMBER;

  for (const step of steps) {
    const bannerRung = rll.ele('Rung', { Use: 'Target', Number: String(rungNumber), Type: 'N' });
    bannerRung
      .ele('Comment')
      .ele('LocalizedComment', { Lang: 'en-US' })
      .dat([divider, formatStepTitle(step.stepIndex, step.stepName, '--'), divider].join('\n'));
    bannerRung.ele('Text').dat('NOP();');
    rungNumber++;

    for (const resolved of resolveStepActivations(step, tables)) {
      const condition = renderLadderNeutral(conditionFor(step, resolved, conditions, options));
      rll
        .ele('Rung', { Use: 'Target', Number: String(rungNumber), Type: 'N' })
        .ele('Text')
        .dat(`${condition}OTL(${resolved.tagWithSuffix});`);
      rungNumber++;
    }
  }

  return root.end({ pretty: true, indent: '', newline: '\n' }) + '\n';
}
