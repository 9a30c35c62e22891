// Shared shapes for the phase-step code generator

export interface Activation {
  stepIndex: number;
  stepName: string;
  deviceClassCode: number;
  qualifierCode: number;
  tag: string | null; // null: the step exists but has nothing to activate
}

export interface StepGroup {
  readonly stepIndex: number;
  readonly stepName: string;
  readonly activations: readonly Activation[];
}

export type SuffixRule =
  | { kind: 'skip' }
  | { kind: 'suffix'; suffix: string };

export type SuffixEntry =
  | { kind: 'plain'; suffix: string }
  | { kind: 'byQualifier'; variants: ReadonlyMap<number, string>; other: string };

export interface ConfigTables {
  readonly deviceTypeNames: ReadonlyMap<number, string>;
  readonly suffixRules: ReadonlyMap<number, SuffixEntry>;
  readonly qualifierNames: ReadonlyMap<number, string>;
}

export interface ConditionLiteral {
  label: string;
  tag: string;
  negated: boolean;
}

export interface ConditionSpec {
  expression: string;
  literals: ConditionLiteral[];
}

/** stepIndex → fully suffixed tag → condition */
export type ConditionMap = ReadonlyMap<number, ReadonlyMap<string, ConditionSpec>>;

export interface LiteralRef {
  tag: string;
  negated: boolean;
}

export interface ClauseIR {
  disjuncts: LiteralRef[][];
}

export interface ResolvedActivation {
  activation: Activation;
  tagWithSuffix: string;
  suffix: string;
}

export interface GenerationOptions {
  generatedAt?: Date;
  routineName?: string;
  programName?: string;
  controllerName?: string;
  /** receives labels a condition referenced without defining them */
  onUnresolvedLabel?: (stepIndex: number, tagWithSuffix: string, label: string) => void;
}

export interface PhaseInstance {
  id: number;
  name: string;
}

export type ControllerType = 'rockwell' | 'siemens' | 'all';
