// codegen-config.ts
// Mapping tables (device types, suffixes, PID types) persisted as a JSON file

import fs from 'fs';
import { z } from 'zod';
import { ConfigTables, SuffixEntry } from '../types';

// ---------- Defaults ----------
export const DEFAULT_TYPE_MAPPING: Record<string, string> = {
  '0': 'V',
  '1': 'V',
  '2': 'V',
  '6': 'AO',
  '7': 'DO',
  '8': 'PID',
  '10': 'Comm',
  '13': 'VSD',
  '14': 'TOT'
};

export const DEFAULT_SUFFIX_MAPPING: Record<string, string | Record<string, string>> = {
  '0': '.activate',
  '1': '.activateLL',
  '2': '.activateUL',
  '6': '.activate',
  '7': '.activate',
  '8': {
    pid_type_4: '.fixedoutput',
    pid_type_other: '.closeloop'
  },
  '10': '',
  '13': '.activate',
  '14': {
    pid_type_2: '.ResetTotalizer',
    pid_type_other: '.EnableTotalizer'
  }
};

export const DEFAULT_PID_TYPE_MAPPING: Record<string, string> = {
  '0': 'N',
  '1': 'S',
  '2': 'R',
  '3': 'SP',
  '4': 'FO'
};

// ---------- Schemas ----------
const CodeKeySchema = z.string().regex(/^\d+$/, 'Mapping keys must be integer codes');

const QualifierVariantsSchema = z.record(
  z.string().regex(/^pid_type_(\d+|other)$/, 'Variant keys must be pid_type_<n> or pid_type_other'),
  z.string()
);

const NameMappingSchema = z.record(CodeKeySchema, z.string());
const SuffixMappingSchema = z.record(CodeKeySchema, z.union([z.string(), QualifierVariantsSchema]));

export const ConfigDocumentSchema = z.object({
  type_mapping: NameMappingSchema,
  suffix_mapping: SuffixMappingSchema,
  pid_type_mapping: NameMappingSchema
});

export const ConfigPatchSchema = ConfigDocumentSchema.partial();

export type ConfigDocument = z.infer<typeof ConfigDocumentSchema>;
export type ConfigPatch = z.infer<typeof ConfigPatchSchema>;

export class CodegenConfigError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message);
    this.name = 'CodegenConfigError';
  }
}

// ---------- Conversion ----------
function toNameMap(mapping: Record<string, string>): ReadonlyMap<number, string> {
  return new Map(Object.entries(mapping).map(([code, name]) => [parseInt(code, 10), name]));
}

function toSuffixEntry(value: string | Record<string, string>): SuffixEntry {
  if (typeof value === 'string') {
    return { kind: 'plain', suffix: value };
  }

  const variants = new Map<number, string>();
  for (const [key, suffix] of Object.entries(value)) {
    const match = /^pid_type_(\d+)$/.exec(key);
    if (match) variants.set(parseInt(match[1], 10), suffix);
  }
  return { kind: 'byQualifier', variants, other: value.pid_type_other ?? '' };
}

function fromSuffixEntry(entry: SuffixEntry): string | Record<string, string> {
  if (entry.kind === 'plain') return entry.suffix;

  const variants: Record<string, string> = {};
  for (const [qualifier, suffix] of entry.variants) {
    variants[`pid_type_${qualifier}`] = suffix;
  }
  variants.pid_type_other = entry.other;
  return variants;
}

function fromNameMap(map: ReadonlyMap<number, string>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [code, name] of map) out[String(code)] = name;
  return out;
}

/**
 * Validates a config document (missing sections fall back to the defaults)
 * and builds the immutable tables used by the generators
 */
export function parseConfigTables(input: unknown): ConfigTables {
  const parsed = ConfigPatchSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new CodegenConfigError('Invalid code generator configuration', issues);
  }

  const doc = parsed.data;
  const suffixMapping = doc.suffix_mapping ?? DEFAULT_SUFFIX_MAPPING;

  return Object.freeze({
    deviceTypeNames: toNameMap(doc.type_mapping ?? DEFAULT_TYPE_MAPPING),
    suffixRules: new Map(
      Object.entries(suffixMapping).map(([code, value]) => [parseInt(code, 10), toSuffixEntry(value)])
    ),
    qualifierNames: toNameMap(doc.pid_type_mapping ?? DEFAULT_PID_TYPE_MAPPING)
  });
}

export function serializeConfigTables(tables: ConfigTables): ConfigDocument {
  const suffixMapping: ConfigDocument['suffix_mapping'] = {};
  for (const [code, entry] of tables.suffixRules) {
    suffixMapping[String(code)] = fromSuffixEntry(entry);
  }

  return {
    type_mapping: fromNameMap(tables.deviceTypeNames),
    suffix_mapping: suffixMapping,
    pid_type_mapping: fromNameMap(tables.qualifierNames)
  };
}

export function getDefaultConfigTables(): ConfigTables {
  return parseConfigTables({});
}

/**
 * Holds the current tables. Generators take a snapshot per run; an update
 * replaces the snapshot instead of mutating it.
 */
export class CodegenConfigStore {
  private tables: ConfigTables;

  constructor(private readonly configFile: string, tables: ConfigTables = getDefaultConfigTables()) {
    this.tables = tables;
  }

  /**
   * Reads the config file. A missing file is created with the defaults; an
   * unreadable or invalid one is reported and the defaults are used.
   */
  static async load(configFile: string): Promise<CodegenConfigStore> {
    if (!fs.existsSync(configFile)) {
      const store = new CodegenConfigStore(configFile);
      await store.save();
      return store;
    }

    try {
      const raw = await fs.promises.readFile(configFile, 'utf-8');
      const tables = parseConfigTables(JSON.parse(raw));
      console.log(`✅ Code generator configuration loaded from ${configFile}`);
      return new CodegenConfigStore(configFile, tables);
    } catch (error) {
      const detail = error instanceof CodegenConfigError
        ? error.issues.join('; ')
        : error instanceof Error ? error.message : String(error);
      console.warn(`⚠️ Failed to load ${configFile}: ${detail}. Using defaults.`);
      return new CodegenConfigStore(configFile);
    }
  }

  snapshot(): ConfigTables {
    return this.tables;
  }

  toDocument(): ConfigDocument {
    return serializeConfigTables(this.tables);
  }

  async update(patch: ConfigPatch): Promise<ConfigTables> {
    const current = this.toDocument();
    const next = parseConfigTables({
      type_mapping: patch.type_mapping ?? current.type_mapping,
      suffix_mapping: patch.suffix_mapping ?? current.suffix_mapping,
      pid_type_mapping: patch.pid_type_mapping ?? current.pid_type_mapping
    });
    await this.write(next);
    this.tables = next;
    return next;
  }

  save(): Promise<void> {
    return this.write(this.tables);
  }

  private async write(tables: ConfigTables): Promise<void> {
    await fs.promises.writeFile(this.configFile, JSON.stringify(serializeConfigTables(tables), null, 4), 'utf-8');
    console.log(`✅ Code generator configuration saved to ${this.configFile}`);
  }
}
