// activationRules.ts
// Decides whether an activation is emitted and which suffix its output tag receives

import { ConfigTables, SuffixRule } from '../types';

// Device classes dropped when the PID type is 4 (fixed output)
const SKIPPED_ON_FIXED_OUTPUT = new Set([0, 1, 2, 7, 10, 14]);

const PID_DEVICE_CLASS = 8;
const TOTALIZER_DEVICE_CLASS = 14;

/**
 * Skip rules, first match wins:
 * - PID type 3: always skipped
 * - PID type 4: skipped for device classes 0, 1, 2, 7, 10 and 14
 * - PID type 2: skipped unless the device class is 14 (totalizer)
 */
export function shouldSkipActivation(deviceClassCode: number, qualifierCode: number): boolean {
  if (qualifierCode === 3) return true;
  if (qualifierCode === 4 && SKIPPED_ON_FIXED_OUTPUT.has(deviceClassCode)) return true;
  if (qualifierCode === 2 && deviceClassCode !== TOTALIZER_DEVICE_CLASS) return true;
  return false;
}

export function resolveActivationRule(
  deviceClassCode: number,
  qualifierCode: number,
  tables: ConfigTables
): SuffixRule {
  if (shouldSkipActivation(deviceClassCode, qualifierCode)) {
    return { kind: 'skip' };
  }

  const entry = tables.suffixRules.get(deviceClassCode);
  if (!entry) {
    return { kind: 'suffix', suffix: '' };
  }

  if (entry.kind === 'plain') {
    return { kind: 'suffix', suffix: entry.suffix };
  }

  switch (deviceClassCode) {
    case PID_DEVICE_CLASS:
      // Fixed output vs. closed loop
      return {
        kind: 'suffix',
        suffix: qualifierCode === 4 ? entry.variants.get(4) ?? '' : entry.other
      };
    case TOTALIZER_DEVICE_CLASS:
      // Reset vs. enable totalizer
      return {
        kind: 'suffix',
        suffix: qualifierCode === 2 ? entry.variants.get(2) ?? '' : entry.other
      };
    default:
      return { kind: 'suffix', suffix: entry.other };
  }
}

export function describeDeviceClass(deviceClassCode: number, tables: ConfigTables): string {
  return tables.deviceTypeNames.get(deviceClassCode) ?? '';
}

export function describeQualifier(qualifierCode: number, tables: ConfigTables): string {
  return tables.qualifierNames.get(qualifierCode) ?? '';
}
