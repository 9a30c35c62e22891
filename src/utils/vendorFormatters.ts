// vendorFormatters.ts
// Vendor-specific step flag references, headings and timestamps shared by the code generators

export const SEPARATOR_WIDTH = 80;

// 1. Rockwell
/**
 * Step activity flag inside the StepFlag array of PhaseControl_StepFlags
 * Example: StepFlag[5].Flag
 */
export function formatStepFlagForRockwell(stepIndex: number): string {
  return `StepFlag[${stepIndex}].Flag`;
}

// 2. Siemens
/**
 * Step activity flag as a member of the local MyStepFlag structure
 * Example: #MyStepFlag.Step005
 */
export function formatStepFlagForSiemens(stepIndex: number): string {
  return `#MyStepFlag.Step${padNumber(stepIndex, 3)}`;
}

const ROCKWELL_STEP_FLAG = /^StepFlag\[(\d+)\]\.Flag$/i;

/**
 * Returns the step number when `tag` is a Rockwell step flag reference
 */
export function parseRockwellStepFlag(tag: string): number | null {
  const match = ROCKWELL_STEP_FLAG.exec(tag.trim());
  return match ? parseInt(match[1], 10) : null;
}

/**
 * Rewrites Rockwell step flag references (StepFlag[N].Flag) into the Siemens form;
 * any other tag passes through unchanged
 */
export function convertStepFlagToSiemens(tag: string): string {
  const stepIndex = parseRockwellStepFlag(tag);
  return stepIndex === null ? tag : formatStepFlagForSiemens(stepIndex);
}

export function padNumber(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

export function formatStepTitle(stepIndex: number, stepName: string, separator: string): string {
  return `Step ${padNumber(stepIndex, 2)} ${separator} ${stepName}`;
}

// Timestamps
/** YYYY-MM-DD HH:MM:SS in local time */
export function formatBannerDate(date: Date): string {
  const day = `${date.getFullYear()}-${padNumber(date.getMonth() + 1, 2)}-${padNumber(date.getDate(), 2)}`;
  return `${day} ${formatClock(date)}`;
}

const WEEKDAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];
const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

/** Studio 5000 ExportDate, e.g. "Sun Oct 18 09:05:00 2026" */
export function formatExportDate(date: Date): string {
  return [
    WEEKDAYS[date.getDay()],
    MONTHS[date.getMonth()],
    padNumber(date.getDate(), 2),
    formatClock(date),
    date.getFullYear()
  ].join(' ');
}

function formatClock(date: Date): string {
  return [date.getHours(), date.getMinutes(), date.getSeconds()].map(v => padNumber(v, 2)).join(':');
}
