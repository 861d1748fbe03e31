/**
 * Name Composer
 *
 * Builds the device name from the current selection:
 *
 *   entity + department + division + type + yearDigit + technicianId
 *
 * No separators and no placeholders: an empty segment contributes nothing,
 * so the following segments shift left. Pure and synchronous; never throws.
 *
 * @example
 * compose({
 *   entityCode: 'L', departmentCode: 'PW', divisionCode: 'ADM', typeCode: 'WK',
 *   deploymentYear: '2026', technicianId: '00A7',
 * }).name; // "LPWADMWK600A7"
 */

import type { ComposedName, ComposeOptions, Segment, Selection } from '../types.js';

const INTEGER_PATTERN = /^[+-]?(\d+)$/;

/**
 * Last decimal digit of the deployment year (year mod 10).
 * Empty for empty or non-integer input ("abc", "20x6", "2026.5").
 */
export function yearDigit(deploymentYear: string): string {
  const match = INTEGER_PATTERN.exec(deploymentYear.trim());
  if (!match) {
    return '';
  }
  const digits = match[1];
  return digits[digits.length - 1];
}

/**
 * Technician ID segment: as entered, optionally uppercased
 */
export function technicianSegment(technicianId: string, options: ComposeOptions = {}): string {
  return options.uppercaseTechnicianId ? technicianId.toUpperCase() : technicianId;
}

/**
 * Compose the device name and its segment breakdown
 */
export function compose(selection: Selection, options: ComposeOptions = {}): ComposedName {
  const segments: Segment[] = [
    { component: 'entity', value: selection.entityCode },
    { component: 'department', value: selection.departmentCode },
    { component: 'division', value: selection.divisionCode },
    { component: 'type', value: selection.typeCode },
    { component: 'year', value: yearDigit(selection.deploymentYear) },
    { component: 'techId', value: technicianSegment(selection.technicianId, options) },
  ];

  return {
    name: segments.map(segment => segment.value).join(''),
    segments,
  };
}
