/**
 * Selection Helper Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  emptySelection,
  extractCode,
  formatOption,
  resolveCode,
  selectionFromInputs,
} from '../../../naming/selection.js';
import { getDefaultTable } from '../../../tables/loader.js';
import type { CodeTables } from '../../../types.js';

const tables: CodeTables = {
  entity: getDefaultTable('entity'),
  department: getDefaultTable('department'),
  division: getDefaultTable('division'),
  type: getDefaultTable('type'),
};

describe('formatOption / extractCode', () => {
  it('should format entries as "Label - CODE"', () => {
    assert.equal(formatOption({ label: 'Public Works', code: 'PW' }), 'Public Works - PW');
  });

  it('should take the code after the last separator', () => {
    assert.equal(extractCode('Public Works - PW'), 'PW');
    assert.equal(extractCode('North - South - NS'), 'NS');
  });

  it('should return an empty code without a separator', () => {
    assert.equal(extractCode('Public Works'), '');
    assert.equal(extractCode(''), '');
  });
});

describe('resolveCode', () => {
  it('should match an exact code', () => {
    assert.equal(resolveCode(tables.department, 'FIN'), 'FIN');
  });

  it('should match a label case-insensitively', () => {
    assert.equal(resolveCode(tables.department, 'public works'), 'PW');
  });

  it('should match option text', () => {
    assert.equal(resolveCode(tables.department, 'Keebler Cemetery - KBC'), 'KBC');
  });

  it('should return an empty code for empty or unknown input', () => {
    assert.equal(resolveCode(tables.department, '   '), '');
    assert.equal(resolveCode(tables.department, 'Harbor'), '');
    assert.equal(resolveCode(tables.department, 'Harbor - HB'), '');
  });
});

describe('emptySelection', () => {
  it('should leave every field empty', () => {
    assert.deepStrictEqual(emptySelection(), {
      entityCode: '',
      departmentCode: '',
      divisionCode: '',
      typeCode: '',
      deploymentYear: '',
      technicianId: '',
    });
  });
});

describe('selectionFromInputs', () => {
  it('should resolve every category and keep free text as given', () => {
    const result = selectionFromInputs(tables, {
      entity: 'County',
      department: 'PW',
      division: 'Administration - ADM',
      type: 'laptop',
      year: '2026',
      techId: '00A7',
    });
    assert.deepStrictEqual(result, {
      selection: {
        entityCode: 'L',
        departmentCode: 'PW',
        divisionCode: 'ADM',
        typeCode: 'LT',
        deploymentYear: '2026',
        technicianId: '00A7',
      },
      unresolved: [],
    });
  });

  it('should trim a technician ID given as an argument', () => {
    assert.equal(selectionFromInputs(tables, { techId: '  00A7 ' }).selection.technicianId, '00A7');
  });

  it('should report unknown values and leave omitted ones empty', () => {
    const result = selectionFromInputs(tables, { entity: 'Village', type: 'SV' });
    assert.deepStrictEqual(result.unresolved, ['entity']);
    assert.equal(result.selection.entityCode, '');
    assert.equal(result.selection.departmentCode, '');
    assert.equal(result.selection.typeCode, 'SV');
    assert.equal(result.selection.deploymentYear, '');
  });
});
