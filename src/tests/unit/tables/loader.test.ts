/**
 * Reference Table Loader Tests
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { DEFAULT_TABLES } from '../../../constants.js';
import {
  getDefaultTable,
  getTablePath,
  loadAllTables,
  loadTable,
  parseTableContent,
} from '../../../tables/loader.js';

describe('parseTableContent', () => {
  it('should skip the header row', () => {
    const entries = parseTableContent('Label,Code\nCounty,L\nCity,C\n', 'entity.csv');
    assert.deepStrictEqual(entries, [
      { label: 'County', code: 'L' },
      { label: 'City', code: 'C' },
    ]);
  });

  it('should skip the first row even when it is not a header', () => {
    const entries = parseTableContent('County,L\nCity,C', 'entity.csv');
    assert.deepStrictEqual(entries, [{ label: 'City', code: 'C' }]);
  });

  it('should skip short rows and rows with empty fields', () => {
    const content = 'Label,Code\nNoCode\nFinance,\n,OPS\nSupport,SUP\n';
    assert.deepStrictEqual(parseTableContent(content, 'division.csv'), [{ label: 'Support', code: 'SUP' }]);
  });

  it('should keep labels that contain an inch mark', () => {
    const entries = parseTableContent('Label,Code\n27" Display,DSP\nLaptop,LT\n', 'type.csv');
    assert.deepStrictEqual(entries, [
      { label: '27" Display', code: 'DSP' },
      { label: 'Laptop', code: 'LT' },
    ]);
  });

  it('should ignore extra columns', () => {
    const entries = parseTableContent('Label,Code,Notes\nLaptop,LT,portable\n', 'type.csv');
    assert.deepStrictEqual(entries, [{ label: 'Laptop', code: 'LT' }]);
  });

  it('should keep the first occurrence of a repeated label', () => {
    const entries = parseTableContent('Label,Code\nServer,SV\nServer,SRV\nPrinter,PR\n', 'type.csv');
    assert.deepStrictEqual(entries, [
      { label: 'Server', code: 'SV' },
      { label: 'Printer', code: 'PR' },
    ]);
  });

  it('should return no entries for a header-only file', () => {
    assert.deepStrictEqual(parseTableContent('Label,Code\n', 'entity.csv'), []);
  });
});

describe('getDefaultTable', () => {
  it('should return a frozen copy of the built-in table', () => {
    const table = getDefaultTable('entity');
    assert.equal(table.category, 'entity');
    assert.equal(table.source, 'default');
    assert.deepStrictEqual(table.entries, [
      { label: 'County', code: 'L' },
      { label: 'City', code: 'C' },
      { label: 'State', code: 'S' },
    ]);
    assert.ok(Object.isFrozen(table));
    assert.ok(Object.isFrozen(table.entries));
    assert.notStrictEqual(table.entries[0], DEFAULT_TABLES.entity[0]);
  });
});

describe('loadTable / loadAllTables', () => {
  let dataDir: string;

  beforeEach(() => {
    dataDir = mkdtempSync(join(tmpdir(), 'idnt-loader-'));
  });

  afterEach(() => {
    rmSync(dataDir, { recursive: true, force: true });
  });

  it('should resolve the CSV path inside the data directory', () => {
    assert.equal(getTablePath('department', dataDir), join(dataDir, 'department.csv'));
  });

  it('should fall back to defaults when the file is missing', () => {
    const table = loadTable('type', { dataDir });
    assert.equal(table.source, 'default');
    assert.deepStrictEqual(table.entries.map(entry => entry.code), ['WK', 'LT', 'SV', 'PR']);
  });

  it('should load entries from an existing file', () => {
    writeFileSync(join(dataDir, 'department.csv'), 'Label,Code\nParks,PK\nLibrary,LIB\n');
    const table = loadTable('department', { dataDir });
    assert.equal(table.source, 'file');
    assert.deepStrictEqual(table.entries, [
      { label: 'Parks', code: 'PK' },
      { label: 'Library', code: 'LIB' },
    ]);
    assert.ok(Object.isFrozen(table.entries[0]));
  });

  it('should fall back to defaults when the file has no valid rows', () => {
    writeFileSync(join(dataDir, 'division.csv'), 'Label,Code\nonly-one-field\n');
    const table = loadTable('division', { dataDir });
    assert.equal(table.source, 'default');
    assert.deepStrictEqual(table.entries.map(entry => entry.code), ['ADM', 'OPS', 'SUP']);
  });

  it('should fall back to defaults when the file cannot be read', () => {
    mkdirSync(join(dataDir, 'entity.csv'));
    const table = loadTable('entity', { dataDir });
    assert.equal(table.source, 'default');
  });

  it('should fall back per category without affecting the others', () => {
    writeFileSync(join(dataDir, 'entity.csv'), 'Label,Code\nTown,T\n');
    writeFileSync(join(dataDir, 'division.csv'), 'Label,Code\n');

    const tables = loadAllTables({ dataDir });
    assert.equal(tables.entity.source, 'file');
    assert.deepStrictEqual(tables.entity.entries, [{ label: 'Town', code: 'T' }]);
    assert.equal(tables.department.source, 'default');
    assert.equal(tables.division.source, 'default');
    assert.equal(tables.type.source, 'default');
    assert.ok(Object.isFrozen(tables));
  });
});
