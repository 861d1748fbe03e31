/**
 * Sample File Generator Tests
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  EXAMPLE_CONFIG_FILENAME,
  formatTableCsv,
  getTemplatePath,
  writeSampleFiles,
} from '../../../config/example-generator.js';
import { loadTable } from '../../../tables/loader.js';

describe('formatTableCsv', () => {
  it('should write a header and one row per entry', () => {
    const csv = formatTableCsv([
      { label: 'County', code: 'L' },
      { label: 'City', code: 'C' },
    ]);
    assert.equal(csv, 'Label,Code\nCounty,L\nCity,C\n');
  });

  it('should quote values with commas or quotes', () => {
    const csv = formatTableCsv([{ label: 'Parks, "North"', code: 'PN' }]);
    assert.equal(csv, 'Label,Code\n"Parks, ""North""",PN\n');
  });
});

describe('writeSampleFiles', () => {
  let dataDir: string;

  beforeEach(() => {
    dataDir = join(mkdtempSync(join(tmpdir(), 'idnt-init-')), 'data');
  });

  afterEach(() => {
    rmSync(join(dataDir, '..'), { recursive: true, force: true });
  });

  it('should find the bundled example config', () => {
    assert.ok(existsSync(getTemplatePath()));
  });

  it('should create the directory and every sample file', () => {
    const written = writeSampleFiles(dataDir);
    assert.deepStrictEqual(written.map(file => file.status), ['created', 'created', 'created', 'created', 'created']);
    assert.equal(readFileSync(join(dataDir, 'entity.csv'), 'utf-8'), 'Label,Code\nCounty,L\nCity,C\nState,S\n');
    assert.ok(existsSync(join(dataDir, EXAMPLE_CONFIG_FILENAME)));
  });

  it('should write files the loader reads back', () => {
    writeSampleFiles(dataDir);
    const table = loadTable('department', { dataDir });
    assert.equal(table.source, 'file');
    assert.deepStrictEqual(table.entries.map(entry => entry.code), ['KBC', 'PW', 'FIN']);
  });

  it('should keep existing files unless forced', () => {
    writeSampleFiles(dataDir);
    writeFileSync(join(dataDir, 'type.csv'), 'Label,Code\nTablet,TB\n');

    const kept = writeSampleFiles(dataDir);
    assert.ok(kept.every(file => file.status === 'skipped'));
    assert.equal(readFileSync(join(dataDir, 'type.csv'), 'utf-8'), 'Label,Code\nTablet,TB\n');

    const forced = writeSampleFiles(dataDir, { force: true });
    assert.ok(forced.every(file => file.status === 'overwritten'));
    assert.equal(readFileSync(join(dataDir, 'type.csv'), 'utf-8'), 'Label,Code\nWorkstation,WK\nLaptop,LT\nServer,SV\nPrinter,PR\n');
  });
});
