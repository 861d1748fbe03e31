/**
 * Application Setup Tests
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join, resolve } from 'path';
import { DEFAULT_CONFIG } from '../../../config/types.js';
import { createAppContext, resolveDataDir, resolveDebugLog } from '../../../server/setup.js';

describe('resolveDebugLog', () => {
  let savedEnv: string | undefined;

  beforeEach(() => {
    savedEnv = process.env.IDNT_DEBUG;
    delete process.env.IDNT_DEBUG;
  });

  afterEach(() => {
    if (savedEnv === undefined) {
      delete process.env.IDNT_DEBUG;
    } else {
      process.env.IDNT_DEBUG = savedEnv;
    }
  });

  it('should prefer the command line, then the environment, then the config', () => {
    const config = { debug: { log_path: 'from-config.log' } };
    process.env.IDNT_DEBUG = 'from-env.log';

    assert.deepStrictEqual(resolveDebugLog({ debugLogPath: 'from-cli.log' }, config), { path: 'from-cli.log', source: 'CLI Argument' });
    assert.deepStrictEqual(resolveDebugLog({}, config), { path: 'from-env.log', source: 'Environment Variable' });

    delete process.env.IDNT_DEBUG;
    assert.deepStrictEqual(resolveDebugLog({}, config), { path: 'from-config.log', source: 'Config File' });
    assert.equal(resolveDebugLog({}, {}), undefined);
  });
});

describe('resolveDataDir', () => {
  it('should prefer the command line over the config', () => {
    assert.equal(resolveDataDir({ dataDir: 'cli-data' }, { data: { dir: 'cfg-data' } }), resolve('cli-data'));
    assert.equal(resolveDataDir({}, { data: { dir: 'cfg-data' } }), resolve('cfg-data'));
  });

  it('should default to the working directory', () => {
    assert.equal(resolveDataDir({}, {}), process.cwd());
  });
});

describe('createAppContext', () => {
  let dataDir: string;

  beforeEach(() => {
    dataDir = mkdtempSync(join(tmpdir(), 'idnt-setup-'));
  });

  afterEach(() => {
    rmSync(dataDir, { recursive: true, force: true });
  });

  it('should load tables and carry the configured defaults', () => {
    writeFileSync(join(dataDir, 'type.csv'), 'Label,Code\nTablet,TB\n');
    const config = {
      ...DEFAULT_CONFIG,
      defaults: { deployment_year: '2029', technician_id: 'Q1' },
      naming: { uppercase_technician_id: true },
    };

    const context = createAppContext(config, dataDir);
    assert.equal(context.dataDir, dataDir);
    assert.equal(context.tables.type.source, 'file');
    assert.equal(context.tables.entity.source, 'default');
    assert.deepStrictEqual(context.defaults, { deploymentYear: '2029', technicianId: 'Q1' });
    assert.deepStrictEqual(context.composeOptions, { uppercaseTechnicianId: true });
    assert.ok(Object.isFrozen(context));
  });

  it('should fall back to built-in defaults for an empty config', () => {
    const context = createAppContext({}, dataDir);
    assert.deepStrictEqual(context.defaults, { deploymentYear: '2026', technicianId: '00A7' });
    assert.deepStrictEqual(context.composeOptions, { uppercaseTechnicianId: false });
  });
});
