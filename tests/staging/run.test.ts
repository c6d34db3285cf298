/**
 * End-to-end staging runs driven by configuration
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { EOL } from 'node:os';
import { dirname, join } from 'node:path';
import { ConfigSchema, type ConfigInput } from '../../src/config/schema.js';
import { readArchiveEntry, listArchiveEntries } from '../../src/staging/archive.js';
import {
  collectTargets,
  resolvePaths,
  runStaging,
  selectTargets,
} from '../../src/staging/run.js';
import { StagingLogger } from '../../src/staging/staging-logger.js';

const TEST_DIR = join(process.cwd(), '.test-run');

function write(relativePath: string, content: string): void {
  const file = join(TEST_DIR, relativePath);
  mkdirSync(dirname(file), { recursive: true });
  writeFileSync(file, content, 'utf-8');
}

function config(input: ConfigInput = {}) {
  return ConfigSchema.parse({
    project: { group_id: 'org.acme', artifact_id: 'svc', version: '2.1.0' },
    directories: {
      targets: 'targets',
      defaults: 'defaults',
      templates: 'templates',
      resources: 'resources',
      build: 'build',
    },
    ...input,
  });
}

describe('runStaging', () => {
  beforeEach(() => {
    if (existsSync(TEST_DIR)) {
      rmSync(TEST_DIR, { recursive: true });
    }
    mkdirSync(TEST_DIR, { recursive: true });
  });

  afterEach(() => {
    if (existsSync(TEST_DIR)) {
      rmSync(TEST_DIR, { recursive: true });
    }
  });

  it('should resolve every directory against the working directory', () => {
    const paths = resolvePaths(config({ directories: { repository: 'repo' } }), TEST_DIR);
    expect(paths).toEqual({
      targetsDir: join(TEST_DIR, 'src/main/targets'),
      defaultsDir: join(TEST_DIR, 'src/main/defaults'),
      templatesDir: join(TEST_DIR, 'src/main/templates'),
      resourcesDir: join(TEST_DIR, 'src/main/resources'),
      buildDir: join(TEST_DIR, 'build'),
      generatedDir: join(TEST_DIR, 'build', 'vtl'),
      repositoryDir: join(TEST_DIR, 'repo'),
    });
  });

  it('should stage every discovered target', () => {
    write('targets/dev.properties', 'db.host=localhost\n');
    write('targets/prod.properties', 'db.host=db.internal\n');
    write('defaults/app.defaults.vtl', 'pool=10\n');
    write('templates/app.properties', 'host={{db.host}}\n');
    write('resources/log.conf.dev', 'level=debug');
    write('resources/log.conf.prod', 'level=warn');

    const logger = new StagingLogger();
    const report = runStaging(config(), { cwd: TEST_DIR, logger });

    expect(Object.keys(report.targets).sort()).toEqual(['dev', 'prod']);
    expect(report.batches).toHaveLength(1);
    expect(report.stages).toHaveLength(8);
    expect(report.artifacts.map((entry) => entry.published)).toEqual([true, true]);

    expect(readFileSync(join(TEST_DIR, 'build/vtl/app.properties'), 'utf-8')).toBe(
      ['pool=10', 'host={{db.host}}'].join(EOL),
    );

    const prodArchive = join(TEST_DIR, 'build/libs/svc-2.1.0-prod.zip');
    expect(listArchiveEntries(prodArchive)).toEqual(['app.properties', 'log.conf']);
    expect(readArchiveEntry(prodArchive, 'app.properties')).toBe(['pool=10', 'host=db.internal'].join(EOL));
    expect(readArchiveEntry(prodArchive, 'log.conf')).toBe('level=warn');
    expect(logger.getEntries().at(-1)?.event).toBe('run_complete');
  });

  it('should restrict the run to the selected targets', () => {
    write('targets/dev.properties', 'a=1\n');
    write('targets/prod.properties', 'a=2\n');

    const report = runStaging(config(), { cwd: TEST_DIR, targets: ['prod'], generate: false });

    expect(Object.keys(report.targets)).toEqual(['prod']);
    expect(report.batches).toEqual([]);
    expect(existsSync(join(TEST_DIR, 'build/libs/svc-2.1.0-prod.zip'))).toBe(true);
    expect(existsSync(join(TEST_DIR, 'build/libs/svc-2.1.0-dev.zip'))).toBe(false);
  });

  it('should use configured templates and the shared render context', () => {
    write('targets/eu.env', 'region=eu-west\n');
    write('templates/app.properties', 'team={{team}} region={{region}}\n');

    const report = runStaging(
      config({
        staging: { templates: [{ mask: '^(.+)\\.env$' }] },
        render: { context: { team: 'platform' } },
      }),
      { cwd: TEST_DIR },
    );

    expect(Object.keys(report.targets)).toEqual(['eu']);
    expect(readArchiveEntry(join(TEST_DIR, 'build/libs/svc-2.1.0-eu.zip'), 'app.properties')).toBe(
      'team=platform region=eu-west\n',
    );
  });

  it('should publish into the configured repository', () => {
    write('targets/dev.properties', 'a=1\n');

    runStaging(config({ directories: { targets: 'targets', repository: 'repo' } }), { cwd: TEST_DIR });

    expect(existsSync(join(TEST_DIR, 'repo/org/acme/svc/2.1.0/svc-2.1.0-dev.zip'))).toBe(true);
  });
});

describe('collectTargets', () => {
  beforeEach(() => {
    mkdirSync(join(TEST_DIR, 'targets'), { recursive: true });
  });

  afterEach(() => {
    if (existsSync(TEST_DIR)) {
      rmSync(TEST_DIR, { recursive: true });
    }
  });

  it('should overlay inline targets on discovered ones', () => {
    write('targets/dev.properties', 'a=1\n');
    const resolved = config({
      staging: {
        targets: {
          dev: { context: { a: 'inline' } },
          local: {},
          ci: { name: 'build-ci', context: { retries: 3 } },
        },
      },
    });

    expect(collectTargets(resolved, resolvePaths(resolved, TEST_DIR))).toEqual({
      dev: { name: 'dev', context: { a: 'inline' } },
      local: { name: 'local' },
      'build-ci': { name: 'build-ci', context: { retries: '3' } },
    });
  });

  it('should tolerate a missing targets directory', () => {
    const resolved = config({ directories: { targets: 'nowhere' } });
    expect(collectTargets(resolved, resolvePaths(resolved, TEST_DIR))).toEqual({});
  });
});

describe('selectTargets', () => {
  const targets = { dev: { name: 'dev' }, prod: { name: 'prod' } };

  it('should return every target without a selection', () => {
    expect(selectTargets(targets)).toBe(targets);
    expect(selectTargets(targets, [])).toBe(targets);
  });

  it('should reject unknown names', () => {
    expect(() => selectTargets(targets, ['qa'])).toThrow('Unknown target: qa (available: dev, prod)');
  });

  it('should not resolve names inherited from Object.prototype', () => {
    expect(() => selectTargets(targets, ['constructor'])).toThrow(
      'Unknown target: constructor (available: dev, prod)',
    );
    expect(() => selectTargets(targets, ['toString'])).toThrow('Unknown target: toString');
  });
});
