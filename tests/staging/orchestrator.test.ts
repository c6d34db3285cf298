/**
 * Stage orchestrator tests — configuration, idempotency, execution
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { listArchiveEntries, readArchiveEntry } from '../../src/staging/archive.js';
import { createLayout, createOrchestrationContext } from '../../src/staging/context.js';
import { InvalidTargetError, PipelineStageError } from '../../src/staging/errors.js';
import { StageOrchestrator } from '../../src/staging/orchestrator.js';
import { PublicationRegistry, type PublicationSink } from '../../src/staging/publication.js';
import type { TemplateRenderer } from '../../src/staging/renderer.js';
import { StagingLogger } from '../../src/staging/staging-logger.js';
import { selectResource } from '../../src/staging/stages.js';

const TEST_DIR = join(process.cwd(), '.test-orchestrator');
const BUILD_DIR = join(TEST_DIR, 'build');
const RESOURCES_DIR = join(TEST_DIR, 'resources');

function write(file: string, content: string): void {
  mkdirSync(dirname(file), { recursive: true });
  writeFileSync(file, content, 'utf-8');
}

function setup(
  options: {
    includeAllResources?: boolean;
    publications?: PublicationSink;
    renderer?: TemplateRenderer;
    logger?: StagingLogger;
  } = {},
) {
  const context = createOrchestrationContext({
    layout: createLayout({
      buildDir: BUILD_DIR,
      resourcesDir: RESOURCES_DIR,
      groupId: 'com.example',
      artifactId: 'app',
      version: '1.0.0',
    }),
    includeAllResources: options.includeAllResources,
    renderContext: { team: 'core' },
    publications: options.publications,
    renderer: options.renderer,
    logger: options.logger,
  });
  return { context, orchestrator: new StageOrchestrator(context) };
}

describe('selectResource', () => {
  it('should select target variants and strip the suffix', () => {
    expect(selectResource('conf/app.conf.dev', 'dev', false)).toBe('conf/app.conf');
    expect(selectResource('conf/app.conf.prod', 'dev', false)).toBeUndefined();
    expect(selectResource('conf/app.conf', 'dev', false)).toBeUndefined();
  });

  it('should not select a bare suffix', () => {
    expect(selectResource('.dev', 'dev', false)).toBeUndefined();
    expect(selectResource('conf/.dev', 'dev', false)).toBeUndefined();
  });

  it('should select everything unchanged when including all resources', () => {
    expect(selectResource('conf/app.conf.prod', 'dev', true)).toBe('conf/app.conf.prod');
  });
});

describe('StageOrchestrator', () => {
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

  describe('configure', () => {
    it('should wire collect, archive and publish for a target without context', () => {
      const { orchestrator } = setup();

      const chain = orchestrator.configureTarget({ name: 'dev' });

      expect(chain.map((stage) => stage.name)).toEqual(['devResources', 'devArchive', 'devPublish']);
      expect(chain.map((stage) => stage.dependsOn)).toEqual([[], ['devResources'], ['devArchive']]);
      expect(chain[1].output).toBe(join(BUILD_DIR, 'libs', 'app-1.0.0-dev.zip'));
    });

    it('should add a render stage for a target with context', () => {
      const { orchestrator } = setup();

      const chain = orchestrator.configureTarget({ name: 'prod', context: { a: '1' } });

      expect(chain.map((stage) => stage.name)).toEqual(['prodRender', 'prodResources', 'prodArchive', 'prodPublish']);
      expect(chain[1].dependsOn).toEqual(['prodRender']);
      expect(chain[0].output).toBe(join(BUILD_DIR, 'templates', 'prod'));
    });

    it('should create no new stages or publications when run again', () => {
      const registry = new PublicationRegistry();
      const { context, orchestrator } = setup({ publications: registry });
      const targets = {
        dev: { name: 'dev' },
        prod: { name: 'prod', context: { a: '1' } },
      };

      orchestrator.configure(targets);
      const stages = context.stages.list();
      orchestrator.configure(targets);

      expect(context.stages.list()).toEqual(stages);
      expect(context.stages.size).toBe(7);
      expect(registry.list().map((publication) => publication.classifier)).toEqual(['dev', 'prod']);
      expect(context.artifacts.list().map((entry) => entry.published)).toEqual([true, true]);
    });

    it('should register publications with the project coordinates', () => {
      const registry = new PublicationRegistry();
      const { orchestrator } = setup({ publications: registry });

      orchestrator.configure({ dev: { name: 'dev' } });

      expect(registry.list()).toEqual([
        {
          groupId: 'com.example',
          artifactId: 'app',
          version: '1.0.0',
          classifier: 'dev',
          artifact: {
            targetName: 'dev',
            file: join(BUILD_DIR, 'libs', 'app-1.0.0-dev.zip'),
            classifier: 'dev',
            extension: 'zip',
            builtBy: 'devArchive',
          },
        },
      ]);
    });

    it('should reject targets without a name', () => {
      const { orchestrator, context } = setup();

      expect(() => orchestrator.configureTarget({})).toThrow(InvalidTargetError);
      expect(() => orchestrator.configure({ blank: { name: '' } })).toThrow('Missing target name: {"name":""}');
      expect(context.stages.size).toBe(0);
    });

    it('should reject targets that are not plain records', () => {
      const { orchestrator, context } = setup();

      expect(() => orchestrator.configureTarget(Object)).toThrow(InvalidTargetError);
      expect(() => orchestrator.configureTarget([{ name: 'dev' }])).toThrow(InvalidTargetError);
      expect(() => orchestrator.configureTarget(null)).toThrow(InvalidTargetError);
      expect(context.stages.size).toBe(0);
    });

    it('should keep targets configured before a failing one', () => {
      const { orchestrator, context } = setup();

      expect(() => orchestrator.configure({ dev: { name: 'dev' }, blank: { name: '' } })).toThrow(InvalidTargetError);
      expect(context.stages.targetNames()).toEqual(['dev']);
    });

    it('should wrap a failing publication registration and retry it later', () => {
      let failing = true;
      const registered: string[] = [];
      const sink: PublicationSink = {
        register: (publication) => {
          if (failing) throw new Error('registry offline');
          registered.push(publication.classifier);
        },
        publish: () => undefined,
      };
      const { orchestrator, context } = setup({ publications: sink });

      let caught: unknown;
      try {
        orchestrator.configureTarget({ name: 'dev' });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(PipelineStageError);
      if (caught instanceof PipelineStageError) {
        expect(caught.stageName).toBe('devPublish');
        expect(caught.targetName).toBe('dev');
        expect(caught.message).toBe('Stage devPublish failed for target dev: registry offline');
      }
      expect(context.artifacts.isPublished('dev')).toBe(false);

      failing = false;
      orchestrator.configureTarget({ name: 'dev' });
      expect(registered).toEqual(['dev']);
      expect(context.stages.size).toBe(3);
    });
  });

  describe('run', () => {
    it('should collect only the target variant of each resource', () => {
      write(join(RESOURCES_DIR, 'app.conf.dev'), 'mode=dev');
      write(join(RESOURCES_DIR, 'app.conf.prod'), 'mode=prod');
      const { orchestrator } = setup();

      orchestrator.configure({ dev: { name: 'dev' } });
      orchestrator.run();

      const collected = join(BUILD_DIR, 'resources', 'dev');
      expect(readFileSync(join(collected, 'app.conf'), 'utf-8')).toBe('mode=dev');
      expect(existsSync(join(collected, 'app.conf.prod'))).toBe(false);
      expect(listArchiveEntries(join(BUILD_DIR, 'libs', 'app-1.0.0-dev.zip'))).toEqual(['app.conf']);
    });

    it('should collect every resource when including all', () => {
      write(join(RESOURCES_DIR, 'app.conf.dev'), 'mode=dev');
      write(join(RESOURCES_DIR, 'shared', 'logo.txt'), 'logo');
      const { orchestrator } = setup({ includeAllResources: true });

      orchestrator.configure({ dev: { name: 'dev' } });
      orchestrator.run(['dev']);

      expect(listArchiveEntries(join(BUILD_DIR, 'libs', 'app-1.0.0-dev.zip'))).toEqual([
        'app.conf.dev',
        'shared/logo.txt',
      ]);
    });

    it('should render templates with the target context over the shared one', () => {
      write(join(BUILD_DIR, 'vtl', 'app.properties'), 'team={{team}}\nurl={{db.url}}\n');
      write(join(RESOURCES_DIR, 'readme.txt.prod'), 'prod only');
      const { orchestrator } = setup();

      orchestrator.configure({ prod: { name: 'prod', context: { 'db.url': 'jdbc:prod' } } });
      const results = orchestrator.run();

      expect(results.map((result) => result.stage)).toEqual([
        'prodRender',
        'prodResources',
        'prodArchive',
        'prodPublish',
      ]);
      const archive = join(BUILD_DIR, 'libs', 'app-1.0.0-prod.zip');
      expect(listArchiveEntries(archive)).toEqual(['app.properties', 'readme.txt']);
      expect(readArchiveEntry(archive, 'app.properties')).toBe('team=core\nurl=jdbc:prod\n');
    });

    it('should warn and continue when there are no generated templates', () => {
      const logger = new StagingLogger();
      const { orchestrator } = setup({ logger });

      orchestrator.configure({ qa: { name: 'qa', context: { a: '1' } } });
      orchestrator.run();

      expect(logger.getEntries().filter((entry) => entry.level === 'warn').map((entry) => entry.event)).toEqual([
        'no_templates',
      ]);
      expect(existsSync(join(BUILD_DIR, 'libs', 'app-1.0.0-qa.zip'))).toBe(true);
    });

    it('should copy archives into the repository when one is configured', () => {
      write(join(RESOURCES_DIR, 'app.conf.dev'), 'mode=dev');
      const registry = new PublicationRegistry(join(TEST_DIR, 'repo'));
      const { orchestrator } = setup({ publications: registry });

      orchestrator.configure({ dev: { name: 'dev' } });
      orchestrator.run();

      const published = join(TEST_DIR, 'repo', 'com', 'example', 'app', '1.0.0', 'app-1.0.0-dev.zip');
      expect(existsSync(published)).toBe(true);
      expect(registry.publishedFiles().get('dev')).toBe(published);
    });

    it('should wrap a failing stage with its name and target', () => {
      write(join(BUILD_DIR, 'vtl', 'app.properties'), 'a={{a}}');
      const logger = new StagingLogger();
      const renderer: TemplateRenderer = {
        render: () => {
          throw new Error('boom');
        },
      };
      const { orchestrator } = setup({ renderer, logger });

      orchestrator.configure({ prod: { name: 'prod', context: { a: '1' } } });

      expect(() => orchestrator.run()).toThrow(PipelineStageError);
      expect(() => orchestrator.run()).toThrow('Stage prodRender failed for target prod: boom');
      expect(logger.getErrors().map((entry) => entry.event)).toEqual(['stage_failed', 'stage_failed']);
    });

    it('should refuse to run an unconfigured target', () => {
      const { orchestrator } = setup();
      expect(() => orchestrator.run(['ghost'])).toThrow('Target ghost is not configured');
    });
  });
});
