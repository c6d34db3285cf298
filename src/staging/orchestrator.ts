/**
 * Stage Orchestrator — configures the render → collect → archive → publish
 * chain of each target and runs the configured chains.
 *
 * Configuration is idempotent: stages are found by name before they are
 * created, and the artifact cache lets each target register its archive and
 * its publication only once per run.
 */

import { InvalidTargetError, PipelineStageError, isStagingError } from './errors.js';
import type { OrchestrationContext } from './context.js';
import {
  createArchiveStage,
  createArtifactHandle,
  createCollectStage,
  createPublication,
  createPublishStage,
  createRenderStage,
  stageName,
} from './stages.js';
import type { PipelineStage, PipelineStageKind, Target, TargetMap } from './types.js';

export interface StageRunResult {
  stage: string;
  kind: PipelineStageKind;
  targetName: string;
  output: string;
  durationMs: number;
}

/**
 * Require a plain record with a non-empty string name
 */
export function checkTarget(target: unknown): asserts target is Target {
  if (typeof target !== 'object' || target === null || Array.isArray(target)) {
    throw new InvalidTargetError(target);
  }
  if (!('name' in target) || typeof target.name !== 'string' || target.name.length === 0) {
    throw new InvalidTargetError(target);
  }
}

export class StageOrchestrator {
  readonly context: OrchestrationContext;

  constructor(context: OrchestrationContext) {
    this.context = context;
  }

  /**
   * Configure every target in mapping order. A failing target stops the
   * pass; targets configured before it stay configured.
   */
  configure(targets: TargetMap): void {
    const names = Object.keys(targets);
    this.context.logger?.info('configure', 'configure_start', `Configuring staging targets: [${names.join(', ')}]`);
    for (const target of Object.values(targets)) {
      this.configureTarget(target);
    }
  }

  /**
   * Configure (or re-confirm) the stage chain of one target
   */
  configureTarget(input: unknown): PipelineStage[] {
    checkTarget(input);
    const target: Target = input;
    const ctx = this.context;
    const { stages, artifacts } = ctx;
    let current = stageName(target.name, 'render');

    try {
      const chain: PipelineStage[] = [];

      let render: PipelineStage | undefined;
      if (target.context) {
        render = stages.findOrCreate(current, () => createRenderStage(ctx, target));
        chain.push(render);
      }

      current = stageName(target.name, 'collect');
      const collect = stages.findOrCreate(current, () => createCollectStage(ctx, target, render));
      chain.push(collect);

      current = stageName(target.name, 'archive');
      const archive = stages.findOrCreate(current, () => createArchiveStage(ctx, target, collect));
      chain.push(archive);

      current = stageName(target.name, 'publish');
      const artifact = artifacts.getOrCreate(target.name, () =>
        createArtifactHandle(target, archive, ctx.layout.archiveExtension));
      const publication = createPublication(ctx, artifact);
      const registered = artifacts.registerPublicationOnce(target.name, artifact, () => {
        ctx.publications.register(publication);
      });
      if (registered) {
        ctx.logger?.info('configure', 'publication_registered', `Registered publication ${artifact.file}`, {
          classifier: publication.classifier,
        });
      }
      chain.push(stages.findOrCreate(current, () => createPublishStage(ctx, target, archive, publication)));

      ctx.logger?.debug('configure', 'target_configured', `Configured target ${target.name}`, {
        stages: chain.map((stage) => stage.name),
      });
      return chain;
    } catch (error) {
      if (isStagingError(error)) throw error;
      throw new PipelineStageError(current, target.name, error);
    }
  }

  /**
   * Run the configured chains of the named targets (all by default),
   * each stage once, dependencies first
   */
  run(targetNames?: string[]): StageRunResult[] {
    const ctx = this.context;
    const names = targetNames ?? ctx.stages.targetNames();

    const requested: string[] = [];
    for (const name of names) {
      const chain = ctx.stages.forTarget(name);
      if (chain.length === 0) {
        throw new Error(`Target ${name} is not configured`);
      }
      requested.push(...chain.map((stage) => stage.name));
    }

    const results: StageRunResult[] = [];
    for (const stage of ctx.stages.plan(requested)) {
      results.push(this.runStage(stage));
    }
    return results;
  }

  private runStage(stage: PipelineStage): StageRunResult {
    const logger = this.context.logger;
    const startedAt = Date.now();
    logger?.stageStart(stage.kind, stage.name);
    try {
      stage.run();
    } catch (error) {
      const wrapped = error instanceof PipelineStageError ? error : new PipelineStageError(stage.name, stage.targetName, error);
      logger?.stageFailed(stage.kind, stage.name, wrapped.message);
      throw wrapped;
    }
    const durationMs = Date.now() - startedAt;
    logger?.stageComplete(stage.kind, stage.name, { durationMs });
    return {
      stage: stage.name,
      kind: stage.kind,
      targetName: stage.targetName,
      output: stage.output,
      durationMs,
    };
  }
}

export function createStageOrchestrator(context: OrchestrationContext): StageOrchestrator {
  return new StageOrchestrator(context);
}
