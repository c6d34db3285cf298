/**
 * Stage Registry — the per-run table of pipeline stages, looked up by name
 * so a stage is only ever constructed once
 */

import { PIPELINE_STAGE_ORDER, type PipelineStage } from './types.js';

export class StageRegistry {
  private readonly stages = new Map<string, PipelineStage>();

  find(name: string): PipelineStage | undefined {
    return this.stages.get(name);
  }

  /** Return the registered stage or register the one the factory builds */
  findOrCreate(name: string, factory: () => PipelineStage): PipelineStage {
    const existing = this.stages.get(name);
    if (existing) return existing;

    const stage = factory();
    if (stage.name !== name) {
      throw new Error(`Stage factory for ${name} produced ${stage.name}`);
    }
    this.stages.set(name, stage);
    return stage;
  }

  has(name: string): boolean {
    return this.stages.has(name);
  }

  /** All stages in registration order */
  list(): PipelineStage[] {
    return [...this.stages.values()];
  }

  /** Stages of one target, in pipeline order */
  forTarget(targetName: string): PipelineStage[] {
    return this.list()
      .filter((stage) => stage.targetName === targetName)
      .sort((a, b) => PIPELINE_STAGE_ORDER.indexOf(a.kind) - PIPELINE_STAGE_ORDER.indexOf(b.kind));
  }

  targetNames(): string[] {
    return [...new Set(this.list().map((stage) => stage.targetName))];
  }

  /**
   * Execution order for the given stages: every dependency before its
   * dependent, each stage once
   */
  plan(names: string[]): PipelineStage[] {
    const ordered: PipelineStage[] = [];
    const visited = new Set<string>();

    const visit = (name: string, path: string[]): void => {
      if (visited.has(name)) return;
      if (path.includes(name)) {
        throw new Error(`Stage dependency cycle: ${[...path, name].join(' -> ')}`);
      }
      const stage = this.stages.get(name);
      if (!stage) throw new Error(`Unknown stage: ${name}`);
      for (const dependency of stage.dependsOn) visit(dependency, [...path, name]);
      visited.add(name);
      ordered.push(stage);
    };

    for (const name of names) visit(name, []);
    return ordered;
  }

  get size(): number {
    return this.stages.size;
  }
}

export function createStageRegistry(): StageRegistry {
  return new StageRegistry();
}
