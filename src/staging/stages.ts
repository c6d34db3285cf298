/**
 * Pipeline stage construction — render, collect, archive and publish for a
 * single target. Construction only wires paths; work happens in `run`.
 */

import path from 'node:path';

import { archiveFileName } from './archive.js';
import { getCollectedDir, getRenderedDir, type OrchestrationContext } from './context.js';
import { copyFile, isDirectory, listTree, resetDirectory } from './fs-utils.js';
import { expandContext, renderDirectory } from './renderer.js';
import type { ArtifactHandle, PipelineStage, PipelineStageKind, Publication, Target } from './types.js';

const STAGE_SUFFIXES: Record<PipelineStageKind, string> = {
  render: 'Render',
  collect: 'Resources',
  archive: 'Archive',
  publish: 'Publish',
};

export function stageName(targetName: string, kind: PipelineStageKind): string {
  return `${targetName}${STAGE_SUFFIXES[kind]}`;
}

// ─── Render ──────────────────────────────────────────────

export function createRenderStage(ctx: OrchestrationContext, target: Target): PipelineStage {
  const name = stageName(target.name, 'render');
  const output = getRenderedDir(ctx.layout, target.name);
  const binding = expandContext({ ...ctx.renderContext, ...(target.context ?? {}) });

  return {
    name,
    kind: 'render',
    targetName: target.name,
    output,
    dependsOn: [],
    run: () => {
      resetDirectory(output);
      if (!isDirectory(ctx.layout.generatedDir)) {
        ctx.logger?.warn('render', 'no_templates', `No generated templates at ${ctx.layout.generatedDir}`);
        return;
      }
      const files = renderDirectory(ctx.renderer, ctx.layout.generatedDir, output, binding);
      ctx.logger?.info('render', 'rendered', `Rendered ${files.length} template(s) for ${target.name}`);
    },
  };
}

// ─── Collect ─────────────────────────────────────────────

/**
 * Destination of a resource for the target, or undefined when the resource
 * is not selected. Without includeAll only `<file>.<target>` is selected
 * and the suffix is stripped.
 */
export function selectResource(relativePath: string, targetName: string, includeAll: boolean): string | undefined {
  if (includeAll) return relativePath;
  const suffix = `.${targetName}`;
  if (!relativePath.endsWith(suffix)) return undefined;
  const stripped = relativePath.slice(0, -suffix.length);
  const base = path.posix.basename(stripped);
  return base.length > 0 && !stripped.endsWith('/') ? stripped : undefined;
}

export function createCollectStage(
  ctx: OrchestrationContext,
  target: Target,
  render?: PipelineStage,
): PipelineStage {
  const name = stageName(target.name, 'collect');
  const output = getCollectedDir(ctx.layout, target.name);
  const { resourcesDir } = ctx.layout;

  return {
    name,
    kind: 'collect',
    targetName: target.name,
    output,
    dependsOn: render ? [render.name] : [],
    run: () => {
      resetDirectory(output);
      let count = 0;
      for (const relativePath of listTree(resourcesDir)) {
        const destination = selectResource(relativePath, target.name, ctx.includeAllResources);
        if (destination === undefined) continue;
        copyFile(path.join(resourcesDir, relativePath), path.join(output, destination));
        count++;
      }
      if (render) {
        for (const relativePath of listTree(render.output)) {
          copyFile(path.join(render.output, relativePath), path.join(output, relativePath));
          count++;
        }
      }
      ctx.logger?.info('collect', 'collected', `Collected ${count} file(s) for ${target.name}`);
    },
  };
}

// ─── Archive ─────────────────────────────────────────────

export function getArchiveFile(ctx: OrchestrationContext, targetName: string): string {
  const { artifactId, version, archiveExtension, libsDir } = ctx.layout;
  return path.join(libsDir, archiveFileName(artifactId, version, targetName, archiveExtension));
}

export function createArchiveStage(
  ctx: OrchestrationContext,
  target: Target,
  collect: PipelineStage,
): PipelineStage {
  const name = stageName(target.name, 'archive');
  const output = getArchiveFile(ctx, target.name);

  return {
    name,
    kind: 'archive',
    targetName: target.name,
    output,
    dependsOn: [collect.name],
    run: () => {
      ctx.archiver.write(collect.output, output);
      ctx.logger?.info('archive', 'archived', `Wrote ${output}`);
    },
  };
}

export function createArtifactHandle(target: Target, archive: PipelineStage, extension: string): ArtifactHandle {
  return {
    targetName: target.name,
    file: archive.output,
    classifier: target.name,
    extension,
    builtBy: archive.name,
  };
}

// ─── Publish ─────────────────────────────────────────────

export function createPublication(ctx: OrchestrationContext, artifact: ArtifactHandle): Publication {
  return {
    groupId: ctx.layout.groupId,
    artifactId: ctx.layout.artifactId,
    version: ctx.layout.version,
    artifact,
    classifier: artifact.classifier,
  };
}

export function createPublishStage(
  ctx: OrchestrationContext,
  target: Target,
  archive: PipelineStage,
  publication: Publication,
): PipelineStage {
  return {
    name: stageName(target.name, 'publish'),
    kind: 'publish',
    targetName: target.name,
    output: publication.artifact.file,
    dependsOn: [archive.name],
    run: () => {
      const destination = ctx.publications.publish(publication);
      ctx.logger?.info(
        'publish',
        'published',
        destination
          ? `Published ${publication.classifier} to ${destination}`
          : `Recorded publication ${publication.classifier}`,
      );
    },
  };
}
