/**
 * Staging errors
 * Every failure the engine raises carries the file, pattern or keys needed
 * to diagnose it without re-running
 */

export type StagingErrorCode =
  | 'TEMPLATE_DEFINITION'
  | 'TARGET_DISCOVERY'
  | 'TARGET_NAME_PARSE'
  | 'TARGET_PARSE'
  | 'INVALID_TARGET'
  | 'STRUCTURAL_INCONSISTENCY'
  | 'PIPELINE_STAGE';

/**
 * Base class for all staging failures
 */
export class StagingError extends Error {
  readonly code: StagingErrorCode;

  constructor(code: StagingErrorCode, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'StagingError';
    this.code = code;
  }
}

/**
 * A template mask or pattern could not be turned into a usable template
 */
export class TemplateDefinitionError extends StagingError {
  readonly mask?: string;

  constructor(message: string, mask?: string, cause?: unknown) {
    super('TEMPLATE_DEFINITION', message, cause);
    this.name = 'TemplateDefinitionError';
    this.mask = mask;
  }
}

/**
 * The targets directory is missing or is not a directory
 */
export class TargetDiscoveryError extends StagingError {
  readonly targetsDir: string;

  constructor(targetsDir: string) {
    super('TARGET_DISCOVERY', `Targets directory does not exist or is not a directory: ${targetsDir}`);
    this.name = 'TargetDiscoveryError';
    this.targetsDir = targetsDir;
  }
}

/**
 * A file passed the template filter but capture group 1 did not resolve
 */
export class TargetNameParseError extends StagingError {
  readonly fileName: string;
  readonly pattern: string;

  constructor(fileName: string, pattern: string, filePath: string) {
    super(
      'TARGET_NAME_PARSE',
      `Unable to parse target name ${fileName} using pattern ${pattern}: ${filePath}`,
    );
    this.name = 'TargetNameParseError';
    this.fileName = fileName;
    this.pattern = pattern;
  }
}

/**
 * A target definition file could not be read or loaded
 */
export class TargetParseError extends StagingError {
  readonly filePath: string;

  constructor(filePath: string, cause: unknown) {
    super('TARGET_PARSE', `Unable to parse target properties file: ${filePath}`, cause);
    this.name = 'TargetParseError';
    this.filePath = filePath;
  }
}

/**
 * A target handed to the orchestrator has no usable name
 */
export class InvalidTargetError extends StagingError {
  readonly target: unknown;

  constructor(target: unknown) {
    super('INVALID_TARGET', `Missing target name: ${describeTarget(target)}`);
    this.name = 'InvalidTargetError';
    this.target = target;
  }
}

/**
 * Generated property sets in one batch define different keys
 */
export class StructuralInconsistencyError extends StagingError {
  readonly keys: string[];

  constructor(keys: string[]) {
    super('STRUCTURAL_INCONSISTENCY', `Detected disjoint property sets: \n\t${keys.join('\n\t')}`);
    this.name = 'StructuralInconsistencyError';
    this.keys = keys;
  }
}

/**
 * A pipeline stage could not be constructed or failed while running
 */
export class PipelineStageError extends StagingError {
  readonly stageName: string;
  readonly targetName: string;

  constructor(stageName: string, targetName: string, cause: unknown) {
    super(
      'PIPELINE_STAGE',
      `Stage ${stageName} failed for target ${targetName}: ${errorMessage(cause)}`,
      cause,
    );
    this.name = 'PipelineStageError';
    this.stageName = stageName;
    this.targetName = targetName;
  }
}

export function isStagingError(error: unknown): error is StagingError {
  return error instanceof StagingError;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Flatten an error and its causes into one line per level
 */
export function describeErrorChain(error: unknown): string[] {
  const lines: string[] = [];
  let current: unknown = error;
  while (current !== undefined && lines.length < 10) {
    lines.push(errorMessage(current));
    current = current instanceof Error ? current.cause : undefined;
  }
  return lines;
}

function describeTarget(target: unknown): string {
  try {
    return JSON.stringify(target) ?? String(target);
  } catch {
    return String(target);
  }
}
