export type PipelineStage = 'build' | 'build_layer' | 'package' | 'deploy' | 'ci_config';

/**
 * Raised by every pipeline stage. Stages never retry; the CLI reports the
 * error and exits non-zero so CI stops at the failing step.
 */
export class PipelineError extends Error {
  constructor(readonly stage: PipelineStage, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PipelineError';
  }
}

export function describeCause(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
