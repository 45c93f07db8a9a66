import { BuildStep } from './types';

/** A failure of one build step. The message never contains command arguments or output. */
export class BuildStepError extends Error {
  constructor(
    readonly step: BuildStep,
    message: string,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = 'BuildStepError';
  }
}
