export class UnknownResourceError extends Error {
  constructor(
    message: string,
    public readonly context: { source: string; missing: string[]; available: string[] }
  ) {
    super(message);
    this.name = 'UnknownResourceError';
  }
}

export class PipelineRunError extends Error {
  constructor(
    message: string,
    public readonly stage: 'extract' | 'load',
    public readonly context: { pipelineName: string; resource?: string; cause?: unknown }
  ) {
    super(message);
    this.name = 'PipelineRunError';
  }
}
