// Error taxonomy: stage-fatal errors halt the run, everything else is logged and skipped

export type StageName = "collect" | "extract" | "filter";


/** Navigation failed or the server answered with an HTTP error */
export class PageLoadError extends Error {
  readonly url: string;
  readonly status?: number;

  constructor(url: string, message: string, status?: number) {
    super(message);
    this.name = "PageLoadError";
    this.url = url;
    this.status = status;
  }
}


/** Aborts the current stage and the whole run */
export class StageFatalError extends Error {
  readonly stage: StageName;

  constructor(stage: StageName, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StageFatalError";
    this.stage = stage;
  }
}


/** A single-stage run found no checkpoint from the previous stage */
export class MissingCheckpointError extends StageFatalError {
  readonly path: string;

  constructor(stage: StageName, path: string) {
    super(stage, `checkpoint not found: ${path}`);
    this.name = "MissingCheckpointError";
    this.path = path;
  }
}


export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}
