/**
 * Base error class for all harness errors.
 */
export class HarnessError extends Error {
  public readonly code: string;
  public readonly retryable: boolean;

  constructor(message: string, code: string, retryable: boolean, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HarnessError';
    this.code = code;
    this.retryable = retryable;
  }
}

/**
 * Transient transport failure (timeout, refused connection, non-zero exit of a
 * control command that may succeed when repeated).
 */
export class TransportError extends HarnessError {
  constructor(message: string, code: string = 'TRANSPORT', options?: { cause?: unknown }) {
    super(message, code, true, options);
    this.name = 'TransportError';
  }
}

/**
 * The coordinator could not be reached or answered with something unusable.
 */
export class ClusterUnreachableError extends HarnessError {
  constructor(message: string, code: string = 'CLUSTER_UNREACHABLE', options?: { cause?: unknown }) {
    super(message, code, false, options);
    this.name = 'ClusterUnreachableError';
  }
}

/**
 * A node's logs or file listing could not be read.
 */
export class ClusterAccessError extends HarnessError {
  public readonly node: string;

  constructor(node: string, message: string, options?: { cause?: unknown }) {
    super(message, 'CLUSTER_ACCESS', false, options);
    this.name = 'ClusterAccessError';
    this.node = node;
  }
}

/**
 * A node failed to stop or start. Fatal to the current scenario only.
 */
export class ControlError extends HarnessError {
  public readonly node: string;

  constructor(node: string, message: string, options?: { cause?: unknown }) {
    super(message, 'CONTROL_FAILED', false, options);
    this.name = 'ControlError';
    this.node = node;
  }
}

/**
 * Invalid configuration file, environment value or flag.
 */
export class ConfigError extends HarnessError {
  constructor(message: string, code: string = 'INVALID_CONFIG', options?: { cause?: unknown }) {
    super(message, code, false, options);
    this.name = 'ConfigError';
  }
}

/**
 * The operator aborted the run.
 */
export class ScenarioAbortedError extends HarnessError {
  constructor(message: string = 'run aborted', options?: { cause?: unknown }) {
    super(message, 'ABORTED', false, options);
    this.name = 'ScenarioAbortedError';
  }
}

/** Render any thrown value as a single-line message. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
