/**
 * Execution capability used by the tool loop.
 *
 * A namespace is created once per turn and handed back on every call, so
 * values defined by one executed block are visible to the next one.
 * `execute` must never throw: faults come back as part of the output text.
 */
export interface ExecutionAdapter<N> {
  createNamespace(): N;
  execute(source: string, namespace: N): string;
  releaseNamespace(namespace: N): void;
}

export const EMPTY_OUTPUT = '(no output)';
