/**
 * JavaScript execution in a Node `vm` context.
 *
 * This isolates globals, not privileges: code still runs on the host process.
 * Deployments that take untrusted prompts should put a real sandbox behind
 * the same ExecutionAdapter interface.
 */

import vm from 'vm';
import { format, inspect, types } from 'util';
import type { ExecutionAdapter } from './executor.js';
import { EMPTY_OUTPUT } from './executor.js';
import { ExecutionError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface VmExecutorOptions {
  /** Run limit per block, pending promise jobs included. */
  timeoutMs?: number;
}

const SNIPPET_FILENAME = 'snippet.js';
const DECLARATION_START = /^(async\s+function|function|class)\b/;
const UNPRINTABLE_FAULT = 'Uncaught exception (unprintable)';
const UNPRINTABLE_VALUE = '(unprintable value)';

type Settle = (
  value: unknown,
  onValue: (value: unknown) => void,
  onError: (error: unknown) => void
) => void;

// Handlers are wrapped in-context so their jobs run on the context's own queue
const SETTLE_SOURCE = '(value, onValue, onError) => { value.then((v) => onValue(v), (e) => onError(e)); }';

// Running any script drains the context's pending promise jobs
const DRAIN = new vm.Script('', { filename: SNIPPET_FILENAME });

function isSettle(candidate: unknown): candidate is Settle {
  return typeof candidate === 'function' && candidate.length === 3;
}

export class VmNamespace {
  readonly output: string[] = [];
  private context: vm.Context | null;
  private readonly settleInContext: Settle;
  executions = 0;

  constructor() {
    const write = (...args: unknown[]) => {
      this.output.push(`${format(...args)}\n`);
    };
    const sandboxConsole = { log: write, info: write, warn: write, error: write, debug: write };
    // Promise jobs stay inside the context and run within each evaluation's timeout
    const context = vm.createContext(
      { print: write, console: sandboxConsole },
      { microtaskMode: 'afterEvaluate' }
    );

    const settle: unknown = vm.runInContext(SETTLE_SOURCE, context);
    if (!isSettle(settle)) {
      throw new ExecutionError('Failed to prepare the execution namespace');
    }
    this.context = context;
    this.settleInContext = settle;
  }

  get disposed(): boolean {
    return this.context === null;
  }

  get vmContext(): vm.Context {
    if (!this.context) {
      throw new ExecutionError('Execution namespace has been released');
    }
    return this.context;
  }

  /** Report the outcome of a promise created in this namespace. */
  settle(promise: unknown, onValue: (value: unknown) => void, onError: (error: unknown) => void): void {
    this.settleInContext(promise, onValue, onError);
  }

  dispose(): void {
    this.context = null;
    this.output.length = 0;
  }
}

export class VmExecutor implements ExecutionAdapter<VmNamespace> {
  private timeoutMs: number;

  constructor(options: VmExecutorOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 5000;
  }

  createNamespace(): VmNamespace {
    return new VmNamespace();
  }

  releaseNamespace(namespace: VmNamespace): void {
    namespace.dispose();
  }

  execute(source: string, namespace: VmNamespace): string {
    const code = trimBlankLines(source);
    const output = namespace.output;
    output.length = 0;
    namespace.executions++;

    try {
      const context = namespace.vmContext;
      const expression = compileExpression(code);
      const script = expression ?? new vm.Script(code, { filename: SNIPPET_FILENAME });
      const value: unknown = script.runInContext(context, { timeout: this.timeoutMs });

      if (types.isPromise(value)) {
        namespace.settle(
          value,
          settled => {
            if (settled !== undefined) output.push(`${describe(settled)}\n`);
          },
          error => output.push(renderFault(error))
        );
        DRAIN.runInContext(context, { timeout: this.timeoutMs });
      } else if (expression && value !== undefined) {
        output.push(`${describe(value)}\n`);
      }
    } catch (error) {
      logger.debug(`[Executor] Block ${namespace.executions} raised a fault`);
      output.push(renderFault(error));
    }

    const text = output.join('').replace(/\n$/, '');
    output.length = 0;
    return text.trim() ? text : EMPTY_OUTPUT;
  }
}

/**
 * Bare expressions are evaluated so their value can be shown without an
 * explicit print. Declarations are left to the script path so they bind.
 */
function compileExpression(code: string): vm.Script | undefined {
  if (!code || DECLARATION_START.test(code)) return undefined;
  try {
    return new vm.Script(`(${code}\n)`, { filename: SNIPPET_FILENAME });
  } catch {
    return undefined;
  }
}

/** `inspect` runs hooks the snippet may define, so it can throw. */
function describe(value: unknown): string {
  try {
    return inspect(value);
  } catch {
    return UNPRINTABLE_VALUE;
  }
}

function renderFault(error: unknown): string {
  try {
    return formatFault(error);
  } catch {
    return `${UNPRINTABLE_FAULT}\n`;
  }
}

function formatFault(error: unknown): string {
  if (!types.isNativeError(error)) {
    return `Uncaught ${inspect(error)}\n`;
  }

  const stack = error.stack || `${error.name}: ${error.message}`;
  // Frames from the host process are noise to the model
  const lines = stack
    .split('\n')
    .filter(line => !/^\s+at /.test(line) || line.includes(SNIPPET_FILENAME));

  return `Traceback:\n${lines.join('\n')}\n`;
}

function trimBlankLines(source: string): string {
  return source.replace(/^\s*\n/, '').replace(/\s+$/, '');
}
